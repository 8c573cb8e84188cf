import ms from 'ms';
import * as x from 'x-value';

import {
  Logs,
  RFC2136_REPLY_UNSIGNED,
  RFC2136_SENDING,
  RFC2136_SERVER_REPLY,
  RFC2136_UPDATE_ACCEPTED,
} from '../../@log/index.js';
import {getErrorCode, toHex} from '../../@utils/index.js';
import {ConfigError, TransportError} from '../../errors.js';
import {Duration} from '../../x.js';
import type {
  IUpdateDispatcher,
  UpdateBatch,
  UpdateOutcome,
} from '../dispatcher.js';

import {Opcode, rcodeToString} from './constants.js';
import {
  buildUpdateMessage,
  encodeMessage,
  parseMessage,
} from './message.js';
import type {TSIGKey} from './tsig.js';
import {
  TSIGAlgorithm,
  TSIG_ALGORITHM_DEFAULT,
  TSIG_FUDGE_DEFAULT,
  signMessage,
  verifyReplySignature,
} from './tsig.js';
import type {IDNSTransport, ServerEndpoint} from './transport.js';
import {
  DNSClient,
  TransportProtocol,
  formatServerEndpoint,
  parseServerEndpoint,
} from './transport.js';

export const RFC2136Options = x.object({
  type: x.literal('rfc2136'),
  /**
   * Authoritative server, "host" or "host:port".
   */
  server: x.string,
  /**
   * TSIG key name, looked up in `secrets`.
   */
  keyName: x.string,
  algorithm: TSIGAlgorithm.optional(),
  /**
   * Key name to base64 secret.
   */
  secrets: x.record(x.string, x.string),
  transport: TransportProtocol.optional(),
  /**
   * E.g. "10s", waits indefinitely if omitted.
   */
  timeout: Duration.optional(),
  fudge: x.integerRange({min: 1, max: 0xffff}).optional(),
});

export type RFC2136Options = x.TypeOf<typeof RFC2136Options>;

export type RFC2136UpdateState = 'idle' | 'built' | 'sent' | 'success' | 'fatal';

export type RFC2136UpdaterOptions = {
  server: ServerEndpoint;
  key: TSIGKey;
  fudge?: number;
  transport?: IDNSTransport;
  logs?: Logs;
  now?: () => Date;
};

/**
 * Delivers a batch as one TSIG-signed RFC 2136 UPDATE. Single shot: any
 * failure of the exchange is fatal for the batch, nothing is retried.
 */
export class RFC2136Updater implements IUpdateDispatcher {
  readonly name = 'rfc2136';

  private _state: RFC2136UpdateState = 'idle';

  private server: ServerEndpoint;
  private key: TSIGKey;
  private fudge: number;
  private transport: IDNSTransport;
  private logs: Logs;
  private now: () => Date;

  constructor({
    server,
    key,
    fudge = TSIG_FUDGE_DEFAULT,
    transport = new DNSClient(server),
    logs = Logs,
    now = () => new Date(),
  }: RFC2136UpdaterOptions) {
    this.server = server;
    this.key = key;
    this.fudge = fudge;
    this.transport = transport;
    this.logs = logs;
    this.now = now;
  }

  get state(): RFC2136UpdateState {
    return this._state;
  }

  async submit(batch: UpdateBatch): Promise<UpdateOutcome> {
    if (this._state !== 'idle') {
      throw new Error(`Update already ${this._state}.`);
    }

    let logs = this.logs;

    let now = this.now();

    let message = buildUpdateMessage(batch, {now});

    let {wire, mac} = signMessage(encodeMessage(message), this.key, {
      now,
      fudge: this.fudge,
    });

    this._state = 'built';

    let server = formatServerEndpoint(this.server);

    logs.info(
      'rfc2136',
      RFC2136_SENDING(batch.zone, server, message.updates.length),
    );

    let reply: Buffer;

    try {
      reply = await this.transport.exchange(wire);
    } catch (error) {
      this._state = 'fatal';

      throw new TransportError(
        `Exchange with ${server} failed: ${getErrorCode(error)}`,
        undefined,
        {cause: error},
      );
    }

    this._state = 'sent';

    try {
      this.checkReply(reply, message.id, mac);
    } catch (error) {
      this._state = 'fatal';

      logs.error('rfc2136', RFC2136_SERVER_REPLY(toHex(reply)));

      throw error instanceof TransportError
        ? error
        : new TransportError(
            `Invalid reply from ${server}: ${getErrorCode(error)}`,
            reply,
            {cause: error},
          );
    }

    this._state = 'success';

    logs.info('rfc2136', RFC2136_UPDATE_ACCEPTED);

    return {succeeded: batch.addresses, failed: []};
  }

  private checkReply(reply: Buffer, id: number, requestMAC: Buffer): void {
    let {header} = parseMessage(reply);

    if (!header.response || header.id !== id || header.opcode !== Opcode.UPDATE) {
      throw new TransportError(
        `Reply does not match update #${id}.`,
        reply,
      );
    }

    let verification: string;

    try {
      verification = verifyReplySignature(reply, requestMAC, this.key, this.now());
    } catch (error) {
      throw new TransportError(
        `Reply signature rejected: ${getErrorCode(error)}`,
        reply,
        {cause: error},
      );
    }

    if (header.rcode !== 0) {
      throw new TransportError(
        `Server refused update: ${rcodeToString(header.rcode)}.`,
        reply,
      );
    }

    if (verification === 'unsigned') {
      this.logs.warn('rfc2136', RFC2136_REPLY_UNSIGNED);
    }
  }
}

export function createRFC2136Updater(
  {
    server: serverText,
    keyName,
    algorithm = TSIG_ALGORITHM_DEFAULT,
    secrets,
    transport: protocol,
    timeout,
    fudge,
  }: RFC2136Options,
  logs: Logs = Logs,
): RFC2136Updater {
  let secret = Object.prototype.hasOwnProperty.call(secrets, keyName)
    ? secrets[keyName]
    : undefined;

  if (secret === undefined) {
    throw new ConfigError(`No secret configured for TSIG key "${keyName}".`);
  }

  let server: ServerEndpoint;

  try {
    server = parseServerEndpoint(serverText);
  } catch (error) {
    throw new ConfigError(`Invalid server "${serverText}".`, {cause: error});
  }

  return new RFC2136Updater({
    server,
    key: {name: keyName, algorithm, secret},
    fudge,
    transport: new DNSClient(server, {
      protocol,
      timeout: timeout === undefined ? undefined : ms(timeout),
    }),
    logs,
  });
}
