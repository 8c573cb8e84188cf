import * as DNS from 'dns/promises';
import * as Dgram from 'dgram';
import * as Net from 'net';

import * as x from 'x-value';

import {DNS_PORT, MAX_UDP_MESSAGE_SIZE} from './constants.js';
import {isTruncatedMessage} from './message.js';

export const TransportProtocol = x.union([x.literal('udp'), x.literal('tcp')]);

export type TransportProtocol = x.TypeOf<typeof TransportProtocol>;

export type ServerEndpoint = {
  host: string;
  port: number;
};

export type IDNSTransport = {
  exchange(message: Buffer): Promise<Buffer>;
};

/**
 * Parses "host", "host:port", "[ipv6]:port" or a bare IPv6 address.
 */
export function parseServerEndpoint(server: string): ServerEndpoint {
  let bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(server);

  if (bracketed) {
    return {
      host: bracketed[1],
      port: bracketed[2] === undefined ? DNS_PORT : parsePort(bracketed[2]),
    };
  }

  if (Net.isIPv6(server)) {
    return {host: server, port: DNS_PORT};
  }

  let separatorIndex = server.lastIndexOf(':');

  if (separatorIndex < 0) {
    return {host: server, port: DNS_PORT};
  }

  return {
    host: server.slice(0, separatorIndex),
    port: parsePort(server.slice(separatorIndex + 1)),
  };
}

export function formatServerEndpoint({host, port}: ServerEndpoint): string {
  return Net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}

export type DNSClientOptions = {
  protocol?: TransportProtocol;
  /**
   * Milliseconds, no timeout if omitted or not positive.
   */
  timeout?: number;
};

/**
 * Exchanges one message. UDP unless configured otherwise; a message too
 * large for UDP or a truncated UDP reply goes over TCP.
 */
export class DNSClient implements IDNSTransport {
  private protocol: TransportProtocol;

  private udp: UDPTransport;
  private tcp: TCPTransport;

  constructor(
    readonly endpoint: ServerEndpoint,
    {protocol = 'udp', timeout}: DNSClientOptions = {},
  ) {
    this.protocol = protocol;

    if (timeout !== undefined && timeout <= 0) {
      timeout = undefined;
    }

    this.udp = new UDPTransport(endpoint, timeout);
    this.tcp = new TCPTransport(endpoint, timeout);
  }

  async exchange(message: Buffer): Promise<Buffer> {
    if (this.protocol === 'tcp' || message.length > MAX_UDP_MESSAGE_SIZE) {
      return this.tcp.exchange(message);
    }

    let reply = await this.udp.exchange(message);

    if (isTruncatedMessage(reply)) {
      return this.tcp.exchange(message);
    }

    return reply;
  }
}

export class UDPTransport implements IDNSTransport {
  constructor(
    readonly endpoint: ServerEndpoint,
    private timeout?: number,
  ) {}

  async exchange(message: Buffer): Promise<Buffer> {
    let {host, port} = this.endpoint;

    let {address, family} = await DNS.lookup(host);

    let id = message.readUInt16BE(0);

    let socket = Dgram.createSocket(family === 6 ? 'udp6' : 'udp4');

    return new Promise<Buffer>((resolve, reject) => {
      let timer =
        this.timeout === undefined || this.timeout <= 0
          ? undefined
          : setTimeout(
              () => settle(new Error(`UDP exchange timed out.`)),
              this.timeout,
            );

      let settle = (error: Error | undefined, reply?: Buffer): void => {
        clearTimeout(timer);
        socket.close();

        if (reply) {
          resolve(reply);
        } else {
          reject(error);
        }
      };

      socket.on('error', error => settle(error));

      socket.on('message', (reply, remote) => {
        if (
          remote.address !== address ||
          remote.port !== port ||
          reply.length < 2 ||
          reply.readUInt16BE(0) !== id
        ) {
          return;
        }

        settle(undefined, reply);
      });

      socket.send(message, port, address, error => {
        if (error) {
          settle(error);
        }
      });
    });
  }
}

export class TCPTransport implements IDNSTransport {
  constructor(
    readonly endpoint: ServerEndpoint,
    private timeout?: number,
  ) {}

  exchange(message: Buffer): Promise<Buffer> {
    let {host, port} = this.endpoint;

    return new Promise<Buffer>((resolve, reject) => {
      let socket = Net.connect({host, port});

      if (this.timeout !== undefined && this.timeout > 0) {
        socket.setTimeout(this.timeout, () =>
          socket.destroy(new Error('TCP exchange timed out.')),
        );
      }

      let received = Buffer.alloc(0);
      let settled = false;

      socket.on('connect', () => {
        let length = Buffer.alloc(2);
        length.writeUInt16BE(message.length, 0);

        socket.write(Buffer.concat([length, message]));
      });

      socket.on('data', data => {
        received = Buffer.concat([received, data]);

        if (received.length < 2) {
          return;
        }

        let length = received.readUInt16BE(0);

        if (received.length >= 2 + length) {
          settled = true;
          socket.end();
          resolve(received.subarray(2, 2 + length));
        }
      });

      socket.on('error', error => {
        settled = true;
        reject(error);
      });

      socket.on('close', () => {
        if (!settled) {
          reject(new Error('Connection closed before a complete reply.'));
        }
      });
    });
  }
}

function parsePort(text: string): number {
  let port = Number(text);

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`Invalid port "${text}".`);
  }

  return port;
}
