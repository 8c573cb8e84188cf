import {createHmac, timingSafeEqual} from 'crypto';

import * as x from 'x-value';

import {trimTrailingDot} from '../../@utils/index.js';

import {
  ADDITIONAL_COUNT_OFFSET,
  ANY_RECORD_CLASS,
  HEADER_SIZE,
  TSIG_RECORD_TYPE,
  rcodeToString,
} from './constants.js';
import {encodeName, parseMessage, toWireName} from './message.js';

export const TSIGAlgorithm = x.union([
  x.literal('hmac-md5'),
  x.literal('hmac-sha1'),
  x.literal('hmac-sha256'),
  x.literal('hmac-sha512'),
]);

export type TSIGAlgorithm = x.TypeOf<typeof TSIGAlgorithm>;

export const TSIG_ALGORITHM_DEFAULT: TSIGAlgorithm = 'hmac-md5';

/**
 * Signature validity window in seconds.
 */
export const TSIG_FUDGE_DEFAULT = 300;

const ALGORITHMS: Record<TSIGAlgorithm, {name: string; hash: string}> = {
  'hmac-md5': {name: 'hmac-md5.sig-alg.reg.int', hash: 'md5'},
  'hmac-sha1': {name: 'hmac-sha1', hash: 'sha1'},
  'hmac-sha256': {name: 'hmac-sha256', hash: 'sha256'},
  'hmac-sha512': {name: 'hmac-sha512', hash: 'sha512'},
};

export type TSIGKey = {
  name: string;
  algorithm: TSIGAlgorithm;
  /**
   * Base64 encoded shared secret.
   */
  secret: string;
};

export type TSIGData = {
  algorithm: string;
  /**
   * Seconds since epoch, 48 bits.
   */
  timeSigned: number;
  fudge: number;
  mac: Buffer;
  originalId: number;
  error: number;
  otherData: Buffer;
};

export type SignMessageOptions = {
  now?: Date;
  fudge?: number;
  /**
   * MAC of the request, when signing a reply.
   */
  requestMAC?: Buffer;
};

export type SignedMessage = {
  wire: Buffer;
  mac: Buffer;
};

/**
 * Appends a TSIG record (RFC 8945) to an encoded message.
 */
export function signMessage(
  wire: Buffer,
  key: TSIGKey,
  {now = new Date(), fudge = TSIG_FUDGE_DEFAULT, requestMAC}: SignMessageOptions = {},
): SignedMessage {
  let keyName = toWireName(key.name);

  let tsig: TSIGData = {
    algorithm: ALGORITHMS[key.algorithm].name,
    timeSigned: Math.floor(now.getTime() / 1000),
    fudge,
    mac: Buffer.alloc(0),
    originalId: wire.readUInt16BE(0),
    error: 0,
    otherData: Buffer.alloc(0),
  };

  tsig.mac = digest(key, wire, keyName, tsig, requestMAC);

  let data = encodeTSIGData(tsig);

  let fixed = Buffer.alloc(10);

  fixed.writeUInt16BE(TSIG_RECORD_TYPE, 0);
  fixed.writeUInt16BE(ANY_RECORD_CLASS, 2);
  fixed.writeUInt32BE(0, 4);
  fixed.writeUInt16BE(data.length, 8);

  let signed = Buffer.concat([wire, encodeName(keyName), fixed, data]);

  signed.writeUInt16BE(
    wire.readUInt16BE(ADDITIONAL_COUNT_OFFSET) + 1,
    ADDITIONAL_COUNT_OFFSET,
  );

  return {wire: signed, mac: tsig.mac};
}

export type VerifyResult = 'verified' | 'unsigned';

/**
 * Verifies the TSIG record of a reply against the MAC of its request.
 * Throws on a TSIG error reported by the server, a key or algorithm
 * mismatch, a bad MAC or a time outside the fudge window.
 */
export function verifyReplySignature(
  reply: Buffer,
  requestMAC: Buffer,
  key: TSIGKey,
  now = new Date(),
): VerifyResult {
  let record = findTSIGRecord(reply);

  if (!record) {
    return 'unsigned';
  }

  let tsig = decodeTSIGData(record.data);

  if (tsig.error !== 0) {
    throw new TSIGError(`server reported ${rcodeToString(tsig.error)}`);
  }

  if (!sameName(record.name, toWireName(key.name))) {
    throw new TSIGError(`reply signed with unknown key ${record.name}`);
  }

  if (!sameName(tsig.algorithm, ALGORITHMS[key.algorithm].name)) {
    throw new TSIGError(`reply signed with algorithm ${tsig.algorithm}`);
  }

  let unsigned = Buffer.from(reply.subarray(0, record.offset));

  unsigned.writeUInt16BE(tsig.originalId, 0);
  unsigned.writeUInt16BE(
    unsigned.readUInt16BE(ADDITIONAL_COUNT_OFFSET) - 1,
    ADDITIONAL_COUNT_OFFSET,
  );

  let expected = digest(key, unsigned, record.name, tsig, requestMAC);

  if (
    expected.length !== tsig.mac.length ||
    !timingSafeEqual(expected, tsig.mac)
  ) {
    throw new TSIGError('reply signature mismatch');
  }

  let skew = Math.abs(Math.floor(now.getTime() / 1000) - tsig.timeSigned);

  if (skew > tsig.fudge) {
    throw new TSIGError(`reply signed ${skew}s away from local time`);
  }

  return 'verified';
}

export type TSIGRecord = {
  /**
   * Key name as found on the wire.
   */
  name: string;
  /**
   * Offset of the record in the message.
   */
  offset: number;
  data: Buffer;
};

/**
 * Returns the TSIG record closing the additional section, if any.
 */
export function findTSIGRecord(message: Buffer): TSIGRecord | undefined {
  let {packet} = parseMessage(message);

  let record = packet.additionals?.at(-1);

  if (!record || !('data' in record)) {
    return undefined;
  }

  let type: string = record.type;
  let {name, data} = record;

  if (type !== 'TSIG' || !Buffer.isBuffer(data)) {
    return undefined;
  }

  let owner = encodeName(name);
  let offset = message.length - (owner.length + 10 + data.length);

  if (
    offset < HEADER_SIZE ||
    !message.subarray(offset, offset + owner.length).equals(owner)
  ) {
    throw new TSIGError('tsig record owner name is compressed');
  }

  return {name, offset, data};
}

export class TSIGError extends Error {
  override readonly name: string = 'TSIGError';
}

function digest(
  key: TSIGKey,
  wire: Buffer,
  keyName: string,
  tsig: TSIGData,
  requestMAC: Buffer | undefined,
): Buffer {
  let hmac = createHmac(
    ALGORITHMS[key.algorithm].hash,
    Buffer.from(key.secret, 'base64'),
  );

  if (requestMAC) {
    let length = Buffer.alloc(2);
    length.writeUInt16BE(requestMAC.length, 0);

    hmac.update(length).update(requestMAC);
  }

  return hmac.update(wire).update(encodeTSIGVariables(keyName, tsig)).digest();
}

function encodeTSIGVariables(
  keyName: string,
  {algorithm, timeSigned, fudge, error, otherData}: TSIGData,
): Buffer {
  let classAndTTL = Buffer.alloc(6);

  classAndTTL.writeUInt16BE(ANY_RECORD_CLASS, 0);
  classAndTTL.writeUInt32BE(0, 2);

  let fields = Buffer.alloc(12);

  writeUInt48BE(fields, timeSigned, 0);
  fields.writeUInt16BE(fudge, 6);
  fields.writeUInt16BE(error, 8);
  fields.writeUInt16BE(otherData.length, 10);

  return Buffer.concat([
    encodeName(keyName.toLowerCase()),
    classAndTTL,
    encodeName(algorithm.toLowerCase()),
    fields,
    otherData,
  ]);
}

function encodeTSIGData({
  algorithm,
  timeSigned,
  fudge,
  mac,
  originalId,
  error,
  otherData,
}: TSIGData): Buffer {
  let timeAndMACSize = Buffer.alloc(10);

  writeUInt48BE(timeAndMACSize, timeSigned, 0);
  timeAndMACSize.writeUInt16BE(fudge, 6);
  timeAndMACSize.writeUInt16BE(mac.length, 8);

  let tail = Buffer.alloc(6);

  tail.writeUInt16BE(originalId, 0);
  tail.writeUInt16BE(error, 2);
  tail.writeUInt16BE(otherData.length, 4);

  return Buffer.concat([
    encodeName(algorithm),
    timeAndMACSize,
    mac,
    tail,
    otherData,
  ]);
}

export function decodeTSIGData(data: Buffer): TSIGData {
  let [algorithm, offset] = readUncompressedName(data, 0);

  if (offset + 10 > data.length) {
    throw new TSIGError('truncated tsig record');
  }

  let macSize = data.readUInt16BE(offset + 8);
  let tailOffset = offset + 10 + macSize;

  if (tailOffset + 6 > data.length) {
    throw new TSIGError('truncated tsig record');
  }

  let otherLength = data.readUInt16BE(tailOffset + 4);

  return {
    algorithm,
    timeSigned: readUInt48BE(data, offset),
    fudge: data.readUInt16BE(offset + 6),
    mac: Buffer.from(data.subarray(offset + 10, tailOffset)),
    originalId: data.readUInt16BE(tailOffset),
    error: data.readUInt16BE(tailOffset + 2),
    otherData: Buffer.from(
      data.subarray(tailOffset + 6, tailOffset + 6 + otherLength),
    ),
  };
}

/**
 * Algorithm names in TSIG data are never compressed (RFC 8945 4.2).
 */
function readUncompressedName(
  data: Buffer,
  offset: number,
): [name: string, next: number] {
  let labels: string[] = [];

  while (true) {
    if (offset >= data.length) {
      throw new TSIGError('truncated tsig record');
    }

    let length = data[offset];

    if (length === 0) {
      return [labels.join('.'), offset + 1];
    }

    if (length > 63) {
      throw new TSIGError('compressed algorithm name');
    }

    labels.push(data.toString('ascii', offset + 1, offset + 1 + length));
    offset += 1 + length;
  }
}

function sameName(a: string, b: string): boolean {
  return trimTrailingDot(a).toLowerCase() === trimTrailingDot(b).toLowerCase();
}

function writeUInt48BE(buffer: Buffer, value: number, offset: number): void {
  buffer.writeUInt16BE(Math.floor(value / 2 ** 32), offset);
  buffer.writeUInt32BE(value % 2 ** 32, offset + 2);
}

function readUInt48BE(buffer: Buffer, offset: number): number {
  return buffer.readUInt16BE(offset) * 2 ** 32 + buffer.readUInt32BE(offset + 2);
}
