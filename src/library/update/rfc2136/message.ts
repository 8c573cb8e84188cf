import {randomInt} from 'crypto';
import {domainToASCII} from 'url';

import type {Answer} from 'dns-packet';
import DNSPacket from 'dns-packet';

import {trimTrailingDot} from '../../@utils/index.js';
import {ConfigError} from '../../errors.js';
import type {UpdateBatch} from '../dispatcher.js';

import {HEADER_SIZE, Opcode} from './constants.js';

const MAX_LABEL_LENGTH = 63;
const MAX_NAME_LENGTH = 253;

/**
 * Question type and class following the name of a question entry.
 */
const QUESTION_TAIL_SIZE = 4;

/**
 * "Delete all RRsets from a name" (RFC 2136 2.5.3).
 */
export type DeleteRecord = {
  type: 'ANY';
  class: 'ANY';
  name: string;
  ttl: 0;
};

export type AddressRecord = {
  type: 'A' | 'AAAA';
  class: 'IN';
  name: string;
  ttl: number;
  data: string;
};

export type TimestampRecord = {
  type: 'TXT';
  class: 'IN';
  name: string;
  ttl: number;
  data: string[];
};

export type UpdateRecord = DeleteRecord | AddressRecord | TimestampRecord;

/**
 * A DNS message in UPDATE layout (RFC 2136): the question section holds the
 * zone, the authority section the updates. No prerequisites are sent.
 */
export type UpdateMessage = {
  id: number;
  zone: string;
  updates: UpdateRecord[];
};

export type MessageHeader = {
  id: number;
  flags: number;
  response: boolean;
  opcode: number;
  truncated: boolean;
  rcode: number;
  questionCount: number;
  answerCount: number;
  authorityCount: number;
  additionalCount: number;
};

export type DecodedMessage = ReturnType<typeof DNSPacket.decode>;

export type ParsedMessage = {
  header: MessageHeader;
  packet: DecodedMessage;
};

export type BuildUpdateMessageOptions = {
  id?: number;
  now?: Date;
};

/**
 * Builds the update for a batch: per address a "delete all RRsets" record
 * followed by the new A/AAAA record, then one TXT record at the zone apex
 * carrying the time of the update.
 */
export function buildUpdateMessage(
  {zone, ttl, addresses}: UpdateBatch,
  {id = randomInt(0, 0x10000), now = new Date()}: BuildUpdateMessageOptions = {},
): UpdateMessage {
  zone = toWireName(zone);

  let updates = addresses.flatMap(({fqdn, type, ip, ttl}): UpdateRecord[] => {
    let name = toWireName(fqdn);

    return [
      {type: 'ANY', class: 'ANY', name, ttl: 0},
      {type, class: 'IN', name, ttl, data: ip},
    ];
  });

  updates.push({
    type: 'TXT',
    class: 'IN',
    name: zone,
    ttl,
    data: [now.toISOString()],
  });

  return {id, zone, updates};
}

export function encodeMessage({id, zone, updates}: UpdateMessage): Buffer {
  return DNSPacket.encode({
    type: 'query',
    id,
    flags: Opcode.UPDATE << 11,
    questions: [{type: 'SOA', class: 'IN', name: zone}],
    authorities: updates.map(toPacketAnswer),
  });
}

export function parseMessage(buffer: Buffer): ParsedMessage {
  if (buffer.length < HEADER_SIZE) {
    throw new RangeError('Message shorter than its header.');
  }

  let packet = DNSPacket.decode(buffer);

  let flags = packet.flags ?? 0;

  return {
    header: {
      id: packet.id ?? 0,
      flags,
      response: packet.type === 'response',
      opcode: (flags >> 11) & 0xf,
      truncated: isTruncatedMessage(buffer),
      rcode: flags & 0xf,
      questionCount: packet.questions?.length ?? 0,
      answerCount: packet.answers?.length ?? 0,
      authorityCount: packet.authorities?.length ?? 0,
      additionalCount: packet.additionals?.length ?? 0,
    },
    packet,
  };
}

/**
 * Reads the TC bit only, a truncated reply may not decode completely.
 */
export function isTruncatedMessage(buffer: Buffer): boolean {
  return buffer.length >= HEADER_SIZE && (buffer.readUInt16BE(2) & 0x0200) !== 0;
}

/**
 * Wire form of a name, as dns-packet writes it (uncompressed).
 */
export function encodeName(name: string): Buffer {
  let packet = DNSPacket.encode({questions: [{type: 'A', name}]});

  return packet.subarray(HEADER_SIZE, packet.length - QUESTION_TAIL_SIZE);
}

/**
 * Converts a host or zone name to its ASCII form (IDNA), without the
 * trailing dot. "" and "." are the root.
 */
export function toWireName(name: string): string {
  let text = trimTrailingDot(name);

  if (text === '') {
    return '';
  }

  let ascii = domainToASCII(text);

  if (
    ascii === '' ||
    ascii.length > MAX_NAME_LENGTH ||
    ascii
      .split('.')
      .some(label => label.length === 0 || label.length > MAX_LABEL_LENGTH)
  ) {
    throw new ConfigError(`Invalid domain name "${name}".`);
  }

  return ascii;
}

function toPacketAnswer(record: UpdateRecord): Answer {
  switch (record.type) {
    case 'A':
    case 'AAAA':
      return record;
    case 'TXT':
      // dns-packet replaces the strings with buffers in place.
      return {...record, data: [...record.data]};
    case 'ANY': {
      let answer = {...record, data: Buffer.alloc(0)};

      if (!isPacketAnswer(answer)) {
        throw new TypeError(`Cannot encode ${record.type} record.`);
      }

      return answer;
    }
  }
}

/**
 * dns-packet writes meta types such as ANY through its type table with
 * opaque record data; its declared answer union only lists data types.
 */
function isPacketAnswer(record: object): record is Answer {
  return 'type' in record && 'name' in record && 'data' in record;
}
