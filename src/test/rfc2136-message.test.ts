import DNSPacket from 'dns-packet';

import {
  ConfigError,
  buildUpdateMessage,
  encodeMessage,
  encodeName,
  isTruncatedMessage,
  parseMessage,
  toWireName,
} from '../library/index.js';

import {NOW, finalAddress} from './@utils.js';

const BATCH = {
  zone: 'example.com',
  ttl: 300,
  addresses: [
    finalAddress('router', '198.51.100.7'),
    finalAddress('nas', '2001:470:1f0e:83f:1234:1234:1234:1234'),
  ],
};

test('builds a delete and an add per host plus the timestamp record', () => {
  const message = buildUpdateMessage(BATCH, {id: 0x1234, now: NOW});

  expect(message).toEqual({
    id: 0x1234,
    zone: 'example.com',
    updates: [
      {type: 'ANY', class: 'ANY', name: 'router.example.com', ttl: 0},
      {
        type: 'A',
        class: 'IN',
        name: 'router.example.com',
        ttl: 300,
        data: '198.51.100.7',
      },
      {type: 'ANY', class: 'ANY', name: 'nas.example.com', ttl: 0},
      {
        type: 'AAAA',
        class: 'IN',
        name: 'nas.example.com',
        ttl: 300,
        data: '2001:470:1f0e:83f:1234:1234:1234:1234',
      },
      {
        type: 'TXT',
        class: 'IN',
        name: 'example.com',
        ttl: 300,
        data: ['2024-01-02T03:04:05.000Z'],
      },
    ],
  });
});

test('an empty batch still carries the timestamp record', () => {
  const message = buildUpdateMessage(
    {zone: 'example.com.', ttl: 60, addresses: []},
    {id: 1, now: NOW},
  );

  expect(message.zone).toBe('example.com');
  expect(message.updates).toEqual([
    {
      type: 'TXT',
      class: 'IN',
      name: 'example.com',
      ttl: 60,
      data: ['2024-01-02T03:04:05.000Z'],
    },
  ]);
});

test('encodes the header and the zone section', () => {
  const wire = encodeMessage(
    buildUpdateMessage(
      {zone: 'example.com', ttl: 300, addresses: [BATCH.addresses[0]]},
      {id: 0x1234, now: NOW},
    ),
  );

  expect(wire.subarray(0, 12).toString('hex')).toBe('123428000001000000030000');

  expect(wire.subarray(12, 29).toString('hex')).toBe(
    '076578616d706c6503636f6d0000060001',
  );

  expect(wire.subarray(29, 59).toString('hex')).toBe(
    '06726f75746572076578616d706c6503636f6d0000ff00ff000000000000',
  );

  expect(parseMessage(wire).header).toEqual({
    id: 0x1234,
    flags: 0x2800,
    response: false,
    opcode: 5,
    truncated: false,
    rcode: 0,
    questionCount: 1,
    answerCount: 0,
    authorityCount: 3,
    additionalCount: 0,
  });
});

test('encodes the updates in the authority section', () => {
  const message = buildUpdateMessage(BATCH, {id: 0x1234, now: NOW});

  const packet = DNSPacket.decode(encodeMessage(message));

  expect(packet.questions).toMatchObject([
    {name: 'example.com', type: 'SOA', class: 'IN'},
  ]);

  expect(packet.answers).toEqual([]);
  expect(packet.additionals).toEqual([]);

  expect(packet.authorities).toHaveLength(5);

  expect(packet.authorities?.[0]).toMatchObject({
    name: 'router.example.com',
    type: 'ANY',
    class: 'ANY',
    ttl: 0,
  });

  expect(packet.authorities?.[1]).toMatchObject({
    name: 'router.example.com',
    type: 'A',
    class: 'IN',
    ttl: 300,
    data: '198.51.100.7',
  });

  expect(packet.authorities?.[3]).toMatchObject({
    name: 'nas.example.com',
    type: 'AAAA',
    class: 'IN',
    ttl: 300,
  });

  expect(packet.authorities?.[4]).toMatchObject({
    name: 'example.com',
    type: 'TXT',
    class: 'IN',
    ttl: 300,
    data: [Buffer.from('2024-01-02T03:04:05.000Z')],
  });
});

test('leaves the message intact when encoding', () => {
  const message = buildUpdateMessage(BATCH, {id: 0x1234, now: NOW});

  const first = encodeMessage(message);

  expect(message.updates[4]).toEqual({
    type: 'TXT',
    class: 'IN',
    name: 'example.com',
    ttl: 300,
    data: ['2024-01-02T03:04:05.000Z'],
  });

  expect(encodeMessage(message)).toEqual(first);
});

test('encodes names with or without the trailing dot', () => {
  expect(encodeName('example.com.')).toEqual(encodeName('example.com'));
  expect(encodeName('example.com').toString('hex')).toBe(
    '076578616d706c6503636f6d00',
  );
  expect(encodeName('.')).toEqual(Buffer.from([0]));
  expect(encodeName('')).toEqual(Buffer.from([0]));
});

test('converts names to their ascii form', () => {
  expect(toWireName('Example.COM.')).toBe('example.com');
  expect(toWireName('büro.example.com')).toBe('xn--bro-hoa.example.com');
  expect(toWireName('.')).toBe('');

  expect(() => toWireName('a b.example.com')).toThrow(
    new ConfigError('Invalid domain name "a b.example.com".'),
  );
  expect(() => toWireName('example..com')).toThrow(ConfigError);
  expect(() => toWireName(`${'a'.repeat(64)}.com`)).toThrow(ConfigError);
});

test('writes non-ascii host names in their ascii form', () => {
  const message = buildUpdateMessage(
    {
      zone: 'example.com',
      ttl: 300,
      addresses: [finalAddress('büro', '198.51.100.7')],
    },
    {id: 1, now: NOW},
  );

  expect(message.updates.map(({name}) => name)).toEqual([
    'xn--bro-hoa.example.com',
    'xn--bro-hoa.example.com',
    'example.com',
  ]);

  const wire = encodeMessage(message);

  expect(wire.subarray(29, 29 + 12).toString('ascii')).toBe(
    '\u000bxn--bro-hoa',
  );
});

test('parses reply header flags', () => {
  const reply = DNSPacket.encode({
    type: 'response',
    id: 0x1234,
    flags: (5 << 11) | 5,
    questions: [{type: 'SOA', class: 'IN', name: 'example.com'}],
  });

  expect(parseMessage(reply).header).toMatchObject({
    id: 0x1234,
    response: true,
    opcode: 5,
    truncated: false,
    rcode: 5,
    questionCount: 1,
  });

  expect(() => parseMessage(Buffer.alloc(4))).toThrow(RangeError);
});

test('detects a truncated reply from its header', () => {
  const reply = DNSPacket.encode({
    type: 'response',
    id: 0x1234,
    flags: (5 << 11) | 0x0200,
  });

  expect(isTruncatedMessage(reply)).toBe(true);
  expect(parseMessage(reply).header.truncated).toBe(true);

  expect(isTruncatedMessage(reply.subarray(0, 4))).toBe(false);
});
