import {
  ParseError,
  PartialAddress,
  ResolutionError,
  formatAddress,
  mergeAddress,
} from '../library/index.js';

import {bytes} from './@utils.js';

test('parses ipv4 partial address', () => {
  const partial = PartialAddress.parse('0.0.0.9/24');

  expect(partial.is4()).toBe(true);
  expect(partial.prefixLength).toBe(24);
  expect(partial.toString()).toBe('0.0.0.9/24');
  expect(Array.from(partial.mask)).toEqual([...new Array(15).fill(0xff), 0]);
  expect(formatAddress(partial.baseBits)).toBe('0.0.0.9');
});

test('parses ipv6 partial address', () => {
  const partial = PartialAddress.parse('::1234:1234:1234:1234/64');

  expect(partial.is4()).toBe(false);
  expect(partial.prefixLength).toBe(64);
  expect(partial.toString()).toBe('::1234:1234:1234:1234/64');
  expect(Array.from(partial.mask)).toEqual([
    ...new Array(8).fill(0xff),
    ...new Array(8).fill(0),
  ]);
});

test('treats ipv4-mapped literal as ipv4', () => {
  expect(PartialAddress.parse('::ffff:192.0.2.1/120').is4()).toBe(true);
});

test('re-renders canonical literals unchanged', () => {
  for (const literal of [
    '192.0.2.10/32',
    '0.0.0.0/0',
    '10.1.0.0/16',
    '2001:db8::/48',
    '::1/128',
  ]) {
    expect(PartialAddress.parse(literal).toString()).toBe(literal);
  }
});

test('keeps an ipv4-mapped literal in ipv6 form', () => {
  const partial = PartialAddress.parse('::ffff:192.0.2.1/120');

  expect(partial.is4()).toBe(true);

  const rendered = partial.toString();

  expect(rendered).toMatch(/^::ffff:[0-9a-f.:]+\/120$/);

  const reparsed = PartialAddress.parse(rendered);

  expect(reparsed.toString()).toBe(rendered);
  expect(reparsed.prefixLength).toBe(120);
  expect(reparsed.is4()).toBe(true);
  expect(reparsed.merge(bytes('198.51.100.7'))).toEqual(
    partial.merge(bytes('198.51.100.7')),
  );
});

test('is not changed through its byte views', () => {
  const partial = PartialAddress.parse('0.0.0.9/24');

  const mask = partial.mask;
  mask[15] = 0xff;

  const baseBits = partial.baseBits;
  baseBits[15] = 0;

  expect(partial.mask[15]).toBe(0);
  expect(partial.baseBits[15]).toBe(9);
  expect(partial.toString()).toBe('0.0.0.9/24');
  expect(formatAddress(partial.merge(bytes('1.2.3.4')))).toBe('1.2.3.9');
});

test('rejects invalid cidr literals', () => {
  for (const literal of [
    '1.2.3.4',
    '1.2.3.4/33',
    '1.2.3/24',
    'not-an-address/8',
    '::1/129',
    '',
  ]) {
    expect(() => PartialAddress.parse(literal)).toThrow(ParseError);
  }
});

test('merges ipv4 address keeping masked bits of discovered address', () => {
  const merged = mergeAddress(
    bytes('1.2.3.4'),
    PartialAddress.parse('0.0.0.9/24'),
  );

  expect(formatAddress(merged)).toBe('1.2.3.9');
});

test('merges ipv6 prefix with interface identifier', () => {
  const merged = PartialAddress.parse('::1234:1234:1234:1234/64').merge(
    bytes('2001:470:1f0e:83f::'),
  );

  expect(formatAddress(merged)).toBe('2001:470:1f0e:83f:1234:1234:1234:1234');
});

test('merges /32 and /0 partial addresses', () => {
  expect(
    formatAddress(PartialAddress.parse('0.0.0.0/32').merge(bytes('198.51.100.7'))),
  ).toBe('198.51.100.7');

  expect(
    formatAddress(PartialAddress.parse('192.0.2.10/0').merge(bytes('198.51.100.7'))),
  ).toBe('192.0.2.10');
});

test('merge is pure', () => {
  const discovered = bytes('1.2.3.4');
  const partial = PartialAddress.parse('0.0.0.9/24');

  const first = mergeAddress(discovered, partial);
  const second = mergeAddress(discovered, partial);

  expect(Array.from(first)).toEqual(Array.from(second));
  expect(first).not.toBe(second);
  expect(formatAddress(discovered)).toBe('1.2.3.4');
  expect(partial.toString()).toBe('0.0.0.9/24');
});

test('refuses to merge without discovered address', () => {
  const partial = PartialAddress.parse('0.0.0.9/24');

  expect(() => partial.merge(undefined)).toThrow(ResolutionError);
  expect(() => mergeAddress(undefined, partial)).toThrow(
    'No discovered address to merge with 0.0.0.9/24.',
  );
});
