import type {IPv4, IPv6} from 'ipaddr.js';
import ipaddr from 'ipaddr.js';

/**
 * Addresses are handled in their 16-byte form, IPv4 as IPv4-mapped IPv6
 * (`::ffff:a.b.c.d`), so both families compose the same way.
 */
export const ADDRESS_LENGTH = 16;

const IPV4_MAPPED_PREFIX = [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff];

export function toAddressBytes(address: IPv4 | IPv6): Uint8Array {
  let ipv6 =
    address instanceof ipaddr.IPv4 ? address.toIPv4MappedAddress() : address;

  return Uint8Array.from(ipv6.toByteArray());
}

export function isIPv4Bytes(bytes: Uint8Array): boolean {
  return (
    bytes.length === ADDRESS_LENGTH &&
    IPV4_MAPPED_PREFIX.every((byte, index) => bytes[index] === byte)
  );
}

/**
 * Reduces an IPv4-mapped IPv6 address to IPv4, leaves anything else as is.
 */
export function unwrapAddress(address: IPv4 | IPv6): IPv4 | IPv6 {
  return address instanceof ipaddr.IPv6 && address.isIPv4MappedAddress()
    ? address.toIPv4Address()
    : address;
}

export function formatAddress(bytes: Uint8Array): string {
  if (bytes.length !== ADDRESS_LENGTH) {
    throw new TypeError(`Expected ${ADDRESS_LENGTH} address bytes.`);
  }

  return unwrapAddress(ipaddr.fromByteArray(Array.from(bytes))).toString();
}

/**
 * Creates a 16-byte mask with `prefixLength` leading one bits. An IPv4
 * prefix length is counted from the mapped IPv4 part, the 96 leading bits
 * are always set for it.
 */
export function createMask(prefixLength: number, ipv4: boolean): Uint8Array {
  let bits = ipv4 ? 96 + prefixLength : prefixLength;

  if (!Number.isInteger(prefixLength) || bits < 0 || bits > 128) {
    throw new RangeError(`Invalid prefix length ${prefixLength}.`);
  }

  let mask = new Uint8Array(ADDRESS_LENGTH);

  for (let index = 0; index < ADDRESS_LENGTH; index++) {
    let remaining = bits - index * 8;

    mask[index] =
      remaining >= 8 ? 0xff : remaining > 0 ? (0xff << (8 - remaining)) & 0xff : 0;
  }

  return mask;
}

export function maskAddress(bytes: Uint8Array, mask: Uint8Array): Uint8Array {
  return bytes.map((byte, index) => byte & mask[index]);
}
