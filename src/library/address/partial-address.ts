import type {IPv4, IPv6} from 'ipaddr.js';
import ipaddr from 'ipaddr.js';

import {ParseError, ResolutionError} from '../errors.js';

import {
  ADDRESS_LENGTH,
  createMask,
  formatAddress,
  isIPv4Bytes,
  toAddressBytes,
} from './bytes.js';

/**
 * A CIDR-shaped template from the configuration. Where the mask is set the
 * discovered interface address is kept, the base bits are OR-ed over it.
 *
 * - `0.0.0.9/24` keeps the first three octets of the discovered IPv4 address
 *   and sets the last one to 9.
 * - `::1234:1234:1234:1234/64` keeps the discovered /64 prefix and sets the
 *   interface identifier.
 * - `192.0.2.10/0` ignores the discovered address entirely.
 */
export class PartialAddress {
  private constructor(
    private _baseBits: Uint8Array,
    private _mask: Uint8Array,
    readonly prefixLength: number,
    /**
     * Written as IPv6, possibly IPv4-mapped (`::ffff:192.0.2.1/120`).
     */
    private ipv6Literal: boolean,
  ) {}

  get baseBits(): Uint8Array {
    return this._baseBits.slice();
  }

  get mask(): Uint8Array {
    return this._mask.slice();
  }

  is4(): boolean {
    return isIPv4Bytes(this._baseBits);
  }

  merge(discovered: Uint8Array | undefined): Uint8Array {
    return mergeAddress(discovered, this);
  }

  toString(): string {
    let address = this.ipv6Literal
      ? ipaddr.fromByteArray(Array.from(this._baseBits)).toString()
      : formatAddress(this._baseBits);

    return `${address}/${this.prefixLength}`;
  }

  static parse(literal: string): PartialAddress {
    let address: IPv4 | IPv6;
    let prefixLength: number;

    try {
      [address, prefixLength] = ipaddr.parseCIDR(literal);
    } catch {
      throw new ParseError(`Invalid CIDR literal "${literal}".`, literal);
    }

    if (
      address instanceof ipaddr.IPv4 &&
      !ipaddr.IPv4.isValidFourPartDecimal(literal.slice(0, literal.indexOf('/')))
    ) {
      throw new ParseError(
        `Invalid CIDR literal "${literal}", expecting a dotted IPv4 address.`,
        literal,
      );
    }

    let ipv4 = address instanceof ipaddr.IPv4;

    return new PartialAddress(
      toAddressBytes(address),
      createMask(prefixLength, ipv4),
      prefixLength,
      !ipv4,
    );
  }
}

export function mergeAddress(
  discovered: Uint8Array | undefined,
  partial: PartialAddress,
): Uint8Array {
  if (!discovered) {
    throw new ResolutionError(
      `No discovered address to merge with ${partial.toString()}.`,
    );
  }

  if (discovered.length !== ADDRESS_LENGTH) {
    throw new TypeError(`Expected ${ADDRESS_LENGTH} address bytes.`);
  }

  let {baseBits, mask} = partial;

  return discovered.map((byte, index) => (byte & mask[index]) | baseBits[index]);
}
