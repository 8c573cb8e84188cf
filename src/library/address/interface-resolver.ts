import type {NetworkInterfaceInfo} from 'os';
import * as OS from 'os';

import type {IPv4, IPv6} from 'ipaddr.js';
import ipaddr from 'ipaddr.js';

import {
  Logs,
  RESOLVER_INTERFACE_NOT_FOUND,
  RESOLVER_IPV4_ADDRESS,
  RESOLVER_IPV6_PREFIX,
  RESOLVER_SKIPPED_ADDRESS,
} from '../@log/index.js';

import {
  createMask,
  formatAddress,
  maskAddress,
  toAddressBytes,
  unwrapAddress,
} from './bytes.js';

/**
 * Ranges that are not global unicast. Private and unique local ranges are
 * global unicast in this sense.
 */
const NON_GLOBAL_UNICAST_RANGES = new Set([
  'unspecified',
  'broadcast',
  'loopback',
  'linkLocal',
  'multicast',
]);

export type NetworkInterfaceMap = NodeJS.Dict<NetworkInterfaceInfo[]>;

export type InterfaceNames = {
  /**
   * Interface to take the IPv4 address from, e.g. "eth0".
   */
  ipv4Interface: string;
  /**
   * Interface to take the IPv6 network prefix from, e.g. "br0".
   */
  ipv6Interface: string;
};

export type DiscoveredAddresses = InterfaceNames & {
  /**
   * 16-byte IPv4-mapped form.
   */
  ipv4?: Uint8Array;
  /**
   * 16-byte form, already masked to the prefix length of the interface.
   */
  ipv6Prefix?: Uint8Array;
};

export type InterfaceResolverOptions = {
  interfaces?: NetworkInterfaceMap;
  logs?: Logs;
};

type UnicastAddress = {
  address: IPv4 | IPv6;
  prefixLength: number;
};

export function resolveInterfaceAddresses(
  names: InterfaceNames,
  {interfaces = OS.networkInterfaces(), logs = Logs}: InterfaceResolverOptions = {},
): DiscoveredAddresses {
  let {ipv4Interface, ipv6Interface} = names;

  let chooseUnicast = (name: string): UnicastAddress[] => {
    let infos = interfaces[name];

    if (!infos) {
      logs.warn('resolver', RESOLVER_INTERFACE_NOT_FOUND(name));
      return [];
    }

    return chooseUnicastAddresses(infos, logs);
  };

  let ipv4 = chooseIPv4(chooseUnicast(ipv4Interface));
  let ipv6Prefix = chooseIPv6Prefix(chooseUnicast(ipv6Interface));

  logs.info(
    'resolver',
    RESOLVER_IPV4_ADDRESS(ipv4 && formatAddress(ipv4)),
  );
  logs.info(
    'resolver',
    RESOLVER_IPV6_PREFIX(ipv6Prefix && formatAddress(ipv6Prefix)),
  );

  return {...names, ipv4, ipv6Prefix};
}

export function isGlobalUnicast(address: IPv4 | IPv6): boolean {
  return !NON_GLOBAL_UNICAST_RANGES.has(unwrapAddress(address).range());
}

function chooseUnicastAddresses(
  infos: NetworkInterfaceInfo[],
  logs: Logs,
): UnicastAddress[] {
  let addresses: UnicastAddress[] = [];

  for (const info of infos) {
    let address: IPv4 | IPv6;
    let prefixLength: number | null;

    try {
      address = ipaddr.parse(info.address);
      prefixLength = ipaddr.parse(info.netmask).prefixLengthFromSubnetMask();
    } catch {
      logs.debug(
        'resolver',
        RESOLVER_SKIPPED_ADDRESS(info.address, 'unparseable'),
      );
      continue;
    }

    if (prefixLength === null) {
      logs.debug(
        'resolver',
        RESOLVER_SKIPPED_ADDRESS(info.address, `netmask ${info.netmask}`),
      );
      continue;
    }

    if (!isGlobalUnicast(address)) {
      logs.debug(
        'resolver',
        RESOLVER_SKIPPED_ADDRESS(info.address, 'not global unicast'),
      );
      continue;
    }

    addresses.push({address, prefixLength});
  }

  return addresses;
}

function chooseIPv4(addresses: UnicastAddress[]): Uint8Array | undefined {
  for (const {address} of addresses) {
    let unwrapped = unwrapAddress(address);

    if (unwrapped instanceof ipaddr.IPv4) {
      return toAddressBytes(unwrapped);
    }
  }

  return undefined;
}

function chooseIPv6Prefix(addresses: UnicastAddress[]): Uint8Array | undefined {
  for (const {address, prefixLength} of addresses) {
    if (unwrapAddress(address) instanceof ipaddr.IPv6) {
      return maskAddress(toAddressBytes(address), createMask(prefixLength, false));
    }
  }

  return undefined;
}
