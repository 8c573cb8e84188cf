import {HOST_UPDATING, Logs} from '../@log/index.js';
import {trimTrailingDot} from '../@utils/index.js';
import {ResolutionError} from '../errors.js';

import {formatAddress} from './bytes.js';
import type {DiscoveredAddresses} from './interface-resolver.js';
import type {PartialAddress} from './partial-address.js';

export const APEX_HOST = '@';

export type AddressRecordType = 'A' | 'AAAA';

export type FinalAddress = {
  /**
   * Host as written in the configuration.
   */
  host: string;
  /**
   * Absolute name without the trailing dot, e.g. "nas.example.com".
   */
  fqdn: string;
  /**
   * Name relative to the zone, "@" for the apex.
   */
  relativeName: string;
  type: AddressRecordType;
  /**
   * 16-byte form.
   */
  address: Uint8Array;
  ip: string;
  ttl: number;
};

export type HostsOptions = {
  zone: string;
  ttl: number;
  hosts: Map<string, PartialAddress>;
};

export function composeFinalAddresses(
  {zone, ttl, hosts}: HostsOptions,
  discovered: DiscoveredAddresses,
  logs: Logs = Logs,
): FinalAddress[] {
  let finalAddresses: FinalAddress[] = [];

  for (const [host, partial] of hosts) {
    let ipv4 = partial.is4();

    let base = ipv4 ? discovered.ipv4 : discovered.ipv6Prefix;

    if (!base) {
      throw new ResolutionError(
        ipv4
          ? `No global unicast IPv4 address found on ${discovered.ipv4Interface}, required by host "${host}".`
          : `No global unicast IPv6 prefix found on ${discovered.ipv6Interface}, required by host "${host}".`,
      );
    }

    let address = partial.merge(base);
    let ip = formatAddress(address);

    logs.info('run', HOST_UPDATING(host, ipv4 ? 4 : 6, ip));

    finalAddresses.push({
      host,
      ...qualifyHostName(host, zone),
      type: ipv4 ? 'A' : 'AAAA',
      address,
      ip,
      ttl,
    });
  }

  return finalAddresses;
}

export function qualifyHostName(
  host: string,
  zone: string,
): Pick<FinalAddress, 'fqdn' | 'relativeName'> {
  zone = trimTrailingDot(zone);

  if (host === APEX_HOST) {
    return {fqdn: zone, relativeName: APEX_HOST};
  }

  if (!host.endsWith('.')) {
    return {fqdn: `${host}.${zone}`, relativeName: host};
  }

  let fqdn = trimTrailingDot(host);

  let lowerFQDN = fqdn.toLowerCase();
  let lowerZone = zone.toLowerCase();

  let relativeName: string;

  if (lowerFQDN === lowerZone) {
    relativeName = APEX_HOST;
  } else if (lowerFQDN.endsWith(`.${lowerZone}`)) {
    relativeName = fqdn.slice(0, -zone.length - 1);
  } else {
    relativeName = fqdn;
  }

  return {fqdn, relativeName};
}
