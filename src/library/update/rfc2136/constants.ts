export const DNS_PORT = 53;

/**
 * Largest message sent over UDP without EDNS.
 */
export const MAX_UDP_MESSAGE_SIZE = 512;

export const HEADER_SIZE = 12;

/**
 * Offset of ARCOUNT in the header.
 */
export const ADDITIONAL_COUNT_OFFSET = 10;

export const Opcode = {
  QUERY: 0,
  UPDATE: 5,
} as const;

export const TSIG_RECORD_TYPE = 250;

export const ANY_RECORD_CLASS = 255;

export const RCODE_NAMES: Record<number, string> = {
  0: 'NOERROR',
  1: 'FORMERR',
  2: 'SERVFAIL',
  3: 'NXDOMAIN',
  4: 'NOTIMP',
  5: 'REFUSED',
  6: 'YXDOMAIN',
  7: 'YXRRSET',
  8: 'NXRRSET',
  9: 'NOTAUTH',
  10: 'NOTZONE',
  16: 'BADSIG',
  17: 'BADKEY',
  18: 'BADTIME',
  22: 'BADTRUNC',
};

export function rcodeToString(rcode: number): string {
  return RCODE_NAMES[rcode] ?? `RCODE${rcode}`;
}
