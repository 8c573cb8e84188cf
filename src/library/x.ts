import ms from 'ms';
import * as x from 'x-value';

import {PartialAddress} from './address/index.js';

/**
 * Positive duration accepted by `ms`, e.g. "10s".
 */
export const Duration = x.string.refined<'duration'>(value => {
  let duration = ms(value);

  if (!Number.isFinite(duration) || duration <= 0) {
    throw new TypeError(`Invalid duration "${value}"`);
  }

  return value;
});

export type Duration = x.TypeOf<typeof Duration>;

export const CIDRLiteral = x.string.refined<'cidr literal'>(value => {
  PartialAddress.parse(value);
  return value;
});

export type CIDRLiteral = x.TypeOf<typeof CIDRLiteral>;

export const TTL = x.integerRange<'ttl'>({min: 0, max: 0x7fffffff});

export type TTL = x.TypeOf<typeof TTL>;
