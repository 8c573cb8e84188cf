import type {FinalAddress} from '../address/index.js';

export type UpsertResult = 'updated' | 'unchanged';

/**
 * A cloud DNS record API. One call per address, calls may run concurrently
 * against the same provider instance.
 */
export type IDNSRecordProvider = {
  readonly name: string;

  upsert(address: FinalAddress, zone: string): Promise<UpsertResult>;
};
