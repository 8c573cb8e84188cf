import type {FinalAddress} from '../address/index.js';

/**
 * Complete set of record changes for one run.
 */
export type UpdateBatch = {
  zone: string;
  ttl: number;
  addresses: FinalAddress[];
};

export type UpdateFailure = {
  address: FinalAddress;
  error: unknown;
};

export type UpdateOutcome = {
  succeeded: FinalAddress[];
  failed: UpdateFailure[];
};

export type IUpdateDispatcher = {
  readonly name: string;

  /**
   * Resolves once the whole batch has been delivered. Rejects only on
   * errors fatal to the whole batch.
   */
  submit(batch: UpdateBatch): Promise<UpdateOutcome>;
};
