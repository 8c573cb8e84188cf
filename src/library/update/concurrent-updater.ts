import {
  HOST_ERROR_UPDATING,
  HOST_UNCHANGED,
  HOST_UPDATED,
  Logs,
  PROVIDER_BATCH_COMPLETED,
  PROVIDER_FAILED_HOSTS,
  PROVIDER_SUBMITTING,
} from '../@log/index.js';
import type {FinalAddress} from '../address/index.js';
import {ProviderAPIError} from '../errors.js';

import type {
  IUpdateDispatcher,
  UpdateBatch,
  UpdateFailure,
  UpdateOutcome,
} from './dispatcher.js';
import type {IDNSRecordProvider} from './provider.js';

export type ConcurrentProviderUpdaterOptions = {
  logs?: Logs;
};

type TaskResult =
  | {address: FinalAddress; error?: undefined}
  | {address: FinalAddress; error: ProviderAPIError};

/**
 * Submits one upsert per address, all at once, and resolves after every one
 * of them has settled. A failing host is logged and reported in the outcome,
 * it never rejects the batch.
 */
export class ConcurrentProviderUpdater implements IUpdateDispatcher {
  private logs: Logs;

  constructor(
    readonly provider: IDNSRecordProvider,
    {logs = Logs}: ConcurrentProviderUpdaterOptions = {},
  ) {
    this.logs = logs;
  }

  get name(): string {
    return this.provider.name;
  }

  async submit({zone, addresses}: UpdateBatch): Promise<UpdateOutcome> {
    let logs = this.logs;

    logs.info('provider', PROVIDER_SUBMITTING(this.name, addresses.length));

    let results = await Promise.all(
      addresses.map(address => this.upsert(address, zone)),
    );

    let succeeded: FinalAddress[] = [];
    let failed: UpdateFailure[] = [];

    for (const {address, error} of results) {
      if (error) {
        failed.push({address, error});
      } else {
        succeeded.push(address);
      }
    }

    logs.info(
      'provider',
      PROVIDER_BATCH_COMPLETED(succeeded.length, failed.length),
    );

    if (failed.length > 0) {
      logs.warn(
        'provider',
        PROVIDER_FAILED_HOSTS(failed.map(({address}) => address.host)),
      );
    }

    return {succeeded, failed};
  }

  private async upsert(
    address: FinalAddress,
    zone: string,
  ): Promise<TaskResult> {
    let provider = this.provider;
    let logs = this.logs;

    let context = {
      type: 'host',
      host: address.host,
      provider: provider.name,
    } as const;

    try {
      let result = await provider.upsert(address, zone);

      logs.info(context, result === 'unchanged' ? HOST_UNCHANGED : HOST_UPDATED);

      return {address};
    } catch (error) {
      logs.error(context, HOST_ERROR_UPDATING(address.host, error));
      logs.debug('provider', error);

      return {
        address,
        error: new ProviderAPIError(provider.name, address.host, {
          cause: error,
        }),
      };
    }
  }
}
