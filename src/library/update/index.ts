import * as x from 'x-value';

import {Logs} from '../@log/index.js';

import {ConcurrentProviderUpdater} from './concurrent-updater.js';
import type {IUpdateDispatcher} from './dispatcher.js';
import {ProviderOptions, createDNSRecordProvider} from './providers/index.js';
import {RFC2136Options, createRFC2136Updater} from './rfc2136/index.js';

export const UpdaterOptions = x.union([RFC2136Options, ProviderOptions]);

export type UpdaterOptions = x.TypeOf<typeof UpdaterOptions>;

export function createUpdateDispatcher(
  options: UpdaterOptions,
  logs: Logs = Logs,
): IUpdateDispatcher {
  switch (options.type) {
    case 'rfc2136':
      return createRFC2136Updater(options, logs);
    default:
      return new ConcurrentProviderUpdater(createDNSRecordProvider(options), {
        logs,
      });
  }
}

export * from './concurrent-updater.js';
export * from './dispatcher.js';
export * from './provider.js';
export * from './providers/index.js';
export * from './rfc2136/index.js';
