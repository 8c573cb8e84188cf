import {Logs} from './@log/index.js';
import type {InterfaceNames, NetworkInterfaceMap} from './address/index.js';
import {
  composeFinalAddresses,
  resolveInterfaceAddresses,
} from './address/index.js';
import type {ResolvedConfig} from './config.js';
import type {IUpdateDispatcher, UpdateOutcome} from './update/index.js';
import {createUpdateDispatcher} from './update/index.js';

export type RunOptions = InterfaceNames & {
  config: ResolvedConfig;
  logs?: Logs;
  /**
   * Defaults to the live interfaces of the host.
   */
  interfaces?: NetworkInterfaceMap;
  /**
   * Defaults to the updater described by the configuration.
   */
  dispatcher?: IUpdateDispatcher;
};

/**
 * Resolves interface addresses, merges them into the configured hosts and
 * submits the result. Rejects on errors fatal to the run; per host provider
 * failures are only reported in the outcome.
 */
export async function run({
  config,
  ipv4Interface,
  ipv6Interface,
  logs = Logs,
  interfaces,
  dispatcher,
}: RunOptions): Promise<UpdateOutcome> {
  let discovered = resolveInterfaceAddresses(
    {ipv4Interface, ipv6Interface},
    {interfaces, logs},
  );

  let addresses = composeFinalAddresses(config, discovered, logs);

  dispatcher ??= createUpdateDispatcher(config.updater, logs);

  return dispatcher.submit({zone: config.zone, ttl: config.ttl, addresses});
}
