#!/usr/bin/env node

import {Command} from 'commander';

import type {LogFile} from '../library/index.js';
import {
  CONFIG_LOADED,
  Logs,
  PROVIDER_FAILED_HOSTS,
  RUN_FATAL,
  loadConfig,
  openLogFile,
  run,
} from '../library/index.js';

import {IPV4_INTERFACE_DEFAULT, IPV6_INTERFACE_DEFAULT} from './@constants.js';

type CLIOptions = {
  ipv4Interface: string;
  ipv6Interface: string;
  config?: string;
  log?: string;
  strict?: boolean;
};

const program = new Command()
  .name('prefix-ddns')
  .description(
    'Publish interface addresses merged with partial host addresses to DNS.',
  )
  .option(
    '-4, --ipv4-interface <name>',
    'interface to take the ipv4 address from',
    IPV4_INTERFACE_DEFAULT,
  )
  .option(
    '-6, --ipv6-interface <name>',
    'interface to take the ipv6 prefix from',
    IPV6_INTERFACE_DEFAULT,
  )
  .option('-c, --config <path>', 'configuration file (yaml)')
  .option('--log <path>', 'append log lines to this file instead of stdio')
  .option('--strict', 'exit with 1 when any provider host update failed')
  .parse();

const options = program.opts<CLIOptions>();

let logFile: LogFile | undefined;
let logs = Logs;

try {
  if (options.log !== undefined) {
    logFile = await openLogFile(options.log);
    logs = logFile.logs;
  }

  let {config, path} = await loadConfig(options.config);

  logs.info('config', CONFIG_LOADED(path));

  let {failed} = await run({
    config,
    ipv4Interface: options.ipv4Interface,
    ipv6Interface: options.ipv6Interface,
    logs,
  });

  if (failed.length > 0 && options.strict) {
    logs.error(
      'run',
      PROVIDER_FAILED_HOSTS(failed.map(({address}) => address.host)),
    );
    process.exitCode = 1;
  }
} catch (error) {
  logs.error('run', RUN_FATAL(error));
  logs.debug('run', error);

  if (logs !== Logs) {
    // eslint-disable-next-line no-console
    console.error(RUN_FATAL(error));
  }

  process.exitCode = 1;
}

try {
  await logFile?.close();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(RUN_FATAL(error));
  process.exitCode = 1;
}
