import {cosmiconfig} from 'cosmiconfig';
import * as x from 'x-value';

import {PartialAddress} from './address/index.js';
import {ConfigError} from './errors.js';
import {UpdaterOptions} from './update/index.js';
import {CIDRLiteral, TTL} from './x.js';

export const CONFIG_MODULE_NAME = 'prefix-ddns';

export const CONFIG_SEARCH_PLACES = [
  `${CONFIG_MODULE_NAME}.yml`,
  `${CONFIG_MODULE_NAME}.yaml`,
  `.${CONFIG_MODULE_NAME}rc`,
  `.${CONFIG_MODULE_NAME}rc.yml`,
  `.${CONFIG_MODULE_NAME}rc.yaml`,
  `.${CONFIG_MODULE_NAME}rc.json`,
];

const TTL_DEFAULT = TTL.nominalize(300);

export const Config = x.object({
  /**
   * Zone name, e.g. "example.com".
   */
  zone: x.string,
  ttl: TTL.optional(),
  /**
   * Host name (relative to the zone, "@", or absolute with a trailing dot)
   * to partial address.
   */
  hosts: x.record(x.string, CIDRLiteral),
  updater: UpdaterOptions,
});

export type Config = x.TypeOf<typeof Config>;

export type ResolvedConfig = {
  zone: string;
  ttl: number;
  hosts: Map<string, PartialAddress>;
  updater: UpdaterOptions;
};

export function resolveConfig(raw: unknown): ResolvedConfig {
  let config: Config;

  try {
    config = Config.satisfies(raw);
  } catch (error) {
    throw new ConfigError(
      `Invalid configuration: ${error instanceof Error ? error.message : String(error)}`,
      {cause: error},
    );
  }

  let {zone, ttl = TTL_DEFAULT, hosts, updater} = config;

  return {
    zone,
    ttl,
    hosts: new Map(
      Object.entries(hosts).map(([host, literal]) => [
        host,
        PartialAddress.parse(literal),
      ]),
    ),
    updater,
  };
}

export type LoadedConfig = {
  config: ResolvedConfig;
  path: string;
};

export async function loadConfig(path?: string): Promise<LoadedConfig> {
  let explorer = cosmiconfig(CONFIG_MODULE_NAME, {
    searchPlaces: CONFIG_SEARCH_PLACES,
  });

  let result: Awaited<ReturnType<typeof explorer.search>>;

  try {
    result =
      path === undefined ? await explorer.search() : await explorer.load(path);
  } catch (error) {
    throw new ConfigError(
      `Failed to read configuration: ${error instanceof Error ? error.message : String(error)}`,
      {cause: error},
    );
  }

  if (!result || result.isEmpty) {
    throw new ConfigError('Configuration file not found.');
  }

  return {
    config: resolveConfig(result.config),
    path: result.filepath,
  };
}
