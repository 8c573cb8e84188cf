/**
 * Invalid or missing configuration.
 */
export class ConfigError extends Error {
  override readonly name: string = 'ConfigError';
}

/**
 * A configuration literal (e.g. a partial address) that cannot be parsed.
 */
export class ParseError extends ConfigError {
  override readonly name: string = 'ParseError';

  constructor(
    message: string,
    readonly literal: string,
  ) {
    super(message);
  }
}

/**
 * A base address required by a host was not found on its interface.
 */
export class ResolutionError extends Error {
  override readonly name: string = 'ResolutionError';
}

/**
 * The exchange with the authoritative server failed or was refused.
 */
export class TransportError extends Error {
  override readonly name: string = 'TransportError';

  constructor(
    message: string,
    readonly reply?: Buffer,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * A single provider upsert failed. Never fatal to sibling hosts.
 */
export class ProviderAPIError extends Error {
  override readonly name: string = 'ProviderAPIError';

  constructor(
    readonly provider: string,
    readonly host: string,
    options?: ErrorOptions,
  ) {
    super(`${provider} upsert for ${host} failed`, options);
  }
}
