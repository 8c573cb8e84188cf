import * as x from 'x-value';

import type {IDNSRecordProvider} from '../provider.js';

import {
  AliCloudDNSRecordProvider,
  AliCloudProviderOptions,
} from './alicloud-provider.js';
import {AzureDNSRecordProvider, AzureProviderOptions} from './azure-provider.js';
import {
  CloudflareDNSRecordProvider,
  CloudflareProviderOptions,
} from './cloudflare-provider.js';

export const ProviderOptions = x.union([
  AzureProviderOptions,
  CloudflareProviderOptions,
  AliCloudProviderOptions,
]);

export type ProviderOptions = x.TypeOf<typeof ProviderOptions>;

export function createDNSRecordProvider(
  options: ProviderOptions,
): IDNSRecordProvider {
  switch (options.type) {
    case 'azure':
      return new AzureDNSRecordProvider(options);
    case 'cloudflare':
      return new CloudflareDNSRecordProvider(options);
    case 'alicloud':
      return new AliCloudDNSRecordProvider(options);
  }
}

export * from './alicloud-provider.js';
export * from './azure-provider.js';
export * from './cloudflare-provider.js';
