import {DnsManagementClient} from '@azure/arm-dns';
import type {RecordSet} from '@azure/arm-dns';
import {ClientSecretCredential} from '@azure/identity';
import * as x from 'x-value';

import type {FinalAddress} from '../../address/index.js';
import {trimTrailingDot} from '../../@utils/index.js';
import type {IDNSRecordProvider, UpsertResult} from '../provider.js';

export const AzureProviderOptions = x.object({
  type: x.literal('azure'),
  clientId: x.string,
  clientSecret: x.string,
  tenantId: x.string,
  subscriptionId: x.string,
  resourceGroup: x.string,
});

export type AzureProviderOptions = x.TypeOf<typeof AzureProviderOptions>;

export class AzureDNSRecordProvider implements IDNSRecordProvider {
  readonly name = 'azure';

  private client: DnsManagementClient;

  private resourceGroup: string;

  constructor({
    clientId,
    clientSecret,
    tenantId,
    subscriptionId,
    resourceGroup,
  }: AzureProviderOptions) {
    this.client = new DnsManagementClient(
      new ClientSecretCredential(tenantId, clientId, clientSecret),
      subscriptionId,
    );

    this.resourceGroup = resourceGroup;
  }

  async upsert(
    {relativeName, type, ip, ttl}: FinalAddress,
    zone: string,
  ): Promise<UpsertResult> {
    let recordSet: RecordSet =
      type === 'A'
        ? {ttl, aRecords: [{ipv4Address: ip}]}
        : {ttl, aaaaRecords: [{ipv6Address: ip}]};

    await this.client.recordSets.createOrUpdate(
      this.resourceGroup,
      trimTrailingDot(zone),
      relativeName,
      type,
      recordSet,
    );

    return 'updated';
  }
}
