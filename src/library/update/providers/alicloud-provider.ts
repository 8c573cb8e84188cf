import {
  AddDomainRecordRequest,
  default as AliCloudDNSClient,
  DescribeDomainRecordsRequest,
  UpdateDomainRecordRequest,
} from '@alicloud/alidns20150109';
import * as AliCloudOpenAPIClient from '@alicloud/openapi-client';
import * as x from 'x-value';

import type {FinalAddress} from '../../address/index.js';
import {trimTrailingDot} from '../../@utils/index.js';
import type {IDNSRecordProvider, UpsertResult} from '../provider.js';

const ENDPOINT_DEFAULT = 'alidns.cn-shenzhen.aliyuncs.com';

export const AliCloudProviderOptions = x.object({
  type: x.literal('alicloud'),
  endpoint: x.string.optional(),
  accessKeyId: x.string,
  accessKeySecret: x.string,
});

export type AliCloudProviderOptions = x.TypeOf<typeof AliCloudProviderOptions>;

export class AliCloudDNSRecordProvider implements IDNSRecordProvider {
  readonly name = 'alicloud';

  private client: AliCloudDNSClient.default;

  constructor({
    accessKeyId,
    accessKeySecret,
    endpoint = ENDPOINT_DEFAULT,
  }: AliCloudProviderOptions) {
    let config = new AliCloudOpenAPIClient.Config({
      accessKeyId,
      accessKeySecret,
    });

    config.endpoint = endpoint;

    this.client = new AliCloudDNSClient.default(config);
  }

  async upsert(
    {relativeName, type, ip, ttl}: FinalAddress,
    zone: string,
  ): Promise<UpsertResult> {
    let client = this.client;

    let domain = trimTrailingDot(zone);

    let existingRecord = (
      await client.describeDomainRecords(
        new DescribeDomainRecordsRequest({
          domainName: domain,
          keyWord: relativeName,
          searchMode: 'exact',
          type,
        }),
      )
    ).body?.domainRecords?.record?.find(
      record => record.type === type && record.RR === relativeName,
    );

    if (
      existingRecord &&
      existingRecord.value === ip &&
      existingRecord.TTL === ttl
    ) {
      return 'unchanged';
    }

    let recordPartial = {
      RR: relativeName,
      type,
      value: ip,
      TTL: ttl,
    };

    if (existingRecord) {
      await client.updateDomainRecord(
        new UpdateDomainRecordRequest({
          recordId: existingRecord.recordId,
          ...recordPartial,
        }),
      );
    } else {
      await client.addDomainRecord(
        new AddDomainRecordRequest({
          domainName: domain,
          ...recordPartial,
        }),
      );
    }

    return 'updated';
  }
}
