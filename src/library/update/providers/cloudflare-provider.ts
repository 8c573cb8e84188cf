import type {DnsRecord} from 'cloudflare';
import Cloudflare from 'cloudflare';
import * as x from 'x-value';

import type {FinalAddress} from '../../address/index.js';
import type {IDNSRecordProvider, UpsertResult} from '../provider.js';

export const CloudflareProviderOptions = x.object({
  type: x.literal('cloudflare'),
  /**
   * API token.
   */
  token: x.string,
  /**
   * Zone ID.
   */
  zone: x.string,
});

export type CloudflareProviderOptions = x.TypeOf<
  typeof CloudflareProviderOptions
>;

const DNSRecordsBrowseResponse = x.object({
  result: x
    .array(
      x.object({
        id: x.string,
        type: x.string,
        name: x.string,
        content: x.string,
        ttl: x.number,
      }),
    )
    .optional(),
});

export class CloudflareDNSRecordProvider implements IDNSRecordProvider {
  readonly name = 'cloudflare';

  private cloudflare: Cloudflare;

  private zoneId: string;

  constructor({token, zone: zoneId}: CloudflareProviderOptions) {
    this.cloudflare = new Cloudflare({
      token,
    });

    this.zoneId = zoneId;
  }

  async upsert({
    fqdn,
    type,
    ip,
    ttl,
  }: FinalAddress): Promise<UpsertResult> {
    const DNSRecords = this.cloudflare.dnsRecords;

    let zoneId = this.zoneId;

    // The client sends the data of a GET request as its query string.
    let browse: (
      zoneId: string,
      query: {type: string; name: string},
    ) => Promise<unknown> = DNSRecords.browse.bind(DNSRecords);

    let {result = []} = DNSRecordsBrowseResponse.satisfies(
      await browse(zoneId, {type, name: fqdn}),
    );

    let existingRecord = result.find(
      record =>
        record.type === type && record.name.toLowerCase() === fqdn.toLowerCase(),
    );

    if (
      existingRecord &&
      existingRecord.content === ip &&
      existingRecord.ttl === ttl
    ) {
      return 'unchanged';
    }

    let record: DnsRecord = {
      type,
      name: fqdn,
      content: ip,
      ttl,
    };

    if (existingRecord) {
      await DNSRecords.edit(zoneId, existingRecord.id, record);
    } else {
      await DNSRecords.add(zoneId, record);
    }

    return 'updated';
  }
}
