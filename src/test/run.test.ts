import type {
  IUpdateDispatcher,
  UpdateBatch,
  UpdateOutcome,
} from '../library/index.js';
import {
  ConcurrentProviderUpdater,
  PartialAddress,
  ResolutionError,
  run,
} from '../library/index.js';
import type {ResolvedConfig} from '../library/index.js';

import {createCapturingLogs, ipv4Info, ipv6Info} from './@utils.js';

const CONFIG: ResolvedConfig = {
  zone: 'example.com',
  ttl: 600,
  hosts: new Map([
    ['router', PartialAddress.parse('0.0.0.0/32')],
    ['nas', PartialAddress.parse('::1234:1234:1234:1234/64')],
  ]),
  updater: {type: 'cloudflare', token: 'test-token', zone: 'test-zone-id'},
};

const INTERFACES = {
  eth0: [ipv4Info('127.0.0.1', '255.0.0.0'), ipv4Info('198.51.100.7')],
  br0: [ipv6Info('fe80::1'), ipv6Info('2001:470:1f0e:83f::1')],
};

class RecordingDispatcher implements IUpdateDispatcher {
  readonly name = 'recording';

  readonly batches: UpdateBatch[] = [];

  async submit(batch: UpdateBatch): Promise<UpdateOutcome> {
    this.batches.push(batch);
    return {succeeded: batch.addresses, failed: []};
  }
}

test('submits the merged addresses as one batch', async () => {
  const {logs} = createCapturingLogs();
  const dispatcher = new RecordingDispatcher();

  const outcome = await run({
    config: CONFIG,
    ipv4Interface: 'eth0',
    ipv6Interface: 'br0',
    logs,
    interfaces: INTERFACES,
    dispatcher,
  });

  expect(dispatcher.batches).toHaveLength(1);

  const [batch] = dispatcher.batches;

  expect(batch.zone).toBe('example.com');
  expect(batch.ttl).toBe(600);
  expect(
    batch.addresses.map(({fqdn, type, ip, ttl}) => [fqdn, type, ip, ttl]),
  ).toEqual([
    ['router.example.com', 'A', '198.51.100.7', 600],
    ['nas.example.com', 'AAAA', '2001:470:1f0e:83f:1234:1234:1234:1234', 600],
  ]);

  expect(outcome.failed).toEqual([]);
});

test('does not submit when a required address is missing', async () => {
  const {logs} = createCapturingLogs();
  const dispatcher = new RecordingDispatcher();

  await expect(
    run({
      config: CONFIG,
      ipv4Interface: 'eth0',
      ipv6Interface: 'br0',
      logs,
      interfaces: {eth0: INTERFACES.eth0},
      dispatcher,
    }),
  ).rejects.toThrow(ResolutionError);

  expect(dispatcher.batches).toEqual([]);
});

test('resolves with provider failures in the outcome', async () => {
  const {logs} = createCapturingLogs();

  const dispatcher = new ConcurrentProviderUpdater(
    {
      name: 'fake',
      upsert: async address => {
        if (address.host === 'nas') {
          throw new Error('quota exceeded');
        }

        return 'updated';
      },
    },
    {logs},
  );

  const outcome = await run({
    config: CONFIG,
    ipv4Interface: 'eth0',
    ipv6Interface: 'br0',
    logs,
    interfaces: INTERFACES,
    dispatcher,
  });

  expect(outcome.succeeded.map(({host}) => host)).toEqual(['router']);
  expect(outcome.failed.map(({address}) => address.host)).toEqual(['nas']);
});
