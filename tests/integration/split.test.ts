/**
 * Integration tests for complete split runs against an in-memory backend
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { runSplit } from '../../src/core/splitter.js';
import type { SplitEvent, SplitMapping, SplitRequest } from '../../src/core/types.js';
import { LineageMismatchError, ModuleNotFoundError } from '../../src/core/errors.js';
import { decodeState, encodeState } from '../../src/state/codec.js';
import {
  InMemoryBackend,
  countInstances,
  instanceAddresses,
  readStateFixture,
} from '../helpers/fake-backend.js';

const SOURCE = '/work/live';
const NETWORK = '/work/network';
const APP = '/work/app';
const EDGE = '/work/edge';
const SOURCE_LINEAGE = '11111111-1111-4111-8111-111111111111';
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function mapping(module: string[], destination: string, prefix: string[] = module): SplitMapping {
  return { module, destination, prefix };
}

function request(mappings: SplitMapping[]): SplitRequest {
  return { source: SOURCE, mappings };
}

function monolithBackend(destinations: Record<string, string> = {}): InMemoryBackend {
  return new InMemoryBackend({ [SOURCE]: readStateFixture('monolith'), ...destinations });
}

function phases(events: SplitEvent[]): string[] {
  return events.flatMap((event) => (event.type === 'phase' ? [event.phase] : []));
}

describe('split run', () => {
  it('should move subtrees into new destinations and shrink the source', async () => {
    const backend = monolithBackend();
    const result = await runSplit(
      request([
        mapping(['module.network'], NETWORK),
        mapping(['module.app'], APP, ['module.service']),
      ]),
      backend
    );

    assert.strictEqual(result.phase, 'applied');
    assert.deepStrictEqual(result.apply?.pushed, [NETWORK, APP, SOURCE]);
    assert.deepStrictEqual(backend.pushedDirectories(), [NETWORK, APP, SOURCE]);

    assert.deepStrictEqual(instanceAddresses(backend.document(NETWORK)), [
      'module.network.aws_vpc.main',
      'module.network.aws_subnet.private[0]',
      'module.network.aws_subnet.private[1]',
      'module.network.module.dns.aws_route53_zone.internal',
    ]);
    assert.deepStrictEqual(instanceAddresses(backend.document(APP)), [
      'module.service.data.aws_ami.base',
      'module.service.aws_instance.web["blue"]',
      'module.service.aws_instance.web["green"]',
    ]);
    assert.deepStrictEqual(instanceAddresses(backend.document(SOURCE)), [
      'aws_s3_bucket.logs',
      'module.networking.aws_eip.nat',
    ]);
  });

  it('should rewrite dependencies inside the moved subtree only', async () => {
    const backend = monolithBackend();
    await runSplit(request([mapping(['module.app'], APP, ['module.service'])]), backend);

    const web = backend.document(APP).resources[1];
    assert.deepStrictEqual(web?.instances[0]?.dependencies, [
      'module.service.data.aws_ami.base',
      'module.network.aws_subnet.private',
    ]);
  });

  it('should stamp serials and lineages per directory', async () => {
    const backend = monolithBackend({ [APP]: '' });
    await runSplit(
      request([mapping(['module.network'], NETWORK), mapping(['module.app'], APP)]),
      backend
    );

    const network = backend.document(NETWORK);
    const app = backend.document(APP);
    const source = backend.document(SOURCE);

    assert.strictEqual(network.serial, 1);
    assert.match(network.lineage, UUID_PATTERN);
    assert.notStrictEqual(network.lineage, SOURCE_LINEAGE);
    assert.notStrictEqual(network.lineage, app.lineage);
    assert.strictEqual(source.serial, 13);
    assert.strictEqual(source.lineage, SOURCE_LINEAGE);
    assert.strictEqual(source.terraformVersion, '1.6.6');
    assert.deepStrictEqual(Object.keys(source.outputs ?? {}), ['vpc_id']);
  });

  it('should keep the lineage of an existing destination', async () => {
    const backend = monolithBackend({ [NETWORK]: readStateFixture('network-existing') });
    const result = await runSplit(request([mapping(['module.network'], NETWORK)]), backend);
    const network = backend.document(NETWORK);

    assert.strictEqual(network.serial, 4);
    assert.strictEqual(network.lineage, '22222222-2222-4222-8222-222222222222');
    assert.strictEqual(result.plan.summary.conflicts, 1);
    assert.ok(
      instanceAddresses(backend.document(SOURCE)).includes('module.network.aws_subnet.private[1]')
    );
  });

  it('should replace colliding instances when overwriting', async () => {
    const backend = monolithBackend({ [NETWORK]: readStateFixture('network-existing') });
    await runSplit(request([mapping(['module.network'], NETWORK)]), backend, { overwrite: true });

    const subnets = backend.document(NETWORK).resources[0];
    assert.strictEqual(subnets?.instances[0]?.attributes?.['id'], 'subnet-1');
    assert.ok(
      !instanceAddresses(backend.document(SOURCE)).some((a) => a.startsWith('module.network.'))
    );
  });

  it('should flatten a subtree into the destination root', async () => {
    const backend = monolithBackend();
    await runSplit(request([mapping(['module.network'], NETWORK, [])]), backend);

    assert.deepStrictEqual(instanceAddresses(backend.document(NETWORK)), [
      'aws_vpc.main',
      'aws_subnet.private[0]',
      'aws_subnet.private[1]',
      'module.dns.aws_route53_zone.internal',
    ]);
  });

  it('should not confuse modules sharing a name prefix', async () => {
    const backend = monolithBackend();
    await runSplit(request([mapping(['module.networking'], EDGE)]), backend);

    assert.deepStrictEqual(instanceAddresses(backend.document(EDGE)), [
      'module.networking.aws_eip.nat',
    ]);
    assert.strictEqual(countInstances(backend.document(SOURCE)), 8);
  });

  it('should carry a resource with no instances to its destination', async () => {
    const monolith = decodeState(readStateFixture('monolith'));
    monolith.resources.push({
      module: ['module.cache'],
      mode: 'managed',
      type: 'aws_elasticache_cluster',
      name: 'sessions',
      provider: 'provider["registry.terraform.io/hashicorp/aws"]',
      each: 'map',
      instances: [],
      extra: {},
    });
    const backend = new InMemoryBackend({ [SOURCE]: encodeState(monolith) });

    const result = await runSplit(request([mapping(['module.cache'], EDGE)]), backend);

    assert.deepStrictEqual(result.apply?.pushed, [EDGE, SOURCE]);
    assert.deepStrictEqual(
      backend.document(EDGE).resources.map((r) => `${r.module.join('.')}.${r.type}.${r.name}`),
      ['module.cache.aws_elasticache_cluster.sessions']
    );
    assert.ok(!backend.document(SOURCE).resources.some((r) => r.name === 'sessions'));
  });

  it('should push a shared destination once', async () => {
    const backend = monolithBackend();
    await runSplit(
      request([
        mapping(['module.network'], NETWORK),
        mapping(['module.networking'], NETWORK),
      ]),
      backend
    );

    assert.deepStrictEqual(backend.pushedDirectories(), [NETWORK, SOURCE]);
    assert.strictEqual(countInstances(backend.document(NETWORK)), 5);
    assert.strictEqual(backend.document(NETWORK).serial, 1);
  });

  it('should not push destinations left unchanged', async () => {
    const first = monolithBackend();
    await runSplit(request([mapping(['module.network'], NETWORK)]), first);
    const networkText = first.states.get(NETWORK);
    assert.ok(networkText);

    const backend = monolithBackend({ [NETWORK]: networkText });
    const result = await runSplit(
      request([mapping(['module.network'], NETWORK), mapping(['module.networking'], EDGE)]),
      backend
    );

    assert.deepStrictEqual(result.apply, { pushed: [EDGE, SOURCE], unchanged: [NETWORK] });
    assert.strictEqual(backend.states.get(NETWORK), networkText);
    assert.strictEqual(result.plan.summary.conflicts, 4);
  });

  it('should report phases in order', async () => {
    const events: SplitEvent[] = [];
    await runSplit(request([mapping(['module.network'], NETWORK)]), monolithBackend(), {
      onProgress: (event) => events.push(event),
    });

    assert.deepStrictEqual(phases(events), ['pulled', 'planned', 'applying', 'applied']);
    assert.deepStrictEqual(
      events.flatMap((e) => (e.type === 'push' ? [`${e.directory}:${e.serial}:${e.status}`] : [])),
      [`${NETWORK}:1:starting`, `${NETWORK}:1:completed`, `${SOURCE}:13:starting`, `${SOURCE}:13:completed`]
    );
  });

  it('should push nothing on a dry run', async () => {
    const backend = monolithBackend();
    const events: SplitEvent[] = [];
    const result = await runSplit(request([mapping(['module.network'], NETWORK)]), backend, {
      dryRun: true,
      onProgress: (event) => events.push(event),
    });

    assert.strictEqual(result.phase, 'dry-reported');
    assert.strictEqual(result.apply, undefined);
    assert.strictEqual(result.plan.summary.moved, 4);
    assert.deepStrictEqual(backend.pushes, []);
    assert.strictEqual(backend.states.get(SOURCE), readStateFixture('monolith'));
    assert.deepStrictEqual(phases(events), ['pulled', 'planned', 'dry-reported']);
  });

  it('should stop before pulling destinations on a lineage mismatch', async () => {
    const backend = monolithBackend();

    await assert.rejects(
      () =>
        runSplit(
          {
            ...request([mapping(['module.network'], NETWORK)]),
            expectedLineage: '33333333-3333-4333-8333-333333333333',
          },
          backend
        ),
      LineageMismatchError
    );
    assert.deepStrictEqual(backend.pulls, [SOURCE]);
    assert.deepStrictEqual(backend.pushes, []);
  });

  it('should proceed when the expected lineage matches', async () => {
    const backend = monolithBackend();
    const result = await runSplit(
      { ...request([mapping(['module.network'], NETWORK)]), expectedLineage: SOURCE_LINEAGE },
      backend
    );

    assert.strictEqual(result.phase, 'applied');
  });

  it('should push nothing when a module is missing', async () => {
    const backend = monolithBackend();

    await assert.rejects(
      () =>
        runSplit(
          request([mapping(['module.network'], NETWORK), mapping(['module.storage'], APP)]),
          backend
        ),
      ModuleNotFoundError
    );
    assert.deepStrictEqual(backend.pushes, []);
  });

  it('should find nothing left to move on a second run', async () => {
    const backend = monolithBackend();
    const split = request([mapping(['module.network'], NETWORK)]);
    await runSplit(split, backend);

    await assert.rejects(() => runSplit(split, backend), ModuleNotFoundError);
    assert.strictEqual(backend.pushes.length, 2);
  });
});
