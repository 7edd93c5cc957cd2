/**
 * Unit tests for the merge engine
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { instanceKey, mergeResources, resourceKey } from '../../../src/core/merge.js';
import { createEmptyState } from '../../../src/state/codec.js';
import type { ResourceEntry, ResourceInstance, StateDocument } from '../../../src/state/types.js';

function instance(id: string, indexKey?: number | string, deposed?: string): ResourceInstance {
  const result: ResourceInstance = { attributes: { id }, extra: {} };
  if (indexKey !== undefined) result.indexKey = indexKey;
  if (deposed !== undefined) result.deposed = deposed;
  return result;
}

function subnet(instances: ResourceInstance[], each: ResourceEntry['each'] = 'list'): ResourceEntry {
  return {
    module: ['module.network'],
    mode: 'managed',
    type: 'aws_subnet',
    name: 'private',
    provider: 'provider["registry.terraform.io/hashicorp/aws"]',
    each,
    instances,
    extra: {},
  };
}

function destinationWith(resources: ResourceEntry[]): StateDocument {
  const doc = createEmptyState({ terraformVersion: '1.6.6', lineage: 'lineage-dst' });
  doc.resources = resources;
  return doc;
}

function ids(entry: ResourceEntry | undefined): unknown[] {
  return (entry?.instances ?? []).map((i) => i.attributes?.['id']);
}

describe('resourceKey', () => {
  it('should ignore instance keys', () => {
    assert.strictEqual(resourceKey(subnet([instance('a', 0)])), 'module.network.aws_subnet.private');
  });
});

describe('instanceKey', () => {
  it('should distinguish deposed objects from the current one', () => {
    assert.notStrictEqual(instanceKey(instance('a', 0)), instanceKey(instance('a', 0, 'dep1')));
    assert.notStrictEqual(instanceKey(instance('a', 0)), instanceKey(instance('a', '0')));
  });
});

describe('mergeResources', () => {
  it('should append resources new to the destination', () => {
    const result = mergeResources(destinationWith([]), [subnet([instance('s0', 0), instance('s1', 1)])]);

    assert.strictEqual(result.document.resources.length, 1);
    assert.deepStrictEqual(result.accepted, [[0, 1]]);
    assert.deepStrictEqual(result.conflicts, []);
    assert.strictEqual(result.changed, true);
  });

  it('should add missing instances to an existing resource', () => {
    const destination = destinationWith([subnet([instance('existing-1', 1)])]);
    const result = mergeResources(destination, [subnet([instance('s0', 0)])]);

    assert.strictEqual(result.document.resources.length, 1);
    assert.deepStrictEqual(ids(result.document.resources[0]), ['existing-1', 's0']);
    assert.deepStrictEqual(result.accepted, [[0]]);
  });

  it('should keep the destination instance on collision by default', () => {
    const destination = destinationWith([subnet([instance('existing-1', 1)])]);
    const result = mergeResources(destination, [subnet([instance('s0', 0), instance('s1', 1)])]);

    assert.deepStrictEqual(ids(result.document.resources[0]), ['existing-1', 's0']);
    assert.deepStrictEqual(result.accepted, [[0]]);
    assert.deepStrictEqual(result.conflicts, [
      {
        kind: 'instance',
        address: 'module.network.aws_subnet.private[1]',
        resolution: 'kept-destination',
      },
    ]);
  });

  it('should replace the destination instance in place with overwrite', () => {
    const destination = destinationWith([subnet([instance('existing-1', 1)])]);
    const result = mergeResources(
      destination,
      [subnet([instance('s0', 0), instance('s1', 1)])],
      { overwrite: true }
    );

    assert.deepStrictEqual(ids(result.document.resources[0]), ['s1', 's0']);
    assert.deepStrictEqual(result.accepted, [[0, 1]]);
    assert.strictEqual(result.conflicts[0]?.resolution, 'overwritten');
  });

  it('should record deposed keys on conflicts', () => {
    const destination = destinationWith([subnet([instance('old', 0, 'dep1')])]);
    const result = mergeResources(destination, [subnet([instance('new', 0, 'dep1')])]);

    assert.strictEqual(result.conflicts[0]?.deposed, 'dep1');
    assert.strictEqual(result.changed, false);
  });

  it('should refuse to merge resources with different repetition modes', () => {
    const destination = destinationWith([subnet([instance('existing', 'a')], 'map')]);
    const result = mergeResources(destination, [subnet([instance('s0', 0)], 'list')], {
      overwrite: true,
    });

    assert.deepStrictEqual(result.conflicts, [
      {
        kind: 'each-mode-mismatch',
        address: 'module.network.aws_subnet.private',
        resolution: 'kept-destination',
        destinationEach: 'map',
        incomingEach: 'list',
      },
    ]);
    assert.deepStrictEqual(result.accepted, [[]]);
    assert.deepStrictEqual(ids(result.document.resources[0]), ['existing']);
  });

  it('should count an appended resource with no instances as a change', () => {
    const result = mergeResources(destinationWith([]), [subnet([])]);

    assert.strictEqual(result.document.resources.length, 1);
    assert.deepStrictEqual(result.accepted, [[]]);
    assert.strictEqual(result.changed, true);
  });

  it('should report no change when every instance conflicts', () => {
    const destination = destinationWith([subnet([instance('existing', 0)])]);
    const result = mergeResources(destination, [subnet([instance('s0', 0)])]);

    assert.strictEqual(result.changed, false);
  });

  it('should not modify its inputs', () => {
    const destination = destinationWith([subnet([instance('existing-1', 1)])]);
    const incoming = [subnet([instance('s1', 1)])];
    mergeResources(destination, incoming, { overwrite: true });

    assert.deepStrictEqual(ids(destination.resources[0]), ['existing-1']);
    assert.deepStrictEqual(ids(incoming[0]), ['s1']);
  });

  it('should keep existing destination resources in place', () => {
    const other: ResourceEntry = { ...subnet([instance('x')], 'none'), type: 'aws_vpc', name: 'main' };
    const destination = destinationWith([other]);
    const result = mergeResources(destination, [subnet([instance('s0', 0)])]);

    assert.deepStrictEqual(
      result.document.resources.map((r) => `${r.type}.${r.name}`),
      ['aws_vpc.main', 'aws_subnet.private']
    );
  });
});
