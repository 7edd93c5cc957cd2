/**
 * Integration tests for running a split from a plan file
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { loadYamlFile } from '../../src/config/loader.js';
import { validateConfig } from '../../src/config/validator.js';
import { resolveConfigFile } from '../../src/config/resolver.js';
import type { ResolvedConfig } from '../../src/config/types.js';
import { runSplit } from '../../src/core/splitter.js';
import { ConfigError } from '../../src/core/errors.js';
import { InMemoryBackend, instanceAddresses, readStateFixture } from '../helpers/fake-backend.js';

describe('plan file run', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'tfsplit-plan-test-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function loadPlan(yaml: string): Promise<ResolvedConfig> {
    const planPath = join(root, 'split.yaml');
    await writeFile(planPath, yaml, 'utf-8');
    const result = validateConfig(await loadYamlFile(planPath));
    if (!result.valid) {
      assert.fail(`unexpected validation errors: ${JSON.stringify(result.errors)}`);
    }
    return resolveConfigFile(result.config, planPath);
  }

  it('should resolve directories beside the plan and apply it', async () => {
    const config = await loadPlan(
      [
        'source: ./live',
        'expected_lineage: "11111111-1111-4111-8111-111111111111"',
        'mappings:',
        '  - module: module.network',
        '    destination: ./network',
        '    prefix: ""',
        '  - module: module.app',
        '    destination: ./app',
        '',
      ].join('\n')
    );
    const live = join(root, 'live');
    const network = join(root, 'network');
    const app = join(root, 'app');

    assert.strictEqual(config.request.source, live);
    assert.deepStrictEqual(
      config.request.mappings.map((m) => m.destination),
      [network, app]
    );

    const backend = new InMemoryBackend({ [live]: readStateFixture('monolith') });
    const result = await runSplit(config.request, backend, { overwrite: config.overwrite });

    assert.deepStrictEqual(result.apply?.pushed, [network, app, live]);
    assert.deepStrictEqual(instanceAddresses(backend.document(network)), [
      'aws_vpc.main',
      'aws_subnet.private[0]',
      'aws_subnet.private[1]',
      'module.dns.aws_route53_zone.internal',
    ]);
    assert.deepStrictEqual(instanceAddresses(backend.document(app)), [
      'module.app.data.aws_ami.base',
      'module.app.aws_instance.web["blue"]',
      'module.app.aws_instance.web["green"]',
    ]);
  });

  it('should honour overwrite from the plan', async () => {
    const config = await loadPlan(
      [
        'source: ./live',
        'overwrite: true',
        'mappings:',
        '  - module: module.network',
        '    destination: ./network',
        '',
      ].join('\n')
    );
    const live = join(root, 'live');
    const network = join(root, 'network');
    const backend = new InMemoryBackend({
      [live]: readStateFixture('monolith'),
      [network]: readStateFixture('network-existing'),
    });

    const result = await runSplit(config.request, backend, { overwrite: config.overwrite });

    assert.deepStrictEqual(result.plan.reports[0]?.conflicts, [
      {
        kind: 'instance',
        address: 'module.network.aws_subnet.private[1]',
        resolution: 'overwritten',
      },
    ]);
  });

  it('should reject a destination that resolves to the source', async () => {
    const planPath = join(root, 'split.yaml');
    await writeFile(
      planPath,
      'source: ./live\nmappings:\n  - module: module.network\n    destination: live/\n',
      'utf-8'
    );
    const result = validateConfig(await loadYamlFile(planPath));
    assert.ok(result.valid);

    assert.throws(
      () => resolveConfigFile(result.config, planPath),
      (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.deepStrictEqual(error.validationErrors, [
          { path: '/mappings/0/destination', message: 'must differ from source' },
        ]);
        return true;
      }
    );
  });
});
