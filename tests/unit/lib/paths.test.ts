/**
 * Unit tests for Path Utilities
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { expandPath, isPathLike } from '../../../src/lib/paths.js';

describe('expandPath', () => {
  describe('tilde expansion', () => {
    it('should expand ~ to home directory', () => {
      assert.strictEqual(expandPath('~', '/base'), homedir());
    });

    it('should expand ~/path to home directory path', () => {
      assert.strictEqual(expandPath('~/stacks/network', '/base'), join(homedir(), 'stacks/network'));
    });
  });

  describe('relative path resolution', () => {
    it('should resolve relative path against base path', () => {
      const basePath = resolve('/plans');
      assert.strictEqual(expandPath('live/network', basePath), resolve(basePath, 'live/network'));
    });

    it('should keep absolute paths', () => {
      assert.strictEqual(expandPath('/stacks/live', '/base'), resolve('/stacks/live'));
    });

    it('should normalize trailing separators', () => {
      const basePath = resolve('/plans');
      assert.strictEqual(expandPath('live/', basePath), expandPath('./live', basePath));
      assert.strictEqual(expandPath('/stacks/live/', basePath), resolve('/stacks/live'));
    });

    it('should resolve . and ..', () => {
      const basePath = resolve('/plans/prod');
      assert.strictEqual(expandPath('.', basePath), basePath);
      assert.strictEqual(expandPath('..', basePath), resolve('/plans'));
    });
  });

  describe('environment variable expansion', () => {
    let original: string | undefined;

    beforeEach(() => {
      original = process.env['TFSPLIT_TEST_ENV'];
      process.env['TFSPLIT_TEST_ENV'] = 'prod';
    });

    afterEach(() => {
      if (original === undefined) {
        delete process.env['TFSPLIT_TEST_ENV'];
      } else {
        process.env['TFSPLIT_TEST_ENV'] = original;
      }
    });

    it('should expand $VAR variables', () => {
      const basePath = resolve('/base');
      assert.strictEqual(
        expandPath('stacks/$TFSPLIT_TEST_ENV/network', basePath),
        resolve(basePath, 'stacks/prod/network')
      );
    });

    it('should expand braced ${VAR} variables', () => {
      const basePath = resolve('/base');
      assert.strictEqual(
        expandPath('stacks/${TFSPLIT_TEST_ENV}-eu/network', basePath),
        resolve(basePath, 'stacks/prod-eu/network')
      );
    });

    it('should leave ~ inside a name alone', () => {
      const basePath = resolve('/base');
      assert.strictEqual(expandPath('stacks~old', basePath), resolve(basePath, 'stacks~old'));
    });

    it('should replace undefined variables with empty string', () => {
      const basePath = resolve('/base');
      assert.strictEqual(
        expandPath('stacks/$TFSPLIT_UNDEFINED_VAR/end', basePath),
        resolve(basePath, 'stacks//end')
      );
    });
  });
});

describe('isPathLike', () => {
  it('should treat bare executable names as names', () => {
    assert.strictEqual(isPathLike('terraform'), false);
    assert.strictEqual(isPathLike('terragrunt'), false);
  });

  it('should treat values with separators or ~ as paths', () => {
    assert.strictEqual(isPathLike('./bin/terraform'), true);
    assert.strictEqual(isPathLike('/usr/local/bin/terraform'), true);
    assert.strictEqual(isPathLike('C:\\tools\\terraform.exe'), true);
    assert.strictEqual(isPathLike('~/bin/terragrunt'), true);
  });
});
