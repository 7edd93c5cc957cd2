/**
 * Address Rewriter
 *
 * Relocates selected resources from one module subtree to another by
 * substituting the matched module-path prefix. Dependencies and provider
 * addresses that point into the same subtree are rewritten with the same
 * rule; references that point elsewhere are kept as they are and reported.
 */

import { cloneResource } from '../state/codec.js';
import type { ModulePath, ResourceEntry } from '../state/types.js';
import { formatModulePath, formatResourceAddress, splitModulePrefix } from './address.js';
import type { ModulePrefixSplit } from './address.js';
import { AddressError } from './errors.js';
import { matchesModulePath } from './matcher.js';

/**
 * Reference left pointing outside the moved subtree
 */
export interface DanglingReference {
  /** What kind of reference this is */
  kind: 'dependency' | 'provider';
  /** Relocated address of the resource holding the reference */
  resource: string;
  /** The reference, unchanged */
  reference: string;
}

/**
 * A relocated copy of a selected resource
 */
export interface RelocatedResource {
  entry: ResourceEntry;
  dangling: DanglingReference[];
}

/**
 * Replace the `targetPath` prefix of `path` with `newPrefix`.
 *
 * @throws Error if `path` is not inside `targetPath`
 */
export function rewriteModulePath(
  path: ModulePath,
  targetPath: ModulePath,
  newPrefix: ModulePath
): ModulePath {
  if (!matchesModulePath(path, targetPath)) {
    throw new Error(
      `Module path ${formatModulePath(path)} is not inside ${formatModulePath(targetPath)}`
    );
  }
  return [...newPrefix, ...path.slice(targetPath.length)];
}

/**
 * Rewrite an address whose leading module segments lie inside `targetPath`.
 *
 * Works for resource addresses and provider configuration addresses alike.
 *
 * @returns The rewritten address, or null when the address points outside
 *          the subtree (or cannot be parsed)
 */
export function rewriteAddress(
  address: string,
  targetPath: ModulePath,
  newPrefix: ModulePath
): string | null {
  let split: ModulePrefixSplit;
  try {
    split = splitModulePrefix(address);
  } catch (error) {
    if (error instanceof AddressError) {
      return null;
    }
    throw error;
  }

  if (!matchesModulePath(split.module, targetPath)) {
    return null;
  }

  const module = rewriteModulePath(split.module, targetPath, newPrefix);
  return module.length > 0 ? `${formatModulePath(module)}.${split.remainder}` : split.remainder;
}

/**
 * Produce a relocated deep copy of a selected resource.
 *
 * The copy's module path becomes `newPrefix` followed by whatever lay below
 * `targetPath`. Every instance's dependencies are rewritten the same way when
 * they point into `targetPath`; others are left untouched and reported as
 * dangling, since they may no longer resolve in the destination state.
 *
 * @param entry - Resource selected under `targetPath`
 * @param targetPath - Module subtree being moved
 * @param newPrefix - Module path the subtree is moved to (empty = destination root)
 */
export function relocateResource(
  entry: ResourceEntry,
  targetPath: ModulePath,
  newPrefix: ModulePath
): RelocatedResource {
  const copy = cloneResource(entry);
  copy.module = [...rewriteModulePath(entry.module, targetPath, newPrefix)];

  const holder = formatResourceAddress(copy);
  const dangling: DanglingReference[] = [];
  const reported = new Set<string>();

  const report = (kind: DanglingReference['kind'], reference: string): void => {
    const key = `${kind}:${reference}`;
    if (!reported.has(key)) {
      reported.add(key);
      dangling.push({ kind, resource: holder, reference });
    }
  };

  // Providers configured in the root module are expected to exist in every state
  const provider = rewriteAddress(entry.provider, targetPath, newPrefix);
  if (provider !== null) {
    copy.provider = provider;
  } else if (splitModulePrefixSafe(entry.provider).length > 0) {
    report('provider', entry.provider);
  }

  for (const instance of copy.instances) {
    if (!instance.dependencies) {
      continue;
    }
    instance.dependencies = instance.dependencies.map((dependency) => {
      const rewritten = rewriteAddress(dependency, targetPath, newPrefix);
      if (rewritten === null) {
        report('dependency', dependency);
        return dependency;
      }
      return rewritten;
    });
  }

  return { entry: copy, dangling };
}

function splitModulePrefixSafe(address: string): ModulePath {
  try {
    return splitModulePrefix(address).module;
  } catch (error) {
    if (error instanceof AddressError) {
      return [];
    }
    throw error;
  }
}
