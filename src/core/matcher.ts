/**
 * Module Path Matcher
 *
 * Decides which resources belong to a requested module subtree.
 */

import type { ModulePath, ResourceEntry, StateDocument } from '../state/types.js';
import { formatModulePath } from './address.js';
import { ModuleNotFoundError } from './errors.js';

/**
 * Check whether a resource's module path lies in the subtree rooted at `targetPath`.
 *
 * Matching is segment-wise: `module.net` selects `module.net` and
 * `module.net.module.vpc`, but not `module.network` or `module.net[0]`.
 *
 * @param resourceModule - Module path of the resource
 * @param targetPath - Requested subtree root
 * @returns True if `targetPath` is a prefix of `resourceModule`
 */
export function matchesModulePath(resourceModule: ModulePath, targetPath: ModulePath): boolean {
  if (targetPath.length > resourceModule.length) {
    return false;
  }
  return targetPath.every((segment, i) => resourceModule[i] === segment);
}

/**
 * Select every resource in the subtree rooted at `targetPath`, in document order.
 *
 * @throws ModuleNotFoundError if nothing matches
 */
export function selectResources(document: StateDocument, targetPath: ModulePath): ResourceEntry[] {
  const selected = document.resources.filter((resource) =>
    matchesModulePath(resource.module, targetPath)
  );

  if (selected.length === 0) {
    throw new ModuleNotFoundError(formatModulePath(targetPath), listModules(document));
  }

  return selected;
}

/**
 * List the distinct module paths that hold resources, in first-seen order.
 */
export function listModules(document: StateDocument): string[] {
  const seen = new Set<string>();
  for (const resource of document.resources) {
    if (resource.module.length > 0) {
      seen.add(formatModulePath(resource.module));
    }
  }
  return [...seen];
}
