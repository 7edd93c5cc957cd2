/**
 * Merge Engine
 *
 * Combines relocated resources into a destination state document.
 *
 * Resources are deduplicated by (module, mode, type, name). When a resource
 * already exists in the destination its instances are merged by instance key;
 * a colliding instance keeps the destination's copy unless overwrite is set.
 */

import { cloneResource, cloneState } from '../state/codec.js';
import type {
  EachMode,
  ResourceEntry,
  ResourceInstance,
  StateDocument,
} from '../state/types.js';
import { formatResourceAddress } from './address.js';

/**
 * Options for merging
 */
export interface MergeOptions {
  /** Replace colliding destination instances with incoming ones (default: false) */
  overwrite?: boolean;
}

/**
 * Kinds of merge conflict
 */
export type MergeConflictKind =
  | 'instance'            // Same instance key exists on both sides
  | 'each-mode-mismatch'; // Same resource uses count on one side and for_each on the other

/**
 * A collision found while merging
 */
export interface MergeConflict {
  kind: MergeConflictKind;
  /** Address in the destination (instance address for instance conflicts) */
  address: string;
  /** Deposed key when the colliding object is a deposed instance */
  deposed?: string;
  /** Which side's data ended up in the destination */
  resolution: 'kept-destination' | 'overwritten';
  /** Repetition modes, for each-mode-mismatch conflicts */
  destinationEach?: EachMode;
  incomingEach?: EachMode;
}

/**
 * Result of merging
 */
export interface MergeResult {
  /** New destination document (the input document is not modified) */
  document: StateDocument;
  /** Conflicts in the order they were found */
  conflicts: MergeConflict[];
  /**
   * For each incoming entry, the positions of its instances that were written
   * to the destination. Instances not listed stayed out of the destination.
   */
  accepted: number[][];
  /** Whether any resource or instance was written */
  changed: boolean;
}

/**
 * Deduplication key of a resource: its address without an instance key.
 */
export function resourceKey(entry: ResourceEntry): string {
  return formatResourceAddress(entry);
}

/**
 * Identity of an instance within its resource.
 *
 * Deposed objects share the index key of the current object, so the deposed
 * key takes part in the identity.
 */
export function instanceKey(instance: ResourceInstance): string {
  return `${JSON.stringify(instance.indexKey ?? null)}|${instance.deposed ?? ''}`;
}

/**
 * Merge incoming resources into a destination document.
 *
 * Deterministic: new resources and new instances are appended in incoming
 * order, and overwritten instances keep their position.
 *
 * @param destination - Destination document
 * @param incoming - Relocated resources to add
 * @param options - Merge options
 * @returns Merged copy of the destination and the conflicts found
 */
export function mergeResources(
  destination: StateDocument,
  incoming: readonly ResourceEntry[],
  options: MergeOptions = {}
): MergeResult {
  const { overwrite = false } = options;

  const document = cloneState(destination);
  const conflicts: MergeConflict[] = [];
  const accepted: number[][] = [];
  let appended = false;

  const byKey = new Map<string, ResourceEntry>();
  for (const entry of document.resources) {
    byKey.set(resourceKey(entry), entry);
  }

  for (const incomingEntry of incoming) {
    const entry = cloneResource(incomingEntry);
    const key = resourceKey(entry);
    const existing = byKey.get(key);

    // Case 1: resource not in destination - append it whole
    if (!existing) {
      document.resources.push(entry);
      byKey.set(key, entry);
      accepted.push(entry.instances.map((_, i) => i));
      appended = true;
      continue;
    }

    // Case 2: resource exists with a different repetition mode - keys are not comparable
    if (existing.each !== entry.each) {
      conflicts.push({
        kind: 'each-mode-mismatch',
        address: key,
        resolution: 'kept-destination',
        destinationEach: existing.each,
        incomingEach: entry.each,
      });
      accepted.push([]);
      continue;
    }

    // Case 3: resource exists - merge by instance key
    accepted.push(mergeInstances(existing, entry, overwrite, conflicts));
  }

  return {
    document,
    conflicts,
    accepted,
    // The source drops an appended entry even when it has no instances
    changed: appended || accepted.some((positions) => positions.length > 0),
  };
}

/**
 * Merge the instances of `incoming` into `existing`, in place.
 *
 * @returns Positions of the incoming instances that were written
 */
function mergeInstances(
  existing: ResourceEntry,
  incoming: ResourceEntry,
  overwrite: boolean,
  conflicts: MergeConflict[]
): number[] {
  const positions = new Map<string, number>();
  existing.instances.forEach((instance, i) => positions.set(instanceKey(instance), i));

  const written: number[] = [];

  incoming.instances.forEach((instance, i) => {
    const key = instanceKey(instance);
    const position = positions.get(key);

    if (position === undefined) {
      existing.instances.push(instance);
      positions.set(key, existing.instances.length - 1);
      written.push(i);
      return;
    }

    const conflict: MergeConflict = {
      kind: 'instance',
      address: formatResourceAddress({ ...existing, indexKey: instance.indexKey }),
      resolution: overwrite ? 'overwritten' : 'kept-destination',
    };
    if (instance.deposed !== undefined) {
      conflict.deposed = instance.deposed;
    }
    conflicts.push(conflict);

    if (overwrite) {
      existing.instances[position] = instance;
      written.push(i);
    }
  });

  return written;
}
