/**
 * Split Orchestrator for tfsplit
 *
 * Pulls the source and destination states once, plans every mapping against
 * the in-memory documents, and pushes the results: destinations first, the
 * source last. There is no transaction across directories, so a failed push
 * stops the run and reports exactly which directories were written.
 */

import { resolve } from 'node:path';

import type { StateBackend } from '../backend/types.js';
import { cloneState, createEmptyState, decodeState, encodeState } from '../state/codec.js';
import type { ResourceEntry, ResourceInstance, StateDocument } from '../state/types.js';
import { describeModulePath, formatModulePath, formatResourceAddress } from './address.js';
import {
  ApplyError,
  BackendError,
  ConfigError,
  LineageMismatchError,
  ParseError,
} from './errors.js';
import type { BackendPhase } from './errors.js';
import { selectResources } from './matcher.js';
import { mergeResources } from './merge.js';
import type { MergeOptions } from './merge.js';
import { relocateResource } from './rewriter.js';
import { finalizeForPush, verifyFinalized } from './serial.js';
import type {
  ApplyResult,
  DocumentRole,
  MappingReport,
  PulledDocuments,
  ResourceMove,
  SplitMapping,
  SplitPlan,
  SplitProgressCallback,
  SplitRequest,
  SplitRunResult,
} from './types.js';

/**
 * Options for a split run
 */
export interface SplitOptions extends MergeOptions {
  /** Plan and report only; push nothing (default: false) */
  dryRun?: boolean;
  /** Callback for progress reporting */
  onProgress?: SplitProgressCallback;
}

// =============================================================================
// Pull
// =============================================================================

/**
 * Pull the source state and every distinct destination state once.
 *
 * A destination with no state yet starts as an empty document with its own
 * lineage. A source with no state is an error.
 *
 * @throws BackendError if a pull fails; nothing has been written at that point
 * @throws ParseError if a pulled state cannot be decoded
 * @throws LineageMismatchError if the source lineage differs from `expectedLineage`
 */
export async function pullDocuments(
  request: SplitRequest,
  backend: StateBackend,
  options: Pick<SplitOptions, 'onProgress'> = {}
): Promise<PulledDocuments> {
  const { onProgress } = options;
  const sourceDirectory = resolve(request.source);

  onProgress?.({ type: 'pull', directory: sourceDirectory, role: 'source', status: 'starting' });
  const sourceText = await pullText(backend, sourceDirectory);
  if (sourceText.trim() === '') {
    throw new ParseError(`${sourceDirectory}: source has no state to split`, sourceDirectory);
  }
  const source = decodeFrom(sourceText, sourceDirectory);
  onProgress?.({ type: 'pull', directory: sourceDirectory, role: 'source', status: 'completed' });

  if (request.expectedLineage !== undefined && source.lineage !== request.expectedLineage) {
    throw new LineageMismatchError(sourceDirectory, request.expectedLineage, source.lineage);
  }

  const destinations = new Map<string, StateDocument>();
  const created = new Set<string>();

  for (const mapping of request.mappings) {
    const directory = resolve(mapping.destination);
    if (destinations.has(directory)) {
      continue;
    }

    onProgress?.({ type: 'pull', directory, role: 'destination', status: 'starting' });
    const text = await pullText(backend, directory);

    if (text.trim() === '') {
      destinations.set(directory, createEmptyState({ terraformVersion: source.terraformVersion }));
      created.add(directory);
      onProgress?.({ type: 'pull', directory, role: 'destination', status: 'created' });
    } else {
      destinations.set(directory, decodeFrom(text, directory));
      onProgress?.({ type: 'pull', directory, role: 'destination', status: 'completed' });
    }
  }

  return { sourceDirectory, source, destinations, created };
}

async function pullText(backend: StateBackend, directory: string): Promise<string> {
  try {
    return await backend.pull(directory);
  } catch (error) {
    throw toBackendError(error, directory, 'pull');
  }
}

function decodeFrom(text: string, directory: string): StateDocument {
  try {
    return decodeState(text);
  } catch (error) {
    if (error instanceof ParseError) {
      throw error.withDirectory(directory);
    }
    throw error;
  }
}

function toBackendError(error: unknown, directory: string, phase: BackendPhase): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(
    `State ${phase} failed for ${directory}: ${message}`,
    directory,
    phase,
    'EXECUTION_FAILED'
  );
}

// =============================================================================
// Plan
// =============================================================================

/**
 * Plan every mapping against copies of the pulled documents.
 *
 * Mappings run in order against the progressively reduced source, and two
 * mappings into the same destination update one shared document. The pulled
 * documents are not modified, so planning twice gives the same plan.
 *
 * @throws ModuleNotFoundError if a mapping selects nothing
 */
export function planSplit(
  pulled: PulledDocuments,
  mappings: readonly SplitMapping[],
  options: MergeOptions = {}
): SplitPlan {
  let source = cloneState(pulled.source);
  const destinations = new Map<string, StateDocument>();
  for (const [directory, document] of pulled.destinations) {
    destinations.set(directory, cloneState(document));
  }

  const changedDestinations: string[] = [];
  const reports: MappingReport[] = [];
  let sourceChanged = false;

  for (const mapping of mappings) {
    const directory = resolve(mapping.destination);
    if (directory === pulled.sourceDirectory) {
      throw new ConfigError(
        `Destination ${directory} is the source directory`,
        'CONFIG_VALIDATION_FAILED',
        'Each destination must be a different working directory from the source.'
      );
    }

    const destination = destinations.get(directory);
    if (!destination) {
      throw new Error(`Destination ${directory} was not pulled`);
    }

    // Select, relocate, merge
    const selected = selectResources(source, mapping.module);
    const relocated = selected.map((entry) =>
      relocateResource(entry, mapping.module, mapping.prefix)
    );
    const merge = mergeResources(
      destination,
      relocated.map((r) => r.entry),
      options
    );

    destinations.set(directory, merge.document);
    if (merge.changed && !changedDestinations.includes(directory)) {
      changedDestinations.push(directory);
    }

    // Work out what stays behind in the source
    const moves: ResourceMove[] = [];
    const remaining = new Map<ResourceEntry, ResourceInstance[]>();

    selected.forEach((entry, i) => {
      const accepted = new Set(merge.accepted[i] ?? []);
      const target = relocated[i]?.entry ?? entry;

      entry.instances.forEach((instance, j) => {
        if (accepted.has(j)) {
          moves.push(describeMove(entry, target, instance));
        }
      });
      remaining.set(
        entry,
        entry.instances.filter((_, j) => !accepted.has(j))
      );
    });

    source = reduceSource(source, remaining);
    if (moves.length > 0 || selected.some((entry) => entry.instances.length === 0)) {
      sourceChanged = true;
    }

    reports.push({
      module: formatModulePath(mapping.module),
      destination: directory,
      prefix: describeModulePath(mapping.prefix),
      moves,
      conflicts: merge.conflicts,
      dangling: relocated.flatMap((r) => r.dangling),
    });
  }

  return {
    pulled,
    source,
    sourceChanged,
    destinations,
    changedDestinations,
    reports,
    summary: {
      moved: reports.reduce((sum, r) => sum + r.moves.length, 0),
      conflicts: reports.reduce((sum, r) => sum + r.conflicts.length, 0),
      dangling: reports.reduce((sum, r) => sum + r.dangling.length, 0),
    },
  };
}

/**
 * Drop moved instances from the source.
 *
 * A selected resource whose instances all moved is removed; one that kept
 * some instances stays in place with only those.
 */
function reduceSource(
  source: StateDocument,
  remaining: Map<ResourceEntry, ResourceInstance[]>
): StateDocument {
  const resources = source.resources.flatMap((entry) => {
    const kept = remaining.get(entry);
    if (kept === undefined) {
      return [entry];
    }
    return kept.length > 0 ? [{ ...entry, instances: kept }] : [];
  });
  return { ...source, resources };
}

function describeMove(
  entry: ResourceEntry,
  target: ResourceEntry,
  instance: ResourceInstance
): ResourceMove {
  const move: ResourceMove = {
    from: formatResourceAddress({ ...entry, indexKey: instance.indexKey }),
    to: formatResourceAddress({ ...target, indexKey: instance.indexKey }),
  };
  if (instance.deposed !== undefined) {
    move.deposed = instance.deposed;
  }
  return move;
}

// =============================================================================
// Apply
// =============================================================================

/**
 * Push a plan: every changed destination in mapping order, then the source.
 *
 * No push is retried. A destination failure stops the run before the source
 * is touched; a source failure after all destinations succeeded leaves the
 * moved resources in both places and is reported as such.
 *
 * @throws ApplyError describing which directories were pushed
 */
export async function applySplit(
  plan: SplitPlan,
  backend: StateBackend,
  options: Pick<SplitOptions, 'onProgress'> = {}
): Promise<ApplyResult> {
  const { onProgress } = options;
  const { pulled } = plan;
  const pushed: string[] = [];
  const order = plan.changedDestinations;

  for (const [i, directory] of order.entries()) {
    const before = pulled.destinations.get(directory);
    const after = plan.destinations.get(directory);
    if (!before || !after) {
      throw new Error(`Destination ${directory} is missing from the plan`);
    }

    try {
      await pushDocument(backend, directory, 'destination', before, after, onProgress);
    } catch (error) {
      const notAttempted = order.slice(i + 1);
      if (plan.sourceChanged) {
        notAttempted.push(pulled.sourceDirectory);
      }
      throw new ApplyError(
        `Push to ${directory} failed; the source state was not modified`,
        'PARTIAL_APPLY',
        [...pushed],
        directory,
        notAttempted,
        toBackendError(error, directory, 'push')
      );
    }
    pushed.push(directory);
  }

  if (plan.sourceChanged) {
    try {
      await pushDocument(
        backend,
        pulled.sourceDirectory,
        'source',
        pulled.source,
        plan.source,
        onProgress
      );
    } catch (error) {
      throw new ApplyError(
        `Push to source ${pulled.sourceDirectory} failed after every destination was written; moved resources now exist in both states`,
        'SOURCE_PUSH_FAILED',
        [...pushed],
        pulled.sourceDirectory,
        [],
        toBackendError(error, pulled.sourceDirectory, 'push')
      );
    }
    pushed.push(pulled.sourceDirectory);
  }

  const unchanged = [...pulled.destinations.keys()].filter(
    (directory) => !order.includes(directory)
  );

  return { pushed, unchanged };
}

async function pushDocument(
  backend: StateBackend,
  directory: string,
  role: DocumentRole,
  before: StateDocument,
  after: StateDocument,
  onProgress: SplitProgressCallback | undefined
): Promise<void> {
  const finalized = finalizeForPush(before, after);
  verifyFinalized(before, finalized);

  const serial = finalized.serial;
  onProgress?.({ type: 'push', directory, role, serial, status: 'starting' });

  try {
    await backend.push(directory, encodeState(finalized));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    onProgress?.({ type: 'push', directory, role, serial, status: 'failed', error: message });
    throw error;
  }

  onProgress?.({ type: 'push', directory, role, serial, status: 'completed' });
}

// =============================================================================
// Run
// =============================================================================

/**
 * Run a split end to end: pull, plan, then report (dry run) or apply.
 *
 * @param request - Source, mappings and optional lineage guard
 * @param backend - State backend used for every pull and push
 * @param options - Split options
 * @returns The plan, plus the apply result when not a dry run
 */
export async function runSplit(
  request: SplitRequest,
  backend: StateBackend,
  options: SplitOptions = {}
): Promise<SplitRunResult> {
  const { dryRun = false, onProgress } = options;

  const pulled = await pullDocuments(request, backend, { onProgress });
  onProgress?.({ type: 'phase', phase: 'pulled' });

  const plan = planSplit(pulled, request.mappings, options);
  onProgress?.({ type: 'phase', phase: 'planned' });
  onProgress?.({ type: 'plan', plan });

  if (dryRun) {
    onProgress?.({ type: 'phase', phase: 'dry-reported' });
    return { phase: 'dry-reported', plan };
  }

  onProgress?.({ type: 'phase', phase: 'applying' });
  try {
    const apply = await applySplit(plan, backend, { onProgress });
    onProgress?.({ type: 'phase', phase: 'applied' });
    return { phase: 'applied', plan, apply };
  } catch (error) {
    onProgress?.({ type: 'phase', phase: 'failed' });
    throw error;
  }
}
