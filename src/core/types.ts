/**
 * Core Types for tfsplit
 *
 * Types for split requests, planning, reporting and progress.
 */

import type { ModulePath, StateDocument } from '../state/types.js';
import type { MergeConflict } from './merge.js';
import type { DanglingReference } from './rewriter.js';

// =============================================================================
// Request
// =============================================================================

/**
 * One unit of work: move the subtree under `module` into `destination`,
 * re-rooted at `prefix`
 */
export interface SplitMapping {
  /** Module subtree to move */
  module: ModulePath;
  /** Absolute path of the destination working directory */
  destination: string;
  /** Module path the subtree lands at in the destination (empty = root) */
  prefix: ModulePath;
}

/**
 * A complete split run
 */
export interface SplitRequest {
  /** Absolute path of the source working directory */
  source: string;
  /** Mappings, processed in order */
  mappings: SplitMapping[];
  /** Abort unless the source state carries this lineage */
  expectedLineage?: string;
}

// =============================================================================
// Run lifecycle
// =============================================================================

/**
 * Phases of a split run
 */
export type SplitPhase =
  | 'idle'
  | 'pulled'
  | 'planned'
  | 'dry-reported'
  | 'applying'
  | 'applied'
  | 'failed';

/**
 * Role of a directory within a run
 */
export type DocumentRole = 'source' | 'destination';

/**
 * Progress events emitted during a run
 */
export type SplitEvent =
  | { type: 'phase'; phase: SplitPhase }
  | { type: 'plan'; plan: SplitPlan }
  | {
      type: 'pull';
      directory: string;
      role: DocumentRole;
      /** `created` = the backend had no state and an empty document was started */
      status: 'starting' | 'completed' | 'created';
    }
  | {
      type: 'push';
      directory: string;
      role: DocumentRole;
      serial: number;
      status: 'starting' | 'completed' | 'failed';
      error?: string;
    };

/**
 * Callback for reporting run progress
 */
export type SplitProgressCallback = (event: SplitEvent) => void;

// =============================================================================
// Documents
// =============================================================================

/**
 * Documents as pulled at the start of a run, one per distinct directory
 */
export interface PulledDocuments {
  sourceDirectory: string;
  source: StateDocument;
  /** Destination documents keyed by directory */
  destinations: Map<string, StateDocument>;
  /** Destinations whose backend had no state yet */
  created: Set<string>;
}

// =============================================================================
// Plan and report
// =============================================================================

/**
 * An instance that moves, with its address before and after
 */
export interface ResourceMove {
  from: string;
  to: string;
  /** Deposed key when the instance is a deposed object */
  deposed?: string;
}

/**
 * What one mapping does
 */
export interface MappingReport {
  module: string;
  destination: string;
  prefix: string;
  /** Instances that move */
  moves: ResourceMove[];
  /** Collisions with the destination */
  conflicts: MergeConflict[];
  /** References left pointing outside the moved subtree */
  dangling: DanglingReference[];
}

/**
 * Result of planning a split against pulled documents
 */
export interface SplitPlan {
  pulled: PulledDocuments;
  /** Reduced source document */
  source: StateDocument;
  /** Whether the source lost any instance */
  sourceChanged: boolean;
  /** Updated destination documents keyed by directory */
  destinations: Map<string, StateDocument>;
  /** Destinations that gained or replaced instances, in mapping order */
  changedDestinations: string[];
  /** One report per mapping, in mapping order */
  reports: MappingReport[];
  /** Summary statistics */
  summary: {
    moved: number;
    conflicts: number;
    dangling: number;
  };
}

/**
 * Result of pushing a plan
 */
export interface ApplyResult {
  /** Directories written, in push order (source last) */
  pushed: string[];
  /** Destinations left unchanged and not pushed */
  unchanged: string[];
}

/**
 * Result of a complete run
 */
export interface SplitRunResult {
  phase: 'dry-reported' | 'applied';
  plan: SplitPlan;
  /** Present when the run was applied */
  apply?: ApplyResult;
}
