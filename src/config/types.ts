/**
 * Configuration Types for tfsplit
 *
 * These types represent the YAML split plan structure and the resolved
 * configuration with defaults applied.
 */

import type { SplitRequest } from '../core/types.js';
import type { ToolPreference } from '../backend/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root split plan object parsed from a YAML file
 */
export interface SplitPlanConfig {
  /** Working directory holding the state to split */
  source: string;
  /** Abort unless the source state carries this lineage */
  expected_lineage?: string;
  /** Tool selection. Default: auto */
  tool?: ToolPreference;
  /** Replace colliding destination instances. Default: false */
  overwrite?: boolean;
  /** Timeout per terraform/terragrunt command. Default: 300 */
  timeout_seconds?: number;
  /** Path to the terraform executable */
  terraform_path?: string;
  /** Path to the terragrunt executable */
  terragrunt_path?: string;
  /** Modules to move, processed in order */
  mappings: MappingConfig[];
}

/**
 * One module-to-destination mapping
 */
export interface MappingConfig {
  /** Module address, e.g. module.networking */
  module: string;
  /** Destination working directory */
  destination: string;
  /** Module path in the destination. Omitted = unchanged; "" = root */
  prefix?: string;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Fully resolved configuration ready for execution
 */
export interface ResolvedConfig {
  /** Split request with absolute directories and parsed module paths */
  request: SplitRequest;
  /** Whether colliding destination instances are replaced */
  overwrite: boolean;
  /** Tool selection */
  tool: ToolPreference;
  /** Timeout per command in milliseconds */
  timeoutMs: number;
  /** Absolute path to the terraform executable, if configured */
  terraformPath?: string;
  /** Absolute path to the terragrunt executable, if configured */
  terragruntPath?: string;
  /** Absolute path to the YAML split plan, when loaded from a file */
  configPath?: string;
}
