/**
 * Split Plan Resolver
 *
 * Applies defaults, parses module addresses and expands directories to
 * produce a split request ready for execution.
 */

import { dirname, resolve } from 'node:path';

import { parseModulePath } from '../core/address.js';
import { AddressError, ConfigError } from '../core/errors.js';
import type { SplitMapping } from '../core/types.js';
import type { ModulePath } from '../state/types.js';
import { expandPath, isPathLike } from '../lib/paths.js';
import type { MappingConfig, ResolvedConfig, SplitPlanConfig } from './types.js';

/**
 * Default values when not specified in the split plan
 */
const DEFAULTS = {
  tool: 'auto' as const,
  overwrite: false,
  timeoutSeconds: 300,
};

/**
 * Problem found while resolving, reported like a schema validation error
 */
interface ResolveProblem {
  path: string;
  message: string;
}

/**
 * Resolve a validated split plan.
 *
 * Relative directories resolve against `basePath`.
 *
 * @param config - Validated split plan
 * @param basePath - Directory relative paths are resolved against
 * @param configPath - Path of the plan file, when loaded from one
 * @returns Resolved configuration
 * @throws ConfigError listing every unparsable address, self-targeting destination or duplicate mapping
 */
export function resolveConfig(
  config: SplitPlanConfig,
  basePath: string,
  configPath?: string
): ResolvedConfig {
  const problems: ResolveProblem[] = [];
  const source = expandPath(config.source, basePath);
  const seen = new Set<string>();

  const mappings: SplitMapping[] = [];
  config.mappings.forEach((mapping, i) => {
    const resolved = resolveMapping(mapping, `/mappings/${i}`, basePath, problems);
    if (!resolved) {
      return;
    }

    if (resolved.destination === source) {
      problems.push({
        path: `/mappings/${i}/destination`,
        message: 'must differ from source',
      });
      return;
    }

    const key = `${mapping.module}\u0000${resolved.destination}`;
    if (seen.has(key)) {
      problems.push({
        path: `/mappings/${i}`,
        message: `duplicates an earlier mapping of ${mapping.module} to the same destination`,
      });
      return;
    }
    seen.add(key);
    mappings.push(resolved);
  });

  if (problems.length > 0) {
    throw new ConfigError(
      'Split plan is invalid',
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed mappings and try again.',
      configPath,
      problems
    );
  }

  const resolvedConfig: ResolvedConfig = {
    request: { source, mappings },
    overwrite: config.overwrite ?? DEFAULTS.overwrite,
    tool: config.tool ?? DEFAULTS.tool,
    timeoutMs: (config.timeout_seconds ?? DEFAULTS.timeoutSeconds) * 1000,
  };

  if (config.expected_lineage !== undefined) {
    resolvedConfig.request.expectedLineage = config.expected_lineage;
  }
  if (config.terraform_path !== undefined) {
    resolvedConfig.terraformPath = resolveExecutable(config.terraform_path, basePath);
  }
  if (config.terragrunt_path !== undefined) {
    resolvedConfig.terragruntPath = resolveExecutable(config.terragrunt_path, basePath);
  }
  if (configPath !== undefined) {
    resolvedConfig.configPath = resolve(configPath);
  }

  return resolvedConfig;
}

/**
 * Resolve a split plan loaded from `configPath`, relative to its directory.
 */
export function resolveConfigFile(config: SplitPlanConfig, configPath: string): ResolvedConfig {
  const absolutePath = resolve(configPath);
  return resolveConfig(config, dirname(absolutePath), absolutePath);
}

function resolveMapping(
  mapping: MappingConfig,
  path: string,
  basePath: string,
  problems: ResolveProblem[]
): SplitMapping | null {
  const module = parseAddress(mapping.module, `${path}/module`, problems);
  // Omitted prefix keeps the module path unchanged
  const prefix =
    mapping.prefix === undefined
      ? module
      : parseAddress(mapping.prefix, `${path}/prefix`, problems);

  if (!module || !prefix) {
    return null;
  }

  if (module.length === 0) {
    problems.push({ path: `${path}/module`, message: 'must name a module, not the root' });
    return null;
  }

  return {
    module,
    destination: expandPath(mapping.destination, basePath),
    prefix,
  };
}

function parseAddress(
  address: string,
  path: string,
  problems: ResolveProblem[]
): ModulePath | null {
  try {
    return parseModulePath(address);
  } catch (error) {
    if (error instanceof AddressError) {
      problems.push({ path, message: error.message });
      return null;
    }
    throw error;
  }
}

function resolveExecutable(value: string, basePath: string): string {
  return isPathLike(value) ? expandPath(value, basePath) : value;
}

// =============================================================================
// Inline splits
// =============================================================================

/**
 * Parse an inline `module=destination[=prefix]` argument.
 *
 * @throws ConfigError if the argument does not have two or three parts
 */
export function parseSplitArgument(argument: string): MappingConfig {
  const parts = argument.split('=');
  const [module, destination, prefix] = parts;

  if (
    parts.length < 2 ||
    parts.length > 3 ||
    module === undefined ||
    destination === undefined ||
    module.trim() === '' ||
    destination.trim() === ''
  ) {
    throw new ConfigError(
      `Invalid split mapping: ${argument}`,
      'CONFIG_VALIDATION_FAILED',
      'Use --split module.name=destination_dir, optionally followed by =new_prefix (empty for the root module).'
    );
  }

  const mapping: MappingConfig = { module: module.trim(), destination: destination.trim() };
  if (prefix !== undefined) {
    mapping.prefix = prefix.trim();
  }
  return mapping;
}

/**
 * Options accepted by the inline `split` command
 */
export interface InlineSplitOptions {
  source: string;
  split: string[];
  tool?: SplitPlanConfig['tool'];
  overwrite?: boolean;
  expectedLineage?: string;
}

/**
 * Build a split plan from inline command-line options.
 *
 * The result still goes through schema validation like a plan file.
 */
export function buildInlinePlan(options: InlineSplitOptions): SplitPlanConfig {
  const plan: SplitPlanConfig = {
    source: options.source,
    mappings: options.split.map(parseSplitArgument),
  };
  if (options.tool !== undefined) {
    plan.tool = options.tool;
  }
  if (options.overwrite !== undefined) {
    plan.overwrite = options.overwrite;
  }
  if (options.expectedLineage !== undefined) {
    plan.expected_lineage = options.expectedLineage;
  }
  return plan;
}
