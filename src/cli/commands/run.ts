/**
 * Shared Command Runner
 *
 * Loading, validation, execution and error handling used by the split commands.
 */

import { resolve } from 'node:path';

import { loadYamlFile, ConfigLoadError } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { resolveConfig, resolveConfigFile } from '../../config/resolver.js';
import type { ResolvedConfig, SplitPlanConfig } from '../../config/types.js';
import { CliBackend } from '../../backend/index.js';
import type { StateBackend } from '../../backend/index.js';
import { runSplit } from '../../core/splitter.js';
import type { SplitRunResult } from '../../core/types.js';
import { ConfigError, isTfsplitError, getExitCode } from '../../core/errors.js';
import type { OutputFormatter } from '../output.js';

/**
 * Options shared by commands that talk to a state backend
 */
export interface BackendCommandOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Load, validate and resolve a split plan file.
 *
 * Prints validation errors and exits when the plan is invalid.
 */
export async function loadPlanFile(file: string, output: OutputFormatter): Promise<ResolvedConfig> {
  const configPath = resolve(file);
  const rawConfig = await loadYamlFile(configPath);
  const validationResult = validateConfig(rawConfig);

  if (!validationResult.valid) {
    output.validationError(validationResult.errors);
    output.flush();
    process.exit(1);
  }

  return resolveConfigFile(validationResult.config, configPath);
}

/**
 * Validate and resolve a plan built from command-line flags.
 *
 * Relative directories resolve against the current working directory.
 */
export function loadInlinePlan(plan: SplitPlanConfig, output: OutputFormatter): ResolvedConfig {
  const validationResult = validateConfig(plan);

  if (!validationResult.valid) {
    output.validationError(validationResult.errors);
    output.flush();
    process.exit(1);
  }

  return resolveConfig(validationResult.config, process.cwd());
}

/**
 * Create the CLI backend for a resolved plan.
 */
export function createBackend(config: ResolvedConfig, options: BackendCommandOptions): CliBackend {
  return new CliBackend({
    tool: config.tool,
    terraformPath: config.terraformPath,
    terragruntPath: config.terragruntPath,
    verbose: options.verbose,
    timeout: config.timeoutMs,
  });
}

/**
 * Run a split, print its report and exit.
 *
 * The report is printed once planning finishes, before anything is pushed.
 */
export async function executeSplit(
  config: ResolvedConfig,
  backend: StateBackend,
  output: OutputFormatter,
  options: { dryRun: boolean; applyHint: string }
): Promise<never> {
  const { dryRun, applyHint } = options;
  let applying = false;
  let result: SplitRunResult;

  try {
    result = await runSplit(config.request, backend, {
      dryRun,
      overwrite: config.overwrite,
      onProgress: (event) => {
        if (event.type === 'plan') {
          output.splitReport(event.plan, { dryRun });
        } else if (event.type === 'phase' && event.phase === 'applying') {
          applying = true;
        }
        output.progress(event);
      },
    });
  } catch (error) {
    handleError(output, error, { untouched: !applying });
  }

  output.summary(result.plan, result.apply, applyHint);
  output.flush();
  process.exit(0);
}

/**
 * Handle errors and exit appropriately.
 *
 * @param options.untouched - The error happened before any push
 */
export function handleError(
  output: OutputFormatter,
  error: unknown,
  options: { untouched?: boolean } = {}
): never {
  const reported = error instanceof ConfigLoadError ? toConfigError(error) : error;

  if (isTfsplitError(reported)) {
    output.error(reported.message, reported);
  } else if (reported instanceof Error) {
    output.error(reported.message);
  } else {
    output.error(String(reported));
  }

  if (options.untouched) {
    output.untouched();
  }

  output.flush();
  process.exit(getExitCode(reported));
}

function toConfigError(error: ConfigLoadError): ConfigError {
  switch (error.reason) {
    case 'not-found':
      return new ConfigError(
        error.message,
        'CONFIG_NOT_FOUND',
        'Ensure the split plan file exists.',
        error.filePath
      );
    case 'unreadable':
      return new ConfigError(
        error.message,
        'CONFIG_NOT_FOUND',
        'Ensure the split plan file is readable.',
        error.filePath
      );
    case 'invalid-yaml':
      return new ConfigError(
        error.message,
        'CONFIG_INVALID_YAML',
        'Fix the YAML syntax and try again.',
        error.filePath
      );
  }
}
