/**
 * Split Command Handler
 *
 * Runs a split described entirely by command-line flags:
 *
 *   tfsplit split --source ./live --split module.network=../network
 */

import type { ToolPreference } from '../../backend/index.js';
import { buildInlinePlan } from '../../config/resolver.js';
import { createOutput } from '../output.js';
import type { BackendCommandOptions } from './run.js';
import { createBackend, executeSplit, handleError, loadInlinePlan } from './run.js';

/**
 * Options for the split command
 */
export interface SplitCommandOptions extends BackendCommandOptions {
  source: string;
  split: string[];
  dryRun?: boolean;
  overwrite?: boolean;
  tool?: ToolPreference;
  expectedLineage?: string;
}

/**
 * Execute the split command.
 *
 * @param options - Command options
 */
export async function splitCommand(options: SplitCommandOptions): Promise<void> {
  const output = createOutput('split', options);

  try {
    const config = loadInlinePlan(buildInlinePlan(options), output);
    const dryRun = options.dryRun ?? false;

    await executeSplit(config, createBackend(config, options), output, {
      dryRun,
      applyHint: 'Run the same command without --dry-run to apply.',
    });
  } catch (error) {
    handleError(output, error, { untouched: true });
  }
}
