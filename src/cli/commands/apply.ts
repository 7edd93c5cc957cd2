/**
 * Apply Command Handler
 *
 * Executes a split plan: destinations are pushed in mapping order and the
 * source last, once every destination has been written.
 */

import { createOutput } from '../output.js';
import type { BackendCommandOptions } from './run.js';
import { createBackend, executeSplit, handleError, loadPlanFile } from './run.js';

/**
 * Options for the apply command
 */
export interface ApplyCommandOptions extends BackendCommandOptions {
  /** Replace colliding destination instances, overriding the plan */
  overwrite?: boolean;
}

/**
 * Execute the apply command.
 *
 * @param file - Path to the split plan
 * @param options - Command options
 */
export async function applyCommand(
  file: string,
  options: ApplyCommandOptions
): Promise<void> {
  const output = createOutput('apply', options);

  try {
    output.info(`Loading split plan: ${file}`);
    const config = await loadPlanFile(file, output);
    if (options.overwrite) {
      config.overwrite = true;
    }
    output.success('Split plan validated');

    await executeSplit(config, createBackend(config, options), output, {
      dryRun: false,
      applyHint: `Run \`tfsplit apply ${file}\` to apply.`,
    });
  } catch (error) {
    handleError(output, error, { untouched: true });
  }
}
