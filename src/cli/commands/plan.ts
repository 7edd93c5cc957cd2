/**
 * Plan Command Handler
 *
 * Pulls every state involved in a split plan and reports what would move.
 * Nothing is pushed.
 */

import { createOutput } from '../output.js';
import type { BackendCommandOptions } from './run.js';
import { createBackend, executeSplit, handleError, loadPlanFile } from './run.js';

/**
 * Options for the plan command
 */
export type PlanCommandOptions = BackendCommandOptions;

/**
 * Execute the plan command.
 *
 * @param file - Path to the split plan
 * @param options - Command options
 */
export async function planCommand(
  file: string,
  options: PlanCommandOptions
): Promise<void> {
  const output = createOutput('plan', options);

  try {
    output.info(`Loading split plan: ${file}`);
    const config = await loadPlanFile(file, output);
    output.success('Split plan validated');

    await executeSplit(config, createBackend(config, options), output, {
      dryRun: true,
      applyHint: `Run \`tfsplit apply ${file}\` to apply.`,
    });
  } catch (error) {
    handleError(output, error, { untouched: true });
  }
}
