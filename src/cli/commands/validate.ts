/**
 * Validate Command Handler
 *
 * Validates a YAML split plan without touching any state backend.
 * Module addresses, destination directories and duplicate mappings are
 * checked as well as the schema.
 */

import { createOutput } from '../output.js';
import { handleError, loadPlanFile } from './run.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command.
 *
 * @param file - Path to the split plan
 * @param options - Command options
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    output.info(`Validating split plan: ${file}`);
    const config = await loadPlanFile(file, output);

    output.validationSuccess(config);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
