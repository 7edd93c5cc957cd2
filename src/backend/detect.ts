/**
 * Tool Detection
 *
 * Decides whether a working directory is driven by terraform or terragrunt.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';

import type { Tool, ToolPreference } from './types.js';

/**
 * File that marks a terragrunt working directory
 */
export const TERRAGRUNT_CONFIG = 'terragrunt.hcl';

/**
 * Pick the tool for a directory.
 *
 * An explicit preference wins; with `auto`, a directory containing
 * terragrunt.hcl uses terragrunt and anything else uses terraform.
 *
 * @param directory - Working directory
 * @param preference - Configured tool or 'auto'
 */
export async function detectTool(
  directory: string,
  preference: ToolPreference = 'auto'
): Promise<Tool> {
  if (preference !== 'auto') {
    return preference;
  }

  try {
    const info = await stat(join(directory, TERRAGRUNT_CONFIG));
    return info.isFile() ? 'terragrunt' : 'terraform';
  } catch {
    return 'terraform';
  }
}
