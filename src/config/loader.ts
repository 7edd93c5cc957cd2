/**
 * Split Plan Loader
 *
 * Loads YAML split plan files from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

/**
 * Error thrown when a split plan cannot be loaded
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: 'not-found' | 'unreadable' | 'invalid-yaml'
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Load and parse a YAML split plan file.
 *
 * @param filePath - Path to the YAML file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT') {
      throw new ConfigLoadError(`Split plan not found: ${filePath}`, filePath, 'not-found');
    }
    if (code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading split plan: ${filePath}`,
        filePath,
        'unreadable'
      );
    }
    throw new ConfigLoadError(`Failed to read split plan: ${filePath}`, filePath, 'unreadable');
  }

  try {
    return yaml.load(content);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new ConfigLoadError(
      `Invalid YAML syntax in ${filePath}: ${reason}`,
      filePath,
      'invalid-yaml'
    );
  }
}
