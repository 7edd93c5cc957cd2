/**
 * CLI State Backend
 *
 * Implements StateBackend with `state pull` and `state push` run in each
 * working directory by terraform or terragrunt.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { BackendError } from '../core/errors.js';
import type { BackendPhase } from '../core/errors.js';
import { detectTool } from './detect.js';
import { ToolExecutionError, ToolExecutor } from './executor.js';
import type { StateBackend, Tool, ToolPreference } from './types.js';

/**
 * Options for constructing a CliBackend
 */
export interface CliBackendOptions {
  /** Tool to use, or 'auto' to detect per directory (default: 'auto') */
  tool?: ToolPreference;
  /** Path to the terraform executable (default: 'terraform') */
  terraformPath?: string;
  /** Path to the terragrunt executable (default: 'terragrunt') */
  terragruntPath?: string;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
  /** Timeout per command in milliseconds (default: 300000) */
  timeout?: number;
}

/**
 * State backend driven by the terraform/terragrunt command line.
 */
export class CliBackend implements StateBackend {
  private readonly preference: ToolPreference;
  private readonly executors: Record<Tool, ToolExecutor>;

  constructor(options: CliBackendOptions = {}) {
    this.preference = options.tool ?? 'auto';
    const shared = { verbose: options.verbose, timeout: options.timeout };
    this.executors = {
      terraform: new ToolExecutor({ ...shared, tool: 'terraform', binaryPath: options.terraformPath }),
      terragrunt: new ToolExecutor({ ...shared, tool: 'terragrunt', binaryPath: options.terragruntPath }),
    };
  }

  /**
   * Tool used for a directory.
   */
  async toolFor(directory: string): Promise<Tool> {
    return detectTool(directory, this.preference);
  }

  async pull(directory: string): Promise<string> {
    const executor = this.executors[await this.toolFor(directory)];
    try {
      return await executor.run(['state', 'pull'], { cwd: directory });
    } catch (error) {
      throw wrapError(error, directory, 'pull');
    }
  }

  /**
   * Push state text from a temporary file.
   *
   * A file argument works for both tools; terragrunt runs terraform from a
   * cache directory, so the path is absolute.
   */
  async push(directory: string, state: string): Promise<void> {
    const executor = this.executors[await this.toolFor(directory)];
    const tempDir = await mkdtemp(join(tmpdir(), 'tfsplit-'));
    const statePath = join(tempDir, 'terraform.tfstate');

    try {
      await writeFile(statePath, state, 'utf-8');
      await executor.run(['state', 'push', statePath], { cwd: directory });
    } catch (error) {
      throw wrapError(error, directory, 'push');
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }
}

function wrapError(error: unknown, directory: string, phase: BackendPhase): BackendError {
  if (error instanceof ToolExecutionError) {
    return new BackendError(
      `State ${phase} failed for ${directory}: ${error.message}`,
      directory,
      phase,
      error.reason,
      error.exitCode,
      error.stderr
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new BackendError(
    `State ${phase} failed for ${directory}: ${message}`,
    directory,
    phase,
    'EXECUTION_FAILED'
  );
}
