/**
 * Tool Executor for State Operations
 *
 * Spawns terraform or terragrunt in a working directory and collects its output.
 */

import { spawn } from 'node:child_process';

import type { BackendFailureReason } from '../core/errors.js';
import type { Tool } from './types.js';
import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Error thrown when a tool invocation fails
 */
export class ToolExecutionError extends Error {
  constructor(
    message: string,
    public readonly reason: BackendFailureReason,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly command: string
  ) {
    super(message);
    this.name = 'ToolExecutionError';
  }
}

/**
 * Options for a single invocation
 */
export interface RunOptions {
  /** Working directory the tool runs in */
  cwd: string;
  /** Timeout in milliseconds (default: the executor's timeout) */
  timeout?: number;
}

/**
 * Options for constructing a ToolExecutor
 */
export interface ToolExecutorOptions {
  /** Tool this executor runs */
  tool: Tool;
  /** Path to the executable (default: the tool name, looked up on PATH) */
  binaryPath?: string;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
  /** Default timeout in milliseconds (default: 300000) */
  timeout?: number;
}

/**
 * Runs one tool's commands and returns their standard output.
 */
export class ToolExecutor {
  readonly tool: Tool;
  private readonly binaryPath: string;
  private readonly verbose: boolean;
  private readonly timeout: number;

  constructor(options: ToolExecutorOptions) {
    this.tool = options.tool;
    this.binaryPath = options.binaryPath ?? options.tool;
    this.verbose = options.verbose ?? false;
    this.timeout = options.timeout ?? 300000;
  }

  /**
   * Run the tool with the given arguments.
   *
   * @param args - Arguments, e.g. ['state', 'pull']
   * @param options - Invocation options
   * @returns Standard output
   * @throws ToolExecutionError if the tool cannot be started, times out, or exits non-zero
   */
  async run(args: string[], options: RunOptions): Promise<string> {
    const { cwd, timeout = this.timeout } = options;
    const command = [this.binaryPath, ...args].join(' ');

    if (this.verbose) {
      process.stderr.write(formatCommand(command, cwd, supportsAnsi()));
    }

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.binaryPath, args, {
        cwd,
        env: { ...process.env, TF_INPUT: '0', TF_IN_AUTOMATION: '1' },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      // Decoded only once complete, so a character split across chunks stays whole
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      const collected = (chunks: Buffer[]): string => Buffer.concat(chunks).toString('utf8');
      let settled = false;

      const timeoutId = setTimeout(() => {
        settled = true;
        child.kill('SIGTERM');
        reject(
          new ToolExecutionError(
            `${command} timed out after ${timeout}ms`,
            'TIMEOUT',
            null,
            collected(stderrChunks),
            command
          )
        );
      }, timeout);

      child.stdout.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });

      child.stderr.on('data', (data: Buffer) => {
        stderrChunks.push(data);
      });

      child.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timeoutId);
        if (settled) return;
        settled = true;
        reject(
          new ToolExecutionError(
            `Failed to start ${this.binaryPath} in ${cwd}: ${error.message}`,
            error.code === 'ENOENT' ? 'NOT_FOUND' : 'EXECUTION_FAILED',
            null,
            collected(stderrChunks),
            command
          )
        );
      });

      child.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (settled) return;
        settled = true;
        const stderr = collected(stderrChunks);

        if (code !== 0) {
          reject(
            new ToolExecutionError(
              formatToolErrorMessage(stderr, code, command),
              classifyToolError(stderr),
              code,
              stderr,
              command
            )
          );
          return;
        }

        resolve(collected(stdoutChunks));
      });
    });
  }
}

/**
 * Strip ANSI escape codes and carriage returns from tool output.
 */
export function stripAnsiCodes(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * Classify a failed invocation by its stderr.
 */
export function classifyToolError(stderr: string): BackendFailureReason {
  const lower = stripAnsiCodes(stderr).toLowerCase();

  // State lock held by another run
  if (lower.includes('error acquiring the state lock') || lower.includes('state lock')) {
    return 'LOCKED';
  }

  // Working directory not initialized
  if (
    lower.includes('backend initialization required') ||
    lower.includes('please run "terraform init"') ||
    lower.includes('run "terraform init"') ||
    lower.includes('not initialized')
  ) {
    return 'NOT_INITIALIZED';
  }

  // Credentials / permissions
  if (
    lower.includes('access denied') ||
    lower.includes('accessdenied') ||
    lower.includes('permission denied') ||
    lower.includes('unauthorized') ||
    lower.includes('forbidden')
  ) {
    return 'ACCESS_DENIED';
  }

  return 'EXECUTION_FAILED';
}

/**
 * Format a readable error message from a failed invocation.
 *
 * Prefers the tool's own `Error:` line, falling back to the first lines of stderr.
 */
export function formatToolErrorMessage(
  stderr: string,
  exitCode: number | null,
  command: string
): string {
  const lines = stripAnsiCodes(stderr)
    .split('\n')
    .map((line) => line.replace(/^[\s│╷╵]+/, '').trim())
    .filter((line) => line.length > 0);

  const errorLine = lines.find((line) => line.startsWith('Error:'));
  if (errorLine) {
    return `${command}: ${errorLine.slice('Error:'.length).trim()}`;
  }

  if (lines.length > 0) {
    return `${command}: ${lines.slice(0, 3).join(' | ')}`;
  }

  return `${command} exited with code ${exitCode}`;
}
