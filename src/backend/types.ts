/**
 * Backend Types
 *
 * The state backend is reached through the tool that owns the working
 * directory. Every call names its directory explicitly.
 */

/**
 * Executable that manages a working directory's state
 */
export type Tool = 'terraform' | 'terragrunt';

/**
 * Tool selection: a fixed tool, or detection per directory
 */
export type ToolPreference = Tool | 'auto';

/**
 * Reads and writes state documents for working directories.
 *
 * Implementations reject with BackendError.
 */
export interface StateBackend {
  /**
   * Read the current state of a directory.
   *
   * @returns State text, or an empty string when the directory has no state yet
   */
  pull(directory: string): Promise<string>;

  /**
   * Replace the state of a directory.
   */
  push(directory: string, state: string): Promise<void>;
}
