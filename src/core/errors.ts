/**
 * Error Types for tfsplit
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all tfsplit errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'INVALID_ADDRESS'
  | 'STATE_PARSE_FAILED'
  | 'LINEAGE_MISMATCH'
  | 'MODULE_NOT_FOUND'
  | 'BACKEND_ERROR'
  | 'PARTIAL_APPLY'
  | 'SOURCE_PUSH_FAILED';

/**
 * Mapping of error codes to exit codes.
 *
 * 1 = operator error, 2 = backend/system error, 3 = state left for manual reconciliation.
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  INVALID_ADDRESS: 1,
  STATE_PARSE_FAILED: 1,
  LINEAGE_MISMATCH: 1,
  MODULE_NOT_FOUND: 1,
  BACKEND_ERROR: 2,
  PARTIAL_APPLY: 3,
  SOURCE_PUSH_FAILED: 3,
};

/**
 * Base error class for all tfsplit errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class TfsplitError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'TfsplitError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, TfsplitError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for split plan configuration issues.
 */
export class ConfigError extends TfsplitError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Error for module or resource addresses that cannot be parsed.
 */
export class AddressError extends TfsplitError {
  constructor(
    message: string,
    public readonly address: string
  ) {
    super(
      message,
      'INVALID_ADDRESS',
      'Module addresses look like module.name or module.name["key"].module.child'
    );
    this.name = 'AddressError';
    Object.setPrototypeOf(this, AddressError.prototype);
  }
}

/**
 * Error for state text that is not a structurally valid state document.
 */
export class ParseError extends TfsplitError {
  constructor(
    message: string,
    public readonly directory?: string
  ) {
    super(
      message,
      'STATE_PARSE_FAILED',
      'Check that the directory is initialized and `state pull` prints a version 4 state document.'
    );
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }

  /**
   * Copy of this error attributed to the directory the text was pulled from.
   */
  withDirectory(directory: string): ParseError {
    return new ParseError(`${directory}: ${this.message}`, directory);
  }
}

/**
 * Error for a pulled source lineage that differs from the one the plan expects.
 */
export class LineageMismatchError extends TfsplitError {
  constructor(
    public readonly directory: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(
      `State in ${directory} has lineage ${actual}, expected ${expected}`,
      'LINEAGE_MISMATCH',
      'The source directory points at a different state than the plan was written for. Check `source` and `expected_lineage`.'
    );
    this.name = 'LineageMismatchError';
    Object.setPrototypeOf(this, LineageMismatchError.prototype);
  }
}

/**
 * Error for a module path that selects no resources in the source state.
 */
export class ModuleNotFoundError extends TfsplitError {
  constructor(
    public readonly modulePath: string,
    public readonly availableModules: string[] = []
  ) {
    super(
      `No resources found under ${modulePath}`,
      'MODULE_NOT_FOUND',
      availableModules.length > 0
        ? `Modules present in the source state: ${availableModules.join(', ')}`
        : 'The source state contains no module resources.'
    );
    this.name = 'ModuleNotFoundError';
    Object.setPrototypeOf(this, ModuleNotFoundError.prototype);
  }
}

/**
 * Phase of the run in which a backend call failed
 */
export type BackendPhase = 'pull' | 'push';

/**
 * Classification of backend failures
 */
export type BackendFailureReason =
  | 'LOCKED'
  | 'NOT_INITIALIZED'
  | 'ACCESS_DENIED'
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'EXECUTION_FAILED';

/**
 * Error for a failed `state pull` or `state push`.
 */
export class BackendError extends TfsplitError {
  constructor(
    message: string,
    public readonly directory: string,
    public readonly phase: BackendPhase,
    public readonly reason: BackendFailureReason,
    public readonly toolExitCode: number | null = null,
    public readonly stderr: string = ''
  ) {
    super(message, 'BACKEND_ERROR', suggestionFor(reason));
    this.name = 'BackendError';
    Object.setPrototypeOf(this, BackendError.prototype);
  }
}

function suggestionFor(reason: BackendFailureReason): string | undefined {
  switch (reason) {
    case 'LOCKED':
      return 'Another run holds the state lock. Wait for it to finish, or release a stale lock with `force-unlock`.';
    case 'NOT_INITIALIZED':
      return 'Run `init` in the directory before splitting.';
    case 'ACCESS_DENIED':
      return 'Check the credentials used to reach the state backend.';
    case 'NOT_FOUND':
      return 'Check that the directory and the terraform/terragrunt executable exist.';
    case 'TIMEOUT':
      return 'Increase timeout_seconds in the split plan.';
    case 'EXECUTION_FAILED':
      return undefined;
  }
}

/**
 * Error for an apply that stopped after some pushes succeeded.
 *
 * Carries the exact sets of directories already written and not written.
 */
export class ApplyError extends TfsplitError {
  constructor(
    message: string,
    code: 'PARTIAL_APPLY' | 'SOURCE_PUSH_FAILED',
    public readonly pushed: string[],
    public readonly failed: string,
    public readonly notAttempted: string[],
    public readonly backendError: BackendError
  ) {
    super(
      message,
      code,
      code === 'PARTIAL_APPLY'
        ? 'The source state was not modified. Resources pushed to the listed destinations now exist in both states; remove them from those destinations or re-run once the failure is fixed with overwrite enabled.'
        : 'Every destination was written but the source still holds the moved resources. Remove them from the source by hand (for example with `state rm`); do not re-run the split.'
    );
    this.name = 'ApplyError';
    Object.setPrototypeOf(this, ApplyError.prototype);
  }

  override format(): string {
    let output = super.format();
    output += `\n\nPushed: ${this.pushed.length > 0 ? this.pushed.join(', ') : '(none)'}`;
    output += `\nFailed: ${this.failed}`;
    output += `\nNot attempted: ${this.notAttempted.length > 0 ? this.notAttempted.join(', ') : '(none)'}`;
    return output;
  }
}

/**
 * Check if an error is a TfsplitError.
 */
export function isTfsplitError(error: unknown): error is TfsplitError {
  return error instanceof TfsplitError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isTfsplitError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
