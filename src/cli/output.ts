/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { ErrorCode, TfsplitError } from '../core/errors.js';
import { ApplyError, ConfigError } from '../core/errors.js';
import type { MergeConflict } from '../core/merge.js';
import type { DanglingReference } from '../core/rewriter.js';
import type {
  ApplyResult,
  MappingReport,
  ResourceMove,
  SplitEvent,
  SplitPlan,
} from '../core/types.js';
import type { ResolvedConfig } from '../config/types.js';
import { describeModulePath, formatModulePath } from '../core/address.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  dryRun?: boolean;
  source?: string;
  mappings?: MappingOutput[];
  pushes?: PushResult[];
  unchanged?: string[];
  /** False when a run failed before anything was pushed */
  modified?: boolean;
  error?: ErrorOutput;
  summary?: Record<string, number>;
}

/**
 * One mapping in JSON output
 */
export interface MappingOutput {
  module: string;
  destination: string;
  prefix: string;
  moves?: ResourceMove[];
  conflicts?: MergeConflict[];
  dangling?: DanglingReference[];
}

/**
 * Result of a single push
 */
export interface PushResult {
  directory: string;
  role: 'source' | 'destination';
  serial: number;
  status: 'completed' | 'failed';
  error?: string;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * CLI-specific output formatter.
 *
 * Provides high-level methods for formatting command output in both
 * human-readable and JSON modes. In JSON mode, output is collected
 * and emitted as a single JSON object at flush.
 */
export class OutputFormatter {
  private readonly mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  /**
   * Increase indent level.
   */
  indent(): void {
    this.indentLevel++;
  }

  /**
   * Decrease indent level.
   */
  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  /**
   * Print a success message.
   */
  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message.
   *
   * Apply failures also list which directories were and were not written.
   */
  error(message: string, error?: TfsplitError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error instanceof ApplyError) {
        this.applyFailure(error);
      } else if (error instanceof ConfigError && error.validationErrors) {
        for (const err of error.validationErrors) {
          console.error(`${this.getIndent()}  - ${err.path}: ${err.message}`);
        }
      }
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    const errorOutput: ErrorOutput = {
      code: error?.code ?? 'UNKNOWN',
      message,
    };
    if (error?.suggestion) {
      errorOutput.suggestion = error.suggestion;
    }
    if (error instanceof ApplyError) {
      errorOutput.details = {
        pushed: error.pushed,
        failed: error.failed,
        notAttempted: error.notAttempted,
        reason: error.backendError.reason,
      };
    } else if (error instanceof ConfigError && error.validationErrors) {
      errorOutput.details = { errors: error.validationErrors };
    }
    this.result.error = errorOutput;
  }

  /**
   * Print an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Print a blank line.
   */
  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine.trimEnd()}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine.trimEnd()}`);
      }
    }
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  /**
   * Print validation success.
   */
  validationSuccess(config: ResolvedConfig): void {
    const { request } = config;

    if (this.mode === 'human') {
      this.success('Split plan valid');
      this.indent();
      this.info(`Source: ${request.source}`);
      if (request.expectedLineage) {
        this.info(`Expected lineage: ${request.expectedLineage}`);
      }
      this.info(`Mappings: ${request.mappings.length}`);
      this.indent();
      this.table(
        ['MODULE', 'DESTINATION', 'PREFIX'],
        request.mappings.map((m) => [
          formatModulePath(m.module),
          m.destination,
          describeModulePath(m.prefix),
        ])
      );
      this.dedent();
      this.dedent();
    }

    this.result.source = request.source;
    this.result.mappings = request.mappings.map((m) => ({
      module: formatModulePath(m.module),
      destination: m.destination,
      prefix: describeModulePath(m.prefix),
    }));
    this.result.summary = {
      mappings: request.mappings.length,
    };
  }

  /**
   * Print validation errors.
   */
  validationError(errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error('Split plan invalid');
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Split plan validation failed',
      details: { errors },
    };
  }

  // ===========================================================================
  // Progress Output
  // ===========================================================================

  /**
   * Report a run progress event.
   *
   * Pushes are also recorded for JSON output.
   */
  progress(event: SplitEvent): void {
    switch (event.type) {
      case 'phase':
      case 'plan':
        return;

      case 'pull':
        if (event.status === 'starting') {
          this.info(`Pulling ${event.role} state: ${event.directory}`);
        } else if (event.status === 'created') {
          this.indent();
          this.info('No state yet; starting an empty one');
          this.dedent();
        }
        return;

      case 'push':
        if (event.status === 'starting') {
          this.info(`Pushing ${event.role} state: ${event.directory} (serial ${event.serial})`);
          return;
        }
        this.indent();
        if (event.status === 'completed') {
          this.success('Pushed');
        } else {
          if (this.mode === 'human') {
            console.error(`${this.getIndent()}✗ Push failed: ${event.error ?? 'unknown error'}`);
          }
        }
        this.dedent();
        this.addPushResult({
          directory: event.directory,
          role: event.role,
          serial: event.serial,
          status: event.status,
          ...(event.error !== undefined ? { error: event.error } : {}),
        });
        return;
    }
  }

  private addPushResult(pushResult: PushResult): void {
    if (!this.result.pushes) {
      this.result.pushes = [];
    }
    this.result.pushes.push(pushResult);
  }

  // ===========================================================================
  // Plan Output
  // ===========================================================================

  /**
   * Print what every mapping moves.
   *
   * Moves are prefixed `+`, conflicts `!` and dangling references `?`.
   */
  splitReport(plan: SplitPlan, options: { dryRun: boolean }): void {
    this.result.dryRun = options.dryRun;
    this.result.source = plan.pulled.sourceDirectory;
    this.result.mappings = plan.reports.map(toMappingOutput);

    if (this.mode === 'human') {
      for (const report of plan.reports) {
        this.newline();
        this.info(`${report.module} -> ${report.destination} (as ${report.prefix})`);
        this.indent();

        if (plan.pulled.created.has(report.destination)) {
          this.info('destination has no state yet; a new one will be created');
        }
        for (const move of report.moves) {
          const deposed = move.deposed !== undefined ? ` (deposed ${move.deposed})` : '';
          this.info(`+ ${move.from} -> ${move.to}${deposed}`);
        }
        for (const conflict of report.conflicts) {
          this.info(`! ${describeConflict(conflict)}`);
        }
        for (const ref of report.dangling) {
          this.info(`? ${ref.resource} ${ref.kind === 'provider' ? 'uses provider' : 'depends on'} ${ref.reference} outside the moved subtree`);
        }
        if (report.moves.length === 0) {
          this.info('nothing to move');
        }

        this.dedent();
      }
      this.newline();
    }

    this.result.summary = {
      ...this.result.summary,
      ...plan.summary,
      destinations: plan.changedDestinations.length,
    };
  }

  /**
   * Print which directories a failed apply wrote.
   */
  applyFailure(error: ApplyError): void {
    if (this.mode === 'human') {
      this.indent();
      this.info(`Pushed: ${listOrNone(error.pushed)}`);
      this.info(`Failed: ${error.failed}`);
      this.info(`Not attempted: ${listOrNone(error.notAttempted)}`);
      this.dedent();
    }
  }

  /**
   * Report that a failed run wrote nothing.
   */
  untouched(): void {
    this.info('No directories were modified.');
    this.result.modified = false;
  }

  // ===========================================================================
  // Summary Output
  // ===========================================================================

  /**
   * Print final summary.
   */
  summary(plan: SplitPlan, apply: ApplyResult | undefined, applyHint: string): void {
    const { moved, conflicts, dangling } = plan.summary;
    const parts = [`${moved} instance${moved === 1 ? '' : 's'} moved`];
    if (conflicts > 0) parts.push(`${conflicts} conflict${conflicts === 1 ? '' : 's'}`);
    if (dangling > 0) parts.push(`${dangling} dangling reference${dangling === 1 ? '' : 's'}`);

    if (this.mode === 'human') {
      if (apply) {
        const count = apply.pushed.length;
        this.newline();
        if (count > 0) {
          this.info(`Done. ${parts.join(', ')}; ${count} director${count === 1 ? 'y' : 'ies'} pushed.`);
        } else {
          this.info('Done. No changes made.');
        }
      } else {
        this.info(`Plan: ${parts.join(', ')}.`);
        this.info('Dry run: no state was pushed.');
        if (moved > 0) {
          this.info(applyHint);
        }
      }
    }

    if (apply) {
      this.result.unchanged = apply.unchanged;
      this.result.summary = {
        ...this.result.summary,
        pushed: apply.pushed.length,
      };
    }
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }
}

function toMappingOutput(report: MappingReport): MappingOutput {
  return {
    module: report.module,
    destination: report.destination,
    prefix: report.prefix,
    moves: report.moves,
    conflicts: report.conflicts,
    dangling: report.dangling,
  };
}

/**
 * One-line description of a merge conflict.
 */
export function describeConflict(conflict: MergeConflict): string {
  const deposed = conflict.deposed !== undefined ? ` (deposed ${conflict.deposed})` : '';

  if (conflict.kind === 'each-mode-mismatch') {
    return `${conflict.address} uses ${conflict.destinationEach ?? 'none'} in the destination but ${conflict.incomingEach ?? 'none'} in the source; not moved`;
  }
  return conflict.resolution === 'overwritten'
    ? `${conflict.address}${deposed} already in destination; overwritten`
    : `${conflict.address}${deposed} already in destination; kept destination copy, left in source`;
}

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join(', ') : '(none)';
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
