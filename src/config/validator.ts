/**
 * Split Plan Validator
 *
 * Validates split plan data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { SplitPlanConfig } from './types.js';
import planSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with config or failure with errors
 */
export type ValidationResult =
  | { valid: true; config: SplitPlanConfig }
  | { valid: false; errors: ValidationError[] };

// Create Ajv instance with options for detailed error reporting
const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: true,
});
addFormats.default(ajv);

// Compile the schema once
const validate = ajv.compile<SplitPlanConfig>(planSchema);

/**
 * Validate split plan data against the JSON Schema.
 *
 * @param data - Parsed YAML/JSON data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateConfig(data: unknown): ValidationResult {
  if (validate(data)) {
    return { valid: true, config: data };
  }

  const errors: ValidationError[] = (validate.errors ?? []).map((error: ErrorObject) => ({
    path: error.instancePath || '/',
    message: describeError(error),
    params: { ...error.params },
  }));

  return { valid: false, errors };
}

/**
 * Reword the Ajv messages a plan author is most likely to hit.
 */
function describeError(error: ErrorObject): string {
  const { keyword, params } = error;

  if (keyword === 'additionalProperties' && typeof params['additionalProperty'] === 'string') {
    return `unknown field "${params['additionalProperty']}"`;
  }
  if (keyword === 'pattern' && error.instancePath.endsWith('/module')) {
    return 'must be a module address such as module.network';
  }
  if (keyword === 'format' && params['format'] === 'uuid') {
    return 'must be a state lineage (UUID)';
  }
  return error.message ?? 'Unknown validation error';
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of validation errors
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => {
      const path = error.path || '/';
      return `  - ${path}: ${error.message}`;
    })
    .join('\n');
}
