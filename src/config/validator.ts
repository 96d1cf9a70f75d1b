/**
 * Configuration Validator
 *
 * Validates disk descriptions against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { DiskConfig } from './types.js';
import diskSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationIssue {
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
  | { valid: true; config: DiskConfig }
  | { valid: false; errors: ValidationIssue[] };

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
});
// uuid format for secret references
addFormats.default(ajv, ['uuid']);

// Compile the schema once
const validate = ajv.compile<DiskConfig>(diskSchema);

/**
 * Validate parsed YAML against the disk description schema.
 *
 * Only the shape is checked here; auth, reservation and cookie contents
 * are checked when the chain is resolved.
 *
 * @param data - Parsed YAML/JSON data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateConfig(data: unknown): ValidationResult {
  if (validate(data)) {
    return { valid: true, config: data };
  }

  const errors: ValidationIssue[] = (validate.errors ?? []).map(
    (error: ErrorObject) => ({
      path: error.instancePath || '/',
      message: error.message ?? 'Unknown validation error',
      params: { ...error.params },
    })
  );

  return { valid: false, errors };
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of validation errors
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: ValidationIssue[]): string {
  return errors.map((error) => `  - ${error.path}: ${error.message}`).join('\n');
}
