/**
 * Configuration Validator
 *
 * Validates clone spec, profile and compose documents against their JSON
 * Schemas using Ajv.
 */

import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { CloneSpecFile, ComposeFile, ProfileFile } from './types.js';
import cloneSpecSchema from './schema.json' with { type: 'json' };
import profileSchema from './profile.schema.json' with { type: 'json' };
import composeSchema from './compose.schema.json' with { type: 'json' };

/**
 * Schema violation details
 */
export interface SchemaIssue {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with the typed document or failure with issues
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: SchemaIssue[] };

// strict mode is off: the clone spec schema uses oneOf branches with
// open property sets, which Ajv strict mode rejects
const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});
addFormats.default(ajv);

// Compile the schemas once
const validateCloneSpec = ajv.compile<CloneSpecFile>(cloneSpecSchema);
const validateProfile = ajv.compile<ProfileFile>(profileSchema);
const validateCompose = ajv.compile<ComposeFile>(composeSchema);

function toIssues(errors: ErrorObject[] | null | undefined): SchemaIssue[] {
  return (errors ?? []).map((error: ErrorObject) => ({
    path: error.instancePath || '/',
    message: error.message ?? 'Unknown validation error',
    params: { ...error.params },
  }));
}

function run<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }
  return { valid: false, errors: toIssues(validate.errors) };
}

/**
 * Validate a parsed `.clonebox.yaml` document (v1 or v2).
 *
 * @param data - Parsed YAML data to validate
 */
export function validateCloneSpecFile(data: unknown): ValidationResult<CloneSpecFile> {
  return run(validateCloneSpec, data);
}

/**
 * Validate a parsed profile document.
 */
export function validateProfileFile(data: unknown): ValidationResult<ProfileFile> {
  return run(validateProfile, data);
}

/**
 * Validate a parsed compose document.
 */
export function validateComposeFile(data: unknown): ValidationResult<ComposeFile> {
  return run(validateCompose, data);
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of schema issues
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: SchemaIssue[]): string {
  return errors
    .map((error) => {
      const path = error.path || '/';
      return `  - ${path}: ${error.message}`;
    })
    .join('\n');
}
