/**
 * Error Types for clonebox
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all clonebox errors
 */
export type ErrorCode =
  | 'DETECTION_WARNING'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'VALIDATION_FAILED'
  | 'DEPENDENCY_CYCLE'
  | 'PROVISIONING_FAILED'
  | 'BACKEND_UNAVAILABLE'
  | 'HEALTH_CHECK_TIMEOUT'
  | 'STALE_STATE'
  | 'VM_NOT_FOUND'
  | 'INVALID_STATE'
  | 'OPERATION_CANCELLED'
  | 'BACKEND_ERROR';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  DETECTION_WARNING: 0,
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  VALIDATION_FAILED: 1,
  DEPENDENCY_CYCLE: 1,
  PROVISIONING_FAILED: 2,
  BACKEND_UNAVAILABLE: 2,
  HEALTH_CHECK_TIMEOUT: 3,
  STALE_STATE: 2,
  VM_NOT_FOUND: 1,
  INVALID_STATE: 1,
  OPERATION_CANCELLED: 130,
  BACKEND_ERROR: 2,
};

/**
 * Base error class for all clonebox errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class CloneboxError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'CloneboxError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, CloneboxError.prototype);
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
 * Non-fatal problem raised by a single detection probe.
 *
 * Never thrown out of the detector; logged and skipped.
 */
export class DetectionWarning extends CloneboxError {
  constructor(
    message: string,
    public readonly probe: string,
    public readonly reason?: unknown
  ) {
    super(message, 'DETECTION_WARNING');
    this.name = 'DetectionWarning';
    Object.setPrototypeOf(this, DetectionWarning.prototype);
  }
}

/**
 * Error for configuration file issues (missing file, bad YAML, schema).
 */
export class ConfigError extends CloneboxError {
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
 * Fatal input problem detected before any backend mutation:
 * bad path, resource caps exceeded, unusable spec.
 */
export class ValidationError extends CloneboxError {
  constructor(
    message: string,
    public readonly field?: string,
    suggestion?: string,
    code: 'VALIDATION_FAILED' | 'DEPENDENCY_CYCLE' = 'VALIDATION_FAILED'
  ) {
    super(message, code, suggestion);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Compose dependency graph is cyclic or references unknown members.
 */
export class CycleError extends ValidationError {
  constructor(
    message: string,
    public readonly members: string[]
  ) {
    super(
      message,
      'depends_on',
      'Remove the circular depends_on entries from the compose file.',
      'DEPENDENCY_CYCLE'
    );
    this.name = 'CycleError';
    Object.setPrototypeOf(this, CycleError.prototype);
  }
}

/**
 * A create step failed; completed steps were rolled back.
 */
export class ProvisioningFailure extends CloneboxError {
  constructor(
    public readonly vmName: string,
    public readonly step: string,
    public readonly reason: unknown,
    public readonly rollbackErrors: string[] = []
  ) {
    super(
      `Failed to create VM '${vmName}' at step '${step}': ${describeError(reason)}`,
      'PROVISIONING_FAILED',
      rollbackErrors.length > 0
        ? 'Rollback was incomplete; inspect the backend and backing store manually.'
        : undefined
    );
    this.name = 'ProvisioningFailure';
    Object.setPrototypeOf(this, ProvisioningFailure.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.rollbackErrors.length > 0) {
      output += '\n\nRollback errors:';
      for (const error of this.rollbackErrors) {
        output += `\n  - ${error}`;
      }
    }
    return output;
  }
}

/**
 * The virtualization backend cannot be reached. Never retried.
 */
export class BackendUnavailable extends CloneboxError {
  constructor(
    message: string,
    public readonly uri?: string
  ) {
    super(
      message,
      'BACKEND_UNAVAILABLE',
      'Ensure libvirtd is running and the connection URI is reachable (virsh -c <uri> list).'
    );
    this.name = 'BackendUnavailable';
    Object.setPrototypeOf(this, BackendUnavailable.prototype);
  }
}

/**
 * Any other failure reported by the backend.
 */
export class BackendError extends CloneboxError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly stderr?: string
  ) {
    super(message, 'BACKEND_ERROR');
    this.name = 'BackendError';
    Object.setPrototypeOf(this, BackendError.prototype);
  }
}

/**
 * A health probe did not finish before its deadline.
 * Reported as a failed probe; the VM keeps running.
 */
export class HealthCheckTimeout extends CloneboxError {
  constructor(
    public readonly vmName: string,
    public readonly probe: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Health probe '${probe}' on VM '${vmName}' timed out after ${timeoutMs}ms`,
      'HEALTH_CHECK_TIMEOUT'
    );
    this.name = 'HealthCheckTimeout';
    Object.setPrototypeOf(this, HealthCheckTimeout.prototype);
  }
}

/**
 * The backend disagrees with the cached view of a VM.
 * Recovered by reconciling and retrying once.
 */
export class StaleStateConflict extends CloneboxError {
  constructor(
    message: string,
    public readonly vmName: string
  ) {
    super(message, 'STALE_STATE');
    this.name = 'StaleStateConflict';
    Object.setPrototypeOf(this, StaleStateConflict.prototype);
  }
}

/**
 * The named VM is not known to the backend.
 */
export class VMNotFoundError extends CloneboxError {
  constructor(public readonly vmName: string) {
    super(
      `VM '${vmName}' does not exist`,
      'VM_NOT_FOUND',
      'Run `clonebox list` to see existing VMs.'
    );
    this.name = 'VMNotFoundError';
    Object.setPrototypeOf(this, VMNotFoundError.prototype);
  }
}

/**
 * The requested transition is not allowed from the VM's current state.
 */
export class InvalidStateError extends CloneboxError {
  constructor(
    public readonly vmName: string,
    public readonly state: string,
    public readonly operation: string
  ) {
    super(
      `Cannot ${operation} VM '${vmName}' while it is ${state}`,
      'INVALID_STATE'
    );
    this.name = 'InvalidStateError';
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

/**
 * A caller-supplied deadline or abort signal ended the operation.
 */
export class OperationCancelled extends CloneboxError {
  constructor(
    public readonly vmName: string,
    public readonly step: string
  ) {
    super(
      `Operation on VM '${vmName}' was cancelled during '${step}'`,
      'OPERATION_CANCELLED'
    );
    this.name = 'OperationCancelled';
    Object.setPrototypeOf(this, OperationCancelled.prototype);
  }
}

/**
 * Check if an error is a CloneboxError.
 */
export function isCloneboxError(error: unknown): error is CloneboxError {
  return error instanceof CloneboxError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isCloneboxError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}

/**
 * Extract a printable message from any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
