/**
 * Unit tests for Error Types
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  CloneboxError,
  ConfigError,
  CycleError,
  OperationCancelled,
  ProvisioningFailure,
  StaleStateConflict,
  ValidationError,
  VMNotFoundError,
  describeError,
  getExitCode,
  isCloneboxError,
} from '../../../src/core/errors.js';

describe('CloneboxError hierarchy', () => {
  it('should keep instanceof working through subclasses', () => {
    const error = new CycleError('Dependency cycle among: a, b', ['a', 'b']);

    assert.ok(error instanceof CycleError);
    assert.ok(error instanceof ValidationError);
    assert.ok(error instanceof CloneboxError);
    assert.strictEqual(error.code, 'DEPENDENCY_CYCLE');
    assert.deepStrictEqual(error.members, ['a', 'b']);
  });

  it('should format the suggestion under the message', () => {
    const error = new ValidationError('Invalid VM name', 'vm.name', 'Use letters and digits.');

    assert.strictEqual(error.format(), 'Error: Invalid VM name\n\nFix: Use letters and digits.');
  });

  it('should list schema errors of a ConfigError', () => {
    const error = new ConfigError('Invalid clone spec: x.yaml', 'CONFIG_VALIDATION_FAILED', undefined, 'x.yaml', [
      { path: '/vm/name', message: 'must match pattern' },
    ]);

    assert.strictEqual(error.format(), 'Error: Invalid clone spec: x.yaml\n\nValidation errors:\n  - /vm/name: must match pattern');
  });
});

describe('ProvisioningFailure', () => {
  it('should name the step and the cause', () => {
    const error = new ProvisioningFailure('web', 'define-domain', new Error('no such network'));

    assert.strictEqual(error.message, "Failed to create VM 'web' at step 'define-domain': no such network");
    assert.strictEqual(error.suggestion, undefined);
  });

  it('should list incomplete rollback steps', () => {
    const error = new ProvisioningFailure('web', 'start-domain', 'boom', ['undo define-domain: busy']);

    assert.strictEqual(
      error.format(),
      "Error: Failed to create VM 'web' at step 'start-domain': boom\n\n" +
        'Fix: Rollback was incomplete; inspect the backend and backing store manually.\n\n' +
        'Rollback errors:\n  - undo define-domain: busy'
    );
  });
});

describe('getExitCode', () => {
  it('should map error codes to exit codes', () => {
    assert.strictEqual(getExitCode(new VMNotFoundError('web')), 1);
    assert.strictEqual(getExitCode(new StaleStateConflict('changed', 'web')), 2);
    assert.strictEqual(getExitCode(new OperationCancelled('web', 'shutdown')), 130);
  });

  it('should treat foreign errors as system errors', () => {
    assert.strictEqual(getExitCode(new Error('boom')), 2);
    assert.strictEqual(isCloneboxError(new Error('boom')), false);
  });
});

describe('describeError', () => {
  it('should use the message of errors and stringify anything else', () => {
    assert.strictEqual(describeError(new Error('boom')), 'boom');
    assert.strictEqual(describeError(42), '42');
  });
});
