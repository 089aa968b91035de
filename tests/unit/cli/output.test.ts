/**
 * Unit tests for the CLI output layer
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';

import {
  parsePositiveInt,
  printHealthReport,
  printVMTable,
  reportError,
  settingsFromOptions,
} from '../../../src/cli/output.js';
import { Logger } from '../../../src/lib/logger.js';
import { ConfigError, ProvisioningFailure, VMNotFoundError } from '../../../src/core/errors.js';
import type { VMRecord } from '../../../src/core/lifecycle.js';

type ConsoleMethod = 'log' | 'error' | 'warn';

const RECORD: VMRecord = {
  name: 'web',
  state: 'running',
  session: 'user',
  address: null,
  createdAt: '2024-05-01T10:00:00.000Z',
  domainState: 'running',
  managed: true,
};

describe('settingsFromOptions', () => {
  it('should map session and connection flags', () => {
    assert.deepStrictEqual(settingsFromOptions({}), {});
    assert.deepStrictEqual(settingsFromOptions({ system: true, connect: 'qemu+ssh://lab/system' }), {
      session: 'system',
      connectUri: 'qemu+ssh://lab/system',
    });
  });

  it('should reject both session flags together', () => {
    assert.throws(() => settingsFromOptions({ user: true, system: true }), ConfigError);
  });
});

describe('parsePositiveInt', () => {
  it('should accept whole numbers above zero', () => {
    assert.strictEqual(parsePositiveInt('4', '--vcpus'), 4);
  });

  it('should name the flag when rejecting a value', () => {
    assert.throws(() => parsePositiveInt('0', '--vcpus'), {
      message: "--vcpus must be a positive integer, got '0'",
    });
    assert.throws(() => parsePositiveInt('1.5', '--ram'), ConfigError);
  });
});

describe('presenters', () => {
  const lines: Record<ConsoleMethod, string[]> = { log: [], error: [], warn: [] };

  beforeEach(() => {
    for (const method of ['log', 'error', 'warn'] as const) {
      lines[method] = [];
      mock.method(console, method, (...args: unknown[]) => {
        lines[method].push(args.map(String).join(' '));
      });
    }
  });

  afterEach(() => {
    mock.restoreAll();
  });

  describe('reportError', () => {
    it('should record code, message and suggestion in JSON mode', () => {
      const logger = new Logger('json');

      reportError(logger, new VMNotFoundError('web'));

      const buffer = logger.getJsonBuffer();
      assert.strictEqual(buffer.success, false);
      assert.deepStrictEqual(buffer.error, {
        code: 'VM_NOT_FOUND',
        message: "VM 'web' does not exist",
        suggestion: 'Run `clonebox list` to see existing VMs.',
      });
    });

    it('should report foreign errors as UNKNOWN', () => {
      const logger = new Logger('json');

      reportError(logger, new Error('socket hang up'));

      assert.deepStrictEqual(logger.getJsonBuffer().error, {
        code: 'UNKNOWN',
        message: 'socket hang up',
        suggestion: undefined,
      });
    });

    it('should list schema errors under the message', () => {
      const error = new ConfigError('Invalid clone spec: x.yaml', 'CONFIG_VALIDATION_FAILED', undefined, 'x.yaml', [
        { path: '/vm/name', message: 'must match pattern' },
      ]);

      reportError(new Logger('human'), error);

      assert.deepStrictEqual(lines.error, ['✗ Invalid clone spec: x.yaml']);
      assert.deepStrictEqual(lines.log, ['  - /vm/name: must match pattern']);
    });

    it('should list incomplete rollback steps', () => {
      reportError(new Logger('human'), new ProvisioningFailure('web', 'start-domain', 'boom', ['undo define-domain: busy']));

      assert.deepStrictEqual(lines.error, [
        "✗ Failed to create VM 'web' at step 'start-domain': boom",
        '  Fix: Rollback was incomplete; inspect the backend and backing store manually.',
      ]);
      assert.deepStrictEqual(lines.log, ['  rollback: undo define-domain: busy']);
    });
  });

  describe('printVMTable', () => {
    it('should print one aligned row per VM', () => {
      printVMTable(new Logger('human'), [RECORD]);

      assert.deepStrictEqual(lines.log, [
        'NAME  STATE    ADDRESS  SESSION  CREATED',
        'web   running  -        user     2024-05-01T10:00:00.000Z',
      ]);
    });

    it('should flag domains this engine did not create', () => {
      printVMTable(new Logger('human'), [{ ...RECORD, managed: false, createdAt: null }]);

      assert.strictEqual(lines.log[1], 'web   running (unmanaged)  -        user     -');
    });

    it('should say so when there are no VMs', () => {
      printVMTable(new Logger('human'), []);

      assert.deepStrictEqual(lines.log, ['No VMs.']);
    });
  });

  describe('printHealthReport', () => {
    it('should show passing probes as successes and the rest as warnings', () => {
      printHealthReport(new Logger('human'), {
        vmName: 'web',
        healthy: false,
        checkedAt: '2024-05-01T10:00:00.000Z',
        results: [
          { name: 'http', type: 'tcp', outcome: 'pass', durationMs: 3, detail: 'connected' },
          { name: 'agent', type: 'agent-ping', outcome: 'timeout', durationMs: 5000, detail: 'no reply' },
        ],
      });

      assert.deepStrictEqual(lines.log, ['✓ http (tcp) pass in 3ms: connected', 'web is unhealthy']);
      assert.deepStrictEqual(lines.warn, ['⚠ agent (agent-ping) timeout in 5000ms: no reply']);
    });
  });
});
