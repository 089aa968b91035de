/**
 * Unit tests for the Command Executor
 *
 * Child processes are the running Node binary itself, so the tests need no
 * host tools.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { ExecutorError, ProcessExecutor, formatErrorMessage } from '../../../src/backend/executor.js';

const NODE = process.execPath;

describe('formatErrorMessage', () => {
  it('should prefer the first virsh error line and the line after it', () => {
    const stderr = "warning: ignored\nerror: failed to get domain 'web'\nerror: Domain not found\n";

    assert.strictEqual(
      formatErrorMessage('virsh', stderr, 1),
      "failed to get domain 'web' | error: Domain not found"
    );
  });

  it('should strip ANSI codes and fall back to the first lines', () => {
    assert.strictEqual(formatErrorMessage('genisoimage', '\x1b[31mbad\x1b[0m\r\nworse\n', 2), 'bad | worse');
  });

  it('should name the exit code when stderr is empty', () => {
    assert.strictEqual(formatErrorMessage('virsh', '', 3), 'virsh exited with code 3');
  });
});

describe('ProcessExecutor', () => {
  const executor = new ProcessExecutor();

  it('should collect stdout and stderr', async () => {
    const result = await executor.run(NODE, ['-e', 'process.stdout.write("out"); process.stderr.write("err")']);

    assert.deepStrictEqual(result, { stdout: 'out', stderr: 'err' });
  });

  it('should reject a non-zero exit with the exit code and stderr', async () => {
    await assert.rejects(
      executor.run(NODE, ['-e', 'process.stderr.write("error: domain is not running\\n"); process.exit(4)']),
      (error: unknown) =>
        error instanceof ExecutorError &&
        error.code === 'EXECUTION_FAILED' &&
        error.exitCode === 4 &&
        error.message === 'domain is not running' &&
        error.stderr === 'error: domain is not running\n'
    );
  });

  it('should report a missing program as not available', async () => {
    await assert.rejects(
      executor.run('clonebox-no-such-tool', []),
      (error: unknown) => error instanceof ExecutorError && error.code === 'NOT_AVAILABLE'
    );
  });

  it('should kill a command that outlives its timeout', async () => {
    await assert.rejects(
      executor.run(NODE, ['-e', 'setTimeout(() => {}, 10000)'], { timeout: 100 }),
      (error: unknown) =>
        error instanceof ExecutorError && error.code === 'TIMEOUT' && error.message.endsWith('timed out after 100ms')
    );
  });

  it('should cancel when the signal aborts', async () => {
    const controller = new AbortController();
    const running = executor.run(NODE, ['-e', 'setTimeout(() => {}, 10000)'], { signal: controller.signal });
    setTimeout(() => controller.abort(), 50);

    await assert.rejects(running, (error: unknown) => error instanceof ExecutorError && error.code === 'CANCELLED');
  });

  it('should not start a command whose signal already aborted', async () => {
    await assert.rejects(
      executor.run(NODE, ['-e', ''], { signal: AbortSignal.abort() }),
      (error: unknown) => error instanceof ExecutorError && error.code === 'CANCELLED'
    );
  });
});
