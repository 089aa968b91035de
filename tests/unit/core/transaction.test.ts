/**
 * Unit tests for the reversible step transaction
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { Transaction, runTransaction } from '../../../src/core/transaction.js';
import { OperationCancelled, ProvisioningFailure } from '../../../src/core/errors.js';
import { Logger } from '../../../src/lib/logger.js';

function quietLogger(): Logger {
  return new Logger('json');
}

describe('Transaction', () => {
  it('should undo completed steps in reverse order', async () => {
    const undone: string[] = [];
    const tx = new Transaction('web', quietLogger());

    await tx.step('one', async () => 1, async () => void undone.push('one'));
    await tx.step('two', async () => 2, async () => void undone.push('two'));
    await tx.step('no-undo', async () => 3);

    assert.deepStrictEqual(await tx.rollback(), []);
    assert.deepStrictEqual(undone, ['two', 'one']);
  });

  it('should pass each step result to its undo', async () => {
    let seen = '';
    const tx = new Transaction('web', quietLogger());

    await tx.step('alloc', async () => '/tmp/disk', async (path) => {
      seen = path;
    });
    await tx.rollback();

    assert.strictEqual(seen, '/tmp/disk');
  });

  it('should not register the undo of a failed step', async () => {
    const undone: string[] = [];
    const tx = new Transaction('web', quietLogger());

    await assert.rejects(
      tx.step(
        'fails',
        async () => {
          throw new Error('boom');
        },
        async () => void undone.push('fails')
      ),
      /boom/
    );

    assert.strictEqual(tx.currentStep, 'fails');
    await tx.rollback();
    assert.deepStrictEqual(undone, []);
  });

  it('should keep undoing after an undo fails and collect the failures', async () => {
    const logger = quietLogger();
    const undone: string[] = [];
    const tx = new Transaction('web', logger);

    await tx.step('one', async () => 1, async () => void undone.push('one'));
    await tx.step('two', async () => 2, async () => {
      throw new Error('busy');
    });

    assert.deepStrictEqual(await tx.rollback(), ['undo two: busy']);
    assert.deepStrictEqual(undone, ['one']);
    assert.deepStrictEqual(logger.getJsonBuffer().warnings, ['web: undo two: busy']);
  });

  it('should discard undos on commit and refuse further steps', async () => {
    const tx = new Transaction('web', quietLogger());
    await tx.step('one', async () => 1, async () => {
      throw new Error('must not run');
    });

    tx.commit();

    assert.deepStrictEqual(await tx.rollback(), []);
    await assert.rejects(tx.step('late', async () => 2), /already committed/);
  });

  it('should cancel after a step finishes if the signal aborted meanwhile', async () => {
    const controller = new AbortController();
    const undone: string[] = [];
    const tx = new Transaction('web', quietLogger(), controller.signal);

    await assert.rejects(
      tx.step(
        'define-domain',
        async () => {
          controller.abort();
        },
        async () => void undone.push('define-domain')
      ),
      (error: unknown) => error instanceof OperationCancelled && error.step === 'define-domain'
    );

    await tx.rollback();
    assert.deepStrictEqual(undone, ['define-domain']);
  });
});

describe('runTransaction', () => {
  it('should return the body result and commit', async () => {
    const result = await runTransaction('web', quietLogger(), async (tx) => {
      await tx.step('one', async () => 1);
      return 'done';
    });

    assert.strictEqual(result, 'done');
  });

  it('should wrap failures with the failing step after rolling back', async () => {
    const undone: string[] = [];

    await assert.rejects(
      runTransaction('web', quietLogger(), async (tx) => {
        await tx.step('allocate-storage', async () => 1, async () => void undone.push('allocate-storage'));
        await tx.step('define-domain', async () => {
          throw new Error('no such network');
        });
      }),
      (error: unknown) =>
        error instanceof ProvisioningFailure &&
        error.step === 'define-domain' &&
        error.message === "Failed to create VM 'web' at step 'define-domain': no such network"
    );
    assert.deepStrictEqual(undone, ['allocate-storage']);
  });

  it('should rethrow a clean cancellation unchanged', async () => {
    await assert.rejects(
      runTransaction(
        'web',
        quietLogger(),
        async (tx) => {
          await tx.step('allocate-storage', async () => 1);
        },
        AbortSignal.abort()
      ),
      OperationCancelled
    );
  });

  it('should report a cancellation with a failed undo as a provisioning failure', async () => {
    const controller = new AbortController();

    await assert.rejects(
      runTransaction(
        'web',
        quietLogger(),
        async (tx) => {
          await tx.step(
            'allocate-storage',
            async () => controller.abort(),
            async () => {
              throw new Error('disk busy');
            }
          );
        },
        controller.signal
      ),
      (error: unknown) =>
        error instanceof ProvisioningFailure &&
        error.reason instanceof OperationCancelled &&
        error.rollbackErrors[0] === 'undo allocate-storage: disk busy'
    );
  });
});
