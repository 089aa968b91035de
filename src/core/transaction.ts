/**
 * Reversible Step Transaction
 *
 * Runs a sequence of named steps. Each completed step registers an undo
 * action; on failure or cancellation the undo actions run in reverse order
 * and every undo failure is collected rather than aborting the rollback.
 */

import type { Logger } from '../lib/logger.js';
import {
  OperationCancelled,
  ProvisioningFailure,
  describeError,
} from './errors.js';

interface UndoEntry {
  step: string;
  undo: () => Promise<void>;
}

/**
 * A single reversible unit of work for one VM.
 */
export class Transaction {
  private readonly undos: UndoEntry[] = [];
  private current: string | undefined;
  private committed = false;

  constructor(
    private readonly vmName: string,
    private readonly logger: Logger,
    private readonly signal?: AbortSignal
  ) {}

  /**
   * Name of the step that is running or last ran.
   */
  get currentStep(): string | undefined {
    return this.current;
  }

  /**
   * Run one step.
   *
   * The undo action is registered only once `run` resolves. A signal
   * aborted before or during the step raises OperationCancelled after the
   * step's own undo has been registered.
   */
  async step<T>(
    name: string,
    run: () => Promise<T>,
    undo?: (result: T) => Promise<void>
  ): Promise<T> {
    if (this.committed) {
      throw new Error(`Transaction for '${this.vmName}' is already committed`);
    }
    this.current = name;
    if (this.signal?.aborted) {
      throw new OperationCancelled(this.vmName, name);
    }

    this.logger.step(this.vmName, name, 'starting');
    let result: T;
    try {
      result = await run();
    } catch (error) {
      this.logger.step(this.vmName, name, 'failed');
      throw error;
    }
    if (undo) {
      this.undos.push({ step: name, undo: () => undo(result) });
    }
    this.logger.step(this.vmName, name, 'completed');

    if (this.signal?.aborted) {
      throw new OperationCancelled(this.vmName, name);
    }
    return result;
  }

  /**
   * Mark the transaction successful; undo actions are discarded.
   */
  commit(): void {
    this.committed = true;
    this.undos.length = 0;
  }

  /**
   * Undo completed steps in reverse order.
   *
   * @returns One message per undo action that failed
   */
  async rollback(): Promise<string[]> {
    const errors: string[] = [];
    while (this.undos.length > 0) {
      const entry = this.undos.pop();
      if (!entry) break;
      try {
        await entry.undo();
        this.logger.step(this.vmName, entry.step, 'undone');
      } catch (error) {
        const message = `undo ${entry.step}: ${describeError(error)}`;
        this.logger.warning(`${this.vmName}: ${message}`);
        errors.push(message);
      }
    }
    return errors;
  }
}

/**
 * Run `body` inside a transaction, rolling back on any failure.
 *
 * @throws OperationCancelled if the signal aborted the work
 * @throws ProvisioningFailure for any other failure, after rollback
 */
export async function runTransaction<T>(
  vmName: string,
  logger: Logger,
  body: (tx: Transaction) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  const tx = new Transaction(vmName, logger, signal);
  try {
    const result = await body(tx);
    tx.commit();
    return result;
  } catch (error) {
    const rollbackErrors = await tx.rollback();
    if (error instanceof OperationCancelled && rollbackErrors.length === 0) {
      throw error;
    }
    throw new ProvisioningFailure(vmName, tx.currentStep ?? 'prepare', error, rollbackErrors);
  }
}
