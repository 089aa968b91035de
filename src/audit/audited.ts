/**
 * Wrap an operation so its outcome lands in the audit log.
 */

import type { AuditSink } from './types.js';
import { describeError, isCloneboxError } from '../core/errors.js';

/**
 * Run `operation` and record one success or failure event for it.
 *
 * Errors are recorded and rethrown unchanged.
 *
 * @param detail - Detail recorded with both outcomes
 * @param summarize - Extra detail derived from a successful result
 */
export async function audited<T>(
  sink: AuditSink,
  kind: string,
  target: string,
  detail: Record<string, unknown>,
  operation: () => Promise<T>,
  summarize?: (result: T) => Record<string, unknown>
): Promise<T> {
  let result: T;
  try {
    result = await operation();
  } catch (error) {
    sink.record({
      kind,
      target,
      outcome: 'failure',
      detail: {
        ...detail,
        error: describeError(error),
        ...(isCloneboxError(error) ? { code: error.code } : {}),
      },
    });
    throw error;
  }
  sink.record({
    kind,
    target,
    outcome: 'success',
    detail: summarize ? { ...detail, ...summarize(result) } : detail,
  });
  return result;
}
