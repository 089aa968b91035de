/**
 * Audit Event Types
 */

/**
 * Result of an audited operation
 */
export type AuditOutcome = 'success' | 'failure';

/**
 * One append-only audit record.
 *
 * Field names are stable: exports written by one version are read by the next.
 */
export interface AuditEvent {
  /** Monotonic, starts at 1 */
  seq: number;
  /** ISO 8601, non-decreasing in seq order */
  timestamp: string;
  /** user@host that ran the operation */
  actor: string;
  /** Dotted event kind, e.g. vm.create, snapshot.restore, compose.up */
  kind: string;
  /** VM or compose group the event is about */
  target: string;
  outcome: AuditOutcome;
  /** Shared by every event of one compound operation (e.g. a compose up) */
  correlationId?: string;
  detail: Record<string, unknown>;
}

/**
 * What callers pass to record(); the log fills in the rest
 */
export interface AuditInput {
  kind: string;
  target: string;
  outcome: AuditOutcome;
  detail?: Record<string, unknown>;
  actor?: string;
  /** Defaults to the id of the enclosing correlate() call */
  correlationId?: string;
}

/**
 * Filters for query() and export()
 */
export interface AuditQuery {
  /** Inclusive lower bound (ISO 8601 or Date) */
  since?: string | Date;
  /** Inclusive upper bound (ISO 8601 or Date) */
  until?: string | Date;
  kinds?: string[];
  target?: string;
  outcome?: AuditOutcome;
  correlationId?: string;
  /** Keep only the most recent N matches */
  limit?: number;
}

/**
 * Anything that can take audit events.
 *
 * Components depend on this rather than the file-backed log.
 */
export interface AuditSink {
  record(input: AuditInput): AuditEvent;
  /**
   * Run `operation` so that every event it records carries one
   * correlation id, which is also passed to it. Nested calls without an
   * id keep the outer one.
   */
  correlate<T>(operation: (correlationId: string) => Promise<T>, correlationId?: string): Promise<T>;
}
