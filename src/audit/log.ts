/**
 * Audit Log
 *
 * Append-only JSON Lines file with an in-memory index ordered by
 * timestamp. record() never blocks or throws: the sequence number is
 * assigned synchronously and the line is appended in the background.
 * A failed append is reported as a logger warning.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { hostname, userInfo } from 'node:os';
import { dirname } from 'node:path';

import type { AuditEvent, AuditInput, AuditOutcome, AuditQuery, AuditSink } from './types.js';
import type { Logger } from '../lib/logger.js';
import { describeError } from '../core/errors.js';
import { errnoCode } from '../lib/fs.js';

/**
 * Options for constructing an AuditLog
 */
export interface AuditLogOptions {
  /** Path of the JSONL file */
  path: string;
  logger: Logger;
  /** Actor stamped on events that do not name one */
  actor?: string;
  /** Time source (tests) */
  clock?: () => Date;
}

/**
 * user@host of the current process.
 */
export function currentActor(): string {
  let user: string;
  try {
    user = userInfo().username;
  } catch {
    // No passwd entry for the uid (containers)
    user = process.env['USER'] ?? String(process.getuid?.() ?? 'unknown');
  }
  return `${user}@${hostname()}`;
}

function isOutcome(value: unknown): value is AuditOutcome {
  return value === 'success' || value === 'failure';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one parsed JSONL line.
 */
export function parseAuditEvent(value: unknown): AuditEvent | null {
  if (!isRecord(value)) return null;
  const { seq, timestamp, actor, kind, target, outcome, correlationId, detail } = value;
  if (
    typeof seq !== 'number' ||
    typeof timestamp !== 'string' ||
    Number.isNaN(Date.parse(timestamp)) ||
    typeof actor !== 'string' ||
    typeof kind !== 'string' ||
    typeof target !== 'string' ||
    !isOutcome(outcome)
  ) {
    return null;
  }
  const event: AuditEvent = { seq, timestamp, actor, kind, target, outcome, detail: isRecord(detail) ? detail : {} };
  if (typeof correlationId === 'string') {
    event.correlationId = correlationId;
  }
  return event;
}

/**
 * Serialize an event with a fixed field order.
 */
export function formatAuditEvent(event: AuditEvent): string {
  return JSON.stringify({
    seq: event.seq,
    timestamp: event.timestamp,
    actor: event.actor,
    kind: event.kind,
    target: event.target,
    outcome: event.outcome,
    correlationId: event.correlationId,
    detail: event.detail,
  });
}

/**
 * Detached copy of a stored event; the log itself is never mutated.
 */
function copyEvent(event: AuditEvent): AuditEvent {
  return { ...event, detail: structuredClone(event.detail) };
}

function toMillis(value: string | Date): number {
  return value instanceof Date ? value.getTime() : Date.parse(value);
}

/**
 * First index whose time is >= target.
 */
function lowerBound(times: number[], target: number): number {
  let lo = 0;
  let hi = times.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((times[mid] ?? Infinity) < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * First index whose time is > target.
 */
function upperBound(times: number[], target: number): number {
  let lo = 0;
  let hi = times.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((times[mid] ?? Infinity) <= target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * File-backed audit log.
 */
export class AuditLog implements AuditSink {
  private readonly path: string;
  private readonly logger: Logger;
  private readonly actor: string;
  private readonly clock: () => Date;

  private readonly events: AuditEvent[] = [];
  /** Epoch milliseconds, parallel to events and non-decreasing */
  private readonly times: number[] = [];
  private nextSeq = 1;
  private lastTime = 0;
  private pending: Promise<void> = Promise.resolve();
  private dirReady = false;
  private readonly correlation = new AsyncLocalStorage<string>();

  constructor(options: AuditLogOptions) {
    this.path = options.path;
    this.logger = options.logger;
    this.actor = options.actor ?? currentActor();
    this.clock = options.clock ?? (() => new Date());
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Load events already in the file. A missing file is an empty log;
   * malformed lines are skipped with a warning.
   */
  async open(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return;
      }
      throw error;
    }

    const loaded: AuditEvent[] = [];
    content.split('\n').forEach((line, index) => {
      if (line.trim() === '') return;
      let event: AuditEvent | null = null;
      try {
        event = parseAuditEvent(JSON.parse(line));
      } catch {
        event = null;
      }
      if (event) {
        loaded.push(event);
      } else {
        this.logger.warning(`Skipping malformed audit line ${index + 1} in ${this.path}`);
      }
    });

    loaded.sort((a, b) => a.seq - b.seq);
    this.events.length = 0;
    this.times.length = 0;
    for (const event of loaded) {
      // Clamp so the index stays sorted even if the file was edited by hand
      const time = Math.max(Date.parse(event.timestamp), this.lastTime);
      this.lastTime = time;
      this.events.push(event);
      this.times.push(time);
      this.nextSeq = Math.max(this.nextSeq, event.seq + 1);
    }
  }

  /**
   * Append an event. Returns immediately with a copy of the stored record.
   */
  record(input: AuditInput): AuditEvent {
    const time = Math.max(this.clock().getTime(), this.lastTime);
    this.lastTime = time;

    const event: AuditEvent = {
      seq: this.nextSeq++,
      timestamp: new Date(time).toISOString(),
      actor: input.actor ?? this.actor,
      kind: input.kind,
      target: input.target,
      outcome: input.outcome,
      detail: structuredClone(input.detail ?? {}),
    };
    const correlationId = input.correlationId ?? this.correlation.getStore();
    if (correlationId !== undefined) {
      event.correlationId = correlationId;
    }
    this.events.push(event);
    this.times.push(time);

    const line = `${formatAuditEvent(event)}\n`;
    this.pending = this.pending
      .then(() => this.append(line))
      .catch((error: unknown) => {
        this.logger.warning(`Audit log write failed (${this.path}): ${describeError(error)}`);
      });

    return copyEvent(event);
  }

  correlate<T>(operation: (correlationId: string) => Promise<T>, correlationId?: string): Promise<T> {
    const id = correlationId ?? this.correlation.getStore() ?? randomUUID();
    return this.correlation.run(id, () => operation(id));
  }

  private async append(line: string): Promise<void> {
    if (!this.dirReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.path, line, 'utf-8');
  }

  /**
   * Wait until every recorded event has been written (or has failed).
   */
  async flush(): Promise<void> {
    await this.pending;
  }

  /**
   * Copies of the events matching the filter, oldest first.
   *
   * The time range is located by binary search on the index; only events
   * inside it are examined.
   */
  query(filter: AuditQuery = {}): AuditEvent[] {
    const start = filter.since !== undefined ? lowerBound(this.times, toMillis(filter.since)) : 0;
    const end =
      filter.until !== undefined ? upperBound(this.times, toMillis(filter.until)) : this.times.length;

    const kinds = filter.kinds !== undefined && filter.kinds.length > 0 ? new Set(filter.kinds) : null;
    const matches: AuditEvent[] = [];
    for (let i = start; i < end; i++) {
      const event = this.events[i];
      if (event === undefined) continue;
      if (kinds && !kinds.has(event.kind)) continue;
      if (filter.target !== undefined && event.target !== filter.target) continue;
      if (filter.outcome !== undefined && event.outcome !== filter.outcome) continue;
      if (filter.correlationId !== undefined && event.correlationId !== filter.correlationId) continue;
      matches.push(copyEvent(event));
    }

    if (filter.limit !== undefined && matches.length > filter.limit) {
      return matches.slice(matches.length - filter.limit);
    }
    return matches;
  }

  /**
   * Case-insensitive substring search over every field.
   */
  search(text: string, filter: AuditQuery = {}): AuditEvent[] {
    const needle = text.toLowerCase();
    const { limit, ...range } = filter;
    const matches = this.query(range).filter((event) =>
      formatAuditEvent(event).toLowerCase().includes(needle)
    );
    if (limit !== undefined && matches.length > limit) {
      return matches.slice(matches.length - limit);
    }
    return matches;
  }

  /**
   * Matching events as JSON Lines.
   */
  export(filter: AuditQuery = {}): string {
    return this.query(filter)
      .map((event) => `${formatAuditEvent(event)}\n`)
      .join('');
  }

  /**
   * Number of events in the log.
   */
  size(): number {
    return this.events.length;
  }
}
