/**
 * Audit Command Handlers
 */

import { writeFile } from 'node:fs/promises';

import type { AuditOutcome, AuditQuery } from '../../audit/types.js';
import { ConfigError } from '../../core/errors.js';
import { parsePositiveInt, printAuditEvents, runCommand, type GlobalOptions } from '../output.js';

/**
 * Filters shared by the audit commands
 */
export type AuditCommandOptions = GlobalOptions & {
  since?: string;
  until?: string;
  /** Repeatable */
  kind?: string[];
  target?: string;
  outcome?: string;
  correlation?: string;
  limit?: string;
};

/**
 * Options for audit export
 */
export type AuditExportOptions = AuditCommandOptions & {
  /** Write to a file instead of stdout */
  output?: string;
};

function parseTimestamp(value: string, flag: string): string {
  if (Number.isNaN(Date.parse(value))) {
    throw new ConfigError(`${flag} must be an ISO 8601 timestamp, got '${value}'`, 'CONFIG_VALIDATION_FAILED');
  }
  return value;
}

function parseOutcome(value: string): AuditOutcome {
  if (value !== 'success' && value !== 'failure') {
    throw new ConfigError(`--outcome must be success or failure, got '${value}'`, 'CONFIG_VALIDATION_FAILED');
  }
  return value;
}

/**
 * Build a query from command-line filters.
 */
export function toAuditQuery(options: AuditCommandOptions): AuditQuery {
  const query: AuditQuery = {};
  if (options.since !== undefined) query.since = parseTimestamp(options.since, '--since');
  if (options.until !== undefined) query.until = parseTimestamp(options.until, '--until');
  if (options.kind !== undefined && options.kind.length > 0) query.kinds = options.kind;
  if (options.target !== undefined) query.target = options.target;
  if (options.outcome !== undefined) query.outcome = parseOutcome(options.outcome);
  if (options.correlation !== undefined) query.correlationId = options.correlation;
  if (options.limit !== undefined) query.limit = parsePositiveInt(options.limit, '--limit');
  return query;
}

/**
 * List audit events matching the filters.
 */
export async function auditListCommand(options: AuditCommandOptions): Promise<void> {
  await runCommand('audit list', options, async ({ logger, engine }) => {
    const events = engine.audit.query(toAuditQuery(options));
    printAuditEvents(logger, events);
    logger.setData({ events });
  });
}

/**
 * Full-text search over event kinds, targets and details.
 */
export async function auditSearchCommand(text: string, options: AuditCommandOptions): Promise<void> {
  await runCommand('audit search', options, async ({ logger, engine }) => {
    const events = engine.audit.search(text, toAuditQuery(options));
    printAuditEvents(logger, events);
    logger.setData({ query: text, events });
  });
}

/**
 * Export matching events as JSON lines.
 */
export async function auditExportCommand(options: AuditExportOptions): Promise<void> {
  await runCommand('audit export', options, async ({ logger, engine }) => {
    const lines = engine.audit.export(toAuditQuery(options));
    if (options.output !== undefined) {
      await writeFile(options.output, lines, { encoding: 'utf-8', mode: 0o600 });
      logger.success(`Exported audit events to ${options.output}`);
    } else if (logger.getMode() === 'human') {
      process.stdout.write(lines);
    }
    logger.setData({ path: options.output, lines: lines === '' ? 0 : lines.trimEnd().split('\n').length });
  });
}
