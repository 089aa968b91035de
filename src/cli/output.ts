/**
 * CLI Output Layer
 *
 * Shared plumbing for command handlers: turning global flags into engine
 * settings, running a handler against a fresh engine, reporting errors,
 * and presenting engine results in human and JSON modes.
 */

import { Logger } from '../lib/logger.js';
import { createEngine, type Engine } from '../core/context.js';
import { resolveSettings, type SettingsOverrides } from '../config/settings.js';
import {
  ConfigError,
  ProvisioningFailure,
  describeError,
  getExitCode,
  isCloneboxError,
} from '../core/errors.js';
import type { VMRecord } from '../core/lifecycle.js';
import type { HealthReport } from '../core/health.js';
import type { Snapshot } from '../core/snapshots.js';
import type { ComposeResult, MemberState } from '../compose/orchestrator.js';
import type { AuditEvent } from '../audit/types.js';
import type { DetectedItem } from '../detect/types.js';

/**
 * Flags accepted by every command
 */
export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
  /** Use the per-user libvirt session */
  user?: boolean;
  /** Use the system-wide libvirt session */
  system?: boolean;
  /** libvirt connection URI */
  connect?: string;
};

/**
 * What a command handler works with
 */
export interface CommandContext {
  logger: Logger;
  engine: Engine;
}

/**
 * Settings overrides named by the global flags.
 *
 * @throws ConfigError if both session flags are given
 */
export function settingsFromOptions(options: GlobalOptions): SettingsOverrides {
  if (options.user && options.system) {
    throw new ConfigError(
      '--user and --system are mutually exclusive',
      'CONFIG_VALIDATION_FAILED',
      'Pass only one session flag.'
    );
  }
  const overrides: SettingsOverrides = {};
  if (options.user) overrides.session = 'user';
  if (options.system) overrides.session = 'system';
  if (options.connect !== undefined) overrides.connectUri = options.connect;
  return overrides;
}

/**
 * Report an error through the logger.
 */
export function reportError(logger: Logger, error: unknown): void {
  if (isCloneboxError(error)) {
    logger.error(error.message, error);
    if (logger.getMode() === 'human') {
      if (error instanceof ConfigError && error.validationErrors) {
        logger.indent();
        for (const issue of error.validationErrors) {
          logger.info(`- ${issue.path}: ${issue.message}`);
        }
        logger.dedent();
      }
      if (error instanceof ProvisioningFailure) {
        logger.indent();
        for (const rollbackError of error.rollbackErrors) {
          logger.info(`rollback: ${rollbackError}`);
        }
        logger.dedent();
      }
    }
  } else {
    logger.error(describeError(error));
  }
}

/**
 * Run a command handler against a fresh engine, then exit.
 *
 * The handler returns false to signal a partial failure (exit code 1);
 * thrown errors exit with their own code.
 *
 * @param extra - Settings the command itself fixes (e.g. a remote URI)
 */
export async function runCommand(
  command: string,
  options: GlobalOptions,
  handler: (context: CommandContext) => Promise<boolean | void>,
  extra: SettingsOverrides = {}
): Promise<never> {
  const logger = Logger.fromOptions(options);
  logger.setCommand(command);

  let engine: Engine | undefined;
  let exitCode = 0;
  try {
    const settings = resolveSettings({ ...settingsFromOptions(options), ...extra });
    engine = await createEngine(settings, { logger });
    if ((await handler({ logger, engine })) === false) {
      logger.setSuccess(false);
      exitCode = 1;
    }
  } catch (error) {
    reportError(logger, error);
    exitCode = getExitCode(error);
  }

  if (engine) {
    try {
      await engine.close();
    } catch (error) {
      logger.warning(`Could not flush the audit log: ${describeError(error)}`);
    }
  }
  logger.flush();
  process.exit(exitCode);
}

/**
 * Abort signal fired by Ctrl-C, so long operations roll back cleanly.
 */
export function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());
  return controller.signal;
}

/**
 * Parse a positive integer option value.
 *
 * @throws ConfigError
 */
export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${flag} must be a positive integer, got '${value}'`, 'CONFIG_VALIDATION_FAILED');
  }
  return parsed;
}

// =============================================================================
// Presenters
// =============================================================================

/**
 * Print a table of VM records.
 */
export function printVMTable(logger: Logger, records: VMRecord[]): void {
  if (records.length === 0) {
    logger.info('No VMs.');
    return;
  }
  logger.table(
    ['NAME', 'STATE', 'ADDRESS', 'SESSION', 'CREATED'],
    records.map((record) => [
      record.name,
      record.managed ? record.state : `${record.state} (unmanaged)`,
      record.address ?? '-',
      record.session,
      record.createdAt ?? '-',
    ])
  );
}

/**
 * Print a health report, one line per probe.
 */
export function printHealthReport(logger: Logger, report: HealthReport): void {
  if (report.results.length === 0) {
    logger.info(`${report.vmName}: no probes to run`);
    return;
  }
  for (const result of report.results) {
    const line = `${result.name} (${result.type}) ${result.outcome} in ${result.durationMs}ms: ${result.detail}`;
    if (result.outcome === 'pass') {
      logger.success(line);
    } else {
      logger.warning(line);
    }
  }
  logger.info(`${report.vmName} is ${report.healthy ? 'healthy' : 'unhealthy'}`);
}

/**
 * Print snapshots of a VM.
 */
export function printSnapshots(logger: Logger, snapshots: Snapshot[]): void {
  if (snapshots.length === 0) {
    logger.info('No snapshots.');
    return;
  }
  logger.table(
    ['NAME', 'CREATED'],
    snapshots.map((snapshot) => [snapshot.name, snapshot.createdAt])
  );
}

/**
 * Print the per-member outcome of compose up or down.
 */
export function printComposeResult(logger: Logger, result: ComposeResult): void {
  logger.table(
    ['MEMBER', 'VM', 'STATUS', 'ERROR'],
    result.members.map((member) => [member.member, member.vmName, member.status, member.error ?? ''])
  );
  if (!result.success) {
    logger.newline();
    logger.warning(`Compose group '${result.group}' did not complete`);
  }
}

/**
 * Print the current state of compose members.
 */
export function printMemberStates(logger: Logger, members: MemberState[]): void {
  logger.table(
    ['MEMBER', 'VM', 'STATE', 'ADDRESS', 'DEPENDS ON'],
    members.map((member) => [
      member.member,
      member.vmName,
      member.state,
      member.address ?? '-',
      member.dependsOn.join(', ') || '-',
    ])
  );
}

/**
 * Print audit events, oldest first.
 */
export function printAuditEvents(logger: Logger, events: AuditEvent[]): void {
  if (events.length === 0) {
    logger.info('No matching audit events.');
    return;
  }
  logger.table(
    ['SEQ', 'TIME', 'ACTOR', 'KIND', 'TARGET', 'OUTCOME'],
    events.map((event) => [
      String(event.seq),
      event.timestamp,
      event.actor,
      event.kind,
      event.target,
      event.outcome,
    ])
  );
}

/**
 * Print detections, highest confidence first.
 */
export function printDetections(logger: Logger, items: DetectedItem[]): void {
  if (items.length === 0) {
    logger.info('Nothing detected.');
    return;
  }
  logger.table(
    ['KIND', 'NAME', 'CONFIDENCE', 'SUGGESTION', 'SOURCE'],
    items.map((item) => [
      item.kind,
      item.name,
      item.confidence.toFixed(2),
      item.package ?? item.guestPath ?? '-',
      `${item.source.probe}: ${item.source.evidence}`,
    ])
  );
}
