/**
 * VM Command Handlers
 *
 * create, start, stop, restart, delete, list, status and health for a
 * single VM.
 */

import { loadCloneSpec } from '../../config/loader.js';
import { getCloneSpecPath } from '../../lib/paths.js';
import { VMNotFoundError } from '../../core/errors.js';
import type { CreateResult } from '../../core/lifecycle.js';
import type { Logger } from '../../lib/logger.js';
import type { HealthCheckDecl } from '../../config/types.js';
import {
  interruptSignal,
  printHealthReport,
  printVMTable,
  runCommand,
  type GlobalOptions,
} from '../output.js';

/**
 * Options for the create command
 */
export type CreateCommandOptions = GlobalOptions & {
  /** Skip post-boot health verification */
  verify?: boolean;
};

/**
 * Options for the stop command
 */
export type StopCommandOptions = GlobalOptions & {
  force?: boolean;
};

/**
 * Options for the health command
 */
export type HealthCommandOptions = GlobalOptions & {
  /** Only TCP probes */
  quick?: boolean;
  /** Spec file to take probes from when the VM has none stored */
  spec?: string;
};

/**
 * Probes used for VMs whose spec declares none
 */
export const FALLBACK_PROBES: HealthCheckDecl[] = [{ name: 'agent', type: 'agent-ping' }];

function reportCredentials(logger: Logger, result: CreateResult): void {
  const { credentials } = result;
  logger.info(`Login user: ${credentials.username}`);
  if (credentials.password && credentials.expire && logger.getMode() === 'human') {
    // Shown once; never written to the store or the audit log
    logger.info(`One-time password: ${credentials.password.reveal()} (must be changed at first login)`);
  }
}

/**
 * Create a VM from a clone spec file or a directory holding .clonebox.yaml.
 */
export async function createCommand(target: string | undefined, options: CreateCommandOptions): Promise<void> {
  await runCommand('create', options, async ({ logger, engine }) => {
    const specPath = getCloneSpecPath(target ?? '.');
    logger.info(`Loading clone spec: ${specPath}`);
    const loaded = await loadCloneSpec(specPath, engine.settings.defaults);
    if (loaded.unmapped.length > 0) {
      logger.warning(`Fields not carried into schema v2: ${loaded.unmapped.join(', ')}`);
    }

    const result = await engine.lifecycle.create(loaded.spec, {
      signal: interruptSignal(),
      verify: options.verify !== false,
    });

    logger.newline();
    printVMTable(logger, [result.record]);
    reportCredentials(logger, result);
    if (result.health) {
      logger.newline();
      printHealthReport(logger, result.health);
    }
    logger.setData({ vm: result.record, username: result.credentials.username, health: result.health });
  });
}

/**
 * Start a stopped VM.
 */
export async function startCommand(name: string, options: GlobalOptions): Promise<void> {
  await runCommand('start', options, async ({ logger, engine }) => {
    const record = await engine.lifecycle.start(name, { signal: interruptSignal() });
    logger.setData({ vm: record });
  });
}

/**
 * Stop a running VM.
 */
export async function stopCommand(name: string, options: StopCommandOptions): Promise<void> {
  await runCommand('stop', options, async ({ logger, engine }) => {
    const record = await engine.lifecycle.stop(name, { force: options.force, signal: interruptSignal() });
    logger.setData({ vm: record });
  });
}

/**
 * Stop (if running) and start a VM.
 */
export async function restartCommand(name: string, options: GlobalOptions): Promise<void> {
  await runCommand('restart', options, async ({ logger, engine }) => {
    const record = await engine.lifecycle.restart(name, { signal: interruptSignal() });
    logger.setData({ vm: record });
  });
}

/**
 * Delete a VM and its backing store.
 */
export async function deleteCommand(name: string, options: GlobalOptions): Promise<void> {
  await runCommand('delete', options, async ({ logger, engine }) => {
    const deleted = await engine.lifecycle.delete(name);
    logger.setData({ name, deleted });
  });
}

/**
 * List VMs created by this engine.
 */
export async function listCommand(options: GlobalOptions): Promise<void> {
  await runCommand('list', options, async ({ logger, engine }) => {
    const records = await engine.lifecycle.list();
    printVMTable(logger, records);
    logger.setData({ vms: records });
  });
}

/**
 * Show one VM and the resources it was created with.
 */
export async function statusCommand(name: string, options: GlobalOptions): Promise<void> {
  await runCommand('status', options, async ({ logger, engine }) => {
    const record = await engine.lifecycle.status(name);
    if (record.state === 'absent') {
      throw new VMNotFoundError(name);
    }
    const spec = await engine.lifecycle.getSpec(name);

    printVMTable(logger, [record]);
    if (spec) {
      const { ramMb, vcpus, diskGb } = spec.vm.resources;
      logger.newline();
      logger.info(`Resources: ${vcpus} vCPU, ${ramMb} MiB RAM, ${diskGb} GiB disk`);
      if (spec.mounts.length > 0) {
        logger.info('Mounts:');
        logger.indent();
        for (const mount of spec.mounts) {
          logger.info(`${mount.hostPath} -> ${mount.guestPath}`);
        }
        logger.dedent();
      }
    }
    logger.setData({ vm: record, spec });
  });
}

/**
 * Run a VM's health probes once.
 *
 * Exits 1 when any probe does not pass.
 */
export async function healthCommand(name: string, options: HealthCommandOptions): Promise<void> {
  await runCommand('health', options, async ({ logger, engine }) => {
    const spec =
      options.spec !== undefined
        ? (await loadCloneSpec(getCloneSpecPath(options.spec), engine.settings.defaults)).spec
        : await engine.lifecycle.getSpec(name);
    const probes = spec?.healthChecks ?? FALLBACK_PROBES;

    const report = await engine.health.check(name, probes, { quick: options.quick });
    printHealthReport(logger, report);
    logger.setData(report);
    return report.healthy;
  });
}
