/**
 * Snapshot Command Handlers
 */

import type { RetentionPolicy } from '../../core/snapshots.js';
import { interruptSignal, parsePositiveInt, printSnapshots, runCommand, type GlobalOptions } from '../output.js';

/**
 * Options for snapshot prune
 */
export type SnapshotPruneOptions = GlobalOptions & {
  keep?: string;
  maxAgeDays?: string;
  minKeep?: string;
  prefix?: string;
};

/**
 * Build a retention policy from command-line flags.
 */
export function toRetentionPolicy(options: SnapshotPruneOptions): RetentionPolicy {
  const policy: RetentionPolicy = {};
  if (options.keep !== undefined) policy.maxSnapshots = parsePositiveInt(options.keep, '--keep');
  if (options.maxAgeDays !== undefined) policy.maxAgeDays = parsePositiveInt(options.maxAgeDays, '--max-age-days');
  if (options.minKeep !== undefined) policy.minSnapshots = parsePositiveInt(options.minKeep, '--min-keep');
  if (options.prefix !== undefined) policy.prefix = options.prefix;
  return policy;
}

/**
 * Take a snapshot of a VM.
 */
export async function snapshotCreateCommand(vm: string, snapshot: string, options: GlobalOptions): Promise<void> {
  await runCommand('snapshot create', options, async ({ logger, engine }) => {
    logger.setData({ snapshot: await engine.snapshots.create(vm, snapshot) });
  });
}

/**
 * List a VM's snapshots.
 */
export async function snapshotListCommand(vm: string, options: GlobalOptions): Promise<void> {
  await runCommand('snapshot list', options, async ({ logger, engine }) => {
    const snapshots = await engine.snapshots.list(vm);
    printSnapshots(logger, snapshots);
    logger.setData({ vm, snapshots });
  });
}

/**
 * Revert a VM to a snapshot; the VM is left stopped.
 */
export async function snapshotRestoreCommand(vm: string, snapshot: string, options: GlobalOptions): Promise<void> {
  await runCommand('snapshot restore', options, async ({ logger, engine }) => {
    const restored = await engine.snapshots.restore(vm, snapshot, { signal: interruptSignal() });
    logger.info(`Run \`clonebox start ${vm}\` to boot it.`);
    logger.setData({ snapshot: restored });
  });
}

/**
 * Delete a snapshot.
 */
export async function snapshotDeleteCommand(vm: string, snapshot: string, options: GlobalOptions): Promise<void> {
  await runCommand('snapshot delete', options, async ({ logger, engine }) => {
    const deleted = await engine.snapshots.delete(vm, snapshot);
    if (!deleted) {
      logger.info(`VM '${vm}' has no snapshot '${snapshot}'; nothing to delete`);
    }
    logger.setData({ vm, snapshot, deleted });
  });
}

/**
 * Apply a retention policy to a VM's snapshots.
 */
export async function snapshotPruneCommand(vm: string, options: SnapshotPruneOptions): Promise<void> {
  await runCommand('snapshot prune', options, async ({ logger, engine }) => {
    const deleted = await engine.snapshots.prune(vm, toRetentionPolicy(options));
    logger.setData({ vm, deleted });
  });
}
