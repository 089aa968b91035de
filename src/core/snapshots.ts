/**
 * Snapshot Manager
 *
 * Point-in-time snapshots through the backend's snapshot primitives.
 * Every mutation runs under the VM's lifecycle lock.
 */

import type { SnapshotInfo, VirtualizationBackend } from '../backend/types.js';
import type { AuditSink } from '../audit/types.js';
import type { Logger } from '../lib/logger.js';
import type { LifecycleOrchestrator, VMRecord } from './lifecycle.js';
import { audited } from '../audit/audited.js';
import { compareStrings } from '../lib/collections.js';
import { InvalidStateError, ValidationError, VMNotFoundError } from './errors.js';

const SNAPSHOT_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * A snapshot of one VM
 */
export interface Snapshot extends SnapshotInfo {
  vmName: string;
}

/**
 * Which snapshots prune() deletes. Only snapshots whose name starts with
 * `prefix` are considered; the oldest go first.
 */
export interface RetentionPolicy {
  /** Keep at most this many */
  maxSnapshots?: number;
  /** Delete snapshots older than this */
  maxAgeDays?: number;
  /** Never go below this many (default: 1) */
  minSnapshots?: number;
  prefix?: string;
}

/**
 * Collaborators of the snapshot manager
 */
export interface SnapshotManagerDependencies {
  backend: VirtualizationBackend;
  lifecycle: LifecycleOrchestrator;
  audit: AuditSink;
  logger: Logger;
  clock?: () => Date;
}

/**
 * Check a snapshot name before it reaches the backend.
 *
 * @throws ValidationError
 */
export function validateSnapshotName(snapshot: string): void {
  if (!SNAPSHOT_NAME.test(snapshot)) {
    throw new ValidationError(
      `Invalid snapshot name '${snapshot}'`,
      'snapshot',
      'Use letters, digits, dots, dashes and underscores (max 64 characters).'
    );
  }
}

function validatePolicy(policy: RetentionPolicy): void {
  if (policy.maxSnapshots === undefined && policy.maxAgeDays === undefined) {
    throw new ValidationError(
      'A retention policy needs a snapshot limit or a maximum age',
      'policy',
      'Pass --keep or --max-age-days.'
    );
  }
  for (const [field, value] of [
    ['maxSnapshots', policy.maxSnapshots],
    ['maxAgeDays', policy.maxAgeDays],
    ['minSnapshots', policy.minSnapshots],
  ] as const) {
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      throw new ValidationError(`${field} must be a non-negative integer, got ${value}`, `policy.${field}`);
    }
  }
}

function requireExisting(record: VMRecord): void {
  if (record.state === 'absent') {
    throw new VMNotFoundError(record.name);
  }
}

/**
 * Creates, restores, lists and deletes VM snapshots.
 */
export class SnapshotManager {
  private readonly backend: VirtualizationBackend;
  private readonly lifecycle: LifecycleOrchestrator;
  private readonly audit: AuditSink;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(deps: SnapshotManagerDependencies) {
    this.backend = deps.backend;
    this.lifecycle = deps.lifecycle;
    this.audit = deps.audit;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Take a snapshot.
   *
   * @throws InvalidStateError while the VM is provisioning or failed
   */
  async create(vmName: string, snapshot: string): Promise<Snapshot> {
    validateSnapshotName(snapshot);
    return audited(this.audit, 'snapshot.create', vmName, { snapshot }, () =>
      this.lifecycle.exclusive(vmName, 'snapshot-create', async (record) => {
        requireExisting(record);
        if (record.state === 'provisioning' || record.state === 'failed') {
          throw new InvalidStateError(vmName, record.state, 'snapshot');
        }
        const info = await this.backend.createSnapshot(vmName, snapshot);
        this.logger.success(`Created snapshot '${snapshot}' of VM '${vmName}'`);
        return { ...info, vmName };
      })
    );
  }

  /**
   * Revert a VM to a snapshot. A running VM is stopped first and the VM
   * is left stopped.
   *
   * @throws ValidationError if the snapshot does not exist
   */
  async restore(vmName: string, snapshot: string, options: { signal?: AbortSignal } = {}): Promise<Snapshot> {
    validateSnapshotName(snapshot);
    return audited(this.audit, 'snapshot.restore', vmName, { snapshot }, () =>
      this.lifecycle.exclusive(vmName, 'snapshot-restore', async (record) => {
        requireExisting(record);
        if (record.state === 'provisioning') {
          throw new InvalidStateError(vmName, record.state, 'restore');
        }

        const found = (await this.backend.listSnapshots(vmName)).find((s) => s.name === snapshot);
        if (!found) {
          throw new ValidationError(
            `VM '${vmName}' has no snapshot named '${snapshot}'`,
            'snapshot',
            `Run \`clonebox snapshot list ${vmName}\` to see its snapshots.`
          );
        }

        if (record.state === 'running') {
          this.logger.info(`Stopping VM '${vmName}' before restoring`);
          await this.lifecycle.halt(vmName, { signal: options.signal });
        }

        await this.backend.revertSnapshot(vmName, snapshot);

        // Reverting to a snapshot taken while running resumes the domain
        const domain = await this.backend.getDomain(vmName);
        if (domain !== null && domain.state !== 'stopped') {
          await this.backend.destroyDomain(vmName);
        }

        this.logger.success(`Restored VM '${vmName}' to snapshot '${snapshot}'`);
        return { ...found, vmName };
      })
    );
  }

  /**
   * Snapshots of a VM, oldest first. Lock-free.
   */
  async list(vmName: string): Promise<Snapshot[]> {
    const record = await this.lifecycle.status(vmName);
    requireExisting(record);
    const snapshots = await this.backend.listSnapshots(vmName);
    return snapshots
      .map((info) => ({ ...info, vmName }))
      .sort((a, b) => compareStrings(a.createdAt, b.createdAt) || compareStrings(a.name, b.name));
  }

  /**
   * Delete a snapshot. A missing snapshot is a no-op success.
   *
   * @returns False if there was nothing to delete
   */
  async delete(vmName: string, snapshot: string): Promise<boolean> {
    validateSnapshotName(snapshot);
    return audited(
      this.audit,
      'snapshot.delete',
      vmName,
      { snapshot },
      () =>
        this.lifecycle.exclusive(vmName, 'snapshot-delete', async (record) => {
          requireExisting(record);
          const exists = (await this.backend.listSnapshots(vmName)).some((s) => s.name === snapshot);
          if (!exists) {
            this.logger.info(`VM '${vmName}' has no snapshot '${snapshot}'; nothing to delete`);
            return false;
          }
          await this.backend.deleteSnapshot(vmName, snapshot);
          this.logger.success(`Deleted snapshot '${snapshot}' of VM '${vmName}'`);
          return true;
        }),
      (deleted) => ({ deleted })
    );
  }

  /**
   * Delete the snapshots a retention policy no longer keeps: the oldest
   * beyond `maxSnapshots`, then those older than `maxAgeDays`, never
   * leaving fewer than `minSnapshots`.
   *
   * @returns Names of the deleted snapshots, oldest first
   * @throws ValidationError for a policy without limits
   */
  async prune(vmName: string, policy: RetentionPolicy): Promise<string[]> {
    validatePolicy(policy);
    const prefix = policy.prefix ?? '';
    const minSnapshots = policy.minSnapshots ?? 1;

    return audited(
      this.audit,
      'snapshot.prune',
      vmName,
      { ...policy },
      () =>
        this.lifecycle.exclusive(vmName, 'snapshot-prune', async (record) => {
          requireExisting(record);
          const kept = (await this.backend.listSnapshots(vmName))
            .filter((snapshot) => snapshot.name.startsWith(prefix))
            .sort((a, b) => compareStrings(a.createdAt, b.createdAt) || compareStrings(a.name, b.name));

          const expired: SnapshotInfo[] = [];
          const cutoff =
            policy.maxAgeDays !== undefined ? this.clock().getTime() - policy.maxAgeDays * DAY_MS : -Infinity;
          while (kept.length > minSnapshots) {
            const oldest = kept[0];
            const overCount = policy.maxSnapshots !== undefined && kept.length > policy.maxSnapshots;
            if (oldest === undefined || (!overCount && Date.parse(oldest.createdAt) >= cutoff)) {
              break;
            }
            expired.push(oldest);
            kept.shift();
          }

          const deleted: string[] = [];
          for (const snapshot of expired) {
            await this.backend.deleteSnapshot(vmName, snapshot.name);
            deleted.push(snapshot.name);
          }
          if (deleted.length > 0) {
            this.logger.success(`Pruned ${deleted.length} snapshot(s) of VM '${vmName}': ${deleted.join(', ')}`);
          } else {
            this.logger.info(`VM '${vmName}' has no snapshots to prune`);
          }
          return deleted;
        }),
      (deleted) => ({ deleted })
    );
  }
}
