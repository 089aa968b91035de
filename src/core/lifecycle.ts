/**
 * Lifecycle Orchestrator
 *
 * Drives each VM through absent → provisioning → running ⇄ stopped → absent
 * (plus failed). Mutating operations hold the VM's lock, reconcile the
 * cached record against the backend first, and retry once after a
 * StaleStateConflict. The backend is always the source of truth; the
 * record cache only remembers what the backend cannot tell us (an
 * in-flight create, an incomplete rollback).
 */

import { setTimeout as sleep } from 'node:timers/promises';

import type { CloneSpec, SessionScope } from '../config/types.js';
import { validateResources, type EngineSettings } from '../config/settings.js';
import type { DomainState, VirtualizationBackend } from '../backend/types.js';
import type { AuditSink } from '../audit/types.js';
import type { Logger } from '../lib/logger.js';
import type { CredentialMaterial } from '../provision/credentials.js';
import type { HealthChecker, HealthReport } from './health.js';
import { DEFAULT_GUEST_USER, ProvisioningRenderer, validateMounts } from '../provision/renderer.js';
import { BackingStore, type VMMeta } from '../state/store.js';
import { audited } from '../audit/audited.js';
import { KeyedMutex } from './lock.js';
import { runTransaction } from './transaction.js';
import {
  InvalidStateError,
  OperationCancelled,
  ProvisioningFailure,
  StaleStateConflict,
  ValidationError,
  VMNotFoundError,
  describeError,
} from './errors.js';

/**
 * Lifecycle state of a VM identity
 */
export type VMState = 'absent' | 'provisioning' | 'running' | 'stopped' | 'failed';

/**
 * Runtime view of one VM
 */
export interface VMRecord {
  name: string;
  state: VMState;
  session: SessionScope;
  /** Backend-assigned guest address, when known */
  address: string | null;
  /** ISO 8601, from the backing store */
  createdAt: string | null;
  /** Raw backend state; null when the backend has no such domain */
  domainState: DomainState | null;
  /** Whether the VM has a backing store created by this engine */
  managed: boolean;
}

/**
 * Options for create()
 */
export interface CreateOptions {
  signal?: AbortSignal;
  /** Run post-boot health verification (default: true) */
  verify?: boolean;
}

/**
 * Outcome of a successful create()
 */
export interface CreateResult {
  record: VMRecord;
  /** Credentials the guest was provisioned with */
  credentials: CredentialMaterial;
  /** Post-boot verification report, when one ran */
  health?: HealthReport;
}

/**
 * Options for stop()
 */
export interface StopOptions {
  /** Terminate immediately instead of a graceful shutdown */
  force?: boolean;
  signal?: AbortSignal;
}

/**
 * How a running domain was brought down
 */
export type HaltMethod = 'graceful' | 'forced';

/**
 * Collaborators of the orchestrator
 */
export interface LifecycleDependencies {
  settings: Pick<
    EngineSettings,
    'session' | 'stopTimeoutMs' | 'pollIntervalMs' | 'bootTimeoutMs' | 'baseImage' | 'caps'
  >;
  backend: VirtualizationBackend;
  store: BackingStore;
  health: HealthChecker;
  audit: AuditSink;
  logger: Logger;
  renderer?: ProvisioningRenderer;
  mutex?: KeyedMutex;
  clock?: () => Date;
}

/**
 * Map a backend domain state onto the lifecycle state machine.
 */
export function toVMState(state: DomainState): VMState {
  switch (state) {
    case 'running':
    case 'paused':
      return 'running';
    case 'stopped':
      return 'stopped';
    case 'crashed':
    case 'unknown':
      return 'failed';
  }
}

function isStaleConflict(error: unknown): boolean {
  if (error instanceof StaleStateConflict) return true;
  return (
    error instanceof ProvisioningFailure &&
    error.reason instanceof StaleStateConflict &&
    error.rollbackErrors.length === 0
  );
}

/**
 * Owns VM lifecycle transitions and the backing-store tree.
 */
export class LifecycleOrchestrator {
  private readonly settings: LifecycleDependencies['settings'];
  private readonly backend: VirtualizationBackend;
  private readonly store: BackingStore;
  private readonly health: HealthChecker;
  private readonly audit: AuditSink;
  private readonly logger: Logger;
  private readonly renderer: ProvisioningRenderer;
  private readonly mutex: KeyedMutex;
  private readonly clock: () => Date;
  private readonly records = new Map<string, VMRecord>();

  constructor(deps: LifecycleDependencies) {
    this.settings = deps.settings;
    this.backend = deps.backend;
    this.store = deps.store;
    this.health = deps.health;
    this.audit = deps.audit;
    this.logger = deps.logger;
    this.renderer = deps.renderer ?? new ProvisioningRenderer();
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.clock = deps.clock ?? (() => new Date());
  }

  // ===========================================================================
  // Reconciliation
  // ===========================================================================

  /**
   * Rebuild a VM's record from the backend and the backing store.
   *
   * Lock-free. An in-flight create stays `provisioning`; a backing store
   * without a domain, or a domain left behind by an incomplete rollback,
   * is `failed`.
   */
  async reconcile(name: string): Promise<VMRecord> {
    const cached = this.records.get(name);
    if (cached?.state === 'provisioning') {
      return cached;
    }

    const [domain, meta, hasStore] = await Promise.all([
      this.backend.getDomain(name),
      this.store.readMeta(name),
      this.store.exists(name),
    ]);

    let state: VMState;
    if (domain === null) {
      state = hasStore ? 'failed' : 'absent';
    } else if (cached?.state === 'failed' && meta === null) {
      state = 'failed';
    } else {
      state = toVMState(domain.state);
    }

    const record: VMRecord = {
      name,
      state,
      session: meta?.session ?? this.settings.session,
      address: domain?.address ?? null,
      createdAt: meta?.createdAt ?? null,
      domainState: domain?.state ?? null,
      managed: hasStore || cached?.managed === true,
    };

    if (cached && cached.state !== record.state) {
      this.logger.debug(`${name}: cached state ${cached.state}, backend reports ${record.state}`);
    }
    if (state === 'absent') {
      this.records.delete(name);
    } else {
      this.records.set(name, record);
    }
    return record;
  }

  /**
   * Run a mutating operation under the VM's lock.
   *
   * The callback receives a freshly reconciled record; on a
   * StaleStateConflict it is called once more with a new one.
   * Callers must not re-enter exclusive() for the same VM.
   */
  async exclusive<T>(
    name: string,
    operation: string,
    fn: (record: VMRecord) => Promise<T>
  ): Promise<T> {
    return this.mutex.run(name, async () => {
      const record = await this.reconcile(name);
      try {
        return await fn(record);
      } catch (error) {
        if (!isStaleConflict(error)) {
          throw error;
        }
        this.logger.debug(`${name}: ${operation} hit stale state (${describeError(error)}); retrying`);
        return fn(await this.reconcile(name));
      }
    });
  }

  // ===========================================================================
  // Create
  // ===========================================================================

  /**
   * Provision and boot a new VM.
   *
   * Mount paths are validated before anything is touched. Every create
   * step is undone in reverse order if a later one fails or the signal
   * aborts, so a failed create leaves neither a domain nor a backing store.
   *
   * @throws ValidationError before any mutation
   * @throws InvalidStateError if the VM already exists
   * @throws ProvisioningFailure after rolling back
   * @throws OperationCancelled after rolling back an aborted create
   */
  async create(spec: CloneSpec, options: CreateOptions = {}): Promise<CreateResult> {
    const name = spec.vm.name;

    const created = await audited(
      this.audit,
      'vm.create',
      name,
      { session: spec.vm.session, resources: spec.vm.resources },
      async () => {
        if (spec.vm.session !== this.settings.session) {
          throw new ValidationError(
            `VM '${name}' targets the ${spec.vm.session} session, but this connection is the ${this.settings.session} session`,
            'vm.session',
            `Pass --${spec.vm.session} or change vm.session in .clonebox.yaml.`
          );
        }
        validateResources(spec.vm.resources, this.settings.caps);
        await validateMounts(spec);

        return this.exclusive(name, 'create', async (record) => {
          if (record.state !== 'absent') {
            throw new InvalidStateError(name, record.state, 'create');
          }
          return this.provision(spec, options.signal);
        });
      }
    );

    let health: HealthReport | undefined;
    if (options.verify !== false && spec.healthChecks.length > 0 && !options.signal?.aborted) {
      health = await this.health.verify(name, spec.healthChecks, {
        timeoutMs: this.settings.bootTimeoutMs,
        intervalMs: this.settings.pollIntervalMs,
        signal: options.signal,
      });
      if (!health.healthy) {
        const failing = health.results
          .filter((result) => result.outcome !== 'pass')
          .map((result) => `${result.name} (${result.outcome})`);
        this.logger.warning(`VM '${name}' is running but failed post-boot verification: ${failing.join(', ')}`);
      }
    }

    return { ...created, health };
  }

  private async provision(spec: CloneSpec, signal?: AbortSignal): Promise<Omit<CreateResult, 'health'>> {
    const name = spec.vm.name;
    const { diskGb, ramMb, vcpus } = spec.vm.resources;
    const meta: VMMeta = {
      version: 1,
      name,
      session: spec.vm.session,
      createdAt: this.clock().toISOString(),
      diskGb,
    };

    this.records.set(name, {
      name,
      state: 'provisioning',
      session: spec.vm.session,
      address: null,
      createdAt: meta.createdAt,
      domainState: null,
      managed: true,
    });

    let credentials: CredentialMaterial;
    try {
      credentials = await runTransaction(
        name,
        this.logger,
        async (tx) => {
          await tx.step(
            'allocate-storage',
            () => this.store.allocate(name),
            (allocation) => this.store.release(allocation)
          );

          await tx.step('create-disk', () =>
            this.backend.createDisk({
              path: this.store.getDiskPath(name),
              sizeGb: diskGb,
              backingImage: this.settings.baseImage,
            })
          );

          const bundle = await tx.step(
            'write-bundle',
            async () => {
              const keyPair =
                spec.auth.method === 'ssh-key'
                  ? await this.store.ensureKeyPair(name, `${DEFAULT_GUEST_USER}@${name}`)
                  : undefined;
              const rendered = this.renderer.render(spec, { keyPair });
              await this.store.writeBundle(spec, rendered, meta);
              return rendered;
            },
            () => this.store.removeBundle(name)
          );

          await tx.step(
            'define-domain',
            () =>
              this.backend.defineDomain({
                name,
                ramMb,
                vcpus,
                diskPath: this.store.getDiskPath(name),
                seedDir: this.store.getSeedDir(name),
                mounts: bundle.mounts,
                network: bundle.network,
              }),
            () => this.backend.undefineDomain(name)
          );

          await tx.step(
            'start-domain',
            () => this.backend.startDomain(name),
            () => this.backend.destroyDomain(name)
          );

          return bundle.credentials;
        },
        signal
      );
    } catch (error) {
      if (error instanceof ProvisioningFailure && error.rollbackErrors.length > 0) {
        this.records.set(name, {
          name,
          state: 'failed',
          session: spec.vm.session,
          address: null,
          createdAt: meta.createdAt,
          domainState: null,
          managed: true,
        });
      } else {
        this.records.delete(name);
      }
      throw error;
    }

    this.records.delete(name);
    const record = await this.reconcile(name);
    this.logger.success(`Created VM '${name}'`);
    return { record, credentials };
  }

  // ===========================================================================
  // Start / Stop / Restart
  // ===========================================================================

  /**
   * Boot a stopped VM. Starting a running VM is a no-op.
   *
   * @throws VMNotFoundError if the VM is absent
   * @throws InvalidStateError while provisioning or failed
   */
  async start(name: string, options: { signal?: AbortSignal } = {}): Promise<VMRecord> {
    return audited(this.audit, 'vm.start', name, {}, () =>
      this.exclusive(name, 'start', (record) => this.startLocked(record, options.signal))
    );
  }

  private async startLocked(record: VMRecord, signal?: AbortSignal): Promise<VMRecord> {
    const { name } = record;
    switch (record.state) {
      case 'absent':
        throw new VMNotFoundError(name);
      case 'running':
        this.logger.info(`VM '${name}' is already running`);
        return record;
      case 'provisioning':
      case 'failed':
        throw new InvalidStateError(name, record.state, 'start');
      case 'stopped':
        break;
    }

    if (signal?.aborted) {
      throw new OperationCancelled(name, 'start-domain');
    }
    await this.backend.startDomain(name);
    this.logger.success(`Started VM '${name}'`);
    return this.reconcile(name);
  }

  /**
   * Stop a running VM. Stopping a stopped VM is a no-op.
   *
   * A graceful stop waits up to the stop timeout, then forces.
   *
   * @throws VMNotFoundError if the VM is absent
   * @throws OperationCancelled if the signal aborts while waiting
   */
  async stop(name: string, options: StopOptions = {}): Promise<VMRecord> {
    return audited(this.audit, 'vm.stop', name, { force: options.force ?? false }, () =>
      this.exclusive(name, 'stop', async (record) => {
        switch (record.state) {
          case 'absent':
            throw new VMNotFoundError(name);
          case 'stopped':
            this.logger.info(`VM '${name}' is already stopped`);
            return record;
          case 'provisioning':
            throw new InvalidStateError(name, record.state, 'stop');
          case 'failed':
            if (record.domainState === null) {
              throw new InvalidStateError(name, record.state, 'stop');
            }
            break;
          case 'running':
            break;
        }
        // A crashed domain cannot take a shutdown request
        const method = await this.halt(name, record.state === 'failed' ? { ...options, force: true } : options);
        this.logger.success(`Stopped VM '${name}' (${method})`);
        return this.reconcile(name);
      })
    );
  }

  /**
   * Stop (if running) and start a VM under one lock hold.
   */
  async restart(name: string, options: { signal?: AbortSignal } = {}): Promise<VMRecord> {
    return audited(this.audit, 'vm.restart', name, {}, () =>
      this.exclusive(name, 'restart', async (record) => {
        if (record.state === 'running') {
          await this.halt(name, { signal: options.signal });
          return this.startLocked(await this.reconcile(name), options.signal);
        }
        return this.startLocked(record, options.signal);
      })
    );
  }

  /**
   * Bring a running domain down. The caller must hold the VM's lock.
   */
  async halt(name: string, options: StopOptions = {}): Promise<HaltMethod> {
    if (options.force) {
      await this.backend.destroyDomain(name);
      return 'forced';
    }

    await this.backend.shutdownDomain(name);
    const deadline = Date.now() + this.settings.stopTimeoutMs;
    while (Date.now() < deadline) {
      try {
        await sleep(Math.min(this.settings.pollIntervalMs, Math.max(0, deadline - Date.now())), undefined, {
          signal: options.signal,
        });
      } catch (error) {
        if (options.signal?.aborted) {
          throw new OperationCancelled(name, 'shutdown');
        }
        throw error;
      }
      const domain = await this.backend.getDomain(name);
      if (domain === null || domain.state !== 'running') {
        return 'graceful';
      }
    }

    this.logger.warning(
      `VM '${name}' did not shut down within ${this.settings.stopTimeoutMs}ms; forcing it off`
    );
    await this.backend.destroyDomain(name);
    return 'forced';
  }

  // ===========================================================================
  // Delete
  // ===========================================================================

  /**
   * Remove a VM's domain and backing store. Deleting an absent VM succeeds.
   *
   * @returns False if there was nothing to delete
   * @throws InvalidStateError while provisioning
   * @throws ValidationError for domains this engine did not create
   */
  async delete(name: string): Promise<boolean> {
    return audited(
      this.audit,
      'vm.delete',
      name,
      {},
      () =>
        this.exclusive(name, 'delete', async (record) => {
          if (record.state === 'absent') {
            this.logger.info(`VM '${name}' does not exist; nothing to delete`);
            return false;
          }
          if (record.state === 'provisioning') {
            throw new InvalidStateError(name, record.state, 'delete');
          }
          if (!record.managed) {
            throw new ValidationError(
              `Domain '${name}' was not created by clonebox`,
              'name',
              'Remove it with virsh if that is really intended.'
            );
          }

          if (record.domainState !== null && record.domainState !== 'stopped') {
            await this.backend.destroyDomain(name);
          }
          if (record.domainState !== null) {
            await this.backend.undefineDomain(name);
          }
          await this.store.remove(name);
          this.records.delete(name);
          this.logger.success(`Deleted VM '${name}'`);
          return true;
        }),
      (deleted) => ({ deleted })
    );
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Current record of a VM. Lock-free.
   */
  async status(name: string): Promise<VMRecord> {
    return this.reconcile(name);
  }

  /**
   * Records of every VM with a backing store or an in-flight create.
   */
  async list(): Promise<VMRecord[]> {
    const names = new Set(await this.store.list());
    for (const [name, record] of this.records) {
      if (record.state === 'provisioning' || record.state === 'failed') {
        names.add(name);
      }
    }
    const records = await Promise.all([...names].sort().map((name) => this.reconcile(name)));
    return records.filter((record) => record.state !== 'absent');
  }

  /**
   * Spec a VM was created from, as stored in its backing store.
   */
  async getSpec(name: string): Promise<CloneSpec | null> {
    return this.store.readSpec(name);
  }
}
