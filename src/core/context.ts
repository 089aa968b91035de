/**
 * Engine Context
 *
 * Builds every component once, from resolved settings, and hands them out
 * together. Nothing here is global: the CLI creates one engine per
 * process and tests create as many as they like.
 */

import type { EngineSettings } from '../config/settings.js';
import type { VirtualizationBackend } from '../backend/types.js';
import type { Logger } from '../lib/logger.js';
import { ProcessExecutor, type CommandExecutor } from '../backend/executor.js';
import { LibvirtBackend } from '../backend/libvirt.js';
import { AuditLog } from '../audit/log.js';
import { BackingStore } from '../state/store.js';
import { Detector, createDefaultProbes } from '../detect/detector.js';
import { Synthesizer } from '../detect/synthesizer.js';
import { ProvisioningRenderer } from '../provision/renderer.js';
import { ComposeOrchestrator } from '../compose/orchestrator.js';
import { HealthChecker } from './health.js';
import { LifecycleOrchestrator } from './lifecycle.js';
import { SnapshotManager } from './snapshots.js';
import { KeyedMutex } from './lock.js';

/**
 * Every engine component, wired together
 */
export interface Engine {
  settings: EngineSettings;
  logger: Logger;
  executor: CommandExecutor;
  backend: VirtualizationBackend;
  store: BackingStore;
  audit: AuditLog;
  synthesizer: Synthesizer;
  renderer: ProvisioningRenderer;
  health: HealthChecker;
  lifecycle: LifecycleOrchestrator;
  snapshots: SnapshotManager;
  compose: ComposeOrchestrator;
  /** Detector scanning the host from `cwd` */
  detector(cwd: string): Detector;
  /** Wait for pending audit writes */
  close(): Promise<void>;
}

/**
 * Substitutes for the default collaborators
 */
export interface EngineOptions {
  logger: Logger;
  /** Defaults to libvirt through virsh */
  backend?: VirtualizationBackend;
  /** Defaults to spawning real processes */
  executor?: CommandExecutor;
  clock?: () => Date;
  /** Actor stamped on audit events */
  actor?: string;
}

/**
 * Create an engine and load its audit log.
 */
export async function createEngine(settings: EngineSettings, options: EngineOptions): Promise<Engine> {
  const { logger } = options;
  const executor = options.executor ?? new ProcessExecutor({ verbose: logger.isVerbose() });
  const backend = options.backend ?? new LibvirtBackend({ uri: settings.connectUri, executor });

  const audit = new AuditLog({ path: settings.auditPath, logger, actor: options.actor, clock: options.clock });
  await audit.open();

  const store = new BackingStore(settings.storeRoot);
  const renderer = new ProvisioningRenderer();
  const health = new HealthChecker(backend, { probeTimeoutMs: settings.probeTimeoutMs, logger });
  const lifecycle = new LifecycleOrchestrator({
    settings,
    backend,
    store,
    health,
    audit,
    logger,
    renderer,
    mutex: new KeyedMutex(),
    clock: options.clock,
  });

  return {
    settings,
    logger,
    executor,
    backend,
    store,
    audit,
    synthesizer: new Synthesizer(settings, logger),
    renderer,
    health,
    lifecycle,
    snapshots: new SnapshotManager({ backend, lifecycle, audit, logger, clock: options.clock }),
    compose: new ComposeOrchestrator({ lifecycle, backend, audit, logger, workers: settings.composeWorkers }),
    detector: (cwd: string) => new Detector(createDefaultProbes({ executor, cwd }), logger),
    close: () => audit.flush(),
  };
}
