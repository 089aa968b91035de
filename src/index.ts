/**
 * clonebox as a library: build an engine from settings and drive its
 * components directly.
 */

export { createEngine, type Engine, type EngineOptions } from './core/context.js';
export {
  resolveSettings,
  DEFAULT_CAPS,
  DEFAULT_RESOURCES,
  type EngineSettings,
  type SettingsOverrides,
} from './config/settings.js';
export type * from './config/types.js';
export { loadCloneSpec, saveCloneSpec, dumpCloneSpec, ConfigLoadError, type LoadedCloneSpec } from './config/loader.js';
export { loadProfile, listProfiles, type ProfileEntry } from './detect/profiles.js';
export type { DetectedItem, DetectionProbe } from './detect/types.js';
export { Detector, createDefaultProbes } from './detect/detector.js';
export { Synthesizer, type SynthesisOptions } from './detect/synthesizer.js';
export { ProvisioningRenderer, type ProvisioningBundle } from './provision/renderer.js';
export { Secret, type CredentialMaterial } from './provision/credentials.js';
export {
  LifecycleOrchestrator,
  type VMRecord,
  type VMState,
  type CreateOptions,
  type CreateResult,
  type StopOptions,
} from './core/lifecycle.js';
export { HealthChecker, type HealthReport, type ProbeResult } from './core/health.js';
export { SnapshotManager, type Snapshot } from './core/snapshots.js';
export { loadComposeFile, type ComposeGroup, type ComposeMember } from './compose/loader.js';
export { ComposeOrchestrator, type ComposeResult, type MemberState } from './compose/orchestrator.js';
export { AuditLog } from './audit/log.js';
export type { AuditEvent, AuditQuery } from './audit/types.js';
export { LibvirtBackend } from './backend/libvirt.js';
export type { VirtualizationBackend, DomainInfo } from './backend/types.js';
export { Logger } from './lib/logger.js';
export * from './core/errors.js';
