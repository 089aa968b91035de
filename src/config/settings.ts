/**
 * Engine Settings
 *
 * Process-wide settings resolved once at startup from built-in defaults,
 * CLONEBOX_* environment variables and CLI flags (highest precedence).
 */

import type { ResourceLimits, SessionScope } from './types.js';
import { ConfigError, ValidationError } from '../core/errors.js';
import {
  expandPath,
  getConnectionUri,
  getDefaultAuditPath,
  getDefaultStoreRoot,
} from '../lib/paths.js';

/**
 * Fully resolved engine settings
 */
export interface EngineSettings {
  /** Backend isolation scope */
  session: SessionScope;
  /** libvirt connection URI (local session/system or remote) */
  connectUri: string;
  /** Root directory holding one backing-store directory per VM */
  storeRoot: string;
  /** Path of the append-only audit log */
  auditPath: string;
  /** Raw image copied as each new VM's root disk; blank disks when unset */
  baseImage?: string;
  /** Resources used when nothing else specifies them */
  defaults: ResourceLimits;
  /** Upper bounds a spec may request */
  caps: ResourceLimits;
  /** Graceful shutdown window before forcing a stop */
  stopTimeoutMs: number;
  /** Interval between state polls while waiting for shutdown */
  pollIntervalMs: number;
  /** Default per-probe health check deadline */
  probeTimeoutMs: number;
  /** How long post-boot verification keeps retrying */
  bootTimeoutMs: number;
  /** Maximum concurrent member operations in a compose group */
  composeWorkers: number;
}

/**
 * Overrides accepted from the command line or from tests
 */
export type SettingsOverrides = Partial<Omit<EngineSettings, 'defaults' | 'caps'>> & {
  defaults?: Partial<ResourceLimits>;
  caps?: Partial<ResourceLimits>;
};

/**
 * Resources used when neither spec, profile nor CLI name them.
 */
export const DEFAULT_RESOURCES: ResourceLimits = {
  ramMb: 4096,
  vcpus: 4,
  diskGb: 10,
};

/**
 * Default upper bounds.
 */
export const DEFAULT_CAPS: ResourceLimits = {
  ramMb: 131072,
  vcpus: 128,
  diskGb: 2048,
};

const DEFAULT_TIMINGS = {
  stopTimeoutMs: 60_000,
  pollIntervalMs: 1_000,
  probeTimeoutMs: 5_000,
  bootTimeoutMs: 300_000,
  composeWorkers: 4,
};

const RESOURCE_LABELS: Array<[keyof ResourceLimits, string]> = [
  ['ramMb', 'RAM (MB)'],
  ['vcpus', 'vCPUs'],
  ['diskGb', 'disk (GB)'],
];

/**
 * Check requested resources against the configured caps.
 *
 * @throws ValidationError naming the first field that is over its cap or
 *   not a positive integer
 */
export function validateResources(resources: ResourceLimits, caps: ResourceLimits): void {
  for (const [field, label] of RESOURCE_LABELS) {
    if (resources[field] > caps[field]) {
      throw new ValidationError(
        `Requested ${label} ${resources[field]} exceeds the configured cap of ${caps[field]}`,
        `vm.resources.${field}`,
        'Lower the request or raise the cap with the matching CLONEBOX_MAX_* variable.'
      );
    }
    if (!Number.isInteger(resources[field]) || resources[field] <= 0) {
      throw new ValidationError(
        `Requested ${label} must be a positive integer, got ${resources[field]}`,
        `vm.resources.${field}`
      );
    }
  }
}

/**
 * Read a positive integer from an environment variable.
 *
 * @throws ConfigError if the variable is set but not a positive integer
 */
function readIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(
      `Environment variable ${key} must be a positive integer, got '${raw}'`,
      'CONFIG_VALIDATION_FAILED',
      `Unset ${key} or give it a whole number.`
    );
  }
  return value;
}

function readSessionEnv(env: NodeJS.ProcessEnv): SessionScope | undefined {
  const raw = env['CLONEBOX_SESSION'];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (raw !== 'user' && raw !== 'system') {
    throw new ConfigError(
      `CLONEBOX_SESSION must be 'user' or 'system', got '${raw}'`,
      'CONFIG_VALIDATION_FAILED'
    );
  }
  return raw;
}

/**
 * Resolve engine settings.
 *
 * @param overrides - Values from CLI flags or tests
 * @param env - Environment to read CLONEBOX_* variables from
 * @param cwd - Base directory for relative paths
 */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): EngineSettings {
  const session = overrides.session ?? readSessionEnv(env) ?? 'user';

  const storeRootRaw =
    overrides.storeRoot ?? env['CLONEBOX_STORE_ROOT'] ?? getDefaultStoreRoot(session);
  const auditPathRaw =
    overrides.auditPath ?? env['CLONEBOX_AUDIT_LOG'] ?? getDefaultAuditPath();

  const defaults: ResourceLimits = {
    ramMb: overrides.defaults?.ramMb ?? readIntEnv(env, 'CLONEBOX_DEFAULT_RAM_MB') ?? DEFAULT_RESOURCES.ramMb,
    vcpus: overrides.defaults?.vcpus ?? readIntEnv(env, 'CLONEBOX_DEFAULT_VCPUS') ?? DEFAULT_RESOURCES.vcpus,
    diskGb: overrides.defaults?.diskGb ?? readIntEnv(env, 'CLONEBOX_DEFAULT_DISK_GB') ?? DEFAULT_RESOURCES.diskGb,
  };

  const caps: ResourceLimits = {
    ramMb: overrides.caps?.ramMb ?? readIntEnv(env, 'CLONEBOX_MAX_RAM_MB') ?? DEFAULT_CAPS.ramMb,
    vcpus: overrides.caps?.vcpus ?? readIntEnv(env, 'CLONEBOX_MAX_VCPUS') ?? DEFAULT_CAPS.vcpus,
    diskGb: overrides.caps?.diskGb ?? readIntEnv(env, 'CLONEBOX_MAX_DISK_GB') ?? DEFAULT_CAPS.diskGb,
  };

  const baseImageRaw = overrides.baseImage ?? env['CLONEBOX_BASE_IMAGE'];

  const settings: EngineSettings = {
    session,
    connectUri: overrides.connectUri ?? env['CLONEBOX_CONNECT'] ?? getConnectionUri(session),
    storeRoot: expandPath(storeRootRaw, cwd),
    auditPath: expandPath(auditPathRaw, cwd),
    defaults,
    caps,
    stopTimeoutMs:
      overrides.stopTimeoutMs ?? readIntEnv(env, 'CLONEBOX_STOP_TIMEOUT_MS') ?? DEFAULT_TIMINGS.stopTimeoutMs,
    pollIntervalMs: overrides.pollIntervalMs ?? DEFAULT_TIMINGS.pollIntervalMs,
    probeTimeoutMs:
      overrides.probeTimeoutMs ?? readIntEnv(env, 'CLONEBOX_PROBE_TIMEOUT_MS') ?? DEFAULT_TIMINGS.probeTimeoutMs,
    bootTimeoutMs:
      overrides.bootTimeoutMs ?? readIntEnv(env, 'CLONEBOX_BOOT_TIMEOUT_MS') ?? DEFAULT_TIMINGS.bootTimeoutMs,
    composeWorkers:
      overrides.composeWorkers ?? readIntEnv(env, 'CLONEBOX_COMPOSE_WORKERS') ?? DEFAULT_TIMINGS.composeWorkers,
  };
  if (baseImageRaw !== undefined && baseImageRaw !== '') {
    settings.baseImage = expandPath(baseImageRaw, cwd);
  }
  return settings;
}
