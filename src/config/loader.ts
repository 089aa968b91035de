/**
 * Configuration Loader
 *
 * Loads YAML documents from the filesystem and converts clone spec files
 * (either schema version) into the normalized CloneSpec. Writes always
 * emit schema v2.
 */

import { readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import yaml from 'js-yaml';

import type {
  CloneSpec,
  CloneSpecFileV2,
  HealthCheckDecl,
  HealthCheckFileEntry,
  MountMapping,
  ResourceLimits,
} from './types.js';
import { validateCloneSpecFile } from './validator.js';
import { toV2 } from './migrate.js';
import { DEFAULT_RESOURCES } from './settings.js';
import { ConfigError, describeError } from '../core/errors.js';
import { compareStrings, uniqueCaseFolded } from '../lib/collections.js';
import { errnoCode, writeFileAtomic } from '../lib/fs.js';
import { expandPath } from '../lib/paths.js';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends ConfigError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML',
    filePath: string,
    public readonly originalError?: Error
  ) {
    super(message, code, undefined, filePath);
    this.name = 'ConfigLoadError';
    Object.setPrototypeOf(this, ConfigLoadError.prototype);
  }
}

/**
 * A clone spec read from disk
 */
export interface LoadedCloneSpec {
  spec: CloneSpec;
  /** Schema version found in the file */
  sourceVersion: 1 | 2;
  /** Fields of the file that could not be carried into v2 */
  unmapped: string[];
  /** Absolute path of the file */
  path: string;
}

/**
 * Load and parse a YAML configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    const code = errnoCode(error);
    if (code === 'ENOENT') {
      throw new ConfigLoadError(`Configuration file not found: ${filePath}`, 'CONFIG_NOT_FOUND', filePath, cause);
    }
    if (code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        'CONFIG_NOT_FOUND',
        filePath,
        cause
      );
    }
    throw new ConfigLoadError(
      `Failed to read configuration file: ${filePath}: ${describeError(error)}`,
      'CONFIG_NOT_FOUND',
      filePath,
      cause
    );
  }

  try {
    return yaml.load(content);
  } catch (error) {
    throw new ConfigLoadError(
      `Invalid YAML syntax in ${filePath}: ${describeError(error)}`,
      'CONFIG_INVALID_YAML',
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

export function toHealthCheck(entry: HealthCheckFileEntry): HealthCheckDecl {
  const check: HealthCheckDecl = { name: entry.name, type: entry.type };
  if (entry.target !== undefined) check.target = entry.target;
  if (entry.expect_exit !== undefined) check.expectExit = entry.expect_exit;
  if (entry.expect_status !== undefined) check.expectStatus = entry.expect_status;
  if (entry.expect_body !== undefined) check.expectBody = entry.expect_body;
  if (entry.timeout_ms !== undefined) check.timeoutMs = entry.timeout_ms;
  return check;
}

function toHealthCheckEntry(check: HealthCheckDecl): HealthCheckFileEntry {
  const entry: HealthCheckFileEntry = { name: check.name, type: check.type };
  if (check.target !== undefined) entry.target = check.target;
  if (check.expectExit !== undefined) entry.expect_exit = check.expectExit;
  if (check.expectStatus !== undefined) entry.expect_status = check.expectStatus;
  if (check.expectBody !== undefined) entry.expect_body = check.expectBody;
  if (check.timeoutMs !== undefined) entry.timeout_ms = check.timeoutMs;
  return entry;
}

/**
 * Sort mounts by guest path so equal specs serialize identically.
 */
export function sortMounts(mounts: MountMapping[]): MountMapping[] {
  return [...mounts].sort(
    (a, b) => compareStrings(a.guestPath, b.guestPath) || compareStrings(a.hostPath, b.hostPath)
  );
}

/**
 * Convert a validated v2 document into a normalized CloneSpec.
 *
 * @param file - Schema v2 document
 * @param baseDir - Directory relative host paths are resolved against
 * @param defaults - Resources applied where the document names none
 * @throws ConfigError if the document is structurally valid but inconsistent
 */
export function normalizeCloneSpec(
  file: CloneSpecFileV2,
  baseDir: string,
  defaults: ResourceLimits = DEFAULT_RESOURCES
): CloneSpec {
  const auth = file.auth ?? { method: 'ssh-key' as const };
  if (auth.method === 'password' && (auth.password === undefined || auth.password === '')) {
    throw new ConfigError(
      `VM '${file.vm.name}' uses password authentication but no password is set`,
      'CONFIG_VALIDATION_FAILED',
      'Add auth.password or switch auth.method to ssh-key or one-time-password.'
    );
  }

  const mounts: MountMapping[] = Object.entries(file.mounts ?? {}).map(
    ([hostPath, guestPath]) => ({
      hostPath: expandPath(hostPath, baseDir),
      guestPath,
    })
  );

  const guestPaths = new Set<string>();
  for (const mount of mounts) {
    if (guestPaths.has(mount.guestPath)) {
      throw new ConfigError(
        `VM '${file.vm.name}' mounts more than one host path at ${mount.guestPath}`,
        'CONFIG_VALIDATION_FAILED'
      );
    }
    guestPaths.add(mount.guestPath);
  }

  const healthNames = new Set<string>();
  const healthChecks = (file.health_checks ?? []).map(toHealthCheck);
  for (const check of healthChecks) {
    if (healthNames.has(check.name)) {
      throw new ConfigError(
        `VM '${file.vm.name}' declares health check '${check.name}' twice`,
        'CONFIG_VALIDATION_FAILED'
      );
    }
    healthNames.add(check.name);
  }

  return {
    schemaVersion: 2,
    vm: {
      name: file.vm.name,
      session: file.vm.session ?? 'user',
      network: file.vm.network ?? 'auto',
      resources: {
        ramMb: file.vm.resources?.ram_mb ?? defaults.ramMb,
        vcpus: file.vm.resources?.vcpus ?? defaults.vcpus,
        diskGb: file.vm.resources?.disk_gb ?? defaults.diskGb,
      },
    },
    mounts: sortMounts(mounts),
    packages: uniqueCaseFolded(file.packages ?? []),
    services: uniqueCaseFolded(file.services ?? []),
    auth: auth.password === undefined ? { method: auth.method } : { method: auth.method, password: auth.password },
    healthChecks,
  };
}

/**
 * Convert a CloneSpec into its v2 file representation.
 */
export function toCloneSpecFile(spec: CloneSpec): CloneSpecFileV2 {
  const file: CloneSpecFileV2 = {
    version: 2,
    vm: {
      name: spec.vm.name,
      session: spec.vm.session,
      network: spec.vm.network,
      resources: {
        ram_mb: spec.vm.resources.ramMb,
        vcpus: spec.vm.resources.vcpus,
        disk_gb: spec.vm.resources.diskGb,
      },
    },
    mounts: Object.fromEntries(spec.mounts.map((m) => [m.hostPath, m.guestPath])),
    packages: [...spec.packages],
    services: [...spec.services],
    auth: spec.auth.password === undefined
      ? { method: spec.auth.method }
      : { method: spec.auth.method, password: spec.auth.password },
  };
  if (spec.healthChecks.length > 0) {
    file.health_checks = spec.healthChecks.map(toHealthCheckEntry);
  }
  return file;
}

/**
 * Parse an already-loaded document into a CloneSpec.
 *
 * @throws ConfigError if the document fails schema validation
 */
export function parseCloneSpec(
  data: unknown,
  filePath: string,
  defaults: ResourceLimits = DEFAULT_RESOURCES
): LoadedCloneSpec {
  const result = validateCloneSpecFile(data);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid clone spec: ${filePath}`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the fields listed below, or regenerate the file with `clonebox clone`.',
      filePath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  const migrated = toV2(result.value);
  const sourceVersion = migrated.value === result.value ? 2 : 1;

  return {
    spec: normalizeCloneSpec(migrated.value, dirname(filePath), defaults),
    sourceVersion,
    unmapped: migrated.unmapped,
    path: filePath,
  };
}

/**
 * Load a `.clonebox.yaml` file of either schema version.
 *
 * @param filePath - Absolute path to the spec file
 * @param defaults - Resources applied where the file names none
 */
export async function loadCloneSpec(
  filePath: string,
  defaults: ResourceLimits = DEFAULT_RESOURCES
): Promise<LoadedCloneSpec> {
  const data = await loadYamlFile(filePath);
  return parseCloneSpec(data, filePath, defaults);
}

/**
 * Serialize a CloneSpec as schema v2 YAML.
 */
export function dumpCloneSpec(spec: CloneSpec): string {
  return yaml.dump(toCloneSpecFile(spec), { sortKeys: false, lineWidth: 120, noRefs: true });
}

/**
 * Write a CloneSpec to disk as schema v2 using an atomic rename.
 */
export async function saveCloneSpec(filePath: string, spec: CloneSpec): Promise<void> {
  await writeFileAtomic(filePath, dumpCloneSpec(spec));
}
