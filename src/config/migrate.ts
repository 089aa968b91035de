/**
 * Clone Spec Schema Migration
 *
 * Maps the flat v1 document onto the structured v2 document and back.
 * Both directions are total: every field the source version defines has a
 * home in the target, and anything that does not is reported in
 * `unmapped` instead of being dropped silently.
 */

import type {
  CloneSpecFile,
  CloneSpecFileV1,
  CloneSpecFileV2,
} from './types.js';

/**
 * Result of a migration in either direction
 */
export interface MigrationResult<T> {
  /** The migrated document */
  value: T;
  /** Source fields that have no counterpart in the target schema */
  unmapped: string[];
}

/**
 * Keys defined by schema v1.
 */
const V1_KEYS = new Set([
  'version',
  'name',
  'session',
  'ram_mb',
  'vcpus',
  'disk_size_gb',
  'network_mode',
  'paths',
  'packages',
  'services',
  'auth_method',
  'password',
  'health_checks',
]);

/**
 * Check whether a parsed document uses schema v1.
 */
export function isV1(file: CloneSpecFile): file is CloneSpecFileV1 {
  return file.version === 1 || file.version === '1';
}

/**
 * Migrate a v1 document to v2.
 *
 * `auth_method` and `password` move under `auth`; resource fields move
 * under `vm.resources`; `paths` becomes `mounts`.
 */
export function migrateV1(v1: CloneSpecFileV1): MigrationResult<CloneSpecFileV2> {
  const unmapped = Object.keys(v1)
    .filter((key) => !V1_KEYS.has(key))
    .sort();

  const resources: NonNullable<CloneSpecFileV2['vm']['resources']> = {};
  if (v1.ram_mb !== undefined) resources.ram_mb = v1.ram_mb;
  if (v1.vcpus !== undefined) resources.vcpus = v1.vcpus;
  if (v1.disk_size_gb !== undefined) resources.disk_gb = v1.disk_size_gb;

  const v2: CloneSpecFileV2 = {
    version: 2,
    vm: { name: v1.name },
  };
  if (v1.session !== undefined) v2.vm.session = v1.session;
  if (v1.network_mode !== undefined) v2.vm.network = v1.network_mode;
  if (Object.keys(resources).length > 0) v2.vm.resources = resources;
  if (v1.paths !== undefined) v2.mounts = { ...v1.paths };
  if (v1.packages !== undefined) v2.packages = [...v1.packages];
  if (v1.services !== undefined) v2.services = [...v1.services];

  if (v1.auth_method !== undefined || v1.password !== undefined) {
    // v1 defaulted to password auth when only a password was given
    v2.auth = { method: v1.auth_method ?? 'password' };
    if (v1.password !== undefined) v2.auth.password = v1.password;
  }

  if (v1.health_checks !== undefined) {
    v2.health_checks = v1.health_checks.map((check) => ({ ...check }));
  }

  return { value: v2, unmapped };
}

/**
 * Express a v2 document in v1 form.
 *
 * Used to prove migrations are round-trip safe and to export specs for
 * older tooling.
 */
export function toV1(v2: CloneSpecFileV2): MigrationResult<CloneSpecFileV1> {
  const v1: CloneSpecFileV1 = {
    version: 1,
    name: v2.vm.name,
  };
  if (v2.vm.session !== undefined) v1.session = v2.vm.session;
  if (v2.vm.resources?.ram_mb !== undefined) v1.ram_mb = v2.vm.resources.ram_mb;
  if (v2.vm.resources?.vcpus !== undefined) v1.vcpus = v2.vm.resources.vcpus;
  if (v2.vm.resources?.disk_gb !== undefined) v1.disk_size_gb = v2.vm.resources.disk_gb;
  if (v2.vm.network !== undefined) v1.network_mode = v2.vm.network;
  if (v2.mounts !== undefined) v1.paths = { ...v2.mounts };
  if (v2.packages !== undefined) v1.packages = [...v2.packages];
  if (v2.services !== undefined) v1.services = [...v2.services];
  if (v2.auth !== undefined) {
    v1.auth_method = v2.auth.method;
    if (v2.auth.password !== undefined) v1.password = v2.auth.password;
  }
  if (v2.health_checks !== undefined) {
    v1.health_checks = v2.health_checks.map((check) => ({ ...check }));
  }

  return { value: v1, unmapped: [] };
}

/**
 * Bring any supported document to v2.
 */
export function toV2(file: CloneSpecFile): MigrationResult<CloneSpecFileV2> {
  if (isV1(file)) {
    return migrateV1(file);
  }
  return { value: file, unmapped: [] };
}
