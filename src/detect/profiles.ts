/**
 * Profiles
 *
 * A profile is a named, reusable bundle of packages, services, mounts and
 * resources. Lookup order: `~/.clonebox.d/<name>.yaml`,
 * `<cwd>/.clonebox.d/<name>.yaml`, then the built-in `profiles/` directory
 * shipped with the package.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Profile, ProfileFile } from '../config/types.js';
import { loadYamlFile, toHealthCheck } from '../config/loader.js';
import { validateProfileFile } from '../config/validator.js';
import { ConfigError, ValidationError } from '../core/errors.js';
import { compareStrings, uniqueCaseFolded } from '../lib/collections.js';
import { errnoCode, pathExists } from '../lib/fs.js';
import { expandPath, getProfileSearchDirs } from '../lib/paths.js';

const PROFILE_NAME = /^[a-z0-9][a-z0-9._-]*$/i;

/**
 * Where to look for profiles
 */
export interface ProfileSearchOptions {
  /** Working directory of the clone; also resolves relative mount paths */
  cwd: string;
  /** Overrides the user and project directories (tests) */
  searchDirs?: string[];
  /** Overrides the built-in directory (tests) */
  builtinDir?: string;
}

/**
 * A profile file found on disk
 */
export interface ProfileEntry {
  name: string;
  path: string;
  description?: string;
}

/**
 * Directory holding the profiles shipped with clonebox.
 */
export function getBuiltinProfilesDir(): string {
  return fileURLToPath(new URL('../../profiles/', import.meta.url));
}

function searchDirs(options: ProfileSearchOptions): string[] {
  return [
    ...(options.searchDirs ?? getProfileSearchDirs(options.cwd)),
    options.builtinDir ?? getBuiltinProfilesDir(),
  ];
}

/**
 * Convert a validated profile document into a Profile.
 */
export function normalizeProfile(file: ProfileFile, name: string, cwd: string): Profile {
  const profile: Profile = {
    name: file.name ?? name,
    packages: uniqueCaseFolded(file.packages ?? []),
    services: uniqueCaseFolded(file.services ?? []),
    mounts: Object.entries(file.mounts ?? {}).map(([hostPath, guestPath]) => ({
      hostPath: expandPath(hostPath, cwd),
      guestPath,
    })),
    resources: {},
    healthChecks: (file.health_checks ?? []).map(toHealthCheck),
  };
  if (file.description !== undefined) profile.description = file.description;
  if (file.resources?.ram_mb !== undefined) profile.resources.ramMb = file.resources.ram_mb;
  if (file.resources?.vcpus !== undefined) profile.resources.vcpus = file.resources.vcpus;
  if (file.resources?.disk_gb !== undefined) profile.resources.diskGb = file.resources.disk_gb;
  return profile;
}

async function readProfileFile(path: string): Promise<ProfileFile> {
  const data = await loadYamlFile(path);
  const result = validateProfileFile(data);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid profile: ${path}`,
      'CONFIG_VALIDATION_FAILED',
      undefined,
      path,
      result.errors.map(({ path: field, message }) => ({ path: field, message }))
    );
  }
  return result.value;
}

/**
 * Load a profile by name.
 *
 * @throws ValidationError if the name is not a plain file name
 * @throws ConfigError if no directory holds the profile or it is invalid
 */
export async function loadProfile(name: string, options: ProfileSearchOptions): Promise<Profile> {
  if (!PROFILE_NAME.test(name)) {
    throw new ValidationError(
      `Invalid profile name '${name}'`,
      'profile',
      'Profile names may contain letters, digits, dots, dashes and underscores.'
    );
  }

  const dirs = searchDirs(options);
  for (const dir of dirs) {
    const path = join(dir, `${name}.yaml`);
    if (await pathExists(path)) {
      return normalizeProfile(await readProfileFile(path), name, options.cwd);
    }
  }

  throw new ConfigError(
    `Profile '${name}' not found`,
    'CONFIG_NOT_FOUND',
    `Create ${join(dirs[0] ?? '.clonebox.d', `${name}.yaml`)} or run \`clonebox profiles\` to list available ones.`
  );
}

/**
 * List every profile visible from a working directory.
 *
 * A name found in an earlier directory hides the same name later on.
 */
export async function listProfiles(options: ProfileSearchOptions): Promise<ProfileEntry[]> {
  const found = new Map<string, ProfileEntry>();

  for (const dir of searchDirs(options)) {
    let files: string[];
    try {
      files = await readdir(dir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') continue;
      throw error;
    }

    for (const file of files.filter((f) => f.endsWith('.yaml')).sort()) {
      const name = file.slice(0, -'.yaml'.length);
      if (found.has(name) || !PROFILE_NAME.test(name)) continue;
      const path = join(dir, file);
      const profile = await readProfileFile(path);
      const entry: ProfileEntry = { name, path };
      if (profile.description !== undefined) entry.description = profile.description;
      found.set(name, entry);
    }
  }

  return [...found.values()].sort((a, b) => compareStrings(a.name, b.name));
}
