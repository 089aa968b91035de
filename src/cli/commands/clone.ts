/**
 * Clone Command Handlers
 *
 * detect shows what the host would contribute; clone turns a working
 * directory into a .clonebox.yaml (and optionally a VM); profiles lists
 * the named profiles visible from a directory.
 */

import { resolve } from 'node:path';

import { dumpCloneSpec, loadCloneSpec, saveCloneSpec } from '../../config/loader.js';
import { listProfiles, loadProfile } from '../../detect/profiles.js';
import { ConfigError } from '../../core/errors.js';
import { pathExists } from '../../lib/fs.js';
import { getCloneSpecPath } from '../../lib/paths.js';
import type { AuthMethod, MountMapping, NetworkMode, ResourceLimits } from '../../config/types.js';
import {
  interruptSignal,
  parsePositiveInt,
  printDetections,
  printHealthReport,
  printVMTable,
  runCommand,
  type GlobalOptions,
} from '../output.js';

/**
 * Options for the detect command
 */
export type DetectCommandOptions = GlobalOptions & {
  minConfidence?: string;
};

/**
 * Options for the clone command
 */
export type CloneCommandOptions = GlobalOptions & {
  profile?: string;
  name?: string;
  ram?: string;
  vcpus?: string;
  disk?: string;
  network?: string;
  auth?: string;
  password?: string;
  /** Repeated `host:guest` pairs */
  mount?: string[];
  minConfidence?: string;
  /** Print the spec instead of writing it */
  dryRun?: boolean;
  /** Create the VM once the spec is written */
  create?: boolean;
};

const NETWORK_MODES: readonly NetworkMode[] = ['auto', 'default', 'user'];
const AUTH_METHODS: readonly AuthMethod[] = ['ssh-key', 'one-time-password', 'password'];

function parseConfidence(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigError(
      `--min-confidence must be between 0 and 1, got '${value}'`,
      'CONFIG_VALIDATION_FAILED'
    );
  }
  return parsed;
}

function parseChoice<T extends string>(value: string | undefined, choices: readonly T[], flag: string): T | undefined {
  if (value === undefined) return undefined;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(
      `${flag} must be one of ${choices.join(', ')}, got '${value}'`,
      'CONFIG_VALIDATION_FAILED'
    );
  }
  return match;
}

/**
 * Parse `host:guest` mount requests; host paths resolve against `cwd`.
 */
export function parseMountRequests(values: string[], cwd: string): MountMapping[] {
  return values.map((value) => {
    const separator = value.lastIndexOf(':');
    const hostPath = value.slice(0, separator);
    const guestPath = value.slice(separator + 1);
    if (separator <= 0 || !guestPath.startsWith('/')) {
      throw new ConfigError(
        `--mount expects HOST:GUEST with an absolute guest path, got '${value}'`,
        'CONFIG_VALIDATION_FAILED'
      );
    }
    return { hostPath: resolve(cwd, hostPath), guestPath };
  });
}

function parseResources(options: CloneCommandOptions): Partial<ResourceLimits> {
  const resources: Partial<ResourceLimits> = {};
  if (options.ram !== undefined) resources.ramMb = parsePositiveInt(options.ram, '--ram');
  if (options.vcpus !== undefined) resources.vcpus = parsePositiveInt(options.vcpus, '--vcpus');
  if (options.disk !== undefined) resources.diskGb = parsePositiveInt(options.disk, '--disk');
  return resources;
}

/**
 * Scan the host and print what was found.
 */
export async function detectCommand(dir: string | undefined, options: DetectCommandOptions): Promise<void> {
  await runCommand('detect', options, async ({ logger, engine }) => {
    const cwd = resolve(dir ?? '.');
    const minConfidence = parseConfidence(options.minConfidence) ?? 0;
    const items = (await engine.detector(cwd).detect()).filter((item) => item.confidence >= minConfidence);
    printDetections(logger, items);
    logger.setData({ cwd, detected: items });
  });
}

/**
 * Detect, merge with a profile and any existing spec, and write
 * .clonebox.yaml into the directory.
 */
export async function cloneCommand(dir: string | undefined, options: CloneCommandOptions): Promise<void> {
  await runCommand('clone', options, async ({ logger, engine }) => {
    const cwd = resolve(dir ?? '.');
    const specPath = getCloneSpecPath(cwd);

    const existing = (await pathExists(specPath))
      ? await loadCloneSpec(specPath, engine.settings.defaults)
      : undefined;
    if (existing) {
      logger.info(`Merging with existing spec: ${specPath}`);
      if (existing.unmapped.length > 0) {
        logger.warning(`Fields not carried into schema v2: ${existing.unmapped.join(', ')}`);
      }
    }
    const profile = options.profile !== undefined ? await loadProfile(options.profile, { cwd }) : undefined;
    const detected = await engine.detector(cwd).detect();

    const method = parseChoice(options.auth, AUTH_METHODS, '--auth');
    const spec = await engine.synthesizer.synthesize(detected, profile, existing?.spec, {
      cwd,
      name: options.name,
      session: options.user ? 'user' : options.system ? 'system' : undefined,
      network: parseChoice(options.network, NETWORK_MODES, '--network'),
      resources: parseResources(options),
      auth: method === undefined ? undefined : { method, password: options.password },
      mounts: parseMountRequests(options.mount ?? [], cwd),
      minConfidence: parseConfidence(options.minConfidence),
    });

    if (options.dryRun) {
      if (logger.getMode() === 'human') {
        process.stdout.write(dumpCloneSpec(spec));
      }
      logger.setData({ spec });
      return;
    }

    await saveCloneSpec(specPath, spec);
    logger.success(`Wrote ${specPath}`);
    logger.info(
      `VM '${spec.vm.name}': ${spec.packages.length} package(s), ${spec.services.length} service(s), ${spec.mounts.length} mount(s)`
    );

    if (!options.create) {
      logger.setData({ path: specPath, spec });
      return;
    }

    logger.newline();
    const result = await engine.lifecycle.create(spec, { signal: interruptSignal() });
    printVMTable(logger, [result.record]);
    if (result.health) {
      printHealthReport(logger, result.health);
    }
    logger.setData({ path: specPath, spec, vm: result.record, health: result.health });
  });
}

/**
 * List profiles visible from a directory.
 */
export async function profilesCommand(dir: string | undefined, options: GlobalOptions): Promise<void> {
  await runCommand('profiles', options, async ({ logger }) => {
    const profiles = await listProfiles({ cwd: resolve(dir ?? '.') });
    if (profiles.length === 0) {
      logger.info('No profiles found.');
    } else {
      logger.table(
        ['NAME', 'DESCRIPTION', 'PATH'],
        profiles.map((profile) => [profile.name, profile.description ?? '', profile.path])
      );
    }
    logger.setData({ profiles });
  });
}
