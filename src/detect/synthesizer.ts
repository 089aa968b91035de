/**
 * Synthesizer
 *
 * Merges raw detections with an optional profile and an optional prior
 * clone spec into a normalized CloneSpec.
 *
 * Precedence for every scalar setting: explicit options (the most recent
 * user input), then the existing spec, then the profile, then settings
 * defaults. Lists are unioned in the order existing, profile, detections.
 */

import { constants } from 'node:fs';
import { access, realpath } from 'node:fs/promises';
import { basename } from 'node:path';

import type {
  AuthConfig,
  CloneSpec,
  CloneSpecFile,
  HealthCheckDecl,
  MountMapping,
  NetworkMode,
  Profile,
  ResourceLimits,
  SessionScope,
} from '../config/types.js';
import type { DetectedItem } from './types.js';
import { CATALOG } from './probes.js';
import { normalizeCloneSpec, sortMounts } from '../config/loader.js';
import { toV2 } from '../config/migrate.js';
import { validateResources, type EngineSettings } from '../config/settings.js';
import { ValidationError, describeError } from '../core/errors.js';
import { compareStrings, uniqueCaseFolded } from '../lib/collections.js';
import type { Logger } from '../lib/logger.js';
import { getMountRoot, getPathDepth, isStrictAncestor } from '../lib/paths.js';

/**
 * Explicit choices that override everything else
 */
export interface SynthesisOptions {
  /** Working directory being cloned; names the VM and resolves v1 paths */
  cwd: string;
  name?: string;
  session?: SessionScope;
  network?: NetworkMode;
  resources?: Partial<ResourceLimits>;
  auth?: AuthConfig;
  /** Additional host path -> guest mountpoint requests */
  mounts?: MountMapping[];
  /** Detections below this confidence are ignored (default: 0) */
  minConfidence?: number;
}

/**
 * A prior spec, already normalized or as read from a file.
 */
export type ExistingSpec = CloneSpec | CloneSpecFile;

const VM_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Derive a VM name from a directory name.
 */
export function deriveVmName(cwd: string): string {
  const cleaned = basename(cwd)
    .replace(/[^A-Za-z0-9._-]+/g, '-')
    .replace(/^[^A-Za-z0-9]+/, '')
    .slice(0, 56);
  return `clone-${cleaned || 'root'}`;
}

/**
 * Pick the more specific of two guest mountpoints.
 *
 * More path segments wins; ties go to the lexicographically smaller path.
 */
export function moreSpecificGuestPath(a: string, b: string): string {
  const depthA = getPathDepth(a);
  const depthB = getPathDepth(b);
  if (depthA !== depthB) {
    return depthA > depthB ? a : b;
  }
  return compareStrings(a, b) <= 0 ? a : b;
}

/**
 * Collapse mounts whose host paths are already canonical.
 *
 * - Equal host paths keep the most specific guest mountpoint.
 * - A host path that is a strict descendant of another host path whose
 *   guest mountpoint shares the same root is dropped in favour of the
 *   ancestor.
 *
 * @throws ValidationError if two different host paths remain at the same
 *   guest mountpoint
 */
export function collapseMounts(mounts: MountMapping[]): MountMapping[] {
  const byHost = new Map<string, string>();
  for (const mount of mounts) {
    const current = byHost.get(mount.hostPath);
    byHost.set(
      mount.hostPath,
      current === undefined ? mount.guestPath : moreSpecificGuestPath(current, mount.guestPath)
    );
  }

  const unique = [...byHost.entries()].map(([hostPath, guestPath]) => ({ hostPath, guestPath }));
  const kept = unique.filter(
    (mount) =>
      !unique.some(
        (other) =>
          isStrictAncestor(other.hostPath, mount.hostPath) &&
          getMountRoot(other.guestPath) === getMountRoot(mount.guestPath)
      )
  );

  const byGuest = new Map<string, string>();
  for (const mount of kept) {
    const clash = byGuest.get(mount.guestPath);
    if (clash !== undefined) {
      throw new ValidationError(
        `Host paths ${clash} and ${mount.hostPath} are both mounted at ${mount.guestPath}`,
        'mounts',
        'Give one of them a different guest mountpoint.'
      );
    }
    byGuest.set(mount.guestPath, mount.hostPath);
  }

  return sortMounts(kept);
}

/**
 * Resolve a host path to its canonical form and check it is readable.
 *
 * @throws ValidationError if the path is missing or unreadable
 */
export async function canonicalizeHostPath(hostPath: string): Promise<string> {
  let canonical: string;
  try {
    canonical = await realpath(hostPath);
  } catch (error) {
    throw new ValidationError(
      `Host path ${hostPath} does not exist: ${describeError(error)}`,
      'mounts',
      'Create the directory or remove it from the clone.'
    );
  }
  try {
    await access(canonical, constants.R_OK);
  } catch (error) {
    throw new ValidationError(
      `Host path ${hostPath} is not readable: ${describeError(error)}`,
      'mounts',
      'Fix the directory permissions or remove it from the clone.'
    );
  }
  return canonical;
}

/**
 * Order detections so higher confidence is seen first.
 */
function byConfidence(items: DetectedItem[]): DetectedItem[] {
  return [...items].sort(
    (a, b) => b.confidence - a.confidence || compareStrings(a.name, b.name)
  );
}

function isCloneSpecFile(existing: ExistingSpec): existing is CloneSpecFile {
  return 'version' in existing;
}

/**
 * Builds CloneSpecs from detections, profiles and prior specs.
 */
export class Synthesizer {
  constructor(
    private readonly settings: Pick<EngineSettings, 'defaults' | 'caps' | 'session'>,
    private readonly logger: Logger,
    private readonly servicePorts: Record<string, number> = CATALOG.servicePorts
  ) {}

  /**
   * Produce a CloneSpec.
   *
   * @throws ValidationError for missing or unreadable host paths, mount
   *   clashes, resources above the configured caps, or a password method
   *   without a password
   */
  async synthesize(
    detected: DetectedItem[],
    profile: Profile | undefined,
    existing: ExistingSpec | undefined,
    options: SynthesisOptions
  ): Promise<CloneSpec> {
    const prior = this.normalizeExisting(existing, options.cwd);
    const minConfidence = options.minConfidence ?? 0;
    const items = byConfidence(detected.filter((item) => item.confidence >= minConfidence));

    const name = options.name ?? prior?.spec.vm.name ?? deriveVmName(options.cwd);
    if (!VM_NAME.test(name) || name.length > 64) {
      throw new ValidationError(
        `Invalid VM name '${name}'`,
        'vm.name',
        'Use up to 64 letters, digits, dots, dashes and underscores.'
      );
    }

    const packages = uniqueCaseFolded([
      ...(prior?.spec.packages ?? []),
      ...(profile?.packages ?? []),
      ...items.flatMap((item) =>
        item.kind !== 'path' && item.package !== undefined ? [item.package] : []
      ),
    ]);

    const services = uniqueCaseFolded([
      ...(prior?.spec.services ?? []),
      ...(profile?.services ?? []),
      ...items.filter((item) => item.kind === 'service').map((item) => item.name),
    ]);

    const candidates: MountMapping[] = [
      ...(prior?.spec.mounts ?? []),
      ...(profile?.mounts ?? []),
      ...(options.mounts ?? []),
      ...items
        .filter((item) => item.kind === 'path')
        .map((item) => ({
          hostPath: item.name,
          guestPath: item.guestPath ?? `/mnt/${basename(item.name) || 'root'}`,
        })),
    ];
    const canonical: MountMapping[] = [];
    for (const mount of candidates) {
      canonical.push({
        hostPath: await canonicalizeHostPath(mount.hostPath),
        guestPath: mount.guestPath,
      });
    }
    const mounts = collapseMounts(canonical);

    const resources = this.resolveResources(
      options.resources ?? {},
      prior?.resources ?? {},
      profile?.resources ?? {}
    );

    const auth = options.auth ?? prior?.spec.auth ?? { method: 'ssh-key' };
    if (auth.method === 'password' && (auth.password === undefined || auth.password === '')) {
      throw new ValidationError(
        `VM '${name}' uses password authentication but no password is set`,
        'auth.password'
      );
    }

    return {
      schemaVersion: 2,
      vm: {
        name,
        session: options.session ?? prior?.spec.vm.session ?? this.settings.session,
        network: options.network ?? prior?.spec.vm.network ?? 'auto',
        resources,
      },
      mounts,
      packages,
      services,
      auth: auth.password === undefined ? { method: auth.method } : { ...auth },
      healthChecks: this.mergeHealthChecks(
        prior?.spec.healthChecks ?? [],
        profile?.healthChecks ?? [],
        services
      ),
    };
  }

  /**
   * Bring a prior spec into normalized form.
   *
   * Also returns the resources the prior spec stated explicitly, so that
   * defaults filled in during normalization do not outrank the profile.
   */
  private normalizeExisting(
    existing: ExistingSpec | undefined,
    cwd: string
  ): { spec: CloneSpec; resources: Partial<ResourceLimits> } | undefined {
    if (existing === undefined) {
      return undefined;
    }
    if (!isCloneSpecFile(existing)) {
      return { spec: existing, resources: existing.vm.resources };
    }

    const migrated = toV2(existing);
    if (migrated.unmapped.length > 0) {
      this.logger.warning(
        `Fields not carried into schema v2: ${migrated.unmapped.join(', ')}`
      );
    }
    const stated: Partial<ResourceLimits> = {};
    const fileResources = migrated.value.vm.resources;
    if (fileResources?.ram_mb !== undefined) stated.ramMb = fileResources.ram_mb;
    if (fileResources?.vcpus !== undefined) stated.vcpus = fileResources.vcpus;
    if (fileResources?.disk_gb !== undefined) stated.diskGb = fileResources.disk_gb;

    return {
      spec: normalizeCloneSpec(migrated.value, cwd, this.settings.defaults),
      resources: stated,
    };
  }

  private resolveResources(
    explicit: Partial<ResourceLimits>,
    prior: Partial<ResourceLimits>,
    profile: Partial<ResourceLimits>
  ): ResourceLimits {
    const { defaults, caps } = this.settings;
    const resources: ResourceLimits = {
      ramMb: explicit.ramMb ?? prior.ramMb ?? profile.ramMb ?? defaults.ramMb,
      vcpus: explicit.vcpus ?? prior.vcpus ?? profile.vcpus ?? defaults.vcpus,
      diskGb: explicit.diskGb ?? prior.diskGb ?? profile.diskGb ?? defaults.diskGb,
    };
    validateResources(resources, caps);
    return resources;
  }

  /**
   * Declared checks first, then a TCP probe for every enabled service
   * with a well-known port. The first check with a given name wins.
   */
  private mergeHealthChecks(
    prior: HealthCheckDecl[],
    profile: HealthCheckDecl[],
    services: string[]
  ): HealthCheckDecl[] {
    const generated: HealthCheckDecl[] = services.flatMap((service) => {
      const port = this.servicePorts[service.toLowerCase()];
      return port === undefined
        ? []
        : [{ name: `${service}-tcp`, type: 'tcp' as const, target: String(port) }];
    });

    const seen = new Set<string>();
    const merged: HealthCheckDecl[] = [];
    for (const check of [...prior, ...profile, ...generated]) {
      if (seen.has(check.name)) continue;
      seen.add(check.name);
      merged.push({ ...check });
    }
    return merged;
  }
}
