/**
 * Configuration Types for clonebox
 *
 * These types represent the `.clonebox.yaml` file in both schema versions,
 * and the normalized in-memory CloneSpec every component works with.
 */

// =============================================================================
// Shared enumerations
// =============================================================================

/**
 * Isolation boundary of the virtualization backend instance.
 */
export type SessionScope = 'user' | 'system';

/**
 * How the guest's first user authenticates.
 */
export type AuthMethod = 'ssh-key' | 'one-time-password' | 'password';

/**
 * Guest networking mode.
 */
export type NetworkMode = 'auto' | 'default' | 'user';

/**
 * Kinds of health probes a spec can declare.
 */
export type ProbeType = 'tcp' | 'http' | 'agent-ping' | 'agent-exec';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Health check declaration as written in YAML (both versions).
 */
export interface HealthCheckFileEntry {
  name: string;
  type: ProbeType;
  /** "host:port" or port for tcp, URL or "port/path" for http, shell command for agent-exec */
  target?: string;
  /** Expected exit status for agent-exec. Default: 0 */
  expect_exit?: number;
  /** Expected response status for http. Default: 200 */
  expect_status?: number;
  /** Text the http response body must contain */
  expect_body?: string;
  /** Per-probe deadline in milliseconds */
  timeout_ms?: number;
}

/**
 * Schema v1: every field flat at the top level.
 */
export interface CloneSpecFileV1 {
  version: 1 | '1';
  name: string;
  session?: SessionScope;
  ram_mb?: number;
  vcpus?: number;
  disk_size_gb?: number;
  network_mode?: NetworkMode;
  /** Host path -> guest mountpoint */
  paths?: Record<string, string>;
  packages?: string[];
  services?: string[];
  auth_method?: AuthMethod;
  password?: string;
  health_checks?: HealthCheckFileEntry[];
  [extra: string]: unknown;
}

/**
 * Schema v2: structured sections.
 */
export interface CloneSpecFileV2 {
  version: 2 | '2';
  vm: {
    name: string;
    session?: SessionScope;
    network?: NetworkMode;
    resources?: {
      ram_mb?: number;
      vcpus?: number;
      disk_gb?: number;
    };
  };
  mounts?: Record<string, string>;
  packages?: string[];
  services?: string[];
  auth?: {
    method: AuthMethod;
    password?: string;
  };
  health_checks?: HealthCheckFileEntry[];
}

/**
 * Either schema version, discriminated by `version`.
 */
export type CloneSpecFile = CloneSpecFileV1 | CloneSpecFileV2;

/**
 * Named reusable bundle of packages, services and mounts.
 */
export interface ProfileFile {
  name?: string;
  description?: string;
  packages?: string[];
  services?: string[];
  mounts?: Record<string, string>;
  resources?: {
    ram_mb?: number;
    vcpus?: number;
    disk_gb?: number;
  };
  health_checks?: HealthCheckFileEntry[];
}

/**
 * Multi-VM compose file.
 */
export interface ComposeFile {
  version: 1 | '1';
  name: string;
  all_or_nothing?: boolean;
  vms: Record<
    string,
    {
      /** Path to the member's clone spec (file or directory) */
      spec: string;
      depends_on?: string[];
    }
  >;
}

// =============================================================================
// Normalized Types
// =============================================================================

/**
 * Resource limits of a VM.
 */
export interface ResourceLimits {
  ramMb: number;
  vcpus: number;
  diskGb: number;
}

/**
 * One host directory shared into the guest.
 */
export interface MountMapping {
  /** Canonical (symlink-resolved) absolute host path */
  hostPath: string;
  /** Absolute mountpoint inside the guest */
  guestPath: string;
}

/**
 * Authentication settings.
 */
export interface AuthConfig {
  method: AuthMethod;
  /** Required for the password method; carried over from v1 otherwise */
  password?: string;
}

/**
 * Normalized health check declaration.
 */
export interface HealthCheckDecl {
  name: string;
  type: ProbeType;
  target?: string;
  expectExit?: number;
  expectStatus?: number;
  expectBody?: string;
  timeoutMs?: number;
}

/**
 * The durable, versioned description of a cloned VM.
 */
export interface CloneSpec {
  schemaVersion: 2;
  vm: {
    name: string;
    session: SessionScope;
    network: NetworkMode;
    resources: ResourceLimits;
  };
  /** Sorted by guest path; host paths are unique */
  mounts: MountMapping[];
  /** Sorted, unique after case-folding */
  packages: string[];
  /** Sorted, unique after case-folding */
  services: string[];
  auth: AuthConfig;
  healthChecks: HealthCheckDecl[];
}

/**
 * Normalized profile.
 */
export interface Profile {
  name: string;
  description?: string;
  packages: string[];
  services: string[];
  mounts: Array<{ hostPath: string; guestPath: string }>;
  resources: Partial<ResourceLimits>;
  healthChecks: HealthCheckDecl[];
}
