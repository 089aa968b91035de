/**
 * Virtualization Backend Interface
 *
 * The only capability set the engine relies on. Concrete stacks (libvirt
 * through virsh, the in-process fake used by tests) are adapters behind
 * this interface.
 */

import type { NetworkDeclaration, MountDeclaration } from '../provision/renderer.js';

/**
 * Domain state as reported by the backend
 */
export type DomainState = 'running' | 'stopped' | 'paused' | 'crashed' | 'unknown';

/**
 * Backend view of one domain
 */
export interface DomainInfo {
  name: string;
  state: DomainState;
  /** First guest IPv4 address, when the backend knows one */
  address: string | null;
}

/**
 * Everything needed to register a domain
 */
export interface DomainDefinition {
  name: string;
  ramMb: number;
  vcpus: number;
  /** Absolute path of the root disk image */
  diskPath: string;
  /** Absolute path of the NoCloud seed (user-data, meta-data, network-config) */
  seedDir: string;
  mounts: MountDeclaration[];
  network: NetworkDeclaration;
}

/**
 * Root disk to create before a domain is defined
 */
export interface DiskDefinition {
  /** Absolute path of the new image */
  path: string;
  sizeGb: number;
  /** Image the new disk is layered on (copy-on-write); a blank disk when unset */
  backingImage?: string;
}

/**
 * Backend snapshot record
 */
export interface SnapshotInfo {
  name: string;
  /** Backend-specific identifier */
  handle: string;
  /** ISO 8601 */
  createdAt: string;
}

/**
 * Options shared by guest-agent calls
 */
export interface GuestCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Result of a command run inside the guest
 */
export interface GuestExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Domain lifecycle, snapshot and guest-exec capabilities.
 *
 * Methods that act on a missing domain throw VMNotFoundError, except
 * getDomain which returns null. An unreachable backend is reported as
 * BackendUnavailable; a request the current domain state rejects as
 * StaleStateConflict.
 */
export interface VirtualizationBackend {
  /** Create a snapshot-capable root disk image */
  createDisk(disk: DiskDefinition): Promise<void>;
  defineDomain(definition: DomainDefinition): Promise<void>;
  undefineDomain(name: string): Promise<void>;
  startDomain(name: string): Promise<void>;
  /** Request a graceful shutdown; returns without waiting for it */
  shutdownDomain(name: string): Promise<void>;
  /** Terminate immediately */
  destroyDomain(name: string): Promise<void>;
  getDomain(name: string): Promise<DomainInfo | null>;
  listDomains(): Promise<DomainInfo[]>;

  createSnapshot(name: string, snapshot: string): Promise<SnapshotInfo>;
  revertSnapshot(name: string, snapshot: string): Promise<void>;
  deleteSnapshot(name: string, snapshot: string): Promise<void>;
  listSnapshots(name: string): Promise<SnapshotInfo[]>;

  guestPing(name: string, options: GuestCallOptions): Promise<void>;
  guestExec(name: string, argv: string[], options: GuestCallOptions): Promise<GuestExecResult>;
}
