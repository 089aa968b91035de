/**
 * Backing Store
 *
 * Owns the per-VM directory tree under the store root:
 *
 *   <root>/<vm>/disk.qcow2        root disk (qcow2, optionally backed by the base image)
 *   <root>/<vm>/seed/             NoCloud user-data, meta-data, network-config
 *   <root>/<vm>/clonebox.yaml     copy of the spec the VM was created from
 *   <root>/<vm>/id_ed25519[.pub]  keypair (ssh-key auth only)
 *   <root>/<vm>/meta.json         VM metadata
 *
 * Only the LifecycleOrchestrator writes here. Every write is atomic
 * (write to temp, then rename).
 */

import { mkdir, readFile, readdir, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { CloneSpec, SessionScope } from '../config/types.js';
import { dumpCloneSpec, loadCloneSpec } from '../config/loader.js';
import { ValidationError } from '../core/errors.js';
import { Secret, generateSshKeyPair, type SshKeyPair } from '../provision/credentials.js';
import type { ProvisioningBundle } from '../provision/renderer.js';
import { errnoCode, pathExists, writeFileAtomic } from '../lib/fs.js';

/**
 * Metadata persisted beside each VM
 */
export interface VMMeta {
  version: 1;
  name: string;
  session: SessionScope;
  /** ISO 8601 */
  createdAt: string;
  diskGb: number;
}

/**
 * What allocate() created, for undo
 */
export interface Allocation {
  vmDir: string;
  /** Where the root disk is to be created */
  diskPath: string;
}

function isVMMeta(value: unknown): value is VMMeta {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'version' in value && value.version === 1 &&
    'name' in value && typeof value.name === 'string' &&
    'session' in value && (value.session === 'user' || value.session === 'system') &&
    'createdAt' in value && typeof value.createdAt === 'string' &&
    'diskGb' in value && typeof value.diskGb === 'number'
  );
}

/**
 * Manages per-VM backing-store directories.
 */
export class BackingStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  getRoot(): string {
    return this.root;
  }

  getVmDir(name: string): string {
    return join(this.root, name);
  }

  getDiskPath(name: string): string {
    return join(this.getVmDir(name), 'disk.qcow2');
  }

  getSeedDir(name: string): string {
    return join(this.getVmDir(name), 'seed');
  }

  getSpecPath(name: string): string {
    return join(this.getVmDir(name), 'clonebox.yaml');
  }

  private getMetaPath(name: string): string {
    return join(this.getVmDir(name), 'meta.json');
  }

  private getKeyPath(name: string): string {
    return join(this.getVmDir(name), 'id_ed25519');
  }

  /**
   * Check whether a VM directory exists.
   */
  async exists(name: string): Promise<boolean> {
    return pathExists(this.getVmDir(name));
  }

  /**
   * Create the VM directory.
   *
   * The store root is created on demand and never removed again, so
   * releasing one allocation cannot touch another VM's directory.
   *
   * @throws ValidationError if the VM directory already exists
   */
  async allocate(name: string): Promise<Allocation> {
    const vmDir = this.getVmDir(name);
    await mkdir(this.root, { recursive: true });
    try {
      await mkdir(vmDir);
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        throw new ValidationError(
          `Backing store for VM '${name}' already exists at ${vmDir}`,
          'vm.name',
          `Run \`clonebox delete ${name}\` or choose another name.`
        );
      }
      throw error;
    }
    return { vmDir, diskPath: this.getDiskPath(name) };
  }

  /**
   * Undo allocate(): remove the VM directory and everything in it.
   */
  async release(allocation: Allocation): Promise<void> {
    await rm(allocation.vmDir, { recursive: true, force: true });
  }

  /**
   * The VM's ssh keypair, generated and stored on first use.
   *
   * @param comment - Comment of a newly generated public key
   */
  async ensureKeyPair(name: string, comment: string): Promise<SshKeyPair> {
    const existing = await this.readKeyPair(name);
    if (existing) {
      return existing;
    }
    const keyPair = generateSshKeyPair(comment);
    await writeFileAtomic(this.getKeyPath(name), keyPair.privateKey.reveal(), 0o600);
    await writeFileAtomic(`${this.getKeyPath(name)}.pub`, `${keyPair.publicKey}\n`);
    return keyPair;
  }

  /**
   * Write the provisioning bundle, the spec copy and metadata.
   *
   * Files holding credentials are created with mode 0600.
   */
  async writeBundle(spec: CloneSpec, bundle: ProvisioningBundle, meta: VMMeta): Promise<void> {
    const name = spec.vm.name;
    const seedDir = this.getSeedDir(name);
    await mkdir(seedDir, { recursive: true });

    await writeFileAtomic(join(seedDir, 'user-data'), bundle.userData.reveal(), 0o600);
    await writeFileAtomic(join(seedDir, 'meta-data'), bundle.metaData);
    await writeFileAtomic(join(seedDir, 'network-config'), bundle.networkConfig);
    await writeFileAtomic(this.getSpecPath(name), dumpCloneSpec(spec), 0o600);

    await writeFileAtomic(this.getMetaPath(name), JSON.stringify(meta, null, 2));
  }

  /**
   * Undo writeBundle() and ensureKeyPair(), leaving the allocation in place.
   */
  async removeBundle(name: string): Promise<void> {
    await rm(this.getSeedDir(name), { recursive: true, force: true });
    for (const path of [
      this.getSpecPath(name),
      this.getKeyPath(name),
      `${this.getKeyPath(name)}.pub`,
      this.getMetaPath(name),
    ]) {
      await rm(path, { force: true });
      await rm(`${path}.tmp`, { force: true });
    }
  }

  /**
   * Read a VM's metadata, or null when the VM has no backing store.
   *
   * @throws Error if meta.json exists but is malformed
   */
  async readMeta(name: string): Promise<VMMeta | null> {
    let content: string;
    try {
      content = await readFile(this.getMetaPath(name), 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(content);
    if (!isVMMeta(parsed)) {
      throw new Error(`Malformed metadata in ${this.getMetaPath(name)}`);
    }
    return parsed;
  }

  /**
   * Read the spec a VM was created from.
   */
  async readSpec(name: string): Promise<CloneSpec | null> {
    if (!(await pathExists(this.getSpecPath(name)))) {
      return null;
    }
    return (await loadCloneSpec(this.getSpecPath(name))).spec;
  }

  /**
   * Read the VM's stored keypair, if it has one.
   */
  async readKeyPair(name: string): Promise<SshKeyPair | null> {
    const keyPath = this.getKeyPath(name);
    if (!(await pathExists(keyPath))) {
      return null;
    }
    const [privateKey, publicKey] = await Promise.all([
      readFile(keyPath, 'utf-8'),
      readFile(`${keyPath}.pub`, 'utf-8'),
    ]);
    return { privateKey: new Secret(privateKey), publicKey: publicKey.trim() };
  }

  /**
   * Names of all VMs with a backing store.
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.root);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
    const names: string[] = [];
    for (const entry of entries.sort()) {
      if (await pathExists(this.getMetaPath(entry))) {
        names.push(entry);
      }
    }
    return names;
  }

  /**
   * Delete a VM's whole directory. Missing directories are fine.
   */
  async remove(name: string): Promise<void> {
    await rm(this.getVmDir(name), { recursive: true, force: true });
  }
}
