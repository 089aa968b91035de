/**
 * libvirt Backend
 *
 * Implements VirtualizationBackend by running `virsh -c <uri>` through a
 * CommandExecutor. Guest calls go through the QEMU guest agent channel
 * (`virsh qemu-agent-command`).
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

import type {
  DiskDefinition,
  DomainDefinition,
  DomainInfo,
  GuestCallOptions,
  GuestExecResult,
  SnapshotInfo,
  VirtualizationBackend,
} from './types.js';
import {
  buildAgentCommand,
  buildCreateDiskArgs,
  buildDomainXml,
  parseImageInfo,
  parseDomainAddress,
  parseDomainState,
  parseGuestExecPid,
  parseGuestExecStatus,
  parseNameList,
  parseSnapshotList,
  virshArgs,
} from './commands.js';
import { ExecutorError, type CommandExecutor } from './executor.js';
import {
  BackendError,
  BackendUnavailable,
  StaleStateConflict,
  VMNotFoundError,
} from '../core/errors.js';

/**
 * Options for constructing a LibvirtBackend
 */
export interface LibvirtBackendOptions {
  /** libvirt connection URI, e.g. qemu:///session or qemu+ssh://host/system */
  uri: string;
  executor: CommandExecutor;
  /** ISO authoring tool used for the NoCloud seed (default: genisoimage) */
  isoTool?: string;
  /** Disk image tool (default: qemu-img) */
  imageTool?: string;
  /** Timeout for a single virsh call (default: 60000) */
  commandTimeoutMs?: number;
  /** Poll interval for guest-exec-status (default: 250) */
  execPollIntervalMs?: number;
}

/**
 * File name of the seed image written into a definition's seed directory.
 */
export const SEED_ISO = 'seed.iso';

/**
 * Map a failed virsh call onto the engine's error taxonomy.
 */
export function classifyVirshError(
  error: unknown,
  operation: string,
  uri: string,
  name?: string
): Error {
  if (!(error instanceof ExecutorError)) {
    return error instanceof Error ? error : new Error(String(error));
  }

  if (error.code === 'NOT_AVAILABLE') {
    return new BackendUnavailable(`virsh is not available: ${error.message}`, uri);
  }

  const stderr = error.stderr.toLowerCase();

  if (
    stderr.includes('failed to connect to the hypervisor') ||
    stderr.includes('no connection driver available') ||
    stderr.includes('cannot connect to')
  ) {
    return new BackendUnavailable(`Cannot reach libvirt at ${uri}: ${error.message}`, uri);
  }

  if (stderr.includes('snapshot not found')) {
    return new BackendError(error.message, operation, error.stderr);
  }

  if (
    name !== undefined &&
    (stderr.includes('domain not found') ||
      stderr.includes('failed to get domain') ||
      stderr.includes('no domain with matching name'))
  ) {
    return new VMNotFoundError(name);
  }

  if (
    name !== undefined &&
    (stderr.includes('already active') ||
      stderr.includes('is not running') ||
      stderr.includes('domain is not running') ||
      stderr.includes('already exists'))
  ) {
    return new StaleStateConflict(`${operation} on '${name}' conflicts with its current state: ${error.message}`, name);
  }

  return new BackendError(`virsh ${operation} failed: ${error.message}`, operation, error.stderr);
}

/**
 * Drives libvirt through the virsh command-line tool.
 */
export class LibvirtBackend implements VirtualizationBackend {
  private readonly uri: string;
  private readonly executor: CommandExecutor;
  private readonly isoTool: string;
  private readonly imageTool: string;
  private readonly commandTimeoutMs: number;
  private readonly execPollIntervalMs: number;

  constructor(options: LibvirtBackendOptions) {
    this.uri = options.uri;
    this.executor = options.executor;
    this.isoTool = options.isoTool ?? 'genisoimage';
    this.imageTool = options.imageTool ?? 'qemu-img';
    this.commandTimeoutMs = options.commandTimeoutMs ?? 60000;
    this.execPollIntervalMs = options.execPollIntervalMs ?? 250;
  }

  private async virsh(
    operation: string,
    name: string | undefined,
    args: string[],
    options: { timeoutMs?: number; signal?: AbortSignal } = {}
  ): Promise<string> {
    try {
      const { stdout } = await this.executor.run('virsh', virshArgs(this.uri, ...args), {
        timeout: options.timeoutMs ?? this.commandTimeoutMs,
        signal: options.signal,
      });
      return stdout;
    } catch (error) {
      throw classifyVirshError(error, operation, this.uri, name);
    }
  }

  private async image(operation: string, args: string[]): Promise<string> {
    try {
      const { stdout } = await this.executor.run(this.imageTool, args, { timeout: this.commandTimeoutMs });
      return stdout;
    } catch (error) {
      if (error instanceof ExecutorError) {
        if (error.code === 'NOT_AVAILABLE') {
          throw new BackendUnavailable(`${this.imageTool} is not available: ${error.message}`, this.uri);
        }
        throw new BackendError(`${this.imageTool} ${operation} failed: ${error.message}`, operation, error.stderr);
      }
      throw error;
    }
  }

  /**
   * qcow2 is required for `snapshot-create-as`: libvirt takes internal
   * snapshots only of qcow2 disks.
   */
  async createDisk(disk: DiskDefinition): Promise<void> {
    const backing =
      disk.backingImage !== undefined
        ? parseImageInfo(await this.image('info', ['info', '--output=json', disk.backingImage]))
        : undefined;
    await this.image('create', buildCreateDiskArgs(disk, backing));
  }

  async defineDomain(definition: DomainDefinition): Promise<void> {
    const seedIso = join(definition.seedDir, SEED_ISO);
    try {
      await this.executor.run(
        this.isoTool,
        [
          '-output', seedIso,
          '-volid', 'cidata',
          '-joliet', '-rock',
          join(definition.seedDir, 'user-data'),
          join(definition.seedDir, 'meta-data'),
          join(definition.seedDir, 'network-config'),
        ],
        { timeout: this.commandTimeoutMs }
      );
    } catch (error) {
      throw classifyVirshError(error, 'seed-image', this.uri);
    }

    const workDir = await mkdtemp(join(tmpdir(), 'clonebox-define-'));
    try {
      const xmlPath = join(workDir, 'domain.xml');
      await writeFile(xmlPath, buildDomainXml(definition, seedIso), 'utf-8');
      await this.virsh('define', definition.name, ['define', xmlPath]);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  async undefineDomain(name: string): Promise<void> {
    await this.virsh('undefine', name, ['undefine', name, '--snapshots-metadata']);
  }

  async startDomain(name: string): Promise<void> {
    await this.virsh('start', name, ['start', name]);
  }

  async shutdownDomain(name: string): Promise<void> {
    await this.virsh('shutdown', name, ['shutdown', name]);
  }

  async destroyDomain(name: string): Promise<void> {
    await this.virsh('destroy', name, ['destroy', name]);
  }

  async getDomain(name: string): Promise<DomainInfo | null> {
    let stdout: string;
    try {
      stdout = await this.virsh('domstate', name, ['domstate', name]);
    } catch (error) {
      if (error instanceof VMNotFoundError) {
        return null;
      }
      throw error;
    }

    const state = parseDomainState(stdout);
    return {
      name,
      state,
      address: state === 'running' ? await this.getAddress(name) : null,
    };
  }

  private async getAddress(name: string): Promise<string | null> {
    try {
      return parseDomainAddress(await this.virsh('domifaddr', name, ['domifaddr', name]));
    } catch (error) {
      // No lease yet (or user-mode networking): the address is unknown, not an error
      if (error instanceof BackendError) {
        return null;
      }
      throw error;
    }
  }

  async listDomains(): Promise<DomainInfo[]> {
    const names = parseNameList(await this.virsh('list', undefined, ['list', '--all', '--name']));
    const domains: DomainInfo[] = [];
    for (const name of names) {
      const domain = await this.getDomain(name);
      if (domain) domains.push(domain);
    }
    return domains;
  }

  async createSnapshot(name: string, snapshot: string): Promise<SnapshotInfo> {
    await this.virsh('snapshot-create', name, ['snapshot-create-as', name, snapshot, '--atomic']);
    const created = (await this.listSnapshots(name)).find((s) => s.name === snapshot);
    return created ?? { name: snapshot, handle: snapshot, createdAt: new Date().toISOString() };
  }

  async revertSnapshot(name: string, snapshot: string): Promise<void> {
    await this.virsh('snapshot-revert', name, ['snapshot-revert', name, snapshot]);
  }

  async deleteSnapshot(name: string, snapshot: string): Promise<void> {
    await this.virsh('snapshot-delete', name, ['snapshot-delete', name, snapshot]);
  }

  async listSnapshots(name: string): Promise<SnapshotInfo[]> {
    return parseSnapshotList(await this.virsh('snapshot-list', name, ['snapshot-list', name]));
  }

  async guestPing(name: string, options: GuestCallOptions): Promise<void> {
    await this.agentCommand(name, buildAgentCommand('guest-ping'), options.timeoutMs, options.signal);
  }

  async guestExec(
    name: string,
    argv: string[],
    options: GuestCallOptions
  ): Promise<GuestExecResult> {
    const [path, ...args] = argv;
    if (path === undefined) {
      throw new BackendError('guest-exec needs a command', 'guest-exec');
    }

    const deadline = Date.now() + options.timeoutMs;
    const pid = parseGuestExecPid(
      await this.agentCommand(
        name,
        buildAgentCommand('guest-exec', { path, arg: args, 'capture-output': true }),
        options.timeoutMs,
        options.signal
      )
    );

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new BackendError(
          `Command '${argv.join(' ')}' in '${name}' did not finish within ${options.timeoutMs}ms`,
          'guest-exec'
        );
      }
      const status = parseGuestExecStatus(
        await this.agentCommand(
          name,
          buildAgentCommand('guest-exec-status', { pid }),
          remaining,
          options.signal
        )
      );
      if (status) {
        return status;
      }
      await sleep(Math.min(this.execPollIntervalMs, remaining), undefined, { signal: options.signal });
    }
  }

  private async agentCommand(
    name: string,
    payload: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<string> {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    return this.virsh(
      'qemu-agent-command',
      name,
      ['qemu-agent-command', name, payload, '--timeout', String(seconds)],
      { timeoutMs, signal }
    );
  }
}
