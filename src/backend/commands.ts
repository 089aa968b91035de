/**
 * virsh Command Builders and Output Parsers
 *
 * Builds argument vectors for `virsh` and the domain XML it defines, and
 * turns virsh output back into typed values.
 */

import type { DiskDefinition, DomainDefinition, DomainState, GuestExecResult, SnapshotInfo } from './types.js';

/**
 * Escape a string for use in XML text and attribute values.
 */
export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Build the libvirt domain XML for a definition.
 *
 * @param definition - Domain parameters
 * @param seedIso - Path of the NoCloud seed image attached as a CD-ROM
 */
export function buildDomainXml(definition: DomainDefinition, seedIso: string): string {
  const shares = definition.mounts
    .map(
      (mount) => `    <filesystem type='mount' accessmode='passthrough'>
      <source dir='${escapeXml(mount.hostPath)}'/>
      <target dir='${escapeXml(mount.tag)}'/>
    </filesystem>`
    )
    .join('\n');

  const iface =
    definition.network.mode === 'user'
      ? `    <interface type='user'>
      <model type='virtio'/>
    </interface>`
      : `    <interface type='network'>
      <source network='default'/>
      <model type='virtio'/>
    </interface>`;

  const devices = [
    `    <disk type='file' device='disk'>
      <driver name='qemu' type='qcow2'/>
      <source file='${escapeXml(definition.diskPath)}'/>
      <target dev='vda' bus='virtio'/>
    </disk>`,
    `    <disk type='file' device='cdrom'>
      <driver name='qemu' type='raw'/>
      <source file='${escapeXml(seedIso)}'/>
      <target dev='sda' bus='sata'/>
      <readonly/>
    </disk>`,
    shares,
    iface,
    `    <channel type='unix'>
      <target type='virtio' name='org.qemu.guest_agent.0'/>
    </channel>`,
    `    <serial type='pty'/>
    <console type='pty'/>`,
  ].filter((block) => block.length > 0);

  return `<domain type='kvm'>
  <name>${escapeXml(definition.name)}</name>
  <memory unit='MiB'>${definition.ramMb}</memory>
  <vcpu>${definition.vcpus}</vcpu>
  <os>
    <type arch='x86_64' machine='q35'>hvm</type>
    <boot dev='hd'/>
  </os>
  <features>
    <acpi/>
    <apic/>
  </features>
  <cpu mode='host-passthrough'/>
  <devices>
${devices.join('\n')}
  </devices>
</domain>
`;
}

const GIB = 1024 ** 3;

/**
 * Format and virtual size of an image, from `qemu-img info --output=json`
 */
export interface ImageInfo {
  format: string;
  virtualSizeBytes: number;
}

/**
 * Parse `qemu-img info --output=json`.
 *
 * @throws Error if the output lacks a format or a virtual size
 */
export function parseImageInfo(stdout: string): ImageInfo {
  const parsed: unknown = JSON.parse(stdout);
  if (!isRecord(parsed) || typeof parsed['format'] !== 'string' || typeof parsed['virtual-size'] !== 'number') {
    throw new Error(`Unexpected qemu-img info output: ${stdout.trim().slice(0, 200)}`);
  }
  return { format: parsed['format'], virtualSizeBytes: parsed['virtual-size'] };
}

/**
 * Arguments of `qemu-img create` for a qcow2 root disk.
 *
 * A layered disk is never smaller than its backing image.
 */
export function buildCreateDiskArgs(disk: DiskDefinition, backing?: ImageInfo): string[] {
  const sizeGb = Math.max(disk.sizeGb, backing ? Math.ceil(backing.virtualSizeBytes / GIB) : 0);
  const layering =
    disk.backingImage !== undefined && backing !== undefined ? ['-b', disk.backingImage, '-F', backing.format] : [];
  return ['create', '-q', '-f', 'qcow2', ...layering, disk.path, `${sizeGb}G`];
}

/**
 * Prefix every virsh call with the connection URI.
 */
export function virshArgs(uri: string, ...args: string[]): string[] {
  return ['-c', uri, ...args];
}

/**
 * Map `virsh domstate` output onto a DomainState.
 */
export function parseDomainState(stdout: string): DomainState {
  const state = stdout.trim().split('\n')[0]?.trim().toLowerCase() ?? '';
  switch (state) {
    case 'running':
    case 'idle':
    case 'in shutdown':
      return 'running';
    case 'shut off':
      return 'stopped';
    case 'paused':
    case 'pmsuspended':
      return 'paused';
    case 'crashed':
      return 'crashed';
    default:
      return 'unknown';
  }
}

/**
 * First IPv4 address from `virsh domifaddr` output.
 */
export function parseDomainAddress(stdout: string): string | null {
  for (const line of stdout.split('\n')) {
    const match = /\bipv4\s+(\d{1,3}(?:\.\d{1,3}){3})\/\d+/.exec(line);
    if (match?.[1] !== undefined) {
      return match[1];
    }
  }
  return null;
}

/**
 * Domain names from `virsh list --all --name`.
 */
export function parseNameList(stdout: string): string[] {
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Convert virsh's "2024-05-01 10:20:30 +0200" into ISO 8601.
 */
export function toIsoTimestamp(date: string, time: string, zone: string): string {
  const offset = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  const suffix = offset ? `${offset[1]}${offset[2]}:${offset[3]}` : 'Z';
  return new Date(`${date}T${time}${suffix}`).toISOString();
}

/**
 * Parse the table printed by `virsh snapshot-list <domain>`.
 */
export function parseSnapshotList(stdout: string): SnapshotInfo[] {
  const snapshots: SnapshotInfo[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\S+)\s+(\d{4}-\d{2}-\d{2})\s+(\d{2}:\d{2}:\d{2})\s+([+-]\d{4})/.exec(line);
    if (!match) continue;
    const [, name, date, time, zone] = match;
    if (name === undefined || date === undefined || time === undefined || zone === undefined) {
      continue;
    }
    snapshots.push({ name, handle: name, createdAt: toIsoTimestamp(date, time, zone) });
  }
  return snapshots;
}

/**
 * JSON payload for `virsh qemu-agent-command`.
 */
export function buildAgentCommand(execute: string, args?: Record<string, unknown>): string {
  return JSON.stringify(args === undefined ? { execute } : { execute, arguments: args });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract the `return` member of a guest agent reply.
 *
 * @throws Error if the reply is not a JSON object with a `return` member
 */
export function parseAgentReturn(stdout: string): unknown {
  const parsed: unknown = JSON.parse(stdout);
  if (!isRecord(parsed) || !('return' in parsed)) {
    throw new Error(`Unexpected guest agent reply: ${stdout.trim().slice(0, 200)}`);
  }
  return parsed['return'];
}

/**
 * PID from a `guest-exec` reply.
 */
export function parseGuestExecPid(stdout: string): number {
  const result = parseAgentReturn(stdout);
  if (!isRecord(result) || typeof result['pid'] !== 'number') {
    throw new Error(`guest-exec reply carries no pid: ${stdout.trim().slice(0, 200)}`);
  }
  return result['pid'];
}

/**
 * Result of `guest-exec-status`; null while the command still runs.
 */
export function parseGuestExecStatus(stdout: string): GuestExecResult | null {
  const result = parseAgentReturn(stdout);
  if (!isRecord(result)) {
    throw new Error(`Unexpected guest-exec-status reply: ${stdout.trim().slice(0, 200)}`);
  }
  if (result['exited'] !== true) {
    return null;
  }
  const decode = (value: unknown): string =>
    typeof value === 'string' ? Buffer.from(value, 'base64').toString('utf-8') : '';
  return {
    exitCode: typeof result['exitcode'] === 'number' ? result['exitcode'] : -1,
    stdout: decode(result['out-data']),
    stderr: decode(result['err-data']),
  };
}
