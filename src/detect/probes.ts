/**
 * Detection Probes
 *
 * Each probe inspects one aspect of the host and reports candidate items.
 * Probes are read-only; they never change host state.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';

import type { DetectedItem, DetectionCatalog, DetectionProbe } from './types.js';
import type { CommandExecutor } from '../backend/executor.js';
import { errnoCode, pathExists } from '../lib/fs.js';
import catalogData from './catalog.json' with { type: 'json' };

/**
 * Built-in catalog of interesting services, processes and markers.
 */
export const CATALOG: DetectionCatalog = catalogData;

/**
 * Find the catalog entry a unit or process name belongs to.
 *
 * Exact matches win; otherwise the longest entry the name extends with
 * a `-` or `@` suffix ("postgresql@14-main" -> "postgresql").
 */
export function matchCatalogName(name: string, entries: string[]): string | undefined {
  const lower = name.toLowerCase();
  let best: string | undefined;
  for (const entry of entries) {
    const key = entry.toLowerCase();
    if (key === lower) {
      return entry;
    }
    if (
      (lower.startsWith(`${key}-`) || lower.startsWith(`${key}@`)) &&
      (best === undefined || key.length > best.length)
    ) {
      best = entry;
    }
  }
  return best;
}

function packageFor(catalog: DetectionCatalog, ...names: Array<string | undefined>): string | undefined {
  for (const name of names) {
    if (name !== undefined && catalog.packages[name] !== undefined) {
      return catalog.packages[name];
    }
  }
  return undefined;
}

function withPackage(item: DetectedItem, pkg: string | undefined): DetectedItem {
  return pkg === undefined ? item : { ...item, package: pkg };
}

/**
 * Running systemd services, filtered to the catalog minus host-only units.
 */
export class ServiceProbe implements DetectionProbe {
  readonly name = 'services';

  constructor(
    private readonly executor: CommandExecutor,
    private readonly catalog: DetectionCatalog = CATALOG
  ) {}

  async run(): Promise<DetectedItem[]> {
    const { stdout } = await this.executor.run(
      'systemctl',
      ['list-units', '--type=service', '--state=running', '--no-pager', '--plain', '--no-legend'],
      { timeout: 10000 }
    );

    const excluded = new Set(this.catalog.excludedServices.map((s) => s.toLowerCase()));
    const seen = new Set<string>();
    const items: DetectedItem[] = [];

    for (const line of stdout.split('\n')) {
      const [unit] = line.trim().split(/\s+/);
      if (unit === undefined || !unit.endsWith('.service')) continue;

      const unitName = unit.slice(0, -'.service'.length);
      if (excluded.has(unitName.toLowerCase())) continue;

      // Instances ("postgresql@14-main") are reported under their catalog entry
      const entry = matchCatalogName(unitName, this.catalog.services);
      if (entry === undefined || seen.has(entry)) continue;
      seen.add(entry);

      items.push(
        withPackage(
          {
            kind: 'service',
            name: entry,
            source: { probe: this.name, evidence: `unit ${unit}` },
            confidence: 0.9,
          },
          packageFor(this.catalog, entry)
        )
      );
    }

    return items;
  }
}

/**
 * Running processes whose command name is in the catalog.
 */
export class ProcessProbe implements DetectionProbe {
  readonly name = 'processes';

  constructor(
    private readonly procRoot: string = '/proc',
    private readonly catalog: DetectionCatalog = CATALOG
  ) {}

  async run(): Promise<DetectedItem[]> {
    const pids = (await readdir(this.procRoot))
      .filter((entry) => /^\d+$/.test(entry))
      .map(Number)
      .sort((a, b) => a - b);

    const seen = new Set<string>();
    const items: DetectedItem[] = [];

    for (const pid of pids) {
      const comm = await this.readComm(pid);
      if (comm === undefined) continue;

      const entry = matchCatalogName(comm, this.catalog.processes);
      if (entry === undefined || seen.has(entry)) continue;
      seen.add(entry);

      items.push(
        withPackage(
          {
            kind: 'application',
            name: entry,
            source: { probe: this.name, evidence: `pid ${pid} (${comm})` },
            confidence: 0.6,
          },
          packageFor(this.catalog, entry)
        )
      );
    }

    return items;
  }

  private async readComm(pid: number): Promise<string | undefined> {
    try {
      return (await readFile(join(this.procRoot, String(pid), 'comm'), 'utf-8')).trim();
    } catch (error) {
      // The process exited between readdir and read
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ESRCH') {
        return undefined;
      }
      throw error;
    }
  }
}

/**
 * Parse the listening ports out of a /proc/net/tcp style table.
 */
export function parseListeningPorts(table: string): number[] {
  const ports = new Set<number>();
  for (const line of table.split('\n').slice(1)) {
    const fields = line.trim().split(/\s+/);
    const local = fields[1];
    const state = fields[3];
    if (local === undefined || state !== '0A') continue;
    const portHex = local.split(':')[1];
    if (portHex === undefined) continue;
    const port = Number.parseInt(portHex, 16);
    if (Number.isInteger(port) && port > 0) {
      ports.add(port);
    }
  }
  return [...ports].sort((a, b) => a - b);
}

/**
 * Listening TCP sockets on well-known service ports.
 */
export class SocketProbe implements DetectionProbe {
  readonly name = 'sockets';

  constructor(
    private readonly procRoot: string = '/proc',
    private readonly catalog: DetectionCatalog = CATALOG
  ) {}

  async run(): Promise<DetectedItem[]> {
    const tables = await Promise.all(
      ['tcp', 'tcp6'].map((file) => this.readTable(join(this.procRoot, 'net', file)))
    );
    const ports = new Set(tables.flatMap(parseListeningPorts));

    // First service listed for a port names it
    const byPort = new Map<number, string>();
    for (const [service, port] of Object.entries(this.catalog.servicePorts)) {
      if (!byPort.has(port)) byPort.set(port, service);
    }

    const items: DetectedItem[] = [];
    for (const port of [...ports].sort((a, b) => a - b)) {
      const service = byPort.get(port);
      if (service === undefined) continue;
      items.push(
        withPackage(
          {
            kind: 'service',
            name: service,
            source: { probe: this.name, evidence: `tcp/${port} listening` },
            confidence: 0.7,
          },
          packageFor(this.catalog, service)
        )
      );
    }
    return items;
  }

  private async readTable(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      // tcp6 is absent on hosts without IPv6
      if (errnoCode(error) === 'ENOENT') {
        return '';
      }
      throw error;
    }
  }
}

/**
 * The working directory and its immediate children carrying project markers.
 */
export class ProjectProbe implements DetectionProbe {
  readonly name = 'projects';

  constructor(
    private readonly cwd: string,
    private readonly catalog: DetectionCatalog = CATALOG
  ) {}

  async run(): Promise<DetectedItem[]> {
    const project = basename(this.cwd) || 'root';
    const guestBase = `/workspace/${project}`;

    const items: DetectedItem[] = [
      {
        kind: 'path',
        name: this.cwd,
        source: {
          probe: this.name,
          evidence: (await this.findMarker(this.cwd)) ?? 'working directory',
        },
        confidence: 1,
        guestPath: guestBase,
      },
    ];

    const entries = await readdir(this.cwd, { withFileTypes: true });
    const children = entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort();

    for (const child of children) {
      const dir = join(this.cwd, child);
      const marker = await this.findMarker(dir);
      if (marker === undefined) continue;
      items.push({
        kind: 'path',
        name: dir,
        source: { probe: this.name, evidence: marker },
        confidence: 0.5,
        guestPath: `${guestBase}/${child}`,
      });
    }

    return items;
  }

  private async findMarker(dir: string): Promise<string | undefined> {
    for (const marker of this.catalog.projectMarkers) {
      if (await pathExists(join(dir, marker))) {
        return marker;
      }
    }
    return undefined;
  }
}

/**
 * Tool configuration directories in the home directory (`~/.docker`, ...).
 */
export class ConfigMarkerProbe implements DetectionProbe {
  readonly name = 'config-markers';

  constructor(
    private readonly home: string,
    private readonly catalog: DetectionCatalog = CATALOG
  ) {}

  async run(): Promise<DetectedItem[]> {
    const items: DetectedItem[] = [];
    for (const [marker, tool] of Object.entries(this.catalog.configMarkers)) {
      if (!(await this.isDirectory(join(this.home, marker)))) continue;
      items.push(
        withPackage(
          {
            kind: 'application',
            name: tool,
            source: { probe: this.name, evidence: `~/${marker}` },
            confidence: 0.4,
          },
          packageFor(this.catalog, tool)
        )
      );
    }
    return items;
  }

  private async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') {
        return false;
      }
      throw error;
    }
  }
}
