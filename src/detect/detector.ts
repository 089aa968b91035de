/**
 * Detector
 *
 * Runs every probe and aggregates their findings. A probe that throws is
 * reported as a DetectionWarning and contributes nothing; detect() itself
 * never fails because of one probe.
 */

import { homedir } from 'node:os';

import type { DetectedItem, DetectedKind, DetectionProbe } from './types.js';
import {
  ConfigMarkerProbe,
  ProcessProbe,
  ProjectProbe,
  ServiceProbe,
  SocketProbe,
} from './probes.js';
import type { CommandExecutor } from '../backend/executor.js';
import { DetectionWarning, describeError } from '../core/errors.js';
import type { Logger } from '../lib/logger.js';
import { compareStrings } from '../lib/collections.js';

const KIND_ORDER: Record<DetectedKind, number> = {
  service: 0,
  application: 1,
  path: 2,
};

/**
 * Order detections by kind, then name, then evidence.
 *
 * Equal host state therefore always yields an identical list.
 */
export function sortDetected(items: DetectedItem[]): DetectedItem[] {
  return [...items].sort(
    (a, b) =>
      KIND_ORDER[a.kind] - KIND_ORDER[b.kind] ||
      compareStrings(a.name, b.name) ||
      compareStrings(a.source.probe, b.source.probe) ||
      compareStrings(a.source.evidence, b.source.evidence)
  );
}

/**
 * Where the default probes look.
 */
export interface DefaultProbeOptions {
  executor: CommandExecutor;
  cwd: string;
  home?: string;
  procRoot?: string;
}

/**
 * The standard probe set.
 */
export function createDefaultProbes(options: DefaultProbeOptions): DetectionProbe[] {
  const procRoot = options.procRoot ?? '/proc';
  return [
    new ServiceProbe(options.executor),
    new ProcessProbe(procRoot),
    new SocketProbe(procRoot),
    new ProjectProbe(options.cwd),
    new ConfigMarkerProbe(options.home ?? homedir()),
  ];
}

/**
 * Aggregates host detections from a fixed set of probes.
 */
export class Detector {
  constructor(
    private readonly probes: DetectionProbe[],
    private readonly logger: Logger
  ) {}

  /**
   * Scan the host.
   *
   * Read-only and idempotent.
   */
  async detect(): Promise<DetectedItem[]> {
    const results = await Promise.all(this.probes.map((probe) => this.runProbe(probe)));
    return sortDetected(results.flat());
  }

  private async runProbe(probe: DetectionProbe): Promise<DetectedItem[]> {
    try {
      const items = await probe.run();
      this.logger.debug(`probe ${probe.name}: ${items.length} item(s)`);
      return items;
    } catch (error) {
      const warning = new DetectionWarning(
        `Probe '${probe.name}' failed: ${describeError(error)}`,
        probe.name,
        error
      );
      this.logger.warning(warning.message);
      return [];
    }
  }
}
