/**
 * Detection Types
 */

/**
 * What a detected item describes.
 */
export type DetectedKind = 'service' | 'application' | 'path';

/**
 * Evidence that produced a detection.
 */
export interface DetectionSource {
  /** Name of the probe that saw it */
  probe: string;
  /** Process name, socket, or directory marker */
  evidence: string;
}

/**
 * One candidate service, application or path found on the host.
 *
 * Produced fresh on every detection run and never persisted directly.
 */
export interface DetectedItem {
  kind: DetectedKind;
  /** Service or application name, or absolute host path */
  name: string;
  source: DetectionSource;
  /** 0..1; the synthesizer prefers higher values when collapsing duplicates */
  confidence: number;
  /** Suggested guest package for services and applications */
  package?: string;
  /** Suggested guest mountpoint for paths */
  guestPath?: string;
}

/**
 * A single detection heuristic.
 *
 * Implementations may throw; the Detector turns a failure into a warning
 * and keeps the other probes' results.
 */
export interface DetectionProbe {
  readonly name: string;
  run(): Promise<DetectedItem[]>;
}

/**
 * Static lookup data shipped in catalog.json.
 */
export interface DetectionCatalog {
  services: string[];
  excludedServices: string[];
  processes: string[];
  packages: Record<string, string>;
  servicePorts: Record<string, number>;
  projectMarkers: string[];
  configMarkers: Record<string, string>;
}
