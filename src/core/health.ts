/**
 * Health Checker
 *
 * Runs a VM's declared probes concurrently. Every probe races its own
 * timer, so a hung probe is reported as `timeout` without holding up the
 * others. Read-only: never takes the lifecycle lock.
 */

import { connect } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';

import type { HealthCheckDecl, ProbeType } from '../config/types.js';
import type { VirtualizationBackend } from '../backend/types.js';
import type { Logger } from '../lib/logger.js';
import {
  HealthCheckTimeout,
  ValidationError,
  VMNotFoundError,
  describeError,
} from './errors.js';

/**
 * Result of one probe
 */
export type ProbeOutcome = 'pass' | 'fail' | 'timeout';

/**
 * Per-probe entry of a health report
 */
export interface ProbeResult {
  name: string;
  type: ProbeType;
  outcome: ProbeOutcome;
  durationMs: number;
  detail: string;
}

/**
 * Aggregate health of one VM
 */
export interface HealthReport {
  vmName: string;
  /** True iff every probe passed */
  healthy: boolean;
  /** ISO 8601 */
  checkedAt: string;
  results: ProbeResult[];
}

/**
 * Options for check()
 */
export interface CheckOptions {
  /** Run only TCP probes */
  quick?: boolean;
  /** Host for TCP and HTTP probes whose target names no host */
  host?: string;
}

/**
 * Options for verify()
 */
export interface VerifyOptions extends CheckOptions {
  /** Overall deadline for the VM to become healthy */
  timeoutMs: number;
  /** Pause between attempts */
  intervalMs: number;
  signal?: AbortSignal;
}

/**
 * Options for constructing a HealthChecker
 */
export interface HealthCheckerOptions {
  /** Deadline of probes that declare none */
  probeTimeoutMs: number;
  logger: Logger;
}

interface ProbeVerdict {
  outcome: ProbeOutcome;
  detail: string;
}

const NO_ADDRESS: ProbeVerdict = { outcome: 'fail', detail: 'no guest address' };

/**
 * Host and port of a TCP probe target ("port", "host:port" or "[v6]:port").
 * The host is null for a bare port when there is no fallback host.
 *
 * @throws ValidationError if the target has no valid port
 */
export function parseTcpTarget(
  target: string,
  fallbackHost: string | null
): { host: string | null; port: number } {
  let host = fallbackHost;
  let portText = target.trim();

  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(portText);
  if (bracketed?.[1] !== undefined && bracketed[2] !== undefined) {
    host = bracketed[1];
    portText = bracketed[2];
  } else if (portText.includes(':')) {
    const idx = portText.lastIndexOf(':');
    host = portText.slice(0, idx);
    portText = portText.slice(idx + 1);
  }

  const port = Number(portText);
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid TCP probe target '${target}'`, 'health_checks.target');
  }
  return { host, port };
}

/**
 * URL of an HTTP probe target: an absolute http(s) URL, or "port[/path]"
 * on the fallback host. Null when the target needs a host and there is
 * none.
 *
 * @throws ValidationError for any other target
 */
export function resolveHttpTarget(target: string, fallbackHost: string | null): URL | null {
  const trimmed = target.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    try {
      return new URL(trimmed);
    } catch {
      throw new ValidationError(`Invalid HTTP probe target '${target}'`, 'health_checks.target');
    }
  }

  const relative = /^(\d+)(\/.*)?$/.exec(trimmed);
  const port = Number(relative?.[1]);
  if (!relative || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid HTTP probe target '${target}'`, 'health_checks.target');
  }
  if (fallbackHost === null) {
    return null;
  }
  const host = fallbackHost.includes(':') ? `[${fallbackHost}]` : fallbackHost;
  return new URL(`http://${host}:${port}${relative[2] ?? '/'}`);
}

/**
 * Open and immediately close a TCP connection.
 */
export function tcpConnect(host: string, port: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = connect({ host, port });
    const onAbort = (): void => {
      socket.destroy();
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    socket.once('connect', () => {
      signal.removeEventListener('abort', onAbort);
      socket.end();
      socket.destroy();
      resolve();
    });
    socket.once('error', (error) => {
      signal.removeEventListener('abort', onAbort);
      socket.destroy();
      reject(error);
    });
  });
}

/**
 * Whether a backend error means the guest agent never answered.
 */
function isUnansweredAgent(error: unknown): boolean {
  if (error instanceof HealthCheckTimeout) return true;
  return /not responding|timed out|timeout/i.test(describeError(error));
}

/**
 * Runs health probes against VMs.
 */
export class HealthChecker {
  private readonly probeTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly backend: VirtualizationBackend,
    options: HealthCheckerOptions
  ) {
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.logger = options.logger;
  }

  /**
   * Run the probes once.
   *
   * @throws VMNotFoundError if the backend does not know the VM
   */
  async check(vmName: string, probes: HealthCheckDecl[], options: CheckOptions = {}): Promise<HealthReport> {
    const selected = options.quick ? probes.filter((probe) => probe.type === 'tcp') : probes;

    const domain = await this.backend.getDomain(vmName);
    if (domain === null) {
      throw new VMNotFoundError(vmName);
    }
    const host = options.host ?? domain.address;

    const results = await Promise.all(selected.map((probe) => this.runProbe(vmName, probe, host)));
    for (const result of results) {
      this.logger.debug(`${vmName}: probe ${result.name} ${result.outcome} (${result.durationMs}ms) ${result.detail}`);
    }

    return {
      vmName,
      healthy: results.every((result) => result.outcome === 'pass'),
      checkedAt: new Date().toISOString(),
      results,
    };
  }

  /**
   * Re-check until healthy or until the deadline; returns the last report.
   *
   * An aborted signal ends the wait early with the last report.
   */
  async verify(vmName: string, probes: HealthCheckDecl[], options: VerifyOptions): Promise<HealthReport> {
    const deadline = Date.now() + options.timeoutMs;
    for (;;) {
      const report = await this.check(vmName, probes, options);
      if (report.healthy || Date.now() + options.intervalMs > deadline || options.signal?.aborted) {
        return report;
      }
      try {
        await sleep(options.intervalMs, undefined, { signal: options.signal });
      } catch (error) {
        if (options.signal?.aborted) {
          return report;
        }
        throw error;
      }
    }
  }

  private async runProbe(vmName: string, probe: HealthCheckDecl, host: string | null): Promise<ProbeResult> {
    const timeoutMs = probe.timeoutMs ?? this.probeTimeoutMs;
    const controller = new AbortController();
    const started = Date.now();

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<ProbeVerdict>((resolve) => {
      timer = setTimeout(() => {
        const timeout = new HealthCheckTimeout(vmName, probe.name, timeoutMs);
        controller.abort(timeout);
        resolve({ outcome: 'timeout', detail: timeout.message });
      }, timeoutMs);
    });

    const attempt = this.execute(vmName, probe, host, timeoutMs, controller.signal).then(
      (verdict) => verdict,
      (error: unknown): ProbeVerdict => ({
        outcome: probe.type.startsWith('agent-') && isUnansweredAgent(error) ? 'timeout' : 'fail',
        detail: describeError(error),
      })
    );

    try {
      const verdict = await Promise.race([attempt, expired]);
      return {
        name: probe.name,
        type: probe.type,
        outcome: verdict.outcome,
        durationMs: Date.now() - started,
        detail: verdict.detail,
      };
    } finally {
      clearTimeout(timer);
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }
  }

  private async execute(
    vmName: string,
    probe: HealthCheckDecl,
    host: string | null,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<ProbeVerdict> {
    switch (probe.type) {
      case 'tcp': {
        const target = parseTcpTarget(probe.target ?? '', host);
        if (target.host === null) {
          return NO_ADDRESS;
        }
        await tcpConnect(target.host, target.port, signal);
        return { outcome: 'pass', detail: `connected to ${target.host}:${target.port}` };
      }
      case 'http': {
        const url = resolveHttpTarget(probe.target ?? '', host);
        if (url === null) {
          return NO_ADDRESS;
        }
        const response = await fetch(url, { signal });
        const body = await response.text();
        const expected = probe.expectStatus ?? 200;
        if (response.status !== expected) {
          return { outcome: 'fail', detail: `HTTP ${response.status} (expected ${expected})` };
        }
        if (probe.expectBody !== undefined && !body.includes(probe.expectBody)) {
          return { outcome: 'fail', detail: `HTTP ${response.status}, body does not contain '${probe.expectBody}'` };
        }
        return { outcome: 'pass', detail: `HTTP ${response.status} from ${url.href}` };
      }
      case 'agent-ping': {
        await this.backend.guestPing(vmName, { timeoutMs, signal });
        return { outcome: 'pass', detail: 'guest agent answered' };
      }
      case 'agent-exec': {
        const command = probe.target ?? 'true';
        const expected = probe.expectExit ?? 0;
        const result = await this.backend.guestExec(vmName, ['/bin/sh', '-c', command], { timeoutMs, signal });
        if (result.exitCode === expected) {
          return { outcome: 'pass', detail: `exit ${result.exitCode}` };
        }
        const firstLine = result.stderr.trim().split('\n')[0] ?? '';
        return {
          outcome: 'fail',
          detail: `exit ${result.exitCode} (expected ${expected})${firstLine ? `: ${firstLine}` : ''}`,
        };
      }
    }
  }
}
