/**
 * Remote Command Handlers
 *
 * Operate on domains of another libvirt host. The backing store stays
 * local, so remote domains are listed from the backend directly and
 * usually show as unmanaged.
 */

import { loadCloneSpec } from '../../config/loader.js';
import { BackendError, VMNotFoundError } from '../../core/errors.js';
import { toVMState } from '../../core/lifecycle.js';
import { getCloneSpecPath, getRemoteUri } from '../../lib/paths.js';
import {
  interruptSignal,
  parsePositiveInt,
  printHealthReport,
  runCommand,
  type GlobalOptions,
} from '../output.js';
import { FALLBACK_PROBES, type HealthCommandOptions, type StopCommandOptions } from './vm.js';

/**
 * Options for remote exec
 */
export type RemoteExecOptions = GlobalOptions & {
  timeout?: string;
};

/**
 * List every domain on the remote host.
 */
export async function remoteListCommand(host: string, options: GlobalOptions): Promise<void> {
  await runCommand(
    'remote list',
    options,
    async ({ logger, engine }) => {
      const domains = await engine.backend.listDomains();
      if (domains.length === 0) {
        logger.info(`No domains on ${engine.settings.connectUri}.`);
      } else {
        logger.table(
          ['NAME', 'STATE', 'ADDRESS'],
          domains.map((domain) => [domain.name, toVMState(domain.state), domain.address ?? '-'])
        );
      }
      logger.setData({ uri: engine.settings.connectUri, domains });
    },
    { connectUri: getRemoteUri(host) }
  );
}

/**
 * Show one remote domain.
 */
export async function remoteStatusCommand(host: string, name: string, options: GlobalOptions): Promise<void> {
  await runCommand(
    'remote status',
    options,
    async ({ logger, engine }) => {
      const domain = await engine.backend.getDomain(name);
      if (domain === null) {
        throw new VMNotFoundError(name);
      }
      logger.table(['NAME', 'STATE', 'ADDRESS'], [[domain.name, toVMState(domain.state), domain.address ?? '-']]);
      logger.setData({ uri: engine.settings.connectUri, domain });
    },
    { connectUri: getRemoteUri(host) }
  );
}

/**
 * Start a remote domain.
 */
export async function remoteStartCommand(host: string, name: string, options: GlobalOptions): Promise<void> {
  await runCommand(
    'remote start',
    options,
    async ({ logger, engine }) => {
      logger.setData({ vm: await engine.lifecycle.start(name, { signal: interruptSignal() }) });
    },
    { connectUri: getRemoteUri(host) }
  );
}

/**
 * Stop a remote domain.
 */
export async function remoteStopCommand(host: string, name: string, options: StopCommandOptions): Promise<void> {
  await runCommand(
    'remote stop',
    options,
    async ({ logger, engine }) => {
      const record = await engine.lifecycle.stop(name, { force: options.force, signal: interruptSignal() });
      logger.setData({ vm: record });
    },
    { connectUri: getRemoteUri(host) }
  );
}

/**
 * Run a command inside a remote guest through its agent.
 *
 * Exits with 1 when the guest command fails.
 */
export async function remoteExecCommand(
  host: string,
  name: string,
  argv: string[],
  options: RemoteExecOptions
): Promise<void> {
  await runCommand(
    'remote exec',
    options,
    async ({ logger, engine }) => {
      const timeoutMs = options.timeout !== undefined ? parsePositiveInt(options.timeout, '--timeout') : 30_000;
      if (argv.length === 0) {
        throw new BackendError('No command given', 'guest-exec');
      }
      const result = await engine.backend.guestExec(name, argv, { timeoutMs, signal: interruptSignal() });
      if (logger.getMode() === 'human') {
        process.stdout.write(result.stdout);
        process.stderr.write(result.stderr);
      }
      logger.setData(result);
      return result.exitCode === 0;
    },
    { connectUri: getRemoteUri(host) }
  );
}

/**
 * Probe a remote guest; without a spec only the agent is pinged.
 */
export async function remoteHealthCommand(host: string, name: string, options: HealthCommandOptions): Promise<void> {
  await runCommand(
    'remote health',
    options,
    async ({ logger, engine }) => {
      const spec =
        options.spec !== undefined
          ? (await loadCloneSpec(getCloneSpecPath(options.spec), engine.settings.defaults)).spec
          : undefined;
      const probes = spec?.healthChecks ?? FALLBACK_PROBES;
      const report = await engine.health.check(name, probes, { quick: options.quick });
      printHealthReport(logger, report);
      logger.setData(report);
      return report.healthy;
    },
    { connectUri: getRemoteUri(host) }
  );
}
