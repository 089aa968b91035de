/**
 * Compose Command Handlers
 *
 * Each command takes a compose file, or a directory holding
 * clonebox-compose.yaml.
 */

import { loadComposeFile } from '../../compose/loader.js';
import { getComposePath } from '../../lib/paths.js';
import {
  interruptSignal,
  parsePositiveInt,
  printComposeResult,
  printMemberStates,
  runCommand,
  type GlobalOptions,
} from '../output.js';

/**
 * Options for compose up and restart
 */
export type ComposeUpOptions = GlobalOptions & {
  /** Only these members (repeatable) */
  member?: string[];
};

/**
 * Options for compose down
 */
export type ComposeDownOptions = ComposeUpOptions & {
  /** Delete members instead of stopping them */
  remove?: boolean;
};

/**
 * Options for compose exec
 */
export type ComposeExecOptions = GlobalOptions & {
  file?: string;
  timeout?: string;
};

/**
 * Options for compose logs
 */
export type ComposeLogsOptions = GlobalOptions & {
  lines?: string;
};

/**
 * Bring a group up, dependencies first.
 */
export async function composeUpCommand(target: string | undefined, options: ComposeUpOptions): Promise<void> {
  await runCommand('compose up', options, async ({ logger, engine }) => {
    const group = await loadComposeFile(getComposePath(target ?? '.'), engine.settings.defaults);
    logger.info(`Compose group '${group.name}': ${group.members.map((m) => m.name).join(' -> ')}`);
    logger.newline();

    const result = await engine.compose.up(group, { members: options.member, signal: interruptSignal() });
    logger.newline();
    printComposeResult(logger, result);
    logger.setData(result);
    return result.success;
  });
}

/**
 * Stop (or delete) a group, dependents first.
 */
export async function composeDownCommand(target: string | undefined, options: ComposeDownOptions): Promise<void> {
  await runCommand('compose down', options, async ({ logger, engine }) => {
    const group = await loadComposeFile(getComposePath(target ?? '.'), engine.settings.defaults);
    const result = await engine.compose.down(group, { members: options.member, remove: options.remove });
    printComposeResult(logger, result);
    logger.setData(result);
    return result.success;
  });
}

/**
 * Stop members and their dependents, then bring them up again.
 */
export async function composeRestartCommand(target: string | undefined, options: ComposeUpOptions): Promise<void> {
  await runCommand('compose restart', options, async ({ logger, engine }) => {
    const group = await loadComposeFile(getComposePath(target ?? '.'), engine.settings.defaults);
    const result = await engine.compose.restart(group, { members: options.member, signal: interruptSignal() });
    printComposeResult(logger, result);
    logger.setData(result);
    return result.success;
  });
}

/**
 * Show each member's state.
 */
export async function composeStatusCommand(target: string | undefined, options: GlobalOptions): Promise<void> {
  await runCommand('compose status', options, async ({ logger, engine }) => {
    const group = await loadComposeFile(getComposePath(target ?? '.'), engine.settings.defaults);
    const members = await engine.compose.status(group);
    logger.info(`Compose group '${group.name}' (${group.path})`);
    logger.newline();
    printMemberStates(logger, members);
    logger.setData({ group: group.name, members });
  });
}

/**
 * Print the tail of a member's system journal.
 */
export async function composeLogsCommand(
  target: string | undefined,
  member: string,
  options: ComposeLogsOptions
): Promise<void> {
  await runCommand('compose logs', options, async ({ logger, engine }) => {
    const group = await loadComposeFile(getComposePath(target ?? '.'), engine.settings.defaults);
    const lines = options.lines !== undefined ? parsePositiveInt(options.lines, '--lines') : undefined;
    const output = await engine.compose.logs(group, member, lines);
    if (logger.getMode() === 'human') {
      process.stdout.write(output);
    }
    logger.setData({ group: group.name, member, output });
  });
}

/**
 * Run a command in a member's guest. Exits with 1 when it fails.
 */
export async function composeExecCommand(member: string, argv: string[], options: ComposeExecOptions): Promise<void> {
  await runCommand('compose exec', options, async ({ logger, engine }) => {
    const group = await loadComposeFile(getComposePath(options.file ?? '.'), engine.settings.defaults);
    const timeoutMs = options.timeout !== undefined ? parsePositiveInt(options.timeout, '--timeout') : undefined;
    const result = await engine.compose.exec(group, member, argv, { timeoutMs, signal: interruptSignal() });
    if (logger.getMode() === 'human') {
      process.stdout.write(result.stdout);
      process.stderr.write(result.stderr);
    }
    logger.setData({ group: group.name, member, ...result });
    return result.exitCode === 0;
  });
}
