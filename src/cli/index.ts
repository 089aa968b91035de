#!/usr/bin/env node
import { Command, program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import {
  createCommand,
  deleteCommand,
  healthCommand,
  listCommand,
  restartCommand,
  startCommand,
  statusCommand,
  stopCommand,
} from './commands/vm.js';
import { cloneCommand, detectCommand, profilesCommand } from './commands/clone.js';
import {
  snapshotCreateCommand,
  snapshotDeleteCommand,
  snapshotListCommand,
  snapshotPruneCommand,
  snapshotRestoreCommand,
} from './commands/snapshot.js';
import {
  composeDownCommand,
  composeExecCommand,
  composeLogsCommand,
  composeRestartCommand,
  composeStatusCommand,
  composeUpCommand,
} from './commands/compose.js';
import { auditExportCommand, auditListCommand, auditSearchCommand } from './commands/audit.js';
import {
  remoteExecCommand,
  remoteHealthCommand,
  remoteListCommand,
  remoteStartCommand,
  remoteStatusCommand,
  remoteStopCommand,
} from './commands/remote.js';
import type { GlobalOptions } from './output.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

program
  .name('clonebox')
  .description('Clone a selected slice of your workstation into a disposable libvirt VM')
  .version(version)
  .option('--user', 'Use the per-user libvirt session (default)')
  .option('--system', 'Use the system-wide libvirt session')
  .option('--connect <uri>', 'libvirt connection URI')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print virsh commands before execution');

/**
 * Options of a command merged with the global flags.
 *
 * Global flags are accepted before or after the subcommand:
 *   clonebox --json list    clonebox list --json
 */
function opts<T extends GlobalOptions>(command: Command): T {
  return command.optsWithGlobals<T>();
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

// =============================================================================
// Cloning
// =============================================================================

program
  .command('detect [dir]')
  .description('Show services, applications and paths that would be cloned')
  .option('--min-confidence <n>', 'Ignore detections below this confidence (0..1)')
  .action((dir: string | undefined, _options: unknown, command: Command) => detectCommand(dir, opts(command)));

program
  .command('clone [dir]')
  .description('Write .clonebox.yaml for a directory from detections, a profile and any existing spec')
  .option('--profile <name>', 'Merge a named profile')
  .option('--name <name>', 'VM name')
  .option('--ram <mb>', 'Memory in MiB')
  .option('--vcpus <n>', 'Virtual CPUs')
  .option('--disk <gb>', 'Disk size in GiB')
  .option('--network <mode>', 'auto, default or user')
  .option('--auth <method>', 'ssh-key, one-time-password or password')
  .option('--password <password>', 'Password for --auth password')
  .option('--mount <host:guest>', 'Share an extra host directory (repeatable)', collect)
  .option('--min-confidence <n>', 'Ignore detections below this confidence (0..1)')
  .option('--dry-run', 'Print the spec instead of writing it')
  .option('--create', 'Create the VM after writing the spec')
  .action((dir: string | undefined, _options: unknown, command: Command) => cloneCommand(dir, opts(command)));

program
  .command('profiles [dir]')
  .description('List available profiles')
  .action((dir: string | undefined, _options: unknown, command: Command) => profilesCommand(dir, opts(command)));

// =============================================================================
// VM lifecycle
// =============================================================================

program
  .command('create [spec]')
  .description('Create and boot a VM from a clone spec (file or directory)')
  .option('--no-verify', 'Skip post-boot health verification')
  .action((spec: string | undefined, _options: unknown, command: Command) => createCommand(spec, opts(command)));

program
  .command('start <name>')
  .description('Start a stopped VM')
  .action((name: string, _options: unknown, command: Command) => startCommand(name, opts(command)));

program
  .command('stop <name>')
  .description('Stop a running VM')
  .option('--force', 'Power off without a graceful shutdown')
  .action((name: string, _options: unknown, command: Command) => stopCommand(name, opts(command)));

program
  .command('restart <name>')
  .description('Stop and start a VM')
  .action((name: string, _options: unknown, command: Command) => restartCommand(name, opts(command)));

program
  .command('delete <name>')
  .description('Remove a VM and its backing store')
  .action((name: string, _options: unknown, command: Command) => deleteCommand(name, opts(command)));

program
  .command('list')
  .description('List VMs created by clonebox')
  .action((_options: unknown, command: Command) => listCommand(opts(command)));

program
  .command('status <name>')
  .description('Show the state of one VM')
  .action((name: string, _options: unknown, command: Command) => statusCommand(name, opts(command)));

program
  .command('health <name>')
  .description('Run health probes once')
  .option('--quick', 'Only TCP probes')
  .option('--spec <path>', 'Take probes from this clone spec')
  .action((name: string, _options: unknown, command: Command) => healthCommand(name, opts(command)));

// =============================================================================
// Snapshots
// =============================================================================

const snapshot = program.command('snapshot').description('Manage VM snapshots');

snapshot
  .command('create <vm> <snapshot>')
  .description('Take a snapshot')
  .action((vm: string, name: string, _options: unknown, command: Command) =>
    snapshotCreateCommand(vm, name, opts(command))
  );

snapshot
  .command('list <vm>')
  .description('List snapshots, oldest first')
  .action((vm: string, _options: unknown, command: Command) => snapshotListCommand(vm, opts(command)));

snapshot
  .command('restore <vm> <snapshot>')
  .description('Revert a VM to a snapshot (the VM is left stopped)')
  .action((vm: string, name: string, _options: unknown, command: Command) =>
    snapshotRestoreCommand(vm, name, opts(command))
  );

snapshot
  .command('delete <vm> <snapshot>')
  .description('Delete a snapshot')
  .action((vm: string, name: string, _options: unknown, command: Command) =>
    snapshotDeleteCommand(vm, name, opts(command))
  );

snapshot
  .command('prune <vm>')
  .description('Delete the oldest snapshots a retention policy does not keep')
  .option('--keep <n>', 'Keep at most N snapshots')
  .option('--max-age-days <n>', 'Delete snapshots older than N days')
  .option('--min-keep <n>', 'Never keep fewer than N snapshots (default: 1)')
  .option('--prefix <text>', 'Only snapshots whose name starts with this')
  .action((vm: string, _options: unknown, command: Command) => snapshotPruneCommand(vm, opts(command)));

// =============================================================================
// Compose
// =============================================================================

const compose = program.command('compose').description('Run groups of VMs from a compose file');

compose
  .command('up [file]')
  .description('Create and start members, dependencies first')
  .option('--member <name>', 'Only this member and its dependencies (repeatable)', collect)
  .action((file: string | undefined, _options: unknown, command: Command) => composeUpCommand(file, opts(command)));

compose
  .command('down [file]')
  .description('Stop members, dependents first')
  .option('--remove', 'Delete members instead of stopping them')
  .option('--member <name>', 'Only this member and its dependents (repeatable)', collect)
  .action((file: string | undefined, _options: unknown, command: Command) => composeDownCommand(file, opts(command)));

compose
  .command('restart [file]')
  .description('Stop members and their dependents, then start them again')
  .option('--member <name>', 'Only this member and its dependents (repeatable)', collect)
  .action((file: string | undefined, _options: unknown, command: Command) =>
    composeRestartCommand(file, opts(command))
  );

compose
  .command('status [file]')
  .description('Show the state of each member')
  .action((file: string | undefined, _options: unknown, command: Command) =>
    composeStatusCommand(file, opts(command))
  );

compose
  .command('logs <member> [file]')
  .description("Print the tail of a member's system journal")
  .option('--lines <n>', 'Number of lines', '50')
  .action((member: string, file: string | undefined, _options: unknown, command: Command) =>
    composeLogsCommand(file, member, opts(command))
  );

compose
  .command('exec <member> <argv...>')
  .description("Run a command in a member's guest through its agent")
  .option('-f, --file <path>', 'Compose file or directory', '.')
  .option('--timeout <ms>', 'Deadline for the command', '30000')
  .action((member: string, argv: string[], _options: unknown, command: Command) =>
    composeExecCommand(member, argv, opts(command))
  );

// =============================================================================
// Audit
// =============================================================================

const audit = program.command('audit').description('Inspect the audit log');

function withAuditFilters(command: Command): Command {
  return command
    .option('--since <time>', 'Only events at or after this ISO 8601 time')
    .option('--until <time>', 'Only events at or before this ISO 8601 time')
    .option('--kind <kind>', 'Only this event kind (repeatable)', collect)
    .option('--target <name>', 'Only events about this VM or group')
    .option('--outcome <outcome>', 'success or failure')
    .option('--correlation <id>', 'Only events of one compound operation')
    .option('--limit <n>', 'Only the most recent N events');
}

withAuditFilters(audit.command('list'))
  .description('List events')
  .action((_options: unknown, command: Command) => auditListCommand(opts(command)));

withAuditFilters(audit.command('search <text>'))
  .description('Search kinds, targets and details')
  .action((text: string, _options: unknown, command: Command) => auditSearchCommand(text, opts(command)));

withAuditFilters(audit.command('export'))
  .description('Export events as JSON lines')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .action((_options: unknown, command: Command) => auditExportCommand(opts(command)));

// =============================================================================
// Remote hosts
// =============================================================================

const remote = program
  .command('remote')
  .description('Operate on VMs of another host (user@host, host or a libvirt URI)');

remote
  .command('list <host>')
  .description('List domains on the host')
  .action((host: string, _options: unknown, command: Command) => remoteListCommand(host, opts(command)));

remote
  .command('status <host> <name>')
  .description('Show one domain')
  .action((host: string, name: string, _options: unknown, command: Command) =>
    remoteStatusCommand(host, name, opts(command))
  );

remote
  .command('start <host> <name>')
  .description('Start a domain')
  .action((host: string, name: string, _options: unknown, command: Command) =>
    remoteStartCommand(host, name, opts(command))
  );

remote
  .command('stop <host> <name>')
  .description('Stop a domain')
  .option('--force', 'Power off without a graceful shutdown')
  .action((host: string, name: string, _options: unknown, command: Command) =>
    remoteStopCommand(host, name, opts(command))
  );

remote
  .command('exec <host> <name> <argv...>')
  .description('Run a command in the guest through its agent')
  .option('--timeout <ms>', 'Deadline for the command', '30000')
  .action((host: string, name: string, argv: string[], _options: unknown, command: Command) =>
    remoteExecCommand(host, name, argv, opts(command))
  );

remote
  .command('health <host> <name>')
  .description('Run health probes once')
  .option('--quick', 'Only TCP probes')
  .option('--spec <path>', 'Take probes from this clone spec')
  .action((host: string, name: string, _options: unknown, command: Command) =>
    remoteHealthCommand(host, name, opts(command))
  );

await program.parseAsync();
