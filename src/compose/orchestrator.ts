/**
 * Compose Orchestrator
 *
 * Brings a group of VMs up in dependency order and down in reverse.
 * Independent branches run concurrently, bounded by a worker semaphore.
 * Member failures never throw: they are reported per member, and the
 * members depending on a failed one are skipped. Every event of one
 * up, down or restart shares a correlation id.
 */

import type { GuestExecResult, VirtualizationBackend } from '../backend/types.js';
import type { AuditSink } from '../audit/types.js';
import type { Logger } from '../lib/logger.js';
import type { LifecycleOrchestrator, VMState } from '../core/lifecycle.js';
import type { ComposeGroup, ComposeMember } from './loader.js';
import { transitiveDependencies, transitiveDependents, type DependencyMap } from './graph.js';
import { Semaphore } from '../core/semaphore.js';
import { BackendError, InvalidStateError, ValidationError, describeError } from '../core/errors.js';

/**
 * What happened to one member
 */
export type MemberStatus =
  | 'started'
  | 'already-running'
  | 'stopped'
  | 'already-stopped'
  | 'deleted'
  | 'absent'
  | 'failed'
  | 'skipped'
  | 'rolled-back';

/**
 * Per-member outcome of up() or down()
 */
export interface MemberOutcome {
  member: string;
  vmName: string;
  status: MemberStatus;
  /** Whether this call created the VM */
  created?: boolean;
  error?: string;
}

/**
 * Aggregate outcome of up() or down()
 */
export interface ComposeResult {
  group: string;
  /** Shared by the audit events of this call */
  correlationId: string;
  /** True iff no member failed or was skipped */
  success: boolean;
  /** In topological order */
  members: MemberOutcome[];
}

/**
 * Members named on the command line; the whole group when empty or absent
 */
export interface MemberSelection {
  members?: string[];
}

export interface UpOptions extends MemberSelection {
  signal?: AbortSignal;
}

export interface DownOptions extends MemberSelection {
  /** Delete members instead of stopping them */
  remove?: boolean;
}

export interface ExecOptions {
  /** Default: 30000 */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Current state of one member
 */
export interface MemberState {
  member: string;
  vmName: string;
  state: VMState;
  address: string | null;
  dependsOn: string[];
}

/**
 * Collaborators of the compose orchestrator
 */
export interface ComposeDependencies {
  lifecycle: LifecycleOrchestrator;
  backend: VirtualizationBackend;
  audit: AuditSink;
  logger: Logger;
  /** Concurrent member operations */
  workers: number;
  /** Deadline for fetching guest logs (default: 30000) */
  logTimeoutMs?: number;
}

const UP_STATUSES: ReadonlySet<MemberStatus> = new Set(['started', 'already-running']);

/**
 * Runs multi-VM compose groups.
 */
export class ComposeOrchestrator {
  private readonly lifecycle: LifecycleOrchestrator;
  private readonly backend: VirtualizationBackend;
  private readonly audit: AuditSink;
  private readonly logger: Logger;
  private readonly workers: number;
  private readonly logTimeoutMs: number;

  constructor(deps: ComposeDependencies) {
    this.lifecycle = deps.lifecycle;
    this.backend = deps.backend;
    this.audit = deps.audit;
    this.logger = deps.logger;
    this.workers = deps.workers;
    this.logTimeoutMs = deps.logTimeoutMs ?? 30_000;
  }

  /**
   * Create absent members and start stopped ones, dependencies first.
   * Named members bring their dependencies up with them.
   *
   * With `allOrNothing`, a failure rolls back every member this call
   * brought up: created VMs are deleted and started ones stopped again.
   *
   * @throws ValidationError for unknown member names
   */
  async up(group: ComposeGroup, options: UpOptions = {}): Promise<ComposeResult> {
    const selected = this.select(group, options.members, transitiveDependencies);
    return this.audit.correlate((correlationId) => this.upSelected(group, selected, correlationId, options.signal));
  }

  private async upSelected(
    group: ComposeGroup,
    selected: ComposeMember[],
    correlationId: string,
    signal?: AbortSignal
  ): Promise<ComposeResult> {
    const semaphore = new Semaphore(this.workers);
    const pending = new Map<string, Promise<MemberOutcome>>();

    for (const member of selected) {
      const deps = member.dependsOn.map(
        (dep): Promise<MemberOutcome> =>
          pending.get(dep) ??
          Promise.resolve({ member: dep, vmName: dep, status: 'skipped', error: 'unknown member' })
      );
      pending.set(member.name, this.upWhenReady(member, deps, semaphore, signal));
    }

    const outcomes = await Promise.all(selected.map((member) => this.settled(member, pending)));
    const success = outcomes.every((outcome) => UP_STATUSES.has(outcome.status));
    if (!success && group.allOrNothing) {
      await this.rollBack(selected, outcomes);
    }

    this.audit.record({
      kind: 'compose.up',
      target: group.name,
      outcome: success ? 'success' : 'failure',
      detail: { members: Object.fromEntries(outcomes.map((o) => [o.member, o.status])) },
    });
    return { group: group.name, correlationId, success, members: outcomes };
  }

  /**
   * Members to act on, in the group's topological order: the named ones
   * plus whatever `closure` adds for each.
   */
  private select(
    group: ComposeGroup,
    names: string[] | undefined,
    closure: (graph: DependencyMap, member: string) => Set<string>
  ): ComposeMember[] {
    if (names === undefined || names.length === 0) {
      return group.members;
    }
    const graph: DependencyMap = new Map(group.members.map((member) => [member.name, member.dependsOn]));
    const wanted = new Set<string>();
    for (const name of names) {
      this.memberOf(group, name);
      wanted.add(name);
      for (const related of closure(graph, name)) {
        wanted.add(related);
      }
    }
    return group.members.filter((member) => wanted.has(member.name));
  }

  private memberOf(group: ComposeGroup, memberName: string): ComposeMember {
    const member = group.members.find((candidate) => candidate.name === memberName);
    if (!member) {
      throw new ValidationError(
        `Compose group '${group.name}' has no member '${memberName}'`,
        'member',
        `Members: ${group.members.map((m) => m.name).join(', ')}`
      );
    }
    return member;
  }

  private async settled(member: ComposeMember, pending: Map<string, Promise<MemberOutcome>>): Promise<MemberOutcome> {
    const promise = pending.get(member.name);
    if (promise === undefined) {
      return { member: member.name, vmName: member.spec.vm.name, status: 'skipped' };
    }
    return promise;
  }

  private async upWhenReady(
    member: ComposeMember,
    deps: Array<Promise<MemberOutcome>>,
    semaphore: Semaphore,
    signal?: AbortSignal
  ): Promise<MemberOutcome> {
    const vmName = member.spec.vm.name;
    const blocked = (await Promise.all(deps))
      .filter((dep) => !UP_STATUSES.has(dep.status))
      .map((dep) => dep.member);
    if (blocked.length > 0) {
      this.logger.warning(`${member.name}: skipped, dependency ${blocked.join(', ')} is not running`);
      return { member: member.name, vmName, status: 'skipped', error: `dependency not running: ${blocked.join(', ')}` };
    }

    try {
      return await semaphore.run(() => this.bringUp(member, signal), signal);
    } catch (error) {
      this.logger.error(`${member.name}: ${describeError(error)}`);
      return { member: member.name, vmName, status: 'failed', error: describeError(error) };
    }
  }

  private async bringUp(member: ComposeMember, signal?: AbortSignal): Promise<MemberOutcome> {
    const vmName = member.spec.vm.name;
    const record = await this.lifecycle.status(vmName);
    switch (record.state) {
      case 'absent':
        await this.lifecycle.create(member.spec, { signal });
        return { member: member.name, vmName, status: 'started', created: true };
      case 'stopped':
        await this.lifecycle.start(vmName, { signal });
        return { member: member.name, vmName, status: 'started', created: false };
      case 'running':
        return { member: member.name, vmName, status: 'already-running' };
      case 'provisioning':
      case 'failed':
        throw new InvalidStateError(vmName, record.state, 'start');
    }
  }

  private async rollBack(members: ComposeMember[], outcomes: MemberOutcome[]): Promise<void> {
    const byMember = new Map(outcomes.map((outcome) => [outcome.member, outcome]));
    for (const member of [...members].reverse()) {
      const outcome = byMember.get(member.name);
      if (outcome?.status !== 'started') continue;
      try {
        if (outcome.created) {
          await this.lifecycle.delete(outcome.vmName);
        } else {
          await this.lifecycle.stop(outcome.vmName);
        }
        outcome.status = 'rolled-back';
      } catch (error) {
        outcome.error = `rollback failed: ${describeError(error)}`;
        this.logger.warning(`${member.name}: ${outcome.error}`);
      }
    }
  }

  /**
   * Stop members, dependents first. With `remove`, members are deleted.
   * Named members take their dependents down with them.
   *
   * @throws ValidationError for unknown member names
   */
  async down(group: ComposeGroup, options: DownOptions = {}): Promise<ComposeResult> {
    const selected = this.select(group, options.members, transitiveDependents);
    return this.audit.correlate((correlationId) =>
      this.downSelected(group, selected, correlationId, options.remove ?? false)
    );
  }

  private async downSelected(
    group: ComposeGroup,
    selected: ComposeMember[],
    correlationId: string,
    remove: boolean
  ): Promise<ComposeResult> {
    const semaphore = new Semaphore(this.workers);
    const pending = new Map<string, Promise<MemberOutcome>>();

    for (const member of [...selected].reverse()) {
      const dependents = selected
        .filter((candidate) => candidate.dependsOn.includes(member.name))
        .map((candidate) => pending.get(candidate.name))
        .filter((promise): promise is Promise<MemberOutcome> => promise !== undefined);
      pending.set(member.name, this.downWhenReady(member, dependents, semaphore, remove));
    }

    const outcomes = await Promise.all(selected.map((member) => this.settled(member, pending)));
    const success = outcomes.every((outcome) => outcome.status !== 'failed');

    this.audit.record({
      kind: 'compose.down',
      target: group.name,
      outcome: success ? 'success' : 'failure',
      detail: { remove, members: Object.fromEntries(outcomes.map((o) => [o.member, o.status])) },
    });
    return { group: group.name, correlationId, success, members: outcomes };
  }

  /**
   * Stop the named members and their dependents, then bring them up again
   * together with their dependencies. Nothing is started when a member
   * fails to stop.
   *
   * @throws ValidationError for unknown member names
   */
  async restart(group: ComposeGroup, options: UpOptions = {}): Promise<ComposeResult> {
    const stopping = this.select(group, options.members, transitiveDependents);
    const names = stopping.map((member) => member.name);
    const starting = this.select(group, names, transitiveDependencies);

    return this.audit.correlate(async (correlationId) => {
      const down = await this.downSelected(group, stopping, correlationId, false);
      const result = down.success ? await this.upSelected(group, starting, correlationId, options.signal) : down;
      this.audit.record({
        kind: 'compose.restart',
        target: group.name,
        outcome: result.success ? 'success' : 'failure',
        detail: { members: names },
      });
      return result;
    });
  }

  private async downWhenReady(
    member: ComposeMember,
    dependents: Array<Promise<MemberOutcome>>,
    semaphore: Semaphore,
    remove: boolean
  ): Promise<MemberOutcome> {
    await Promise.allSettled(dependents);
    const vmName = member.spec.vm.name;
    try {
      return await semaphore.run(async () => {
        if (remove) {
          const deleted = await this.lifecycle.delete(vmName);
          return { member: member.name, vmName, status: deleted ? 'deleted' : 'absent' };
        }
        const record = await this.lifecycle.status(vmName);
        switch (record.state) {
          case 'absent':
            return { member: member.name, vmName, status: 'absent' };
          case 'stopped':
            return { member: member.name, vmName, status: 'already-stopped' };
          default:
            await this.lifecycle.stop(vmName);
            return { member: member.name, vmName, status: 'stopped' };
        }
      });
    } catch (error) {
      this.logger.error(`${member.name}: ${describeError(error)}`);
      return { member: member.name, vmName, status: 'failed', error: describeError(error) };
    }
  }

  /**
   * Current state of every member. Lock-free.
   */
  async status(group: ComposeGroup): Promise<MemberState[]> {
    return Promise.all(
      group.members.map(async (member) => {
        const record = await this.lifecycle.status(member.spec.vm.name);
        return {
          member: member.name,
          vmName: member.spec.vm.name,
          state: record.state,
          address: record.address,
          dependsOn: member.dependsOn,
        };
      })
    );
  }

  /**
   * Last `lines` lines of a member's system journal, read through the guest agent.
   *
   * @throws ValidationError for unknown members
   * @throws InvalidStateError unless the member is running
   */
  async logs(group: ComposeGroup, memberName: string, lines = 50): Promise<string> {
    const vmName = await this.runningMember(group, memberName, 'read logs of');
    const result = await this.backend.guestExec(
      vmName,
      ['journalctl', '--no-pager', '-n', String(lines)],
      { timeoutMs: this.logTimeoutMs }
    );
    if (result.exitCode !== 0) {
      throw new BackendError(
        `journalctl in '${vmName}' exited with code ${result.exitCode}`,
        'guest-exec',
        result.stderr
      );
    }
    return result.stdout;
  }

  /**
   * Run a command in a member's guest through the agent. A non-zero exit
   * is returned, not thrown.
   *
   * @throws ValidationError for unknown members or an empty command
   * @throws InvalidStateError unless the member is running
   */
  async exec(
    group: ComposeGroup,
    memberName: string,
    argv: string[],
    options: ExecOptions = {}
  ): Promise<GuestExecResult> {
    if (argv.length === 0) {
      throw new ValidationError('No command given', 'command');
    }
    const vmName = await this.runningMember(group, memberName, 'run commands in');
    return this.backend.guestExec(vmName, argv, {
      timeoutMs: options.timeoutMs ?? 30_000,
      signal: options.signal,
    });
  }

  private async runningMember(group: ComposeGroup, memberName: string, operation: string): Promise<string> {
    const vmName = this.memberOf(group, memberName).spec.vm.name;
    const record = await this.lifecycle.status(vmName);
    if (record.state !== 'running') {
      throw new InvalidStateError(vmName, record.state, operation);
    }
    return vmName;
  }
}
