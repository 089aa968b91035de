/**
 * Integration tests for compose groups
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ComposeGroup } from '../../src/compose/loader.js';
import { loadComposeFile } from '../../src/compose/loader.js';
import { saveCloneSpec } from '../../src/config/loader.js';
import {
  BackendError,
  ConfigError,
  CycleError,
  InvalidStateError,
  ValidationError,
} from '../../src/core/errors.js';
import { createTestEnv, destroyTestEnv, makeSpec, type TestEnv } from '../helpers/env.js';

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Group whose members are given in topological order; each member's VM
 * shares its name.
 */
function group(members: Array<[string, string[]]>, allOrNothing = false): ComposeGroup {
  return {
    name: 'stack',
    path: '/tmp/clonebox-compose.yaml',
    allOrNothing,
    members: members.map(([name, dependsOn]) => ({
      name,
      specPath: `/tmp/${name}/.clonebox.yaml`,
      spec: makeSpec(name),
      dependsOn,
    })),
  };
}

function statuses(result: { members: Array<{ member: string; status: string }> }): Record<string, string> {
  return Object.fromEntries(result.members.map((m) => [m.member, m.status]));
}

// =============================================================================
// Tests
// =============================================================================

describe('ComposeOrchestrator', () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv();
  });

  afterEach(async () => {
    await destroyTestEnv(env);
  });

  describe('up', () => {
    it('should create members after their dependencies are running', async () => {
      const result = await env.engine.compose.up(group([['db', []], ['web', ['db']]]));

      assert.strictEqual(result.success, true);
      assert.deepStrictEqual(statuses(result), { db: 'started', web: 'started' });
      assert.strictEqual(result.members[0]?.created, true);
      assert.ok(env.backend.calls.indexOf('startDomain:db') < env.backend.calls.indexOf('defineDomain:web'));
    });

    it('should leave running members alone and start stopped ones', async () => {
      await env.engine.lifecycle.create(makeSpec('db'));
      await env.engine.lifecycle.create(makeSpec('web'));
      await env.engine.lifecycle.stop('web');

      const result = await env.engine.compose.up(group([['db', []], ['web', ['db']]]));

      assert.deepStrictEqual(statuses(result), { db: 'already-running', web: 'started' });
      assert.strictEqual(result.members[1]?.created, false);
    });

    it('should skip members whose dependency failed', async () => {
      env.backend.seed('db', 'crashed');

      const result = await env.engine.compose.up(group([['db', []], ['cache', []], ['web', ['db']]]));

      assert.strictEqual(result.success, false);
      assert.deepStrictEqual(statuses(result), { db: 'failed', cache: 'started', web: 'skipped' });
      assert.strictEqual(result.members[0]?.error, "Cannot start VM 'db' while it is failed");
      assert.strictEqual(result.members[2]?.error, 'dependency not running: db');
      assert.strictEqual(env.backend.domains.has('web'), false);
    });

    it('should undo everything it brought up when all_or_nothing is set', async () => {
      await env.engine.lifecycle.create(makeSpec('queue'));
      await env.engine.lifecycle.stop('queue');
      env.backend.seed('db', 'crashed');

      const result = await env.engine.compose.up(
        group([['cache', []], ['db', []], ['queue', []], ['web', ['db']]], true)
      );

      assert.deepStrictEqual(statuses(result), {
        cache: 'rolled-back',
        db: 'failed',
        queue: 'rolled-back',
        web: 'skipped',
      });
      assert.strictEqual(env.backend.domains.has('cache'), false);
      assert.strictEqual((await env.engine.lifecycle.status('cache')).state, 'absent');
      assert.strictEqual((await env.engine.lifecycle.status('queue')).state, 'stopped');
    });

    it('should record the outcome of every member', async () => {
      await env.engine.compose.up(group([['db', []], ['web', ['db']]]));

      const [event] = env.engine.audit.query({ kinds: ['compose.up'] });
      assert.ok(event);
      assert.strictEqual(event.target, 'stack');
      assert.strictEqual(event.outcome, 'success');
      assert.deepStrictEqual(event.detail, { members: { db: 'started', web: 'started' } });
    });
  });

  describe('down', () => {
    it('should stop dependents before their dependencies', async () => {
      const stack = group([['db', []], ['web', ['db']]]);
      await env.engine.compose.up(stack);
      env.backend.calls.length = 0;

      const result = await env.engine.compose.down(stack);

      assert.strictEqual(result.success, true);
      assert.deepStrictEqual(statuses(result), { db: 'stopped', web: 'stopped' });
      assert.ok(env.backend.calls.indexOf('shutdownDomain:web') < env.backend.calls.indexOf('shutdownDomain:db'));

      const again = await env.engine.compose.down(stack);
      assert.deepStrictEqual(statuses(again), { db: 'already-stopped', web: 'already-stopped' });
    });

    it('should delete members with remove', async () => {
      const stack = group([['db', []], ['web', ['db']]]);
      await env.engine.compose.up(stack);

      const result = await env.engine.compose.down(stack, { remove: true });

      assert.deepStrictEqual(statuses(result), { db: 'deleted', web: 'deleted' });
      assert.strictEqual(env.backend.domains.size, 0);
      assert.deepStrictEqual(await env.engine.store.list(), []);

      const again = await env.engine.compose.down(stack, { remove: true });
      assert.deepStrictEqual(statuses(again), { db: 'absent', web: 'absent' });
    });
  });

  describe('member selection', () => {
    const stack = group([['db', []], ['cache', []], ['api', ['db']], ['web', ['api']]]);

    it('should bring named members up with their dependencies only', async () => {
      const result = await env.engine.compose.up(stack, { members: ['api'] });

      assert.strictEqual(result.success, true);
      assert.deepStrictEqual(statuses(result), { db: 'started', api: 'started' });
      assert.deepStrictEqual([...env.backend.domains.keys()].sort(), ['api', 'db']);
    });

    it('should take named members down with their dependents only', async () => {
      await env.engine.compose.up(stack);

      const result = await env.engine.compose.down(stack, { members: ['api'] });

      assert.deepStrictEqual(statuses(result), { api: 'stopped', web: 'stopped' });
      assert.strictEqual(env.backend.domains.get('db')?.state, 'running');
      assert.strictEqual(env.backend.domains.get('cache')?.state, 'running');
    });

    it('should reject unknown member names before doing anything', async () => {
      await assert.rejects(
        () => env.engine.compose.up(stack, { members: ['api', 'nope'] }),
        (error: unknown) => error instanceof ValidationError && error.message === "Compose group 'stack' has no member 'nope'"
      );
      assert.deepStrictEqual(env.backend.calls, []);
    });
  });

  describe('restart', () => {
    const stack = group([['db', []], ['api', ['db']], ['web', ['api']]]);

    it('should stop dependents first, then start everything again', async () => {
      await env.engine.compose.up(stack);
      env.backend.calls.length = 0;

      const result = await env.engine.compose.restart(stack, { members: ['api'] });

      assert.strictEqual(result.success, true);
      assert.deepStrictEqual(statuses(result), { db: 'already-running', api: 'started', web: 'started' });
      const mutating = env.backend.calls.filter((call) => /^(shutdown|start)Domain/.test(call));
      assert.deepStrictEqual(mutating, ['shutdownDomain:web', 'shutdownDomain:api', 'startDomain:api', 'startDomain:web']);
    });

    it('should not start anything when a member fails to stop', async () => {
      await env.engine.compose.up(stack);
      env.backend.failOn('shutdownDomain', new Error('agent gone'));

      const result = await env.engine.compose.restart(stack, { members: ['web'] });

      assert.strictEqual(result.success, false);
      assert.strictEqual(statuses(result)['web'], 'failed');
      assert.strictEqual(env.engine.audit.query({ kinds: ['compose.up'] }).length, 1);
    });
  });

  describe('correlation', () => {
    it('should tie every event of one compose call together', async () => {
      const stack = group([['db', []], ['web', ['db']]]);

      const result = await env.engine.compose.up(stack);

      const events = env.engine.audit.query({ correlationId: result.correlationId });
      assert.deepStrictEqual(
        events.map((event) => [event.kind, event.target]).sort(),
        [
          ['compose.up', 'stack'],
          ['vm.create', 'db'],
          ['vm.create', 'web'],
        ]
      );
    });

    it('should share one id between the stop and start halves of a restart', async () => {
      const stack = group([['db', []]]);
      await env.engine.compose.up(stack);

      const result = await env.engine.compose.restart(stack);

      const kinds = env.engine.audit.query({ correlationId: result.correlationId }).map((event) => event.kind);
      assert.deepStrictEqual(kinds, ['vm.stop', 'compose.down', 'vm.start', 'compose.up', 'compose.restart']);
    });
  });

  describe('exec', () => {
    const stack = group([['db', []]]);

    it('should run the command in the member guest and return its exit', async () => {
      await env.engine.lifecycle.create(makeSpec('db'));
      let seen: [string, string[]] = ['', []];
      env.backend.execResponder = (name, argv) => {
        seen = [name, argv];
        return { exitCode: 3, stdout: '', stderr: 'inactive' };
      };

      const result = await env.engine.compose.exec(stack, 'db', ['systemctl', 'is-active', 'postgresql']);

      assert.deepStrictEqual(result, { exitCode: 3, stdout: '', stderr: 'inactive' });
      assert.deepStrictEqual(seen, ['db', ['systemctl', 'is-active', 'postgresql']]);
    });

    it('should reject an empty command, unknown members and stopped members', async () => {
      await assert.rejects(() => env.engine.compose.exec(stack, 'db', []), ValidationError);
      await assert.rejects(() => env.engine.compose.exec(stack, 'nope', ['true']), ValidationError);
      await assert.rejects(() => env.engine.compose.exec(stack, 'db', ['true']), InvalidStateError);
    });
  });

  describe('status', () => {
    it('should report each member with its dependencies', async () => {
      const stack = group([['db', []], ['web', ['db']]]);
      await env.engine.lifecycle.create(makeSpec('db'));

      const states = await env.engine.compose.status(stack);

      assert.deepStrictEqual(
        states.map((s) => [s.member, s.state, s.dependsOn]),
        [
          ['db', 'running', []],
          ['web', 'absent', ['db']],
        ]
      );
    });
  });

  describe('logs', () => {
    const stack = group([['db', []]]);

    it('should read the journal through the guest agent', async () => {
      await env.engine.lifecycle.create(makeSpec('db'));
      let argv: string[] = [];
      env.backend.execResponder = (_name, command) => {
        argv = command;
        return { exitCode: 0, stdout: 'line one\nline two\n', stderr: '' };
      };

      const output = await env.engine.compose.logs(stack, 'db', 20);

      assert.strictEqual(output, 'line one\nline two\n');
      assert.deepStrictEqual(argv, ['journalctl', '--no-pager', '-n', '20']);
    });

    it('should fail when journalctl exits non-zero', async () => {
      await env.engine.lifecycle.create(makeSpec('db'));
      env.backend.execResponder = () => ({ exitCode: 1, stdout: '', stderr: 'No journal files were found.' });

      await assert.rejects(() => env.engine.compose.logs(stack, 'db'), BackendError);
    });

    it('should reject unknown and stopped members', async () => {
      await assert.rejects(() => env.engine.compose.logs(stack, 'nope'), ValidationError);
      await assert.rejects(() => env.engine.compose.logs(stack, 'db'), InvalidStateError);
    });
  });
});

describe('loadComposeFile', () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv();
  });

  afterEach(async () => {
    await destroyTestEnv(env);
  });

  async function writeMember(name: string, vmName = name): Promise<void> {
    await mkdir(join(env.root, name), { recursive: true });
    await saveCloneSpec(join(env.root, name, '.clonebox.yaml'), makeSpec(vmName));
  }

  it('should load members in dependency order', async () => {
    await writeMember('api');
    await writeMember('db');
    const path = join(env.root, 'clonebox-compose.yaml');
    await writeFile(
      path,
      ['version: 1', 'name: stack', 'all_or_nothing: true', 'vms:', '  api:', '    spec: ./api', '    depends_on: [db]', '  db:', '    spec: ./db', ''].join('\n')
    );

    const loaded = await loadComposeFile(path);

    assert.strictEqual(loaded.name, 'stack');
    assert.strictEqual(loaded.allOrNothing, true);
    assert.deepStrictEqual(
      loaded.members.map((m) => [m.name, m.spec.vm.name, m.dependsOn]),
      [
        ['db', 'db', []],
        ['api', 'api', ['db']],
      ]
    );
    assert.strictEqual(loaded.members[1]?.specPath, join(env.root, 'api', '.clonebox.yaml'));
  });

  it('should reject cycles before loading any spec', async () => {
    const path = join(env.root, 'clonebox-compose.yaml');
    await writeFile(
      path,
      ['version: 1', 'name: stack', 'vms:', '  a:', '    spec: ./a', '    depends_on: [b]', '  b:', '    spec: ./b', '    depends_on: [a]', ''].join('\n')
    );

    await assert.rejects(
      () => loadComposeFile(path),
      (error: unknown) => error instanceof CycleError && error.message === 'Dependency cycle among: a, b'
    );
  });

  it('should reject two members defining the same VM', async () => {
    await writeMember('one', 'shared');
    await writeMember('two', 'shared');
    const path = join(env.root, 'clonebox-compose.yaml');
    await writeFile(
      path,
      ['version: 1', 'name: stack', 'vms:', '  one:', '    spec: ./one', '  two:', '    spec: ./two', ''].join('\n')
    );

    await assert.rejects(
      () => loadComposeFile(path),
      (error: unknown) =>
        error instanceof ValidationError && error.message === "Members 'one' and 'two' both define VM 'shared'"
    );
  });

  it('should reject files that fail the schema', async () => {
    const path = join(env.root, 'clonebox-compose.yaml');
    await writeFile(path, 'version: 1\nname: stack\nvms: {}\n');

    await assert.rejects(() => loadComposeFile(path), ConfigError);
  });
});
