/**
 * Unit tests for the Synthesizer
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, realpath } from 'node:fs/promises';
import { join } from 'node:path';

import {
  Synthesizer,
  collapseMounts,
  deriveVmName,
  moreSpecificGuestPath,
} from '../../../src/detect/synthesizer.js';
import type { DetectedItem } from '../../../src/detect/types.js';
import type { Profile } from '../../../src/config/types.js';
import { resolveSettings } from '../../../src/config/settings.js';
import { ValidationError } from '../../../src/core/errors.js';
import { Logger } from '../../../src/lib/logger.js';
import { createTempDir, makeSpec, removeTempDir } from '../../helpers/env.js';

function detection(partial: Omit<DetectedItem, 'source' | 'confidence'> & { confidence?: number }): DetectedItem {
  return { confidence: 0.9, source: { probe: 'test', evidence: 'fixture' }, ...partial };
}

function profile(overrides: Partial<Profile> = {}): Profile {
  return { name: 'test', packages: [], services: [], mounts: [], resources: {}, healthChecks: [], ...overrides };
}

describe('deriveVmName', () => {
  it('should prefix the directory name', () => {
    assert.strictEqual(deriveVmName('/home/dev/shop'), 'clone-shop');
  });

  it('should replace characters a domain name cannot hold', () => {
    assert.strictEqual(deriveVmName('/home/dev/My Project!'), 'clone-My-Project-');
    assert.strictEqual(deriveVmName('/home/dev/..hidden'), 'clone-hidden');
  });

  it('should name the filesystem root', () => {
    assert.strictEqual(deriveVmName('/'), 'clone-root');
  });
});

describe('moreSpecificGuestPath', () => {
  it('should prefer deeper paths, then the smaller one', () => {
    assert.strictEqual(moreSpecificGuestPath('/app', '/app/src'), '/app/src');
    assert.strictEqual(moreSpecificGuestPath('/srv', '/app'), '/app');
  });
});

describe('collapseMounts', () => {
  it('should keep the most specific guest path for a repeated host path', () => {
    const mounts = collapseMounts([
      { hostPath: '/src/shop', guestPath: '/workspace' },
      { hostPath: '/src/shop', guestPath: '/workspace/shop' },
    ]);

    assert.deepStrictEqual(mounts, [{ hostPath: '/src/shop', guestPath: '/workspace/shop' }]);
  });

  it('should drop descendants mounted under the same root as an ancestor', () => {
    const mounts = collapseMounts([
      { hostPath: '/src/shop/api', guestPath: '/workspace/shop/api' },
      { hostPath: '/src/shop', guestPath: '/workspace/shop' },
      { hostPath: '/src/shop/data', guestPath: '/data' },
    ]);

    assert.deepStrictEqual(mounts, [
      { hostPath: '/src/shop/data', guestPath: '/data' },
      { hostPath: '/src/shop', guestPath: '/workspace/shop' },
    ]);
  });

  it('should reject two host paths at one guest mountpoint', () => {
    assert.throws(
      () =>
        collapseMounts([
          { hostPath: '/a', guestPath: '/data' },
          { hostPath: '/b', guestPath: '/data' },
        ]),
      (error: unknown) =>
        error instanceof ValidationError && error.message === 'Host paths /a and /b are both mounted at /data'
    );
  });
});

describe('Synthesizer', () => {
  let tempDir: string;
  let project: string;
  let logger: Logger;
  let synthesizer: Synthesizer;

  beforeEach(async () => {
    tempDir = await realpath(await createTempDir());
    project = join(tempDir, 'shop');
    await mkdir(join(project, 'api'), { recursive: true });
    logger = new Logger('json');
    synthesizer = new Synthesizer(resolveSettings({ session: 'user' }, {}, tempDir), logger);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should turn detections into a normalized spec', async () => {
    const detected = [
      detection({ kind: 'service', name: 'redis', package: 'redis-server' }),
      detection({ kind: 'application', name: 'node', package: 'nodejs', confidence: 0.4 }),
      detection({ kind: 'path', name: project, guestPath: '/workspace/shop', confidence: 1 }),
      detection({ kind: 'path', name: join(project, 'api'), guestPath: '/workspace/shop/api', confidence: 0.5 }),
    ];

    const spec = await synthesizer.synthesize(detected, undefined, undefined, { cwd: project });

    assert.deepStrictEqual(spec, {
      schemaVersion: 2,
      vm: {
        name: 'clone-shop',
        session: 'user',
        network: 'auto',
        resources: { ramMb: 4096, vcpus: 4, diskGb: 10 },
      },
      mounts: [{ hostPath: project, guestPath: '/workspace/shop' }],
      packages: ['nodejs', 'redis-server'],
      services: ['redis'],
      auth: { method: 'ssh-key' },
      healthChecks: [{ name: 'redis-tcp', type: 'tcp', target: '6379' }],
    });
  });

  it('should ignore detections below the confidence threshold', async () => {
    const detected = [
      detection({ kind: 'application', name: 'node', package: 'nodejs', confidence: 0.4 }),
      detection({ kind: 'application', name: 'vim', package: 'vim', confidence: 0.6 }),
    ];

    const spec = await synthesizer.synthesize(detected, undefined, undefined, { cwd: project, minConfidence: 0.5 });

    assert.deepStrictEqual(spec.packages, ['vim']);
  });

  it('should let explicit choices beat the prior spec and the prior spec beat the profile', async () => {
    const prior = makeSpec('web');
    const fromProfile = profile({ packages: ['Git'], resources: { ramMb: 8192, vcpus: 6, diskGb: 40 } });

    const spec = await synthesizer.synthesize([], fromProfile, prior, {
      cwd: project,
      resources: { vcpus: 2 },
    });

    assert.strictEqual(spec.vm.name, 'web');
    assert.deepStrictEqual(spec.vm.resources, { ramMb: 1024, vcpus: 2, diskGb: 1 });
    assert.deepStrictEqual(spec.packages, ['Git']);
  });

  it('should let the profile fill resources a v1 spec left unstated', async () => {
    const legacy = { version: 1 as const, name: 'legacy', ram_mb: 2048, gui: true };

    const spec = await synthesizer.synthesize(
      [],
      profile({ resources: { ramMb: 8192, vcpus: 6, diskGb: 40 } }),
      legacy,
      { cwd: project }
    );

    assert.deepStrictEqual(spec.vm.resources, { ramMb: 2048, vcpus: 6, diskGb: 40 });
    assert.deepStrictEqual(logger.getJsonBuffer().warnings, ['Fields not carried into schema v2: gui']);
  });

  it('should keep a declared health check over the generated one of the same name', async () => {
    const prior = makeSpec('web', {
      services: ['redis'],
      healthChecks: [{ name: 'redis-tcp', type: 'tcp', target: '16379' }],
    });

    const spec = await synthesizer.synthesize([], undefined, prior, { cwd: project });

    assert.deepStrictEqual(spec.healthChecks, [{ name: 'redis-tcp', type: 'tcp', target: '16379' }]);
  });

  it('should produce the same spec when run on its own output', async () => {
    const detected = [detection({ kind: 'path', name: project, guestPath: '/workspace/shop', confidence: 1 })];
    const first = await synthesizer.synthesize(detected, undefined, undefined, { cwd: project });

    const second = await synthesizer.synthesize(detected, undefined, first, { cwd: project });

    assert.deepStrictEqual(second, first);
  });

  it('should reject resources above the caps', async () => {
    await assert.rejects(
      synthesizer.synthesize([], undefined, undefined, { cwd: project, resources: { ramMb: 200000 } }),
      (error: unknown) =>
        error instanceof ValidationError &&
        error.message === 'Requested RAM (MB) 200000 exceeds the configured cap of 131072'
    );
  });

  it('should reject host paths that do not exist', async () => {
    const missing = join(tempDir, 'missing');

    await assert.rejects(
      synthesizer.synthesize([], undefined, undefined, {
        cwd: project,
        mounts: [{ hostPath: missing, guestPath: '/data' }],
      }),
      (error: unknown) =>
        error instanceof ValidationError && error.message.startsWith(`Host path ${missing} does not exist`)
    );
  });

  it('should reject password authentication without a password', async () => {
    await assert.rejects(
      synthesizer.synthesize([], undefined, undefined, { cwd: project, auth: { method: 'password' } }),
      (error: unknown) =>
        error instanceof ValidationError &&
        error.message === "VM 'clone-shop' uses password authentication but no password is set"
    );
  });

  it('should reject invalid VM names', async () => {
    await assert.rejects(
      synthesizer.synthesize([], undefined, undefined, { cwd: project, name: 'bad name' }),
      (error: unknown) => error instanceof ValidationError && error.message === "Invalid VM name 'bad name'"
    );
  });
});
