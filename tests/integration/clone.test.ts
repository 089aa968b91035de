/**
 * Integration tests for cloning a working directory end to end:
 * detect, synthesize, persist, reload and create.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, realpath, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { Detector } from '../../src/detect/detector.js';
import { ProjectProbe } from '../../src/detect/probes.js';
import { loadProfile } from '../../src/detect/profiles.js';
import { loadCloneSpec, saveCloneSpec } from '../../src/config/loader.js';
import { createTestEnv, destroyTestEnv, type TestEnv } from '../helpers/env.js';

describe('clone workflow', () => {
  let env: TestEnv;
  let project: string;

  beforeEach(async () => {
    env = await createTestEnv({ defaults: { ramMb: 1024, vcpus: 1, diskGb: 1 } });
    project = join(env.root, 'shop');
    await mkdir(join(project, 'api'), { recursive: true });
    await mkdir(join(project, 'docs'), { recursive: true });
    await writeFile(join(project, 'package.json'), '{}\n');
    await writeFile(join(project, 'api', 'go.mod'), 'module shop/api\n');
  });

  afterEach(async () => {
    await destroyTestEnv(env);
  });

  it('should turn a project directory into a persisted spec and a running VM', async () => {
    const detector = new Detector([new ProjectProbe(project)], env.logger);
    const detected = await detector.detect();

    assert.deepStrictEqual(
      detected.map((item) => [item.name, item.source.evidence, item.guestPath]),
      [
        [project, 'package.json', '/workspace/shop'],
        [join(project, 'api'), 'go.mod', '/workspace/shop/api'],
      ]
    );

    const spec = await env.engine.synthesizer.synthesize(detected, undefined, undefined, { cwd: project });

    // The nested project shares the parent's mount root, so only the parent is mounted
    assert.deepStrictEqual(spec.mounts, [{ hostPath: await realpath(project), guestPath: '/workspace/shop' }]);
    assert.strictEqual(spec.vm.name, 'clone-shop');
    assert.deepStrictEqual(spec.vm.resources, { ramMb: 1024, vcpus: 1, diskGb: 1 });

    const specPath = join(project, '.clonebox.yaml');
    await saveCloneSpec(specPath, spec);
    const loaded = await loadCloneSpec(specPath, env.settings.defaults);
    assert.deepStrictEqual(loaded.spec, spec);
    assert.strictEqual(loaded.sourceVersion, 2);

    const result = await env.engine.lifecycle.create(loaded.spec);
    assert.strictEqual(result.record.state, 'running');
    const definition = env.backend.domains.get('clone-shop')?.definition;
    assert.ok(definition);
    assert.strictEqual(definition.mounts.length, 1);
  });

  it('should produce the same spec when re-cloned with the previous one', async () => {
    const detector = new Detector([new ProjectProbe(project)], env.logger);
    const detected = await detector.detect();

    const first = await env.engine.synthesizer.synthesize(detected, undefined, undefined, { cwd: project });
    const second = await env.engine.synthesizer.synthesize(detected, undefined, first, { cwd: project });

    assert.deepStrictEqual(second, first);
  });

  it('should merge a built-in profile under explicit resources', async () => {
    const profile = await loadProfile('node-dev', { cwd: project, searchDirs: [] });

    const spec = await env.engine.synthesizer.synthesize([], profile, undefined, {
      cwd: project,
      name: 'shop-dev',
      resources: { vcpus: 1 },
    });

    assert.deepStrictEqual(spec.packages, ['git', 'nodejs', 'npm']);
    assert.deepStrictEqual(spec.vm.resources, { ramMb: 4096, vcpus: 1, diskGb: 1 });
    assert.strictEqual(spec.vm.name, 'shop-dev');
  });
});
