/**
 * Unit tests for Clone Spec Schema Migration
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import type { CloneSpecFileV1, CloneSpecFileV2 } from '../../../src/config/types.js';
import { isV1, migrateV1, toV1, toV2 } from '../../../src/config/migrate.js';

describe('migrateV1', () => {
  it('should move fields into their v2 homes', () => {
    const v1: CloneSpecFileV1 = {
      version: 1,
      name: 'legacy',
      session: 'system',
      ram_mb: 1024,
      vcpus: 2,
      disk_size_gb: 20,
      network_mode: 'default',
      paths: { '/srv/app': '/app' },
      packages: ['git'],
      services: ['sshd'],
      auth_method: 'ssh-key',
      health_checks: [{ name: 'ssh', type: 'tcp', target: '22' }],
    };

    const { value, unmapped } = migrateV1(v1);

    assert.deepStrictEqual(unmapped, []);
    assert.deepStrictEqual(value, {
      version: 2,
      vm: {
        name: 'legacy',
        session: 'system',
        network: 'default',
        resources: { ram_mb: 1024, vcpus: 2, disk_gb: 20 },
      },
      mounts: { '/srv/app': '/app' },
      packages: ['git'],
      services: ['sshd'],
      auth: { method: 'ssh-key' },
      health_checks: [{ name: 'ssh', type: 'tcp', target: '22' }],
    });
  });

  it('should treat a bare password as password auth', () => {
    const { value } = migrateV1({ version: 1, name: 'pw', password: 'test-secret' });

    assert.deepStrictEqual(value.auth, { method: 'password', password: 'test-secret' });
  });

  it('should omit resources that were never stated', () => {
    const { value } = migrateV1({ version: 1, name: 'bare' });

    assert.deepStrictEqual(value, { version: 2, vm: { name: 'bare' } });
  });
});

describe('toV1', () => {
  it('should round-trip every v1 field', () => {
    const v1: CloneSpecFileV1 = {
      version: 1,
      name: 'legacy',
      ram_mb: 512,
      network_mode: 'user',
      paths: { '/srv/app': '/app' },
      auth_method: 'password',
      password: 'test-secret',
    };

    const back = toV1(migrateV1(v1).value);

    assert.deepStrictEqual(back.value, v1);
    assert.deepStrictEqual(back.unmapped, []);
  });
});

describe('toV2', () => {
  it('should return v2 documents unchanged', () => {
    const v2: CloneSpecFileV2 = { version: 2, vm: { name: 'modern' } };

    assert.strictEqual(toV2(v2).value, v2);
  });

  it('should recognize string versions', () => {
    assert.strictEqual(isV1({ version: '1', name: 'old' }), true);
    assert.strictEqual(isV1({ version: 2, vm: { name: 'new' } }), false);
  });
});
