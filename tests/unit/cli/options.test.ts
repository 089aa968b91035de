/**
 * Unit tests for command-line option parsing
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { parseMountRequests } from '../../../src/cli/commands/clone.js';
import { toAuditQuery } from '../../../src/cli/commands/audit.js';
import { toRetentionPolicy } from '../../../src/cli/commands/snapshot.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('parseMountRequests', () => {
  it('should resolve host paths against the working directory', () => {
    assert.deepStrictEqual(parseMountRequests(['./data:/srv/data', '/opt/tools:/tools'], '/home/dev/shop'), [
      { hostPath: '/home/dev/shop/data', guestPath: '/srv/data' },
      { hostPath: '/opt/tools', guestPath: '/tools' },
    ]);
  });

  it('should reject requests without an absolute guest path', () => {
    assert.throws(() => parseMountRequests(['data'], '/home/dev'), ConfigError);
    assert.throws(() => parseMountRequests([':/data'], '/home/dev'), ConfigError);
    assert.throws(() => parseMountRequests(['data:relative'], '/home/dev'), {
      message: "--mount expects HOST:GUEST with an absolute guest path, got 'data:relative'",
    });
  });
});

describe('toAuditQuery', () => {
  it('should carry only the filters that were given', () => {
    assert.deepStrictEqual(toAuditQuery({}), {});
    assert.deepStrictEqual(
      toAuditQuery({
        since: '2024-05-01T00:00:00Z',
        kind: ['vm.create', 'vm.delete'],
        target: 'web',
        outcome: 'failure',
        correlation: 'test-correlation',
        limit: '5',
      }),
      {
        since: '2024-05-01T00:00:00Z',
        kinds: ['vm.create', 'vm.delete'],
        target: 'web',
        outcome: 'failure',
        correlationId: 'test-correlation',
        limit: 5,
      }
    );
  });

  it('should reject malformed filters', () => {
    assert.throws(() => toAuditQuery({ until: 'yesterday' }), {
      message: "--until must be an ISO 8601 timestamp, got 'yesterday'",
    });
    assert.throws(() => toAuditQuery({ outcome: 'partial' }), ConfigError);
    assert.throws(() => toAuditQuery({ limit: '-1' }), ConfigError);
  });
});

describe('toRetentionPolicy', () => {
  it('should map prune flags onto a policy', () => {
    assert.deepStrictEqual(toRetentionPolicy({ keep: '5', maxAgeDays: '14', minKeep: '2', prefix: 'auto-' }), {
      maxSnapshots: 5,
      maxAgeDays: 14,
      minSnapshots: 2,
      prefix: 'auto-',
    });
    assert.deepStrictEqual(toRetentionPolicy({}), {});
  });

  it('should reject counts that are not positive integers', () => {
    assert.throws(() => toRetentionPolicy({ keep: 'all' }), {
      message: "--keep must be a positive integer, got 'all'",
    });
  });
});
