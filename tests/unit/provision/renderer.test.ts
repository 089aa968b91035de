/**
 * Unit tests for the Provisioning Renderer
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import yaml from 'js-yaml';

import {
  GUEST_AGENT_PACKAGE,
  ProvisioningRenderer,
  mountTag,
  resolveNetworkMode,
  validateMounts,
  type ProvisioningBundle,
} from '../../../src/provision/renderer.js';
import { Secret, type SshKeyPair } from '../../../src/provision/credentials.js';
import { ValidationError } from '../../../src/core/errors.js';
import { shortHash } from '../../../src/lib/hash.js';
import { makeSpec } from '../../helpers/env.js';

// ============================================================================
// Test Helpers
// ============================================================================

const KEY_PAIR: SshKeyPair = {
  publicKey: 'ssh-ed25519 AAAAtest clonebox@web',
  privateKey: new Secret('test-private-key'),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the cloud-config document out of a bundle.
 */
function cloudConfig(bundle: ProvisioningBundle): Record<string, unknown> {
  const text = bundle.userData.reveal();
  assert.ok(text.startsWith('#cloud-config\n'));
  const parsed = yaml.load(text);
  assert.ok(isRecord(parsed));
  return parsed;
}

const renderer = new ProvisioningRenderer();

// ============================================================================
// Tests
// ============================================================================

describe('resolveNetworkMode', () => {
  it('should resolve auto by session scope', () => {
    assert.strictEqual(resolveNetworkMode('auto', 'user'), 'user');
    assert.strictEqual(resolveNetworkMode('auto', 'system'), 'default');
  });

  it('should keep an explicit mode', () => {
    assert.strictEqual(resolveNetworkMode('default', 'user'), 'default');
  });
});

describe('mountTag', () => {
  it('should derive a short stable tag from the host path', () => {
    assert.strictEqual(mountTag('/srv/shop'), `cb-${shortHash('/srv/shop')}`);
    assert.match(mountTag('/srv/shop'), /^cb-[0-9a-f]{8}$/);
  });
});

describe('ProvisioningRenderer', () => {
  it('should render an ssh-key bundle identically every time', () => {
    const spec = makeSpec('web', {
      mounts: [{ hostPath: '/srv/shop', guestPath: '/workspace/shop' }],
      packages: ['git', 'nginx'],
      services: ['nginx'],
    });

    const first = renderer.render(spec, { keyPair: KEY_PAIR });
    const second = renderer.render(spec, { keyPair: KEY_PAIR });

    assert.strictEqual(first.userData.reveal(), second.userData.reveal());
    assert.strictEqual(first.networkConfig, second.networkConfig);
    assert.strictEqual(first.metaData, 'instance-id: web\nlocal-hostname: web\n');
    assert.deepStrictEqual(first.mounts, [
      { tag: mountTag('/srv/shop'), guestPath: '/workspace/shop', hostPath: '/srv/shop' },
    ]);
  });

  it('should generate one keypair per VM when none is passed in', () => {
    const fresh = new ProvisioningRenderer();

    const first = fresh.render(makeSpec('web'));
    const second = fresh.render(makeSpec('web'));
    const other = fresh.render(makeSpec('db'));

    assert.strictEqual(first.userData.reveal(), second.userData.reveal());
    assert.strictEqual(first.credentials.sshPublicKey, second.credentials.sshPublicKey);
    assert.notStrictEqual(first.credentials.sshPublicKey, other.credentials.sshPublicKey);
    assert.ok(first.credentials.sshPublicKey?.endsWith(' clonebox@web'));
  });

  it('should describe the first user, packages, mounts and services in user-data', () => {
    const spec = makeSpec('web', {
      mounts: [{ hostPath: '/srv/shop', guestPath: '/workspace/shop' }],
      packages: ['git'],
      services: ['nginx'],
    });

    const config = cloudConfig(renderer.render(spec, { keyPair: KEY_PAIR }));

    assert.strictEqual(config['hostname'], 'web');
    assert.strictEqual(config['ssh_pwauth'], false);
    assert.deepStrictEqual(config['users'], [
      {
        name: 'clonebox',
        groups: 'sudo,adm',
        sudo: 'ALL=(ALL) NOPASSWD:ALL',
        shell: '/bin/bash',
        lock_passwd: true,
        ssh_authorized_keys: ['ssh-ed25519 AAAAtest clonebox@web'],
      },
    ]);
    assert.deepStrictEqual(config['packages'], ['git', GUEST_AGENT_PACKAGE]);
    assert.deepStrictEqual(config['mounts'], [
      [mountTag('/srv/shop'), '/workspace/shop', '9p', 'trans=virtio,version=9p2000.L,rw,nofail', '0', '0'],
    ]);
    assert.deepStrictEqual(config['runcmd'], [
      ['systemctl', 'enable', '--now', GUEST_AGENT_PACKAGE],
      ['systemctl', 'enable', '--now', 'nginx'],
    ]);
    assert.strictEqual(config['chpasswd'], undefined);
  });

  it('should not list the guest agent twice', () => {
    const config = cloudConfig(renderer.render(makeSpec('web', { packages: [GUEST_AGENT_PACKAGE] }), { keyPair: KEY_PAIR }));

    assert.deepStrictEqual(config['packages'], [GUEST_AGENT_PACKAGE]);
    assert.strictEqual(config['mounts'], undefined);
  });

  it('should configure user-mode networking statically', () => {
    const bundle = renderer.render(makeSpec('web'), { keyPair: KEY_PAIR });

    assert.deepStrictEqual(bundle.network, { mode: 'user', interface: 'eth0' });
    assert.deepStrictEqual(yaml.load(bundle.networkConfig), {
      version: 2,
      ethernets: {
        eth0: {
          match: { name: 'en*' },
          addresses: ['10.0.2.15/24'],
          routes: [{ to: 'default', via: '10.0.2.2' }],
          nameservers: { addresses: ['10.0.2.3'] },
        },
      },
    });
  });

  it('should use DHCP on the default bridge', () => {
    const spec = makeSpec('web');
    spec.vm.session = 'system';

    const bundle = renderer.render(spec, { keyPair: KEY_PAIR });

    assert.deepStrictEqual(yaml.load(bundle.networkConfig), {
      version: 2,
      ethernets: { eth0: { match: { name: 'en*' }, dhcp4: true } },
    });
  });

  it('should issue a fresh expiring password for one-time-password auth', () => {
    const spec = makeSpec('web', { auth: { method: 'one-time-password' } });

    const first = renderer.render(spec);
    const second = renderer.render(spec);
    const config = cloudConfig(first);

    assert.ok(first.credentials.password);
    assert.ok(second.credentials.password);
    assert.notStrictEqual(first.credentials.password.reveal(), second.credentials.password.reveal());
    assert.strictEqual(config['ssh_pwauth'], true);
    assert.deepStrictEqual(config['chpasswd'], {
      expire: true,
      users: [{ name: 'clonebox', password: first.credentials.password.reveal(), type: 'text' }],
    });
  });

  it('should keep the password out of serialized bundles', () => {
    const spec = makeSpec('web', { auth: { method: 'password', password: 'test-secret' } });

    const bundle = renderer.render(spec, { username: 'dev' });

    assert.ok(bundle.userData.reveal().includes('test-secret'));
    assert.strictEqual(JSON.stringify(bundle).includes('test-secret'), false);
    assert.strictEqual(bundle.credentials.username, 'dev');
    assert.strictEqual(bundle.credentials.expire, false);
  });
});

describe('validateMounts', () => {
  it('should accept readable host paths', async () => {
    await validateMounts(makeSpec('web', { mounts: [{ hostPath: '/', guestPath: '/host' }] }));
  });

  it('should name the first unreadable host path', async () => {
    await assert.rejects(
      validateMounts(makeSpec('web', { mounts: [{ hostPath: '/nonexistent/clonebox-test', guestPath: '/data' }] })),
      (error: unknown) =>
        error instanceof ValidationError &&
        error.message.startsWith("Host path /nonexistent/clonebox-test for VM 'web' is not readable")
    );
  });
});
