/**
 * Provisioning Renderer
 *
 * Compiles a CloneSpec into the boot-time bundle consumed by the guest's
 * first-boot mechanism (cloud-init NoCloud). For a given spec everything
 * except the credential material renders identically on every call.
 */

import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import yaml from 'js-yaml';

import type { CloneSpec, SessionScope } from '../config/types.js';
import {
  Secret,
  createCredentials,
  generateSshKeyPair,
  type CredentialMaterial,
  type SshKeyPair,
} from './credentials.js';
import { ValidationError, describeError } from '../core/errors.js';
import { shortHash } from '../lib/hash.js';

/**
 * Default first user inside the guest.
 */
export const DEFAULT_GUEST_USER = 'clonebox';

/**
 * Agent the health checker talks to; always part of the guest baseline.
 */
export const GUEST_AGENT_PACKAGE = 'qemu-guest-agent';

/**
 * One host directory exported into the guest
 */
export interface MountDeclaration {
  /** Host-side export identifier (virtio-9p mount tag) */
  tag: string;
  guestPath: string;
  hostPath: string;
}

/**
 * Guest network attachment
 */
export interface NetworkDeclaration {
  /** `user` is unprivileged user-mode networking, `default` the libvirt NAT bridge */
  mode: 'default' | 'user';
  /** Guest interface the network config applies to */
  interface: string;
}

/**
 * Everything the guest needs on first boot
 */
export interface ProvisioningBundle {
  vmName: string;
  packages: string[];
  services: string[];
  mounts: MountDeclaration[];
  network: NetworkDeclaration;
  credentials: CredentialMaterial;
  /** cloud-init user-data; embeds credentials */
  userData: Secret;
  metaData: string;
  networkConfig: string;
}

/**
 * Options for a render
 */
export interface RenderOptions {
  username?: string;
  /** Existing keypair of the VM (ssh-key mode) */
  keyPair?: SshKeyPair;
}

/**
 * Export identifier for a host path.
 *
 * Derived from the path so it is stable across renders and short enough
 * for the 9p tag limit.
 */
export function mountTag(hostPath: string): string {
  return `cb-${shortHash(hostPath)}`;
}

/**
 * Resolve `auto` networking for a session scope.
 *
 * User sessions cannot attach to the system bridge.
 */
export function resolveNetworkMode(
  mode: CloneSpec['vm']['network'],
  session: SessionScope
): NetworkDeclaration['mode'] {
  if (mode === 'auto') {
    return session === 'user' ? 'user' : 'default';
  }
  return mode;
}

function renderNetworkConfig(network: NetworkDeclaration): string {
  const ethernet: Record<string, unknown> =
    network.mode === 'user'
      ? {
          match: { name: 'en*' },
          addresses: ['10.0.2.15/24'],
          routes: [{ to: 'default', via: '10.0.2.2' }],
          nameservers: { addresses: ['10.0.2.3'] },
        }
      : { match: { name: 'en*' }, dhcp4: true };

  return yaml.dump(
    { version: 2, ethernets: { [network.interface]: ethernet } },
    { sortKeys: false, lineWidth: -1 }
  );
}

function renderUserData(
  spec: CloneSpec,
  bundle: Omit<ProvisioningBundle, 'userData' | 'metaData' | 'networkConfig'>
): string {
  const { credentials } = bundle;
  const passwordLogin = credentials.password !== undefined;

  const user: Record<string, unknown> = {
    name: credentials.username,
    groups: 'sudo,adm',
    sudo: 'ALL=(ALL) NOPASSWD:ALL',
    shell: '/bin/bash',
    lock_passwd: !passwordLogin,
  };
  if (credentials.sshPublicKey !== undefined) {
    user['ssh_authorized_keys'] = [credentials.sshPublicKey];
  }

  const config: Record<string, unknown> = {
    hostname: spec.vm.name,
    manage_etc_hosts: true,
    users: [user],
    ssh_pwauth: passwordLogin,
  };

  if (credentials.password !== undefined) {
    config['chpasswd'] = {
      expire: credentials.expire,
      users: [
        { name: credentials.username, password: credentials.password.reveal(), type: 'text' },
      ],
    };
  }

  const packages = bundle.packages.includes(GUEST_AGENT_PACKAGE)
    ? bundle.packages
    : [...bundle.packages, GUEST_AGENT_PACKAGE];
  config['package_update'] = true;
  config['packages'] = packages;

  if (bundle.mounts.length > 0) {
    config['mounts'] = bundle.mounts.map((mount) => [
      mount.tag,
      mount.guestPath,
      '9p',
      'trans=virtio,version=9p2000.L,rw,nofail',
      '0',
      '0',
    ]);
  }

  config['runcmd'] = [GUEST_AGENT_PACKAGE, ...bundle.services].map((service) => [
    'systemctl',
    'enable',
    '--now',
    service,
  ]);

  return `#cloud-config\n${yaml.dump(config, { sortKeys: false, lineWidth: -1, noRefs: true })}`;
}

/**
 * Check that every mounted host path exists and is readable.
 *
 * @throws ValidationError naming the first unusable path
 */
export async function validateMounts(spec: CloneSpec): Promise<void> {
  for (const mount of spec.mounts) {
    try {
      await access(mount.hostPath, constants.R_OK);
    } catch (error) {
      throw new ValidationError(
        `Host path ${mount.hostPath} for VM '${spec.vm.name}' is not readable: ${describeError(error)}`,
        'mounts',
        'Create the directory, fix its permissions, or remove it from .clonebox.yaml.'
      );
    }
  }
}

/**
 * Compiles CloneSpecs into provisioning bundles.
 */
export class ProvisioningRenderer {
  /** Keypairs generated for VMs rendered without one, by VM name */
  private readonly keyPairs = new Map<string, SshKeyPair>();

  /**
   * Render the bundle for a spec.
   *
   * In ssh-key mode a VM rendered without `options.keyPair` gets one
   * keypair, generated on its first render and reused after that.
   */
  render(spec: CloneSpec, options: RenderOptions = {}): ProvisioningBundle {
    const username = options.username ?? DEFAULT_GUEST_USER;
    const comment = `${username}@${spec.vm.name}`;
    const keyPair =
      spec.auth.method === 'ssh-key' ? options.keyPair ?? this.keyPairFor(spec.vm.name, comment) : undefined;
    const network: NetworkDeclaration = {
      mode: resolveNetworkMode(spec.vm.network, spec.vm.session),
      interface: 'eth0',
    };

    const base = {
      vmName: spec.vm.name,
      packages: [...spec.packages],
      services: [...spec.services],
      mounts: spec.mounts.map((mount) => ({
        tag: mountTag(mount.hostPath),
        guestPath: mount.guestPath,
        hostPath: mount.hostPath,
      })),
      network,
      credentials: createCredentials(spec.auth, { username, comment, keyPair }),
    };

    return {
      ...base,
      userData: new Secret(renderUserData(spec, base)),
      metaData: `instance-id: ${spec.vm.name}\nlocal-hostname: ${spec.vm.name}\n`,
      networkConfig: renderNetworkConfig(network),
    };
  }

  private keyPairFor(vmName: string, comment: string): SshKeyPair {
    let keyPair = this.keyPairs.get(vmName);
    if (keyPair === undefined) {
      keyPair = generateSshKeyPair(comment);
      this.keyPairs.set(vmName, keyPair);
    }
    return keyPair;
  }
}
