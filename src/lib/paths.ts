/**
 * Path Utilities
 *
 * Provides path expansion and the well-known locations used by clonebox:
 * clone spec files, backing stores, the audit log and profile directories.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';

import type { SessionScope } from '../config/types.js';

/**
 * File name of a clone spec inside a project directory.
 */
export const CLONE_SPEC_FILENAME = '.clonebox.yaml';

/**
 * Default compose file name.
 */
export const COMPOSE_FILENAME = 'clonebox-compose.yaml';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  // Make relative paths absolute relative to the base directory
  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Resolve the clone spec path for a file or project directory argument.
 *
 * @param target - Either a spec file or a directory containing .clonebox.yaml
 */
export function getCloneSpecPath(target: string): string {
  const absolute = resolve(target);
  if (absolute.endsWith('.yaml') || absolute.endsWith('.yml')) {
    return absolute;
  }
  return join(absolute, CLONE_SPEC_FILENAME);
}

/**
 * Resolve the compose file path for a file or directory argument.
 */
export function getComposePath(target: string): string {
  const absolute = resolve(target);
  if (absolute.endsWith('.yaml') || absolute.endsWith('.yml')) {
    return absolute;
  }
  return join(absolute, COMPOSE_FILENAME);
}

/**
 * Get the default backing-store root for a session scope.
 *
 * User-session VMs live under the user's data directory; system-session
 * VMs share the system-wide libvirt area.
 */
export function getDefaultStoreRoot(session: SessionScope): string {
  if (session === 'system') {
    return '/var/lib/clonebox/vms';
  }
  return join(homedir(), '.local', 'share', 'clonebox', 'vms');
}

/**
 * Get the default audit log path.
 */
export function getDefaultAuditPath(): string {
  return join(homedir(), '.local', 'share', 'clonebox', 'audit.jsonl');
}

/**
 * Get the libvirt connection URI for a session scope.
 */
export function getConnectionUri(session: SessionScope): string {
  return session === 'system' ? 'qemu:///system' : 'qemu:///session';
}

/**
 * libvirt URI for a remote host given as a URI, `host`, `user@host` or
 * `user@host:port`. Bare hosts get the system session over SSH.
 */
export function getRemoteUri(target: string): string {
  if (target.includes('://')) {
    return target;
  }
  const at = target.lastIndexOf('@');
  const user = at >= 0 ? target.slice(0, at) : '';
  const hostPort = at >= 0 ? target.slice(at + 1) : target;
  return `qemu+ssh://${user ? `${user}@` : ''}${hostPort}/system`;
}

/**
 * Directories searched for named profiles, in lookup order.
 *
 * @param cwd - Working directory of the clone
 */
export function getProfileSearchDirs(cwd: string): string[] {
  return [join(homedir(), '.clonebox.d'), join(cwd, '.clonebox.d')];
}

/**
 * Check whether `ancestor` is a strict ancestor directory of `descendant`.
 *
 * Both paths must already be absolute and normalized.
 */
export function isStrictAncestor(ancestor: string, descendant: string): boolean {
  if (ancestor === descendant) {
    return false;
  }
  const rel = relative(ancestor, descendant);
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * First segment of an absolute guest path ("/app/sub" -> "/app").
 */
export function getMountRoot(guestPath: string): string {
  const [first] = guestPath.split('/').filter((segment) => segment.length > 0);
  return first === undefined ? '/' : `/${first}`;
}

/**
 * Number of non-empty segments in a path.
 */
export function getPathDepth(path: string): number {
  return path.split('/').filter((segment) => segment.length > 0).length;
}
