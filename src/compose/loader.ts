/**
 * Compose File Loader
 *
 * Reads `clonebox-compose.yaml`, validates it against the compose schema,
 * loads every member's clone spec and checks the dependency graph before
 * anything is started.
 */

import { dirname } from 'node:path';

import type { CloneSpec, ResourceLimits } from '../config/types.js';
import { loadCloneSpec, loadYamlFile } from '../config/loader.js';
import { validateComposeFile } from '../config/validator.js';
import { ConfigError, ValidationError } from '../core/errors.js';
import { expandPath, getCloneSpecPath } from '../lib/paths.js';
import { topologicalOrder } from './graph.js';

/**
 * One VM of a compose group
 */
export interface ComposeMember {
  /** Key under `vms:` in the compose file */
  name: string;
  specPath: string;
  spec: CloneSpec;
  dependsOn: string[];
}

/**
 * A validated compose group
 */
export interface ComposeGroup {
  name: string;
  path: string;
  allOrNothing: boolean;
  /** In topological order */
  members: ComposeMember[];
}

/**
 * Load and validate a compose file.
 *
 * @param defaults - Resources applied to member specs that name none
 * @throws ConfigError for unreadable or schema-invalid files
 * @throws CycleError for cyclic or dangling dependencies
 * @throws ValidationError if two members resolve to the same VM
 */
export async function loadComposeFile(filePath: string, defaults?: ResourceLimits): Promise<ComposeGroup> {
  const data = await loadYamlFile(filePath);
  const result = validateComposeFile(data);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid compose file: ${filePath}`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the fields listed below.',
      filePath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }
  const file = result.value;

  const graph = new Map<string, string[]>(
    Object.entries(file.vms).map(([name, member]) => [name, member.depends_on ?? []])
  );
  const order = topologicalOrder(graph);

  const baseDir = dirname(filePath);
  const members: ComposeMember[] = [];
  const owners = new Map<string, string>();
  for (const name of order) {
    const entry = file.vms[name];
    if (entry === undefined) continue;
    const specPath = getCloneSpecPath(expandPath(entry.spec, baseDir));
    const { spec } = await loadCloneSpec(specPath, defaults);

    const owner = owners.get(spec.vm.name);
    if (owner !== undefined) {
      throw new ValidationError(
        `Members '${owner}' and '${name}' both define VM '${spec.vm.name}'`,
        `vms.${name}.spec`,
        'Give every member spec its own vm.name.'
      );
    }
    owners.set(spec.vm.name, name);
    members.push({ name, specPath, spec, dependsOn: graph.get(name) ?? [] });
  }

  return {
    name: file.name,
    path: filePath,
    allOrNothing: file.all_or_nothing ?? false,
    members,
  };
}
