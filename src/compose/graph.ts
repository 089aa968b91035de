/**
 * Compose dependency graph.
 */

import { CycleError } from '../core/errors.js';
import { compareStrings } from '../lib/collections.js';

/**
 * Member name -> names it depends on
 */
export type DependencyMap = ReadonlyMap<string, readonly string[]>;

/**
 * Topological order (dependencies first). Ties are broken by name so the
 * order is stable for a given graph.
 *
 * @throws CycleError on a cycle or a dependency on an unknown member
 */
export function topologicalOrder(graph: DependencyMap): string[] {
  for (const [member, deps] of graph) {
    const unknown = deps.filter((dep) => !graph.has(dep));
    if (unknown.length > 0) {
      throw new CycleError(
        `Member '${member}' depends on unknown member(s): ${unknown.join(', ')}`,
        [member, ...unknown]
      );
    }
  }

  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const [member, deps] of graph) {
    remaining.set(member, new Set(deps).size);
    for (const dep of new Set(deps)) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), member]);
    }
  }

  const ready = [...remaining].filter(([, count]) => count === 0).map(([member]) => member);
  const order: string[] = [];
  while (ready.length > 0) {
    ready.sort(compareStrings);
    const member = ready.shift();
    if (member === undefined) break;
    order.push(member);
    for (const dependent of dependents.get(member) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) {
        ready.push(dependent);
      }
    }
  }

  if (order.length < graph.size) {
    const members = [...remaining]
      .filter(([, count]) => count > 0)
      .map(([member]) => member)
      .sort(compareStrings);
    throw new CycleError(`Dependency cycle among: ${members.join(', ')}`, members);
  }
  return order;
}

/**
 * Every member that transitively depends on `member`.
 */
export function transitiveDependents(graph: DependencyMap, member: string): Set<string> {
  const found = new Set<string>();
  const queue = [member];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const [candidate, deps] of graph) {
      if (deps.includes(current) && !found.has(candidate)) {
        found.add(candidate);
        queue.push(candidate);
      }
    }
  }
  return found;
}

/**
 * Every member `member` transitively depends on.
 */
export function transitiveDependencies(graph: DependencyMap, member: string): Set<string> {
  const found = new Set<string>();
  const queue = [...(graph.get(member) ?? [])];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || found.has(current)) continue;
    found.add(current);
    queue.push(...(graph.get(current) ?? []));
  }
  return found;
}
