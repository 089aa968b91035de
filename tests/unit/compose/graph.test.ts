/**
 * Unit tests for the compose dependency graph
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { topologicalOrder, transitiveDependencies, transitiveDependents } from '../../../src/compose/graph.js';
import { CycleError } from '../../../src/core/errors.js';

function graph(entries: Record<string, string[]>): Map<string, string[]> {
  return new Map(Object.entries(entries));
}

describe('topologicalOrder', () => {
  it('should put dependencies before their dependents', () => {
    const order = topologicalOrder(graph({ web: ['api'], api: ['db', 'cache'], db: [], cache: [] }));

    assert.deepStrictEqual(order, ['cache', 'db', 'api', 'web']);
  });

  it('should break ties by name so the order is stable', () => {
    assert.deepStrictEqual(topologicalOrder(graph({ zeta: [], alpha: [], mid: [] })), ['alpha', 'mid', 'zeta']);
  });

  it('should tolerate a dependency listed twice', () => {
    assert.deepStrictEqual(topologicalOrder(graph({ web: ['db', 'db'], db: [] })), ['db', 'web']);
  });

  it('should name every member of a cycle', () => {
    assert.throws(
      () => topologicalOrder(graph({ a: ['b'], b: ['c'], c: ['a'], free: [] })),
      (error: unknown) =>
        error instanceof CycleError &&
        error.message === 'Dependency cycle among: a, b, c' &&
        error.members.join() === 'a,b,c'
    );
  });

  it('should reject self-dependencies', () => {
    assert.throws(() => topologicalOrder(graph({ a: ['a'] })), CycleError);
  });

  it('should reject unknown dependencies', () => {
    assert.throws(
      () => topologicalOrder(graph({ web: ['db', 'queue'] })),
      (error: unknown) =>
        error instanceof CycleError && error.message === "Member 'web' depends on unknown member(s): db, queue"
    );
  });
});

describe('transitiveDependents', () => {
  it('should follow dependents through every level', () => {
    const deps = graph({ db: [], api: ['db'], web: ['api'], worker: ['db'], docs: [] });

    assert.deepStrictEqual([...transitiveDependents(deps, 'db')].sort(), ['api', 'web', 'worker']);
    assert.deepStrictEqual([...transitiveDependents(deps, 'docs')], []);
  });
});

describe('transitiveDependencies', () => {
  it('should follow dependencies through every level once', () => {
    const deps = graph({ db: [], cache: [], api: ['db', 'cache'], web: ['api', 'db'], docs: [] });

    assert.deepStrictEqual([...transitiveDependencies(deps, 'web')].sort(), ['api', 'cache', 'db']);
    assert.deepStrictEqual([...transitiveDependencies(deps, 'docs')], []);
  });
});
