/**
 * Dependency Graph Builder
 *
 * Converts the candidate set into a validated dependency graph.
 * Validation is all-or-nothing: unresolved references and cycles throw,
 * no partial graph is ever returned.
 */

import { CyclicDependencyError, UnresolvedDependencyError } from '../engine/errors.js';
import { compareMigrationUnits } from '../migrations/unit.js';
import type { MigrationUnit } from '../types/migration.js';

/**
 * Dependency graph node
 */
export interface MigrationNode {
  unit: MigrationUnit;
  /** Direct dependencies (migrations this one requires) */
  dependencies: string[];
  /** Dependents (migrations that require this one) */
  dependents: string[];
}

/**
 * Validated, acyclic dependency graph.
 * Node iteration order is the canonical (orderKey, id) order.
 */
export interface MigrationGraph {
  nodes: ReadonlyMap<string, MigrationNode>;
}

/**
 * Build and validate the dependency graph.
 *
 * @throws {UnresolvedDependencyError} A dependency names an undiscovered unit
 * @throws {CyclicDependencyError} The dependencies form a cycle
 */
export function buildMigrationGraph(candidates: readonly MigrationUnit[]): MigrationGraph {
  const ordered = [...candidates].sort(compareMigrationUnits);
  const nodes = new Map<string, MigrationNode>();

  for (const unit of ordered) {
    nodes.set(unit.id, {
      unit,
      dependencies: Array.from(new Set(unit.dependencies)),
      dependents: [],
    });
  }

  // Reverse edges; fail on the first unknown reference
  for (const [id, node] of nodes) {
    for (const depId of node.dependencies) {
      const depNode = nodes.get(depId);
      if (!depNode) {
        throw new UnresolvedDependencyError(id, depId);
      }
      depNode.dependents.push(id);
    }
  }

  const cycle = findCycle(nodes);
  if (cycle) {
    throw new CyclicDependencyError(cycle);
  }

  return { nodes };
}

/**
 * Depth-first cycle search tracking visiting/visited sets.
 *
 * @returns The first cycle found, closed (first id repeated at the end), or null
 */
export function findCycle(nodes: ReadonlyMap<string, Pick<MigrationNode, 'dependencies'>>): string[] | null {
  const visited = new Set<string>();
  const visiting = new Set<string>();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    if (visited.has(id)) {
      return null;
    }

    if (visiting.has(id)) {
      const cycleStart = path.indexOf(id);
      return path.slice(cycleStart).concat(id);
    }

    visiting.add(id);
    path.push(id);

    const node = nodes.get(id);
    if (node) {
      for (const depId of node.dependencies) {
        const cycle = visit(depId);
        if (cycle) {
          return cycle;
        }
      }
    }

    path.pop();
    visiting.delete(id);
    visited.add(id);
    return null;
  };

  for (const id of nodes.keys()) {
    const cycle = visit(id);
    if (cycle) {
      return cycle;
    }
  }

  return null;
}

/**
 * Transitive dependencies of `id`, including `id` itself
 */
export function dependencyClosure(graph: MigrationGraph, id: string): Set<string> {
  const closure = new Set<string>();
  const stack = [id];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || closure.has(current)) continue;
    closure.add(current);

    const node = graph.nodes.get(current);
    if (node) {
      stack.push(...node.dependencies);
    }
  }

  return closure;
}
