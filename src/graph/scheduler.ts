/**
 * Scheduler (topological sequencer)
 *
 * Derives deterministic execution orders from a validated graph:
 * - Forward order via Kahn's algorithm with (orderKey, id) tie-break
 * - Target mode restricted to the target's dependency closure
 * - Rollback order as the reverse of the recorded apply order
 */

import { UnknownTargetError } from '../engine/errors.js';
import { compareMigrationUnits } from '../migrations/unit.js';
import type { MigrationUnit } from '../types/migration.js';
import { dependencyClosure, type MigrationGraph } from './builder.js';

/**
 * Topologically order the graph, optionally truncated to a target's closure.
 *
 * @param graph - Validated graph from buildMigrationGraph()
 * @param target - Identity whose transitive dependencies (and itself) bound the order
 * @throws {UnknownTargetError} If the target is not in the graph
 */
export function scheduleMigrations(graph: MigrationGraph, target?: string): string[] {
  let included: Set<string>;

  if (target !== undefined) {
    if (!graph.nodes.has(target)) {
      throw new UnknownTargetError(target);
    }
    included = dependencyClosure(graph, target);
  } else {
    included = new Set(graph.nodes.keys());
  }

  const inDegree = new Map<string, number>();
  const ready: MigrationUnit[] = [];

  for (const id of included) {
    const node = graph.nodes.get(id);
    if (!node) continue;
    const degree = node.dependencies.filter((depId) => included.has(depId)).length;
    inDegree.set(id, degree);
    if (degree === 0) {
      ready.push(node.unit);
    }
  }

  ready.sort(compareMigrationUnits);
  const order: string[] = [];

  while (ready.length > 0) {
    const next = ready.shift();
    if (!next) break;
    order.push(next.id);

    const node = graph.nodes.get(next.id);
    if (!node) continue;

    for (const dependentId of node.dependents) {
      const remaining = inDegree.get(dependentId);
      if (remaining === undefined) continue;

      inDegree.set(dependentId, remaining - 1);
      if (remaining - 1 === 0) {
        const dependent = graph.nodes.get(dependentId);
        if (dependent) {
          insertSorted(ready, dependent.unit);
        }
      }
    }
  }

  // Unreachable for validated graphs; guards against a graph built elsewhere
  if (order.length !== included.size) {
    const stuck = [...included].filter((id) => !order.includes(id));
    throw new Error(`Scheduling stalled; unresolvable migrations: ${stuck.join(', ')}`);
  }

  return order;
}

export interface RollbackOptions {
  /** Revert every applied migration */
  all?: boolean;
}

/**
 * Order in which to undo applied migrations.
 *
 * Always the reverse of the recorded apply order, never recomputed from the
 * graph. Without a target only the most recently applied migration is undone;
 * with a target everything applied after it is undone (the target stays).
 * `all` undoes every applied migration.
 *
 * @param appliedInOrder - Currently applied identities, oldest first
 * @throws {UnknownTargetError} If the target is not currently applied, or is given with `all`
 */
export function rollbackOrder(
  appliedInOrder: readonly string[],
  target?: string,
  options: RollbackOptions = {}
): string[] {
  if (options.all) {
    if (target !== undefined) {
      throw new UnknownTargetError(target, 'cannot be combined with rolling back all migrations');
    }
    return [...appliedInOrder].reverse();
  }

  if (target === undefined) {
    const last = appliedInOrder[appliedInOrder.length - 1];
    return last === undefined ? [] : [last];
  }

  const index = appliedInOrder.indexOf(target);
  if (index === -1) {
    throw new UnknownTargetError(target, 'is not an applied migration');
  }

  return appliedInOrder.slice(index + 1).reverse();
}

function insertSorted(queue: MigrationUnit[], unit: MigrationUnit): void {
  let index = 0;
  while (index < queue.length && compareMigrationUnits(queue[index], unit) <= 0) {
    index++;
  }
  queue.splice(index, 0, unit);
}
