/**
 * Dependency Grapher - Order passes so that referenced types sync first
 *
 * Dependencies are declared by each entity definition's references; adding a
 * type only requires declaring what it references.
 */

import { DependencyCycleError } from "../errors.js";

import type { EntityDefinition, EntityType } from "../types/index.js";

export interface DependencyNode<T extends string = string> {
  type: T;
  dependsOn: readonly T[];
}

/**
 * Types an entity definition depends on, in first-reference order
 */
export function dependenciesOf(definition: EntityDefinition): EntityType[] {
  const targets: EntityType[] = [];
  for (const reference of definition.references) {
    if (
      reference.target !== definition.type &&
      !targets.includes(reference.target)
    ) {
      targets.push(reference.target);
    }
  }
  return targets;
}

export function toDependencyNodes(
  definitions: readonly EntityDefinition[]
): DependencyNode<EntityType>[] {
  return definitions.map((definition) => ({
    type: definition.type,
    dependsOn: dependenciesOf(definition),
  }));
}

/**
 * Topological order of the nodes (Kahn's algorithm).
 *
 * Among nodes that are ready at the same time, declaration order wins, so the
 * result is stable for a given input.
 *
 * @throws DependencyCycleError on an unknown dependency or a cycle
 */
export function orderByDependencies<T extends string, N extends DependencyNode<T>>(
  nodes: readonly N[]
): N[] {
  const byType = new Map<T, N>();
  for (const node of nodes) {
    byType.set(node.type, node);
  }

  for (const node of nodes) {
    for (const dependency of node.dependsOn) {
      if (!byType.has(dependency)) {
        throw new DependencyCycleError(
          `${node.type} depends on unknown type ${dependency}`,
          [node.type, dependency]
        );
      }
    }
  }

  const remaining = new Map<T, number>();
  for (const node of nodes) {
    remaining.set(node.type, new Set(node.dependsOn).size);
  }

  const ordered: N[] = [];
  const placed = new Set<T>();

  while (ordered.length < nodes.length) {
    const next = nodes.find(
      (node) => !placed.has(node.type) && remaining.get(node.type) === 0
    );

    if (next === undefined) {
      const stuck = nodes
        .filter((node) => !placed.has(node.type))
        .map((node) => node.type);
      throw new DependencyCycleError(
        `Dependency cycle between ${stuck.join(", ")}`,
        stuck
      );
    }

    ordered.push(next);
    placed.add(next.type);

    for (const node of nodes) {
      if (!placed.has(node.type) && node.dependsOn.includes(next.type)) {
        remaining.set(node.type, (remaining.get(node.type) ?? 0) - 1);
      }
    }
  }

  return ordered;
}

/**
 * Order entity definitions for a run
 */
export function orderDefinitions(
  definitions: readonly EntityDefinition[]
): EntityDefinition[] {
  const nodes = toDependencyNodes(definitions);
  const ordered = orderByDependencies(nodes);
  const byType = new Map(definitions.map((d) => [d.type, d]));

  return ordered.flatMap((node) => {
    const definition = byType.get(node.type);
    return definition !== undefined ? [definition] : [];
  });
}

/**
 * Every type that depends on `type`, directly or transitively
 */
export function dependentsOf<T extends string>(
  type: T,
  nodes: readonly DependencyNode<T>[]
): Set<T> {
  const dependents = new Set<T>();
  const queue: T[] = [type];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    for (const node of nodes) {
      if (node.dependsOn.includes(current) && !dependents.has(node.type)) {
        dependents.add(node.type);
        queue.push(node.type);
      }
    }
  }

  return dependents;
}
