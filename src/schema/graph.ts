/**
 * Validation dependency graph, topological ordering and cycle discovery.
 *
 * @packageDocumentation
 */

import type { AnyPropertyDefinition } from './definition.js';

/**
 * Transient adjacency structure over property names.
 */
export interface DependencyGraph {
  /** Property names in registration order. */
  readonly nodes: readonly string[];
  /** name → names it depends on (restricted to known nodes). */
  readonly dependencies: ReadonlyMap<string, ReadonlySet<string>>;
  /** name → names depending on it, in registration order. */
  readonly dependents: ReadonlyMap<string, readonly string[]>;
}

/**
 * Builds the graph from definitions in registration order. Dependency names
 * that are not defined are ignored.
 *
 * @param definitions - Registered definitions.
 * @returns The graph.
 */
export function buildDependencyGraph(
  definitions: readonly AnyPropertyDefinition[]
): DependencyGraph {
  const nodes = definitions.map((definition) => definition.name);
  const known = new Set(nodes);
  const dependencies = new Map<string, ReadonlySet<string>>();
  const dependents = new Map<string, string[]>(nodes.map((name) => [name, []]));

  for (const definition of definitions) {
    const edges = new Set(
      [...definition.dependsOnForValidation].filter((name) => known.has(name))
    );
    dependencies.set(definition.name, edges);
    for (const dependency of edges) {
      dependents.get(dependency)?.push(definition.name);
    }
  }

  return { nodes, dependencies, dependents };
}

/**
 * Outcome of {@link topologicalSort}.
 */
export interface TopologicalSortResult {
  /** Nodes in dependency order. */
  readonly order: readonly string[];
  /** Nodes that could not be ordered because they lie on or behind a cycle. */
  readonly unresolved: readonly string[];
}

/**
 * Orders the graph with Kahn's algorithm.
 *
 * Among nodes whose dependencies are all processed, the one with the lowest
 * priority value goes first; ties keep registration order.
 *
 * @param graph - The graph.
 * @param priority - Priority of a node (lower first).
 * @returns The order and any unresolved nodes.
 */
export function topologicalSort(
  graph: DependencyGraph,
  priority: (name: string) => number = () => 0
): TopologicalSortResult {
  const position = new Map(graph.nodes.map((name, index) => [name, index]));
  const rank = (name: string): [number, number] => [priority(name), position.get(name) ?? 0];
  const before = (a: string, b: string): number => {
    const [pa, ia] = rank(a);
    const [pb, ib] = rank(b);
    return pa !== pb ? pa - pb : ia - ib;
  };

  const inDegree = new Map<string, number>();
  for (const name of graph.nodes) {
    inDegree.set(name, graph.dependencies.get(name)?.size ?? 0);
  }

  const ready = graph.nodes.filter((name) => inDegree.get(name) === 0);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort(before);
    const next = ready.shift();
    if (next === undefined) {
      break;
    }
    order.push(next);
    for (const dependent of graph.dependents.get(next) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) {
        ready.push(dependent);
      }
    }
  }

  const processed = new Set(order);
  return {
    order,
    unresolved: graph.nodes.filter((name) => !processed.has(name)),
  };
}

/**
 * Finds one cycle among unresolved nodes by following dependency edges until
 * a node repeats.
 *
 * @param graph - The graph.
 * @param unresolved - Nodes left over by {@link topologicalSort}.
 * @returns The cycle with its first node repeated at the end, or an empty
 * list when no node is unresolved.
 */
export function findCycle(graph: DependencyGraph, unresolved: readonly string[]): string[] {
  const candidates = new Set(unresolved);
  const path: string[] = [];
  const seenAt = new Map<string, number>();
  let current = unresolved[0];

  while (current !== undefined) {
    const start = seenAt.get(current);
    if (start !== undefined) {
      return [...path.slice(start), current];
    }
    seenAt.set(current, path.length);
    path.push(current);
    current = [...(graph.dependencies.get(current) ?? [])].find((name) => candidates.has(name));
  }
  return [];
}
