import { describe, it, expect } from 'vitest';
import { PropertyTypes } from '../converter/registry.js';
import { defineProperty } from './definition.js';
import type { AnyPropertyDefinition } from './definition.js';
import { buildDependencyGraph, findCycle, topologicalSort } from './graph.js';

function node(name: string, ...dependsOn: string[]): AnyPropertyDefinition {
  return defineProperty(PropertyTypes.STRING)
    .name(name)
    .dependsOnForValidation(...dependsOn)
    .build();
}

describe('dependency graph', () => {
  it('should index dependencies and dependents', () => {
    const graph = buildDependencyGraph([node('a'), node('b', 'a'), node('c', 'a', 'ghost')]);

    expect(graph.nodes).toEqual(['a', 'b', 'c']);
    expect([...(graph.dependencies.get('c') ?? [])]).toEqual(['a']);
    expect(graph.dependents.get('a')).toEqual(['b', 'c']);
  });

  it('should order a chain after its dependencies', () => {
    const graph = buildDependencyGraph([node('c', 'b'), node('b', 'a'), node('a')]);
    expect(topologicalSort(graph)).toEqual({ order: ['a', 'b', 'c'], unresolved: [] });
  });

  it('should order a diamond', () => {
    const graph = buildDependencyGraph([
      node('d', 'b', 'c'),
      node('b', 'a'),
      node('c', 'a'),
      node('a'),
    ]);
    expect(topologicalSort(graph).order).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should use the priority among ready nodes', () => {
    const graph = buildDependencyGraph([node('x'), node('y'), node('z')]);
    const priorities = new Map([
      ['x', 2],
      ['y', 1],
      ['z', 1],
    ]);
    expect(topologicalSort(graph, (name) => priorities.get(name) ?? 0).order).toEqual([
      'y',
      'z',
      'x',
    ]);
  });

  it('should leave cycle members unresolved', () => {
    const graph = buildDependencyGraph([node('a', 'b'), node('b', 'a'), node('c')]);
    expect(topologicalSort(graph)).toEqual({ order: ['c'], unresolved: ['a', 'b'] });
  });

  describe('findCycle', () => {
    it('should report a self-loop', () => {
      const graph = buildDependencyGraph([node('a', 'a')]);
      expect(findCycle(graph, ['a'])).toEqual(['a', 'a']);
    });

    it('should report a two-node cycle', () => {
      const graph = buildDependencyGraph([node('a', 'b'), node('b', 'a')]);
      expect(findCycle(graph, ['a', 'b'])).toEqual(['a', 'b', 'a']);
    });

    it('should skip nodes that only lead into a cycle', () => {
      const graph = buildDependencyGraph([node('entry', 'x'), node('x', 'y'), node('y', 'x')]);
      const { unresolved } = topologicalSort(graph);
      expect(findCycle(graph, unresolved)).toEqual(['x', 'y', 'x']);
    });

    it('should return nothing without unresolved nodes', () => {
      expect(findCycle(buildDependencyGraph([node('a')]), [])).toEqual([]);
    });
  });
});
