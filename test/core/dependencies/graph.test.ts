import { describe, expect, it } from 'vitest';
import { CycleDetectedError } from '../../../src/core/errors.js';
import { DependencyGraph } from '../../../src/core/dependencies/index.js';
import { testNode } from '../../utils/fake-backends.js';

function graphOf(edges: Record<string, string[]>): DependencyGraph {
  const graph = new DependencyGraph();
  for (const id of Object.keys(edges)) {
    graph.addNode(id, testNode(id));
  }
  for (const [id, dependencies] of Object.entries(edges)) {
    for (const dependency of dependencies) {
      graph.addEdge(id, dependency);
    }
  }
  return graph;
}

describe('DependencyGraph', () => {
  it('should reject duplicate nodes and edges to unknown nodes', () => {
    const graph = graphOf({ a: [] });
    expect(() => graph.addNode('a', testNode('a'))).toThrow("Node with id 'a' already exists in dependency graph");
    expect(() => graph.addEdge('a', 'missing')).toThrow("Dependency node 'missing' not found in graph");
    expect(() => graph.addEdge('missing', 'a')).toThrow("Dependent node 'missing' not found in graph");
  });

  it('should order dependencies first with ids as the tie-break', () => {
    const graph = graphOf({ c: [], b: ['c'], a: [], d: ['a', 'b'] });
    expect(graph.getTopologicalOrder()).toEqual(['a', 'c', 'b', 'd']);
  });

  it('should let a rank reorder nodes that are ready together', () => {
    const graph = graphOf({ a: [], b: [], c: [] });
    expect(graph.getTopologicalOrder((id) => (id === 'c' ? 0 : 1))).toEqual(['c', 'a', 'b']);
  });

  it('should report a cycle with its path', () => {
    const graph = graphOf({ a: ['b'], b: ['c'], c: ['a'], d: [] });
    expect(graph.findCycles()).toEqual([['a', 'b', 'c']]);

    let caught: unknown;
    try {
      graph.getTopologicalOrder();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CycleDetectedError);
    if (caught instanceof CycleDetectedError) {
      expect(caught.message).toBe('Circular dependency detected: a -> b -> c -> a');
      expect(caught.cycle).toEqual(['a', 'b', 'c']);
      expect(caught.code).toBe('CYCLE_DETECTED');
    }
  });

  it('should keep only internal edges in a subgraph', () => {
    const graph = graphOf({ vpc: [], subnet: ['vpc'], cluster: ['subnet'] });
    const subgraph = graph.getSubgraph(['subnet', 'cluster']);
    expect(subgraph.size).toBe(2);
    expect(subgraph.getDependencies('subnet')).toEqual([]);
    expect(subgraph.getDependencies('cluster')).toEqual(['subnet']);
  });
});
