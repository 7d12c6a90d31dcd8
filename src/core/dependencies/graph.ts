/**
 * Dependency Graph Data Structure
 *
 * Directed edges run from a dependent node to the node it depends on.
 * Topological order is deterministic: among nodes that are free at the same
 * time, the one with the lowest sort key (node id by default) goes first.
 */

import { CycleDetectedError } from '../errors.js';
import type { ResourceNode } from '../types/resource.js';

export interface DependencyNode {
  id: string;
  resource: ResourceNode;
  dependencies: Set<string>;
  dependents: Set<string>;
}

/**
 * Sort key for ready nodes; compared as [rank, id]
 */
export type OrderRank = (id: string) => number;

export class DependencyGraph {
  private nodes = new Map<string, DependencyNode>();

  addNode(id: string, resource: ResourceNode): void {
    if (this.nodes.has(id)) {
      throw new Error(`Node with id '${id}' already exists in dependency graph`);
    }

    this.nodes.set(id, {
      id,
      resource,
      dependencies: new Set(),
      dependents: new Set(),
    });
  }

  /**
   * Add a dependency edge from dependent to dependency
   * @param dependentId - The node that depends on another
   * @param dependencyId - The node being depended upon
   */
  addEdge(dependentId: string, dependencyId: string): void {
    const dependent = this.nodes.get(dependentId);
    const dependency = this.nodes.get(dependencyId);

    if (!dependent) {
      throw new Error(`Dependent node '${dependentId}' not found in graph`);
    }
    if (!dependency) {
      throw new Error(`Dependency node '${dependencyId}' not found in graph`);
    }

    dependent.dependencies.add(dependencyId);
    dependency.dependents.add(dependentId);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): DependencyNode | undefined {
    return this.nodes.get(id);
  }

  getNodeIds(): string[] {
    return Array.from(this.nodes.keys());
  }

  get size(): number {
    return this.nodes.size;
  }

  getDependencies(id: string): string[] {
    const node = this.nodes.get(id);
    return node ? Array.from(node.dependencies).sort() : [];
  }

  getDependents(id: string): string[] {
    const node = this.nodes.get(id);
    return node ? Array.from(node.dependents).sort() : [];
  }

  /**
   * Find cycles with a DFS and a recursion-guard set
   */
  findCycles(): string[][] {
    const visited = new Set<string>();
    const recursionStack = new Set<string>();
    const cycles: string[][] = [];

    const dfs = (nodeId: string, path: string[]): void => {
      if (recursionStack.has(nodeId)) {
        const cycleStart = path.indexOf(nodeId);
        cycles.push(path.slice(cycleStart));
        return;
      }

      if (visited.has(nodeId)) {
        return;
      }

      visited.add(nodeId);
      recursionStack.add(nodeId);
      path.push(nodeId);

      for (const dependencyId of this.getDependencies(nodeId)) {
        dfs(dependencyId, path);
      }

      recursionStack.delete(nodeId);
      path.pop();
    };

    for (const nodeId of this.getNodeIds().sort()) {
      if (!visited.has(nodeId)) {
        dfs(nodeId, []);
      }
    }

    return cycles;
  }

  /**
   * Kahn's algorithm with a deterministic tie-break
   * Throws CycleDetectedError if cycles are detected
   */
  getTopologicalOrder(rank: OrderRank = () => 0): string[] {
    const inDegree = new Map<string, number>();
    const ready: string[] = [];
    const result: string[] = [];

    const compare = (a: string, b: string): number => {
      const byRank = rank(a) - rank(b);
      if (byRank !== 0) return byRank;
      return a < b ? -1 : a > b ? 1 : 0;
    };

    for (const [nodeId, node] of this.nodes) {
      inDegree.set(nodeId, node.dependencies.size);
      if (node.dependencies.size === 0) {
        ready.push(nodeId);
      }
    }
    ready.sort(compare);

    while (ready.length > 0) {
      const nodeId = ready.shift();
      if (nodeId === undefined) break;
      result.push(nodeId);

      const node = this.nodes.get(nodeId);
      if (!node) continue;

      let released = false;
      for (const dependentId of node.dependents) {
        const currentInDegree = inDegree.get(dependentId);
        if (currentInDegree === undefined) continue;
        const newInDegree = currentInDegree - 1;
        inDegree.set(dependentId, newInDegree);

        if (newInDegree === 0) {
          ready.push(dependentId);
          released = true;
        }
      }
      if (released) {
        ready.sort(compare);
      }
    }

    if (result.length !== this.nodes.size) {
      const cycle = this.findCycles()[0] ?? [];
      throw formatCycleError(cycle);
    }

    return result;
  }

  /**
   * Get a subgraph containing only the specified nodes and their relationships
   */
  getSubgraph(nodeIds: Iterable<string>): DependencyGraph {
    const subgraph = new DependencyGraph();
    const nodeIdSet = new Set(nodeIds);

    for (const nodeId of nodeIdSet) {
      const node = this.nodes.get(nodeId);
      if (node) {
        subgraph.addNode(nodeId, node.resource);
      }
    }

    for (const nodeId of nodeIdSet) {
      const node = this.nodes.get(nodeId);
      if (!node) continue;
      for (const dependencyId of node.dependencies) {
        if (nodeIdSet.has(dependencyId)) {
          subgraph.addEdge(nodeId, dependencyId);
        }
      }
    }

    return subgraph;
  }
}

export function formatCycleError(cycle: string[]): CycleDetectedError {
  const cycleStr = cycle.length > 0 ? `${cycle.join(' -> ')} -> ${cycle[0]}` : 'unknown';
  return new CycleDetectedError(`Circular dependency detected: ${cycleStr}`, cycle);
}
