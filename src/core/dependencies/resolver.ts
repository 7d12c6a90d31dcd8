/**
 * Dependency Resolver / Planner
 *
 * Builds the dependency graph from `dependsOn`, embedded output references and
 * provider bindings, orders it, and splits the order into the two apply
 * stages. Nodes whose provider binding can only be resolved from outputs of
 * their own stage move to the start of the next stage.
 */

import {
  UnresolvableReferenceError,
  ValidationError,
  suggestSimilarIds,
} from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import type { ApplyPlan, BindingPlan, PlanOperation, PlanStep, StagePlan } from '../types/plan.js';
import type { ProviderBindingDefinition } from '../types/provider.js';
import { ResourceKind, STAGE_ORDER, type ResourceNode, type Stage } from '../types/resource.js';
import { DependencyGraph } from './graph.js';
import { collectReferences } from './type-guards.js';

export interface PlanOptions {
  bindings?: readonly ProviderBindingDefinition[] | undefined;
}

interface GraphAnalysis {
  graph: DependencyGraph;
  stageOf: Map<string, Stage>;
  promoted: Set<string>;
  bindings: BindingPlan[];
}

const GRANT_PRINCIPAL_KINDS: readonly ResourceKind[] = [
  ResourceKind.DatabaseUser,
  ResourceKind.ServiceIdentity,
  ResourceKind.WorkloadServiceAccount,
];

const GRANT_TARGET_KINDS: readonly ResourceKind[] = [
  ResourceKind.Database,
  ResourceKind.DatabaseInstance,
];

function stageIndex(stage: Stage): number {
  return STAGE_ORDER.indexOf(stage);
}

export class DependencyResolver {
  private logger = getComponentLogger('dependency-resolver');

  /**
   * Build a dependency graph from a collection of nodes
   */
  buildDependencyGraph(
    nodes: readonly ResourceNode[],
    bindings: readonly ProviderBindingDefinition[] = []
  ): DependencyGraph {
    const graph = new DependencyGraph();

    for (const node of nodes) {
      if (!node.id) {
        throw new ValidationError(`A ${node.kind} node has an empty id`, node.kind, 'id');
      }
      if (graph.hasNode(node.id)) {
        throw new ValidationError(
          `Node id '${node.id}' is declared more than once`,
          node.id,
          'id',
          ['Give every node a unique id']
        );
      }
      graph.addNode(node.id, node);
    }

    const bindingsByName = new Map(bindings.map((binding) => [binding.name, binding]));
    const nodeIds = graph.getNodeIds();

    const addEdge = (node: ResourceNode, target: string, via: string): void => {
      if (!graph.hasNode(target)) {
        const similar = suggestSimilarIds(target, nodeIds);
        throw new UnresolvableReferenceError(
          `Node '${node.id}' ${via} '${target}', which is not in the resource graph`,
          node.id,
          target,
          similar.length > 0
            ? [`Did you mean one of these nodes? ${similar.join(', ')}`]
            : ['Check whether the node was disabled by configuration']
        );
      }
      graph.addEdge(node.id, target);
    };

    for (const node of nodes) {
      for (const dependencyId of node.dependsOn) {
        addEdge(node, dependencyId, 'depends on');
      }

      for (const ref of collectReferences(node.inputs)) {
        addEdge(node, ref.nodeId, `references output '${ref.attribute}' of`);
      }

      if (node.provider !== undefined) {
        const binding = bindingsByName.get(node.provider);
        if (!binding) {
          throw new UnresolvableReferenceError(
            `Node '${node.id}' uses provider binding '${node.provider}', which is not defined`,
            node.id,
            node.provider,
            [`Defined bindings: ${Array.from(bindingsByName.keys()).sort().join(', ') || 'none'}`]
          );
        }
        for (const ref of Object.values(binding.inputs)) {
          addEdge(node, ref.nodeId, `needs provider binding '${binding.name}' sourced from`);
        }
      }
    }

    this.logger.debug('Dependency graph built', { nodes: graph.size });
    return graph;
  }

  /**
   * Plan an apply: dependencies first, infrastructure stage first
   */
  plan(nodes: readonly ResourceNode[], options: PlanOptions = {}): ApplyPlan {
    return this.buildPlan(nodes, options, 'apply');
  }

  /**
   * Plan a destroy: dependents first, application stage first
   */
  planDestroy(nodes: readonly ResourceNode[], options: PlanOptions = {}): ApplyPlan {
    return this.buildPlan(nodes, options, 'destroy');
  }

  private buildPlan(
    nodes: readonly ResourceNode[],
    options: PlanOptions,
    operation: PlanOperation
  ): ApplyPlan {
    const analysis = this.analyze(nodes, options.bindings ?? []);
    const { graph, stageOf, promoted } = analysis;

    const stages: StagePlan[] = [];
    for (const stage of STAGE_ORDER) {
      const members = graph.getNodeIds().filter((id) => stageOf.get(id) === stage);
      const order = graph
        .getSubgraph(members)
        .getTopologicalOrder((id) => (promoted.has(id) ? 0 : 1));

      const steps: PlanStep[] = [];
      for (const id of order) {
        const entry = graph.getNode(id);
        if (!entry) continue;
        steps.push({
          node: entry.resource,
          operation,
          waitsFor: operation === 'apply' ? graph.getDependencies(id) : graph.getDependents(id),
        });
      }
      stages.push({ stage, steps });
    }

    const ordered =
      operation === 'apply'
        ? stages
        : stages
            .slice()
            .reverse()
            .map((stagePlan) => ({ stage: stagePlan.stage, steps: stagePlan.steps.slice().reverse() }));

    const plan: ApplyPlan = {
      operation,
      stages: ordered,
      order: ordered.flatMap((stagePlan) => stagePlan.steps.map((step) => step.node.id)),
      promoted: Array.from(promoted).sort(),
      bindings: analysis.bindings,
    };

    this.logger.debug('Plan computed', {
      operation,
      nodes: plan.order.length,
      promoted: plan.promoted,
      stages: ordered.map((stagePlan) => `${stagePlan.stage}:${stagePlan.steps.length}`),
    });

    return plan;
  }

  private analyze(
    nodes: readonly ResourceNode[],
    bindings: readonly ProviderBindingDefinition[]
  ): GraphAnalysis {
    const graph = this.buildDependencyGraph(nodes, bindings);

    // Cycle detection happens here, before any stage reasoning
    const order = graph.getTopologicalOrder();

    const bindingsByName = new Map(bindings.map((binding) => [binding.name, binding]));
    const stageOf = new Map<string, Stage>();
    const promoted = new Set<string>();

    for (const id of order) {
      const entry = graph.getNode(id);
      if (!entry) continue;
      const node = entry.resource;
      let stage = node.stage;

      const binding = node.provider !== undefined ? bindingsByName.get(node.provider) : undefined;
      if (binding) {
        const sourceIds = Array.from(new Set(Object.values(binding.inputs).map((ref) => ref.nodeId)));
        const latestSource = Math.max(
          -1,
          ...sourceIds.map((sourceId) => stageIndex(stageOf.get(sourceId) ?? node.stage))
        );

        if (latestSource >= stageIndex(stage)) {
          const next = STAGE_ORDER[latestSource + 1];
          if (next === undefined) {
            const blocking = sourceIds.find((sourceId) => stageIndex(stageOf.get(sourceId) ?? stage) === latestSource);
            throw new UnresolvableReferenceError(
              `Provider binding '${binding.name}' used by '${node.id}' is sourced from '${blocking}', which is applied in the last stage; no later stage can resolve it`,
              node.id,
              blocking ?? binding.name,
              [
                `Move '${blocking}' to an earlier stage`,
                'Or apply in two runs: create the binding sources first, then re-run',
              ]
            );
          }
          this.logger.debug('Node promoted across stage boundary', {
            nodeId: node.id,
            from: stage,
            to: next,
            binding: binding.name,
          });
          stage = next;
          promoted.add(node.id);
        }
      }

      stageOf.set(id, stage);
    }

    for (const id of order) {
      const nodeStage = stageOf.get(id);
      if (nodeStage === undefined) continue;
      for (const dependencyId of graph.getDependencies(id)) {
        const dependencyStage = stageOf.get(dependencyId);
        if (dependencyStage !== undefined && stageIndex(dependencyStage) > stageIndex(nodeStage)) {
          throw new UnresolvableReferenceError(
            `Node '${id}' (${nodeStage} stage) depends on '${dependencyId}', which is applied later in the ${dependencyStage} stage`,
            id,
            dependencyId,
            [`Move '${id}' to the ${dependencyStage} stage`, `Or remove its dependency on '${dependencyId}'`]
          );
        }
      }
    }

    this.validateGrants(graph);

    const bindingPlans: BindingPlan[] = bindings.map((binding) => ({
      name: binding.name,
      sources: Array.from(new Set(Object.values(binding.inputs).map((ref) => ref.nodeId))).sort(),
      consumers: nodes
        .filter((node) => node.provider === binding.name)
        .map((node) => node.id)
        .sort(),
    }));

    return { graph, stageOf, promoted, bindings: bindingPlans };
  }

  /**
   * A grant edge is only valid between a principal and a target it waits for
   */
  private validateGrants(graph: DependencyGraph): void {
    for (const id of graph.getNodeIds()) {
      const entry = graph.getNode(id);
      if (!entry || entry.resource.kind !== ResourceKind.DatabaseGrant) continue;

      const dependencyKinds = graph
        .getDependencies(id)
        .map((dependencyId) => graph.getNode(dependencyId)?.resource.kind);

      if (!dependencyKinds.some((kind) => kind !== undefined && GRANT_PRINCIPAL_KINDS.includes(kind))) {
        throw new ValidationError(
          `Grant '${id}' does not depend on a principal (${GRANT_PRINCIPAL_KINDS.join(', ')})`,
          id,
          'principal',
          ['Reference the principal node in the grant inputs']
        );
      }
      if (!dependencyKinds.some((kind) => kind !== undefined && GRANT_TARGET_KINDS.includes(kind))) {
        throw new ValidationError(
          `Grant '${id}' does not depend on a target (${GRANT_TARGET_KINDS.join(', ')})`,
          id,
          'target',
          ['Reference the target database node in the grant inputs']
        );
      }
    }
  }
}
