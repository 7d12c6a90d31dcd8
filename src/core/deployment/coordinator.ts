/**
 * Two-Phase Apply Coordinator
 *
 * Runs the infrastructure stage to completion, resolves provider bindings
 * from the outputs it recorded, then runs the application stage. Failures
 * are node scoped: dependents of a failed node are blocked, everything else
 * continues, and the run ends with a report instead of a rollback.
 */

import { resolveConfig, type OrchestratorConfig } from '../config/index.js';
import { errorCodeOf, ValidationError } from '../errors.js';
import { getRunLogger, type StrataLogger } from '../logging/index.js';
import { ReferenceResolver } from '../references/index.js';
import { StateStore } from '../state/index.js';
import type { ResourceBackend } from '../types/backend.js';
import type {
  ApplyEvent,
  ApplyOptions,
  BlockedNode,
  NodeFailure,
  ReconcileAction,
  RunReport,
} from '../types/events.js';
import type { ApplyPlan, PlanOperation, PlanStep, StagePlan } from '../types/plan.js';
import type { ProviderBindingDefinition } from '../types/provider.js';
import { DeletionPolicy } from '../types/resource.js';
import { ProviderBindingRegistry } from './bindings.js';
import { ReconciliationExecutor } from './executor.js';
import { runSteps } from './scheduler.js';

export interface CoordinatorOptions {
  /** Cloud resource API; serves every node without a provider binding */
  cloud: ResourceBackend;
  bindings?: readonly ProviderBindingDefinition[] | undefined;
  config?: OrchestratorConfig | undefined;
}

export interface ApplyResult {
  state: StateStore;
  report: RunReport;
}

interface RunContext {
  runId: string;
  operation: PlanOperation;
  plan: ApplyPlan;
  store: StateStore;
  registry: ProviderBindingRegistry;
  executor: ReconciliationExecutor;
  options: ApplyOptions;
  logger: StrataLogger;
  completed: string[];
  failures: NodeFailure[];
  blocked: BlockedNode[];
  notStarted: string[];
  actions: Record<string, ReconcileAction>;
  /** Failed or blocked ids, across stages */
  unavailable: Set<string>;
}

export class ApplyCoordinator {
  private readonly config: OrchestratorConfig;
  private readonly cloud: ResourceBackend;
  private readonly bindings: readonly ProviderBindingDefinition[];

  constructor(options: CoordinatorOptions) {
    this.cloud = options.cloud;
    this.bindings = options.bindings ?? [];
    this.config = options.config ?? resolveConfig();
  }

  /**
   * Apply a plan on top of prior state. The store passed in is updated in
   * place and returned.
   */
  async apply(
    plan: ApplyPlan,
    store: StateStore = new StateStore(),
    options: ApplyOptions = {}
  ): Promise<ApplyResult> {
    if (plan.operation !== 'apply') {
      throw new ValidationError('apply() needs an apply plan', 'plan', 'operation', [
        'Use destroy() for destroy plans',
      ]);
    }
    return this.run(plan, store, options);
  }

  /**
   * Tear down everything a destroy plan names
   */
  async destroy(plan: ApplyPlan, store: StateStore, options: ApplyOptions = {}): Promise<ApplyResult> {
    if (plan.operation !== 'destroy') {
      throw new ValidationError('destroy() needs a destroy plan', 'plan', 'operation', [
        'Plan with DependencyResolver.planDestroy()',
      ]);
    }
    return this.run(plan, store, options);
  }

  private async run(plan: ApplyPlan, store: StateStore, options: ApplyOptions): Promise<ApplyResult> {
    const runId = this.generateRunId();
    const startTime = Date.now();
    const emit = (event: ApplyEvent): void => {
      options.onEvent?.(event);
    };

    const ctx: RunContext = {
      runId,
      operation: plan.operation,
      plan,
      store,
      registry: new ProviderBindingRegistry(this.bindings),
      executor: new ReconciliationExecutor(store, this.config, emit),
      options,
      logger: getRunLogger(runId, { operation: plan.operation }),
      completed: [],
      failures: [],
      blocked: [],
      notStarted: [],
      actions: {},
      unavailable: new Set(),
    };

    ctx.logger.info('Run started', { nodes: plan.order.length, concurrency: this.config.concurrency });
    this.emit(ctx, {
      type: 'started',
      message: `Starting ${plan.operation} of ${plan.order.length} nodes`,
      timestamp: new Date(),
    });

    this.warnAboutOrphans(ctx);

    if (plan.operation === 'destroy') {
      // Bindings must come from state recorded before anything is torn down
      await this.resolveBindings(ctx, ctx.registry.names());
    }

    for (const stagePlan of plan.stages) {
      if (options.signal?.aborted) {
        ctx.notStarted.push(...stagePlan.steps.map((step) => step.node.id));
        continue;
      }
      await this.runStage(ctx, stagePlan);
    }

    const report = this.buildReport(ctx, Date.now() - startTime);
    if (report.status === 'converged') {
      ctx.logger.info('Run converged', { durationMs: report.durationMs });
      this.emit(ctx, {
        type: 'completed',
        message: `${plan.operation} converged: ${report.completedNodeIds.length} nodes`,
        timestamp: new Date(),
      });
    } else if (report.aborted) {
      ctx.logger.warn('Run aborted', { notStarted: report.notStarted });
      this.emit(ctx, {
        type: 'aborted',
        message: `${plan.operation} aborted; ${report.notStarted.length} nodes not started`,
        timestamp: new Date(),
      });
    } else {
      ctx.logger.warn('Run finished with failures', {
        failed: report.failures.map((failure) => failure.nodeId),
        blocked: report.blocked.map((entry) => entry.nodeId),
      });
      this.emit(ctx, {
        type: 'completed',
        message: `${plan.operation} finished with ${report.failures.length} failed and ${report.blocked.length} blocked nodes`,
        timestamp: new Date(),
        error: report.cause,
      });
    }

    return { state: store, report };
  }

  private async runStage(ctx: RunContext, stagePlan: StagePlan): Promise<void> {
    const { stage, steps } = stagePlan;
    const stageLogger = ctx.logger.child({ stage });
    this.emit(ctx, {
      type: 'stage-started',
      stage,
      message: `Stage ${stage}: ${steps.length} nodes`,
      timestamp: new Date(),
    });

    if (ctx.operation === 'apply') {
      const needed = new Set<string>();
      for (const step of steps) {
        if (step.node.provider !== undefined) {
          needed.add(step.node.provider);
        }
      }
      await this.resolveBindings(ctx, Array.from(needed).sort());
    }

    const result = await runSteps(steps, {
      concurrency: this.config.concurrency,
      signal: ctx.options.signal,
      blockedReason: (step) => this.blockedReason(ctx, step),
      execute: async (step) => {
        await this.executeStep(ctx, step);
      },
      onFailed: (step, error) => {
        ctx.unavailable.add(step.node.id);
        ctx.failures.push({
          nodeId: step.node.id,
          kind: step.node.kind,
          code: errorCodeOf(error),
          message: error.message,
          error,
        });
        stageLogger.error('Node failed', error, { nodeId: step.node.id, kind: step.node.kind });
        this.emit(ctx, {
          type: 'failed',
          nodeId: step.node.id,
          stage,
          message: error.message,
          timestamp: new Date(),
          error,
        });
      },
      onBlocked: (step, reason) => {
        ctx.unavailable.add(step.node.id);
        stageLogger.warn('Node blocked', { nodeId: step.node.id, reason });
        this.emit(ctx, {
          type: 'blocked',
          nodeId: step.node.id,
          stage,
          message: reason,
          timestamp: new Date(),
        });
      },
    });

    ctx.completed.push(...result.completed);
    ctx.blocked.push(...result.blocked);
    ctx.notStarted.push(...result.notStarted);

    stageLogger.info('Stage finished', {
      completed: result.completed.length,
      failed: result.failed.size,
      blocked: result.blocked.length,
      notStarted: result.notStarted.length,
    });
    this.emit(ctx, {
      type: 'stage-completed',
      stage,
      message: `Stage ${stage} finished: ${result.completed.length} completed, ${result.failed.size} failed`,
      timestamp: new Date(),
    });
  }

  private async executeStep(ctx: RunContext, step: PlanStep): Promise<void> {
    const { node } = step;
    const backend =
      node.provider !== undefined ? ctx.registry.backendFor(node.provider) : this.cloud;

    if (ctx.operation === 'destroy') {
      const result = await ctx.executor.destroy(node, backend);
      ctx.actions[node.id] = result.action;
      this.emit(ctx, {
        type: result.action === 'destroyed' ? 'node-destroyed' : 'node-skipped',
        nodeId: node.id,
        stage: node.stage,
        message: `${node.kind} '${node.id}' ${result.action}`,
        timestamp: new Date(),
      });
      return;
    }

    if (!backend) {
      // blockedReason keeps this from happening; a binding cannot unresolve mid-stage
      throw new ValidationError(
        `No backend for '${node.id}': provider binding '${node.provider}' is unresolved`,
        node.id,
        'provider'
      );
    }

    const inputs = ReferenceResolver.fromSnapshot(ctx.store.snapshot()).resolveInputs(node);
    const result = await ctx.executor.reconcile(node, inputs, backend);
    ctx.actions[node.id] = result.action;
    this.emit(ctx, {
      type: result.action === 'unchanged' ? 'node-skipped' : 'node-ready',
      nodeId: node.id,
      stage: node.stage,
      message: `${node.kind} '${node.id}' ${result.action}`,
      timestamp: new Date(),
    });
  }

  /**
   * Why a step must not start: something it waits for in an earlier stage
   * did not complete, or the binding it needs is unresolved
   */
  private blockedReason(ctx: RunContext, step: PlanStep): string | undefined {
    const upstream = step.waitsFor.find((id) => ctx.unavailable.has(id));
    if (upstream !== undefined) {
      return ctx.operation === 'apply'
        ? `dependency '${upstream}' did not complete`
        : `dependent '${upstream}' was not destroyed`;
    }

    const { node } = step;
    if (node.provider === undefined) {
      return undefined;
    }
    const status = ctx.registry.status(node.provider);
    if (status?.state === 'resolved') {
      return undefined;
    }
    if (ctx.operation === 'destroy') {
      const record = ctx.store.get(node.id);
      const needsBackend =
        record?.backendId !== undefined && node.deletionPolicy === DeletionPolicy.Standard;
      if (!needsBackend) {
        return undefined;
      }
    }

    const detail = status?.error
      ? `connect failed: ${status.error.message}`
      : `missing ${status?.missing.join(', ') || 'source outputs'}`;
    return `provider binding '${node.provider}' is unresolved (${detail})`;
  }

  private async resolveBindings(ctx: RunContext, names: readonly string[]): Promise<void> {
    if (names.length === 0) return;
    const snapshot = ctx.store.snapshot();
    for (const name of names) {
      const status = await ctx.registry.resolve(name, snapshot);
      if (status.state === 'resolved') {
        this.emit(ctx, {
          type: 'binding-resolved',
          message: `Provider binding '${name}' resolved from ${status.sources?.join(', ') ?? 'state'}`,
          timestamp: new Date(),
        });
      } else {
        this.emit(ctx, {
          type: 'binding-unresolved',
          message: `Provider binding '${name}' unresolved: ${
            status.error ? status.error.message : `missing ${status.missing.join(', ')}`
          }`,
          timestamp: new Date(),
          error: status.error,
        });
      }
    }
  }

  /**
   * Tracked nodes the plan no longer names are left alone
   */
  private warnAboutOrphans(ctx: RunContext): void {
    const planned = new Set(ctx.plan.order);
    const orphans = ctx.store.ids().filter((id) => !planned.has(id));
    if (orphans.length > 0) {
      ctx.logger.warn('State tracks nodes the plan does not name; leaving them untouched', { orphans });
    }
  }

  private buildReport(ctx: RunContext, durationMs: number): RunReport {
    const base = {
      runId: ctx.runId,
      operation: ctx.operation,
      completedNodeIds: ctx.plan.order.filter((id) => ctx.completed.includes(id)),
      actions: ctx.actions,
      durationMs,
    };

    if (ctx.failures.length === 0 && ctx.blocked.length === 0 && ctx.notStarted.length === 0) {
      return { ...base, status: 'converged' };
    }

    const position = (id: string): number => ctx.plan.order.indexOf(id);
    const failures = [...ctx.failures].sort((a, b) => position(a.nodeId) - position(b.nodeId));
    const first = failures[0];

    return {
      ...base,
      status: 'partial-failure',
      failedNodeId: first?.nodeId,
      cause: first?.error,
      failures,
      blocked: [...ctx.blocked].sort((a, b) => position(a.nodeId) - position(b.nodeId)),
      notStarted: ctx.plan.order.filter((id) => ctx.notStarted.includes(id)),
      aborted: ctx.options.signal?.aborted ?? false,
    };
  }

  private emit(ctx: RunContext, event: ApplyEvent): void {
    ctx.options.onEvent?.(event);
  }

  private generateRunId(): string {
    return `run-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;
  }
}
