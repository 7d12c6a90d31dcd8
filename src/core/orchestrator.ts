/**
 * Orchestrator facade
 *
 * One entry point over the planner and the coordinator: drops disabled
 * nodes, fetches remote manifests, plans, then applies or destroys. With a
 * state file, prior state is loaded before the run and saved after it.
 */

import { type OrchestratorConfig, type OrchestratorConfigOverrides, resolveConfig } from './config/index.js';
import { DependencyResolver, selectEnabled } from './dependencies/index.js';
import { ApplyCoordinator, type ApplyResult } from './deployment/index.js';
import { getComponentLogger } from './logging/index.js';
import { attachManifests, HttpManifestFetcher } from './manifests/index.js';
import { loadStateFile, saveStateFile, StateStore } from './state/index.js';
import type { ManifestFetcher, ResourceBackend } from './types/backend.js';
import type { ApplyOptions } from './types/events.js';
import type { ApplyPlan } from './types/plan.js';
import type { ProviderBindingDefinition } from './types/provider.js';
import type { ResourceNode } from './types/resource.js';

export interface OrchestratorOptions {
  /** Cloud resource API */
  cloud: ResourceBackend;
  bindings?: readonly ProviderBindingDefinition[] | undefined;
  /** Overrides on top of defaults and STRATA_* variables */
  config?: OrchestratorConfigOverrides | undefined;
  manifestFetcher?: ManifestFetcher | undefined;
  /** JSON file holding tracked state between runs */
  stateFile?: string | undefined;
}

export interface RunOptions extends ApplyOptions {
  /** Prior state; takes precedence over the state file */
  state?: StateStore | undefined;
}

export class Orchestrator {
  readonly config: OrchestratorConfig;
  private readonly resolver = new DependencyResolver();
  private readonly coordinator: ApplyCoordinator;
  private readonly fetcher: ManifestFetcher;
  private readonly bindings: readonly ProviderBindingDefinition[];
  private readonly logger = getComponentLogger('orchestrator');

  constructor(private readonly options: OrchestratorOptions) {
    this.config = resolveConfig(options.config);
    this.bindings = options.bindings ?? [];
    this.fetcher = options.manifestFetcher ?? new HttpManifestFetcher({ timeoutMs: this.config.backendCallTimeoutMs });
    this.coordinator = new ApplyCoordinator({
      cloud: options.cloud,
      bindings: this.bindings,
      config: this.config,
    });
  }

  /**
   * Enabled nodes with their remote manifests attached
   */
  async prepare(nodes: readonly ResourceNode[]): Promise<ResourceNode[]> {
    return attachManifests(selectEnabled(nodes), this.fetcher);
  }

  async plan(nodes: readonly ResourceNode[]): Promise<ApplyPlan> {
    const prepared = await this.prepare(nodes);
    return this.resolver.plan(prepared, { bindings: this.bindings });
  }

  /**
   * Destroy plans work from recorded inputs, so no manifest is fetched
   */
  planDestroy(nodes: readonly ResourceNode[]): ApplyPlan {
    return this.resolver.planDestroy(selectEnabled(nodes), { bindings: this.bindings });
  }

  async apply(nodes: readonly ResourceNode[], options: RunOptions = {}): Promise<ApplyResult> {
    const plan = await this.plan(nodes);
    const store = await this.loadState(options);
    this.logger.info('Applying', { nodes: plan.order.length, promoted: plan.promoted });
    return this.persist(await this.coordinator.apply(plan, store, options));
  }

  async destroy(nodes: readonly ResourceNode[], options: RunOptions = {}): Promise<ApplyResult> {
    const plan = this.planDestroy(nodes);
    const store = await this.loadState(options);
    this.logger.info('Destroying', { nodes: plan.order.length });
    return this.persist(await this.coordinator.destroy(plan, store, options));
  }

  private async loadState(options: RunOptions): Promise<StateStore> {
    if (options.state) {
      return options.state;
    }
    return this.options.stateFile ? loadStateFile(this.options.stateFile) : new StateStore();
  }

  private async persist(result: ApplyResult): Promise<ApplyResult> {
    if (this.options.stateFile) {
      await saveStateFile(this.options.stateFile, result.state);
      this.logger.debug('State saved', { path: this.options.stateFile, records: result.state.size });
    }
    return result;
  }
}
