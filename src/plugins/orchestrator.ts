/**
 * Plugin Orchestrator
 *
 * Creates, starts and stops plugin instances through the registry, and runs
 * the health-monitor loop that restarts unhealthy instances.
 *
 * Instance ids are the definition id, or definitionId:deviceId when the
 * start context carries a device. Starting an id that is already Running
 * is a no-op that reports success; an id with a start or restart in flight
 * hands back that launch's result. Stopped and Error instances are started
 * again in place.
 *
 * Monitor tick, per Running instance:
 *   - skip while a start or restart of the instance is in flight
 *   - skip if checked less than its interval ago (definition or global)
 *   - checkHealth(); healthy -> done
 *   - unhealthy: count it; restartPolicy Never -> done
 *   - skip if restarted less than restartBackoffSeconds ago
 *   - stop + start with the context the instance was started with
 * One instance failing never stops the rest of the tick.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { getLogger, errorMessage } from '../logger';
import type { AgentMetrics } from '../metrics';
import { PluginRegistry } from './plugin-registry';
import { ProcessPlugin } from './process-plugin';
import { ScriptPlugin } from './script-plugin';
import {
  DEFAULT_HEALTH_CHECK_TIMEOUT_SECONDS,
  instanceIdFor,
} from './types';
import type {
  Plugin,
  PluginContext,
  PluginDefinition,
  PluginState,
  PluginType,
} from './types';

const log = getLogger('PluginOrchestrator');

export type PluginFactory = (instanceId: string, definition: PluginDefinition) => Plugin;

/** Start/stop surface used by device triggers */
export interface PluginLifecycle {
  startInstance(definitionId: string, context: PluginContext): Promise<boolean>;
  stopInstance(instanceId: string): Promise<boolean>;
}

export interface MonitorConfig {
  intervalSeconds: number;
  restartBackoffSeconds: number;
}

export const DEFAULT_MONITOR: MonitorConfig = {
  intervalSeconds: 10,
  restartBackoffSeconds: 5,
};

export interface PluginOrchestratorOptions {
  metrics?: AgentMetrics;
  createPlugin?: PluginFactory;
  /** Milliseconds since epoch; injectable for throttle tests */
  clock?: () => number;
  /** Health probe timeout when neither the definition nor the context sets one */
  healthCheckTimeoutSeconds?: number;
}

export interface StartEnabledOptions {
  /** Also start definitions that have a device trigger (default true) */
  includeTriggered?: boolean;
}

export interface InstanceStatus {
  id: string;
  definitionId: string;
  type: PluginType;
  state: PluginState;
}

/** Build a worker for a definition by its type tag */
export function createPlugin(instanceId: string, definition: PluginDefinition): Plugin {
  switch (definition.type) {
    case 'script':
      return new ScriptPlugin(instanceId, definition);
    case 'process':
    default:
      return new ProcessPlugin(instanceId, definition);
  }
}

export class PluginOrchestrator implements PluginLifecycle {
  readonly registry: PluginRegistry;

  private metrics: AgentMetrics | undefined;
  private factory: PluginFactory;
  private clock: () => number;
  private healthCheckTimeoutSeconds: number;
  private monitorConfig: MonitorConfig = { ...DEFAULT_MONITOR };

  private contexts = new Map<string, PluginContext>();
  private lastHealthCheck = new Map<string, number>();
  private lastRestart = new Map<string, number>();
  private launches = new Map<string, Promise<boolean>>();

  private monitorAbort: AbortController | null = null;
  private monitorLoop: Promise<void> | null = null;

  constructor(registry: PluginRegistry, options: PluginOrchestratorOptions = {}) {
    this.registry = registry;
    this.metrics = options.metrics;
    this.factory = options.createPlugin ?? createPlugin;
    this.clock = options.clock ?? Date.now;
    this.healthCheckTimeoutSeconds = options.healthCheckTimeoutSeconds ?? DEFAULT_HEALTH_CHECK_TIMEOUT_SECONDS;
  }

  get monitoring(): boolean {
    return this.monitorLoop !== null;
  }

  async startInstance(definitionId: string, context: PluginContext): Promise<boolean> {
    const definition = this.registry.getDefinition(definitionId);
    if (!definition) {
      log.warn({ definitionId }, 'Plugin definition not found');
      return false;
    }

    const instanceId = instanceIdFor(definitionId, context);
    const effective: PluginContext = {
      installFolder: context.installFolder,
      variables: { ...context.variables },
      healthCheckTimeoutSeconds: definition.healthCheckTimeoutSeconds
        ?? context.healthCheckTimeoutSeconds
        ?? this.healthCheckTimeoutSeconds,
    };

    const existing = this.registry.getInstance(instanceId);
    if (existing) {
      const inFlight = this.launches.get(instanceId);
      if (inFlight) {
        log.debug({ instanceId }, 'Plugin instance is already starting');
        return inFlight;
      }
      if (existing.state === 'Running' || existing.state === 'Disabled') {
        log.debug({ instanceId, state: existing.state }, 'Plugin instance already started');
        return true;
      }
      log.info({ instanceId, state: existing.state }, 'Starting plugin instance again');
      this.contexts.set(instanceId, effective);
      return this.launch(existing, effective);
    }

    let instance: Plugin;
    try {
      instance = this.factory(instanceId, definition);
    } catch (err) {
      log.error({ instanceId, error: errorMessage(err) }, 'Failed to create plugin instance');
      return false;
    }

    if (!this.registry.registerInstance(instance)) {
      log.debug({ instanceId }, 'Plugin instance registered by a concurrent start');
      return this.launches.get(instanceId) ?? true;
    }
    this.contexts.set(instanceId, effective);
    return this.launch(instance, effective);
  }

  async stopInstance(instanceId: string): Promise<boolean> {
    const instance = this.registry.getInstance(instanceId);
    if (!instance) {
      log.warn({ instanceId }, 'Plugin instance not found');
      return false;
    }

    let stopped = true;
    try {
      await instance.stop();
    } catch (err) {
      stopped = false;
      log.error({ instanceId, error: errorMessage(err) }, 'Failed to stop plugin instance');
    }

    this.registry.removeInstance(instanceId);
    this.forget(instanceId);
    if (stopped) log.info({ instanceId }, 'Plugin instance stopped');
    return stopped;
  }

  /**
   * Start every enabled definition in registration order.
   * Returns how many started.
   */
  async startEnabledDefinitions(context: PluginContext, options: StartEnabledOptions = {}): Promise<number> {
    const includeTriggered = options.includeTriggered ?? true;
    let started = 0;

    for (const definition of this.registry.getDefinitions()) {
      if (!definition.enabled) continue;
      if (!includeTriggered && definition.triggerOn) continue;
      try {
        if (await this.startInstance(definition.id, context)) started++;
      } catch (err) {
        log.error({ definitionId: definition.id, error: errorMessage(err) }, 'Failed to start plugin');
      }
    }

    log.info({ started }, 'Started enabled plugins');
    return started;
  }

  async stopAll(): Promise<void> {
    for (const instance of this.registry.getInstances()) {
      try {
        await this.stopInstance(instance.id);
      } catch (err) {
        log.error({ instanceId: instance.id, error: errorMessage(err) }, 'Failed to stop plugin instance');
      }
    }
  }

  getStatus(): InstanceStatus[] {
    return this.registry.getInstances().map((instance) => ({
      id: instance.id,
      definitionId: instance.definition.id,
      type: instance.type,
      state: instance.state,
    }));
  }

  // --- Health monitor ---

  /** Start the background monitor loop. No-op when it is already running. */
  startMonitoring(config: Partial<MonitorConfig> = {}, signal?: AbortSignal): void {
    if (this.monitorLoop) {
      log.warn('Plugin monitor already running');
      return;
    }
    if (signal?.aborted) return;

    this.monitorConfig = { ...DEFAULT_MONITOR, ...config };
    const controller = new AbortController();
    signal?.addEventListener('abort', () => controller.abort(), { once: true });
    this.monitorAbort = controller;
    this.monitorLoop = this.monitor(controller.signal).catch((err: unknown) => {
      log.error({ error: errorMessage(err) }, 'Plugin monitor loop failed');
    });
  }

  /** Cancel the monitor loop and wait for the in-flight tick to finish */
  async stopMonitoring(): Promise<void> {
    const loop = this.monitorLoop;
    this.monitorAbort?.abort();
    if (loop) await loop;
    this.monitorAbort = null;
    this.monitorLoop = null;
  }

  /** One monitor tick over every Running instance */
  async runHealthChecks(): Promise<void> {
    const now = this.clock();
    for (const instance of this.registry.getInstances()) {
      if (instance.state !== 'Running') continue;
      try {
        await this.checkInstance(instance, now);
      } catch (err) {
        log.error({ instanceId: instance.id, error: errorMessage(err) }, 'Health monitoring failed for instance');
      }
    }
  }

  private async monitor(signal: AbortSignal): Promise<void> {
    const { intervalSeconds, restartBackoffSeconds } = this.monitorConfig;
    log.info({ intervalSeconds, restartBackoffSeconds }, 'Plugin monitor started');

    while (!signal.aborted) {
      try {
        await delay(Math.max(1, intervalSeconds) * 1000, undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
      await this.runHealthChecks();
    }

    log.info('Plugin monitor stopped');
  }

  private async checkInstance(instance: Plugin, now: number): Promise<void> {
    if (this.launches.has(instance.id)) return;
    const definition = instance.definition;
    const intervalSeconds = definition.healthCheckIntervalSeconds !== undefined && definition.healthCheckIntervalSeconds > 0
      ? definition.healthCheckIntervalSeconds
      : this.monitorConfig.intervalSeconds;

    const lastCheck = this.lastHealthCheck.get(instance.id);
    if (lastCheck !== undefined && now - lastCheck < intervalSeconds * 1000) return;
    this.lastHealthCheck.set(instance.id, now);

    let healthy: boolean;
    try {
      healthy = await instance.checkHealth();
    } catch (err) {
      log.warn({ instanceId: instance.id, error: errorMessage(err) }, 'Health check threw');
      healthy = false;
    }
    if (healthy) return;

    this.metrics?.recordPluginUnhealthy(instance.id);
    log.warn({ instanceId: instance.id }, 'Plugin instance unhealthy');

    if (definition.restartPolicy === 'Never') {
      log.info({ instanceId: instance.id }, 'Restart policy is Never, leaving instance as is');
      return;
    }

    const lastRestart = this.lastRestart.get(instance.id);
    const backoffMs = this.monitorConfig.restartBackoffSeconds * 1000;
    if (lastRestart !== undefined && now - lastRestart < backoffMs) {
      log.debug({ instanceId: instance.id, backoffMs }, 'Restart skipped, within backoff window');
      return;
    }
    this.lastRestart.set(instance.id, now);

    await this.restart(instance);
  }

  private async restart(instance: Plugin): Promise<void> {
    const restarted = await this.track(instance.id, async () => {
      try {
        await instance.stop();
      } catch (err) {
        log.warn({ instanceId: instance.id, error: errorMessage(err) }, 'Error stopping unhealthy instance');
      }

      const context = this.contexts.get(instance.id) ?? {
        installFolder: '',
        variables: {},
        healthCheckTimeoutSeconds: this.healthCheckTimeoutSeconds,
      };
      return this.startPlugin(instance, context);
    });
    if (restarted) {
      this.metrics?.recordPluginRestart(instance.id);
      log.info({ instanceId: instance.id }, 'Restarted unhealthy plugin instance');
    } else {
      log.error({ instanceId: instance.id }, 'Failed to restart plugin instance');
    }
  }

  private launch(instance: Plugin, context: PluginContext): Promise<boolean> {
    return this.track(instance.id, () => this.startPlugin(instance, context));
  }

  /** Record a launch as in flight for its instance id until it settles */
  private track(instanceId: string, work: () => Promise<boolean>): Promise<boolean> {
    const running: Promise<boolean> = work().finally(() => {
      if (this.launches.get(instanceId) === running) this.launches.delete(instanceId);
    });
    this.launches.set(instanceId, running);
    return running;
  }

  private async startPlugin(instance: Plugin, context: PluginContext): Promise<boolean> {
    try {
      const started = await instance.start(context);
      if (started) {
        log.info({ instanceId: instance.id, type: instance.type }, 'Plugin instance started');
      } else {
        log.error({ instanceId: instance.id }, 'Plugin instance failed to start');
      }
      return started;
    } catch (err) {
      log.error({ instanceId: instance.id, error: errorMessage(err) }, 'Plugin instance failed to start');
      return false;
    }
  }

  private forget(instanceId: string): void {
    this.contexts.delete(instanceId);
    this.lastHealthCheck.delete(instanceId);
    this.lastRestart.delete(instanceId);
  }
}
