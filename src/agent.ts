/**
 * DeviceAgent
 *
 * Composition root. Builds the event bus, port allocator, device registry,
 * session manager, plugin registry, orchestrator, device trigger and device
 * listener from one AgentConfig and wires them together.
 *
 * start():  load registry -> autosave -> register plugins -> attach bus
 *           subscribers -> start untriggered plugins -> monitor -> listener
 * stop():   the reverse, then a final registry save
 */

import { EventBus } from './events';
import { AgentMetrics } from './metrics';
import type { MetricsSnapshot } from './metrics';
import { getLogger } from './logger';
import type { AgentConfig } from './config';
import { PortAllocator } from './ports/port-allocator';
import type { PortProbe } from './ports/port-allocator';
import { DeviceRegistry } from './devices/device-registry';
import { DeviceListener } from './devices/device-listener';
import { bindRegistryToBus } from './devices/registry-updater';
import { AdbDeviceSource, IosDeviceSource } from './devices/device-sources';
import type { DeviceSource } from './devices/device-sources';
import { SessionManager } from './sessions/session-manager';
import type { SessionSpawner } from './sessions/session-manager';
import { DeviceEventTrigger, PluginOrchestrator, PluginRegistry } from './plugins';
import type { PluginContext, PluginFactory } from './plugins';

const log = getLogger('Agent');

/** Collaborators that tests and embedders may replace */
export interface AgentDeps {
  sources?: DeviceSource[];
  sessionSpawner?: SessionSpawner;
  portProbe?: PortProbe;
  createPlugin?: PluginFactory;
}

export interface AgentStatus {
  healthy: boolean;
  connectedDevices: number;
  activeSessions: number;
  runningPlugins: number;
  componentStatus: Record<string, boolean>;
  uptimeMs: number;
  metrics: MetricsSnapshot;
}

export class DeviceAgent {
  readonly config: AgentConfig;
  readonly bus: EventBus;
  readonly metrics: AgentMetrics;
  readonly ports: PortAllocator;
  readonly devices: DeviceRegistry;
  readonly sessions: SessionManager;
  readonly plugins: PluginRegistry;
  readonly orchestrator: PluginOrchestrator;
  readonly trigger: DeviceEventTrigger;
  readonly listener: DeviceListener;

  private unbindRegistry: (() => void) | null = null;
  private startedAt = 0;
  private running = false;

  constructor(config: AgentConfig, deps: AgentDeps = {}) {
    this.config = config;
    this.bus = new EventBus();
    this.metrics = new AgentMetrics();
    this.ports = new PortAllocator(config.portRange, { probe: deps.portProbe });
    this.devices = new DeviceRegistry(config.deviceRegistry);
    this.sessions = new SessionManager(this.ports, {
      installFolder: config.installFolder,
      server: config.session,
      metrics: this.metrics,
      spawner: deps.sessionSpawner,
    });
    this.plugins = new PluginRegistry();
    this.orchestrator = new PluginOrchestrator(this.plugins, {
      metrics: this.metrics,
      createPlugin: deps.createPlugin,
      healthCheckTimeoutSeconds: config.monitor.healthCheckTimeoutSeconds,
    });
    this.trigger = new DeviceEventTrigger(this.bus, this.plugins, this.orchestrator, config.installFolder);
    this.listener = new DeviceListener(this.bus, this.devices, {
      sources: deps.sources ?? this.defaultSources(),
      sessions: this.sessions,
      metrics: this.metrics,
      pollIntervalSeconds: config.listener.pollIntervalSeconds,
      autoStartSessions: config.listener.autoStartSessions,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.startedAt = Date.now();

    await this.devices.load();
    this.devices.startAutoSave();

    for (const definition of this.config.plugins) {
      this.plugins.registerDefinition(definition);
    }

    this.unbindRegistry = bindRegistryToBus(this.bus, this.devices);
    this.trigger.attach();

    await this.orchestrator.startEnabledDefinitions(this.baseContext(), { includeTriggered: false });
    this.orchestrator.startMonitoring({
      intervalSeconds: this.config.monitor.intervalSeconds,
      restartBackoffSeconds: this.config.monitor.restartBackoffSeconds,
    });

    if (this.config.listener.enabled) {
      this.listener.start();
    }

    log.info(
      {
        installFolder: this.config.installFolder,
        plugins: this.config.plugins.length,
        ports: `${this.config.portRange.start}-${this.config.portRange.end}`,
      },
      'Device agent started',
    );
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    await this.orchestrator.stopMonitoring();
    await this.listener.stop();
    await this.bus.idle();
    this.trigger.detach();
    this.unbindRegistry?.();
    this.unbindRegistry = null;

    await this.orchestrator.stopAll();
    await this.sessions.stopAll();
    await this.devices.dispose();

    log.info({ metrics: this.metrics.summary() }, 'Device agent stopped');
  }

  getStatus(): AgentStatus {
    const instances = this.orchestrator.getStatus();
    const componentStatus: Record<string, boolean> = {
      agent: this.running,
      pluginMonitor: this.orchestrator.monitoring,
      deviceListener: !this.config.listener.enabled || this.listener.running,
      plugins: instances.every((i) => i.state !== 'Error'),
    };
    return {
      healthy: Object.values(componentStatus).every(Boolean),
      connectedDevices: this.devices.getConnected().length,
      activeSessions: this.sessions.activeCount,
      runningPlugins: instances.filter((i) => i.state === 'Running').length,
      componentStatus,
      uptimeMs: this.running ? Date.now() - this.startedAt : 0,
      metrics: this.metrics.snapshot(),
    };
  }

  private baseContext(): PluginContext {
    return { installFolder: this.config.installFolder, variables: {} };
  }

  private defaultSources(): DeviceSource[] {
    const sources: DeviceSource[] = [];
    if (this.config.listener.android) sources.push(new AdbDeviceSource(undefined, this.config.listener.adbPath));
    if (this.config.listener.ios) sources.push(new IosDeviceSource());
    return sources;
  }
}
