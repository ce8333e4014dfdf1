/**
 * Device Listener
 *
 * Polls the device sources and diffs each one against the registry's
 * connected devices of the same platform.
 *
 *   new device   start a session (when enabled), publish SessionStarted or
 *                SessionFailed, then DeviceConnected
 *   gone device  stop its session, publish SessionStopped, then
 *                DeviceDisconnected
 *
 * The registry itself is updated by the bus subscriber in registry-updater.
 * A source that fails is logged and skipped for that poll.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { getLogger, errorMessage } from '../logger';
import type { EventBus } from '../events';
import type { AgentMetrics } from '../metrics';
import type { DeviceRegistry } from './device-registry';
import type { DetectedDevice, DeviceSource } from './device-sources';
import type { AppiumSession, Device } from './types';

const log = getLogger('DeviceListener');

/** Session operations the listener drives */
export interface DeviceSessions {
  startSession(device: Device): Promise<AppiumSession | null>;
  stopSession(device: Device): Promise<boolean>;
  stopAll(): Promise<void>;
}

export interface DeviceListenerConfig {
  pollIntervalSeconds: number;
  autoStartSessions: boolean;
}

export const DEFAULT_LISTENER: DeviceListenerConfig = {
  pollIntervalSeconds: 5,
  autoStartSessions: true,
};

export interface DeviceListenerOptions extends Partial<DeviceListenerConfig> {
  sources: DeviceSource[];
  sessions?: DeviceSessions;
  metrics?: AgentMetrics;
  now?: () => Date;
}

export class DeviceListener {
  private bus: EventBus;
  private registry: DeviceRegistry;
  private sources: DeviceSource[];
  private sessions: DeviceSessions | undefined;
  private metrics: AgentMetrics | undefined;
  private config: DeviceListenerConfig;
  private now: () => Date;
  private failingSources = new Set<string>();

  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(bus: EventBus, registry: DeviceRegistry, options: DeviceListenerOptions) {
    this.bus = bus;
    this.registry = registry;
    this.sources = options.sources;
    this.sessions = options.sessions;
    this.metrics = options.metrics;
    this.now = options.now ?? (() => new Date());
    this.config = {
      pollIntervalSeconds: options.pollIntervalSeconds ?? DEFAULT_LISTENER.pollIntervalSeconds,
      autoStartSessions: options.autoStartSessions ?? DEFAULT_LISTENER.autoStartSessions,
    };
  }

  get running(): boolean {
    return this.loop !== null;
  }

  /** Poll every source once and publish the differences */
  async poll(): Promise<void> {
    for (const source of this.sources) {
      let detected: DetectedDevice[];
      try {
        detected = await source.listDevices();
        if (this.failingSources.delete(source.name)) {
          log.info({ source: source.name }, 'Device source recovered');
        }
      } catch (err) {
        if (!this.failingSources.has(source.name)) {
          log.warn({ source: source.name, error: errorMessage(err) }, 'Device source failed');
          this.failingSources.add(source.name);
        }
        continue;
      }

      const known = this.registry.getConnected().filter((d) => d.platform === source.platform);
      const knownIds = new Set(known.map((d) => d.id));
      const detectedIds = new Set(detected.map((d) => d.id));

      for (const device of detected) {
        if (!knownIds.has(device.id)) await this.handleConnected(device);
      }
      for (const device of known) {
        if (!detectedIds.has(device.id)) await this.handleDisconnected(device);
      }
    }
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.abort = controller;
    this.loop = this.run(controller.signal).catch((err: unknown) => {
      log.error({ error: errorMessage(err) }, 'Device listener loop failed');
    });
  }

  /** Stop polling, then stop every session */
  async stop(): Promise<void> {
    const loop = this.loop;
    this.abort?.abort();
    if (loop) await loop;
    this.abort = null;
    this.loop = null;
    if (this.sessions) {
      await this.sessions.stopAll();
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    log.info(
      { sources: this.sources.map((s) => s.name), intervalSeconds: this.config.pollIntervalSeconds },
      'Device listener started',
    );
    while (!signal.aborted) {
      await this.poll();
      try {
        await delay(Math.max(1, this.config.pollIntervalSeconds) * 1000, undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
    }
    log.info('Device listener stopped');
  }

  private async handleConnected(detected: DetectedDevice): Promise<void> {
    const timestamp = this.now().toISOString();
    const device: Device = {
      ...detected,
      state: 'Connected',
      connectedAt: timestamp,
      lastSeen: timestamp,
    };
    this.metrics?.recordDeviceConnected(device.platform);
    log.info({ deviceId: device.id, platform: device.platform, name: device.name }, 'Device connected');

    if (this.config.autoStartSessions && this.sessions) {
      const session = await this.sessions.startSession(device);
      if (session) {
        device.appiumSession = session;
        this.bus.publish('SessionStarted', { device, session });
      } else {
        this.bus.publish('SessionFailed', { device, reason: 'Session could not be started' });
      }
    }

    this.bus.publish('DeviceConnected', { device });
  }

  private async handleDisconnected(device: Device): Promise<void> {
    this.metrics?.recordDeviceDisconnected(device.platform);
    log.info({ deviceId: device.id, platform: device.platform }, 'Device disconnected');

    const session = device.appiumSession;
    if (this.sessions && (await this.sessions.stopSession(device)) && session) {
      this.bus.publish('SessionStopped', { device, session: { ...session, status: 'Stopped' } });
    }

    const timestamp = this.now().toISOString();
    const { appiumSession: _session, ...rest } = device;
    this.bus.publish('DeviceDisconnected', {
      device: { ...rest, state: 'Disconnected', disconnectedAt: timestamp, lastSeen: timestamp },
    });
  }
}
