/**
 * Agent Metrics
 *
 * In-process counters for device, session and plugin supervision.
 * Nothing is exported externally; summary() is logged at shutdown and
 * snapshot() feeds the agent status.
 */

import type { DevicePlatform } from './devices/types';

export interface MetricsSnapshot {
  devicesConnected: number;
  devicesDisconnected: number;
  devicesByPlatform: Record<string, number>;   // currently connected
  sessionsStarted: number;
  sessionsStopped: number;
  sessionsFailed: number;
  sessionFailureReasons: Record<string, number>;
  portAllocationFailures: number;
  pluginUnhealthy: Record<string, number>;
  pluginRestarts: Record<string, number>;
}

export class AgentMetrics {
  private devicesConnected = 0;
  private devicesDisconnected = 0;
  private devicesByPlatform = new Map<string, number>();
  private sessionsStarted = 0;
  private sessionsStopped = 0;
  private sessionsFailed = 0;
  private sessionFailureReasons = new Map<string, number>();
  private portAllocationFailures = 0;
  private pluginUnhealthy = new Map<string, number>();
  private pluginRestarts = new Map<string, number>();

  recordDeviceConnected(platform: DevicePlatform): void {
    this.devicesConnected++;
    increment(this.devicesByPlatform, platform);
  }

  recordDeviceDisconnected(platform: DevicePlatform): void {
    this.devicesDisconnected++;
    const current = this.devicesByPlatform.get(platform) ?? 0;
    this.devicesByPlatform.set(platform, Math.max(0, current - 1));
  }

  recordSessionStarted(): void {
    this.sessionsStarted++;
  }

  recordSessionStopped(): void {
    this.sessionsStopped++;
  }

  recordSessionFailed(reason: string): void {
    this.sessionsFailed++;
    increment(this.sessionFailureReasons, reason);
  }

  recordPortAllocationFailure(): void {
    this.portAllocationFailures++;
  }

  recordPluginUnhealthy(instanceId: string): void {
    increment(this.pluginUnhealthy, instanceId);
  }

  recordPluginRestart(instanceId: string): void {
    increment(this.pluginRestarts, instanceId);
  }

  /** Percentage of session starts that succeeded, 100 when none were attempted */
  get sessionSuccessRate(): number {
    const attempts = this.sessionsStarted + this.sessionsFailed;
    if (attempts === 0) return 100;
    return Math.round((this.sessionsStarted / attempts) * 1000) / 10;
  }

  snapshot(): MetricsSnapshot {
    return {
      devicesConnected: this.devicesConnected,
      devicesDisconnected: this.devicesDisconnected,
      devicesByPlatform: Object.fromEntries(this.devicesByPlatform),
      sessionsStarted: this.sessionsStarted,
      sessionsStopped: this.sessionsStopped,
      sessionsFailed: this.sessionsFailed,
      sessionFailureReasons: Object.fromEntries(this.sessionFailureReasons),
      portAllocationFailures: this.portAllocationFailures,
      pluginUnhealthy: Object.fromEntries(this.pluginUnhealthy),
      pluginRestarts: Object.fromEntries(this.pluginRestarts),
    };
  }

  summary(): string {
    const restarts = sum(this.pluginRestarts);
    const unhealthy = sum(this.pluginUnhealthy);
    return [
      `devices +${this.devicesConnected}/-${this.devicesDisconnected}`,
      `sessions ${this.sessionsStarted} started, ${this.sessionsStopped} stopped, ${this.sessionsFailed} failed (${this.sessionSuccessRate}% ok)`,
      `port exhaustion ${this.portAllocationFailures}`,
      `plugins ${unhealthy} unhealthy, ${restarts} restarts`,
    ].join(' | ');
  }
}

function increment(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

function sum(map: Map<string, number>): number {
  let total = 0;
  for (const value of map.values()) total += value;
  return total;
}
