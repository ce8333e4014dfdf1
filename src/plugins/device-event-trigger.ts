/**
 * Device Event Trigger
 *
 * Starts and stops device-bound plugins from bus events.
 *
 *   DeviceConnected     start every enabled `device-connected` definition
 *   DeviceDisconnected  start every enabled `device-disconnected` definition,
 *                       stop definitionId:deviceId for every
 *                       `device-connected` definition with stopOnDisconnect
 *
 * The context for each start carries `device` and `deviceId` variables.
 * Each definition is handled on its own; a failure is logged and the rest
 * still run.
 */

import { getLogger, errorMessage } from '../logger';
import type { EventBus, Unsubscribe } from '../events';
import type { Device } from '../devices/types';
import type { PluginRegistry } from './plugin-registry';
import type { PluginLifecycle } from './orchestrator';
import type { PluginContext, PluginDefinition, TriggerRule } from './types';

const log = getLogger('DeviceEventTrigger');

function triggerIs(definition: PluginDefinition, rule: TriggerRule): boolean {
  return definition.triggerOn !== undefined && definition.triggerOn.toLowerCase() === rule;
}

export class DeviceEventTrigger {
  private bus: EventBus;
  private registry: PluginRegistry;
  private lifecycle: PluginLifecycle;
  private installFolder: string;
  private subscriptions: Unsubscribe[] = [];

  constructor(bus: EventBus, registry: PluginRegistry, lifecycle: PluginLifecycle, installFolder: string) {
    this.bus = bus;
    this.registry = registry;
    this.lifecycle = lifecycle;
    this.installFolder = installFolder;
  }

  get attached(): boolean {
    return this.subscriptions.length > 0;
  }

  attach(): void {
    if (this.attached) return;
    this.subscriptions.push(
      this.bus.subscribe('DeviceConnected', ({ device }) => this.onDeviceConnected(device)),
      this.bus.subscribe('DeviceDisconnected', ({ device }) => this.onDeviceDisconnected(device)),
    );
  }

  detach(): void {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
  }

  async onDeviceConnected(device: Device): Promise<void> {
    const context = this.contextFor(device);
    for (const definition of this.registry.getDefinitions()) {
      if (!definition.enabled || !triggerIs(definition, 'device-connected')) continue;
      await this.start(definition, context);
    }
  }

  async onDeviceDisconnected(device: Device): Promise<void> {
    const context = this.contextFor(device);
    for (const definition of this.registry.getDefinitions()) {
      if (definition.enabled && triggerIs(definition, 'device-disconnected')) {
        await this.start(definition, context);
      }
      if (triggerIs(definition, 'device-connected') && definition.stopOnDisconnect) {
        await this.stop(`${definition.id}:${device.id}`);
      }
    }
  }

  private contextFor(device: Device): PluginContext {
    return {
      installFolder: this.installFolder,
      variables: { device, deviceId: device.id },
    };
  }

  private async start(definition: PluginDefinition, context: PluginContext): Promise<void> {
    try {
      const started = await this.lifecycle.startInstance(definition.id, context);
      if (!started) {
        log.warn({ definitionId: definition.id, deviceId: context.variables.deviceId }, 'Triggered plugin did not start');
      }
    } catch (err) {
      log.error({ definitionId: definition.id, error: errorMessage(err) }, 'Triggered plugin start failed');
    }
  }

  private async stop(instanceId: string): Promise<void> {
    try {
      await this.lifecycle.stopInstance(instanceId);
    } catch (err) {
      log.error({ instanceId, error: errorMessage(err) }, 'Triggered plugin stop failed');
    }
  }
}
