/**
 * Registry Updater
 *
 * Keeps the device registry in step with device events on the bus.
 */

import type { EventBus } from '../events';
import type { DeviceRegistry } from './device-registry';

/** Subscribe the registry to connect/disconnect events. Returns an unbind function. */
export function bindRegistryToBus(bus: EventBus, registry: DeviceRegistry): () => void {
  const unsubscribers = [
    bus.subscribe('DeviceConnected', ({ device }) => {
      registry.upsert(device);
    }),
    bus.subscribe('DeviceDisconnected', ({ device }) => {
      if (!registry.markDisconnected(device.id)) {
        registry.upsert(device);
        registry.markDisconnected(device.id);
      }
    }),
  ];
  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}
