/**
 * Plugin Registry
 *
 * Definitions are kept in registration order with an id lookup; registering
 * an existing id replaces it in place. Instances live in an id map where
 * registerInstance() is an insert-if-absent: the first registration for an
 * id wins and later ones are refused.
 */

import { getLogger } from '../logger';
import type { Plugin, PluginDefinition } from './types';

const log = getLogger('PluginRegistry');

export class PluginRegistry {
  private definitions: PluginDefinition[] = [];
  private definitionIndex = new Map<string, number>();
  private instances = new Map<string, Plugin>();

  registerDefinition(definition: PluginDefinition): void {
    if (!definition.id) {
      log.warn('Ignoring plugin definition without an id');
      return;
    }
    const snapshot = structuredClone(definition);
    const existing = this.definitionIndex.get(definition.id);
    if (existing !== undefined) {
      this.definitions[existing] = snapshot;
      log.info({ definitionId: definition.id }, 'Replaced plugin definition');
      return;
    }
    this.definitionIndex.set(definition.id, this.definitions.length);
    this.definitions.push(snapshot);
    log.info({ definitionId: definition.id, type: definition.type }, 'Registered plugin definition');
  }

  /** Definitions in registration order */
  getDefinitions(): PluginDefinition[] {
    return this.definitions.slice();
  }

  getDefinition(id: string): PluginDefinition | undefined {
    const idx = this.definitionIndex.get(id);
    return idx === undefined ? undefined : this.definitions[idx];
  }

  /** Insert if absent. Returns false when an instance with this id already exists. */
  registerInstance(instance: Plugin): boolean {
    if (this.instances.has(instance.id)) return false;
    this.instances.set(instance.id, instance);
    return true;
  }

  getInstance(id: string): Plugin | undefined {
    return this.instances.get(id);
  }

  getInstances(): Plugin[] {
    return [...this.instances.values()];
  }

  /** Instances of one definition: the singleton id and every `id:` per-device id */
  getInstancesByDefinitionId(definitionId: string): Plugin[] {
    const prefix = `${definitionId}:`;
    return this.getInstances().filter(
      (instance) => instance.id === definitionId || instance.id.startsWith(prefix),
    );
  }

  removeInstance(id: string): boolean {
    return this.instances.delete(id);
  }
}
