/**
 * Plugin Module Exports
 */

export { PluginRegistry } from './plugin-registry';
export { PluginOrchestrator, createPlugin, DEFAULT_MONITOR } from './orchestrator';
export type {
  PluginFactory,
  PluginLifecycle,
  PluginOrchestratorOptions,
  MonitorConfig,
  StartEnabledOptions,
  InstanceStatus,
} from './orchestrator';
export { PluginWorker } from './plugin-worker';
export { ProcessPlugin } from './process-plugin';
export { ScriptPlugin, resolveScriptRuntime, wrapHealthCommand } from './script-plugin';
export { DeviceEventTrigger } from './device-event-trigger';
export { expand, expandList, expandMap } from './template';
export {
  generateSystemdUnit,
  generateSupervisorConf,
  writeServiceDefinitions,
} from './service-definitions';
export { instanceIdFor } from './types';
export type {
  Plugin,
  PluginContext,
  PluginDefinition,
  PluginState,
  PluginType,
  RestartPolicy,
  TriggerRule,
} from './types';
