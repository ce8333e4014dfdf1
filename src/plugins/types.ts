/**
 * Plugin Types
 *
 * Plugin definitions (config blueprints), the launch context handed to a
 * worker, and the worker contract the orchestrator drives.
 */

import type { EventEmitter } from 'events';

export type PluginType = 'process' | 'script';

export type RestartPolicy = 'Never' | 'OnFailure';

export type TriggerRule = 'device-connected' | 'device-disconnected';

/** Worker lifecycle: Disabled until the first start attempt */
export type PluginState = 'Disabled' | 'Running' | 'Stopped' | 'Error';

export interface PluginDefinition {
  id: string;
  type: PluginType;
  executable: string;
  arguments: string[];
  workingDirectory?: string;
  environmentVariables?: Record<string, string>;
  healthCheckCommand?: string;
  healthCheckArguments?: string[];
  healthCheckIntervalSeconds?: number;
  healthCheckTimeoutSeconds?: number;
  healthCheckRuntime?: string;
  runtime?: string;
  restartPolicy: RestartPolicy;
  enabled: boolean;
  triggerOn?: TriggerRule;
  stopOnDisconnect: boolean;
}

/** Per-start variable bag used to expand launch and health-check templates */
export interface PluginContext {
  installFolder: string;
  variables: Record<string, unknown>;
  healthCheckTimeoutSeconds?: number;
}

/**
 * Worker contract. Implementations emit
 * 'stateChange' (newState: PluginState, prevState: PluginState).
 */
export interface Plugin extends EventEmitter {
  readonly id: string;
  readonly type: PluginType;
  readonly definition: PluginDefinition;
  readonly state: PluginState;

  /** Launch the worker. Resolves false on launch failure, never rejects. */
  start(context: PluginContext): Promise<boolean>;

  /** Terminate the worker. Termination errors are logged, never thrown. */
  stop(): Promise<void>;

  checkHealth(): Promise<boolean>;
}

export const DEFAULT_HEALTH_CHECK_TIMEOUT_SECONDS = 5;

/** Lower bound for any health probe timeout */
export const MIN_HEALTH_CHECK_TIMEOUT_MS = 100;

/** How long stop() waits for the child to exit after the kill */
export const STOP_WAIT_MS = 5000;

/** Instance id: definition id alone, or definitionId:deviceId for per-device workers */
export function instanceIdFor(definitionId: string, context: PluginContext): string {
  const deviceId = context.variables.deviceId;
  if (deviceId === undefined || deviceId === null) return definitionId;
  const text = String(deviceId);
  return text.length > 0 ? `${definitionId}:${text}` : definitionId;
}
