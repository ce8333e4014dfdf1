/**
 * Plugin Worker
 *
 * Base for workers that wrap one external child process. Subclasses decide
 * what to launch (resolveLaunch) and how to run the health probe
 * (resolveHealthProbe); start, stop and health evaluation live here.
 *
 * State: Disabled -> Running -> Stopped | Error. A child that exits on its
 * own does not change state; the orchestrator's health check notices it.
 */

import { EventEmitter } from 'events';
import type { ChildProcess } from 'child_process';
import type { Logger } from 'pino';
import { getLogger, errorMessage } from '../logger';
import { expand, expandList, expandMap } from './template';
import {
  LaunchSpec,
  isRunning,
  killTree,
  pipeOutput,
  runCommand,
  spawnChild,
  waitForExit,
} from './child-process';
import {
  DEFAULT_HEALTH_CHECK_TIMEOUT_SECONDS,
  MIN_HEALTH_CHECK_TIMEOUT_MS,
  STOP_WAIT_MS,
} from './types';
import type {
  Plugin,
  PluginContext,
  PluginDefinition,
  PluginState,
  PluginType,
} from './types';

const baseLog = getLogger('Plugin');

export abstract class PluginWorker extends EventEmitter implements Plugin {
  readonly id: string;
  readonly definition: PluginDefinition;

  protected log: Logger;
  protected context: PluginContext | null = null;
  private child: ChildProcess | null = null;
  private starting: Promise<boolean> | null = null;
  private _state: PluginState = 'Disabled';

  constructor(id: string, definition: PluginDefinition) {
    super();
    this.id = id;
    this.definition = definition;
    this.log = baseLog.child({ instanceId: id });
  }

  abstract get type(): PluginType;

  /** Command line for the worker itself */
  protected abstract resolveLaunch(context: PluginContext): LaunchSpec;

  /** Command line for the health probe; null when none is configured */
  protected abstract resolveHealthProbe(context: PluginContext): LaunchSpec | null;

  get state(): PluginState {
    return this._state;
  }

  /** Pid of the live child, if any */
  get pid(): number | undefined {
    return this.child && isRunning(this.child) ? this.child.pid : undefined;
  }

  /** Concurrent callers share one in-flight start */
  start(context: PluginContext): Promise<boolean> {
    if (this.starting) return this.starting;
    const starting = this.spawnWorker(context).finally(() => {
      this.starting = null;
    });
    this.starting = starting;
    return starting;
  }

  private async spawnWorker(context: PluginContext): Promise<boolean> {
    if (this.child && isRunning(this.child)) {
      this.setState('Running');
      return true;
    }
    this.context = context;

    let launch: LaunchSpec;
    try {
      launch = this.resolveLaunch(context);
    } catch (err) {
      this.log.error({ error: errorMessage(err) }, 'Failed to resolve plugin launch');
      this.setState('Error');
      return false;
    }

    if (!launch.command) {
      this.log.warn({ definitionId: this.definition.id }, 'Plugin has no executable');
      this.setState('Error');
      return false;
    }

    try {
      const child = await spawnChild(launch);
      this.child = child;
      pipeOutput(child, this.log);
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        if (this._state === 'Running' && this.child === child) {
          this.log.warn({ code, signal }, 'Plugin process exited');
        }
      });
      this.setState('Running');
      this.log.info({ pid: child.pid, command: launch.command, args: launch.args }, 'Plugin started');
      return true;
    } catch (err) {
      this.log.error({ command: launch.command, error: errorMessage(err) }, 'Failed to start plugin');
      this.setState('Error');
      return false;
    }
  }

  async stop(): Promise<void> {
    if (this.starting) await this.starting;
    const child = this.child;
    this.child = null;

    if (child && isRunning(child)) {
      try {
        await killTree(child);
        const exited = await waitForExit(child, STOP_WAIT_MS);
        if (!exited) {
          this.log.warn({ pid: child.pid, waitMs: STOP_WAIT_MS }, 'Plugin process did not exit after kill');
        }
      } catch (err) {
        this.log.warn({ pid: child.pid, error: errorMessage(err) }, 'Error stopping plugin process');
      }
    }

    this.setState('Stopped');
    this.log.info('Plugin stopped');
  }

  async checkHealth(): Promise<boolean> {
    const context = this.context;
    if (!context) return false;

    let probe: LaunchSpec | null;
    try {
      probe = this.resolveHealthProbe(context);
    } catch (err) {
      this.log.warn({ error: errorMessage(err) }, 'Failed to resolve health check');
      return false;
    }

    if (!probe) {
      return this.child !== null && isRunning(this.child);
    }

    const timeoutMs = this.healthCheckTimeoutMs(context);
    const result = await runCommand(probe, timeoutMs);
    if (result.timedOut) {
      this.log.warn({ command: probe.command, timeoutMs }, 'Health check timed out');
      return false;
    }
    if (result.error) {
      this.log.warn({ command: probe.command, error: result.error }, 'Health check failed to run');
      return false;
    }
    if (result.exitCode !== 0) {
      this.log.debug({ command: probe.command, exitCode: result.exitCode }, 'Health check reported unhealthy');
    }
    return result.exitCode === 0;
  }

  protected healthCheckTimeoutMs(context: PluginContext): number {
    const seconds = this.definition.healthCheckTimeoutSeconds
      ?? context.healthCheckTimeoutSeconds
      ?? DEFAULT_HEALTH_CHECK_TIMEOUT_SECONDS;
    return Math.max(MIN_HEALTH_CHECK_TIMEOUT_MS, Math.round(seconds * 1000));
  }

  /** Working directory and environment shared by the worker and its probe */
  protected baseSpec(context: PluginContext): Pick<LaunchSpec, 'cwd' | 'env'> {
    const cwd = this.definition.workingDirectory
      ? expand(this.definition.workingDirectory, context)
      : context.installFolder;
    return {
      cwd: cwd || undefined,
      env: { ...process.env, ...expandMap(this.definition.environmentVariables, context) },
    };
  }

  /** Health command and arguments after template expansion, or null */
  protected expandedHealthCommand(context: PluginContext): { command: string; args: string[] } | null {
    if (!this.definition.healthCheckCommand) return null;
    const command = expand(this.definition.healthCheckCommand, context);
    if (!command) return null;
    return { command, args: expandList(this.definition.healthCheckArguments, context) };
  }

  private setState(newState: PluginState): void {
    if (this._state === newState) return;
    const prev = this._state;
    this._state = newState;
    this.log.debug({ from: prev, to: newState }, 'Plugin state change');
    this.emit('stateChange', newState, prev);
  }
}
