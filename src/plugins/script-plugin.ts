/**
 * Script Plugin
 *
 * Runs a script file through an interpreter. The interpreter comes from the
 * definition's `runtime`, then a `runtime` environment variable on the
 * definition, then the file extension:
 *
 *   .sh           bash
 *   .py           python3 (python on Windows)
 *   .js .mjs .cjs the running node binary
 *   .ps1          PowerShell
 *
 * Anything else uses the platform script host: PowerShell on Windows,
 * bash elsewhere. A runtime name that is not recognised is used as the
 * interpreter command as-is.
 */

import * as path from 'path';
import { expand, expandList, expandMap } from './template';
import { PluginWorker } from './plugin-worker';
import type { LaunchSpec } from './child-process';
import type { PluginContext, PluginType } from './types';

export interface ScriptRuntime {
  command: string;
  args: string[];
}

const POWERSHELL_FILE_ARGS = ['-NoProfile', '-ExecutionPolicy', 'Bypass', '-File'];

function powershell(platform: NodeJS.Platform, name?: string): ScriptRuntime {
  const command = name ?? (platform === 'win32' ? 'powershell' : 'pwsh');
  return { command, args: [...POWERSHELL_FILE_ARGS] };
}

function runtimeByName(name: string, platform: NodeJS.Platform): ScriptRuntime {
  switch (name.toLowerCase()) {
    case 'bash':
    case 'sh':
    case 'zsh':
      return { command: name.toLowerCase(), args: [] };
    case 'python':
    case 'python3':
      return { command: name.toLowerCase(), args: [] };
    case 'node':
    case 'nodejs':
      return { command: process.execPath, args: [] };
    case 'powershell':
    case 'pwsh':
      return powershell(platform, name.toLowerCase());
    default:
      return { command: name, args: [] };
  }
}

function runtimeByExtension(scriptPath: string, platform: NodeJS.Platform): ScriptRuntime {
  switch (path.extname(scriptPath).toLowerCase()) {
    case '.sh':
      return { command: 'bash', args: [] };
    case '.py':
      return { command: platform === 'win32' ? 'python' : 'python3', args: [] };
    case '.js':
    case '.mjs':
    case '.cjs':
      return { command: process.execPath, args: [] };
    case '.ps1':
      return powershell(platform);
    default:
      return platform === 'win32' ? powershell(platform) : { command: 'bash', args: [] };
  }
}

/** Pick the interpreter for a script from an explicit hint or its extension */
export function resolveScriptRuntime(
  scriptPath: string,
  hint: string | undefined,
  platform: NodeJS.Platform = process.platform,
): ScriptRuntime {
  const name = hint?.trim();
  if (name) return runtimeByName(name, platform);
  return runtimeByExtension(scriptPath, platform);
}

/** Wrap a health command for a shell runtime; other runtimes run it directly */
export function wrapHealthCommand(
  command: string,
  args: string[],
  runtime: string | undefined,
): { command: string; args: string[] } {
  const name = runtime?.trim().toLowerCase();
  const line = [command, ...args].join(' ');
  switch (name) {
    case 'bash':
    case 'sh':
      return { command: name, args: ['-c', line] };
    case 'powershell':
    case 'pwsh':
      return { command: name, args: ['-NoProfile', '-Command', line] };
    default:
      return { command, args };
  }
}

export class ScriptPlugin extends PluginWorker {
  get type(): PluginType {
    return 'script';
  }

  protected resolveLaunch(context: PluginContext): LaunchSpec {
    const scriptPath = expand(this.definition.executable, context);
    const env = expandMap(this.definition.environmentVariables, context);
    const hint = this.definition.runtime ?? env.runtime;
    const runtime = resolveScriptRuntime(scriptPath, hint);
    return {
      command: scriptPath ? runtime.command : '',
      args: [...runtime.args, scriptPath, ...expandList(this.definition.arguments, context)],
      ...this.baseSpec(context),
    };
  }

  protected resolveHealthProbe(context: PluginContext): LaunchSpec | null {
    const health = this.expandedHealthCommand(context);
    if (!health) return null;
    return {
      ...wrapHealthCommand(health.command, health.args, this.definition.healthCheckRuntime),
      ...this.baseSpec(context),
    };
  }
}
