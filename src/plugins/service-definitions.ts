/**
 * Service Definition Generator
 *
 * Renders plugin definitions as systemd units and supervisor program
 * sections, so long-lived plugins can run under the host's service manager
 * instead of the agent. Only enabled definitions without a device trigger
 * are rendered; device-bound plugins need the agent to supply the device.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { getLogger } from '../logger';
import { expand, expandList, expandMap } from './template';
import { resolveScriptRuntime } from './script-plugin';
import type { PluginContext, PluginDefinition } from './types';

const log = getLogger('ServiceDefinitions');

export const INSTALL_SCRIPT_NAME = 'install-generated-services.sh';

const DEFAULT_RESTART_SEC = 5;

function quoteArg(arg: string): string {
  if (arg !== '' && !/[\s"'\\]/.test(arg)) return arg;
  return `"${arg.replace(/(["\\])/g, '\\$1')}"`;
}

function serviceContext(installFolder: string): PluginContext {
  return { installFolder, variables: {} };
}

/** Full command line for a definition, with the script runtime in front for scripts */
export function serviceCommandLine(definition: PluginDefinition, installFolder: string): string[] {
  const context = serviceContext(installFolder);
  const executable = expand(definition.executable, context);
  const args = expandList(definition.arguments, context);
  if (definition.type !== 'script') return [executable, ...args];

  const env = expandMap(definition.environmentVariables, context);
  const runtime = resolveScriptRuntime(executable, definition.runtime ?? env.runtime, 'linux');
  return [runtime.command, ...runtime.args, executable, ...args];
}

export function isServiceCandidate(definition: PluginDefinition): boolean {
  return definition.enabled && definition.triggerOn === undefined;
}

export function generateSystemdUnit(definition: PluginDefinition, installFolder: string): string {
  const context = serviceContext(installFolder);
  const workingDirectory = definition.workingDirectory
    ? expand(definition.workingDirectory, context)
    : installFolder;
  const env = expandMap(definition.environmentVariables, context);
  const restartSec = Math.max(1, definition.healthCheckIntervalSeconds ?? DEFAULT_RESTART_SEC);

  const lines = [
    '[Unit]',
    `Description=Device agent plugin ${definition.id}`,
    'After=network.target',
    '',
    '[Service]',
    'Type=simple',
    `ExecStart=${serviceCommandLine(definition, installFolder).map(quoteArg).join(' ')}`,
    `WorkingDirectory=${workingDirectory}`,
    ...Object.entries(env).map(([key, value]) => `Environment=${quoteArg(`${key}=${value}`)}`),
    `Restart=${definition.restartPolicy === 'Never' ? 'no' : 'on-failure'}`,
    `RestartSec=${restartSec}`,
    '',
    '[Install]',
    'WantedBy=multi-user.target',
    '',
  ];
  return lines.join('\n');
}

export function generateSupervisorConf(definition: PluginDefinition, installFolder: string): string {
  const context = serviceContext(installFolder);
  const workingDirectory = definition.workingDirectory
    ? expand(definition.workingDirectory, context)
    : installFolder;
  const env = expandMap(definition.environmentVariables, context);
  const logDir = path.posix.join(installFolder, 'logs');

  const lines = [
    `[program:${definition.id}]`,
    `command=${serviceCommandLine(definition, installFolder).map(quoteArg).join(' ')}`,
    `directory=${workingDirectory}`,
    `autostart=${definition.enabled}`,
    `autorestart=${definition.restartPolicy !== 'Never'}`,
  ];
  const envEntries = Object.entries(env);
  if (envEntries.length > 0) {
    lines.push(`environment=${envEntries.map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`).join(',')}`);
  }
  lines.push(
    `stdout_logfile=${path.posix.join(logDir, `${definition.id}.out.log`)}`,
    `stderr_logfile=${path.posix.join(logDir, `${definition.id}.err.log`)}`,
    '',
  );
  return lines.join('\n');
}

export function generateInstallScript(ids: string[]): string {
  const header = [
    '#!/usr/bin/env bash',
    '# Installs the generated service definitions for: ' + (ids.join(', ') || '(none)'),
    'set -euo pipefail',
  ];
  if (ids.length === 0) {
    return [...header, 'echo "No service definitions to install"', 'exit 0', ''].join('\n');
  }

  return [
    ...header,
    'DIR="$(cd "$(dirname "${BASH_SOURCE[0]}")" && pwd)"',
    '',
    'if command -v systemctl >/dev/null 2>&1; then',
    '  sudo cp "$DIR"/systemd/*.service /etc/systemd/system/',
    '  sudo systemctl daemon-reload',
    '  for unit in "$DIR"/systemd/*.service; do',
    '    sudo systemctl enable --now "$(basename "$unit")"',
    '  done',
    'elif command -v supervisorctl >/dev/null 2>&1; then',
    '  sudo cp "$DIR"/supervisor/*.conf /etc/supervisor/conf.d/',
    '  sudo supervisorctl reread',
    '  sudo supervisorctl update',
    'else',
    '  echo "Neither systemd nor supervisor found" >&2',
    '  exit 1',
    'fi',
    '',
  ].join('\n');
}

/**
 * Write systemd/<id>.service, supervisor/<id>.conf and the install script
 * under outputDir. Returns the written paths.
 */
export async function writeServiceDefinitions(
  definitions: PluginDefinition[],
  installFolder: string,
  outputDir: string,
): Promise<string[]> {
  const candidates = definitions.filter(isServiceCandidate);
  const systemdDir = path.join(outputDir, 'systemd');
  const supervisorDir = path.join(outputDir, 'supervisor');
  await fs.mkdir(systemdDir, { recursive: true });
  await fs.mkdir(supervisorDir, { recursive: true });

  const written: string[] = [];
  for (const definition of candidates) {
    const unitPath = path.join(systemdDir, `${definition.id}.service`);
    await fs.writeFile(unitPath, generateSystemdUnit(definition, installFolder), 'utf-8');
    const confPath = path.join(supervisorDir, `${definition.id}.conf`);
    await fs.writeFile(confPath, generateSupervisorConf(definition, installFolder), 'utf-8');
    written.push(unitPath, confPath);
  }

  const scriptPath = path.join(outputDir, INSTALL_SCRIPT_NAME);
  await fs.writeFile(scriptPath, generateInstallScript(candidates.map((d) => d.id)), { encoding: 'utf-8', mode: 0o755 });
  written.push(scriptPath);

  log.info({ outputDir, services: candidates.length }, 'Wrote service definitions');
  return written;
}
