/**
 * Configuration loader
 *
 * Reads the agent's YAML config file, validates it against the zod schema
 * and resolves paths. Lookup order when no path is given:
 *   ./agent.yml, then ~/.device-agent/agent.yml, then built-in defaults.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { getLogger } from './logger';
import type { LogLevel } from './logger';
import type { PortRange } from './ports/port-allocator';
import type { DeviceRegistryConfig } from './devices/device-registry';
import type { SessionServerConfig } from './sessions/session-manager';
import type { MonitorConfig } from './plugins/orchestrator';
import type { PluginDefinition } from './plugins/types';
import { validateAgentConfig, formatZodError } from './config-schema';
import type { AgentConfigOutput } from './config-schema';

const log = getLogger('Config');

export const CONFIG_FILE_NAME = 'agent.yml';

export const DEFAULT_INSTALL_FOLDER = path.join(os.homedir(), '.device-agent');

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ListenerSettings {
  enabled: boolean;
  pollIntervalSeconds: number;
  autoStartSessions: boolean;
  android: boolean;
  ios: boolean;
  adbPath: string;
}

/** Runtime config with defaults applied and paths resolved */
export interface AgentConfig {
  /** Source file, or null when running on defaults */
  configPath: string | null;
  installFolder: string;
  logging: {
    level: LogLevel;
    pretty?: boolean;
  };
  portRange: PortRange;
  deviceRegistry: DeviceRegistryConfig;
  listener: ListenerSettings;
  session: SessionServerConfig;
  monitor: MonitorConfig & {
    healthCheckTimeoutSeconds: number;
  };
  plugins: PluginDefinition[];
}

function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

/** First existing candidate config file, or null */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  const candidates = [
    path.join(cwd, CONFIG_FILE_NAME),
    path.join(DEFAULT_INSTALL_FOLDER, CONFIG_FILE_NAME),
  ];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
}

/**
 * Validate parsed YAML and build the runtime config.
 * Relative paths resolve against baseDir (the config file's directory).
 */
export function buildConfig(raw: unknown, baseDir: string = process.cwd(), configPath: string | null = null): AgentConfig {
  let validated: AgentConfigOutput;
  try {
    validated = validateAgentConfig(raw ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }

  const installFolder = validated.installFolder
    ? path.resolve(baseDir, expandHome(validated.installFolder))
    : DEFAULT_INSTALL_FOLDER;

  const registryPath = expandHome(validated.deviceRegistry.filePath);

  return {
    configPath,
    installFolder,
    logging: validated.logging,
    portRange: validated.portRange,
    deviceRegistry: {
      ...validated.deviceRegistry,
      filePath: path.resolve(installFolder, registryPath),
    },
    listener: validated.listener,
    session: validated.session,
    monitor: validated.monitor,
    plugins: validated.plugins,
  };
}

/**
 * Load config from YAML. An explicit path must exist; without one the
 * default locations are searched and defaults are used if none is found.
 */
export function loadConfig(configPath?: string): AgentConfig {
  const resolvedPath = configPath ? path.resolve(configPath) : findConfigFile();

  if (configPath && (!resolvedPath || !fs.existsSync(resolvedPath))) {
    throw new ConfigError(`[Config] Config file not found: ${configPath}`);
  }

  if (!resolvedPath) {
    log.info('No config file found, using defaults');
    return buildConfig({});
  }

  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`[Config] Could not parse ${resolvedPath}: ${reason}`);
  }

  const config = buildConfig(parsed, path.dirname(resolvedPath), resolvedPath);
  log.info(
    { file: resolvedPath, plugins: config.plugins.length, installFolder: config.installFolder },
    'Loaded config',
  );
  return config;
}
