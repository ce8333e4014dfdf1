#!/usr/bin/env node

/**
 * Mobile Device Agent
 *
 * Watches for attached Android and iOS devices, runs an automation server
 * session per device and keeps the configured plugin workers alive.
 *
 * Usage:
 *   device-agent                          # Use ./agent.yml or ~/.device-agent/agent.yml
 *   device-agent --config ./my.yml        # Use a specific config file
 *   device-agent --verbose                # Debug logging
 *   device-agent --validate               # Validate the config and exit
 *   device-agent --generate-services out  # Write systemd/supervisor files and exit
 */

import { loadConfig, ConfigError } from './config';
import type { AgentConfig } from './config';
import { DeviceAgent } from './agent';
import { initLogger, getLogger, errorMessage } from './logger';
import { writeServiceDefinitions } from './plugins';

const log = getLogger('Main');

export interface CliOptions {
  configPath?: string;
  verbose: boolean;
  validate: boolean;
  generateServices?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { verbose: false, validate: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c': {
        const value = argv[++i];
        if (!value) throw new UsageError('--config requires a file path');
        options.configPath = value;
        break;
      }
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--validate':
        options.validate = true;
        break;
      case '--generate-services': {
        const value = argv[++i];
        if (!value) throw new UsageError('--generate-services requires an output directory');
        options.generateServices = value;
        break;
      }
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function printUsage(): void {
  console.log('');
  console.log('  Mobile Device Agent');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>          Path to config YAML file');
  console.log('    --verbose, -v                Enable debug logging');
  console.log('    --validate                   Validate the config and exit');
  console.log('    --generate-services <dir>    Write systemd/supervisor definitions and exit');
  console.log('    --help, -h                   Show this help');
  console.log('');
}

function printConfigSummary(config: AgentConfig): void {
  console.log('');
  console.log(`  Config:         ${config.configPath ?? '(defaults)'}`);
  console.log(`  Install folder: ${config.installFolder}`);
  console.log(`  Port range:     ${config.portRange.start}-${config.portRange.end}`);
  console.log(`  Registry file:  ${config.deviceRegistry.enabled ? config.deviceRegistry.filePath : '(disabled)'}`);
  console.log(`  Plugins:        ${config.plugins.length}`);
  for (const plugin of config.plugins) {
    const trigger = plugin.triggerOn ? ` on ${plugin.triggerOn}` : '';
    console.log(`    - ${plugin.id} [${plugin.type}]${plugin.enabled ? '' : ' (disabled)'}${trigger}`);
  }
  console.log('');
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv);
  } catch (err) {
    console.error(`[Error] ${errorMessage(err)}`);
    printUsage();
    process.exit(1);
  }

  if (options.help) {
    printUsage();
    return;
  }

  const config = loadConfig(options.configPath);
  initLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  });

  if (options.validate) {
    printConfigSummary(config);
    return;
  }

  if (options.generateServices) {
    const written = await writeServiceDefinitions(config.plugins, config.installFolder, options.generateServices);
    for (const file of written) console.log(`  wrote ${file}`);
    return;
  }

  const agent = new DeviceAgent(config);
  await agent.start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Shutting down');
    agent.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ error: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      log.fatal({ error: errorMessage(err) }, 'Device agent failed');
    }
    process.exit(1);
  });
}
