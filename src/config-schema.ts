/**
 * Config Schema Validation
 *
 * Zod schemas for the agent configuration file and plugin definitions.
 * Defaults live here so a sparse YAML file yields a complete config.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const secondsSchema = z.number().positive();

/** Enum that accepts any casing of its values and normalizes to the declared one */
function caseInsensitiveEnum<T extends string>(values: readonly [T, ...T[]]) {
  return z.preprocess(
    (val) => (typeof val === 'string'
      ? values.find((v) => v.toLowerCase() === val.trim().toLowerCase()) ?? val
      : val),
    z.enum(values),
  );
}

// --- Plugin Definitions ---

export const pluginDefinitionSchema = z.object({
  id: z.string().trim().min(1, 'Plugin id is required'),
  type: caseInsensitiveEnum(['process', 'script']).default('process'),
  executable: z.string().min(1, 'Plugin executable is required'),
  arguments: z.array(z.string()).default([]),
  workingDirectory: z.string().optional(),
  environmentVariables: z.record(z.coerce.string()).optional(),
  healthCheckCommand: z.string().optional(),
  healthCheckArguments: z.array(z.string()).optional(),
  healthCheckIntervalSeconds: secondsSchema.optional(),
  healthCheckTimeoutSeconds: secondsSchema.optional(),
  healthCheckRuntime: z.string().optional(),
  runtime: z.string().optional(),
  restartPolicy: caseInsensitiveEnum(['Never', 'OnFailure']).default('OnFailure'),
  enabled: z.boolean().default(true),
  triggerOn: caseInsensitiveEnum(['device-connected', 'device-disconnected']).optional(),
  stopOnDisconnect: z.boolean().default(false),
});

// --- Sections ---

const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  pretty: z.boolean().optional(),
});

const portRangeSchema = z.object({
  start: portSchema.default(4723),
  end: portSchema.default(5000),
}).refine(
  (range) => range.start <= range.end,
  { message: 'portRange.start must not be greater than portRange.end' },
);

const deviceRegistryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  filePath: z.string().min(1).default('device-registry.json'),
  autoSave: z.boolean().default(true),
  saveIntervalSeconds: z.number().int().min(1).default(30),
});

const listenerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  pollIntervalSeconds: z.number().int().min(1).default(5),
  autoStartSessions: z.boolean().default(true),
  android: z.boolean().default(true),
  ios: z.boolean().default(true),
  adbPath: z.string().min(1).default('adb'),
});

const sessionConfigSchema = z.object({
  executable: z.string().min(1).default('{installFolder}/bin/appium'),
  arguments: z.array(z.string()).default(['--address', '127.0.0.1', '--port', '{appiumPort}']),
});

const monitorConfigSchema = z.object({
  intervalSeconds: secondsSchema.default(10),
  restartBackoffSeconds: z.number().min(0).default(5),
  healthCheckTimeoutSeconds: secondsSchema.default(5),
});

// --- Full Agent Config Schema ---

export const agentConfigSchema = z.object({
  installFolder: z.string().min(1).optional(),
  logging: loggingConfigSchema.default({}),
  portRange: portRangeSchema.default({}),
  deviceRegistry: deviceRegistryConfigSchema.default({}),
  listener: listenerConfigSchema.default({}),
  session: sessionConfigSchema.default({}),
  monitor: monitorConfigSchema.default({}),
  plugins: z.array(pluginDefinitionSchema).default([]),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.plugins.forEach((plugin, index) => {
    if (seen.has(plugin.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['plugins', index, 'id'],
        message: `Duplicate plugin id "${plugin.id}"`,
      });
    }
    seen.add(plugin.id);
  });
});

// --- Type Exports ---

export type AgentConfigInput = z.input<typeof agentConfigSchema>;
export type AgentConfigOutput = z.output<typeof agentConfigSchema>;
export type PluginDefinitionInput = z.input<typeof pluginDefinitionSchema>;

/**
 * Validate the agent config file contents
 */
export function validateAgentConfig(data: unknown): AgentConfigOutput {
  return agentConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
