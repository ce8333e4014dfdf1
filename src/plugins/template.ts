/**
 * Template Expander
 *
 * Two-pass placeholder substitution for plugin launch parameters.
 *
 *   {name}   looked up case-insensitively in context.variables;
 *            {installFolder} falls back to context.installFolder
 *   ${NAME}  ${INSTALL_FOLDER}, then the process environment,
 *            then context.variables (case-insensitive)
 *
 * Unresolved tokens are left verbatim. A `{name}` directly after `$` belongs
 * to the second pass and is not touched by the first.
 */

import type { PluginContext } from './types';

const BRACE_TOKEN = /(?<!\$)\{([^{}]+)\}/g;
const DOLLAR_TOKEN = /\$\{([^{}]+)\}/g;

function lookupVariable(variables: Record<string, unknown>, name: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(variables, name)) {
    return render(variables[name]);
  }
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(variables)) {
    if (key.toLowerCase() === lower) return render(value);
  }
  return undefined;
}

function render(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return JSON.stringify(value);
}

export function expand(text: string, context: PluginContext, env: NodeJS.ProcessEnv = process.env): string {
  if (!text) return text;

  const firstPass = text.replace(BRACE_TOKEN, (token: string, name: string) => {
    const value = lookupVariable(context.variables, name);
    if (value !== undefined) return value;
    if (name.toLowerCase() === 'installfolder') return context.installFolder;
    return token;
  });

  return firstPass.replace(DOLLAR_TOKEN, (token: string, name: string) => {
    if (name.toUpperCase() === 'INSTALL_FOLDER') return context.installFolder;
    const fromEnv = env[name];
    if (fromEnv !== undefined && fromEnv !== '') return fromEnv;
    return lookupVariable(context.variables, name) ?? token;
  });
}

export function expandList(
  items: readonly string[] | undefined,
  context: PluginContext,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  return (items ?? []).map((item) => expand(item, context, env));
}

/** Expands keys and values. Later keys win when two expand to the same name. */
export function expandMap(
  map: Record<string, string> | undefined,
  context: PluginContext,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(map ?? {})) {
    result[expand(key, context, env)] = expand(value, context, env);
  }
  return result;
}
