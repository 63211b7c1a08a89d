import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ZodError } from 'zod';
import { fromZodError } from 'zod-validation-error';
import { StylewrightConfigSchema, type StylewrightConfig } from './schema.js';

export const CONFIG_FILES = [
  'stylewright.config.mjs',
  'stylewright.config.js',
  '.stylewrightrc.json',
  '.stylewrightrc',
];

export interface LoadConfigResult {
  config: StylewrightConfig;
  configPath: string | null;
}

export function getConfigPath(cwd: string = process.cwd()): string | null {
  for (const filename of CONFIG_FILES) {
    const fullPath = resolve(cwd, filename);
    if (existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

async function readRawConfig(configPath: string): Promise<unknown> {
  if (configPath.endsWith('.json') || configPath.endsWith('.stylewrightrc')) {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    return parsed;
  }

  const mod: unknown = await import(pathToFileURL(configPath).href);
  if (typeof mod === 'object' && mod !== null && 'default' in mod) {
    return mod.default;
  }
  return mod;
}

export async function loadConfig(cwd: string = process.cwd()): Promise<LoadConfigResult> {
  const configPath = getConfigPath(cwd);

  if (!configPath) {
    // Defaults when no file is found
    return { config: StylewrightConfigSchema.parse({}), configPath: null };
  }

  try {
    const raw = await readRawConfig(configPath);
    return { config: StylewrightConfigSchema.parse(raw), configPath };
  } catch (error) {
    if (error instanceof ZodError) {
      const validationError = fromZodError(error, {
        prefix: 'Configuration error',
        prefixSeparator: ': ',
      });
      throw new Error(`Invalid config in ${configPath}:\n\n${validationError.message}`);
    }

    if (error instanceof SyntaxError) {
      throw new Error(
        `Invalid JSON in ${configPath}: ${error.message}\n\nCheck for missing commas, trailing commas, or unquoted keys.`,
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config from ${configPath}: ${message}`);
  }
}
