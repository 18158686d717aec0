/**
 * Configuration loader
 *
 * Reads the YAML config file and validates it. A missing file means all
 * defaults; an empty file counts as an empty document.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { LightDeckConfig, formatZodError, validateConfig } from './config-schema';

export type { LightDeckConfig } from './config-schema';

export const DEFAULT_CONFIG_FILE = 'config.yml';

export function defaultConfig(): LightDeckConfig {
  return validateConfig({});
}

export function loadConfig(configPath?: string): LightDeckConfig {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    return defaultConfig();
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[Config] Invalid YAML in ${resolvedPath}: ${message}`);
  }

  try {
    return validateConfig(parsed ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

/** Resolve a path from the config relative to the config file's directory */
export function resolveConfigRelative(configPath: string | undefined, target: string): string {
  if (path.isAbsolute(target)) return target;
  const baseDir = configPath ? path.dirname(path.resolve(configPath)) : process.cwd();
  return path.join(baseDir, target);
}
