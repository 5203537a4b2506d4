/**
 * Converter configuration.
 *
 * Loaded from a JSON file: the --config path, else $LITE_NOTEBOOKS_CONFIG,
 * else lite-notebooks.json in the working directory. Every field has a default.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { SEVERITIES } from './types.js';

export const DEFAULT_CONFIG_FILE = 'lite-notebooks.json';

export const CONFIG_ENV_VAR = 'LITE_NOTEBOOKS_CONFIG';

const configSchema = z.strictObject({
  kernelName: z.string().min(1).default('python'),
  kernelDisplayName: z.string().min(1).default('Python (Pyodide)'),
  inputSuffix: z.string().min(1).default('.Rmd'),
  outputSuffix: z.string().min(1).default('.ipynb'),
  /** Language of the runtime's contents storage key */
  language: z.string().regex(/^[\w-]+$/).default('python'),
  /** What a batch run does when one document fails */
  onError: z.enum(['abort', 'continue']).default('abort'),
  /** Parser diagnostics at or above this level fail the document */
  haltLevel: z.enum(SEVERITIES).default('severe'),
});

export type LiteConfig = z.infer<typeof configSchema>;

export type ErrorPolicy = LiteConfig['onError'];

/**
 * Validate raw configuration data and fill in defaults.
 */
export function parseConfig(data: unknown, source?: string): LiteConfig {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(detail, source);
  }
  return result.data;
}

/**
 * Load configuration from file. A missing default file means defaults;
 * a missing file that was asked for explicitly is an error.
 */
export async function loadConfig(configPath?: string): Promise<LiteConfig> {
  const requested = configPath ?? process.env[CONFIG_ENV_VAR];
  const resolved = path.resolve(requested ?? DEFAULT_CONFIG_FILE);

  if (!(await fs.pathExists(resolved))) {
    if (requested) {
      throw new ConfigError('config file not found', resolved);
    }
    console.warn(`[Config] ${DEFAULT_CONFIG_FILE} not found, using defaults`);
    return parseConfig({});
  }

  const data: unknown = await fs.readJson(resolved);
  console.log(`[Config] Loaded config from ${resolved}`);
  return parseConfig(data, resolved);
}
