/**
 * Run configuration for the command-line tool (run.json): where the
 * mapping configuration, schemas and reference datasets live, and how to log.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError, TARGET_SCHEMAS, formatZodError } from '@relecov-mapper/core';

function findConfDir(): string {
  const here = fileURLToPath(new URL('.', import.meta.url));
  // Running from sources (packages/cli/src) or from the build (dist/packages/cli/src)
  const candidates = [resolve(here, '../conf'), resolve(here, '../../../../packages/cli/conf')];
  return candidates.find((dir) => existsSync(dir)) ?? resolve(here, '../conf');
}

/** Configuration shipped with the tool */
export const DEFAULT_CONF_DIR = findConfDir();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

function expandValue(value: unknown, path: string, missing: string[]): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REFERENCE, (match, name: string, fallback: string | undefined) => {
      const envValue = process.env[name];
      if (envValue !== undefined && envValue !== '') return envValue;
      if (fallback !== undefined) return fallback;
      missing.push(`${name} (at ${path || 'root'})`);
      return match;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => expandValue(item, `${path}[${i}]`, missing));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = expandValue(item, path ? `${path}.${key}` : key, missing);
    }
    return out;
  }
  return value;
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed run
 * config. Every unset variable without a default is reported in one error.
 */
export function expandEnvVars(value: unknown): unknown {
  const missing: string[] = [];
  const expanded = expandValue(value, '', missing);
  if (missing.length > 0) {
    throw new ConfigurationError({
      message: `Missing required environment variable${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
      suggestion: 'Set the variables, or give defaults with ${NAME:-value}.',
    });
  }
  return expanded;
}

export const runConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    configurationPath: z.string().min(1).optional(),
    schemaDir: z.string().min(1).optional(),
    referenceDir: z.string().min(1).optional(),
    institutionDir: z.string().min(1).optional(),
    targets: z.array(z.enum(TARGET_SCHEMAS)).min(1).optional(),
    concurrency: z.number().int().min(1).max(64).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type RunConfig = z.infer<typeof runConfigSchema>;

/** Absolute locations of everything a run reads */
export interface ResolvedPaths {
  configurationPath: string;
  schemaDir: string;
  referenceDir: string;
  institutionDir: string;
}

/**
 * Resolve run config paths against `baseDir` (the run config's folder),
 * falling back to the shipped conf/ folder.
 */
export function resolvePaths(
  config: RunConfig,
  baseDir: string = process.cwd(),
  confDir: string = DEFAULT_CONF_DIR
): ResolvedPaths {
  return {
    configurationPath: config.configurationPath
      ? resolve(baseDir, config.configurationPath)
      : resolve(confDir, 'configuration.json'),
    schemaDir: config.schemaDir ? resolve(baseDir, config.schemaDir) : resolve(confDir, 'schema'),
    referenceDir: config.referenceDir
      ? resolve(baseDir, config.referenceDir)
      : resolve(confDir, 'reference'),
    institutionDir: config.institutionDir
      ? resolve(baseDir, config.institutionDir)
      : resolve(confDir, 'institutions'),
  };
}

export interface LoadedRunConfig {
  config: RunConfig;
  /** Folder relative paths in the config are resolved against */
  baseDir: string;
}

export async function loadRunConfig(configPath: string): Promise<LoadedRunConfig> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError({
      message: `Cannot read run config ${absolutePath}`,
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigurationError({
      message: `Run config ${absolutePath} is not valid JSON`,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = runConfigSchema.safeParse(expandEnvVars(parsed));
  if (!result.success) {
    throw new ConfigurationError({ message: formatZodError(result.error, absolutePath) });
  }
  return { config: result.data, baseDir: dirname(absolutePath) };
}
