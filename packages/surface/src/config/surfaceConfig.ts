/**
 * @fileoverview Surface configuration loading from YAML.
 * Validates and caches configuration for the overlay surface server.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { LogLevel } from '../utils/logger.js';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']) satisfies z.ZodType<LogLevel>;

const SurfaceConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  }),
  logging: z
    .object({
      level: LogLevelSchema,
    })
    .default({ level: 'info' }),
  controller: z
    .object({
      maxPendingCommands: z.number().int().positive(),
    })
    .default({ maxPendingCommands: 100 }),
});

export type SurfaceConfig = z.infer<typeof SurfaceConfigSchema>;

export class SurfaceConfigError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'SurfaceConfigError';
  }
}

let cachedConfig: SurfaceConfig | null = null;

/**
 * Validate configuration text.
 * @throws {SurfaceConfigError} if the text is not a valid configuration
 */
export function parseSurfaceConfig(text: string): SurfaceConfig {
  const raw: unknown = parseYaml(text);
  const result = SurfaceConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new SurfaceConfigError(`Invalid surface configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Load and validate surface configuration from a YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - the `path` argument if given
 * - SURFACE_CONFIG_PATH environment variable if set
 * - Otherwise from ./config/surface.yaml relative to cwd
 */
export function loadSurfaceConfig(path?: string): SurfaceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath =
    // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
    path ?? process.env['SURFACE_CONFIG_PATH'] ?? join(process.cwd(), 'config/surface.yaml');

  const config = parseSurfaceConfig(readFileSync(configPath, 'utf8'));
  cachedConfig = config;
  return config;
}

/**
 * Clear the cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
