/**
 * Geoportal Configuration Management
 *
 * Loads configuration from .geoportalrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Explicit overrides (command-line options)
 * 2. Environment variables (GEOPORTAL_*)
 * 3. Config file (--config path, GEOPORTAL_CONFIG, or .geoportalrc found upward)
 * 4. Default values
 *
 * @module core/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { BASEMAP_KEYS, DEFAULT_BASEMAP } from '../presentation/basemaps.js';
import {
  DEFAULT_MAP_CENTER,
  DEFAULT_MAP_ZOOM,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_PREVIEW_ROWS,
} from './constants.js';

// ============================================================================
// Schema
// ============================================================================

const CenterSchema = z.tuple([
  z.number().min(-90).max(90),
  z.number().min(-180).max(180),
]);

export const GeoportalConfigSchema = z
  .object({
    /** Directory under which scratch files and directories are created */
    scratchRoot: z.string().min(1),
    maxUploadBytes: z.number().int().positive(),
    defaultBasemap: z.enum(BASEMAP_KEYS),
    previewRows: z.number().int().min(0),
    map: z
      .object({
        defaultCenter: CenterSchema,
        defaultZoom: z.number().int().min(0).max(22),
      })
      .strict(),
    server: z
      .object({
        host: z.string().min(1),
        port: z.number().int().min(0).max(65535),
      })
      .strict(),
  })
  .strict();

export type GeoportalConfig = z.infer<typeof GeoportalConfigSchema>;

/**
 * Shape accepted from a config file: every key optional
 */
const ConfigFileSchema = GeoportalConfigSchema.extend({
  map: GeoportalConfigSchema.shape.map.partial(),
  server: GeoportalConfigSchema.shape.server.partial(),
})
  .partial()
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_CONFIG: GeoportalConfig = {
  scratchRoot: tmpdir(),
  maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
  defaultBasemap: DEFAULT_BASEMAP,
  previewRows: DEFAULT_PREVIEW_ROWS,
  map: {
    defaultCenter: [DEFAULT_MAP_CENTER[0], DEFAULT_MAP_CENTER[1]],
    defaultZoom: DEFAULT_MAP_ZOOM,
  },
  server: {
    host: '127.0.0.1',
    port: 3000,
  },
};

// ============================================================================
// Errors
// ============================================================================

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string | null,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.geoportalrc',
  '.geoportalrc.yaml',
  '.geoportalrc.yml',
  '.geoportalrc.json',
];

/**
 * Find config file in a directory or its ancestors
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid config file ${filePath}: ${issues.join('; ')}`, filePath, issues);
  }
  return parsed.data;
}

function getEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[`GEOPORTAL_${name}`];
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : Number.NaN;
}

export interface ConfigOverrides {
  readonly scratchRoot?: string;
  readonly defaultBasemap?: string;
  readonly previewRows?: number;
  readonly port?: number;
  readonly host?: string;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  readonly cwd?: string;
  /** Environment to read GEOPORTAL_* variables from (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: ConfigOverrides;
}

export interface LoadedConfig {
  readonly config: GeoportalConfig;
  readonly configPath: string | null;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a file is missing, unreadable or invalid, or the merged result is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath || env.GEOPORTAL_CONFIG;
  if (explicitPath) {
    configPath = resolve(explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const overrides = options.overrides ?? {};

  const merged = {
    scratchRoot:
      overrides.scratchRoot ??
      env.GEOPORTAL_SCRATCH_ROOT ??
      fileConfig.scratchRoot ??
      DEFAULT_CONFIG.scratchRoot,
    maxUploadBytes:
      getEnvNumber(env, 'MAX_UPLOAD_BYTES') ??
      fileConfig.maxUploadBytes ??
      DEFAULT_CONFIG.maxUploadBytes,
    defaultBasemap:
      overrides.defaultBasemap ??
      env.GEOPORTAL_DEFAULT_BASEMAP ??
      fileConfig.defaultBasemap ??
      DEFAULT_CONFIG.defaultBasemap,
    previewRows:
      overrides.previewRows ??
      getEnvNumber(env, 'PREVIEW_ROWS') ??
      fileConfig.previewRows ??
      DEFAULT_CONFIG.previewRows,
    map: {
      defaultCenter: fileConfig.map?.defaultCenter ?? DEFAULT_CONFIG.map.defaultCenter,
      defaultZoom: fileConfig.map?.defaultZoom ?? DEFAULT_CONFIG.map.defaultZoom,
    },
    server: {
      host: overrides.host ?? env.GEOPORTAL_HOST ?? fileConfig.server?.host ?? DEFAULT_CONFIG.server.host,
      port:
        overrides.port ??
        getEnvNumber(env, 'PORT') ??
        fileConfig.server?.port ??
        DEFAULT_CONFIG.server.port,
    },
  };

  const validated = GeoportalConfigSchema.safeParse(merged);
  if (!validated.success) {
    const issues = formatIssues(validated.error);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, configPath, issues);
  }

  return { config: validated.data, configPath };
}
