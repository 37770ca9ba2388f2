import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './types';

/**
 * Zod schema for the media resolver configuration
 */
const AlbumSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
});

export const MediaResolverConfigSchema = z.object({
  resolver: z.object({
    batchSize: z.number().int().positive().default(5),
    itemTimeoutMs: z.number().int().positive().default(3000),
    allowPlaceholderFallback: z.boolean().default(false),
  }).default({}),
  scanner: z.object({
    albumPageSize: z.number().int().positive().default(100),
    maxVideoDurationSeconds: z.number().positive().default(15 * 60),
    recursive: z.boolean().default(true),
  }).default({}),
  validation: z.object({
    enableRecovery: z.boolean().default(true),
    postValidate: z.boolean().default(true),
    metadataMatchThreshold: z.number().min(0).max(1).default(0.7),
  }).default({}),
  albums: z.array(AlbumSchema).optional(),
  directories: z.object({
    enabled: z.boolean().default(false),
    paths: z.array(z.string().min(1)).default([]),
  }).default({}),
});

export type MediaResolverConfig = z.infer<typeof MediaResolverConfigSchema>;
export type AlbumRoot = z.infer<typeof AlbumSchema>;

export const MEDIA_RESOLVER_CONFIG = 'media-resolver.config';

/**
 * Default album roots, mirroring the folders a desktop media library indexes
 */
export function defaultAlbumRoots(homeDir: string = os.homedir()): AlbumRoot[] {
  return [
    { name: 'Pictures', path: path.join(homeDir, 'Pictures') },
    { name: 'Movies', path: path.join(homeDir, 'Movies') },
    { name: 'Videos', path: path.join(homeDir, 'Videos') },
    { name: 'Downloads', path: path.join(homeDir, 'Downloads') },
    { name: 'DCIM', path: path.join(homeDir, 'DCIM') },
  ];
}

/**
 * Configuration manager for loading and validating config files
 */
export class ConfigManager {
  private static configCache: Map<string, unknown> = new Map();
  private static configDir = path.join(process.cwd(), 'config');

  /**
   * Point the manager at another config directory (clears the cache)
   */
  static setConfigDir(dir: string): void {
    this.configDir = dir;
    this.configCache.clear();
  }

  /**
   * Load and validate a configuration file. A missing file validates `{}`, so
   * schemas with defaults yield a usable configuration.
   */
  static async load<T>(configName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    if (this.configCache.has(configName)) {
      return schema.parse(this.configCache.get(configName));
    }

    const configPath = path.join(this.configDir, `${configName}.json`);

    let raw: unknown = {};
    try {
      const content = await fs.readFile(configPath, 'utf-8');
      raw = JSON.parse(content);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new ConfigError(
          `Failed to load configuration ${configName}: ${errorMessage(error)}`,
          configName,
          error instanceof Error ? error : undefined
        );
      }
    }

    let validated: T;
    try {
      validated = schema.parse(this.replaceEnvVars(raw));
    } catch (error) {
      if (error instanceof z.ZodError) {
        const errors = error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
        throw new ConfigError(`Configuration validation failed for ${configName}:\n${errors}`, configName, error);
      }
      throw new ConfigError(
        `Failed to load configuration ${configName}: ${errorMessage(error)}`,
        configName,
        error instanceof Error ? error : undefined
      );
    }

    this.configCache.set(configName, validated);
    return validated;
  }

  /**
   * Load the media resolver configuration
   */
  static async loadMediaResolverConfig(): Promise<MediaResolverConfig> {
    return this.load(MEDIA_RESOLVER_CONFIG, MediaResolverConfigSchema);
  }

  /**
   * Clear configuration cache
   */
  static clearCache(): void {
    this.configCache.clear();
  }

  /**
   * Replace ${VAR_NAME} placeholders with process.env values
   */
  static replaceEnvVars(obj: unknown): unknown {
    if (typeof obj === 'string') {
      return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
        const value = process.env[varName];
        if (value === undefined) {
          throw new Error(`Environment variable ${varName} is not defined`);
        }
        return value;
      });
    }

    if (Array.isArray(obj)) {
      return obj.map((item) => this.replaceEnvVars(item));
    }

    if (obj !== null && typeof obj === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(obj)) {
        result[key] = this.replaceEnvVars(value);
      }
      return result;
    }

    return obj;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
