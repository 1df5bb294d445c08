/**
 * Runtime configuration loader
 * Combines parsed CLI options with validated environment variables
 */

import type { CLIOptions } from '../cli/parser.js';
import { DEFAULT_QUEUE_DIR } from '../queue/pending-action-queue.js';
import { ConfigError } from '../types/errors.js';
import { ENV_KEYS, formatValidationErrors, validateEnvConfig } from './validation.js';

export type ServerMode = 'stdio' | 'http';

export interface RuntimeConfig {
  mode: ServerMode;
  host: string;
  port: number;
  workspace: string;
  queueEnabled: boolean;
  queueDir: string;
  remindctlBin: string;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  authRequired: boolean;
  apiKey: string | null;
  deleteAllowMissing: boolean;
  healthCacheMs: number;
  autoRouteLists: boolean;
}

/**
 * Configuration safe to expose through the server/config resource
 */
export interface PublicConfig {
  mode: ServerMode;
  host: string;
  port: number;
  authRequired: boolean;
  readTimeoutMs: number;
  writeTimeoutMs: number;
  workspace: string;
  queueEnabled: boolean;
  deleteAllowMissing: boolean;
  autoRouteLists: boolean;
}

export class ConfigLoader {
  /**
   * Known environment variables with a non-empty value
   */
  static pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
    const picked: Record<string, string> = {};
    for (const key of ENV_KEYS) {
      const value = env[key];
      if (value !== undefined && value.trim() !== '') {
        picked[key] = value;
      }
    }
    return picked;
  }

  /**
   * Build the runtime configuration
   * Throws ConfigError when a value is invalid or a required one is missing
   */
  static load(options: CLIOptions, env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
    const validation = validateEnvConfig(this.pickEnv(env));
    if (!validation.success || !validation.data) {
      const detail = validation.error ? formatValidationErrors(validation.error) : 'unknown';
      throw new ConfigError(`Invalid configuration: ${detail}`);
    }
    const parsed = validation.data;

    const mode: ServerMode = options.remote ? 'http' : 'stdio';
    // The bearer check only exists on the HTTP transport
    const authRequired = mode === 'http' && (parsed.AUTH_REQUIRED ?? true);
    const apiKey = parsed.API_KEY ?? null;

    if (authRequired && apiKey === null) {
      throw new ConfigError('API_KEY is required when AUTH_REQUIRED is true in remote mode');
    }

    return {
      mode,
      host: options.host,
      port: options.port,
      workspace: options.workspace,
      queueEnabled: !options.noQueue,
      queueDir: options.queueDir ?? DEFAULT_QUEUE_DIR,
      remindctlBin: parsed.REMINDCTL_BIN,
      readTimeoutMs: parsed.REMINDCTL_READ_TIMEOUT_SECS * 1000,
      writeTimeoutMs: parsed.REMINDCTL_WRITE_TIMEOUT_SECS * 1000,
      authRequired,
      apiKey,
      deleteAllowMissing: parsed.DELETE_ALLOW_MISSING,
      healthCacheMs: parsed.HEALTH_CACHE_MS,
      autoRouteLists: parsed.AUTO_ROUTE_LISTS,
    };
  }

  static toPublic(config: RuntimeConfig): PublicConfig {
    return {
      mode: config.mode,
      host: config.host,
      port: config.port,
      authRequired: config.authRequired,
      readTimeoutMs: config.readTimeoutMs,
      writeTimeoutMs: config.writeTimeoutMs,
      workspace: config.workspace,
      queueEnabled: config.queueEnabled,
      deleteAllowMissing: config.deleteAllowMissing,
      autoRouteLists: config.autoRouteLists,
    };
  }
}
