/**
 * Shared command context: exit codes and configuration loading
 *
 * @module cli/lib/context
 */

import { ConfigError, loadConfig, type ConfigOverrides, type GeoportalConfig } from '../../core/config.js';
import type { CommandOutput } from './output.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  INGEST_ERROR: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface GlobalOptions {
  /** Explicit config file path (--config) */
  readonly config?: string;
}

export type ConfigOutcome =
  | { readonly ok: true; readonly config: GeoportalConfig }
  | { readonly ok: false; readonly exitCode: ExitCode };

/**
 * Load configuration for a command, reporting config errors on stderr
 */
export async function loadCommandConfig(
  global: GlobalOptions,
  output: CommandOutput,
  overrides: ConfigOverrides = {}
): Promise<ConfigOutcome> {
  try {
    const { config } = await loadConfig({ configPath: global.config, overrides });
    return { ok: true, config };
  } catch (error) {
    if (error instanceof ConfigError) {
      output.err(`Configuration error: ${error.message}`);
      return { ok: false, exitCode: EXIT_CODES.CONFIG_ERROR };
    }
    throw error;
  }
}
