/**
 * Serve Command
 *
 * Start the HTTP upload API
 *
 * Usage:
 *   geoportal serve [--port <n>] [--host <host>]
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { logger } from '../../core/utils/logger.js';
import { createGeoportalAPI, type GeoportalAPI } from '../../serving/api.js';
import { EXIT_CODES, loadCommandConfig, type ExitCode, type GlobalOptions } from '../lib/context.js';
import { consoleOutput, type CommandOutput } from '../lib/output.js';

const ServeOptionsSchema = z.object({
  config: z.string().optional(),
  port: z.coerce.number().int().min(0).max(65535).optional(),
  host: z.string().optional(),
});

export type ServeOptions = z.infer<typeof ServeOptionsSchema>;

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP upload API')
    .option('-p, --port <n>', 'Port to listen on')
    .option('--host <host>', 'Interface to bind')
    .action(async (_options: unknown, command: Command) => {
      const options = ServeOptionsSchema.parse(command.optsWithGlobals());
      const started = await startServer(options);
      if (!started.ok) {
        process.exitCode = started.exitCode;
        return;
      }

      const shutdown = (): void => {
        logger.info('Received shutdown signal, stopping server...');
        started.api.stop().then(
          () => process.exit(EXIT_CODES.SUCCESS),
          (error: unknown) => {
            logger.error('Failed to stop server', {
              error: error instanceof Error ? error.message : String(error),
            });
            process.exit(1);
          }
        );
      };
      process.on('SIGTERM', shutdown);
      process.on('SIGINT', shutdown);
    });
}

export type StartOutcome =
  | { readonly ok: true; readonly api: GeoportalAPI; readonly port: number }
  | { readonly ok: false; readonly exitCode: ExitCode };

/**
 * Load configuration and start listening
 */
export async function startServer(
  options: ServeOptions & GlobalOptions,
  output: CommandOutput = consoleOutput
): Promise<StartOutcome> {
  const loaded = await loadCommandConfig(options, output, { port: options.port, host: options.host });
  if (!loaded.ok) {
    return loaded;
  }

  const api = createGeoportalAPI(loaded.config);
  const port = await api.start();
  output.out(`Geoportal API listening on http://${loaded.config.server.host}:${port}`);
  return { ok: true, api, port };
}
