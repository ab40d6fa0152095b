/**
 * Basemaps Command
 *
 * Usage:
 *   geoportal basemaps [--json]
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { listBasemaps } from '../../presentation/basemaps.js';
import { EXIT_CODES, type ExitCode } from '../lib/context.js';
import { consoleOutput, formatJson, formatTable, type CommandOutput } from '../lib/output.js';

const BasemapsOptionsSchema = z.object({
  json: z.boolean().optional(),
});

export function registerBasemapsCommand(program: Command): void {
  program
    .command('basemaps')
    .description('List the available basemaps')
    .option('--json', 'Output as JSON')
    .action((_options: unknown, command: Command) => {
      process.exitCode = executeBasemaps(BasemapsOptionsSchema.parse(command.optsWithGlobals()));
    });
}

export function executeBasemaps(
  options: z.infer<typeof BasemapsOptionsSchema>,
  output: CommandOutput = consoleOutput
): ExitCode {
  const basemaps = listBasemaps();

  if (options.json) {
    output.out(formatJson(basemaps));
  } else {
    output.out(
      formatTable(basemaps, [
        { key: 'key', header: 'Basemap' },
        { key: 'maxZoom', header: 'Max zoom', align: 'right' },
        { key: 'attribution', header: 'Attribution' },
      ])
    );
  }
  return EXIT_CODES.SUCCESS;
}
