/**
 * Command registration
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerBasemapsCommand } from './basemaps.js';
import { registerIngestCommand } from './ingest.js';
import { registerServeCommand } from './serve.js';

export function registerCommands(program: Command): void {
  registerIngestCommand(program);
  registerBasemapsCommand(program);
  registerServeCommand(program);
}

export { executeBasemaps } from './basemaps.js';
export { executeIngest, type IngestOptions } from './ingest.js';
export { startServer, type ServeOptions, type StartOutcome } from './serve.js';
