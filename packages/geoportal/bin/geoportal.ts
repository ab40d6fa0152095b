#!/usr/bin/env tsx
/**
 * Geoportal CLI Entry Point
 *
 * Ingest geospatial uploads from the command line or serve the upload API.
 *
 * @module geoportal-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerCommands } from '../src/cli/commands/index.js';

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('geoportal')
    .description('Geoportal CLI - ingest geospatial uploads into WGS84 datasets')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--config <path>', 'Path to config file (default: .geoportalrc)');

  registerCommands(program);
  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
