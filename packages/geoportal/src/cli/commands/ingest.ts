/**
 * Ingest Command
 *
 * Run one local file through the ingestion pipeline and report what came out.
 *
 * Usage:
 *   geoportal ingest <file> [options]
 *
 * Options:
 *   --basemap <key>    Basemap for the map view (default from config)
 *   -o, --output <file> Write the normalized dataset as GeoJSON
 *   --preview <n>      Rows shown in the preview table
 *   --json             Output as JSON
 *
 * Examples:
 *   geoportal ingest parcels.zip --preview 10
 *   geoportal ingest roads.gpkg --output roads.geojson --json
 *
 * Exit codes: 0 success, 2 ingestion error, 3 configuration error.
 */

import type { Command } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { z } from 'zod';
import { GEOMETRY_COLUMN } from '../../core/types.js';
import { createIngestionPipeline } from '../../ingestion/pipeline.js';
import { getBasemap } from '../../presentation/basemaps.js';
import { createExportArtifact } from '../../presentation/export.js';
import { buildMapView } from '../../presentation/map-view.js';
import { summarizeDataset, type DatasetSummary } from '../../presentation/summary.js';
import { EXIT_CODES, loadCommandConfig, type ExitCode, type GlobalOptions } from '../lib/context.js';
import { consoleOutput, formatJson, formatTable, type CommandOutput } from '../lib/output.js';

const IngestOptionsSchema = z.object({
  config: z.string().optional(),
  basemap: z.string().optional(),
  output: z.string().optional(),
  preview: z.coerce.number().int().min(0).optional(),
  json: z.boolean().optional(),
});

export type IngestOptions = z.infer<typeof IngestOptionsSchema>;

/**
 * Register the ingest command
 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest <file>')
    .description('Ingest a .geojson, .kml, .gpkg or zipped shapefile')
    .option('--basemap <key>', 'Basemap for the map view')
    .option('-o, --output <file>', 'Write the normalized dataset as GeoJSON')
    .option('--preview <n>', 'Rows shown in the preview table')
    .option('--json', 'Output as JSON')
    .action(async (file: string, _options: unknown, command: Command) => {
      const options = IngestOptionsSchema.parse(command.optsWithGlobals());
      process.exitCode = await executeIngest(file, options);
    });
}

function previewTable(summary: DatasetSummary): string {
  const columns = summary.columns.map((column) => ({
    key: column,
    header: column,
    maxWidth: column === GEOMETRY_COLUMN ? 60 : 30,
  }));
  return formatTable(summary.preview, columns);
}

/**
 * Execute the ingest command
 */
export async function executeIngest(
  file: string,
  options: IngestOptions & GlobalOptions,
  output: CommandOutput = consoleOutput
): Promise<ExitCode> {
  const loaded = await loadCommandConfig(options, output);
  if (!loaded.ok) {
    return loaded.exitCode;
  }
  const { config } = loaded;

  let bytes: Buffer;
  try {
    bytes = await readFile(file);
  } catch (error) {
    output.err(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_CODES.INGEST_ERROR;
  }

  const pipeline = createIngestionPipeline({ scratchRoot: config.scratchRoot });
  const result = await pipeline.ingest({ filename: basename(file), bytes });

  if (!result.success) {
    if (options.json) {
      output.out(formatJson({ success: false, file, error: result.error }));
    } else {
      output.err(`Ingestion failed (${result.error.kind}): ${result.error.message}`);
    }
    return EXIT_CODES.INGEST_ERROR;
  }

  const dataset = result.data;
  const summary = summarizeDataset(dataset, options.preview ?? config.previewRows);
  const basemap = getBasemap(options.basemap, config.defaultBasemap);
  const view = buildMapView(dataset, basemap, config.map);

  if (options.output) {
    const artifact = createExportArtifact(dataset);
    await writeFile(options.output, artifact.body, 'utf-8');
  }

  if (options.json) {
    output.out(
      formatJson({
        success: true,
        file,
        summary,
        map: {
          center: view.center,
          centerSource: view.centerSource,
          zoom: view.zoom,
          basemap: view.basemap.key,
        },
        output: options.output ?? null,
      })
    );
    return EXIT_CODES.SUCCESS;
  }

  const declared = summary.declaredCrs ?? 'none declared';
  output.out(`File: ${file}`);
  output.out(`Driver: ${dataset.source.driver}`);
  output.out(`Features: ${summary.featureCount}`);
  output.out(`CRS: ${summary.crs} (source: ${declared}, ${summary.crsAction})`);
  output.out(
    `Map: center ${view.center[0].toFixed(4)}, ${view.center[1].toFixed(4)} zoom ${view.zoom} on ${view.basemap.key}`
  );
  output.out('');
  output.out(previewTable(summary));
  if (options.output) {
    output.out('');
    output.out(`GeoJSON written to ${options.output}`);
  }
  return EXIT_CODES.SUCCESS;
}
