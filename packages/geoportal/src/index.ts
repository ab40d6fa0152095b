/**
 * Geoportal
 *
 * Turns uploaded geospatial files (GeoJSON, KML, GeoPackage, zipped
 * shapefiles) into immutable WGS84 datasets ready for map display and
 * GeoJSON export.
 *
 * @example
 * ```typescript
 * import { createIngestionPipeline, summarizeDataset } from 'geoportal';
 *
 * const pipeline = createIngestionPipeline({ scratchRoot: '/tmp' });
 * const result = await pipeline.ingest({ filename: 'parcels.zip', bytes });
 * if (result.success) {
 *   console.log(summarizeDataset(result.data).featureCount);
 * } else {
 *   console.error(result.error.kind, result.error.message);
 * }
 * ```
 *
 * @module geoportal
 */

// Core
export * from './core/types.js';
export { INGEST_ERROR_KINDS, IngestError, isIngestError, type IngestErrorInfo, type IngestErrorKind } from './core/errors.js';
export {
  ConfigError,
  DEFAULT_CONFIG,
  GeoportalConfigSchema,
  loadConfig,
  type ConfigOverrides,
  type GeoportalConfig,
  type LoadConfigOptions,
  type LoadedConfig,
} from './core/config.js';
export { SUPPORTED_EXTENSIONS } from './core/constants.js';
export { Logger, createLogger, logger, type LogFormat, type LogLevel, type LogSink, type LoggerOptions } from './core/utils/logger.js';

// Ingestion
export { ScratchHandle, ScratchManager, type ScratchManagerOptions } from './ingestion/scratch.js';
export { ArchiveResolver, classifyUpload, findShapefileCandidates } from './ingestion/archive-resolver.js';
export { DatasetNormalizer, type DatasetOpener } from './ingestion/dataset-normalizer.js';
export {
  IngestionPipeline,
  createIngestionPipeline,
  type DatasetLoader,
  type IngestionPipelineOptions,
  type UploadResolver,
} from './ingestion/pipeline.js';

// Drivers and CRS
export { DRIVERS, openDataset, type DriverReader } from './drivers/index.js';
export { resolveCrs, type ResolvedCrs } from './crs/registry.js';
export { createTransform, reprojectGeometry, type CoordinateTransform } from './crs/reproject.js';

// Presentation
export {
  BASEMAPS,
  BASEMAP_KEYS,
  DEFAULT_BASEMAP,
  getBasemap,
  isBasemapKey,
  listBasemaps,
  type BasemapDefinition,
  type BasemapKey,
} from './presentation/basemaps.js';
export { buildMapView, type MapLayer, type MapView, type MapViewOptions } from './presentation/map-view.js';
export { summarizeDataset, type DatasetSummary, type PreviewRow } from './presentation/summary.js';
export {
  createExportArtifact,
  serializeGeoJson,
  toFeatureCollection,
  type ExportArtifact,
} from './presentation/export.js';

// Serving
export { GeoportalAPI, createGeoportalAPI, type APIResponse, type GeoportalAPIOptions } from './serving/api.js';
