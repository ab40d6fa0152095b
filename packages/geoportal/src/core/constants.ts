/**
 * Geoportal constants
 */

import type { DirectExtension, DriverName, UploadExtension } from './types.js';

/**
 * Single-file formats and the driver each one opens with
 */
export const DIRECT_FORMATS: Readonly<Record<DirectExtension, DriverName>> = {
  '.geojson': 'GeoJSON',
  '.kml': 'KML',
  '.gpkg': 'GPKG',
};

export const SUPPORTED_EXTENSIONS: readonly UploadExtension[] = [
  '.geojson',
  '.kml',
  '.gpkg',
  '.zip',
];

/** Geometry-bearing member of a shapefile bundle */
export const SHAPEFILE_DESCRIPTOR_EXTENSION = '.shp';

/** Companions the shapefile driver cannot open without */
export const SHAPEFILE_REQUIRED_COMPANIONS = ['.shx', '.dbf'] as const;

/** Prefix of every scratch file and directory */
export const SCRATCH_PREFIX = 'geoportal-';

/** Jakarta, used when a dataset has no usable centroid */
export const DEFAULT_MAP_CENTER: readonly [number, number] = [-6.2088, 106.8456];

export const DEFAULT_MAP_ZOOM = 10;

export const DEFAULT_PREVIEW_ROWS = 5;

/** Upload size limit of the HTTP surface (200 MiB) */
export const DEFAULT_MAX_UPLOAD_BYTES = 200 * 1024 * 1024;

export const DATA_LAYER_NAME = 'Geospatial data';

export const EXPORT_FILE_NAME = 'data.geojson';

export const EXPORT_MIME_TYPE = 'application/json';
