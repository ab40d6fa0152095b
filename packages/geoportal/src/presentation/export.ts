/**
 * GeoJSON export of a normalized dataset
 *
 * Every non-geometry column becomes a property. Coordinates are already
 * lon/lat in EPSG:4326, so the output needs no `crs` member.
 */

import type { Feature, FeatureCollection, Geometry } from 'geojson';
import { EXPORT_FILE_NAME, EXPORT_MIME_TYPE } from '../core/constants.js';
import { GEOMETRY_COLUMN, type AttributeValue, type GeoDataset } from '../core/types.js';

export type ExportProperties = Record<string, AttributeValue>;

export interface ExportArtifact {
  readonly fileName: string;
  readonly mimeType: string;
  readonly body: string;
}

export function attributeColumns(dataset: GeoDataset): string[] {
  return dataset.columns.filter((column) => column !== GEOMETRY_COLUMN);
}

export function toFeatureCollection(dataset: GeoDataset): FeatureCollection<Geometry, ExportProperties> {
  const columns = attributeColumns(dataset);

  const features = dataset.features.map((feature): Feature<Geometry, ExportProperties> => {
    const properties: ExportProperties = {};
    for (const column of columns) {
      properties[column] = feature.properties[column] ?? null;
    }
    return { type: 'Feature', properties, geometry: feature.geometry };
  });

  return { type: 'FeatureCollection', features };
}

export function serializeGeoJson(dataset: GeoDataset, pretty = false): string {
  const collection = toFeatureCollection(dataset);
  return pretty ? JSON.stringify(collection, null, 2) : JSON.stringify(collection);
}

/**
 * Downloadable GeoJSON file for the current dataset
 */
export function createExportArtifact(dataset: GeoDataset): ExportArtifact {
  return {
    fileName: EXPORT_FILE_NAME,
    mimeType: EXPORT_MIME_TYPE,
    body: serializeGeoJson(dataset),
  };
}
