/**
 * Dataset summary: counts, columns and the first rows as a table, with the
 * geometry rendered as WKT.
 */

import type { Geometry } from 'geojson';
import * as turf from '@turf/turf';
import wkx from 'wkx';
import { DEFAULT_PREVIEW_ROWS } from '../core/constants.js';
import { GEOMETRY_COLUMN, type AttributeValue, type CrsAction, type GeoDataset } from '../core/types.js';
import { attributeColumns, toFeatureCollection } from './export.js';

export type PreviewRow = Readonly<Record<string, AttributeValue>>;

/** [minLon, minLat, maxLon, maxLat] */
export type Bounds = readonly [number, number, number, number];

export interface DatasetSummary {
  readonly featureCount: number;
  readonly columns: readonly string[];
  /** Feature count per geometry type, in first-seen order */
  readonly geometryTypes: Readonly<Record<string, number>>;
  readonly bounds: Bounds | null;
  readonly crs: string;
  readonly declaredCrs: string | null;
  readonly crsAction: CrsAction;
  readonly preview: readonly PreviewRow[];
}

export function geometryToWkt(geometry: Geometry): string {
  return wkx.Geometry.parseGeoJSON(geometry).toWkt();
}

function datasetBounds(dataset: GeoDataset): Bounds | null {
  const box = turf.bbox(toFeatureCollection(dataset));
  // 3D boxes carry min/max Z after each corner
  const bounds: Bounds =
    box.length === 6 ? [box[0], box[1], box[3], box[4]] : [box[0], box[1], box[2], box[3]];
  return bounds.every(Number.isFinite) ? bounds : null;
}

export function summarizeDataset(dataset: GeoDataset, previewRows = DEFAULT_PREVIEW_ROWS): DatasetSummary {
  const geometryTypes: Record<string, number> = {};
  for (const feature of dataset.features) {
    geometryTypes[feature.geometry.type] = (geometryTypes[feature.geometry.type] ?? 0) + 1;
  }

  const columns = attributeColumns(dataset);
  const preview = dataset.features.slice(0, Math.max(0, previewRows)).map((feature): PreviewRow => {
    const row: Record<string, AttributeValue> = {};
    for (const column of columns) {
      row[column] = feature.properties[column] ?? null;
    }
    row[GEOMETRY_COLUMN] = geometryToWkt(feature.geometry);
    return row;
  });

  return {
    featureCount: dataset.features.length,
    columns: dataset.columns,
    geometryTypes,
    bounds: datasetBounds(dataset),
    crs: dataset.crs,
    declaredCrs: dataset.source.declaredCrs,
    crsAction: dataset.source.crsAction,
    preview,
  };
}
