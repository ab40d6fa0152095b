/**
 * Map view model
 *
 * Everything the rendering collaborator needs to draw one map: where to
 * center it, which tiles to put underneath and the data layer on top.
 * Positions in the view model are [lat, lon], as map widgets take them.
 */

import type { Feature, FeatureCollection, Geometry, Point } from 'geojson';
import * as turf from '@turf/turf';
import { DATA_LAYER_NAME, DEFAULT_MAP_CENTER, DEFAULT_MAP_ZOOM } from '../core/constants.js';
import type { GeoDataset } from '../core/types.js';
import type { BasemapDefinition } from './basemaps.js';
import { attributeColumns, toFeatureCollection, type ExportProperties } from './export.js';

export type LatLon = readonly [number, number];

export interface MapLayer {
  readonly name: string;
  readonly data: FeatureCollection<Geometry, ExportProperties>;
  /** Attribute columns shown when hovering a feature */
  readonly tooltipFields: readonly string[];
}

export interface MapView {
  readonly center: LatLon;
  readonly centerSource: 'dataset' | 'default';
  readonly zoom: number;
  readonly basemap: BasemapDefinition;
  readonly layer: MapLayer | null;
  readonly layerControl: true;
}

export interface MapViewOptions {
  readonly defaultCenter?: LatLon;
  readonly defaultZoom?: number;
}

/**
 * Mean of the distinct per-feature centroids, or null when it is not a finite
 * position. Features without any position contribute nothing.
 */
export function datasetCenter(dataset: GeoDataset): LatLon | null {
  const seen = new Set<string>();
  const centroids: Feature<Point>[] = [];
  for (const feature of dataset.features) {
    if (turf.coordAll(feature.geometry).length === 0) continue;
    const centroid = turf.centroid(feature.geometry);
    const key = centroid.geometry.coordinates.join(',');
    if (seen.has(key)) continue;
    seen.add(key);
    centroids.push(centroid);
  }
  if (centroids.length === 0) {
    return null;
  }

  const [lon, lat] = turf.centroid(turf.featureCollection(centroids)).geometry.coordinates;
  if (lon === undefined || lat === undefined || !Number.isFinite(lon) || !Number.isFinite(lat)) {
    return null;
  }
  return [lat, lon];
}

export function buildMapView(
  dataset: GeoDataset | null,
  basemap: BasemapDefinition,
  options: MapViewOptions = {}
): MapView {
  const zoom = options.defaultZoom ?? DEFAULT_MAP_ZOOM;
  const fallback = options.defaultCenter ?? DEFAULT_MAP_CENTER;

  if (dataset === null) {
    return { center: fallback, centerSource: 'default', zoom, basemap, layer: null, layerControl: true };
  }

  const center = datasetCenter(dataset);
  return {
    center: center ?? fallback,
    centerSource: center === null ? 'default' : 'dataset',
    zoom,
    basemap,
    layer: {
      name: DATA_LAYER_NAME,
      data: toFeatureCollection(dataset),
      tooltipFields: attributeColumns(dataset),
    },
    layerControl: true,
  };
}
