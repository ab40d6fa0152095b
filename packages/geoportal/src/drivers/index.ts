/**
 * Format drivers
 *
 * @module drivers
 */

import type { DriverName, RawDataset, ResolvedPath } from '../core/types.js';
import { readGeoJson } from './geojson.js';
import { readGeoPackage } from './geopackage.js';
import { readKml } from './kml.js';
import { readShapefile } from './shapefile.js';

export type DriverReader = (path: string) => Promise<RawDataset>;

export const DRIVERS: Readonly<Record<DriverName, DriverReader>> = {
  GeoJSON: readGeoJson,
  KML: readKml,
  GPKG: readGeoPackage,
  'ESRI Shapefile': readShapefile,
};

/**
 * Open a resolved path with the driver the resolver chose
 */
export function openDataset(resolved: ResolvedPath): Promise<RawDataset> {
  return DRIVERS[resolved.driver](resolved.path);
}

export { parseGeoJson, readGeoJson } from './geojson.js';
export { decodeGeoPackageGeometry, readGeoPackage } from './geopackage.js';
export { parseKml, readKml } from './kml.js';
export { encodingFromCodePage, readShapefile } from './shapefile.js';
