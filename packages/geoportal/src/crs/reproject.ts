/**
 * Geometry reprojection with proj4
 *
 * Transforms the X/Y ordinates of every position into WGS84 longitude and
 * latitude. Extra ordinates (Z, M) are carried over unchanged.
 *
 * @module crs/reproject
 */

import type { Geometry, Position } from 'geojson';
import proj4 from 'proj4';
import { IngestError, describeError } from '../core/errors.js';
import { WGS84 } from '../core/types.js';
import type { ResolvedCrs } from './registry.js';

function buildConverter(crs: ResolvedCrs) {
  try {
    return proj4(crs.definition, WGS84);
  } catch (error) {
    throw new IngestError(
      'ReprojectionFailure',
      `Cannot build a transform from ${crs.label} to ${WGS84}: ${describeError(error)}`,
      { cause: error }
    );
  }
}

export interface CoordinateTransform {
  readonly source: string;
  forward(position: Position): Position;
}

/**
 * Build a transform from `crs` into WGS84
 *
 * @throws IngestError ReprojectionFailure when proj4 cannot parse the definition
 */
export function createTransform(crs: ResolvedCrs): CoordinateTransform {
  const converter = buildConverter(crs);

  return {
    source: crs.label,
    forward(position: Position): Position {
      const [x, y, ...rest] = position;
      if (x === undefined || y === undefined) {
        throw new IngestError('ReprojectionFailure', 'Position has fewer than two ordinates');
      }

      let output: number[];
      try {
        output = converter.forward([x, y]);
      } catch (error) {
        throw new IngestError(
          'ReprojectionFailure',
          `Cannot transform (${x}, ${y}) from ${crs.label}: ${describeError(error)}`,
          { cause: error }
        );
      }

      const [lon, lat] = output;
      if (lon === undefined || lat === undefined || !Number.isFinite(lon) || !Number.isFinite(lat)) {
        throw new IngestError(
          'ReprojectionFailure',
          `Transform of (${x}, ${y}) from ${crs.label} produced no valid coordinate`
        );
      }
      return [lon, lat, ...rest];
    },
  };
}

/**
 * Apply a transform to every position of a geometry
 */
export function reprojectGeometry(geometry: Geometry, transform: CoordinateTransform): Geometry {
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: transform.forward(geometry.coordinates) };

    case 'MultiPoint':
      return {
        type: 'MultiPoint',
        coordinates: geometry.coordinates.map((coord) => transform.forward(coord)),
      };

    case 'LineString':
      return {
        type: 'LineString',
        coordinates: geometry.coordinates.map((coord) => transform.forward(coord)),
      };

    case 'MultiLineString':
      return {
        type: 'MultiLineString',
        coordinates: geometry.coordinates.map((line) =>
          line.map((coord) => transform.forward(coord))
        ),
      };

    case 'Polygon':
      return {
        type: 'Polygon',
        coordinates: geometry.coordinates.map((ring) =>
          ring.map((coord) => transform.forward(coord))
        ),
      };

    case 'MultiPolygon':
      return {
        type: 'MultiPolygon',
        coordinates: geometry.coordinates.map((polygon) =>
          polygon.map((ring) => ring.map((coord) => transform.forward(coord)))
        ),
      };

    case 'GeometryCollection':
      return {
        type: 'GeometryCollection',
        geometries: geometry.geometries.map((member) => reprojectGeometry(member, transform)),
      };
  }
}
