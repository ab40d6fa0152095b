/**
 * GeoJSON validation schemas (Zod)
 *
 * Structural validation of untrusted GeoJSON: geometry types, coordinate
 * nesting depth and finite numbers. Geometric validity (ring closure,
 * self-intersection) is not checked.
 *
 * @module validation/geojson-schema
 */

import type { Geometry } from 'geojson';
import { z } from 'zod';

const PositionSchema = z.array(z.number().finite()).min(2, 'A position needs at least two ordinates');

const PointSchema = z.object({
  type: z.literal('Point'),
  coordinates: PositionSchema,
});

const MultiPointSchema = z.object({
  type: z.literal('MultiPoint'),
  coordinates: z.array(PositionSchema),
});

const LineStringSchema = z.object({
  type: z.literal('LineString'),
  coordinates: z.array(PositionSchema),
});

const MultiLineStringSchema = z.object({
  type: z.literal('MultiLineString'),
  coordinates: z.array(z.array(PositionSchema)),
});

const PolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(z.array(PositionSchema)),
});

const MultiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(z.array(PositionSchema))),
});

export const GeometrySchema: z.ZodType<Geometry> = z.lazy(() =>
  z.union([
    PointSchema,
    MultiPointSchema,
    LineStringSchema,
    MultiLineStringSchema,
    PolygonSchema,
    MultiPolygonSchema,
    GeometryCollectionSchema,
  ])
);

const GeometryCollectionSchema = z.object({
  type: z.literal('GeometryCollection'),
  geometries: z.array(GeometrySchema),
});

export const PropertiesSchema = z.record(z.unknown());

/**
 * Legacy (2008 GeoJSON) named CRS member
 */
export const NamedCrsSchema = z.object({
  type: z.literal('name'),
  properties: z.object({ name: z.string().min(1) }),
});

export const FeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: GeometrySchema.nullable(),
  properties: PropertiesSchema.nullable().optional(),
  id: z.union([z.string(), z.number()]).optional(),
});

export const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(FeatureSchema),
  crs: NamedCrsSchema.optional(),
});

/**
 * Single Feature uploaded on its own, possibly carrying a CRS member
 */
export const StandaloneFeatureSchema = FeatureSchema.extend({
  crs: NamedCrsSchema.optional(),
});

/**
 * Summarize the first few validation issues for an error message
 */
export function describeIssues(error: z.ZodError, limit = 3): string {
  const parts = error.issues.slice(0, limit).map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  if (error.issues.length > limit) {
    parts.push(`... and ${error.issues.length - limit} more`);
  }
  return parts.join('; ');
}
