/**
 * GeoJSON driver
 *
 * Accepts a FeatureCollection, a single Feature or a bare geometry. A legacy
 * `crs` member is reported as the declared CRS; without one no CRS is
 * declared and the normalizer assigns WGS84.
 */

import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import { IngestError, describeError } from '../core/errors.js';
import type { DeclaredCrs, RawDataset } from '../core/types.js';
import {
  FeatureCollectionSchema,
  GeometrySchema,
  StandaloneFeatureSchema,
  describeIssues,
  type NamedCrsSchema,
} from '../validation/geojson-schema.js';

type NamedCrs = z.infer<typeof NamedCrsSchema>;

function declaredCrsOf(crs: NamedCrs | undefined): DeclaredCrs | null {
  return crs ? { type: 'name', value: crs.properties.name } : null;
}

function documentType(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string') {
    return value.type;
  }
  return undefined;
}

function invalid(error: z.ZodError): IngestError {
  return new IngestError('DatasetUnreadable', `Invalid GeoJSON: ${describeIssues(error)}`, {
    cause: error,
  });
}

/**
 * Parse GeoJSON text into a raw dataset
 *
 * @throws IngestError DatasetUnreadable
 */
export function parseGeoJson(text: string): RawDataset {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new IngestError('DatasetUnreadable', `GeoJSON is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }

  const type = documentType(document);

  if (type === 'FeatureCollection') {
    const parsed = FeatureCollectionSchema.safeParse(document);
    if (!parsed.success) throw invalid(parsed.error);
    return {
      features: parsed.data.features.map((feature) => ({
        properties: feature.properties ?? {},
        geometry: feature.geometry,
      })),
      declaredCrs: declaredCrsOf(parsed.data.crs),
    };
  }

  if (type === 'Feature') {
    const parsed = StandaloneFeatureSchema.safeParse(document);
    if (!parsed.success) throw invalid(parsed.error);
    return {
      features: [{ properties: parsed.data.properties ?? {}, geometry: parsed.data.geometry }],
      declaredCrs: declaredCrsOf(parsed.data.crs),
    };
  }

  if (type === undefined) {
    throw new IngestError('DatasetUnreadable', 'Invalid GeoJSON: missing "type" member');
  }

  const parsed = GeometrySchema.safeParse(document);
  if (!parsed.success) throw invalid(parsed.error);
  return {
    features: [{ properties: {}, geometry: parsed.data }],
    declaredCrs: null,
  };
}

export async function readGeoJson(path: string): Promise<RawDataset> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IngestError('DatasetUnreadable', `Cannot read GeoJSON file: ${describeError(error)}`, {
      cause: error,
    });
  }
  // Tolerate a UTF-8 byte order mark
  return parseGeoJson(text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);
}
