/**
 * Dataset Normalizer
 *
 * Loads a resolved file with its format driver, checks that every feature
 * carries a geometry and brings all coordinates into WGS84.
 *
 * CRS POLICY:
 * - nothing declared: WGS84 is assigned and coordinates stay as they are
 * - WGS84 declared: coordinates stay as they are
 * - anything else: every position is reprojected with proj4
 *
 * Geometries are never repaired.
 *
 * @module ingestion/dataset-normalizer
 */

import type { Geometry } from 'geojson';
import { IngestError, describeError } from '../core/errors.js';
import {
  GEOMETRY_COLUMN,
  WGS84,
  type AttributeValue,
  type CrsAction,
  type GeoDataset,
  type GeoFeature,
  type RawDataset,
  type ResolvedPath,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { resolveCrs } from '../crs/registry.js';
import { createTransform, reprojectGeometry } from '../crs/reproject.js';
import { openDataset } from '../drivers/index.js';

const logger = createLogger({ module: 'dataset-normalizer' });

export type DatasetOpener = (resolved: ResolvedPath) => Promise<RawDataset>;

/**
 * Coerce an attribute into a scalar table cell
 */
export function toAttributeValue(value: unknown): AttributeValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  return JSON.stringify(value);
}

/**
 * Attribute columns in stable order: the driver's field order when it knows
 * one, otherwise first appearance across features
 */
export function collectColumns(raw: RawDataset): string[] {
  const seen = new Set<string>(raw.fields ?? []);
  for (const feature of raw.features) {
    for (const key of Object.keys(feature.properties)) {
      seen.add(key);
    }
  }
  if (seen.delete(GEOMETRY_COLUMN)) {
    logger.warn('Dropping attribute that collides with the geometry column', { column: GEOMETRY_COLUMN });
  }
  return [...seen];
}

function freezeGeometry<T>(value: T): T {
  if (Array.isArray(value)) {
    for (const item of value) freezeGeometry(item);
  } else if (typeof value === 'object' && value !== null) {
    for (const item of Object.values(value)) freezeGeometry(item);
  }
  Object.freeze(value);
  return value;
}

export class DatasetNormalizer {
  constructor(private readonly open: DatasetOpener = openDataset) {}

  /**
   * @throws IngestError DatasetUnreadable, MissingGeometry or ReprojectionFailure
   */
  async normalize(resolved: ResolvedPath): Promise<GeoDataset> {
    const raw = await this.load(resolved);

    if (raw.features.length === 0) {
      throw new IngestError('MissingGeometry', 'The file was read but contains no features');
    }
    const geometries: Geometry[] = raw.features.map((feature, index) => {
      if (feature.geometry === null) {
        throw new IngestError(
          'MissingGeometry',
          `The file was read but feature ${index + 1} has no geometry`
        );
      }
      return feature.geometry;
    });

    const { crsAction, declaredCrs, normalized } = this.normalizeCrs(raw, geometries);
    const attributeColumns = collectColumns(raw);

    const features = raw.features.map((feature, index): GeoFeature => {
      const properties: Record<string, AttributeValue> = {};
      for (const column of attributeColumns) {
        properties[column] = toAttributeValue(feature.properties[column]);
      }
      const geometry = normalized[index];
      if (geometry === undefined) {
        throw new Error(`Geometry ${index} lost during normalization`);
      }
      return Object.freeze({ properties: Object.freeze(properties), geometry: freezeGeometry(geometry) });
    });

    logger.info('Dataset normalized', {
      driver: resolved.driver,
      featureCount: features.length,
      declaredCrs,
      crsAction,
    });

    return Object.freeze({
      features: Object.freeze(features),
      columns: Object.freeze([...attributeColumns, GEOMETRY_COLUMN]),
      crs: WGS84,
      source: Object.freeze({ driver: resolved.driver, declaredCrs, crsAction }),
    });
  }

  private async load(resolved: ResolvedPath): Promise<RawDataset> {
    try {
      return await this.open(resolved);
    } catch (error) {
      if (error instanceof IngestError) throw error;
      throw new IngestError('DatasetUnreadable', `Failed to load file: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private normalizeCrs(
    raw: RawDataset,
    geometries: Geometry[]
  ): { crsAction: CrsAction; declaredCrs: string | null; normalized: Geometry[] } {
    if (raw.declaredCrs === null) {
      return { crsAction: 'assigned', declaredCrs: null, normalized: geometries };
    }

    const crs = resolveCrs(raw.declaredCrs);
    if (crs.isWgs84) {
      return { crsAction: 'none', declaredCrs: crs.label, normalized: geometries };
    }

    const transform = createTransform(crs);
    return {
      crsAction: 'reprojected',
      declaredCrs: crs.label,
      normalized: geometries.map((geometry) => reprojectGeometry(geometry, transform)),
    };
  }
}
