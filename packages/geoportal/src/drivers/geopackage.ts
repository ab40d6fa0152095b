/**
 * GeoPackage driver
 *
 * Reads the first feature table (by table name) of an OGC GeoPackage with
 * better-sqlite3. Geometry blobs are a GeoPackage header followed by WKB,
 * which wkx decodes.
 *
 * CRS: the layer's `srs_id` is looked up in `gpkg_spatial_ref_sys`.
 * srs_id -1 and 0 are the GeoPackage "undefined" systems and declare nothing.
 */

import Database from 'better-sqlite3';
import type { Geometry } from 'geojson';
import wkx from 'wkx';
import { z } from 'zod';
import { IngestError, describeError } from '../core/errors.js';
import type { DeclaredCrs, RawDataset, RawFeature } from '../core/types.js';
import { GeometrySchema } from '../validation/geojson-schema.js';

const GeometryColumnRowSchema = z.object({
  table_name: z.string(),
  column_name: z.string(),
  srs_id: z.number().int(),
});

const SpatialRefRowSchema = z.object({
  organization: z.string().nullable(),
  organization_coordsys_id: z.number().int().nullable(),
  definition: z.string().nullable(),
});

const TableInfoRowSchema = z.object({
  name: z.string(),
  type: z.string(),
  pk: z.number().int(),
});

const RowSchema = z.record(z.unknown());

/** Envelope byte length by the envelope indicator bits of the header flags */
const ENVELOPE_SIZES = [0, 32, 48, 48, 64] as const;

/**
 * Decode a GeoPackage geometry blob
 *
 * @returns null for the empty geometry flag
 */
export function decodeGeoPackageGeometry(blob: Uint8Array): Geometry | null {
  if (blob.length < 8 || blob[0] !== 0x47 || blob[1] !== 0x50) {
    throw new Error('geometry blob lacks the "GP" magic');
  }

  const flags = blob[3] ?? 0;
  const envelopeSize = ENVELOPE_SIZES[(flags >> 1) & 0x07];
  if (envelopeSize === undefined) {
    throw new Error(`invalid envelope indicator in flags 0x${flags.toString(16)}`);
  }
  if ((flags & 0x10) !== 0) {
    return null;
  }

  const wkb = Buffer.from(blob.buffer, blob.byteOffset + 8 + envelopeSize, blob.length - 8 - envelopeSize);
  const parsed = GeometrySchema.safeParse(wkx.Geometry.parse(wkb).toGeoJSON());
  if (!parsed.success) {
    throw new Error('WKB does not decode to a GeoJSON geometry');
  }
  return parsed.data;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function attributeValue(value: unknown): unknown {
  return value instanceof Uint8Array ? Buffer.from(value).toString('base64') : value;
}

function declaredCrsFor(db: Database.Database, srsId: number): DeclaredCrs | null {
  if (srsId === -1 || srsId === 0) {
    return null;
  }
  if (srsId === 4326) {
    return { type: 'name', value: 'EPSG:4326' };
  }

  const row = SpatialRefRowSchema.safeParse(
    db
      .prepare(
        'SELECT organization, organization_coordsys_id, definition FROM gpkg_spatial_ref_sys WHERE srs_id = ?'
      )
      .get(srsId)
  );
  if (!row.success) {
    throw new IngestError('DatasetUnreadable', `GeoPackage references unknown srs_id ${srsId}`);
  }

  const { organization, organization_coordsys_id: code, definition } = row.data;
  if (organization?.toUpperCase() === 'EPSG' && code !== null) {
    return { type: 'name', value: `EPSG:${code}` };
  }
  if (definition !== null && definition.trim() !== '' && definition.trim().toLowerCase() !== 'undefined') {
    return { type: 'wkt', value: definition };
  }
  return { type: 'name', value: `${organization ?? 'UNKNOWN'}:${code ?? srsId}` };
}

function readLayer(db: Database.Database): RawDataset {
  const layers = z
    .array(GeometryColumnRowSchema)
    .safeParse(
      db
        .prepare(
          `SELECT g.table_name, g.column_name, g.srs_id
           FROM gpkg_geometry_columns g
           JOIN gpkg_contents c ON c.table_name = g.table_name
           WHERE c.data_type = 'features'
           ORDER BY g.table_name`
        )
        .all()
    );
  if (!layers.success) {
    throw new IngestError('DatasetUnreadable', 'GeoPackage geometry column metadata is malformed');
  }

  const layer = layers.data[0];
  if (layer === undefined) {
    throw new IngestError('DatasetUnreadable', 'GeoPackage contains no feature table');
  }

  const columns = z
    .array(TableInfoRowSchema)
    .parse(db.prepare(`PRAGMA table_info(${quoteIdentifier(layer.table_name)})`).all());
  const primaryKey = columns.find((column) => column.pk > 0 && column.type.toUpperCase() === 'INTEGER');
  const fields = columns
    .map((column) => column.name)
    .filter((name) => name !== layer.column_name && name !== primaryKey?.name);

  const orderBy = primaryKey ? ` ORDER BY ${quoteIdentifier(primaryKey.name)}` : '';
  const rows = db.prepare(`SELECT * FROM ${quoteIdentifier(layer.table_name)}${orderBy}`).all();

  const features = rows.map((value, index): RawFeature => {
    const row = RowSchema.parse(value);
    const blob = row[layer.column_name];
    let geometry: Geometry | null = null;
    if (blob instanceof Uint8Array) {
      try {
        geometry = decodeGeoPackageGeometry(blob);
      } catch (error) {
        throw new IngestError(
          'DatasetUnreadable',
          `GeoPackage feature ${index + 1} of "${layer.table_name}" has an unreadable geometry: ${describeError(error)}`,
          { cause: error }
        );
      }
    }

    const properties: Record<string, unknown> = {};
    for (const field of fields) {
      properties[field] = attributeValue(row[field]);
    }
    return { properties, geometry };
  });

  return {
    features,
    fields,
    declaredCrs: declaredCrsFor(db, layer.srs_id),
  };
}

/**
 * Read the first feature table of a GeoPackage
 *
 * @throws IngestError DatasetUnreadable
 */
export async function readGeoPackage(path: string): Promise<RawDataset> {
  let db: Database.Database;
  try {
    db = new Database(path, { readonly: true, fileMustExist: true });
  } catch (error) {
    throw new IngestError('DatasetUnreadable', `Cannot open GeoPackage: ${describeError(error)}`, {
      cause: error,
    });
  }

  try {
    return readLayer(db);
  } catch (error) {
    if (error instanceof IngestError) throw error;
    throw new IngestError('DatasetUnreadable', `Cannot read GeoPackage: ${describeError(error)}`, {
      cause: error,
    });
  } finally {
    db.close();
  }
}
