/**
 * Test Fixture Builders
 *
 * SCOPE: Geospatial files built in process, byte for byte, so no test depends
 * on checked-in binaries or the network.
 *
 * - Point shapefiles (.shp/.shx/.dbf)
 * - ZIP archives (adm-zip)
 * - GeoPackages (better-sqlite3 + wkx)
 * - Normalized datasets
 * - Temporary scratch roots
 */

import AdmZip from 'adm-zip';
import Database from 'better-sqlite3';
import type { Feature, FeatureCollection, Geometry } from 'geojson';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import wkx from 'wkx';
import { GEOMETRY_COLUMN, WGS84, type GeoDataset, type GeoFeature } from '../../core/types.js';

// ============================================================================
// Shapefile
// ============================================================================

export interface PointRecord {
  readonly x: number;
  readonly y: number;
  readonly attributes: Readonly<Record<string, string | number>>;
}

export interface DbfField {
  readonly name: string;
  readonly type: 'C' | 'N';
  readonly length: number;
}

export interface ShapefileBundle {
  readonly shp: Buffer;
  readonly shx: Buffer;
  readonly dbf: Buffer;
}

const SHP_HEADER_BYTES = 100;
const POINT_RECORD_BYTES = 8 + 20;
const SHAPE_TYPE_POINT = 1;

function shpHeader(fileBytes: number, points: readonly PointRecord[]): Buffer {
  const header = Buffer.alloc(SHP_HEADER_BYTES);
  header.writeInt32BE(9994, 0);
  header.writeInt32BE(fileBytes / 2, 24);
  header.writeInt32LE(1000, 28);
  header.writeInt32LE(SHAPE_TYPE_POINT, 32);

  const xs = points.map((p) => p.x);
  const ys = points.map((p) => p.y);
  header.writeDoubleLE(points.length ? Math.min(...xs) : 0, 36);
  header.writeDoubleLE(points.length ? Math.min(...ys) : 0, 44);
  header.writeDoubleLE(points.length ? Math.max(...xs) : 0, 52);
  header.writeDoubleLE(points.length ? Math.max(...ys) : 0, 60);
  return header;
}

function buildDbf(fields: readonly DbfField[], points: readonly PointRecord[], encoding: BufferEncoding): Buffer {
  const headerLength = 32 + 32 * fields.length + 1;
  const recordLength = 1 + fields.reduce((sum, field) => sum + field.length, 0);
  const buffer = Buffer.alloc(headerLength + recordLength * points.length + 1, 0);

  buffer.writeUInt8(0x03, 0);
  buffer.writeUInt8(124, 1);
  buffer.writeUInt8(1, 2);
  buffer.writeUInt8(1, 3);
  buffer.writeUInt32LE(points.length, 4);
  buffer.writeUInt16LE(headerLength, 8);
  buffer.writeUInt16LE(recordLength, 10);

  fields.forEach((field, index) => {
    const offset = 32 + index * 32;
    buffer.write(field.name.slice(0, 10), offset, 'ascii');
    buffer.write(field.type, offset + 11, 'ascii');
    buffer.writeUInt8(field.length, offset + 16);
  });
  buffer.writeUInt8(0x0d, headerLength - 1);

  points.forEach((point, row) => {
    let offset = headerLength + row * recordLength;
    buffer.write(' ', offset, 'ascii');
    offset += 1;
    for (const field of fields) {
      const value = point.attributes[field.name];
      const text = value === undefined ? '' : String(value);
      const cell = Buffer.alloc(field.length, 0x20);
      const encoded = Buffer.from(text, encoding).subarray(0, field.length);
      if (field.type === 'N') {
        encoded.copy(cell, field.length - encoded.length);
      } else {
        encoded.copy(cell, 0);
      }
      cell.copy(buffer, offset);
      offset += field.length;
    }
  });
  buffer.writeUInt8(0x1a, buffer.length - 1);
  return buffer;
}

/**
 * Build a point shapefile bundle
 *
 * @param encoding - how DBF text is written; pair "utf8" with a .cpg of "UTF-8"
 */
export function buildPointShapefile(
  points: readonly PointRecord[],
  fields: readonly DbfField[],
  encoding: BufferEncoding = 'latin1'
): ShapefileBundle {
  const shpBytes = SHP_HEADER_BYTES + POINT_RECORD_BYTES * points.length;
  const shxBytes = SHP_HEADER_BYTES + 8 * points.length;

  const shpRecords = points.map((point, index) => {
    const record = Buffer.alloc(POINT_RECORD_BYTES);
    record.writeInt32BE(index + 1, 0);
    record.writeInt32BE(10, 4);
    record.writeInt32LE(SHAPE_TYPE_POINT, 8);
    record.writeDoubleLE(point.x, 12);
    record.writeDoubleLE(point.y, 20);
    return record;
  });

  const shxRecords = points.map((_point, index) => {
    const record = Buffer.alloc(8);
    record.writeInt32BE((SHP_HEADER_BYTES + index * POINT_RECORD_BYTES) / 2, 0);
    record.writeInt32BE(10, 4);
    return record;
  });

  return {
    shp: Buffer.concat([shpHeader(shpBytes, points), ...shpRecords]),
    shx: Buffer.concat([shpHeader(shxBytes, points), ...shxRecords]),
    dbf: buildDbf(fields, points, encoding),
  };
}

export const SAMPLE_FIELDS: readonly DbfField[] = [
  { name: 'name', type: 'C', length: 20 },
  { name: 'pop', type: 'N', length: 8 },
];

export const SAMPLE_POINTS: readonly PointRecord[] = [
  { x: 106.8, y: -6.2, attributes: { name: 'Alpha', pop: 120 } },
  { x: 107.6, y: -6.9, attributes: { name: 'Beta', pop: 45 } },
];

/** WKT of a geographic WGS 84 system, as desktop GIS writes it */
export const WGS84_PRJ =
  'GEOGCS["GCS_WGS_1984",DATUM["D_WGS_1984",SPHEROID["WGS_1984",6378137.0,298.257223563]],' +
  'PRIMEM["Greenwich",0.0],UNIT["Degree",0.0174532925199433]]';

/**
 * Files of a bundle keyed by archive entry name
 */
export function shapefileEntries(
  base: string,
  bundle: ShapefileBundle,
  extras: { readonly prj?: string; readonly cpg?: string } = {}
): Record<string, Buffer> {
  const entries: Record<string, Buffer> = {
    [`${base}.shp`]: bundle.shp,
    [`${base}.shx`]: bundle.shx,
    [`${base}.dbf`]: bundle.dbf,
  };
  if (extras.prj !== undefined) entries[`${base}.prj`] = Buffer.from(extras.prj, 'utf-8');
  if (extras.cpg !== undefined) entries[`${base}.cpg`] = Buffer.from(extras.cpg, 'utf-8');
  return entries;
}

// ============================================================================
// ZIP
// ============================================================================

/**
 * Zip the given entries, in insertion order
 */
export function buildZip(entries: Readonly<Record<string, Buffer | string>>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(entries)) {
    zip.addFile(name, typeof content === 'string' ? Buffer.from(content, 'utf-8') : content);
  }
  return zip.toBuffer();
}

// ============================================================================
// GeoJSON
// ============================================================================

export function featureCollection(
  features: readonly Feature<Geometry | null>[],
  crsName?: string
): FeatureCollection<Geometry | null> & { crs?: { type: 'name'; properties: { name: string } } } {
  return {
    type: 'FeatureCollection',
    features: [...features],
    ...(crsName === undefined ? {} : { crs: { type: 'name' as const, properties: { name: crsName } } }),
  };
}

export function pointFeature(
  lon: number,
  lat: number,
  properties: Record<string, unknown> = {}
): Feature<Geometry> {
  return { type: 'Feature', properties, geometry: { type: 'Point', coordinates: [lon, lat] } };
}

export function geoJsonBytes(value: unknown): Uint8Array {
  return Buffer.from(JSON.stringify(value), 'utf-8');
}

// ============================================================================
// GeoPackage
// ============================================================================

export interface GeoPackageFeature {
  readonly geometry: Geometry | null;
  readonly name: string;
  readonly population: number;
}

export interface GeoPackageOptions {
  readonly tableName?: string;
  readonly srsId?: number;
  /** Extra row for gpkg_spatial_ref_sys */
  readonly srs?: { readonly organization: string; readonly code: number; readonly definition: string };
}

/**
 * GeoPackage geometry blob: "GP" header without envelope, then WKB
 */
export function encodeGeoPackageGeometry(geometry: Geometry | null, srsId: number): Buffer {
  const header = Buffer.alloc(8);
  header.write('GP', 0, 'ascii');
  header.writeUInt8(0, 2);
  // little-endian header; 0x10 marks an empty geometry
  header.writeUInt8(geometry === null ? 0x11 : 0x01, 3);
  header.writeInt32LE(srsId, 4);
  if (geometry === null) {
    return header;
  }
  return Buffer.concat([header, wkx.Geometry.parseGeoJSON(geometry).toWkb()]);
}

/**
 * Write a single-layer GeoPackage to `path`
 */
export function buildGeoPackage(
  path: string,
  features: readonly GeoPackageFeature[],
  options: GeoPackageOptions = {}
): void {
  const tableName = options.tableName ?? 'places';
  const srsId = options.srsId ?? 4326;
  const db = new Database(path);

  try {
    db.exec(`
      CREATE TABLE gpkg_spatial_ref_sys (
        srs_name TEXT NOT NULL,
        srs_id INTEGER PRIMARY KEY,
        organization TEXT NOT NULL,
        organization_coordsys_id INTEGER NOT NULL,
        definition TEXT NOT NULL,
        description TEXT
      );
      CREATE TABLE gpkg_contents (
        table_name TEXT PRIMARY KEY,
        data_type TEXT NOT NULL,
        identifier TEXT,
        srs_id INTEGER
      );
      CREATE TABLE gpkg_geometry_columns (
        table_name TEXT NOT NULL,
        column_name TEXT NOT NULL,
        geometry_type_name TEXT NOT NULL,
        srs_id INTEGER NOT NULL,
        z TINYINT NOT NULL,
        m TINYINT NOT NULL
      );
      INSERT INTO gpkg_spatial_ref_sys VALUES ('Undefined cartesian SRS', -1, 'NONE', -1, 'undefined', NULL);
      INSERT INTO gpkg_spatial_ref_sys VALUES ('Undefined geographic SRS', 0, 'NONE', 0, 'undefined', NULL);
      INSERT INTO gpkg_spatial_ref_sys VALUES ('WGS 84 geodetic', 4326, 'EPSG', 4326, 'GEOGCS["WGS 84"]', NULL);
    `);

    if (options.srs) {
      db.prepare('INSERT INTO gpkg_spatial_ref_sys VALUES (?, ?, ?, ?, ?, NULL)').run(
        `${options.srs.organization}:${options.srs.code}`,
        srsId,
        options.srs.organization,
        options.srs.code,
        options.srs.definition
      );
    }

    db.exec(`
      CREATE TABLE "${tableName}" (
        fid INTEGER PRIMARY KEY AUTOINCREMENT,
        geom BLOB,
        name TEXT,
        population INTEGER
      );
    `);
    db.prepare('INSERT INTO gpkg_contents VALUES (?, ?, ?, ?)').run(tableName, 'features', tableName, srsId);
    db.prepare('INSERT INTO gpkg_geometry_columns VALUES (?, ?, ?, ?, 0, 0)').run(
      tableName,
      'geom',
      'GEOMETRY',
      srsId
    );

    const insert = db.prepare(`INSERT INTO "${tableName}" (geom, name, population) VALUES (?, ?, ?)`);
    for (const feature of features) {
      insert.run(encodeGeoPackageGeometry(feature.geometry, srsId), feature.name, feature.population);
    }
  } finally {
    db.close();
  }
}

// ============================================================================
// Normalized datasets
// ============================================================================

/**
 * Normalized dataset as the pipeline would return it, for presentation tests
 */
export function buildDataset(
  features: readonly GeoFeature[],
  columns: readonly string[],
  source: Partial<GeoDataset['source']> = {}
): GeoDataset {
  return {
    features,
    columns: [...columns, GEOMETRY_COLUMN],
    crs: WGS84,
    source: { driver: 'GeoJSON', declaredCrs: 'EPSG:4326', crsAction: 'none', ...source },
  };
}

// ============================================================================
// Scratch roots
// ============================================================================

export async function createTempDir(prefix = 'geoportal-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export async function listEntries(path: string): Promise<string[]> {
  return (await readdir(path)).sort();
}
