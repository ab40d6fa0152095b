/**
 * Coordinate Reference System Registry
 *
 * Turns a CRS as a source declares it (EPSG code, OGC URN, CRS84 name or WKT)
 * into a proj4 definition, and tells whether it already is WGS84.
 *
 * Definitions come from three places:
 * - proj4's built-ins (EPSG:4326, EPSG:4269, EPSG:3857)
 * - WGS84 UTM zones, generated (EPSG:32601-32660 north, 32701-32760 south)
 * - EXTRA_DEFINITIONS below
 *
 * @module crs/registry
 */

import { IngestError } from '../core/errors.js';
import { WGS84, type DeclaredCrs } from '../core/types.js';

export interface ResolvedCrs {
  /** Label used in logs and dataset metadata */
  readonly label: string;
  /** Anything proj4 accepts: a known name, a proj string or WKT */
  readonly definition: string;
  readonly isWgs84: boolean;
}

const WGS84_CRS: ResolvedCrs = {
  label: WGS84,
  definition: WGS84,
  isWgs84: true,
};

const PROJ4_BUILTIN_CODES = new Set([4269, 3857]);

const EXTRA_DEFINITIONS: Readonly<Record<number, string>> = {
  3395: '+proj=merc +lon_0=0 +k=1 +x_0=0 +y_0=0 +datum=WGS84 +units=m +no_defs',
  4755: '+proj=longlat +ellps=WGS84 +towgs84=0,0,0,0,0,0,0 +no_defs',
  2154:
    '+proj=lcc +lat_0=46.5 +lon_0=3 +lat_1=49 +lat_2=44 +x_0=700000 +y_0=6600000 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs',
  27700:
    '+proj=tmerc +lat_0=49 +lon_0=-2 +k=0.9996012717 +x_0=400000 +y_0=-100000 +ellps=airy +towgs84=446.448,-125.157,542.06,0.15,0.247,0.842,-20.489 +units=m +no_defs',
};

const CRS84_PATTERN = /^(?:urn:ogc:def:crs:)?OGC:(?:1\.3:)?CRS84$/i;
const EPSG_PATTERNS = [
  /^EPSG:(\d+)$/i,
  /^urn:ogc:def:crs:EPSG:[^:]*:(\d+)$/i,
  /^https?:\/\/www\.opengis\.net\/def\/crs\/EPSG\/[^/]+\/(\d+)$/i,
];

/**
 * Extract the EPSG code of a CRS name, if it carries one
 */
export function parseEpsgCode(name: string): number | null {
  const trimmed = name.trim();
  for (const pattern of EPSG_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match?.[1] !== undefined) {
      return Number.parseInt(match[1], 10);
    }
  }
  return null;
}

/**
 * proj string of a WGS84 UTM zone code, or null when the code is not one
 */
export function utmDefinition(code: number): string | null {
  if (code >= 32601 && code <= 32660) {
    return `+proj=utm +zone=${code - 32600} +datum=WGS84 +units=m +no_defs`;
  }
  if (code >= 32701 && code <= 32760) {
    return `+proj=utm +zone=${code - 32700} +south +datum=WGS84 +units=m +no_defs`;
  }
  return null;
}

function resolveEpsgCode(code: number): ResolvedCrs | null {
  const label = `EPSG:${code}`;
  if (code === 4326) {
    return WGS84_CRS;
  }
  if (PROJ4_BUILTIN_CODES.has(code)) {
    return { label, definition: label, isWgs84: false };
  }
  const definition = utmDefinition(code) ?? EXTRA_DEFINITIONS[code];
  return definition === undefined ? null : { label, definition, isWgs84: false };
}

/**
 * Geographic (unprojected) WKT on the WGS 84 datum
 */
export function isWgs84Wkt(wkt: string): boolean {
  const normalized = wkt.trim().toUpperCase();
  if (!/^GEOG(?:CS|CRS)\s*\[/.test(normalized)) {
    return false;
  }
  return /DATUM\s*\[\s*"(?:D_)?WGS[_ ]?(?:19)?84"/.test(normalized);
}

function wktLabel(wkt: string): string {
  const match = /^\s*\w+\s*\[\s*"([^"]*)"/.exec(wkt);
  return match?.[1] ?? 'WKT';
}

/**
 * Resolve a declared CRS
 *
 * @throws IngestError ReprojectionFailure when the CRS is unknown
 */
export function resolveCrs(declared: DeclaredCrs): ResolvedCrs {
  if (declared.type === 'wkt') {
    const wkt = declared.value.trim();
    if (wkt === '') {
      throw new IngestError('ReprojectionFailure', 'Projection definition is empty');
    }
    if (isWgs84Wkt(wkt)) {
      return { ...WGS84_CRS, label: wktLabel(wkt) };
    }
    return { label: wktLabel(wkt), definition: wkt, isWgs84: false };
  }

  const name = declared.value.trim();
  if (CRS84_PATTERN.test(name)) {
    return { ...WGS84_CRS, label: 'OGC:CRS84' };
  }

  const code = parseEpsgCode(name);
  const resolved = code === null ? null : resolveEpsgCode(code);
  if (resolved === null) {
    throw new IngestError(
      'ReprojectionFailure',
      `Unknown coordinate reference system "${name}"; cannot transform to ${WGS84}`
    );
  }
  return resolved;
}
