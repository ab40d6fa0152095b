/**
 * Core data model for upload ingestion
 *
 * TYPE SAFETY: every value crossing the pipeline boundary is readonly.
 */

import type { Geometry } from 'geojson';
import type { IngestErrorInfo } from './errors.js';

// ============================================================================
// Input
// ============================================================================

/**
 * Raw upload as handed over by the upload collaborator.
 * The filename is only used for its extension.
 */
export interface UploadBlob {
  readonly filename: string;
  readonly bytes: Uint8Array;
}

// ============================================================================
// Formats and drivers
// ============================================================================

export type DirectExtension = '.geojson' | '.kml' | '.gpkg';
export type ArchiveExtension = '.zip';
export type UploadExtension = DirectExtension | ArchiveExtension;

export type DriverName = 'GeoJSON' | 'KML' | 'GPKG' | 'ESRI Shapefile';

/**
 * File chosen by the archive resolver, ready for a format driver
 */
export interface ResolvedPath {
  readonly path: string;
  readonly driver: DriverName;
  /** True when the driver was forced instead of inferred from the extension */
  readonly forced: boolean;
  /** Every geometry file seen inside an archive, in traversal order (archive case only) */
  readonly candidates: readonly string[];
}

// ============================================================================
// Coordinate reference systems
// ============================================================================

export const WGS84 = 'EPSG:4326' as const;
export type CanonicalCrs = typeof WGS84;

/**
 * CRS as a source declares it, before resolution
 */
export type DeclaredCrs =
  | { readonly type: 'name'; readonly value: string }
  | { readonly type: 'wkt'; readonly value: string };

/**
 * What the normalizer did to the coordinates
 * - none: already WGS84
 * - assigned: no CRS declared, WGS84 assumed
 * - reprojected: transformed from another CRS
 */
export type CrsAction = 'none' | 'assigned' | 'reprojected';

// ============================================================================
// Datasets
// ============================================================================

export type AttributeValue = string | number | boolean | null;

/**
 * Feature as read by a driver; geometry may still be missing
 */
export interface RawFeature {
  readonly properties: Readonly<Record<string, unknown>>;
  readonly geometry: Geometry | null;
}

export interface RawDataset {
  readonly features: readonly RawFeature[];
  readonly declaredCrs: DeclaredCrs | null;
  /** Attribute names in the order the source stores them, when known */
  readonly fields?: readonly string[];
}

export interface GeoFeature {
  readonly properties: Readonly<Record<string, AttributeValue>>;
  readonly geometry: Geometry;
}

export const GEOMETRY_COLUMN = 'geometry' as const;

/**
 * Canonical, immutable output of a successful ingestion
 */
export interface GeoDataset {
  readonly features: readonly GeoFeature[];
  /** Attribute columns in stable order, followed by the geometry column */
  readonly columns: readonly string[];
  readonly crs: CanonicalCrs;
  readonly source: {
    readonly driver: DriverName;
    readonly declaredCrs: string | null;
    readonly crsAction: CrsAction;
  };
}

// ============================================================================
// Results
// ============================================================================

export type IngestResult =
  | { readonly success: true; readonly data: GeoDataset }
  | { readonly success: false; readonly error: IngestErrorInfo };
