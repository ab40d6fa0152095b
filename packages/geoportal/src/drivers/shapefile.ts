/**
 * ESRI Shapefile driver
 *
 * Opens a `.shp` together with its `.shx` and `.dbf` companions (matched
 * case-insensitively on extension, exactly on base name). The optional
 * `.prj` declares the CRS and the optional `.cpg` names the DBF encoding.
 */

import type { Feature, GeoJsonProperties, Geometry } from 'geojson';
import { readFile, readdir } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import shapefile from 'shapefile';
import { SHAPEFILE_REQUIRED_COMPANIONS } from '../core/constants.js';
import { IngestError, describeError } from '../core/errors.js';
import type { RawDataset, RawFeature } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const logger = createLogger({ module: 'shapefile-driver' });

/** DBF encoding when no `.cpg` says otherwise */
export const DEFAULT_DBF_ENCODING = 'windows-1252';

/**
 * Map a `.cpg` code page declaration to a TextDecoder label
 */
export function encodingFromCodePage(codePage: string): string {
  const value = codePage.trim();
  if (/^utf[-_ ]?8$/i.test(value)) {
    return 'utf-8';
  }
  const windows = /^(?:ansi\s*|cp|windows-)?(\d{3,4})$/i.exec(value);
  if (windows?.[1] !== undefined) {
    return `windows-${windows[1]}`;
  }
  try {
    return new TextDecoder(value.toLowerCase()).encoding;
  } catch {
    return DEFAULT_DBF_ENCODING;
  }
}

/**
 * Sibling files of a shapefile, keyed by lower-cased extension
 */
async function findCompanions(shpPath: string): Promise<Map<string, string>> {
  const directory = dirname(shpPath);
  const base = basename(shpPath, extname(shpPath));
  const companions = new Map<string, string>();

  for (const name of await readdir(directory)) {
    const extension = extname(name);
    if (basename(name, extension) === base) {
      companions.set(extension.toLowerCase(), join(directory, name));
    }
  }
  return companions;
}

async function readOptionalText(path: string | undefined): Promise<string | null> {
  if (path === undefined) return null;
  const text = (await readFile(path, 'utf-8')).trim();
  return text === '' ? null : text;
}

async function collectFeatures(
  shp: Uint8Array,
  dbf: Uint8Array,
  encoding: string
): Promise<RawFeature[]> {
  const features: RawFeature[] = [];
  const source = await shapefile.open(shp, dbf, { encoding });

  let result = await source.read();
  while (!result.done) {
    const feature: Feature<Geometry | null, GeoJsonProperties> = result.value;
    features.push({
      properties: feature.properties ?? {},
      geometry: feature.geometry ?? null,
    });
    result = await source.read();
  }
  return features;
}

/**
 * Read a shapefile bundle
 *
 * @throws IngestError DatasetUnreadable on missing companions or unparseable content
 */
export async function readShapefile(shpPath: string): Promise<RawDataset> {
  const companions = await findCompanions(shpPath);
  const missing = SHAPEFILE_REQUIRED_COMPANIONS.filter((extension) => !companions.has(extension));
  const shxPath = companions.get('.shx');
  const dbfPath = companions.get('.dbf');
  if (missing.length > 0 || shxPath === undefined || dbfPath === undefined) {
    throw new IngestError(
      'DatasetUnreadable',
      `Shapefile "${basename(shpPath)}" is missing companion file(s): ${missing.join(', ')}`
    );
  }

  try {
    const [shp, dbf, projection, codePage] = await Promise.all([
      readFile(shpPath),
      readFile(dbfPath),
      readOptionalText(companions.get('.prj')),
      readOptionalText(companions.get('.cpg')),
    ]);
    const encoding = codePage === null ? DEFAULT_DBF_ENCODING : encodingFromCodePage(codePage);

    const features = await collectFeatures(shp, dbf, encoding);
    logger.debug('Shapefile read', {
      file: basename(shpPath),
      featureCount: features.length,
      encoding,
      hasPrj: projection !== null,
    });

    return {
      features,
      declaredCrs: projection === null ? null : { type: 'wkt', value: projection },
    };
  } catch (error) {
    throw new IngestError(
      'DatasetUnreadable',
      `Failed to parse shapefile "${basename(shpPath)}": ${describeError(error)}`,
      { cause: error }
    );
  }
}
