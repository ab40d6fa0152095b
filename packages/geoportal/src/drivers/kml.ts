/**
 * KML driver
 *
 * Converts placemarks with @tmcw/togeojson on top of an @xmldom/xmldom
 * document. KML coordinates are always WGS84 longitude/latitude.
 */

import { kml } from '@tmcw/togeojson';
import { DOMParser } from '@xmldom/xmldom';
import { readFile } from 'node:fs/promises';
import { IngestError, describeError } from '../core/errors.js';
import { WGS84, type RawDataset } from '../core/types.js';

/**
 * Parse KML text into a raw dataset
 *
 * @throws IngestError DatasetUnreadable on malformed XML or a non-KML root
 */
export function parseKml(text: string): RawDataset {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      // mismatched end tags only surface as warnings
      warning: (message: string) => problems.push(message),
      error: (message: string) => problems.push(message),
      fatalError: (message: string) => problems.push(message),
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(text, 'text/xml');
  } catch (error) {
    throw new IngestError('DatasetUnreadable', `KML is not well-formed XML: ${describeError(error)}`, {
      cause: error,
    });
  }

  const root = document.documentElement;
  if (problems.length > 0 || root === null) {
    throw new IngestError(
      'DatasetUnreadable',
      `KML is not well-formed XML${problems[0] ? `: ${problems[0].trim()}` : ''}`
    );
  }
  if (root.localName !== 'kml') {
    throw new IngestError('DatasetUnreadable', `Expected a <kml> document, found <${root.localName}>`);
  }

  const collection = kml(document);
  return {
    features: collection.features.map((feature) => ({
      properties: feature.properties ?? {},
      geometry: feature.geometry,
    })),
    declaredCrs: { type: 'name', value: WGS84 },
  };
}

export async function readKml(path: string): Promise<RawDataset> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IngestError('DatasetUnreadable', `Cannot read KML file: ${describeError(error)}`, {
      cause: error,
    });
  }
  return parseKml(text);
}
