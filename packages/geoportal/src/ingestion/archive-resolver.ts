/**
 * Archive Resolver
 *
 * Decides whether an upload is a direct geospatial file or a zipped shapefile
 * bundle, and for bundles extracts the archive and picks the one `.shp` file
 * the normalizer opens.
 *
 * SELECTION: candidates are collected in a top-down walk where each
 * directory's entries are sorted by code unit and its files come before its
 * subdirectories. The first candidate wins, so the same archive always
 * resolves to the same file.
 *
 * @module ingestion/archive-resolver
 */

import AdmZip from 'adm-zip';
import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import {
  DIRECT_FORMATS,
  SHAPEFILE_DESCRIPTOR_EXTENSION,
  SUPPORTED_EXTENSIONS,
} from '../core/constants.js';
import { IngestError, describeError } from '../core/errors.js';
import type { ResolvedPath, UploadBlob, UploadExtension } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { ScratchHandle } from './scratch.js';

const logger = createLogger({ module: 'archive-resolver' });

/** Directory macOS adds to archives it creates */
const MACOS_METADATA_DIR = '__MACOSX';

function isSupportedExtension(value: string): value is UploadExtension {
  return SUPPORTED_EXTENSIONS.some((extension) => extension === value);
}

/**
 * Extract the lower-cased extension of an upload and check it is recognized
 *
 * @throws IngestError UnsupportedFormat
 */
export function classifyUpload(blob: UploadBlob): UploadExtension {
  const extension = extname(blob.filename).toLowerCase();
  if (!isSupportedExtension(extension)) {
    throw new IngestError(
      'UnsupportedFormat',
      extension === ''
        ? `File "${blob.filename}" has no extension. Supported formats: ${SUPPORTED_EXTENSIONS.join(', ')}`
        : `Unsupported file format "${extension}". Supported formats: ${SUPPORTED_EXTENSIONS.join(', ')}`
    );
  }
  return extension;
}

function byCodeUnit(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Collect every shapefile descriptor below `directory` in deterministic order
 */
export async function findShapefileCandidates(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  const subdirectories: string[] = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      if (entry.name !== MACOS_METADATA_DIR) {
        subdirectories.push(entry.name);
      }
    } else if (
      entry.isFile() &&
      !entry.name.startsWith('._') &&
      extname(entry.name).toLowerCase() === SHAPEFILE_DESCRIPTOR_EXTENSION
    ) {
      files.push(entry.name);
    }
  }

  const candidates = files.sort(byCodeUnit).map((name) => join(directory, name));
  for (const name of subdirectories.sort(byCodeUnit)) {
    candidates.push(...(await findShapefileCandidates(join(directory, name))));
  }
  return candidates;
}

/**
 * Extract a zip archive into `destination`
 *
 * @throws IngestError ArchiveUnreadable
 */
function extractArchive(archivePath: string, destination: string): void {
  try {
    const zip = new AdmZip(archivePath);
    zip.extractAllTo(destination, true);
  } catch (error) {
    throw new IngestError(
      'ArchiveUnreadable',
      `ZIP file could not be extracted: ${describeError(error)}`,
      { cause: error }
    );
  }
}

export class ArchiveResolver {
  /**
   * Write the upload to scratch storage and locate its geometry file
   *
   * The scratch file, and in the archive case the scratch directory, belong
   * to `handle` before anything is parsed, so the caller's release covers
   * every later failure.
   */
  async resolve(blob: UploadBlob, handle: ScratchHandle): Promise<ResolvedPath> {
    const extension = classifyUpload(blob);
    const filePath = await handle.writeFile(blob.bytes);

    if (extension !== '.zip') {
      logger.debug('Resolved direct upload', { filename: blob.filename, driver: DIRECT_FORMATS[extension] });
      return {
        path: filePath,
        driver: DIRECT_FORMATS[extension],
        forced: false,
        candidates: [],
      };
    }

    const extractDir = await handle.directory();
    extractArchive(filePath, extractDir);

    const candidates = await findShapefileCandidates(extractDir);
    const [selected] = candidates;
    if (selected === undefined) {
      throw new IngestError(
        'NoGeometryFileFound',
        `ZIP file "${blob.filename}" does not contain a ${SHAPEFILE_DESCRIPTOR_EXTENSION} file`
      );
    }

    if (candidates.length > 1) {
      logger.warn('Archive contains several shapefiles; using the first', {
        filename: blob.filename,
        candidateCount: candidates.length,
        selected: selected.slice(extractDir.length + 1),
      });
    }

    return {
      path: selected,
      driver: 'ESRI Shapefile',
      forced: true,
      candidates,
    };
  }
}
