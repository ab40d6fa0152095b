/**
 * Ingestion Pipeline
 *
 * One upload in, one structured result out:
 *
 *   classify → acquire scratch → resolve → normalize → release scratch
 *
 * Unsupported extensions are rejected before any scratch storage exists.
 * Everything after that runs inside ScratchManager.withScratch, whose
 * `finally` releases the storage on success, on every IngestError and on
 * unexpected faults alike. The pipeline itself never throws.
 *
 * @module ingestion/pipeline
 */

import { IngestError, describeError } from '../core/errors.js';
import type { GeoDataset, IngestResult, ResolvedPath, UploadBlob } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { ArchiveResolver, classifyUpload } from './archive-resolver.js';
import { DatasetNormalizer } from './dataset-normalizer.js';
import { ScratchManager, type ScratchHandle } from './scratch.js';

const logger = createLogger({ module: 'pipeline' });

export interface UploadResolver {
  resolve(blob: UploadBlob, handle: ScratchHandle): Promise<ResolvedPath>;
}

export interface DatasetLoader {
  normalize(resolved: ResolvedPath): Promise<GeoDataset>;
}

export interface IngestionPipelineOptions {
  readonly scratch: ScratchManager;
  readonly resolver?: UploadResolver;
  readonly normalizer?: DatasetLoader;
}

export class IngestionPipeline {
  private readonly scratch: ScratchManager;
  private readonly resolver: UploadResolver;
  private readonly normalizer: DatasetLoader;

  constructor(options: IngestionPipelineOptions) {
    this.scratch = options.scratch;
    this.resolver = options.resolver ?? new ArchiveResolver();
    this.normalizer = options.normalizer ?? new DatasetNormalizer();
  }

  /**
   * Ingest one upload
   */
  async ingest(blob: UploadBlob): Promise<IngestResult> {
    const startTime = Date.now();

    try {
      const extension = classifyUpload(blob);
      const dataset = await this.scratch.withScratch(extension, (handle) =>
        this.run(blob, handle)
      );

      logger.info('Upload ingested', {
        filename: blob.filename,
        bytes: blob.bytes.byteLength,
        featureCount: dataset.features.length,
        crsAction: dataset.source.crsAction,
        durationMs: Date.now() - startTime,
      });
      return { success: true, data: dataset };
    } catch (error) {
      const failure =
        error instanceof IngestError
          ? error
          : new IngestError('DatasetUnreadable', `Failed to load file: ${describeError(error)}`, {
              cause: error,
            });

      logger.warn('Upload rejected', {
        filename: blob.filename,
        kind: failure.kind,
        error: failure.message,
        durationMs: Date.now() - startTime,
      });
      return { success: false, error: failure.toJSON() };
    }
  }

  private async run(blob: UploadBlob, handle: ScratchHandle): Promise<GeoDataset> {
    const log = logger.child({ scratchId: handle.id });
    const resolved = await this.resolver.resolve(blob, handle);
    log.debug('Upload resolved', {
      driver: resolved.driver,
      forced: resolved.forced,
      candidateCount: resolved.candidates.length,
    });
    return this.normalizer.normalize(resolved);
  }
}

/**
 * Pipeline with the default resolver and normalizer writing under `scratchRoot`
 */
export function createIngestionPipeline(options: { readonly scratchRoot: string }): IngestionPipeline {
  return new IngestionPipeline({ scratch: new ScratchManager({ root: options.scratchRoot }) });
}
