/**
 * Geoportal HTTP API Server
 *
 * Thin HTTP surface over the ingestion pipeline. The request body of
 * POST /v1/ingest is the raw upload; the filename travels in the query string.
 *
 * Features:
 * - Zod query validation
 * - Standardized APIResponse wrapper
 * - API versioning (/v1/...)
 * - Request ID tracking
 * - Upload size limit (413)
 *
 * Endpoints:
 * - POST /v1/ingest?filename={name}&basemap={key}&preview={n}
 * - GET  /v1/basemaps
 * - GET  /v1/health
 */

import { randomBytes } from 'node:crypto';
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';
import type { GeoportalConfig } from '../core/config.js';
import { DEFAULT_MAX_UPLOAD_BYTES, DEFAULT_PREVIEW_ROWS } from '../core/constants.js';
import type { IngestResult, UploadBlob } from '../core/types.js';
import { logger } from '../core/utils/logger.js';
import { createIngestionPipeline } from '../ingestion/pipeline.js';
import { DEFAULT_BASEMAP, getBasemap, listBasemaps, type BasemapKey } from '../presentation/basemaps.js';
import { toFeatureCollection } from '../presentation/export.js';
import { buildMapView, type MapViewOptions } from '../presentation/map-view.js';
import { summarizeDataset } from '../presentation/summary.js';

export const API_VERSION = 'v1';

/**
 * Standardized API response wrapper
 */
export interface APIResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: {
    readonly code: string;
    readonly message: string;
    readonly details?: unknown;
  };
  readonly meta: {
    readonly requestId: string;
    readonly latencyMs: number;
    readonly version: string;
  };
}

/**
 * Anything that turns one upload into one result
 */
export interface Ingestor {
  ingest(blob: UploadBlob): Promise<IngestResult>;
}

export interface GeoportalAPIOptions {
  readonly port?: number;
  readonly host?: string;
  readonly maxUploadBytes?: number;
  readonly defaultBasemap?: BasemapKey;
  readonly previewRows?: number;
  readonly map?: MapViewOptions;
}

const ingestQuerySchema = z.object({
  filename: z.string().min(1, 'filename is required'),
  basemap: z.string().optional(),
  preview: z.coerce.number().int().min(0).max(1000).optional(),
});

interface UploadBody {
  readonly bytes: Buffer;
  readonly received: number;
  readonly tooLarge: boolean;
}

/**
 * Drain the request body, keeping at most `limit` bytes
 */
async function readBody(req: IncomingMessage, limit: number): Promise<UploadBody> {
  const chunks: Buffer[] = [];
  let received = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    received += buffer.length;
    if (received <= limit) {
      chunks.push(buffer);
    }
  }

  return { bytes: Buffer.concat(chunks), received, tooLarge: received > limit };
}

export class GeoportalAPI {
  private readonly server: ReturnType<typeof createServer>;
  private readonly startedAt = Date.now();
  private readonly port: number;
  private readonly host: string;
  private readonly maxUploadBytes: number;
  private readonly defaultBasemap: BasemapKey;
  private readonly previewRows: number;
  private readonly mapOptions: MapViewOptions;
  private succeeded = 0;
  private failed = 0;

  constructor(
    private readonly pipeline: Ingestor,
    options: GeoportalAPIOptions = {}
  ) {
    this.port = options.port ?? 3000;
    this.host = options.host ?? '127.0.0.1';
    this.maxUploadBytes = options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
    this.defaultBasemap = options.defaultBasemap ?? DEFAULT_BASEMAP;
    this.previewRows = options.previewRows ?? DEFAULT_PREVIEW_ROWS;
    this.mapOptions = options.map ?? {};

    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        logger.error('Unhandled API failure', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });
  }

  /**
   * Start HTTP server
   *
   * @returns the bound port (useful with port 0)
   */
  start(): Promise<number> {
    return new Promise((resolvePort, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        const port = this.boundPort();
        logger.info('Geoportal API server started', {
          version: API_VERSION,
          host: this.host,
          port,
          endpoints: [
            `POST /${API_VERSION}/ingest?filename={name}&basemap={key}`,
            `GET /${API_VERSION}/basemaps`,
            `GET /${API_VERSION}/health`,
          ],
        });
        resolvePort(port);
      });
    });
  }

  /**
   * Stop HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolveStop, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('API server stopped');
        resolveStop();
      });
    });
  }

  private boundPort(): number {
    const address: AddressInfo | string | null = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }

  /**
   * Handle incoming HTTP request
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = `req_${randomBytes(16).toString('hex')}`;
    const startTime = performance.now();

    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Request-ID', requestId);
    res.setHeader('X-API-Version', API_VERSION);

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const pathname = url.pathname;

    try {
      const versionMatch = /^\/(v\d+)\//.exec(pathname);
      const requestedVersion = versionMatch?.[1] ?? API_VERSION;
      if (requestedVersion !== API_VERSION) {
        this.sendErrorResponse(
          res,
          400,
          'UNSUPPORTED_VERSION',
          `API version ${requestedVersion} not supported. Current version: ${API_VERSION}`,
          requestId,
          startTime
        );
        return;
      }

      const basePath = pathname.replace(/^\/v\d+/, '');

      if (basePath === '/ingest' && req.method === 'POST') {
        await this.handleIngest(url, req, res, requestId, startTime);
      } else if (basePath === '/basemaps' && req.method === 'GET') {
        this.sendSuccessResponse(res, 200, listBasemaps(), requestId, startTime);
      } else if (basePath === '/health' && req.method === 'GET') {
        this.sendSuccessResponse(
          res,
          200,
          {
            status: 'healthy',
            uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
            ingestions: { succeeded: this.succeeded, failed: this.failed },
          },
          requestId,
          startTime
        );
      } else {
        this.sendErrorResponse(res, 404, 'NOT_FOUND', `Endpoint not found: ${pathname}`, requestId, startTime);
      }
    } catch (error) {
      logger.error('API request error', {
        requestId,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      this.sendErrorResponse(res, 500, 'INTERNAL_ERROR', 'Internal server error', requestId, startTime);
    }
  }

  /**
   * Handle POST /v1/ingest
   */
  private async handleIngest(
    url: URL,
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
    startTime: number
  ): Promise<void> {
    const validation = ingestQuerySchema.safeParse(Object.fromEntries(url.searchParams.entries()));
    const body = await readBody(req, this.maxUploadBytes);

    if (!validation.success) {
      this.sendErrorResponse(
        res,
        400,
        'INVALID_PARAMETERS',
        'Invalid query parameters',
        requestId,
        startTime,
        validation.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      );
      return;
    }

    if (body.tooLarge) {
      this.sendErrorResponse(
        res,
        413,
        'PAYLOAD_TOO_LARGE',
        `Upload exceeds the limit of ${this.maxUploadBytes} bytes`,
        requestId,
        startTime,
        { limit: this.maxUploadBytes, received: body.received }
      );
      return;
    }

    const { filename, basemap, preview } = validation.data;
    const result = await this.pipeline.ingest({ filename, bytes: body.bytes });

    if (!result.success) {
      this.failed++;
      this.sendErrorResponse(res, 422, result.error.kind, result.error.message, requestId, startTime);
      return;
    }

    this.succeeded++;
    const dataset = result.data;
    this.sendSuccessResponse(
      res,
      200,
      {
        summary: summarizeDataset(dataset, preview ?? this.previewRows),
        map: buildMapView(dataset, getBasemap(basemap, this.defaultBasemap), this.mapOptions),
        featureCollection: toFeatureCollection(dataset),
      },
      requestId,
      startTime
    );
  }

  /**
   * Send success response (standardized)
   */
  private sendSuccessResponse<T>(
    res: ServerResponse,
    status: number,
    data: T,
    requestId: string,
    startTime: number
  ): void {
    const response: APIResponse<T> = {
      success: true,
      data,
      meta: this.meta(requestId, startTime),
    };
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response));
  }

  /**
   * Send error response (standardized)
   */
  private sendErrorResponse(
    res: ServerResponse,
    status: number,
    code: string,
    message: string,
    requestId: string,
    startTime: number,
    details?: unknown
  ): void {
    const response: APIResponse<never> = {
      success: false,
      error: { code, message, details },
      meta: this.meta(requestId, startTime),
    };
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response));
  }

  private meta(requestId: string, startTime: number): APIResponse<never>['meta'] {
    return {
      requestId,
      latencyMs: Math.round((performance.now() - startTime) * 100) / 100,
      version: API_VERSION,
    };
  }
}

/**
 * Create an API server from loaded configuration
 */
export function createGeoportalAPI(config: GeoportalConfig): GeoportalAPI {
  return new GeoportalAPI(createIngestionPipeline({ scratchRoot: config.scratchRoot }), {
    port: config.server.port,
    host: config.server.host,
    maxUploadBytes: config.maxUploadBytes,
    defaultBasemap: config.defaultBasemap,
    previewRows: config.previewRows,
    map: { defaultCenter: config.map.defaultCenter, defaultZoom: config.map.defaultZoom },
  });
}
