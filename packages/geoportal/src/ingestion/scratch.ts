/**
 * Scratch Lifecycle Manager
 *
 * Allocates request-scoped temporary storage for an upload (one file and, on
 * demand, one directory) and removes it again. Handles share no state, so
 * concurrent ingestions need no locking.
 *
 * @module ingestion/scratch
 */

import { randomUUID } from 'node:crypto';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SCRATCH_PREFIX } from '../core/constants.js';
import { createLogger, type Logger } from '../core/utils/logger.js';

const defaultLogger = createLogger({ module: 'scratch' });

/**
 * Ownership token for one scratch file and at most one scratch directory
 */
export class ScratchHandle {
  readonly id: string;
  readonly filePath: string;
  private directoryPath: string | null = null;
  private pendingDirectory: Promise<string> | null = null;
  private released = false;

  constructor(
    private readonly root: string,
    extension: string
  ) {
    this.id = randomUUID();
    this.filePath = join(root, `${SCRATCH_PREFIX}${this.id}${extension}`);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Create the scratch directory on first call; later calls return the same path
   */
  async directory(): Promise<string> {
    if (this.released) {
      throw new Error(`Scratch handle ${this.id} already released`);
    }
    if (this.directoryPath !== null) {
      return this.directoryPath;
    }
    if (this.pendingDirectory === null) {
      this.pendingDirectory = mkdtemp(join(this.root, `${SCRATCH_PREFIX}${this.id}-`)).then(
        (path) => {
          this.directoryPath = path;
          return path;
        }
      );
    }
    return this.pendingDirectory;
  }

  /**
   * Write the upload into the scratch file
   */
  async writeFile(bytes: Uint8Array): Promise<string> {
    if (this.released) {
      throw new Error(`Scratch handle ${this.id} already released`);
    }
    await writeFile(this.filePath, bytes);
    return this.filePath;
  }

  /** @internal */
  markReleased(): boolean {
    if (this.released) return false;
    this.released = true;
    return true;
  }

  /** @internal */
  async settledDirectory(): Promise<string | null> {
    if (this.pendingDirectory === null) return null;
    try {
      return await this.pendingDirectory;
    } catch {
      // mkdtemp failed, so there is nothing to remove
      return null;
    }
  }
}

export interface ScratchManagerOptions {
  /** Directory under which scratch storage is created */
  readonly root: string;
  readonly logger?: Logger;
}

export class ScratchManager {
  readonly root: string;
  private readonly logger: Logger;

  constructor(options: ScratchManagerOptions) {
    this.root = options.root;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Reserve a uniquely named scratch file carrying the given extension
   */
  async acquire(extension: string): Promise<ScratchHandle> {
    await mkdir(this.root, { recursive: true });
    const handle = new ScratchHandle(this.root, extension);
    await writeFile(handle.filePath, new Uint8Array(0), { flag: 'wx' });
    this.logger.debug('Scratch acquired', { scratchId: handle.id, filePath: handle.filePath });
    return handle;
  }

  /**
   * Delete the scratch file and directory of a handle
   *
   * Deletion errors are logged and never thrown so they cannot mask the
   * outcome of the ingestion that owned the handle. A second release of the
   * same handle does nothing.
   */
  async release(handle: ScratchHandle): Promise<void> {
    if (!handle.markReleased()) {
      return;
    }

    try {
      await rm(handle.filePath, { force: true });
    } catch (error) {
      this.logger.warn('Failed to remove scratch file', {
        scratchId: handle.id,
        filePath: handle.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const directory = await handle.settledDirectory();
    if (directory !== null) {
      try {
        await rm(directory, { recursive: true, force: true });
      } catch (error) {
        this.logger.warn('Failed to remove scratch directory', {
          scratchId: handle.id,
          directory,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.logger.debug('Scratch released', { scratchId: handle.id });
  }

  /**
   * Run `task` with a fresh handle and release it on every exit path
   */
  async withScratch<T>(extension: string, task: (handle: ScratchHandle) => Promise<T>): Promise<T> {
    const handle = await this.acquire(extension);
    try {
      return await task(handle);
    } finally {
      await this.release(handle);
    }
  }
}
