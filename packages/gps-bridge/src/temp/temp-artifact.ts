/**
 * Temporary artifact lifecycle
 *
 * One manager per bridge. The artifact is either a hidden memory path or,
 * when durable temp files are requested, a file in the temp directory.
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { MEMORY_PREFIX, type FileStore } from '../storage/file-store.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'temp' });

const HIDDEN_DIR = `${MEMORY_PREFIX}.#!HIDDEN!#./`;

export interface TempArtifactOptions {
  readonly useTempFile: boolean;
  readonly directory: string;
  readonly prefix?: string;
}

export class TempArtifactManager {
  private current: string | null = null;

  constructor(
    private readonly options: TempArtifactOptions,
    private readonly store: FileStore
  ) {}

  /** Path of the live artifact, if one is allocated */
  get path(): string | null {
    return this.current;
  }

  get durable(): boolean {
    return this.options.useTempFile;
  }

  /**
   * Allocate a fresh artifact path, or return the one already allocated
   */
  allocate(): string {
    if (this.current !== null) {
      return this.current;
    }

    const name = `${this.options.prefix ?? 'gpsbabel'}_${randomUUID()}.gpx`;
    this.current = this.options.useTempFile
      ? join(this.options.directory, name)
      : `${HIDDEN_DIR}${name}`;

    log.debug('Allocated temp artifact', { path: this.current });
    return this.current;
  }

  /**
   * Remove the artifact. Safe to call when nothing was allocated or written.
   */
  async release(): Promise<void> {
    const path = this.current;
    if (path === null) {
      return;
    }
    this.current = null;

    const removed = await this.store.unlink(path);
    log.debug('Released temp artifact', { path, removed });
  }
}
