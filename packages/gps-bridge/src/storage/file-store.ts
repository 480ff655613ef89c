/**
 * File store abstraction
 *
 * Every path the bridge touches goes through a FileStore so that sources and
 * artifacts can live on disk or in process memory (`/vsimem/` paths).
 */

import type { Readable, Writable } from 'node:stream';

export const MEMORY_PREFIX = '/vsimem/';

export interface FileStat {
  readonly size: number;
  readonly isFile: boolean;
}

export interface FileStore {
  /** Open for reading; rejects when the path cannot be read */
  openRead(path: string): Promise<Readable>;

  /** Create or truncate, then open for writing */
  openWrite(path: string): Promise<Writable>;

  readFile(path: string): Promise<Buffer>;

  /** Null when the path does not exist */
  stat(path: string): Promise<FileStat | null>;

  exists(path: string): Promise<boolean>;

  /** False when nothing was there to remove */
  unlink(path: string): Promise<boolean>;

  /** True when no other process can open the path */
  isVirtual(path: string): boolean;
}

export function isMemoryPath(path: string): boolean {
  return path.startsWith(MEMORY_PREFIX);
}
