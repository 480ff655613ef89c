import type { Readable, Writable } from 'node:stream';
import { isMemoryPath, type FileStat, type FileStore } from './file-store.js';
import { MemoryFileStore } from './memory-store.js';
import { NodeFileStore } from './node-store.js';

/**
 * Sends `/vsimem/` paths to a memory store and everything else to disk
 */
export class RoutedFileStore implements FileStore {
  constructor(
    readonly memory: FileStore = new MemoryFileStore(),
    readonly disk: FileStore = new NodeFileStore()
  ) {}

  private route(path: string): FileStore {
    return isMemoryPath(path) ? this.memory : this.disk;
  }

  openRead(path: string): Promise<Readable> {
    return this.route(path).openRead(path);
  }

  openWrite(path: string): Promise<Writable> {
    return this.route(path).openWrite(path);
  }

  readFile(path: string): Promise<Buffer> {
    return this.route(path).readFile(path);
  }

  stat(path: string): Promise<FileStat | null> {
    return this.route(path).stat(path);
  }

  exists(path: string): Promise<boolean> {
    return this.route(path).exists(path);
  }

  unlink(path: string): Promise<boolean> {
    return this.route(path).unlink(path);
  }

  isVirtual(path: string): boolean {
    return this.route(path).isVirtual(path);
  }
}
