import { createReadStream, createWriteStream } from 'node:fs';
import { readFile, stat, unlink } from 'node:fs/promises';
import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import type { FileStat, FileStore } from './file-store.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * FileStore over the local filesystem
 */
export class NodeFileStore implements FileStore {
  async openRead(path: string): Promise<Readable> {
    const stream = createReadStream(path);
    // Surface ENOENT/EACCES here rather than on the first read
    await once(stream, 'open');
    return stream;
  }

  async openWrite(path: string): Promise<Writable> {
    const stream = createWriteStream(path, { flags: 'w' });
    await once(stream, 'open');
    return stream;
  }

  readFile(path: string): Promise<Buffer> {
    return readFile(path);
  }

  async stat(path: string): Promise<FileStat | null> {
    try {
      const info = await stat(path);
      return { size: info.size, isFile: info.isFile() };
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return null;
      }
      throw error;
    }
  }

  async exists(path: string): Promise<boolean> {
    return (await this.stat(path)) !== null;
  }

  async unlink(path: string): Promise<boolean> {
    try {
      await unlink(path);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  isVirtual(): boolean {
    return false;
  }
}
