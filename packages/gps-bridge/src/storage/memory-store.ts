import { Readable, Writable } from 'node:stream';
import type { FileStat, FileStore } from './file-store.js';

/**
 * FileStore held in process memory
 *
 * Contents become visible to readers once the write stream finishes. Paths
 * here are never visible to a child process.
 */
export class MemoryFileStore implements FileStore {
  private readonly files = new Map<string, Buffer>();

  writeFileSync(path: string, contents: string | Buffer): void {
    this.files.set(path, typeof contents === 'string' ? Buffer.from(contents) : contents);
  }

  async openRead(path: string): Promise<Readable> {
    const contents = await this.readFile(path);
    return Readable.from([contents]);
  }

  async openWrite(path: string): Promise<Writable> {
    const files = this.files;
    const chunks: Buffer[] = [];
    files.set(path, Buffer.alloc(0));

    return new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
      final(callback) {
        files.set(path, Buffer.concat(chunks));
        callback();
      },
    });
  }

  async readFile(path: string): Promise<Buffer> {
    const contents = this.files.get(path);
    if (contents === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file in memory store, open '${path}'`), {
        code: 'ENOENT',
      });
    }
    return contents;
  }

  async stat(path: string): Promise<FileStat | null> {
    const contents = this.files.get(path);
    return contents === undefined ? null : { size: contents.length, isFile: true };
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }

  async unlink(path: string): Promise<boolean> {
    return this.files.delete(path);
  }

  isVirtual(): boolean {
    return true;
  }

  get size(): number {
    return this.files.size;
  }
}
