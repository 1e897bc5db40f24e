import { closeSync, fstatSync, openSync, readSync } from 'node:fs';
import { basename } from 'node:path';
import type { Line, LineSource, LineSourceMetadata } from '../../domain/ports/LineSource.js';

const NEWLINE = 0x0a;

export interface FileLineSourceOptions {
  /** Encoding used to decode each line. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for buffered reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Line source over a local file using a single file descriptor and positional `readSync`. Node.js only.
 *
 * The descriptor is opened in the constructor and held until `close()`.
 */
export class FileLineSource implements LineSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly chunk: Buffer;
  private fd: number | null;
  private chunkStart = 0;
  private chunkLength = 0;
  private cursor = 0;

  constructor(filePath: string, options?: FileLineSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.chunk = Buffer.alloc(options?.highWaterMark ?? 65536);
    this.fd = openSync(filePath, 'r');
  }

  seek(byteOffset: number): void {
    this.cursor = byteOffset;
  }

  readLine(): Line | null {
    const fd = this.requireOpen();
    const start = this.cursor;
    const parts: Buffer[] = [];

    for (;;) {
      if (this.cursor < this.chunkStart || this.cursor >= this.chunkStart + this.chunkLength) {
        this.chunkStart = this.cursor;
        this.chunkLength = readSync(fd, this.chunk, 0, this.chunk.length, this.cursor);
        if (this.chunkLength === 0) break;
      }

      const from = this.cursor - this.chunkStart;
      const view = this.chunk.subarray(0, this.chunkLength);
      const newline = view.indexOf(NEWLINE, from);

      if (newline !== -1) {
        parts.push(Buffer.from(view.subarray(from, newline)));
        this.cursor = this.chunkStart + newline + 1;
        break;
      }

      // The chunk buffer is reused, so keep a copy of the partial line.
      parts.push(Buffer.from(view.subarray(from)));
      this.cursor = this.chunkStart + this.chunkLength;
    }

    if (this.cursor === start) return null;

    return {
      text: Buffer.concat(parts).toString(this.encoding),
      byteLength: this.cursor - start,
    };
  }

  metadata(): LineSourceMetadata {
    return {
      fileName: basename(this.filePath),
      fileSize: fstatSync(this.requireOpen()).size,
    };
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }

  private requireOpen(): number {
    if (this.fd === null) {
      throw new Error(`FileLineSource: '${this.filePath}' has already been closed.`);
    }
    return this.fd;
  }
}
