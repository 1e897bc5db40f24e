import type { Line, LineSource, LineSourceMetadata } from '../../domain/ports/LineSource.js';

const NEWLINE = 0x0a;

/** In-memory line source over a string or Buffer. */
export class BufferLineSource implements LineSource {
  private readonly data: Buffer;
  private readonly encoding: BufferEncoding;
  private readonly meta: LineSourceMetadata;
  private cursor = 0;

  constructor(data: string | Buffer, metadata?: Partial<LineSourceMetadata> & { encoding?: BufferEncoding }) {
    this.encoding = metadata?.encoding ?? 'utf-8';
    this.data = typeof data === 'string' ? Buffer.from(data, this.encoding) : data;
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: this.data.length,
    };
  }

  seek(byteOffset: number): void {
    this.cursor = Math.min(byteOffset, this.data.length);
  }

  readLine(): Line | null {
    if (this.cursor >= this.data.length) return null;

    const start = this.cursor;
    const newline = this.data.indexOf(NEWLINE, start);
    const end = newline === -1 ? this.data.length : newline;
    this.cursor = newline === -1 ? end : end + 1;

    return {
      text: this.data.toString(this.encoding, start, end),
      byteLength: this.cursor - start,
    };
  }

  metadata(): LineSourceMetadata {
    return this.meta;
  }

  close(): void {
    // Nothing to release.
  }
}
