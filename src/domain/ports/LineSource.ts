/** One physical line read from a source. */
export interface Line {
  /** Decoded text, without the `\n` terminator. */
  readonly text: string;
  /** Raw bytes consumed for this line, terminator included when present. */
  readonly byteLength: number;
}

/** Describes the line source in the `schema:inferred` event. */
export interface LineSourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for synchronous, byte-addressed line reads.
 *
 * A source keeps a single cursor. `seek()` moves it to an absolute byte offset;
 * `readLine()` returns the line starting at the cursor and advances past it, or
 * `null` at end of data. Callers that share a source must serialize access.
 */
export interface LineSource {
  seek(byteOffset: number): void;
  readLine(): Line | null;
  metadata(): LineSourceMetadata;
  /** Release any underlying handle. Idempotent. */
  close(): void;
}
