/** Byte range the row locator may read. Schema inference ignores it. */
export interface AccessWindow {
  /** Byte offset to seek to. When nonzero, the line straddling it is discarded. */
  readonly startByte: number;
  /** Maximum bytes consumed past `startByte`. `undefined` reads to end of file. */
  readonly lengthBytes?: number;
}

export function isBounded(window: AccessWindow): window is AccessWindow & { readonly lengthBytes: number } {
  return window.lengthBytes !== undefined;
}
