/**
 * Reads the raw body and the type key (for HTTP, the media type) of a response.
 */
export interface Extractable<Res> {
  getBytes(response: Res): Uint8Array;
  getTypeKey(response: Res): string;
}

/**
 * Decodes raw bytes into a value. Returns null when the bytes cannot be decoded.
 */
export type Extractor = (bytes: Uint8Array) => unknown;

export interface ExtractedResponse<Res> {
  raw: Res;
  typeKey: string;
  /** Decoded body; null when no extractor matched, the body was empty or decoding failed */
  content: unknown;
}
