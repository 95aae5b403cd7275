import type { Extractable, Extractor } from '@tessera/layers';
import type { ZodType, ZodTypeDef } from 'zod';

import { parseMediaType } from './core/http-utils.js';
import type { HttpResponse } from './types.js';

/**
 * Keys HTTP responses by media type, so "application/json; charset=utf-8"
 * matches an extractor registered for "application/json".
 */
export const httpExtractable: Extractable<HttpResponse> = {
  getBytes: (response) => response.body,
  getTypeKey: (response) => parseMediaType(response.contentType),
};

/**
 * Decodes UTF-8 JSON. With a schema, content that fails validation becomes null.
 */
export function jsonExtractor<T>(schema?: ZodType<T, ZodTypeDef, unknown>): Extractor {
  const decoder = new TextDecoder();
  return (bytes) => {
    const value: unknown = JSON.parse(decoder.decode(bytes));
    if (!schema) {
      return value;
    }
    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : null;
  };
}

export function textExtractor(): Extractor {
  const decoder = new TextDecoder();
  return (bytes) => decoder.decode(bytes);
}
