// Pure HTTP utility functions
// All functions are pure - no side effects

import type { HttpHeaders } from '../types.js';

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * True when the URL starts with http:// or https://, in any case
 */
export const isAbsoluteUrl = (url: string): boolean => ABSOLUTE_URL.test(url);

/**
 * Join origin and path with exactly one slash
 * - combineUrl("https://example.com", "/a/b") -> "https://example.com/a/b"
 * - combineUrl("https://example.com/", "a/b") -> "https://example.com/a/b"
 * - combineUrl("https://example.com/", "") -> "https://example.com"
 */
export const combineUrl = (origin: string, path: string): string => {
  const cleanOrigin = origin.replace(/\/+$/, '');
  const cleanPath = path.replace(/^\/+/, '');

  if (cleanPath === '') {
    return cleanOrigin;
  }

  return `${cleanOrigin}/${cleanPath}`;
};

/**
 * Parse an absolute http(s) URL; undefined for anything else
 */
export const parseHttpUrl = (url: string): URL | undefined => {
  if (!URL.canParse(url)) {
    return undefined;
  }
  const parsed = new URL(url);
  return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed : undefined;
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  const urlObj = parseHttpUrl(url);
  if (!urlObj) {
    return url;
  }

  const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password', 'access_token'];

  for (const param of sensitiveParams) {
    if (urlObj.searchParams.has(param)) {
      urlObj.searchParams.set(param, '***');
    }
  }

  return urlObj.toString();
};

/**
 * Media type of a Content-Type value, without parameters, lower-cased
 * - "Application/JSON; charset=utf-8" -> "application/json"
 */
export const parseMediaType = (contentType: string): string => {
  const [mediaType = ''] = contentType.split(';');
  return mediaType.trim().toLowerCase();
};

/**
 * The key under which `name` is stored, compared case-insensitively
 */
export const findHeaderKey = (headers: HttpHeaders, name: string): string | undefined => {
  const wanted = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === wanted);
};

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;
