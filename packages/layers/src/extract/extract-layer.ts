import { getLogger, type Logger } from '@tessera/logger';
import { describeError, type Layer, type Service, type ServiceError } from '@tessera/service';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import type { Extractable, ExtractedResponse, Extractor } from './types.js';

/**
 * Decodes response bodies by type key.
 *
 * A failed or missing extraction is not an error: the response still
 * succeeds with `content: null`. Errors from the inner service pass through.
 */
export class ExtractLayer<Req, Res, E = ServiceError>
  implements Layer<Service<Req, Res, E>, Service<Req, ExtractedResponse<Res>, E>>
{
  private readonly extractors = new Map<string, Extractor>();

  constructor(private readonly extractable: Extractable<Res>) {}

  register(typeKey: string, extractor: Extractor): this {
    this.extractors.set(typeKey, extractor);
    return this;
  }

  /** Services keep the extractors registered at wrap time. */
  wrap(inner: Service<Req, Res, E>): Service<Req, ExtractedResponse<Res>, E> {
    return new ExtractService(inner, this.extractable, new Map(this.extractors));
  }
}

class ExtractService<Req, Res, E> implements Service<Req, ExtractedResponse<Res>, E> {
  private readonly logger: Logger;

  constructor(
    private readonly inner: Service<Req, Res, E>,
    private readonly extractable: Extractable<Res>,
    private readonly extractors: ReadonlyMap<string, Extractor>
  ) {
    this.logger = getLogger('ExtractLayer');
  }

  async call(request: Req): Promise<Result<ExtractedResponse<Res>, E>> {
    const result = await this.inner.call(request);
    if (result.isErr()) {
      return err(result.error);
    }

    const raw = result.value;
    const typeKey = this.extractable.getTypeKey(raw);
    return ok({ content: this.extract(typeKey, this.extractable.getBytes(raw)), raw, typeKey });
  }

  private extract(typeKey: string, bytes: Uint8Array): unknown {
    const extractor = this.extractors.get(typeKey);
    if (!extractor) {
      this.logger.debug({ typeKey }, 'No extractor registered');
      return null;
    }
    if (bytes.length === 0) {
      return null;
    }

    try {
      return extractor(bytes) ?? null;
    } catch (error) {
      this.logger.debug({ error: describeError(error), typeKey }, 'Extractor failed');
      return null;
    }
  }
}

/**
 * Validate extracted content. Returns null when there is no content or it
 * does not match the schema.
 */
export function contentAs<T>(extracted: ExtractedResponse<unknown>, schema: ZodType<T, ZodTypeDef, unknown>): T | null {
  if (extracted.content === null || extracted.content === undefined) {
    return null;
  }
  const parsed = schema.safeParse(extracted.content);
  return parsed.success ? parsed.data : null;
}
