import { getLogger, type Logger } from '@tessera/logger';
import { describeError, type Layer, type ServiceError } from '@tessera/service';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import type { HttpJsonResponse, HttpJsonService, HttpRequest, HttpService } from '../types.js';

type JsonDecoder<T> = (value: unknown) => { success: true; data: T } | { success: false; reason: string };

/**
 * Parses response bodies as JSON, keeping the raw bytes.
 *
 * ```ts
 * JsonLayer.create();                  // HttpJsonService<unknown>
 * JsonLayer.withSchema(orderSchema);   // HttpJsonService<Order>
 * ```
 *
 * `body.json` is null for an empty or whitespace body, invalid JSON, or a
 * body the schema rejects. None of these are errors.
 */
export class JsonLayer<T = unknown> implements Layer<HttpService, HttpJsonService<T>> {
  private constructor(private readonly decode: JsonDecoder<T>) {}

  static create(): JsonLayer<unknown> {
    return new JsonLayer<unknown>((value) => ({ data: value, success: true }));
  }

  static withSchema<T>(schema: ZodType<T, ZodTypeDef, unknown>): JsonLayer<T> {
    return new JsonLayer<T>((value) => {
      const parsed = schema.safeParse(value);
      if (parsed.success) {
        return { data: parsed.data, success: true };
      }
      const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return { reason, success: false };
    });
  }

  wrap(inner: HttpService): HttpJsonService<T> {
    return new JsonService(inner, this.decode);
  }
}

class JsonService<T> implements HttpJsonService<T> {
  private readonly logger: Logger;
  private readonly textDecoder = new TextDecoder();

  constructor(
    private readonly inner: HttpService,
    private readonly decode: JsonDecoder<T>
  ) {
    this.logger = getLogger('JsonLayer');
  }

  async call(request: HttpRequest): Promise<Result<HttpJsonResponse<T>, ServiceError>> {
    const result = await this.inner.call(request);
    if (result.isErr()) {
      return err(result.error);
    }

    const { body, ...metadata } = result.value;
    return ok({ ...metadata, body: { json: this.parse(body, metadata.url), rawBytes: body } });
  }

  private parse(bytes: Uint8Array, url: string): T | null {
    const text = this.textDecoder.decode(bytes);
    if (text.trim() === '') {
      return null;
    }

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      this.logger.debug({ error: describeError(error), url }, 'Body is not JSON');
      return null;
    }

    const decoded = this.decode(value);
    if (!decoded.success) {
      this.logger.debug({ reason: decoded.reason, url }, 'JSON body failed validation');
      return null;
    }
    return decoded.data;
  }
}
