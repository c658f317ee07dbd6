import { z } from 'zod';
import { logger } from '../../lib/logger.js';
import { EmbeddingUnavailableError, error_message } from '../../lib/errors.js';
import { with_timeout, TimeoutError } from '../../lib/timeout.js';

const log = logger.child({ component: 'embedding_gateway' });

export type EmbeddingProvider = (text: string, signal: AbortSignal) => Promise<unknown>;

export interface EmbedOptions {
  timeout_ms?: number;
}

export interface EmbeddingGateway {
  readonly dimensions: number;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
}

export interface EmbeddingGatewayOptions {
  dimensions: number;
  timeout_ms: number;
}

function vector_schema(dimensions: number) {
  return z.array(z.number().finite()).length(dimensions);
}

/**
 * Wraps a raw provider with a deadline and output validation. Every failure
 * (unreachable service, timeout, malformed or wrong-sized vector) surfaces as
 * EmbeddingUnavailableError; there is no retry here.
 */
export function create_embedding_gateway(
  provider: EmbeddingProvider,
  options: EmbeddingGatewayOptions,
): EmbeddingGateway {
  const schema = vector_schema(options.dimensions);

  async function embed(text: string, embed_options: EmbedOptions = {}): Promise<number[]> {
    const timeout_ms = embed_options.timeout_ms ?? options.timeout_ms;

    let raw: unknown;
    try {
      raw = await with_timeout('embedding request', (signal) => provider(text, signal), timeout_ms);
    } catch (error) {
      const reason = error instanceof TimeoutError ? 'timeout' : 'request_failed';
      log.warn('embedding request failed', { reason, error: error_message(error) });
      throw new EmbeddingUnavailableError(`Embedding service unavailable: ${error_message(error)}`, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      log.warn('embedding response malformed', {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), code: i.code, message: i.message })),
      });
      throw new EmbeddingUnavailableError(
        `Embedding service returned a malformed vector (expected ${options.dimensions} finite numbers)`,
      );
    }

    return parsed.data;
  }

  return { dimensions: options.dimensions, embed };
}
