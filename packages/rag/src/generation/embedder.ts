/**
 * Embedding Client
 *
 * Query embeddings from an OpenAI-compatible `/embeddings` endpoint.
 *
 * @module @groundwork/rag/generation/embedder
 */

import { z } from 'zod';
import { EmbeddingUnavailableError, errorMessage } from '../errors';
import type { ComponentHealth } from '../types';

/**
 * Text embedding contract
 */
export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface HttpEmbedderConfig {
  /** Base URL for the embedding service */
  baseUrl: string;
  /** API key (optional for local deployments) */
  apiKey?: string;
  model: string;
  /** Expected vector length; responses of another length are rejected */
  dimensions?: number;
  /** Request timeout in milliseconds */
  timeout: number;
}

const DEFAULT_CONFIG: HttpEmbedderConfig = {
  baseUrl: 'http://localhost:8001/v1',
  model: 'text-embedding-3-small',
  timeout: 30000,
};

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        index: z.number().int(),
        embedding: z.array(z.number()),
      })
    )
    .min(1),
});

export class HttpEmbedder implements Embedder {
  private config: HttpEmbedderConfig;

  constructor(config: Partial<HttpEmbedderConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const url = `${this.config.baseUrl}/embeddings`;
    const timeoutSignal = AbortSignal.timeout(this.config.timeout);
    const requestSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    let payload: unknown;
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.config.apiKey && {
            Authorization: `Bearer ${this.config.apiKey}`,
          }),
        },
        body: JSON.stringify({
          model: this.config.model,
          input: [text],
          encoding_format: 'float',
        }),
        signal: requestSignal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`Embedding API error: ${response.status} - ${body}`);
      }

      payload = await response.json();
    } catch (error) {
      throw new EmbeddingUnavailableError(errorMessage(error), error);
    }

    const parsed = embeddingResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EmbeddingUnavailableError(`malformed response: ${parsed.error.message}`);
    }

    const vector = parsed.data.data[0].embedding;
    if (this.config.dimensions !== undefined && vector.length !== this.config.dimensions) {
      throw new EmbeddingUnavailableError(
        `expected ${this.config.dimensions} dimensions, got ${vector.length}`
      );
    }

    return vector;
  }

  async healthCheck(): Promise<ComponentHealth> {
    const start = Date.now();

    try {
      await this.embed('health check');
      return {
        healthy: true,
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      return {
        healthy: false,
        latencyMs: Date.now() - start,
        message: errorMessage(error),
      };
    }
  }
}

export function createEmbedder(config: Partial<HttpEmbedderConfig> = {}): HttpEmbedder {
  return new HttpEmbedder(config);
}
