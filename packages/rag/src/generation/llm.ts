/**
 * Chat LLM Client
 *
 * OpenAI-compatible chat client shared by answer generation, query
 * expansion and LLM-based routing. Includes classified errors and
 * automatic retry with exponential backoff for transient failures.
 *
 * @module @groundwork/rag/generation/llm
 */

import { OpenAI } from '@llamaindex/openai';
import type { ComponentHealth } from '../types';

// ============================================================================
// Error Types
// ============================================================================

/**
 * LLM service error types for graceful error handling
 */
export type LLMErrorType =
  | 'CONNECTION_ERROR'
  | 'TIMEOUT_ERROR'
  | 'RATE_LIMIT_ERROR'
  | 'MODEL_ERROR'
  | 'CONTEXT_LENGTH_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'ABORTED'
  | 'UNKNOWN_ERROR';

/**
 * Custom error class for LLM service errors
 */
export class LLMServiceError extends Error {
  public readonly errorType: LLMErrorType;
  public readonly isRetryable: boolean;
  public readonly statusCode?: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    errorType: LLMErrorType,
    options?: {
      isRetryable?: boolean;
      statusCode?: number;
      originalError?: Error;
    }
  ) {
    super(message);
    this.name = 'LLMServiceError';
    this.errorType = errorType;
    this.isRetryable = options?.isRetryable ?? false;
    this.statusCode = options?.statusCode;
    this.originalError = options?.originalError;
  }
}

export interface ClassifiedLLMError {
  type: LLMErrorType;
  message: string;
  isRetryable: boolean;
  statusCode?: number;
}

/**
 * Classify an error into an LLM error type
 */
export function classifyLLMError(error: unknown): ClassifiedLLMError {
  if (error instanceof LLMServiceError) {
    return {
      type: error.errorType,
      message: error.message,
      isRetryable: error.isRetryable,
      statusCode: error.statusCode,
    };
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  const lowerMessage = errorMessage.toLowerCase();

  if (error instanceof Error && error.name === 'AbortError') {
    return {
      type: 'ABORTED',
      message: 'LLM request was aborted.',
      isRetryable: false,
    };
  }

  // Connection errors
  if (
    lowerMessage.includes('econnrefused') ||
    lowerMessage.includes('enotfound') ||
    lowerMessage.includes('network') ||
    lowerMessage.includes('connection refused') ||
    lowerMessage.includes('failed to fetch')
  ) {
    return {
      type: 'CONNECTION_ERROR',
      message: 'LLM service is unreachable. Please check if the service is running.',
      isRetryable: true,
    };
  }

  // Timeout errors
  if (
    lowerMessage.includes('timeout') ||
    lowerMessage.includes('timed out') ||
    lowerMessage.includes('etimedout')
  ) {
    return {
      type: 'TIMEOUT_ERROR',
      message: 'LLM request timed out. The service may be overloaded.',
      isRetryable: true,
    };
  }

  // Rate limit errors
  if (
    lowerMessage.includes('rate limit') ||
    lowerMessage.includes('too many requests') ||
    lowerMessage.includes('429')
  ) {
    return {
      type: 'RATE_LIMIT_ERROR',
      message: 'LLM rate limit exceeded. Please try again later.',
      isRetryable: true,
      statusCode: 429,
    };
  }

  // Context length errors
  if (
    lowerMessage.includes('context length') ||
    lowerMessage.includes('max_tokens') ||
    lowerMessage.includes('too long') ||
    lowerMessage.includes('token limit')
  ) {
    return {
      type: 'CONTEXT_LENGTH_ERROR',
      message: 'Request exceeds the model context length limit.',
      isRetryable: false,
    };
  }

  // Model errors
  if (
    lowerMessage.includes('model not found') ||
    lowerMessage.includes('model_not_found') ||
    lowerMessage.includes('invalid model')
  ) {
    return {
      type: 'MODEL_ERROR',
      message: 'Requested model is not available.',
      isRetryable: false,
    };
  }

  // Service unavailable (5xx errors)
  if (
    lowerMessage.includes('502') ||
    lowerMessage.includes('503') ||
    lowerMessage.includes('504') ||
    lowerMessage.includes('bad gateway') ||
    lowerMessage.includes('service unavailable')
  ) {
    return {
      type: 'SERVICE_UNAVAILABLE',
      message: 'LLM service is temporarily unavailable.',
      isRetryable: true,
    };
  }

  return {
    type: 'UNKNOWN_ERROR',
    message: errorMessage || 'An unknown error occurred with the LLM service.',
    isRetryable: false,
  };
}

// ============================================================================
// Retry Configuration
// ============================================================================

export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Exponential backoff factor */
  backoffFactor: number;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

export function calculateBackoffDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffFactor, attempt);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Sleep that ends early when the signal aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

// ============================================================================
// Client
// ============================================================================

export interface ChatLLMConfig {
  /** Base URL for the OpenAI-compatible service */
  baseUrl: string;
  /** API key (optional for local deployments) */
  apiKey?: string;
  model: string;
  maxTokens: number;
  /** Temperature for generation (0.0 - 2.0) */
  temperature: number;
  /** Request timeout in milliseconds */
  timeout: number;
  retry?: Partial<RetryConfig>;
}

const DEFAULT_CONFIG: ChatLLMConfig = {
  baseUrl: 'http://localhost:8000/v1',
  model: 'gpt-4o-mini',
  maxTokens: 1024,
  temperature: 0.2,
  timeout: 60000,
};

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Message content as returned by LlamaIndex: plain text or typed parts
 */
export type MessageContent = string | ReadonlyArray<{ type: string; text?: string }>;

/**
 * The slice of the LlamaIndex client this module calls
 */
export interface ChatBackend {
  chat(params: {
    messages: ChatMessage[];
  }): Promise<{ message: { content: MessageContent } }>;
}

/**
 * Flatten multi-part message content to its text parts
 */
export function messageText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.type === 'text' && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

export class ChatLLM {
  private config: ChatLLMConfig;
  private retryConfig: RetryConfig;
  private client: ChatBackend;

  constructor(config: Partial<ChatLLMConfig> = {}, client?: ChatBackend) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };

    this.retryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      ...config.retry,
    };

    this.client =
      client ??
      new OpenAI({
        apiKey: this.config.apiKey || 'not-needed',
        additionalSessionOptions: {
          baseURL: this.config.baseUrl,
        },
        model: this.config.model,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
        timeout: this.config.timeout,
      });
  }

  /**
   * Generate a complete response with retry logic. Retries stop once the
   * signal aborts; an in-flight request is left to finish on its own.
   */
  async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
    return this.withRetry(async () => {
      try {
        const response = await this.client.chat({ messages });
        return messageText(response.message.content);
      } catch (error) {
        throw this.wrapError(error);
      }
    }, signal);
  }

  /**
   * Generate a complete response, returning the error instead of throwing
   */
  async completeWithFallback(
    messages: ChatMessage[],
    signal?: AbortSignal
  ): Promise<{ content: string | null; error?: LLMServiceError }> {
    try {
      const content = await this.complete(messages, signal);
      return { content };
    } catch (error) {
      const llmError = this.wrapError(error);
      console.error(`LLM error [${llmError.errorType}]:`, llmError.message);
      return { content: null, error: llmError };
    }
  }

  async healthCheck(): Promise<ComponentHealth & { errorType?: LLMErrorType }> {
    const start = Date.now();

    try {
      await this.complete([{ role: 'user', content: 'Say "ok"' }]);
      return {
        healthy: true,
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      const classified = classifyLLMError(error);
      return {
        healthy: false,
        latencyMs: Date.now() - start,
        message: classified.message,
        errorType: classified.type,
      };
    }
  }

  /**
   * Execute a function with retry logic for transient errors
   */
  private async withRetry<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        const classified = classifyLLMError(error);

        if (
          !classified.isRetryable ||
          attempt >= this.retryConfig.maxRetries ||
          signal?.aborted
        ) {
          throw error;
        }

        const delay = calculateBackoffDelay(attempt, this.retryConfig);
        console.warn(
          `LLM request failed (attempt ${attempt + 1}/${this.retryConfig.maxRetries + 1}): ` +
          `${classified.message}. Retrying in ${delay}ms...`
        );

        await sleep(delay, signal);
        if (signal?.aborted) {
          throw error;
        }
      }
    }
  }

  private wrapError(error: unknown): LLMServiceError {
    if (error instanceof LLMServiceError) {
      return error;
    }

    const classified = classifyLLMError(error);
    return new LLMServiceError(classified.message, classified.type, {
      isRetryable: classified.isRetryable,
      statusCode: classified.statusCode,
      originalError: error instanceof Error ? error : undefined,
    });
  }

  get model(): string {
    return this.config.model;
  }
}

export function createLLM(
  config: Partial<ChatLLMConfig> = {},
  client?: ChatBackend
): ChatLLM {
  return new ChatLLM(config, client);
}
