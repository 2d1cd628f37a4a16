/**
 * Error Taxonomy
 *
 * Every collaborator failure is raised as a RagServiceError subclass so the
 * orchestrator can decide between degrading, flagging and surfacing.
 *
 * @module @groundwork/rag/errors
 */

/**
 * How the pipeline reacts to a failure:
 * - hard_unavailable: a retrieval backend is down; degrade, fail only if every path failed
 * - soft_degraded: an enhancement stage failed; always recovered locally
 * - timeout: a stage or the request deadline expired
 */
export type ErrorCategory = 'hard_unavailable' | 'soft_degraded' | 'timeout';

export type ServiceName =
  | 'lexical_index'
  | 'vector_index'
  | 'embedding'
  | 'generation'
  | 'expansion'
  | 'classifier'
  | 'reranker'
  | 'cache'
  | 'pipeline';

export class RagServiceError extends Error {
  public readonly service: ServiceName;
  public readonly category: ErrorCategory;

  constructor(
    message: string,
    service: ServiceName,
    category: ErrorCategory,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RagServiceError';
    this.service = service;
    this.category = category;
  }
}

export class IndexUnavailableError extends RagServiceError {
  public readonly indexName: string;

  constructor(
    indexName: string,
    service: 'lexical_index' | 'vector_index',
    message: string,
    cause?: unknown
  ) {
    super(`Index "${indexName}" unavailable: ${message}`, service, 'hard_unavailable', cause);
    this.name = 'IndexUnavailableError';
    this.indexName = indexName;
  }
}

export class EmbeddingUnavailableError extends RagServiceError {
  constructor(message: string, cause?: unknown) {
    super(`Embedding service unavailable: ${message}`, 'embedding', 'hard_unavailable', cause);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class CacheUnavailableError extends RagServiceError {
  constructor(message: string, cause?: unknown) {
    super(`Cache backend unavailable: ${message}`, 'cache', 'hard_unavailable', cause);
    this.name = 'CacheUnavailableError';
  }
}

export class GenerationUnavailableError extends RagServiceError {
  constructor(message: string, cause?: unknown) {
    super(`Generation service unavailable: ${message}`, 'generation', 'soft_degraded', cause);
    this.name = 'GenerationUnavailableError';
  }
}

export class ExpansionUnavailableError extends RagServiceError {
  constructor(message: string, cause?: unknown) {
    super(`Query expansion unavailable: ${message}`, 'expansion', 'soft_degraded', cause);
    this.name = 'ExpansionUnavailableError';
  }
}

export class ClassifierUnavailableError extends RagServiceError {
  constructor(message: string, cause?: unknown) {
    super(`Query classifier unavailable: ${message}`, 'classifier', 'soft_degraded', cause);
    this.name = 'ClassifierUnavailableError';
  }
}

export class RerankerUnavailableError extends RagServiceError {
  constructor(message: string, cause?: unknown) {
    super(`Reranker unavailable: ${message}`, 'reranker', 'soft_degraded', cause);
    this.name = 'RerankerUnavailableError';
  }
}

/**
 * A stage ran past its own budget ('stage') or the request ran out of
 * time ('deadline')
 */
export class StageTimeoutError extends RagServiceError {
  public readonly timeoutMs: number;
  public readonly reason: 'stage' | 'deadline';

  constructor(label: string, timeoutMs: number, reason: 'stage' | 'deadline') {
    super(
      reason === 'deadline'
        ? `${label} abandoned: request deadline expired`
        : `${label} timed out after ${timeoutMs}ms`,
      'pipeline',
      'timeout'
    );
    this.name = 'StageTimeoutError';
    this.timeoutMs = timeoutMs;
    this.reason = reason;
  }
}

/**
 * A failed retrieval path, kept for RetrievalFailedError reporting
 */
export interface SourceFailure {
  base: string;
  source: 'lexical' | 'vector';
  variant: string;
  message: string;
}

/**
 * Every retrieval path failed at once. Distinct from an empty result set,
 * which is reported as the `no_results` status.
 */
export class RetrievalFailedError extends RagServiceError {
  public readonly failures: SourceFailure[];

  constructor(failures: SourceFailure[]) {
    super(
      `All retrieval paths failed (${failures.length} attempted)`,
      'pipeline',
      'hard_unavailable'
    );
    this.name = 'RetrievalFailedError';
    this.failures = failures;
  }
}

/**
 * Extract a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isDeadlineError(error: unknown): boolean {
  return error instanceof StageTimeoutError && error.reason === 'deadline';
}
