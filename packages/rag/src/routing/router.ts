/**
 * Query Router
 *
 * Decides per query whether retrieval is needed and which knowledge bases
 * to search. Skipping retrieval wrongly is worse than retrieving needlessly,
 * so every failure or low-confidence answer falls back to retrieving from
 * all bases.
 *
 * @module @groundwork/rag/routing/router
 */

import { z } from 'zod';
import type { RouteDecision } from '../types';
import type { ChatLLM } from '../generation/llm';
import { ClassifierUnavailableError, errorMessage } from '../errors';
import { withTimeout, type RequestDeadline } from '../runtime/deadline';

/**
 * Raw classifier verdict before the router applies its safety rules
 */
export interface ClassifierOutput {
  needsRetrieval: boolean;
  targetBases: string[];
  reasoning: string;
  /** In [0, 1] */
  confidence: number;
}

/**
 * Pluggable classification strategy
 */
export interface QueryClassifier {
  classify(query: string, bases: readonly string[], signal?: AbortSignal): Promise<ClassifierOutput>;
}

export interface QueryRouterConfig {
  /** Every knowledge base the pipeline can search */
  bases: string[];
  /** Verdicts below this confidence are replaced by the safe default */
  minConfidence: number;
  timeoutMs: number;
}

const DEFAULT_CONFIG: QueryRouterConfig = {
  bases: ['default'],
  minConfidence: 0.5,
  timeoutMs: 2000,
};

export interface RouteResult {
  decision: RouteDecision;
  /** Set when the classifier failed or timed out */
  error?: ClassifierUnavailableError;
}

export class QueryRouter {
  private classifier: QueryClassifier | null;
  private config: QueryRouterConfig;

  constructor(classifier: QueryClassifier | null, config: Partial<QueryRouterConfig> = {}) {
    this.classifier = classifier;
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.bases.length === 0) {
      throw new RangeError('QueryRouter needs at least one knowledge base');
    }
  }

  async route(query: string, deadline?: RequestDeadline): Promise<RouteResult> {
    if (!this.classifier) {
      return {
        decision: {
          needsRetrieval: true,
          targetBases: [...this.config.bases],
          reasoning: 'No classifier configured; retrieving from all bases',
          confidence: 1,
          fallback: false,
        },
      };
    }

    const classifier = this.classifier;
    let output: ClassifierOutput;
    try {
      output = await withTimeout(
        (signal) => classifier.classify(query, this.config.bases, signal),
        { label: 'query classification', timeoutMs: this.config.timeoutMs, deadline }
      );
    } catch (error) {
      const classifierError =
        error instanceof ClassifierUnavailableError
          ? error
          : new ClassifierUnavailableError(errorMessage(error), error);
      console.warn(`Routing fell back to retrieval: ${classifierError.message}`);
      return {
        decision: this.fallback(`Classifier unavailable: ${classifierError.message}`),
        error: classifierError,
      };
    }

    if (!(output.confidence >= this.config.minConfidence)) {
      return {
        decision: this.fallback(
          `Low classifier confidence ${output.confidence} (< ${this.config.minConfidence}): ${output.reasoning}`
        ),
      };
    }

    if (!output.needsRetrieval) {
      return {
        decision: {
          needsRetrieval: false,
          targetBases: [],
          reasoning: output.reasoning,
          confidence: output.confidence,
          fallback: false,
        },
      };
    }

    const known = new Set(this.config.bases);
    const targets = Array.from(new Set(output.targetBases.filter((base) => known.has(base))));

    return {
      decision: {
        needsRetrieval: true,
        targetBases: targets.length > 0 ? targets : [...this.config.bases],
        reasoning: output.reasoning,
        confidence: output.confidence,
        fallback: false,
      },
    };
  }

  /**
   * Safe default: retrieve from every base
   */
  private fallback(reasoning: string): RouteDecision {
    return {
      needsRetrieval: true,
      targetBases: [...this.config.bases],
      reasoning,
      confidence: 0,
      fallback: true,
    };
  }

  get bases(): readonly string[] {
    return this.config.bases;
  }
}

// ============================================================================
// Keyword classifier
// ============================================================================

export interface KeywordQueryClassifierConfig {
  /** Keywords that point a query at a base */
  baseKeywords: Record<string, string[]>;
  /** Queries matching these need no retrieval when no base keyword matches */
  conversationalPatterns: RegExp[];
}

const DEFAULT_CONVERSATIONAL_PATTERNS: RegExp[] = [
  /^(hi|hello|hey|thanks|thank you|good (morning|afternoon|evening))[\s!.,]*$/i,
  /^(who are you|what can you do)\s*\??$/i,
];

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

/**
 * Deterministic rule-based classifier
 */
export class KeywordQueryClassifier implements QueryClassifier {
  private baseKeywords: Map<string, Set<string>>;
  private conversationalPatterns: RegExp[];

  constructor(config: Partial<KeywordQueryClassifierConfig> = {}) {
    this.baseKeywords = new Map(
      Object.entries(config.baseKeywords ?? {}).map(([base, words]) => [
        base,
        new Set(words.map((w) => w.toLowerCase())),
      ])
    );
    this.conversationalPatterns = config.conversationalPatterns ?? DEFAULT_CONVERSATIONAL_PATTERNS;
  }

  async classify(query: string, bases: readonly string[]): Promise<ClassifierOutput> {
    const tokens = tokenize(query);

    const scored = bases
      .map((base) => {
        const keywords = this.baseKeywords.get(base);
        const hits = keywords ? tokens.filter((t) => keywords.has(t)).length : 0;
        return { base, hits };
      })
      .filter((s) => s.hits > 0)
      .sort((a, b) => b.hits - a.hits || a.base.localeCompare(b.base));

    if (scored.length === 0) {
      const trimmed = query.trim();
      if (this.conversationalPatterns.some((pattern) => pattern.test(trimmed))) {
        return {
          needsRetrieval: false,
          targetBases: [],
          reasoning: 'Conversational message',
          confidence: 0.9,
        };
      }

      return {
        needsRetrieval: true,
        targetBases: [],
        reasoning: 'No base keywords matched; searching all bases',
        confidence: 0.6,
      };
    }

    const topHits = scored[0].hits;
    return {
      needsRetrieval: true,
      targetBases: scored.map((s) => s.base),
      reasoning: `Matched keywords for ${scored.map((s) => `${s.base} (${s.hits})`).join(', ')}`,
      confidence: Math.min(1, 0.6 + 0.1 * topHits),
    };
  }
}

// ============================================================================
// LLM classifier
// ============================================================================

const classifierResponseSchema = z.object({
  needs_retrieval: z.boolean(),
  target_bases: z.array(z.string()).default([]),
  reasoning: z.string().default(''),
  confidence: z.number().min(0).max(1),
});

function classifierPrompt(bases: readonly string[]): string {
  return `You route questions for a knowledge-grounded assistant.
Available knowledge bases: ${bases.join(', ')}.
Decide whether answering needs document retrieval and which bases to search.
Greetings and small talk need no retrieval. When unsure, choose retrieval.
Reply with JSON only:
{"needs_retrieval": boolean, "target_bases": string[], "reasoning": string, "confidence": number between 0 and 1}`;
}

/**
 * Extract the first JSON object from a model reply, ignoring code fences
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new ClassifierUnavailableError('reply contained no JSON object');
  }
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new ClassifierUnavailableError(`reply was not valid JSON: ${errorMessage(error)}`, error);
  }
}

export class LLMQueryClassifier implements QueryClassifier {
  private llm: ChatLLM;

  constructor(llm: ChatLLM) {
    this.llm = llm;
  }

  async classify(
    query: string,
    bases: readonly string[],
    signal?: AbortSignal
  ): Promise<ClassifierOutput> {
    let reply: string;
    try {
      reply = await this.llm.complete(
        [
          { role: 'system', content: classifierPrompt(bases) },
          { role: 'user', content: query },
        ],
        signal
      );
    } catch (error) {
      throw new ClassifierUnavailableError(errorMessage(error), error);
    }

    const parsed = classifierResponseSchema.safeParse(extractJsonObject(reply));
    if (!parsed.success) {
      throw new ClassifierUnavailableError(`malformed verdict: ${parsed.error.message}`);
    }

    return {
      needsRetrieval: parsed.data.needs_retrieval,
      targetBases: parsed.data.target_bases,
      reasoning: parsed.data.reasoning,
      confidence: parsed.data.confidence,
    };
  }
}

export function createQueryRouter(
  classifier: QueryClassifier | null,
  config?: Partial<QueryRouterConfig>
): QueryRouter {
  return new QueryRouter(classifier, config);
}
