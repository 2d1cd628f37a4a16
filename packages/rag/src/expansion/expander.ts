/**
 * Query Expansion
 *
 * Produces the variant list for multi-query retrieval: the original query
 * first, then generated rephrasings. Expansion is an enhancement; any
 * failure falls back to the original query alone.
 *
 * @module @groundwork/rag/expansion/expander
 */

import type { ChatLLM } from '../generation/llm';
import { ExpansionUnavailableError, errorMessage } from '../errors';
import type { FusedResult } from '../types';
import { DEFAULT_RRF_K, fuseVariants, variantWeights } from '../fusion/rrf';

/**
 * Variant generation strategy: `text -> up to n alternative phrasings`
 */
export interface QueryExpansionStrategy {
  expand(text: string, n: number, signal?: AbortSignal): Promise<string[]>;
}

export interface QueryVariant {
  text: string;
  weight: number;
  /** True for the caller's own query */
  original: boolean;
}

export interface ExpansionResult {
  variants: QueryVariant[];
  /** True when the strategy failed or produced nothing usable */
  degraded: boolean;
  error?: ExpansionUnavailableError;
}

export interface QueryExpanderConfig {
  /** Generated variants requested, on top of the original */
  numVariations: number;
  /** Geometric weight decay per variant position */
  decay: number;
}

const DEFAULT_CONFIG: QueryExpanderConfig = {
  numVariations: 3,
  decay: 0.7,
};

/**
 * Case- and whitespace-insensitive form used for de-duplication and cache keys
 */
export function normalizeQueryText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Original first, then unique non-empty variants, capped at `limit` extras
 */
export function dedupeVariants(original: string, generated: readonly string[], limit: number): string[] {
  const seen = new Set<string>([normalizeQueryText(original)]);
  const variants = [original];

  for (const candidate of generated) {
    if (variants.length > limit) break;
    const text = candidate.trim();
    const key = normalizeQueryText(text);
    if (key.length === 0 || seen.has(key)) continue;
    seen.add(key);
    variants.push(text);
  }

  return variants;
}

export class QueryExpander {
  private strategy: QueryExpansionStrategy | null;
  private config: QueryExpanderConfig;

  constructor(strategy: QueryExpansionStrategy | null, config: Partial<QueryExpanderConfig> = {}) {
    this.strategy = strategy;
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.numVariations) || this.config.numVariations < 0) {
      throw new RangeError(
        `numVariations must be a non-negative integer, got ${this.config.numVariations}`
      );
    }
    // Validates decay
    variantWeights(1, this.config.decay);
  }

  async expand(text: string, signal?: AbortSignal): Promise<ExpansionResult> {
    if (!this.strategy || this.config.numVariations === 0) {
      return { variants: this.weigh([text]), degraded: false };
    }

    let generated: string[];
    try {
      generated = await this.strategy.expand(text, this.config.numVariations, signal);
    } catch (error) {
      const expansionError =
        error instanceof ExpansionUnavailableError
          ? error
          : new ExpansionUnavailableError(errorMessage(error), error);
      console.warn(`Query expansion failed, using original query only: ${expansionError.message}`);
      return { variants: this.weigh([text]), degraded: true, error: expansionError };
    }

    const variants = dedupeVariants(text, generated, this.config.numVariations);
    if (variants.length === 1) {
      console.info('Query expansion produced no usable variants');
      return { variants: this.weigh(variants), degraded: true };
    }

    return { variants: this.weigh(variants), degraded: false };
  }

  private weigh(texts: string[]): QueryVariant[] {
    const weights = variantWeights(texts.length, this.config.decay);
    return texts.map((text, i) => ({ text, weight: weights[i], original: i === 0 }));
  }

  get numVariations(): number {
    return this.config.numVariations;
  }
}

/**
 * Merge per-variant fused rankings into one, weighting each by its variant.
 * A document found by several variants is one entry with summed contributions.
 */
export function mergeVariantResults(
  retrieved: ReadonlyArray<{ variant: QueryVariant; fused: readonly FusedResult[] }>,
  k: number = DEFAULT_RRF_K
): FusedResult[] {
  if (retrieved.length === 1) {
    return [...retrieved[0].fused];
  }
  return fuseVariants(
    retrieved.map(({ variant, fused }) => ({ weight: variant.weight, results: fused })),
    k
  );
}

// ============================================================================
// LLM strategy
// ============================================================================

const EXPANSION_SYSTEM_PROMPT = `You rewrite search queries for a document retrieval system.
Given a query, write alternative phrasings that keep its meaning but vary the vocabulary:
synonyms, expanded abbreviations, more specific or more general wording.
Return one phrasing per line, no numbering, no commentary.`;

/**
 * Strip list markers a model may add despite instructions
 */
function cleanLine(line: string): string {
  return line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').replace(/^"(.*)"$/, '$1').trim();
}

export class LLMQueryExpansion implements QueryExpansionStrategy {
  private llm: ChatLLM;

  constructor(llm: ChatLLM) {
    this.llm = llm;
  }

  async expand(text: string, n: number, signal?: AbortSignal): Promise<string[]> {
    let content: string;
    try {
      content = await this.llm.complete(
        [
          { role: 'system', content: EXPANSION_SYSTEM_PROMPT },
          { role: 'user', content: `Write ${n} alternative phrasings of:\n${text}` },
        ],
        signal
      );
    } catch (error) {
      throw new ExpansionUnavailableError(errorMessage(error), error);
    }

    return content
      .split('\n')
      .map(cleanLine)
      .filter((line) => line.length > 0)
      .slice(0, n);
  }
}

export function createQueryExpander(
  strategy: QueryExpansionStrategy | null,
  config?: Partial<QueryExpanderConfig>
): QueryExpander {
  return new QueryExpander(strategy, config);
}
