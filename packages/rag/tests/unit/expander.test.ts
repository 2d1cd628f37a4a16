/**
 * Query Expansion Tests
 *
 * @module @groundwork/rag/tests/unit/expander
 */

import { describe, it, expect, vi } from 'vitest';
import {
  QueryExpander,
  LLMQueryExpansion,
  dedupeVariants,
  mergeVariantResults,
  normalizeQueryText,
  type QueryExpansionStrategy,
} from '../../src/expansion/expander';
import { ChatLLM, type ChatBackend } from '../../src/generation/llm';
import { ExpansionUnavailableError } from '../../src/errors';

function strategyReturning(variants: string[]): QueryExpansionStrategy {
  return { expand: vi.fn().mockResolvedValue(variants) };
}

describe('normalizeQueryText', () => {
  it('should lowercase and collapse whitespace', () => {
    expect(normalizeQueryText('  Restart   a\tCrashed POD ')).toBe('restart a crashed pod');
  });
});

describe('dedupeVariants', () => {
  it('should keep the original first and drop case or whitespace duplicates', () => {
    const variants = dedupeVariants(
      'restart a crashed pod',
      ['Restart a  crashed pod', 'recover a failed pod', ' recover a FAILED pod ', ''],
      3
    );

    expect(variants).toEqual(['restart a crashed pod', 'recover a failed pod']);
  });

  it('should be idempotent', () => {
    const once = dedupeVariants('q one', ['Q one', 'q two', 'q two', 'q three'], 5);
    const twice = dedupeVariants(once[0], once.slice(1), 5);

    expect(twice).toEqual(once);
  });

  it('should cap generated variants at the limit', () => {
    expect(dedupeVariants('q', ['a', 'b', 'c', 'd'], 2)).toEqual(['q', 'a', 'b']);
  });
});

describe('QueryExpander', () => {
  it('should return only the original query without a strategy', async () => {
    const expander = new QueryExpander(null);
    const result = await expander.expand('how do I rotate keys');

    expect(result.degraded).toBe(false);
    expect(result.variants).toEqual([{ text: 'how do I rotate keys', weight: 1, original: true }]);
  });

  it('should weight generated variants with geometric decay', async () => {
    const expander = new QueryExpander(strategyReturning(['rotate api keys', 'key rotation']), {
      numVariations: 2,
      decay: 0.5,
    });

    const result = await expander.expand('how do I rotate keys');

    expect(result.degraded).toBe(false);
    expect(result.variants).toEqual([
      { text: 'how do I rotate keys', weight: 1, original: true },
      { text: 'rotate api keys', weight: 0.5, original: false },
      { text: 'key rotation', weight: 0.25, original: false },
    ]);
  });

  it('should fall back to the original query when the strategy fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const expander = new QueryExpander({
      expand: vi.fn().mockRejectedValue(new Error('model offline')),
    });

    const result = await expander.expand('rotate keys');

    expect(result.degraded).toBe(true);
    expect(result.variants.map((v) => v.text)).toEqual(['rotate keys']);
    expect(result.error).toBeInstanceOf(ExpansionUnavailableError);
    expect(result.error?.message).toBe('Query expansion unavailable: model offline');
    warn.mockRestore();
  });

  it('should flag expansion as degraded when every variant is a duplicate', async () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const expander = new QueryExpander(strategyReturning(['ROTATE KEYS', '  ']));

    const result = await expander.expand('rotate keys');

    expect(result.degraded).toBe(true);
    expect(result.variants).toHaveLength(1);
    info.mockRestore();
  });

  it('should reject a negative variant count', () => {
    expect(() => new QueryExpander(null, { numVariations: -1 })).toThrow(RangeError);
  });
});

describe('mergeVariantResults', () => {
  it('should return a single variant ranking unchanged', () => {
    const fused = [{ docId: 'a', fusedScore: 0.02, contributingRanks: { lexical: 0 } }];
    const merged = mergeVariantResults([
      { variant: { text: 'q', weight: 1, original: true }, fused },
    ]);

    expect(merged).toEqual(fused);
    expect(merged).not.toBe(fused);
  });

  it('should keep one entry per document across variants and give the same result when repeated', () => {
    const fused = [
      { docId: 'x', fusedScore: 0.03, contributingRanks: { lexical: 0 } },
      { docId: 'y', fusedScore: 0.02, contributingRanks: { vector: 0 } },
      { docId: 'x', fusedScore: 0.01, contributingRanks: { vector: 2 } },
      { docId: 'z', fusedScore: 0.01, contributingRanks: { lexical: 1 } },
    ];
    const retrieved = [
      { variant: { text: 'rotate keys', weight: 1, original: true }, fused },
      { variant: { text: 'key rotation', weight: 0.7, original: false }, fused },
    ];

    const first = mergeVariantResults(retrieved, 60);
    const second = mergeVariantResults(retrieved, 60);

    expect(first.map((r) => r.docId)).toEqual(['x', 'y', 'z']);
    expect(new Set(first.map((r) => r.docId)).size).toBe(first.length);
    expect(second).toEqual(first);
    expect(first[0].fusedScore).toBeCloseTo(1 / 60 + 0.7 / 60, 12);
    expect(first[0].contributingRanks).toEqual({ lexical: 0 });
  });
});

describe('LLMQueryExpansion', () => {
  it('should parse one variant per line and strip list markers', async () => {
    const backend: ChatBackend = {
      chat: vi.fn().mockResolvedValue({
        message: { content: '1. rotate api keys\n- "key rotation steps"\n\n* renew credentials\nextra line' },
      }),
    };
    const strategy = new LLMQueryExpansion(new ChatLLM({}, backend));

    const variants = await strategy.expand('rotate keys', 3);

    expect(variants).toEqual(['rotate api keys', 'key rotation steps', 'renew credentials']);
  });
});
