/**
 * Generation Tests
 *
 * Prompt assembly, answer generation and the HTTP embedding client.
 *
 * @module @groundwork/rag/tests/unit/generation
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ChatLLM, type ChatBackend } from '../../src/generation/llm';
import { LLMAnswerGenerator } from '../../src/generation/generator';
import { HttpEmbedder } from '../../src/generation/embedder';
import {
  DIRECT_ANSWER_SYSTEM_PROMPT,
  GROUNDED_ANSWER_SYSTEM_PROMPT,
  createGroundedPrompt,
  formatContext,
} from '../../src/generation/prompts';
import { EmbeddingUnavailableError, GenerationUnavailableError } from '../../src/errors';

const docs = [
  { docId: 'd1', content: 'Delete the pod to restart it.' },
  { docId: 'd2', content: 'CrashLoopBackOff means repeated crashes.' },
];

afterEach(() => {
  vi.unstubAllGlobals();
});

// ============================================================================
// Prompts
// ============================================================================

describe('formatContext', () => {
  it('should number sources in order', () => {
    expect(formatContext(docs)).toBe(
      '[1] (d1)\nDelete the pod to restart it.\n---\n\n' +
        '[2] (d2)\nCrashLoopBackOff means repeated crashes.\n---'
    );
  });
});

describe('createGroundedPrompt', () => {
  it('should put the sources before the question', () => {
    expect(createGroundedPrompt('restart a pod', [docs[0]])).toBe(
      '## Sources\n[1] (d1)\nDelete the pod to restart it.\n---\n\n## Question\nrestart a pod'
    );
  });
});

// ============================================================================
// LLMAnswerGenerator
// ============================================================================

describe('LLMAnswerGenerator', () => {
  it('should send the grounded prompt when context is present', async () => {
    const chat = vi.fn<ChatBackend['chat']>().mockResolvedValue({ message: { content: 'Delete it [1].' } });
    const generator = new LLMAnswerGenerator(new ChatLLM({}, { chat }));

    const answer = await generator.generate('restart a pod', docs);

    expect(answer).toBe('Delete it [1].');
    expect(chat).toHaveBeenCalledWith({
      messages: [
        { role: 'system', content: GROUNDED_ANSWER_SYSTEM_PROMPT },
        { role: 'user', content: createGroundedPrompt('restart a pod', docs) },
      ],
    });
  });

  it('should answer directly without context', async () => {
    const chat = vi.fn<ChatBackend['chat']>().mockResolvedValue({ message: { content: 'Hello!' } });
    const generator = new LLMAnswerGenerator(new ChatLLM({}, { chat }));

    await generator.generate('hello', []);

    expect(chat).toHaveBeenCalledWith({
      messages: [
        { role: 'system', content: DIRECT_ANSWER_SYSTEM_PROMPT },
        { role: 'user', content: 'hello' },
      ],
    });
  });

  it('should wrap model failures as GenerationUnavailableError', async () => {
    const chat = vi.fn<ChatBackend['chat']>().mockRejectedValue(new Error('model not found'));
    const generator = new LLMAnswerGenerator(new ChatLLM({}, { chat }));

    const error = await generator.generate('q', docs).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationUnavailableError);
    expect(error).toMatchObject({
      message: 'Generation service unavailable: Requested model is not available.',
      category: 'soft_degraded',
    });
  });
});

// ============================================================================
// HttpEmbedder
// ============================================================================

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('HttpEmbedder', () => {
  it('should post the text and return the first embedding', async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      jsonResponse({ data: [{ index: 0, embedding: [0.1, 0.2, 0.3] }] })
    );
    vi.stubGlobal('fetch', fetchMock);
    const embedder = new HttpEmbedder({ baseUrl: 'http://embed.test/v1', apiKey: 'test-secret' });

    const vector = await embedder.embed('restart a pod');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://embed.test/v1/embeddings');
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(JSON.parse(init.body)).toEqual({
      model: 'text-embedding-3-small',
      input: ['restart a pod'],
      encoding_format: 'float',
    });
  });

  it('should reject vectors of the wrong dimension', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(jsonResponse({ data: [{ index: 0, embedding: [0.1, 0.2] }] }))
    );
    const embedder = new HttpEmbedder({ dimensions: 3 });

    await expect(embedder.embed('q')).rejects.toThrow(
      'Embedding service unavailable: expected 3 dimensions, got 2'
    );
  });

  it('should surface HTTP errors with status and body', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('boom', { status: 500 })));
    const embedder = new HttpEmbedder();

    await expect(embedder.embed('q')).rejects.toThrow(
      'Embedding service unavailable: Embedding API error: 500 - boom'
    );
  });

  it('should reject a response without embeddings', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ data: [] })));
    const embedder = new HttpEmbedder();

    const error = await embedder.embed('q').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingUnavailableError);
    expect(error).toMatchObject({
      message: expect.stringMatching(/^Embedding service unavailable: malformed response/),
    });
  });

  it('should report health from a test embedding', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('fetch failed')));
    const embedder = new HttpEmbedder();

    const health = await embedder.healthCheck();

    expect(health.healthy).toBe(false);
    expect(health.message).toBe('Embedding service unavailable: fetch failed');
  });
});
