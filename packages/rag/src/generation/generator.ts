/**
 * Answer generation over the reranked context
 * @module @groundwork/rag/generation/generator
 */

import type { ChatLLM } from './llm';
import { GenerationUnavailableError, errorMessage } from '../errors';
import {
  DIRECT_ANSWER_SYSTEM_PROMPT,
  GROUNDED_ANSWER_SYSTEM_PROMPT,
  createGroundedPrompt,
  type ContextDocument,
} from './prompts';

/**
 * `Generate(prompt, contextDocs) -> text`; an empty context means a direct answer
 */
export interface AnswerGenerator {
  generate(prompt: string, contextDocs: readonly ContextDocument[], signal?: AbortSignal): Promise<string>;
}

export class LLMAnswerGenerator implements AnswerGenerator {
  private llm: ChatLLM;

  constructor(llm: ChatLLM) {
    this.llm = llm;
  }

  async generate(
    prompt: string,
    contextDocs: readonly ContextDocument[],
    signal?: AbortSignal
  ): Promise<string> {
    const messages =
      contextDocs.length > 0
        ? [
            { role: 'system' as const, content: GROUNDED_ANSWER_SYSTEM_PROMPT },
            { role: 'user' as const, content: createGroundedPrompt(prompt, contextDocs) },
          ]
        : [
            { role: 'system' as const, content: DIRECT_ANSWER_SYSTEM_PROMPT },
            { role: 'user' as const, content: prompt },
          ];

    try {
      return await this.llm.complete(messages, signal);
    } catch (error) {
      throw new GenerationUnavailableError(errorMessage(error), error);
    }
  }
}

export function createAnswerGenerator(llm: ChatLLM): LLMAnswerGenerator {
  return new LLMAnswerGenerator(llm);
}
