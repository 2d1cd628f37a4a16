/**
 * Prompt Templates for Grounded Answers
 *
 * @module @groundwork/rag/generation/prompts
 */

/**
 * A context document as shown to the model
 */
export interface ContextDocument {
  docId: string;
  content: string;
}

/**
 * Number the context documents so the answer can cite them as [1], [2], ...
 */
export function formatContext(docs: readonly ContextDocument[]): string {
  return docs
    .map((doc, i) => `[${i + 1}] (${doc.docId})\n${doc.content}\n---`)
    .join('\n\n');
}

export const GROUNDED_ANSWER_SYSTEM_PROMPT = `You answer questions using only the numbered sources provided.
Cite sources as [1], [2] immediately after the statement they support.
If the sources do not answer the question, say so plainly instead of guessing.`;

export const DIRECT_ANSWER_SYSTEM_PROMPT = `You are a concise, friendly assistant.
Answer conversational messages directly. Do not invent facts about specific systems or documents.`;

export function createGroundedPrompt(query: string, docs: readonly ContextDocument[]): string {
  return `## Sources
${formatContext(docs)}

## Question
${query}`;
}
