import type { RetrievalCandidate } from '@curator/shared';
import { generate_with_flash } from './gemini.js';
import { logger } from '../../lib/logger.js';
import { truncate } from '../../lib/text.js';

const ANSWER_PROMPT = `
You are a helpful assistant for a community knowledge base.
{instruction}
Reply in the language of the question. Keep the answer short and use Markdown.
Content marked [sensitive] must be wrapped in ||spoiler|| markers.

Context:
{context}

Question: {question}
`;

export const FALLBACK_ANSWER = 'I encountered an error processing your question.';

export function build_answer_prompt(question: string, facts: RetrievalCandidate[]): string {
  const instruction =
    facts.length > 0
      ? 'Use the provided context to answer. Prefer it over general knowledge.'
      : 'No stored knowledge matched. Answer from general knowledge only if you are confident, otherwise say you do not know yet.';

  const context =
    facts.length > 0
      ? facts
          .map((f) => {
            const marker = f.visibility === 'sensitive' ? ' [sensitive]' : '';
            return `[${f.fact_id}]${marker} Topic: ${f.topic}\nContent: ${truncate(f.content, 1000)}`;
          })
          .join('\n\n')
      : 'No database context available.';

  // Single pass, function replacer: `$&` and placeholders inside the values stay literal
  const values: Record<string, string> = { instruction, context, question };
  return ANSWER_PROMPT.replace(
    /\{(instruction|context|question)\}/g,
    (placeholder: string, key: string) => values[key] ?? placeholder,
  );
}

export async function compose_answer(question: string, facts: RetrievalCandidate[]): Promise<string> {
  try {
    const response = await generate_with_flash(build_answer_prompt(question, facts));
    return response.trim();
  } catch (error) {
    logger.error('Answer generation failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return FALLBACK_ANSWER;
  }
}
