import type { ChatCompletionPayload, ComparisonRequest } from '../entities/Comparison.js';
import type { ChatMessage, EvaluationTemplate, GenerationOptions } from './types.js';

export const EVALUATOR_SYSTEM_PROMPT =
  'You are an expert evaluator tasked with comparing two responses to determine which is better. ' +
  'Be objective and analytical in your assessment.';

export const DEFAULT_GENERATION_OPTIONS: Omit<GenerationOptions, 'model'> = {
  maxTokens: 200,
  temperature: 0.1,
};

/**
 * Pairwise evaluation template
 *
 * Produces one system message (the evaluator persona) and one user message
 * embedding the input and both candidates verbatim, the four criteria and
 * the constrained answer format (A / B / Both / Neither + short reason).
 */
export class ComparisonTemplate implements EvaluationTemplate {
  formatPayload(request: ComparisonRequest, options: GenerationOptions): ChatCompletionPayload {
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: EVALUATOR_SYSTEM_PROMPT,
      },
      {
        role: 'user',
        content: this.buildUserPrompt(request),
      },
    ];

    return {
      model: options.model,
      messages,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
    };
  }

  buildUserPrompt({ inputMessage, outputA, outputB }: ComparisonRequest): string {
    return `
Please analyze the following input message and two output responses, then determine which output is better.

Input Message: "${inputMessage}"

Output A: "${outputA}"

Output B: "${outputB}"

Please evaluate both outputs based on:
1. Relevance to the input message
2. Accuracy and correctness
3. Clarity and comprehensiveness
4. Helpfulness and usefulness

Respond with ONLY one of the following:
- "A" if Output A is better
- "B" if Output B is better
- "Both" if both are equally good
- "Neither" if both outputs are bad or if neither adequately addresses the input

Provide a brief explanation (1-2 sentences) for your choice.
`;
  }
}
