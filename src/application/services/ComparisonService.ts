import type { IChatCompletionClient } from '../../core/interfaces/IChatCompletionClient.js';
import type { ComparisonRequest, MalformedResponsePolicy } from '../../core/entities/Comparison.js';
import type { EvaluationTemplate, GenerationOptions } from '../../core/templates/types.js';
import { ComparisonTemplate, DEFAULT_GENERATION_OPTIONS } from '../../core/templates/ComparisonTemplate.js';
import { MalformedResponseError } from '../../core/errors.js';

export const INVALID_RESPONSE_SENTINEL = 'Error: Unable to get a valid response from the API';

export interface ComparisonServiceOptions {
  model: string;
  malformedResponsePolicy?: MalformedResponsePolicy;
  template?: EvaluationTemplate;
}

/**
 * Service for judging two candidate outputs against an input message
 */
export class ComparisonService {
  private generation: GenerationOptions;
  private malformedResponsePolicy: MalformedResponsePolicy;
  private template: EvaluationTemplate;

  constructor(
    private client: IChatCompletionClient,
    options: ComparisonServiceOptions
  ) {
    this.generation = { ...DEFAULT_GENERATION_OPTIONS, model: options.model };
    this.malformedResponsePolicy = options.malformedResponsePolicy ?? 'sentinel';
    this.template = options.template ?? new ComparisonTemplate();
  }

  /**
   * Ask the model which output is better; returns its verdict text
   */
  async compare(
    inputMessage: string,
    outputA: string,
    outputB: string,
    abortSignal?: AbortSignal
  ): Promise<string> {
    const request: ComparisonRequest = Object.freeze({ inputMessage, outputA, outputB });
    const payload = this.template.formatPayload(request, this.generation);

    try {
      const response = await this.client.createChatCompletion(payload, abortSignal);
      const firstChoice = response.choices?.[0];
      if (!firstChoice) {
        throw new MalformedResponseError('no choices in response');
      }
      return firstChoice.message.content.trim();
    } catch (error) {
      if (error instanceof MalformedResponseError && this.malformedResponsePolicy === 'sentinel') {
        return INVALID_RESPONSE_SENTINEL;
      }
      throw error;
    }
  }
}
