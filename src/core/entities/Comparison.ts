import type { ChatMessage } from '../templates/types.js';

/**
 * Comparison domain entities
 */
export interface ComparisonRequest {
  readonly inputMessage: string;
  readonly outputA: string;
  readonly outputB: string;
}

export interface ComparisonResult {
  verdictText: string;
  inputFile?: string;
  outputAFile?: string;
  outputBFile?: string;
}

/**
 * What to do when the API answers without a verdict:
 * - 'sentinel': return the fixed "unable to get a valid response" text as the verdict
 * - 'error': throw MalformedResponseError
 */
export type MalformedResponsePolicy = 'sentinel' | 'error';

/**
 * Body of a POST /chat/completions request
 */
export interface ChatCompletionPayload {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
}

export interface ChatCompletionChoice {
  message: {
    role?: string;
    content: string;
  };
}

export interface ChatCompletionResponse {
  id?: string;
  model?: string;
  choices?: ChatCompletionChoice[];
}
