import type { ChatCompletionPayload, ComparisonRequest } from '../entities/Comparison.js';

/**
 * Chat message format for structured conversation
 */
export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Generation settings applied to every evaluation request
 */
export interface GenerationOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

/**
 * Turns a comparison request into a chat-completion payload
 */
export interface EvaluationTemplate {
  formatPayload(request: ComparisonRequest, options: GenerationOptions): ChatCompletionPayload;
}
