import type { ChatCompletionPayload, ChatCompletionResponse } from '../entities/Comparison.js';

/**
 * Interface for a chat-completions API client
 */
export interface IChatCompletionClient {
  /**
   * Send one chat-completion request and return the decoded JSON body.
   * Rejects with RequestFailedError on transport or HTTP failure and with
   * UserCancelledError when the signal fires.
   */
  createChatCompletion(
    payload: ChatCompletionPayload,
    abortSignal?: AbortSignal
  ): Promise<ChatCompletionResponse>;
}
