import fetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import https from 'https';
import { z } from 'zod';
import type { IChatCompletionClient } from '../../core/interfaces/IChatCompletionClient.js';
import type { ChatCompletionPayload, ChatCompletionResponse } from '../../core/entities/Comparison.js';
import {
  MalformedResponseError,
  RequestFailedError,
  UserCancelledError,
  describeError,
} from '../../core/errors.js';
import { isCertificateError } from '../../utils/tls.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface PerplexityClientOptions {
  timeoutMs?: number;
  /**
   * Retry once without certificate validation when the first attempt fails
   * on a certificate error. Off unless explicitly enabled.
   */
  allowInsecureTlsRetry?: boolean;
  onWarning?: (message: string) => void;
}

export const DEFAULT_TIMEOUT_MS = 30000;

export const INSECURE_TLS_WARNING =
  'WARNING: TLS certificate validation failed. Retrying once with certificate validation DISABLED. ' +
  'The connection to the API is not authenticated.';

const ChatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string(),
        }),
      })
    )
    .optional(),
});

class HttpStatusError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

/**
 * Perplexity chat-completions API client
 *
 * One request per call. The only second attempt is the opt-in insecure TLS
 * fallback; timeouts, rate limits and 5xx responses fail straight away.
 */
export class PerplexityApiClient implements IChatCompletionClient {
  private timeoutMs: number;
  private allowInsecureTlsRetry: boolean;
  private onWarning: (message: string) => void;

  constructor(
    private apiUrl: string,
    private apiKey: string,
    options: PerplexityClientOptions = {},
    private fetchImpl: FetchLike = fetch
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.allowInsecureTlsRetry = options.allowInsecureTlsRetry ?? false;
    this.onWarning = options.onWarning ?? ((message) => console.error(message));
  }

  async createChatCompletion(
    payload: ChatCompletionPayload,
    abortSignal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    try {
      return await this.post(payload, undefined, abortSignal);
    } catch (error) {
      if (error instanceof UserCancelledError || error instanceof MalformedResponseError) {
        throw error;
      }
      if (error instanceof HttpStatusError || !isCertificateError(error)) {
        throw new RequestFailedError(`API request failed: ${describeError(error)}`, statusOf(error), {
          cause: error,
        });
      }
      if (!this.allowInsecureTlsRetry) {
        throw new RequestFailedError(
          `API request failed: ${describeError(error)} ` +
            '(certificate validation failed; use --allow-insecure-tls-retry to retry once without it)',
          undefined,
          { cause: error }
        );
      }

      this.onWarning(INSECURE_TLS_WARNING);
      const insecureAgent = new https.Agent({ rejectUnauthorized: false });
      try {
        return await this.post(payload, insecureAgent, abortSignal);
      } catch (retryError) {
        if (retryError instanceof UserCancelledError || retryError instanceof MalformedResponseError) {
          throw retryError;
        }
        throw new RequestFailedError(
          `API request failed even with SSL verification disabled: ${describeError(retryError)} ` +
            `(initial error: ${describeError(error)})`,
          statusOf(retryError),
          { cause: retryError }
        );
      } finally {
        insecureAgent.destroy();
      }
    }
  }

  private async post(
    payload: ChatCompletionPayload,
    agent: https.Agent | undefined,
    abortSignal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    if (abortSignal?.aborted) {
      throw new UserCancelledError();
    }

    let res: Response;
    try {
      res = await raceAbort(
        this.fetchImpl(`${this.apiUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(payload),
          timeout: this.timeoutMs,
          agent,
          signal: abortSignal,
        }),
        abortSignal
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw new UserCancelledError();
      }
      throw error;
    }

    if (!res.ok) {
      const detail = await readErrorDetail(res);
      throw new HttpStatusError(
        `HTTP ${res.status} ${res.statusText}`.trim() + (detail ? `: ${detail}` : ''),
        res.status
      );
    }

    let body: unknown;
    try {
      body = await raceAbort(res.json(), abortSignal);
    } catch (error) {
      if (error instanceof UserCancelledError) {
        throw error;
      }
      throw new Error(`Invalid JSON in response body: ${describeError(error)}`);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new MalformedResponseError(
        issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'unexpected response shape'
      );
    }
    return parsed.data;
  }
}

// node-fetch rejects an aborted request with an error named 'AbortError'
function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

function statusOf(error: unknown): number | undefined {
  return error instanceof HttpStatusError ? error.status : undefined;
}

/**
 * Pull the API's own error message out of a failed response, if it sent one
 */
async function readErrorDetail(res: Response): Promise<string | undefined> {
  let text: string;
  try {
    text = await res.text();
  } catch {
    return undefined;
  }
  if (!text) return undefined;

  const message = extractErrorMessage(parseJson(text));
  if (message) return message;
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

function extractErrorMessage(data: unknown): string | undefined {
  const parsed = ErrorBodySchema.safeParse(data);
  if (!parsed.success) return undefined;
  return typeof parsed.data.error === 'string' ? parsed.data.error : parsed.data.error.message;
}

function raceAbort<T>(promise: Promise<T>, abortSignal?: AbortSignal): Promise<T> {
  if (!abortSignal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new UserCancelledError());
    if (abortSignal.aborted) {
      onAbort();
      return;
    }
    abortSignal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        abortSignal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        abortSignal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
