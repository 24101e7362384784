/**
 * Error taxonomy
 *
 * Every failure below the CLI boundary is thrown as one of these. The CLI
 * turns them into a single `Error: <message>` line and exit status 1.
 */

export type ComparatorErrorCode =
  | 'MISSING_CREDENTIAL'
  | 'CONFIG_INVALID'
  | 'NOT_FOUND'
  | 'EMPTY_CONTENT'
  | 'READ_FAILED'
  | 'REQUEST_FAILED'
  | 'MALFORMED_RESPONSE'
  | 'USER_CANCELLED';

export abstract class ComparatorError extends Error {
  abstract readonly code: ComparatorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends ComparatorError {
  readonly code = 'MISSING_CREDENTIAL';

  constructor(public readonly variable: string) {
    super(`${variable} environment variable is required.`);
  }

  /**
   * Second line shown to the user after the error itself
   */
  get hint(): string {
    return `Please set it with: export ${this.variable}='your-api-key-here'`;
  }
}

export class ConfigError extends ComparatorError {
  readonly code = 'CONFIG_INVALID';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export class NotFoundError extends ComparatorError {
  readonly code = 'NOT_FOUND';

  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`File not found: ${path}`, options);
  }
}

export class EmptyContentError extends ComparatorError {
  readonly code = 'EMPTY_CONTENT';

  constructor(public readonly path: string) {
    super(`File ${path} is empty`);
  }
}

export class ReadError extends ComparatorError {
  readonly code = 'READ_FAILED';

  constructor(public readonly path: string, reason: string, options?: { cause?: unknown }) {
    super(`Error reading file ${path}: ${reason}`, options);
  }
}

export class RequestFailedError extends ComparatorError {
  readonly code = 'REQUEST_FAILED';

  constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MalformedResponseError extends ComparatorError {
  readonly code = 'MALFORMED_RESPONSE';

  constructor(reason: string) {
    super(`Unable to get a valid response from the API: ${reason}`);
  }
}

export class UserCancelledError extends ComparatorError {
  readonly code = 'USER_CANCELLED';

  constructor() {
    super('Operation cancelled by user.');
  }
}

/**
 * Message text of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
