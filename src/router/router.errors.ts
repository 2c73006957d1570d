/**
 * Error types used by the routing pipeline.
 *
 * Only ConfigurationError and RouteCancelledError ever leave `route()`.
 * Timeouts and malformed model output are caught inside the stage that
 * produced them and turned into a fallback decision.
 */

export type RouterErrorCode =
  | 'CONFIGURATION'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'LLM_RESPONSE_FORMAT';

export class RouterError extends Error {
  constructor(
    message: string,
    public readonly code: RouterErrorCode
  ) {
    super(message);
    this.name = 'RouterError';
  }
}

export class ConfigurationError extends RouterError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class TimeoutError extends RouterError {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class RouteCancelledError extends RouterError {
  constructor(stage?: string) {
    super(stage ? `Routing cancelled during ${stage}` : 'Routing cancelled', 'CANCELLED');
    this.name = 'RouteCancelledError';
  }
}

export class LlmResponseFormatError extends RouterError {
  constructor(message: string, public readonly rawContent: string) {
    super(message, 'LLM_RESPONSE_FORMAT');
    this.name = 'LlmResponseFormatError';
  }
}
