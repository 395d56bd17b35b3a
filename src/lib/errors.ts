/**
 * Postwatch — Error taxonomy
 *
 * Only ConfigError is fatal to the process. Everything else is handled
 * inside the pipeline (skip, retry, degrade or dead-letter).
 */

export type PostwatchErrorCode =
  | 'no_healthy_endpoint'
  | 'fetch_failed'
  | 'analysis_unavailable'
  | 'delivery_failed'
  | 'config_invalid';

export class PostwatchError extends Error {
  readonly code: PostwatchErrorCode;
  readonly cause?: unknown;

  constructor(code: PostwatchErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message);
    this.name = 'PostwatchError';
    this.code = code;
    this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Every mirror endpoint is currently disabled.
 */
export class NoHealthyEndpointError extends PostwatchError {
  readonly retryAt: Date | null;

  constructor(retryAt: Date | null) {
    super(
      'no_healthy_endpoint',
      retryAt
        ? `No healthy mirror endpoint (next re-enable at ${retryAt.toISOString()})`
        : 'No mirror endpoints configured'
    );
    this.name = 'NoHealthyEndpointError';
    this.retryAt = retryAt;
  }
}

export class FetchError extends PostwatchError {
  readonly endpoint: string;
  readonly accountHandle: string;

  constructor(args: { endpoint: string; accountHandle: string; message: string; cause?: unknown }) {
    super('fetch_failed', args.message, { cause: args.cause });
    this.name = 'FetchError';
    this.endpoint = args.endpoint;
    this.accountHandle = args.accountHandle;
  }
}

export class AnalysisUnavailableError extends PostwatchError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super('analysis_unavailable', message, options);
    this.name = 'AnalysisUnavailableError';
  }
}

export class DeliveryError extends PostwatchError {
  readonly channel: string;
  readonly status?: number;

  constructor(args: { channel: string; message: string; status?: number; cause?: unknown }) {
    super('delivery_failed', args.message, { cause: args.cause });
    this.name = 'DeliveryError';
    this.channel = args.channel;
    this.status = args.status;
  }
}

export class ConfigError extends PostwatchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('config_invalid', `Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
