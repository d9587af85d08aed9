export type AsOfErrorCode =
  | 'InvalidReference'
  | 'MissingTimestamp'
  | 'NoRevisionFound'
  | 'UpstreamForbidden'
  | 'UpstreamUnavailable'
  | 'UpstreamRejected'
  | 'ContentFetchFailed';

export interface AsOfErrorOptions {
  status?: number;
  cause?: unknown;
}

export class AsOfError extends Error {
  readonly status?: number;

  constructor(
    readonly code: AsOfErrorCode,
    message: string,
    options: AsOfErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'AsOfError';
    this.status = options.status;
  }

  /** Only transport-level failures are worth a caller-side retry. */
  get retryable(): boolean {
    return this.code === 'UpstreamUnavailable';
  }
}

export class InvalidReferenceError extends AsOfError {
  constructor(input: string, cause?: unknown) {
    super('InvalidReference', `Could not parse a title or oldid from "${input}".`, { cause });
    this.name = 'InvalidReferenceError';
  }
}

export class MissingTimestampError extends AsOfError {
  constructor() {
    super('MissingTimestamp', 't_query is required when no oldid is provided.');
    this.name = 'MissingTimestampError';
  }
}

export class NoRevisionFoundError extends AsOfError {
  constructor(title: string, instant: string, options: AsOfErrorOptions = {}) {
    super('NoRevisionFound', `No revision for '${title}' at or before ${instant}.`, options);
    this.name = 'NoRevisionFoundError';
  }
}

export class UpstreamForbiddenError extends AsOfError {
  constructor(detail: string | null, options: AsOfErrorOptions = {}) {
    super(
      'UpstreamForbidden',
      detail
        ? `Upstream refused the request: ${detail}`
        : 'Upstream refused the request. Send a descriptive User-Agent with contact details.',
      { status: 403, ...options }
    );
    this.name = 'UpstreamForbiddenError';
  }
}

export class UpstreamUnavailableError extends AsOfError {
  constructor(message: string, options: AsOfErrorOptions = {}) {
    super('UpstreamUnavailable', message, options);
    this.name = 'UpstreamUnavailableError';
  }
}

export class UpstreamRejectedError extends AsOfError {
  constructor(message: string, options: AsOfErrorOptions = {}) {
    super('UpstreamRejected', message, options);
    this.name = 'UpstreamRejectedError';
  }
}

export class ContentFetchFailedError extends AsOfError {
  constructor(revisionId: number, detail: string, options: AsOfErrorOptions = {}) {
    super('ContentFetchFailed', `Could not fetch content for revision ${revisionId}: ${detail}`, options);
    this.name = 'ContentFetchFailedError';
  }
}

export function isAsOfError(error: unknown): error is AsOfError {
  return error instanceof AsOfError;
}

export function describeError(error: unknown): string {
  if (isAsOfError(error)) {
    return `[${error.code}] ${error.message}`;
  }
  return `[Unexpected] ${error instanceof Error ? error.message : String(error)}`;
}
