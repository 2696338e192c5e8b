import type { Backend } from './types';

export class AppError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }

  /** Extra fields rendered next to `error` in the JSON body. */
  details(): Record<string, unknown> {
    return {};
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(400, message);
  }
}

export class ExtractionError extends AppError {
  readonly filename: string;

  readonly fileType: string;

  constructor(filename: string, fileType: string, message: string, options?: { cause?: unknown }) {
    super(422, message, options);
    this.filename = filename;
    this.fileType = fileType;
  }

  details(): Record<string, unknown> {
    return { filename: this.filename, file_type: this.fileType };
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, message);
  }
}

export class BackendUnavailableError extends AppError {
  readonly backend: Backend;

  readonly upstreamStatus?: number;

  constructor(
    backend: Backend,
    message: string,
    options: { upstreamStatus?: number; cause?: unknown } = {},
  ) {
    super(503, message, { cause: options.cause });
    this.backend = backend;
    this.upstreamStatus = options.upstreamStatus;
  }

  /** Transport failures, timeouts, 429 and 5xx may succeed on a later attempt. */
  get retryable(): boolean {
    const status = this.upstreamStatus;
    return status === undefined || status === 429 || status >= 500;
  }

  details(): Record<string, unknown> {
    return { backend: this.backend };
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
};
