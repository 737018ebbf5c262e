import { isAxiosError } from 'axios';

export class TransientPageFetchError extends Error {
  readonly page: number;
  readonly status?: number;

  constructor(page: number, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientPageFetchError';
    this.page = page;
    this.status = options.status;
  }
}

export class CatalogRequestError extends Error {
  readonly page: number;
  readonly status?: number;

  constructor(page: number, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CatalogRequestError';
    this.page = page;
    this.status = options.status;
  }
}

/**
 * The catalog could not be fetched completely. Nothing is downloaded when this
 * is raised, since a truncated catalog would silently skip products.
 */
export class RunAbortError extends Error {
  readonly page: number;
  readonly attempts: number;

  constructor(page: number, attempts: number, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RunAbortError';
    this.page = page;
    this.attempts = attempts;
  }
}

export class DownloadError extends Error {
  readonly externalCode: string;

  constructor(externalCode: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DownloadError';
    this.externalCode = externalCode;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export function describeError(error: unknown): string {
  if (isAxiosError(error)) {
    if (error.response) {
      return `HTTP ${error.response.status}`;
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'timeout';
    }
    if (error.code === 'ERR_CANCELED') {
      return 'request aborted';
    }
    return error.code || error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
