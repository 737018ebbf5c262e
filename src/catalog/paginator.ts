import { RunAbortError, TransientPageFetchError, describeError } from './errors.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { CatalogPage, CatalogPageSource, CatalogRecord } from './types.js';

export interface PaginationOptions {
  pageSize?: number;
  /** Total attempts per page, first request included. */
  maxPageAttempts: number;
  pageRetryDelayMs: number;
  maxPages: number;
  /** Checked before each request; once aborted no further page is requested. */
  signal?: AbortSignal;
  logger?: Logger;
  onPage?: (progress: { page: number; records: number; totalRecords: number }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface CatalogFetchResult {
  records: CatalogRecord[];
  invalid: number;
  pages: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function throwIfAborted(page: number, attempts: number, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunAbortError(page, attempts, `Catalog fetch interrupted before page ${page}`);
  }
}

async function fetchPageWithRetry(
  source: CatalogPageSource,
  page: number,
  options: PaginationOptions,
  logger: Logger
): Promise<CatalogPage> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;
  while (true) {
    throwIfAborted(page, attempt, options.signal);
    attempt += 1;
    try {
      return await source.fetchPage(page, options.pageSize);
    } catch (error) {
      if (!(error instanceof TransientPageFetchError)) {
        throw new RunAbortError(page, attempt, `Catalog page ${page} failed: ${describeError(error)}`, error);
      }
      if (attempt >= options.maxPageAttempts) {
        throw new RunAbortError(
          page,
          attempt,
          `Catalog page ${page} failed after ${attempt} attempt(s): ${error.message}`,
          error
        );
      }
      const delay = options.pageRetryDelayMs * 2 ** (attempt - 1);
      logger.warn(`${error.message}; retrying in ${delay}ms (attempt ${attempt + 1}/${options.maxPageAttempts})`);
      if (delay > 0) {
        await wait(delay);
      }
    }
  }
}

/**
 * Walks the catalog from page 1 until the API signals exhaustion. Any page
 * that cannot be fetched aborts the whole walk with a RunAbortError.
 */
export async function fetchCatalog(source: CatalogPageSource, options: PaginationOptions): Promise<CatalogFetchResult> {
  const logger = options.logger ?? silentLogger;
  const records: CatalogRecord[] = [];
  let invalid = 0;
  let reportedTotal: number | undefined;
  let page = 1;

  while (true) {
    if (page > options.maxPages) {
      throw new RunAbortError(
        page,
        0,
        `Catalog still reported more pages after ${options.maxPages} page(s); raise the page ceiling if this is expected`
      );
    }

    const result = await fetchPageWithRetry(source, page, options, logger);
    records.push(...result.records);
    invalid += result.invalid;
    if (reportedTotal === undefined) {
      reportedTotal = result.reportedTotal;
    }
    if (result.invalid > 0) {
      logger.debug(`Page ${page}: dropped ${result.invalid} entries without a usable product code`);
    }
    options.onPage?.({ page, records: result.records.length, totalRecords: records.length });

    if (!result.hasMore) {
      break;
    }
    page += 1;
  }

  const seen = records.length + invalid;
  if (reportedTotal !== undefined && reportedTotal !== seen) {
    logger.warn(`API reported ${reportedTotal} products but ${seen} were returned across ${page} page(s)`);
  }

  return { records, invalid, pages: page };
}
