import { CatalogClient } from '../api/catalogClient.js';
import { downloadImages } from './downloader.js';
import { RunAbortError } from './errors.js';
import { HttpImageFetcher } from './imageFetcher.js';
import { resolveImages } from './locator.js';
import { fetchCatalog } from './paginator.js';
import { silentLogger } from '../logger.js';
import { emptySummary } from './types.js';
import type { Logger } from '../logger.js';
import type { DownloadOptions } from './downloader.js';
import type { ImageFetcher } from './imageFetcher.js';
import type { CatalogFetchResult, PaginationOptions } from './paginator.js';
import type { CatalogPageSource, RunSummary, SyncConfig } from './types.js';

export interface RunDependencies {
  config: Readonly<SyncConfig>;
  source: CatalogPageSource;
  fetcher: ImageFetcher;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: PaginationOptions['sleep'];
  onPage?: PaginationOptions['onPage'];
  onCatalogReady?: (info: { records: number; candidates: number; skipped: number }) => void;
  onResult?: DownloadOptions['onResult'];
}

export type RunReport =
  | { ok: true; summary: RunSummary }
  | { ok: false; error: RunAbortError; summary: RunSummary };

export function createHttpCollaborators(config: Readonly<SyncConfig>): Pick<RunDependencies, 'source' | 'fetcher'> {
  return {
    source: new CatalogClient({
      baseUrl: config.apiBaseUrl,
      domainKey: config.domainKey,
      authToken: config.authToken,
      timeoutMs: config.requestTimeoutMs,
      onlyWithImages: config.onlyWithImages,
      insecureTls: config.insecureTls,
      userAgent: config.userAgent
    }),
    fetcher: new HttpImageFetcher({ userAgent: config.userAgent, insecureTls: config.insecureTls })
  };
}

/**
 * Fetches the whole catalog, resolves one image per product and downloads
 * them. A catalog failure yields `ok: false` before any download starts.
 */
export async function runImageSync(deps: RunDependencies): Promise<RunReport> {
  const { config } = deps;
  const logger = deps.logger ?? silentLogger;
  const summary = emptySummary();

  let catalog: CatalogFetchResult;
  try {
    catalog = await fetchCatalog(deps.source, {
      pageSize: config.pageSize,
      maxPageAttempts: config.maxPageAttempts,
      pageRetryDelayMs: config.pageRetryDelayMs,
      maxPages: config.maxPages,
      signal: deps.signal,
      logger,
      onPage: deps.onPage,
      sleep: deps.sleep
    });
  } catch (error) {
    if (error instanceof RunAbortError) {
      return { ok: false, error, summary };
    }
    throw error;
  }

  summary.records = catalog.records.length;
  summary.invalid = catalog.invalid;

  const { images, skipped } = resolveImages(catalog.records, config.preferredSize, config.imageBaseUrl);
  summary.skipped = skipped;
  logger.debug(`Resolved ${images.length} image(s); ${skipped} product(s) without images`);
  deps.onCatalogReady?.({ records: catalog.records.length, candidates: images.length, skipped });

  const tally = await downloadImages(images, {
    outputDir: config.outputDir,
    concurrency: config.concurrency,
    timeoutMs: config.downloadTimeoutMs,
    attempts: config.downloadAttempts,
    skipExisting: config.skipExisting,
    fetcher: deps.fetcher,
    signal: deps.signal,
    logger,
    onResult: deps.onResult
  });

  return { ok: true, summary: { ...summary, ...tally } };
}
