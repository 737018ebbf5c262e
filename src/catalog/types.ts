export const SIZE_TAGS = [60, 144, 250, 500] as const;

export type SizeTag = (typeof SIZE_TAGS)[number];

export function isSizeTag(value: number): value is SizeTag {
  return SIZE_TAGS.some(tag => tag === value);
}

export interface CatalogRecord {
  readonly externalCode: string;
  readonly imageVariants: ReadonlyMap<SizeTag, string>;
}

export interface CatalogPage {
  page: number;
  records: CatalogRecord[];
  /** Entries dropped because they had no usable product code. */
  invalid: number;
  hasMore: boolean;
  /** Total product count as reported by the API, if any. */
  reportedTotal?: number;
}

export interface CatalogPageSource {
  fetchPage(page: number, pageSize?: number): Promise<CatalogPage>;
}

export interface ResolvedImage {
  externalCode: string;
  url: string;
}

export type DownloadResult =
  | { status: 'success'; externalCode: string; bytesWritten: number; filePath: string }
  | { status: 'failure'; externalCode: string; reason: string }
  | { status: 'existing'; externalCode: string; filePath: string };

export interface DownloadFailure {
  externalCode: string;
  reason: string;
}

export interface RunSummary {
  records: number;
  candidates: number;
  succeeded: number;
  failed: number;
  skipped: number;
  invalid: number;
  existing: number;
  /** Images dropped because a later record has the same product code. */
  superseded: number;
  cancelled: number;
  failures: DownloadFailure[];
}

export interface SyncConfig {
  apiBaseUrl: string;
  domainKey?: string;
  authToken?: string;
  imageBaseUrl: string;
  outputDir: string;
  preferredSize: SizeTag;
  concurrency: number;
  pageSize?: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  maxPageAttempts: number;
  pageRetryDelayMs: number;
  maxPages: number;
  downloadAttempts: number;
  onlyWithImages: boolean;
  skipExisting: boolean;
  insecureTls: boolean;
  userAgent: string;
  verbose: boolean;
  progressEvery: number;
}

export function emptySummary(): RunSummary {
  return {
    records: 0,
    candidates: 0,
    succeeded: 0,
    failed: 0,
    skipped: 0,
    invalid: 0,
    existing: 0,
    superseded: 0,
    cancelled: 0,
    failures: []
  };
}
