import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { DownloadError, describeError } from './errors.js';
import { silentLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ImageFetcher } from './imageFetcher.js';
import type { DownloadResult, ResolvedImage, RunSummary } from './types.js';

export const IMAGE_EXTENSION = '.jpg';

export type DownloadTally = Pick<RunSummary, 'candidates' | 'succeeded' | 'failed' | 'existing' | 'superseded' | 'cancelled' | 'failures'>;

export interface DownloadOptions {
  outputDir: string;
  concurrency: number;
  timeoutMs: number;
  fetcher: ImageFetcher;
  /** Fetch attempts per image; 1 means no retry. */
  attempts?: number;
  skipExisting?: boolean;
  signal?: AbortSignal;
  logger?: Logger;
  onResult?: (result: DownloadResult, done: number, total: number) => void;
}

export function buildImagePath(baseDir: string, externalCode: string): string {
  return path.join(baseDir, `${externalCode}${IMAGE_EXTENSION}`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes to a sibling temp file and renames it over the target, so the
 * target is either the previous file or the complete new one.
 */
export async function writeFileAtomic(destPath: string, data: Buffer): Promise<void> {
  const tempPath = `${destPath}.${crypto.randomBytes(6).toString('hex')}.tmp`;
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, destPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function fetchImageData(image: ResolvedImage, options: DownloadOptions): Promise<Buffer> {
  const attempts = Math.max(1, options.attempts ?? 1);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await options.fetcher.fetchImage(image.url, options.timeoutMs);
    } catch (error) {
      lastError = error;
    }
  }
  throw new DownloadError(image.externalCode, `download failed (${image.url}): ${describeError(lastError)}`, lastError);
}

async function storeImage(externalCode: string, filePath: string, data: Buffer): Promise<void> {
  try {
    await writeFileAtomic(filePath, data);
  } catch (error) {
    throw new DownloadError(externalCode, `write failed (${filePath}): ${describeError(error)}`, error);
  }
}

export async function downloadImage(image: ResolvedImage, options: DownloadOptions): Promise<DownloadResult> {
  const { externalCode } = image;
  const filePath = buildImagePath(options.outputDir, externalCode);

  if (options.skipExisting && (await fileExists(filePath))) {
    return { status: 'existing', externalCode, filePath };
  }

  try {
    const data = await fetchImageData(image, options);
    await storeImage(externalCode, filePath, data);
    return { status: 'success', externalCode, bytesWritten: data.byteLength, filePath };
  } catch (error) {
    if (error instanceof DownloadError) {
      return { status: 'failure', externalCode, reason: error.message };
    }
    throw error;
  }
}

/**
 * Keeps the last image listed for each product code, at that image's
 * position. Two downloads of one code would otherwise race for the file.
 */
export function latestPerCode(images: readonly ResolvedImage[]): ResolvedImage[] {
  const lastIndex = new Map<string, number>();
  images.forEach((image, i) => lastIndex.set(image.externalCode, i));
  return images.filter((image, i) => lastIndex.get(image.externalCode) === i);
}

/**
 * Downloads every image with at most `concurrency` requests in flight.
 * A failed item is recorded and never stops the batch.
 */
export async function downloadImages(images: readonly ResolvedImage[], options: DownloadOptions): Promise<DownloadTally> {
  const logger = options.logger ?? silentLogger;
  const queue = latestPerCode(images);
  const total = queue.length;
  const tally: DownloadTally = {
    candidates: images.length,
    succeeded: 0,
    failed: 0,
    existing: 0,
    superseded: images.length - total,
    cancelled: 0,
    failures: []
  };
  if (tally.superseded > 0) {
    logger.debug(`${tally.superseded} image(s) share a product code with a later record and were not downloaded`);
  }
  let index = 0;
  let done = 0;

  const record = (result: DownloadResult) => {
    done += 1;
    if (result.status === 'success') {
      tally.succeeded += 1;
      logger.debug(`Saved ${result.externalCode} (${result.bytesWritten} bytes)`);
    } else if (result.status === 'existing') {
      tally.existing += 1;
      logger.debug(`Kept existing ${result.filePath}`);
    } else {
      tally.failed += 1;
      tally.failures.push({ externalCode: result.externalCode, reason: result.reason });
      logger.debug(`Failed ${result.externalCode}: ${result.reason}`);
    }
    options.onResult?.(result, done, total);
  };

  const workerCount = Math.max(1, Math.min(options.concurrency, total));
  const workers = Array.from({ length: workerCount }, async () => {
    while (index < total) {
      if (options.signal?.aborted) {
        return;
      }
      const current = queue[index];
      index += 1;
      let result: DownloadResult;
      try {
        result = await downloadImage(current, options);
      } catch (error) {
        result = { status: 'failure', externalCode: current.externalCode, reason: describeError(error) };
      }
      record(result);
    }
  });

  await Promise.all(workers);
  tally.cancelled = total - done;
  if (tally.cancelled > 0) {
    logger.warn(`Interrupted: ${tally.cancelled} image(s) were not started`);
  }
  return tally;
}
