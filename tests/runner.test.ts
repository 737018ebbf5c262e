import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CatalogRequestError } from '../src/catalog/errors.js';
import type { ImageFetcher } from '../src/catalog/imageFetcher.js';
import { runImageSync } from '../src/catalog/runner.js';
import type { CatalogPage, CatalogPageSource } from '../src/catalog/types.js';
import { makeConfig, makeRecord } from './helpers/fixtures.js';

function pagedSource(pages: CatalogPage[]): CatalogPageSource {
  return {
    fetchPage: async page => {
      const found = pages.find(candidate => candidate.page === page);
      if (!found) {
        throw new Error(`unexpected page ${page}`);
      }
      return found;
    }
  };
}

describe('runImageSync', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'product-images-run-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('fetches, resolves and downloads the catalog', async () => {
    const source = pagedSource([
      {
        page: 1,
        records: [
          makeRecord('A1', { 250: 'https://cdn.test/a250.jpg', 500: 'https://cdn.test/a500.jpg' }),
          makeRecord('NOIMG')
        ],
        invalid: 1,
        hasMore: true
      },
      { page: 2, records: [makeRecord('C3', { 60: '/img/c60.jpg' })], invalid: 0, hasMore: false }
    ]);
    const requested: string[] = [];
    const fetcher: ImageFetcher = {
      fetchImage: async url => {
        requested.push(url);
        return Buffer.from(url);
      }
    };
    const onCatalogReady = vi.fn();

    const report = await runImageSync({ config: makeConfig({ outputDir }), source, fetcher, onCatalogReady });

    expect(report).toEqual({
      ok: true,
      summary: {
        records: 3,
        candidates: 2,
        succeeded: 2,
        failed: 0,
        skipped: 1,
        invalid: 1,
        existing: 0,
        superseded: 0,
        cancelled: 0,
        failures: []
      }
    });
    expect(requested.sort()).toEqual(['https://cdn.test/a250.jpg', 'https://cdn.test/img/c60.jpg']);
    expect(onCatalogReady).toHaveBeenCalledWith({ records: 3, candidates: 2, skipped: 1 });
    expect((await fs.readdir(outputDir)).sort()).toEqual(['A1.jpg', 'C3.jpg']);
  });

  it('downloads nothing when the catalog cannot be fetched', async () => {
    const source: CatalogPageSource = {
      fetchPage: async page => {
        if (page === 1) {
          return { page, records: [makeRecord('A1', { 250: 'https://cdn.test/a.jpg' })], invalid: 0, hasMore: true };
        }
        throw new CatalogRequestError(page, `Page ${page}: HTTP 401`, { status: 401 });
      }
    };
    const fetcher: ImageFetcher = { fetchImage: vi.fn(async () => Buffer.from('x')) };

    const report = await runImageSync({ config: makeConfig({ outputDir }), source, fetcher });

    expect(report.ok).toBe(false);
    if (report.ok) {
      return;
    }
    expect(report.error.page).toBe(2);
    expect(report.error.message).toBe('Catalog page 2 failed: Page 2: HTTP 401');
    expect(report.summary.succeeded).toBe(0);
    expect(report.summary.candidates).toBe(0);
    expect(fetcher.fetchImage).not.toHaveBeenCalled();
    expect(await fs.readdir(outputDir)).toEqual([]);
  });

  it('stops paging and downloads nothing once interrupted during the catalog fetch', async () => {
    const controller = new AbortController();
    const fetchPage = vi.fn(async (page: number): Promise<CatalogPage> => {
      controller.abort();
      return { page, records: [makeRecord(`R${page}`, { 250: 'https://cdn.test/r.jpg' })], invalid: 0, hasMore: true };
    });
    const fetcher: ImageFetcher = { fetchImage: vi.fn(async () => Buffer.from('x')) };

    const report = await runImageSync({
      config: makeConfig({ outputDir }),
      source: { fetchPage },
      fetcher,
      signal: controller.signal
    });

    expect(report.ok).toBe(false);
    if (report.ok) {
      return;
    }
    expect(report.error.message).toBe('Catalog fetch interrupted before page 2');
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetcher.fetchImage).not.toHaveBeenCalled();
  });

  it('reports item failures in the summary', async () => {
    const source = pagedSource([
      {
        page: 1,
        records: [makeRecord('OK1', { 250: 'https://cdn.test/ok.jpg' }), makeRecord('BAD1', { 250: 'https://cdn.test/bad.jpg' })],
        invalid: 0,
        hasMore: false
      }
    ]);
    const fetcher: ImageFetcher = {
      fetchImage: async url => {
        if (url.includes('bad')) {
          throw new Error('connection reset');
        }
        return Buffer.from('ok');
      }
    };

    const report = await runImageSync({ config: makeConfig({ outputDir }), source, fetcher });

    expect(report.ok).toBe(true);
    expect(report.summary).toMatchObject({ candidates: 2, succeeded: 1, failed: 1 });
    expect(report.summary.failures).toEqual([
      { externalCode: 'BAD1', reason: 'download failed (https://cdn.test/bad.jpg): connection reset' }
    ]);
  });
});
