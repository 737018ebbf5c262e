import { isSizeTag } from '../../src/catalog/types.js';
import type { CatalogRecord, SizeTag, SyncConfig } from '../../src/catalog/types.js';

export function makeRecord(externalCode: string, variants: Record<number, string> = {}): CatalogRecord {
  const imageVariants = new Map<SizeTag, string>();
  for (const [size, url] of Object.entries(variants)) {
    const tag = Number(size);
    if (isSizeTag(tag)) {
      imageVariants.set(tag, url);
    }
  }
  return { externalCode, imageVariants };
}

export function makeConfig(overrides: Partial<SyncConfig> = {}): SyncConfig {
  return {
    apiBaseUrl: 'https://api.test/v1',
    imageBaseUrl: 'https://cdn.test/',
    outputDir: '/tmp/unused',
    preferredSize: 250,
    concurrency: 4,
    requestTimeoutMs: 1000,
    downloadTimeoutMs: 1000,
    maxPageAttempts: 3,
    pageRetryDelayMs: 0,
    maxPages: 50,
    downloadAttempts: 1,
    onlyWithImages: true,
    skipExisting: false,
    insecureTls: false,
    userAgent: 'test-agent',
    verbose: false,
    progressEvery: 0,
    ...overrides
  };
}

export function productEntry(code: string | number, sizes: number[] = [250]): Record<string, unknown> {
  return {
    codigo_erp: code,
    imagemUrls: sizes.map(size => ({ tamanho: size, localizacao: `https://cdn.test/${code}/${size}.jpg` }))
  };
}
