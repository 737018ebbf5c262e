import { CatalogRequestError } from './errors.js';
import { isSizeTag } from './types.js';
import type { CatalogPage, CatalogRecord, SizeTag } from './types.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

export function isSafeFileStem(value: string): boolean {
  if (!value || value === '.' || value === '..') {
    return false;
  }
  return !/[/\\\0]/.test(value);
}

function parseExternalCode(value: unknown): string | null {
  let code: string | null = null;
  if (typeof value === 'string') {
    code = value.trim();
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    code = String(value);
  }
  return code && isSafeFileStem(code) ? code : null;
}

function parseVariants(value: unknown): Map<SizeTag, string> {
  const variants = new Map<SizeTag, string>();
  for (const entry of asArray(value)) {
    if (!isObject(entry)) {
      continue;
    }
    const size = toInteger(entry.tamanho);
    const url = typeof entry.localizacao === 'string' ? entry.localizacao.trim() : '';
    if (size === undefined || !isSizeTag(size) || !url) {
      continue;
    }
    // First occurrence of a size wins.
    if (!variants.has(size)) {
      variants.set(size, url);
    }
  }
  return variants;
}

export function parseCatalogEntry(entry: unknown): CatalogRecord | null {
  if (!isObject(entry)) {
    return null;
  }
  const externalCode = parseExternalCode(entry.codigo_erp);
  if (!externalCode) {
    return null;
  }
  return Object.freeze({
    externalCode,
    imageVariants: parseVariants(entry.imagemUrls)
  });
}

/**
 * Turns one `/importacao/produtos` response body into a page of records.
 *
 * An empty page always ends pagination. Otherwise `pagination.page_count`
 * decides, then an explicit `has_more` flag; with neither, the next page is
 * requested and its emptiness decides.
 */
export function parseCatalogPage(payload: unknown, page: number): CatalogPage {
  if (!isObject(payload)) {
    throw new CatalogRequestError(page, `Page ${page}: response body is not a JSON object`);
  }
  if (payload.success === false) {
    throw new CatalogRequestError(page, `Page ${page}: API reported success=false`);
  }
  if (payload.data !== undefined && !Array.isArray(payload.data)) {
    throw new CatalogRequestError(page, `Page ${page}: "data" is not an array`);
  }

  const entries = asArray(payload.data);
  const records: CatalogRecord[] = [];
  let invalid = 0;
  for (const entry of entries) {
    const record = parseCatalogEntry(entry);
    if (record) {
      records.push(record);
    } else {
      invalid += 1;
    }
  }

  const pagination = isObject(payload.pagination) ? payload.pagination : undefined;
  const pageCount = toInteger(pagination?.page_count);
  const reportedTotal = toInteger(pagination?.count);

  let hasMore: boolean;
  if (entries.length === 0) {
    hasMore = false;
  } else if (pageCount !== undefined) {
    hasMore = page < pageCount;
  } else if (typeof payload.has_more === 'boolean') {
    hasMore = payload.has_more;
  } else {
    hasMore = true;
  }

  return { page, records, invalid, hasMore, reportedTotal };
}
