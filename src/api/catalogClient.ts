/**
 * Catalog API Client
 *
 * Reads the product listing (`/importacao/produtos`) one page at a time.
 * Failures are classified so the paginator knows which pages are worth retrying.
 */

import https from 'https';
import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from 'axios';
import { CatalogRequestError, TransientPageFetchError, describeError } from '../catalog/errors.js';
import { parseCatalogPage } from '../catalog/parser.js';
import type { CatalogPage, CatalogPageSource } from '../catalog/types.js';

export const PRODUCTS_PATH = '/importacao/produtos';

export interface CatalogClientOptions {
  baseUrl: string;
  domainKey?: string;
  authToken?: string;
  timeoutMs?: number;
  onlyWithImages?: boolean;
  insecureTls?: boolean;
  userAgent?: string;
  adapter?: AxiosAdapter;
}

export function buildCatalogHeaders(options: Pick<CatalogClientOptions, 'domainKey' | 'authToken' | 'userAgent'>): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/json'
  };
  if (options.domainKey) {
    headers.DomainKey = options.domainKey;
  }
  if (options.authToken) {
    headers.Authorization = `Basic ${options.authToken}`;
  }
  if (options.userAgent) {
    headers['User-Agent'] = options.userAgent;
  }
  return headers;
}

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

export class CatalogClient implements CatalogPageSource {
  private client: AxiosInstance;
  private onlyWithImages: boolean;
  private timeoutMs: number;

  constructor(options: CatalogClientOptions) {
    this.onlyWithImages = options.onlyWithImages ?? true;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: this.timeoutMs,
      headers: buildCatalogHeaders(options),
      httpsAgent: options.insecureTls ? new https.Agent({ rejectUnauthorized: false }) : undefined,
      adapter: options.adapter
    });
  }

  /**
   * Fetch and parse a single catalog page
   */
  async fetchPage(page: number, pageSize?: number): Promise<CatalogPage> {
    const params: Record<string, string | number> = { page };
    if (this.onlyWithImages) {
      params.possui_imagem = 'true';
    }
    if (pageSize !== undefined) {
      params.per_page = pageSize;
    }

    // axios' own timeout only covers an idle socket; the signal bounds the whole request.
    const signal = AbortSignal.timeout(this.timeoutMs);
    let body: unknown;
    try {
      const response = await this.client.get<unknown>(PRODUCTS_PATH, { params, signal });
      body = response.data;
    } catch (error) {
      if (signal.aborted) {
        throw new TransientPageFetchError(page, `Page ${page}: timeout after ${this.timeoutMs}ms`, { cause: error });
      }
      if (!isAxiosError(error)) {
        throw error;
      }
      const status = error.response?.status;
      const message = `Page ${page}: ${describeError(error)}`;
      if (status === undefined || isTransientStatus(status)) {
        throw new TransientPageFetchError(page, message, { status, cause: error });
      }
      throw new CatalogRequestError(page, message, { status, cause: error });
    }

    return parseCatalogPage(body, page);
  }
}

export default CatalogClient;
