import https from 'https';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';

export interface ImageFetcher {
  fetchImage(url: string, timeoutMs: number): Promise<Buffer>;
}

export interface HttpImageFetcherOptions {
  userAgent?: string;
  insecureTls?: boolean;
  adapter?: AxiosAdapter;
}

export class HttpImageFetcher implements ImageFetcher {
  private client: AxiosInstance;

  constructor(options: HttpImageFetcherOptions = {}) {
    this.client = axios.create({
      responseType: 'arraybuffer',
      headers: options.userAgent ? { 'User-Agent': options.userAgent } : {},
      httpsAgent: options.insecureTls ? new https.Agent({ rejectUnauthorized: false }) : undefined,
      adapter: options.adapter
    });
  }

  async fetchImage(url: string, timeoutMs: number): Promise<Buffer> {
    // `timeout` alone only bounds idle time; the signal caps the whole transfer.
    const signal = AbortSignal.timeout(timeoutMs);
    try {
      const response = await this.client.get<ArrayBuffer>(url, { timeout: timeoutMs, signal });
      return Buffer.from(response.data);
    } catch (error) {
      if (signal.aborted) {
        throw new Error(`timeout after ${timeoutMs}ms`, { cause: error });
      }
      throw error;
    }
  }
}
