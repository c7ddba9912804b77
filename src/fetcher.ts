/**
 * Fetcher Module
 * Downloads plain-text documents over HTTP(S), following redirects
 */

import http from 'http';
import https from 'https';
import { InputValidationError, TransportError } from './errors.js';
import type { FetcherOptions, FetcherStats, TextSource } from './types.js';

export const DEFAULT_FETCHER_OPTS: Required<FetcherOptions> = {
  timeoutMs: 10000,
  maxRedirects: 5,
  debug: false
};

export function validateTextUrl(url: string): URL {
  if (!url.toLowerCase().endsWith('.txt')) {
    throw new InputValidationError('URL must point to a .txt file (Project Gutenberg format expected).');
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InputValidationError(`Invalid URL: ${url}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InputValidationError(`Unsupported protocol: ${parsed.protocol}`);
  }

  return parsed;
}

export class TextFetcher implements TextSource {
  private opts: Required<FetcherOptions>;
  public requestCount = 0;
  public totalBytesDownloaded = 0;

  constructor(options: FetcherOptions = {}) {
    this.opts = { ...DEFAULT_FETCHER_OPTS, ...options };
  }

  private log(message: string): void {
    if (this.opts.debug) {
      console.error(`[Fetcher] ${message}`);
    }
  }

  getStats(): FetcherStats {
    return {
      requests: this.requestCount,
      bytesDownloaded: this.totalBytesDownloaded
    };
  }

  async fetchText(url: string): Promise<string> {
    const parsed = validateTextUrl(url);

    try {
      const body = await this._getWithRedirects(parsed.toString(), 0);
      this.log(`Fetched ${body.length} bytes from ${url}`);
      return body.toString('utf-8');
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.log(`Fetch failed for ${url}: ${detail}`);
      throw new TransportError(`Failed to fetch content from URL: ${detail}`, { cause: err });
    }
  }

  private _getWithRedirects(url: string, redirectCount: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      if (redirectCount > this.opts.maxRedirects) {
        reject(new Error(`Too many redirects for ${url}`));
        return;
      }

      this.requestCount++;

      const onResponse = (res: http.IncomingMessage): void => {
        const status = res.statusCode ?? 0;

        if (status >= 300 && status < 400 && res.headers.location) {
          let newUrl: string;
          try {
            newUrl = new URL(res.headers.location, url).toString();
          } catch (err) {
            res.resume();
            reject(err);
            return;
          }
          this.log(`Redirect ${status}: ${url} -> ${newUrl}`);
          res.resume();
          this._getWithRedirects(newUrl, redirectCount + 1).then(resolve, reject);
          return;
        }

        if (status < 200 || status >= 300) {
          res.resume();
          reject(new Error(`HTTP ${status} for ${url}`));
          return;
        }

        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => {
          const body = Buffer.concat(chunks);
          this.totalBytesDownloaded += body.length;
          resolve(body);
        });
        res.on('error', reject);
      };

      const req = url.startsWith('https://') ? https.get(url, onResponse) : http.get(url, onResponse);
      req.on('error', reject);
      req.setTimeout(this.opts.timeoutMs, () => {
        req.destroy(new Error(`Request timeout after ${this.opts.timeoutMs}ms`));
      });
    });
  }
}
