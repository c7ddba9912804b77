/**
 * WebServer for textlens
 * JSON API over the text pipeline. Keeps a small in-memory event log
 * that /api/debug exposes.
 */

import http from 'http';
import type { AddressInfo } from 'net';
import { TextFetcher } from './fetcher.js';
import { TextProcessor } from './processor.js';
import { isTextProcessingError } from './errors.js';
import { toStatisticsPayload } from './statistics.js';
import type { EventLogEntry, TextSource, WebServerOptions } from './types.js';

export const DEFAULT_WEB_OPTS = {
  port: 3000,
  host: '127.0.0.1',
  debug: false,
  summarySentences: 3,
  maxBodyBytes: 1024 * 1024
};

class BadRequest extends Error {}

export class WebServer {
  private port: number;
  private host: string;
  private debug: boolean;
  private maxBodyBytes: number;
  private source: TextSource;
  private processor: TextProcessor;
  private server: http.Server | null = null;
  public eventLog: EventLogEntry[] = [];
  public maxLogSize = 50;

  constructor(options: WebServerOptions = {}) {
    this.port = options.port ?? DEFAULT_WEB_OPTS.port;
    this.host = options.host ?? DEFAULT_WEB_OPTS.host;
    this.debug = options.debug || DEFAULT_WEB_OPTS.debug;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_WEB_OPTS.maxBodyBytes;
    this.source = options.source ?? new TextFetcher({ debug: this.debug });
    this.processor = new TextProcessor({
      source: this.source,
      summarySentences: options.summarySentences ?? DEFAULT_WEB_OPTS.summarySentences,
      debug: this.debug
    });
  }

  public logEvent(type: string, message: string, durationMs: number | null = null, extra: Record<string, unknown> = {}): void {
    this.eventLog.unshift({
      type,
      message,
      duration: durationMs,
      timestamp: Date.now(),
      ...extra
    });
    if (this.eventLog.length > this.maxLogSize) {
      this.eventLog.pop();
    }
    if (this.debug) {
      console.error(`[WebServer] ${type}: ${message}`);
    }
  }

  private logError(context: string, err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    const cause = isTextProcessingError(error) && error.cause instanceof Error ? error.cause : error;
    const stack = cause.stack ? cause.stack.split('\n').slice(0, 3).join(' | ') : '';
    this.logEvent('error', `${context}: ${error.message}`, null, {
      errorCode: isTextProcessingError(error) ? error.kind : null,
      stack
    });
  }

  private readJsonBody(req: http.IncomingMessage): Promise<Record<string, unknown>> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > this.maxBodyBytes) {
          tooLarge = true;
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (tooLarge) {
          reject(new BadRequest('Request body too large.'));
          return;
        }
        // Decode once: a multibyte character may straddle two chunks
        const body = Buffer.concat(chunks).toString('utf-8');
        try {
          const parsed: unknown = body ? JSON.parse(body) : {};
          if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            reject(new BadRequest('Invalid JSON body.'));
            return;
          }
          resolve(Object.fromEntries(Object.entries(parsed)));
        } catch {
          reject(new BadRequest('Invalid JSON body.'));
        }
      });
      req.on('error', reject);
    });
  }

  private async handleApi(req: http.IncomingMessage, res: http.ServerResponse): Promise<boolean> {
    const url = new URL(req.url || '/', `http://localhost:${this.port}`);
    const pathParts = url.pathname.split('/').filter(Boolean);

    // GET /health
    if (pathParts.length === 1 && pathParts[0] === 'health' && req.method === 'GET') {
      this.sendJson(res, 200, {
        status: 'healthy',
        message: 'Text preprocessing service is running'
      });
      return true;
    }

    if (pathParts[0] !== 'api') {
      return false;
    }

    // GET /api/debug
    if (pathParts[1] === 'debug' && req.method === 'GET') {
      this.sendJson(res, 200, {
        events: this.eventLog,
        fetcher: this.source.getStats ? this.source.getStats() : null
      });
      return true;
    }

    // POST /api/clean {"url": "..."}
    if (pathParts[1] === 'clean' && req.method === 'POST') {
      await this.handleJson(req, res, 'clean', async (data) => {
        if (typeof data.url !== 'string' || !data.url) {
          throw new BadRequest("Missing 'url' field in JSON request.");
        }
        const result = await this.processor.processUrl(data.url);
        return {
          success: true,
          cleaned_text: result.cleanedText,
          statistics: toStatisticsPayload(result.statistics),
          summary: result.summary
        };
      });
      return true;
    }

    // POST /api/analyze {"text": "..."}
    if (pathParts[1] === 'analyze' && req.method === 'POST') {
      await this.handleJson(req, res, 'analyze', async (data) => {
        if (typeof data.text !== 'string') {
          throw new BadRequest("Missing 'text' field in request body.");
        }
        const result = await this.processor.processText(data.text);
        return {
          success: true,
          statistics: toStatisticsPayload(result.statistics)
        };
      });
      return true;
    }

    return false;
  }

  private async handleJson(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    route: string,
    work: (data: Record<string, unknown>) => Promise<object>
  ): Promise<void> {
    const startTime = Date.now();
    try {
      const data = await this.readJsonBody(req);
      const payload = await work(data);
      this.logEvent(route, 'ok', Date.now() - startTime);
      this.sendJson(res, 200, payload);
    } catch (err) {
      if (err instanceof BadRequest) {
        this.logEvent(route, `rejected: ${err.message}`, Date.now() - startTime);
        this.sendJson(res, 400, { success: false, error: err.message });
        return;
      }
      this.logError(route, err);
      if (isTextProcessingError(err)) {
        // Internal failures were already written to stderr by the processor
        this.sendJson(res, err.status, { success: false, error: err.publicMessage });
        return;
      }
      console.error(`API Error (${route}):`, err);
      this.sendJson(res, 500, { success: false, error: 'Text Processing Error: an unexpected error occurred.' });
    }
  }

  private sendJson(res: http.ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, {
      'Content-Type': 'application/json; charset=utf-8',
      'Access-Control-Allow-Origin': '*'
    });
    res.end(JSON.stringify(data));
  }

  async start(): Promise<http.Server> {
    const server = http.createServer((req, res) => {
      if (req.method === 'OPTIONS') {
        res.writeHead(204, {
          'Access-Control-Allow-Origin': '*',
          'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
          'Access-Control-Allow-Headers': 'Content-Type'
        });
        res.end();
        return;
      }

      this.handleApi(req, res)
        .then((handled) => {
          if (!handled) {
            this.sendJson(res, 404, { success: false, error: 'Not found' });
          }
        })
        .catch((err: unknown) => {
          this.logError('request', err);
          if (!res.headersSent) {
            this.sendJson(res, 500, { success: false, error: 'Text Processing Error: an unexpected error occurred.' });
          }
        });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.logEvent('server', `listening on ${this.host}:${this.address()?.port ?? this.port}`);
    return server;
  }

  address(): AddressInfo | null {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr : null;
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
