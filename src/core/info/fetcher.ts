// src/core/info/fetcher.ts
import { request } from 'undici';
import { DEFAULT_USER_AGENT, REQUEST_TIMEOUT } from '../config/constants.js';
import { DocsnapError, ErrorCode, toErrorMessage } from '../errors.js';

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export interface HtmlFetcher {
  fetchHtml(url: string): Promise<string>;
}

export interface HttpFetcherOptions {
  userAgent?: string;
  timeoutMs?: number;
}

/**
 * Plain HTTP GET, outside the browser session.
 */
export class HttpFetcher implements HtmlFetcher {
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(options: HttpFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT;
  }

  async fetchHtml(url: string): Promise<string> {
    let response: Awaited<ReturnType<typeof request>>;
    try {
      response = await request(url, {
        method: 'GET',
        headers: {
          'user-agent': this.userAgent,
          accept: 'text/html,application/xhtml+xml',
        },
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        maxRedirections: 5,
      });
    } catch (error) {
      throw new DocsnapError(
        ErrorCode.NETWORK_ERROR,
        `Request to ${url} failed: ${toErrorMessage(error)}`,
        true,
        'Check your internet connection'
      );
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      await response.body.dump();
      throw new DocsnapError(
        ErrorCode.NETWORK_ERROR,
        `HTTP ${response.statusCode} for ${url}`,
        isRetriableStatus(response.statusCode)
      );
    }

    return response.body.text();
  }
}
