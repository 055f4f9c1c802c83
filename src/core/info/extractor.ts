// src/core/info/extractor.ts
import * as cheerio from 'cheerio';
import { TITLE_LOCATORS } from '../config/locators.js';
import { UNKNOWN_TITLE } from '../config/constants.js';
import { toErrorMessage } from '../errors.js';
import { sanitizeTitle } from '../export/filename.js';
import type { RunLogger } from '../logger.js';
import type { RetryPolicy } from '../retry.js';
import type { DocumentInfo } from '../types/index.js';
import { extractDocumentId } from '../validate/url.js';
import type { HtmlFetcher } from './fetcher.js';

export function createDocumentInfo(title: string, sourceUrl: string): DocumentInfo {
  return Object.freeze({
    title: sanitizeTitle(title),
    docId: extractDocumentId(sourceUrl),
    sourceUrl,
  });
}

/**
 * Stand-in used when the page could not be fetched.
 */
export function placeholderDocumentInfo(sourceUrl: string): DocumentInfo {
  return createDocumentInfo(UNKNOWN_TITLE, sourceUrl);
}

export function findTitle($: cheerio.CheerioAPI, selectors: readonly string[] = TITLE_LOCATORS): string | null {
  for (const selector of selectors) {
    const text = $(selector).first().text().trim();
    if (text) {
      return text;
    }
  }
  return null;
}

export class DocumentInfoExtractor {
  constructor(
    private readonly fetcher: HtmlFetcher,
    private readonly logger: RunLogger,
    private readonly retry?: RetryPolicy
  ) {}

  /**
   * Fetches the page once (plus policy retries) and reads its title.
   * Returns null when the fetch fails; the caller decides how to degrade.
   */
  async extract(url: string): Promise<DocumentInfo | null> {
    let html: string;
    try {
      html = this.retry
        ? await this.retry.execute('Document fetch', () => this.fetcher.fetchHtml(url))
        : await this.fetcher.fetchHtml(url);
    } catch (error) {
      this.logger.warn('Could not fetch document page', { url, error: toErrorMessage(error) });
      return null;
    }

    const $ = cheerio.load(html);
    const title = findTitle($) ?? UNKNOWN_TITLE;
    const info = createDocumentInfo(title, url);

    this.logger.debug('Resolved document info', { title: info.title, docId: info.docId });
    return info;
  }
}
