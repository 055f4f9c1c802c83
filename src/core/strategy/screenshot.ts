// src/core/strategy/screenshot.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { MAX_SCREENSHOT_PAGES, PAGE_SETTLE_DELAY } from '../config/constants.js';
import { PAGE_LOCATORS } from '../config/locators.js';
import { toErrorMessage } from '../errors.js';
import type { PageElement } from '../render/session.js';
import type { StrategyOutcome } from '../types/index.js';
import type { Strategy, StrategyContext } from './types.js';

export interface ScreenshotOptions {
  locators?: readonly string[];
  maxPages?: number;
  settleDelayMs?: number;
}

export class ScreenshotStrategy implements Strategy {
  readonly name = 'screenshot' as const;
  private readonly locators: readonly string[];
  private readonly maxPages: number;
  private readonly settleDelayMs: number;

  constructor(options: ScreenshotOptions = {}) {
    this.locators = options.locators ?? PAGE_LOCATORS;
    this.maxPages = options.maxPages ?? MAX_SCREENSHOT_PAGES;
    this.settleDelayMs = options.settleDelayMs ?? PAGE_SETTLE_DELAY;
  }

  async attempt({ session, document, outputDir, logger }: StrategyContext): Promise<StrategyOutcome> {
    let pages: PageElement[] = [];
    for (const selector of this.locators) {
      try {
        pages = await session.findAll(selector);
      } catch (error) {
        logger.debug('Page locator failed', { selector, error: toErrorMessage(error) });
        continue;
      }
      if (pages.length > 0) {
        logger.debug('Found document pages', { selector, count: pages.length });
        break;
      }
    }

    if (pages.length === 0) {
      logger.info('No document pages found for screenshot');
      return { kind: 'deferred', reason: 'no_match' };
    }

    const docDir = path.join(outputDir, document.title);
    await fs.mkdir(docDir, { recursive: true });

    // The directory alone makes this a success, even if every capture fails
    let captured = 0;
    const targets = pages.slice(0, this.maxPages);
    for (let i = 0; i < targets.length; i++) {
      const pageNumber = i + 1;
      try {
        await targets[i].scrollIntoView();
        await session.pause(this.settleDelayMs);
        await targets[i].screenshot(path.join(docDir, `page_${pageNumber}.png`));
        captured++;
        logger.debug('Saved page', { page: pageNumber });
      } catch (error) {
        logger.warn('Error capturing page', { page: pageNumber, error: toErrorMessage(error) });
      }
    }

    logger.info('Screenshots saved', { dir: docDir, captured, found: pages.length });
    return { kind: 'success', outputPath: docDir };
  }
}
