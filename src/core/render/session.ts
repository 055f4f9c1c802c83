// src/core/render/session.ts
import { errors, type Browser, type Locator, type Page } from 'playwright-core';

/**
 * One element located on the loaded page.
 */
export interface PageElement {
  click(): Promise<void>;
  scrollIntoView(): Promise<void>;
  screenshot(filePath: string): Promise<void>;
  /** textContent, falling back to rendered text */
  readText(): Promise<string | null>;
}

/**
 * The browser operations the retrieval pipeline needs. Playwright backs it in
 * production; tests substitute an in-memory page.
 */
export interface BrowserSession {
  /** Loads `url` and waits for `body`; rejects on timeout */
  navigate(url: string, timeoutMs: number): Promise<void>;
  /** First visible, enabled match within the timeout, or null */
  waitForClickable(selector: string, timeoutMs: number): Promise<PageElement | null>;
  /** Every current match, possibly none */
  findAll(selector: string): Promise<PageElement[]>;
  pause(ms: number): Promise<void>;
  /** Safe to call more than once */
  close(): Promise<void>;
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

class PlaywrightElement implements PageElement {
  constructor(private readonly locator: Locator) {}

  async click(): Promise<void> {
    await this.locator.click();
  }

  async scrollIntoView(): Promise<void> {
    await this.locator.scrollIntoViewIfNeeded();
  }

  async screenshot(filePath: string): Promise<void> {
    await this.locator.screenshot({ path: filePath });
  }

  async readText(): Promise<string | null> {
    const text = await this.locator.textContent();
    if (text && text.trim()) {
      return text;
    }
    return this.locator.innerText();
  }
}

export class PlaywrightSession implements BrowserSession {
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly page: Page
  ) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    await this.page.waitForSelector('body', { timeout: timeoutMs });
  }

  async waitForClickable(selector: string, timeoutMs: number): Promise<PageElement | null> {
    const locator = this.page.locator(selector).first();
    try {
      await locator.waitFor({ state: 'visible', timeout: timeoutMs });
    } catch (error) {
      if (isTimeoutError(error)) {
        return null;
      }
      throw error;
    }

    if (!(await locator.isEnabled())) {
      return null;
    }
    return new PlaywrightElement(locator);
  }

  async findAll(selector: string): Promise<PageElement[]> {
    const locators = await this.page.locator(selector).all();
    return locators.map(locator => new PlaywrightElement(locator));
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.browser.close();
  }
}
