// src/core/render/browser.ts
import { chromium } from 'playwright-core';
import { CHROMIUM_ARGS, BROWSER_CONFIGS } from '../config/browser-config.js';
import { DEFAULT_USER_AGENT, LOCATOR_TIMEOUT, VIEWPORT } from '../config/constants.js';
import { DocsnapError, ErrorCode, toErrorMessage } from '../errors.js';
import type { RunLogger } from '../logger.js';
import type { BrowserType, ConfigurableBrowser } from '../types/index.js';
import { BrowserSelector } from './browser-selector.js';
import { PlaywrightSession, type BrowserSession } from './session.js';

export interface BrowserOptions {
  headless?: boolean;
  browserType?: BrowserType;
}

/**
 * Opens one session at a time and guarantees it can be closed.
 */
export class BrowserManager {
  private session?: BrowserSession;
  private selectedBrowser?: ConfigurableBrowser;

  constructor(
    private readonly options: BrowserOptions = {},
    private readonly selector: BrowserSelector = new BrowserSelector()
  ) {}

  async launch(logger?: RunLogger): Promise<BrowserSession> {
    if (this.session) {
      return this.session;
    }

    // BROWSER_NOT_FOUND from the selector is never retried
    const resolvedBrowser = this.selectedBrowser
      ?? await this.selector.select(this.options.browserType);
    this.selectedBrowser = resolvedBrowser;
    const browserConfig = BROWSER_CONFIGS[resolvedBrowser];
    const headless = this.options.headless ?? true;

    logger?.info('Launching browser', { browser: browserConfig.name, headless });

    let session: BrowserSession;
    try {
      const browser = await chromium.launch({
        channel: browserConfig.channel,
        headless,
        args: CHROMIUM_ARGS,
      });
      try {
        const context = await browser.newContext({
          userAgent: DEFAULT_USER_AGENT,
          viewport: { ...VIEWPORT },
        });
        // Bounds clicks, scrolls, captures and text reads
        context.setDefaultTimeout(LOCATOR_TIMEOUT);
        const page = await context.newPage();
        session = new PlaywrightSession(browser, page);
      } catch (error) {
        await browser.close();
        throw error;
      }
    } catch (error) {
      throw new DocsnapError(
        ErrorCode.SESSION_LAUNCH_FAILED,
        `Failed to launch browser: ${toErrorMessage(error)}`,
        true,
        `Ensure ${browserConfig.name} is installed and can start on this system`
      );
    }

    this.session = session;
    return session;
  }

  async close(): Promise<void> {
    if (this.session) {
      const session = this.session;
      this.session = undefined;
      await session.close();
    }
  }

  getSession(): BrowserSession | undefined {
    return this.session;
  }

  getSelectedBrowser(): ConfigurableBrowser | undefined {
    return this.selectedBrowser;
  }
}
