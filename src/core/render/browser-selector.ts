// src/core/render/browser-selector.ts
import { chromium } from 'playwright-core';
import { DocsnapError, ErrorCode } from '../errors.js';
import { BROWSER_CONFIGS } from '../config/browser-config.js';
import type { BrowserType, ConfigurableBrowser } from '../types/index.js';

export class BrowserSelector {
  /**
   * Resolves the browser to drive.
   * - explicit choice: returned if it can be launched, otherwise BROWSER_NOT_FOUND
   * - auto/undefined: the first available in priority order
   */
  async select(browserType?: BrowserType): Promise<ConfigurableBrowser> {
    if (browserType && browserType !== 'auto') {
      if (!(await this.isAvailable(browserType))) {
        const browserName = BROWSER_CONFIGS[browserType].name;
        throw new DocsnapError(
          ErrorCode.BROWSER_NOT_FOUND,
          `Browser '${browserType}' is not available on this system`,
          false,
          browserType === 'chromium'
            ? 'Run `docsnap install-browsers` or use --browser auto'
            : `Install ${browserName} or use --browser auto`
        );
      }
      return browserType;
    }

    for (const type of this.getAutoPriority()) {
      if (await this.isAvailable(type)) {
        return type;
      }
    }

    throw new DocsnapError(
      ErrorCode.BROWSER_NOT_FOUND,
      'No supported browser found',
      false,
      'Install Google Chrome or run `docsnap install-browsers`'
    );
  }

  getAutoPriority(): ConfigurableBrowser[] {
    return ['chrome', 'edge', 'chromium'];
  }

  async isAvailable(browserType: ConfigurableBrowser): Promise<boolean> {
    return (await this.getVersion(browserType)) !== null;
  }

  /**
   * Probes by launching headless and closing straight away.
   * Returns the reported version, or null when the browser cannot start.
   */
  async getVersion(browserType: ConfigurableBrowser): Promise<string | null> {
    try {
      const browser = await chromium.launch({
        channel: BROWSER_CONFIGS[browserType].channel,
        headless: true,
      });
      const version = browser.version();
      await browser.close();
      return version;
    } catch {
      return null;
    }
  }
}
