// src/core/strategy/download-button.ts
import { CLICK_SETTLE_DELAY, LOCATOR_TIMEOUT } from '../config/constants.js';
import { DOWNLOAD_BUTTON_LOCATORS } from '../config/locators.js';
import type { StrategyOutcome } from '../types/index.js';
import type { Strategy, StrategyContext } from './types.js';

export interface DownloadButtonOptions {
  locators?: readonly string[];
  timeoutMs?: number;
  settleDelayMs?: number;
}

/**
 * Clicks the first download control that becomes clickable.
 *
 * A click counts as success; whether a file actually arrives is not checked.
 */
export class DownloadButtonStrategy implements Strategy {
  readonly name = 'download_button' as const;
  private readonly locators: readonly string[];
  private readonly timeoutMs: number;
  private readonly settleDelayMs: number;

  constructor(options: DownloadButtonOptions = {}) {
    this.locators = options.locators ?? DOWNLOAD_BUTTON_LOCATORS;
    this.timeoutMs = options.timeoutMs ?? LOCATOR_TIMEOUT;
    this.settleDelayMs = options.settleDelayMs ?? CLICK_SETTLE_DELAY;
  }

  async attempt({ session, logger }: StrategyContext): Promise<StrategyOutcome> {
    for (const selector of this.locators) {
      const button = await session.waitForClickable(selector, this.timeoutMs);
      if (!button) {
        logger.debug('Download control not found', { selector });
        continue;
      }

      await button.click();
      logger.info('Download initiated', { selector });
      await session.pause(this.settleDelayMs);
      return { kind: 'success', outputPath: null };
    }

    return { kind: 'deferred', reason: 'no_match' };
  }
}
