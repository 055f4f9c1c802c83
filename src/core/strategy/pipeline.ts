// src/core/strategy/pipeline.ts
import { isTimeoutError } from '../render/session.js';
import { toErrorMessage } from '../errors.js';
import type { RetrievalResult, StrategyAttempt, StrategyOutcome } from '../types/index.js';
import { DownloadButtonStrategy, type DownloadButtonOptions } from './download-button.js';
import { ScreenshotStrategy, type ScreenshotOptions } from './screenshot.js';
import { TextExtractStrategy, type TextExtractOptions } from './text-extract.js';
import type { Strategy, StrategyContext } from './types.js';

export interface PipelineOptions {
  downloadButton?: DownloadButtonOptions;
  screenshot?: ScreenshotOptions;
  textExtract?: TextExtractOptions;
}

export function createDefaultStrategies(options: PipelineOptions = {}): Strategy[] {
  return [
    new DownloadButtonStrategy(options.downloadButton),
    new ScreenshotStrategy(options.screenshot),
    new TextExtractStrategy(options.textExtract),
  ];
}

/**
 * Tries each strategy in list order and stops at the first success.
 * A strategy that throws is recorded as failed and the next one runs.
 */
export class StrategyPipeline {
  private readonly strategies: readonly Strategy[];

  constructor(strategies: Strategy[] = createDefaultStrategies()) {
    this.strategies = [...strategies];
  }

  getStrategies(): readonly Strategy[] {
    return this.strategies;
  }

  async run(ctx: StrategyContext): Promise<RetrievalResult> {
    const attempts: StrategyAttempt[] = [];

    for (const strategy of this.strategies) {
      const logger = ctx.logger.child('strategy', { strategy: strategy.name });
      logger.info('Trying strategy');

      const outcome = await this.attemptSafely(strategy, { ...ctx, logger });
      attempts.push({ strategy: strategy.name, outcome });

      if (outcome.kind === 'success') {
        return {
          succeeded: true,
          strategyUsed: strategy.name,
          outputPath: outcome.outputPath,
          attempts,
        };
      }

      logger.info('Strategy did not succeed', { outcome: outcome.kind, reason: outcome.reason });
    }

    return {
      succeeded: false,
      strategyUsed: null,
      outputPath: null,
      attempts,
    };
  }

  private async attemptSafely(strategy: Strategy, ctx: StrategyContext): Promise<StrategyOutcome> {
    try {
      return await strategy.attempt(ctx);
    } catch (error) {
      ctx.logger.warn('Strategy raised an error', { error: toErrorMessage(error) });
      return {
        kind: 'failed',
        reason: isTimeoutError(error) ? 'timeout' : 'error',
        message: toErrorMessage(error),
      };
    }
  }
}
