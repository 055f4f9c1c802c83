// src/core/strategy/text-extract.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { TEXT_LOCATORS } from '../config/locators.js';
import { toErrorMessage } from '../errors.js';
import type { StrategyOutcome } from '../types/index.js';
import type { Strategy, StrategyContext } from './types.js';

export interface TextExtractOptions {
  locators?: readonly string[];
}

export const TEXT_SEPARATOR = '\n\n';

/**
 * Collects visible text from every locator, unlike the other strategies
 * which stop at the first match.
 */
export class TextExtractStrategy implements Strategy {
  readonly name = 'text_extract' as const;
  private readonly locators: readonly string[];

  constructor(options: TextExtractOptions = {}) {
    this.locators = options.locators ?? TEXT_LOCATORS;
  }

  async collect({ session, logger }: StrategyContext): Promise<string[]> {
    const texts: string[] = [];

    for (const selector of this.locators) {
      try {
        const elements = await session.findAll(selector);
        for (const element of elements) {
          const text = (await element.readText())?.trim();
          if (text) {
            texts.push(text);
          }
        }
      } catch (error) {
        logger.debug('Text locator failed', { selector, error: toErrorMessage(error) });
      }
    }

    return texts;
  }

  async attempt(ctx: StrategyContext): Promise<StrategyOutcome> {
    const texts = await this.collect(ctx);

    if (texts.length === 0) {
      ctx.logger.info('No text content found');
      return { kind: 'deferred', reason: 'no_content' };
    }

    await fs.mkdir(ctx.outputDir, { recursive: true });
    const textFile = path.join(ctx.outputDir, `${ctx.document.title}.txt`);
    await fs.writeFile(textFile, texts.join(TEXT_SEPARATOR), 'utf-8');

    ctx.logger.info('Text content saved', { file: textFile, blocks: texts.length });
    return { kind: 'success', outputPath: textFile };
  }
}
