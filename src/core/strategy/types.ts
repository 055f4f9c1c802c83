// src/core/strategy/types.ts
import type { RunLogger } from '../logger.js';
import type { BrowserSession } from '../render/session.js';
import type { DocumentInfo, StrategyName, StrategyOutcome } from '../types/index.js';

export interface StrategyContext {
  session: BrowserSession;
  document: DocumentInfo;
  outputDir: string;
  logger: RunLogger;
}

export interface Strategy {
  readonly name: StrategyName;
  attempt(ctx: StrategyContext): Promise<StrategyOutcome>;
}
