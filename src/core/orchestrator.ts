// src/core/orchestrator.ts
import * as fs from 'fs/promises';
import { BrowserManager, type BrowserOptions } from './render/browser.js';
import type { BrowserSession } from './render/session.js';
import { DocumentInfoExtractor, placeholderDocumentInfo } from './info/extractor.js';
import { HttpFetcher, type HtmlFetcher } from './info/fetcher.js';
import { StrategyPipeline, createDefaultStrategies } from './strategy/pipeline.js';
import { saveMetadata } from './export/metadata.js';
import { RetryPolicy, type RetryOptions } from './retry.js';
import { createLogger, type LoggerOptions, type RunLogger } from './logger.js';
import { DocsnapError, ErrorCode, toErrorMessage } from './errors.js';
import { PAGE_LOAD_TIMEOUT } from './config/constants.js';
import type { DocumentInfo, DownloadReport, RetrievalResult } from './types/index.js';

/**
 * Anything that can open and close one browser session.
 */
export interface SessionProvider {
  launch(logger?: RunLogger): Promise<BrowserSession>;
  close(): Promise<void>;
}

export interface DownloaderOptions extends BrowserOptions {
  maxPages?: number;
  retry?: Partial<RetryOptions>;
  pageLoadTimeoutMs?: number;
  /** Per-call logger settings, used when no logger is injected */
  log?: LoggerOptions;
}

export interface DownloaderDeps {
  sessions?: SessionProvider;
  fetcher?: HtmlFetcher;
  pipeline?: Pick<StrategyPipeline, 'run'>;
  /** Shared logger; the caller then owns closing it */
  logger?: RunLogger;
  /** Defaults to `setTimeout`; tests pass an immediate one */
  wait?: (ms: number) => Promise<void>;
}

export interface DownloadOptions {
  outputDir: string;
}

export class DocumentDownloader {
  private readonly sessions: SessionProvider;
  private readonly fetcher: HtmlFetcher;
  private readonly pipeline: Pick<StrategyPipeline, 'run'>;

  constructor(
    private readonly options: DownloaderOptions = {},
    private readonly deps: DownloaderDeps = {}
  ) {
    this.sessions = deps.sessions ?? new BrowserManager({
      headless: options.headless,
      browserType: options.browserType,
    });
    this.fetcher = deps.fetcher ?? new HttpFetcher();
    this.pipeline = deps.pipeline ?? new StrategyPipeline(
      createDefaultStrategies({ screenshot: { maxPages: options.maxPages } })
    );
  }

  /**
   * Retrieves one document. Only a session that cannot be opened, a page
   * that never loads, or exhaustion of every strategy yield `succeeded: false`.
   * Unexpected errors propagate after the session is closed.
   */
  async download(url: string, options: DownloadOptions): Promise<DownloadReport> {
    const ownsLogger = !this.deps.logger;
    const rootLogger = this.deps.logger ?? createLogger(this.options.log);
    const logger = rootLogger.child('downloader', { url });
    const retry = new RetryPolicy(this.options.retry, rootLogger.child('retry'), this.deps.wait);

    try {
      logger.info('Starting download', { outputDir: options.outputDir });
      await fs.mkdir(options.outputDir, { recursive: true });

      let session: BrowserSession;
      try {
        session = await retry.execute('Browser launch', () => this.sessions.launch(logger));
      } catch (error) {
        return this.failure(logger, error, ErrorCode.SESSION_LAUNCH_FAILED);
      }

      try {
        return await this.retrieve(session, url, options.outputDir, retry, rootLogger, logger);
      } finally {
        await this.sessions.close();
        logger.debug('Browser session closed');
      }
    } finally {
      if (ownsLogger) {
        rootLogger.close();
      }
    }
  }

  /**
   * Closes the active session, if any. Used on process interruption.
   */
  async close(): Promise<void> {
    await this.sessions.close();
  }

  private async retrieve(
    session: BrowserSession,
    url: string,
    outputDir: string,
    retry: RetryPolicy,
    rootLogger: RunLogger,
    logger: RunLogger
  ): Promise<DownloadReport> {
    try {
      logger.info('Loading page');
      await session.navigate(url, this.options.pageLoadTimeoutMs ?? PAGE_LOAD_TIMEOUT);
    } catch (error) {
      const pageError = new DocsnapError(
        ErrorCode.PAGE_LOAD_TIMEOUT,
        `Page did not load: ${toErrorMessage(error)}`,
        false,
        'Check the URL and try again later'
      );
      return this.failure(logger, pageError, ErrorCode.PAGE_LOAD_TIMEOUT);
    }

    const extractor = new DocumentInfoExtractor(this.fetcher, rootLogger.child('extractor'), retry);
    const document = (await extractor.extract(url)) ?? placeholderDocumentInfo(url);
    logger.info('Document resolved', { title: document.title, docId: document.docId });

    const result = await this.pipeline.run({ session, document, outputDir, logger: rootLogger });
    const metadataPath = await this.writeMetadata(document, outputDir, logger);

    if (result.succeeded) {
      logger.info('Download completed', { strategy: result.strategyUsed, outputPath: result.outputPath });
      return { ...result, document, metadataPath };
    }

    logger.warn('All strategies failed', {
      attempts: result.attempts.map(a => `${a.strategy}:${a.outcome.kind}`),
    });
    return this.exhausted(result, document, metadataPath);
  }

  private async writeMetadata(document: DocumentInfo, outputDir: string, logger: RunLogger): Promise<string | null> {
    try {
      return await saveMetadata(document, outputDir);
    } catch (error) {
      logger.error('Failed to save metadata', { error });
      return null;
    }
  }

  private exhausted(result: RetrievalResult, document: DocumentInfo, metadataPath: string | null): DownloadReport {
    return {
      ...result,
      document,
      metadataPath,
      error: {
        code: ErrorCode.STRATEGIES_EXHAUSTED,
        message: 'No retrieval strategy succeeded',
        suggestion: 'Some documents may require a subscription to download',
      },
    };
  }

  private failure(
    logger: RunLogger,
    error: unknown,
    fallbackCode: ErrorCode
  ): DownloadReport {
    const code = error instanceof DocsnapError ? error.code : fallbackCode;
    const suggestion = error instanceof DocsnapError ? error.suggestion : undefined;
    logger.error('Download aborted', { code, error });

    return {
      succeeded: false,
      strategyUsed: null,
      outputPath: null,
      attempts: [],
      document: null,
      metadataPath: null,
      error: { code, message: toErrorMessage(error), suggestion },
    };
  }
}
