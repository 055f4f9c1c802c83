// src/index.ts
export { DocumentDownloader } from './core/orchestrator.js';
export type { DownloaderOptions, DownloaderDeps, DownloadOptions, SessionProvider } from './core/orchestrator.js';
export { StrategyPipeline, createDefaultStrategies } from './core/strategy/pipeline.js';
export { DownloadButtonStrategy } from './core/strategy/download-button.js';
export { ScreenshotStrategy } from './core/strategy/screenshot.js';
export { TextExtractStrategy } from './core/strategy/text-extract.js';
export type { Strategy, StrategyContext } from './core/strategy/types.js';
export { DocumentInfoExtractor, placeholderDocumentInfo } from './core/info/extractor.js';
export { HttpFetcher } from './core/info/fetcher.js';
export type { HtmlFetcher } from './core/info/fetcher.js';
export type { BrowserSession, PageElement } from './core/render/session.js';
export { BrowserManager } from './core/render/browser.js';
export { validateUrl, extractDocumentId, normalizeUrl } from './core/validate/url.js';
export { sanitizeTitle } from './core/export/filename.js';
export { saveMetadata, loadMetadata } from './core/export/metadata.js';
export { RetryPolicy } from './core/retry.js';
export { createLogger, RunLogger } from './core/logger.js';
export { loadSettings } from './core/config/settings.js';
export { DocsnapError, ErrorCode } from './core/errors.js';
export type * from './core/types/index.js';
