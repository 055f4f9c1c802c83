// src/core/types/index.ts
import type { ErrorCode } from '../errors.js';

export type BrowserType = 'chrome' | 'edge' | 'chromium' | 'auto';

export type ConfigurableBrowser = Exclude<BrowserType, 'auto'>;

export interface BrowserConfig {
  channel?: 'chrome' | 'msedge';
  name: string;
}

/**
 * What is known about the document being retrieved. Built once per call.
 */
export interface DocumentInfo {
  /** Sanitized title, safe to use as a file or directory name */
  readonly title: string;
  /** Numeric document id from the URL path, if any */
  readonly docId: string | null;
  readonly sourceUrl: string;
}

export type StrategyName = 'download_button' | 'screenshot' | 'text_extract';

export type FailureReason = 'no_match' | 'timeout' | 'no_content' | 'error';

export type StrategyOutcome =
  | { kind: 'success'; outputPath: string | null }
  | { kind: 'deferred'; reason: FailureReason }
  | { kind: 'failed'; reason: FailureReason; message: string };

export interface StrategyAttempt {
  strategy: StrategyName;
  outcome: StrategyOutcome;
}

export interface RetrievalResult {
  succeeded: boolean;
  strategyUsed: StrategyName | null;
  outputPath: string | null;
  attempts: StrategyAttempt[];
}

export interface DownloadReport extends RetrievalResult {
  document: DocumentInfo | null;
  metadataPath: string | null;
  error?: {
    code: ErrorCode;
    message: string;
    suggestion?: string;
  };
}

export interface MetadataRecord {
  title: string;
  doc_id: string | null;
  url: string;
  download_date: string;  // ISO 8601
  downloader_version: string;
}
