// src/cli/commands/download.ts
import { Command, InvalidArgumentError } from 'commander';
import { DocumentDownloader, type DownloaderOptions } from '../../core/orchestrator.js';
import { loadSettings, parseBrowserType, parseLogLevel, type Settings } from '../../core/config/settings.js';
import { normalizeUrl, validateUrl } from '../../core/validate/url.js';
import { formatFileSize, getPathSize } from '../../core/export/stats.js';
import { toErrorMessage } from '../../core/errors.js';
import type { BrowserType, DownloadReport } from '../../core/types/index.js';
import type { LogLevel } from '../../core/logger.js';

export interface DownloadCommandOptions {
  output?: string;
  headless: boolean;
  browser?: BrowserType;
  maxPages?: number;
  logLevel?: LogLevel;
  logFile?: string;
  json: boolean;
  strict: boolean;
}

export type DownloaderFactory = (options: DownloaderOptions) => Pick<DocumentDownloader, 'download' | 'close'>;

function parseBrowserOption(value: string): BrowserType {
  const browser = parseBrowserType(value);
  if (!browser) {
    throw new InvalidArgumentError('Use chrome, edge, chromium or auto.');
  }
  return browser;
}

function parseLogLevelOption(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError('Use debug, info, warn, error or silent.');
  }
  return level;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function registerDownloadCommand(
  program: Command,
  createDownloader: DownloaderFactory = (options) => new DocumentDownloader(options)
): void {
  program
    .argument('<url>', 'Document URL')
    .option('-o, --output <dir>', 'Output directory (default: "downloads")')
    .option('--no-headless', 'Run browser in visible mode')
    .option('--browser <browser>', 'Browser to use (chrome|edge|chromium|auto)', parseBrowserOption)
    .option('--max-pages <n>', 'Maximum pages to screenshot', parsePositiveInt)
    .option('--log-level <level>', 'Log level (debug|info|warn|error|silent)', parseLogLevelOption)
    .option('--log-file <path>', 'Also write logs to this file')
    .option('--json', 'Print the download report as JSON', false)
    .option('--strict', 'Exit with code 1 when the download fails', false)
    .action(async (url: string, options: DownloadCommandOptions) => {
      await runDownload(url, options, createDownloader);
    });
}

export async function runDownload(
  rawUrl: string,
  options: DownloadCommandOptions,
  createDownloader: DownloaderFactory
): Promise<DownloadReport | null> {
  const url = normalizeUrl(rawUrl);
  const validation = validateUrl(url);
  if (!validation.valid) {
    console.error(`Error: ${validation.reason}`);
    if (options.strict) {
      process.exitCode = 1;
    }
    return null;
  }

  const settings = loadSettings({
    outputDir: options.output,
    // commander always sets the negatable flag; only `false` is an explicit choice
    headless: options.headless === false ? false : undefined,
    browser: options.browser,
    maxPages: options.maxPages,
    logLevel: options.logLevel,
    logFile: options.logFile,
  });

  const downloader = createDownloader(toDownloaderOptions(settings));
  const onSignal = (signal: NodeJS.Signals): void => {
    console.error(`\nReceived ${signal}, closing browser...`);
    downloader.close().then(
      () => process.exit(130),
      () => process.exit(130)
    );
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  console.log(`Starting download from: ${url}`);
  console.log(`Output directory: ${settings.outputDir}`);

  let report: DownloadReport;
  try {
    report = await downloader.download(url, { outputDir: settings.outputDir });
  } catch (error) {
    console.error('Error:', toErrorMessage(error));
    if (options.strict) {
      process.exitCode = 1;
    }
    return null;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  }

  await printSummary(report);

  if (!report.succeeded && options.strict) {
    process.exitCode = 1;
  }
  return report;
}

export function toDownloaderOptions(settings: Settings): DownloaderOptions {
  return {
    headless: settings.headless,
    browserType: settings.browser,
    maxPages: settings.maxPages,
    retry: settings.retry,
    log: { level: settings.logLevel, file: settings.logFile },
  };
}

async function printSummary(report: DownloadReport): Promise<void> {
  if (report.succeeded) {
    console.log('\nDownload completed successfully!');
    if (report.document) {
      console.log(`Document: ${report.document.title}`);
    }
    console.log(`Method: ${report.strategyUsed}`);
    if (report.outputPath) {
      const size = await getPathSize(report.outputPath).catch(() => null);
      console.log(`Saved to: ${report.outputPath}${size === null ? '' : ` (${formatFileSize(size)})`}`);
    }
    return;
  }

  console.log('\nDownload failed. Please check the URL and try again.');
  if (report.error?.message) {
    console.log(`Reason: ${report.error.message}`);
  }
  console.log('Note: Some documents may require a subscription to download.');
}
