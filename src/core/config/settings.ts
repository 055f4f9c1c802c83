// src/core/config/settings.ts
import type { BrowserType } from '../types/index.js';
import type { LogLevel } from '../logger.js';
import {
  DEFAULT_OUTPUT_DIR,
  MAX_SCREENSHOT_PAGES,
  RETRY_DEFAULTS,
} from './constants.js';
import { DEFAULT_BROWSER } from './browser-config.js';

export interface Settings {
  outputDir: string;
  headless: boolean;
  browser: BrowserType;
  maxPages: number;
  retry: {
    maxAttempts: number;
    delayMs: number;
  };
  logLevel: LogLevel;
  logFile?: string;
}

export type SettingsOverrides = Partial<Omit<Settings, 'retry'>> & {
  retry?: Partial<Settings['retry']>;
};

export const DEFAULT_SETTINGS: Settings = {
  outputDir: DEFAULT_OUTPUT_DIR,
  headless: true,
  browser: DEFAULT_BROWSER,
  maxPages: MAX_SCREENSHOT_PAGES,
  retry: { ...RETRY_DEFAULTS },
  logLevel: 'info',
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const BROWSER_TYPES: readonly BrowserType[] = ['chrome', 'edge', 'chromium', 'auto'];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find(level => level === value?.trim().toLowerCase());
}

export function parseBrowserType(value: string | undefined): BrowserType | undefined {
  return BROWSER_TYPES.find(type => type === value?.trim().toLowerCase());
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  return fallback;
}

/**
 * Defaults, then environment, then explicit overrides (CLI flags).
 */
export function loadSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Settings {
  const fromEnv: Settings = {
    outputDir: env.DOCSNAP_OUTPUT_DIR ?? DEFAULT_SETTINGS.outputDir,
    headless: toBool(env.DOCSNAP_HEADLESS, DEFAULT_SETTINGS.headless),
    browser: parseBrowserType(env.DOCSNAP_BROWSER) ?? DEFAULT_SETTINGS.browser,
    maxPages: toInt(env.DOCSNAP_MAX_PAGES, DEFAULT_SETTINGS.maxPages),
    retry: {
      maxAttempts: toInt(env.DOCSNAP_RETRY_ATTEMPTS, DEFAULT_SETTINGS.retry.maxAttempts),
      delayMs: toInt(env.DOCSNAP_RETRY_DELAY_MS, DEFAULT_SETTINGS.retry.delayMs),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL) ?? DEFAULT_SETTINGS.logLevel,
    logFile: env.DOCSNAP_LOG_FILE || undefined,
  };

  return {
    outputDir: overrides.outputDir ?? fromEnv.outputDir,
    headless: overrides.headless ?? fromEnv.headless,
    browser: overrides.browser ?? fromEnv.browser,
    maxPages: overrides.maxPages ?? fromEnv.maxPages,
    retry: {
      maxAttempts: overrides.retry?.maxAttempts ?? fromEnv.retry.maxAttempts,
      delayMs: overrides.retry?.delayMs ?? fromEnv.retry.delayMs,
    },
    logLevel: overrides.logLevel ?? fromEnv.logLevel,
    logFile: overrides.logFile ?? fromEnv.logFile,
  };
}
