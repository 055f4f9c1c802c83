// src/core/config/constants.ts
export const DOWNLOADER_VERSION = '1.0.0';

export const DEFAULT_OUTPUT_DIR = 'downloads';
export const METADATA_FILENAME = 'metadata.json';

export const EXPECTED_HOST = 'scribd.com';
export const UNKNOWN_TITLE = 'Unknown Document';
export const UNTITLED_PLACEHOLDER = 'untitled_document';
export const MAX_FILENAME_LENGTH = 100;
export const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

export const PAGE_LOAD_TIMEOUT = 10000; // 10 seconds
export const LOCATOR_TIMEOUT = 5000;
export const CLICK_SETTLE_DELAY = 5000;
export const PAGE_SETTLE_DELAY = 1000;
export const REQUEST_TIMEOUT = 15000;

export const MAX_SCREENSHOT_PAGES = 10;

export const RETRY_DEFAULTS = {
  maxAttempts: 3,
  delayMs: 1000,
} as const;

export const VIEWPORT = { width: 1920, height: 1080 } as const;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
