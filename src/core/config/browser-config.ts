// src/core/config/browser-config.ts
import type { BrowserConfig, BrowserType, ConfigurableBrowser } from '../types/index.js';

export const BROWSER_CONFIGS: Record<ConfigurableBrowser, BrowserConfig> = {
  chrome: {
    channel: 'chrome',
    name: 'Google Chrome',
  },
  edge: {
    channel: 'msedge',
    name: 'Microsoft Edge',
  },
  // Playwright's own build, present only after `docsnap install-browsers`
  chromium: {
    name: 'Chromium',
  },
};

export const DEFAULT_BROWSER: BrowserType = 'auto';

export const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
];
