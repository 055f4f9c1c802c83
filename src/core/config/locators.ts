// src/core/config/locators.ts
// Order matters: the first entry that matches wins, except for text
// extraction which collects from every entry.

export const DOWNLOAD_BUTTON_LOCATORS: readonly string[] = [
  'button[data-testid="download-button"]',
  '.download_button',
  'button:has-text("Download")',
  'a:has-text("Download")',
  '[aria-label*="download" i]',
  '.btn-download',
  '#download-btn',
];

export const PAGE_LOCATORS: readonly string[] = [
  '.page',
  '.document_page',
  '[data-page]',
  '.text_layer',
  '.page-container',
  '.document-page',
];

export const TEXT_LOCATORS: readonly string[] = [
  '.text_layer',
  '.page_text',
  '.document_content',
  'p',
  '.text',
  '.content-text',
  '.document-text',
];

export const TITLE_LOCATORS: readonly string[] = [
  'h1.document_title',
  '.document-title',
  'h1',
  'title',
  '.title',
  '.doc-title',
];
