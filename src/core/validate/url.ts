// src/core/validate/url.ts
import { EXPECTED_HOST } from '../config/constants.js';

export interface UrlValidation {
  valid: boolean;
  reason: string;
}

const DOCUMENT_PATH = /\/document\/(\d+)(?:[/?#]|$)/;

/**
 * Checks that a candidate address points at a document page. Never throws.
 */
export function validateUrl(url: string, expectedHost: string = EXPECTED_HOST): UrlValidation {
  if (!url || !url.trim()) {
    return { valid: false, reason: 'URL is empty' };
  }

  if (!url.toLowerCase().includes(expectedHost.toLowerCase())) {
    return { valid: false, reason: `URL must point to ${expectedHost}` };
  }

  if (!DOCUMENT_PATH.test(url)) {
    return {
      valid: false,
      reason: `URL must be a document link such as https://www.${expectedHost}/document/<id>/<slug>`,
    };
  }

  return { valid: true, reason: 'URL is valid' };
}

export function extractDocumentId(url: string): string | null {
  const match = url.match(DOCUMENT_PATH);
  return match ? match[1] : null;
}

/**
 * Adds a missing scheme and drops query string and fragment.
 * Input that still does not parse is returned trimmed, for the validator to reject.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  if (!trimmed) {
    return trimmed;
  }

  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    const parsed = new URL(withScheme);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    return trimmed;
  }
}
