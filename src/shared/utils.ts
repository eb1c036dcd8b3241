/**
 * General-purpose utility functions used across every module.
 * All functions are pure (no side effects, no I/O).
 */

// ---------------------------------------------------------------------------
// String utilities
// ---------------------------------------------------------------------------

/**
 * Truncates text to `maxLen` characters, appending "..." if shortened.
 */
export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) {
    return text;
  }
  return `${text.slice(0, maxLen)}...`;
}

/**
 * Collapses runs of whitespace (including newlines) into single spaces.
 */
export function squashWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Pulls the integer out of labels like "1,200 XP" or "+50". Returns null
 * when the text carries no digits.
 */
export function parseDigits(text: string): number | null {
  const digits = text.replace(/\D/g, '');
  if (digits.length === 0) {
    return null;
  }
  return Number.parseInt(digits, 10);
}

// ---------------------------------------------------------------------------
// URL utilities
// ---------------------------------------------------------------------------

/** Tracking parameters commonly appended by analytics and ad platforms. */
const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'msclkid',
  'ref',
  '_ga',
  'twclid',
]);

/**
 * Normalizes a URL by removing tracking parameters, lowercasing the
 * host, and stripping trailing slashes and fragments. The result is the
 * identifying link of a candidate.
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url.trim());

    for (const param of TRACKING_PARAMS) {
      parsed.searchParams.delete(param);
    }
    parsed.searchParams.sort();

    parsed.hostname = parsed.hostname.toLowerCase();

    // Remove trailing slash from pathname (but keep "/" for root)
    if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
      parsed.pathname = parsed.pathname.slice(0, -1);
    }

    parsed.hash = '';

    return parsed.toString();
  } catch {
    return url.trim();
  }
}

/**
 * Extracts the bare domain from a URL. Example: "https://www.example.com/path" -> "example.com"
 */
export function extractDomain(url: string): string {
  try {
    const hostname = new URL(url).hostname;
    return hostname.replace(/^www\./, '');
  } catch {
    return url;
  }
}

// ---------------------------------------------------------------------------
// Array utilities
// ---------------------------------------------------------------------------

/**
 * Returns a random element from the array.
 * Throws if the array is empty.
 */
export function pickRandom<T>(arr: readonly T[]): T {
  const item = arr[Math.floor(Math.random() * arr.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty array');
  }
  return item;
}

// ---------------------------------------------------------------------------
// Date utilities
// ---------------------------------------------------------------------------

/** UTC calendar date as YYYY-MM-DD. */
export function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function daysBetween(earlier: Date, later: Date): number {
  return (later.getTime() - earlier.getTime()) / (24 * 60 * 60 * 1000);
}
