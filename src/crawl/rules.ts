/**
 * Field-level extraction rules. Every function here is total: unresolvable
 * input maps to a default (0 for numbers, '' for text) instead of throwing.
 */

export const MIN_RATING = 0;
export const MAX_RATING = 5;

const NUMBER = String.raw`(\d+(?:\.\d+)?)`;
const OUT_OF_PATTERN = new RegExp(String.raw`${NUMBER}\s*out\s+of\s*${NUMBER}`, 'i');
const OVER_FIVE_PATTERN = new RegExp(String.raw`${NUMBER}\s*\/\s*5(?!\d)`);
const FIRST_NUMBER_PATTERN = new RegExp(NUMBER);

export function collapseWhitespace(text: string | null | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

export function clampRating(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(MAX_RATING, Math.max(MIN_RATING, value));
}

/**
 * "$1,234.56" → 1234.56. Keeps digits and the first decimal point; no digits → 0.
 */
export function cleanPrice(text: string | null | undefined): number {
  let cleaned = '';
  let seenPoint = false;
  for (const ch of text ?? '') {
    if (ch >= '0' && ch <= '9') {
      cleaned += ch;
    } else if (ch === '.' && !seenPoint) {
      cleaned += ch;
      seenPoint = true;
    }
  }
  if (!/\d/.test(cleaned)) return 0;
  const value = Number.parseFloat(cleaned);
  return Number.isFinite(value) && value >= 0 ? value : 0;
}

/** "4 out of 5", "8 out of 10" (rescaled to five points). */
export function ratingFromOutOf(text: string): number | null {
  const match = OUT_OF_PATTERN.exec(text);
  if (!match) return null;
  const value = Number.parseFloat(match[1] ?? '');
  const scale = Number.parseFloat(match[2] ?? '');
  if (!Number.isFinite(value)) return null;
  if (!Number.isFinite(scale) || scale <= 0 || scale === MAX_RATING) return clampRating(value);
  return clampRating((value / scale) * MAX_RATING);
}

/** "4.5/5" */
export function ratingFromOverFive(text: string): number | null {
  const match = OVER_FIVE_PATTERN.exec(text);
  if (!match) return null;
  return clampRating(Number.parseFloat(match[1] ?? ''));
}

export function ratingFromFirstNumber(text: string): number | null {
  const match = FIRST_NUMBER_PATTERN.exec(text);
  if (!match) return null;
  return clampRating(Number.parseFloat(match[1] ?? ''));
}

export function ratingFromStars(node: Element, starSelector: string): number | null {
  const stars = node.querySelectorAll(starSelector).length;
  return stars > 0 ? clampRating(stars) : null;
}

export type RatingStep = (node: Element, text: string) => number | null;

/**
 * Resolve a rating by trying each step in order; 0 when none matches.
 */
export function ratingFrom(node: Element | null, steps: RatingStep[]): number {
  if (!node) return 0;
  const text = collapseWhitespace(node.textContent);
  for (const step of steps) {
    const value = step(node, text);
    if (value !== null) return value;
  }
  return 0;
}

// Precedence not yet checked against live markup: a page showing both "4/5"
// and star icons resolves to the text.
export function listingRatingSteps(starSelector: string): RatingStep[] {
  return [
    (_node, text) => ratingFromOutOf(text),
    (_node, text) => ratingFromOverFive(text),
    (node) => ratingFromStars(node, starSelector),
  ];
}

export function reviewRatingSteps(starSelector: string): RatingStep[] {
  return [
    (_node, text) => ratingFromOutOf(text),
    (_node, text) => ratingFromOverFive(text),
    (_node, text) => ratingFromFirstNumber(text),
    (node) => ratingFromStars(node, starSelector),
  ];
}

export function textOf(root: Element, selector: string): string {
  return collapseWhitespace(root.querySelector(selector)?.textContent);
}

export function attrOf(root: Element, selector: string, attributes: string[]): string {
  const el = root.querySelector(selector);
  if (!el) return '';
  for (const attr of attributes) {
    const value = el.getAttribute(attr)?.trim();
    if (value) return value;
  }
  return '';
}

export function resolveReference(ref: string, baseUrl: string): string {
  if (!ref) return '';
  try {
    return new URL(ref, baseUrl).href;
  } catch {
    return ref;
  }
}
