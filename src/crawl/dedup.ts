import { logger } from '../shared/logger.js';
import type { ExtractedRecord, ReviewRecord, SocialMention } from './types.js';

export type NaturalKey<T> = (record: T) => string;

export const listingKey: NaturalKey<ExtractedRecord> = (r) =>
  `${r.source_url}\u0000${r.page}\u0000${r.position}`;

export const reviewKey: NaturalKey<ReviewRecord> = (r) =>
  `${r.reviewer_name}\u0000${r.review_date}\u0000${r.review_text}`;

export const mentionKey: NaturalKey<SocialMention> = (m) =>
  `${m.platform}\u0000${m.url}\u0000${m.keyword}`;

/**
 * Keep the first record seen for each natural key, preserving arrival order.
 */
export function dedupeRecords<T>(records: readonly T[], key: NaturalKey<T>): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const record of records) {
    const k = key(record);
    if (seen.has(k)) continue;
    seen.add(k);
    unique.push(record);
  }
  if (unique.length < records.length) {
    logger.debug({ before: records.length, after: unique.length }, 'Duplicates removed');
  }
  return unique;
}

/**
 * Drop records whose capture time precedes `startedAt` or lies after `now`.
 */
export function withinCaptureWindow<T extends { captured_at: string }>(
  records: readonly T[],
  startedAt: Date,
  now: Date = new Date(),
): T[] {
  const from = startedAt.getTime();
  const to = now.getTime();
  const kept = records.filter((r) => {
    const at = Date.parse(r.captured_at);
    return Number.isFinite(at) && at >= from && at <= to;
  });
  if (kept.length < records.length) {
    logger.warn(
      { dropped: records.length - kept.length, startedAt: startedAt.toISOString() },
      'Dropped records with capture time outside the crawl window',
    );
  }
  return kept;
}
