import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { CancelledError } from '../shared/errors.js';
import type { StaticFetcher } from '../crawl/staticFetcher.js';
import type { DelayPolicy } from '../crawl/delay.js';
import type { SocialMention } from '../crawl/types.js';
import { dedupeRecords, mentionKey } from '../crawl/dedup.js';

const RedditPostSchema = z.object({
  title: z.string().catch(''),
  selftext: z.string().catch(''),
  score: z.number().catch(0),
  num_comments: z.number().catch(0),
  created_utc: z.number().catch(0),
  subreddit: z.string().catch(''),
  author: z.string().catch(''),
  permalink: z.string().catch(''),
});

const RedditListingSchema = z.object({
  data: z
    .object({
      children: z.array(z.object({ data: z.unknown() })).catch([]),
    })
    .catch({ children: [] }),
});

export function socialSearchUrl(endpoint: string, keyword: string, limit: number): string {
  const url = new URL(endpoint);
  url.searchParams.set('q', keyword);
  url.searchParams.set('sort', 'new');
  url.searchParams.set('limit', String(limit));
  return url.toString();
}

export function parseRedditListing(body: unknown, keyword: string, capturedAt: string): SocialMention[] {
  const listing = RedditListingSchema.safeParse(body);
  if (!listing.success) return [];
  const mentions: SocialMention[] = [];
  for (const child of listing.data.data.children) {
    const post = RedditPostSchema.safeParse(child.data ?? {});
    if (!post.success) continue;
    const p = post.data;
    mentions.push({
      platform: 'reddit',
      title: p.title,
      content: p.selftext,
      score: p.score,
      comments: p.num_comments,
      created_utc: p.created_utc,
      subreddit: p.subreddit,
      author: p.author,
      url: `https://reddit.com${p.permalink}`,
      keyword,
      captured_at: capturedAt,
    });
  }
  return mentions;
}

export interface SocialOptions {
  endpoint: string;
  keywords: readonly string[];
  platforms: readonly string[];
  limit: number;
  clock?: () => Date;
  signal?: AbortSignal;
}

/**
 * Keyword search across platforms. A keyword that fails yields no mentions
 * and does not stop the others.
 */
export async function fetchSocialMentions(
  fetcher: StaticFetcher,
  delay: DelayPolicy,
  options: SocialOptions,
): Promise<SocialMention[]> {
  const clock = options.clock ?? (() => new Date());
  const mentions: SocialMention[] = [];
  let first = true;

  for (const keyword of options.keywords) {
    for (const platform of options.platforms) {
      if (platform !== 'reddit') {
        logger.warn({ platform, keyword }, 'Unsupported social platform, skipping');
        continue;
      }
      if (!first) await delay.wait(options.signal);
      first = false;

      const url = socialSearchUrl(options.endpoint, keyword, options.limit);
      try {
        const body = await fetcher.fetchJson(url, options.signal);
        const found = parseRedditListing(body, keyword, clock().toISOString());
        mentions.push(...found);
        logger.info({ platform, keyword, mentions: found.length }, 'Social search complete');
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        logger.warn(
          { platform, keyword, url, error: err instanceof Error ? err.message : String(err) },
          'Social search failed',
        );
      }
    }
  }

  return dedupeRecords(mentions, mentionKey);
}
