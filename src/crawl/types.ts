/**
 * One unit of crawl work: a single page of a category (or a single product page).
 */
export interface FetchTask {
  category: string;
  page: number;
  url: string;
  attempts: number;
}

/**
 * Product listing scraped from a competitor page.
 */
export type ExtractedRecord = {
  name: string;
  price: number;
  rating: number;
  image_url: string;
  category: string;
  source: string;
  source_url: string;
  page: number;
  position: number;
  captured_at: string;
};

/**
 * Customer review scraped from a rendered product page.
 */
export type ReviewRecord = {
  product_url: string;
  reviewer_name: string;
  rating: number;
  review_text: string;
  review_date: string;
  captured_at: string;
};

/**
 * Social post matched by a keyword search. Built from API JSON, not from a DOM.
 */
export type SocialMention = {
  platform: string;
  title: string;
  content: string;
  score: number;
  comments: number;
  created_utc: number;
  subreddit: string;
  author: string;
  url: string;
  keyword: string;
  captured_at: string;
};

/**
 * Fetch strategy the orchestrator drives. Static HTTP and browser rendering
 * both resolve a task into a parsed document.
 */
export interface PageSource {
  readonly kind: 'static' | 'dynamic';
  open?(signal?: AbortSignal): Promise<void>;
  load(task: FetchTask, signal?: AbortSignal): Promise<Document>;
  close?(): Promise<void>;
}

/**
 * Per-page context handed to extraction.
 */
export interface ExtractionContext {
  task: FetchTask;
  capturedAt: string;
}

export type RecordExtractor<T> = (document: Document, context: ExtractionContext) => T[];

export const LISTING_COLUMNS = [
  'name',
  'price',
  'rating',
  'image_url',
  'category',
  'source',
  'source_url',
  'page',
  'position',
  'captured_at',
] as const satisfies readonly (keyof ExtractedRecord)[];

export const REVIEW_COLUMNS = [
  'product_url',
  'reviewer_name',
  'rating',
  'review_text',
  'review_date',
  'captured_at',
] as const satisfies readonly (keyof ReviewRecord)[];

export const MENTION_COLUMNS = [
  'platform',
  'title',
  'content',
  'score',
  'comments',
  'created_utc',
  'subreddit',
  'author',
  'url',
  'keyword',
  'captured_at',
] as const satisfies readonly (keyof SocialMention)[];
