import { ParseError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ExtractedRecord, ExtractionContext, RecordExtractor, ReviewRecord } from './types.js';
import {
  attrOf,
  cleanPrice,
  listingRatingSteps,
  ratingFrom,
  resolveReference,
  reviewRatingSteps,
  textOf,
} from './rules.js';

/** Maps one document node to one field value. Must not throw. */
export type FieldRule<T> = (node: Element, context: ExtractionContext) => T;

export interface ListingSelectors {
  item: string;
  name: string;
  price: string;
  rating: string;
  image: string;
  star: string;
}

export interface ReviewSelectors {
  item: string;
  reviewer: string;
  rating: string;
  text: string;
  date: string;
  star: string;
}

export interface ListingProfile {
  itemSelector: string;
  fieldSelectors: string[];
  fields: {
    name: FieldRule<string>;
    price: FieldRule<number>;
    rating: FieldRule<number>;
    image_url: FieldRule<string>;
  };
}

export interface ReviewProfile {
  itemSelector: string;
  fieldSelectors: string[];
  maxItems: number;
  fields: {
    reviewer_name: FieldRule<string>;
    rating: FieldRule<number>;
    review_text: FieldRule<string>;
    review_date: FieldRule<string>;
  };
}

/**
 * Site-specific extraction strategy, chosen once when a crawl is set up.
 */
export interface SiteProfile {
  name: string;
  listing: ListingProfile;
  review: ReviewProfile;
}

export function buildListingProfile(selectors: ListingSelectors): ListingProfile {
  const ratingSteps = listingRatingSteps(selectors.star);
  return {
    itemSelector: selectors.item,
    fieldSelectors: [selectors.name, selectors.price, selectors.rating, selectors.image],
    fields: {
      name: (node) => textOf(node, selectors.name),
      price: (node) => cleanPrice(node.querySelector(selectors.price)?.textContent),
      rating: (node) => ratingFrom(node.querySelector(selectors.rating), ratingSteps),
      image_url: (node, ctx) =>
        resolveReference(attrOf(node, selectors.image, ['src', 'data-src']), ctx.task.url),
    },
  };
}

export function buildReviewProfile(selectors: ReviewSelectors, maxItems: number): ReviewProfile {
  const ratingSteps = reviewRatingSteps(selectors.star);
  return {
    itemSelector: selectors.item,
    fieldSelectors: [selectors.reviewer, selectors.rating, selectors.text, selectors.date],
    maxItems,
    fields: {
      reviewer_name: (node) => textOf(node, selectors.reviewer),
      rating: (node) => ratingFrom(node.querySelector(selectors.rating), ratingSteps),
      review_text: (node) => textOf(node, selectors.text),
      review_date: (node) => textOf(node, selectors.date),
    },
  };
}

export function buildSiteProfile(
  name: string,
  listing: ListingSelectors,
  review: ReviewSelectors,
  maxReviews: number,
): SiteProfile {
  return {
    name,
    listing: buildListingProfile(listing),
    review: buildReviewProfile(review, maxReviews),
  };
}

function hasAnyField(node: Element, selectors: string[]): boolean {
  return selectors.some((selector) => node.querySelector(selector) !== null);
}

function logRecordFailure(err: unknown, ctx: ExtractionContext, position: number): void {
  const error =
    err instanceof ParseError
      ? err
      : new ParseError(`Record extraction failed: ${err instanceof Error ? err.message : String(err)}`);
  logger.warn(
    { category: ctx.task.category, page: ctx.task.page, url: ctx.task.url, position, error: error.message },
    'Skipping record',
  );
}

function selectItems(document: Document, selector: string, ctx: ExtractionContext): Element[] {
  try {
    return Array.from(document.querySelectorAll(selector));
  } catch (err) {
    logRecordFailure(
      new ParseError(`Invalid item selector "${selector}": ${err instanceof Error ? err.message : String(err)}`),
      ctx,
      -1,
    );
    return [];
  }
}

/**
 * One ExtractedRecord per listing node. Nodes with none of the profile's fields
 * are skipped and logged.
 */
export function extractListings(profile: ListingProfile, sourceTag: string): RecordExtractor<ExtractedRecord> {
  return (document, ctx) => {
    const records: ExtractedRecord[] = [];
    const nodes = selectItems(document, profile.itemSelector, ctx);

    nodes.forEach((node, position) => {
      try {
        if (!hasAnyField(node, profile.fieldSelectors)) {
          throw new ParseError('Listing node has no recognizable fields');
        }
        const { fields } = profile;
        records.push({
          name: fields.name(node, ctx),
          price: fields.price(node, ctx),
          rating: fields.rating(node, ctx),
          image_url: fields.image_url(node, ctx),
          category: ctx.task.category,
          source: sourceTag,
          source_url: ctx.task.url,
          page: ctx.task.page,
          position,
          captured_at: ctx.capturedAt,
        });
      } catch (err) {
        logRecordFailure(err, ctx, position);
      }
    });

    return records;
  };
}

/**
 * Review records from a rendered product page, capped at `maxItems`.
 */
export function extractReviews(profile: ReviewProfile): RecordExtractor<ReviewRecord> {
  return (document, ctx) => {
    const records: ReviewRecord[] = [];
    const nodes = selectItems(document, profile.itemSelector, ctx).slice(0, profile.maxItems);

    nodes.forEach((node, position) => {
      try {
        if (!hasAnyField(node, profile.fieldSelectors)) {
          throw new ParseError('Review node has no recognizable fields');
        }
        const { fields } = profile;
        records.push({
          product_url: ctx.task.url,
          reviewer_name: fields.reviewer_name(node, ctx),
          rating: fields.rating(node, ctx),
          review_text: fields.review_text(node, ctx),
          review_date: fields.review_date(node, ctx),
          captured_at: ctx.capturedAt,
        });
      } catch (err) {
        logRecordFailure(err, ctx, position);
      }
    });

    return records;
  };
}
