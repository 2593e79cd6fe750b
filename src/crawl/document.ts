import { JSDOM } from 'jsdom';

/**
 * Parse HTML into a traversable document. Scripts are never executed.
 */
export function parseDocument(html: string, url?: string): Document {
  const dom = new JSDOM(html, url ? { url } : {});
  return dom.window.document;
}

export function emptyDocument(url?: string): Document {
  return parseDocument('<!DOCTYPE html><html><head></head><body></body></html>', url);
}

export function isEmptyDocument(document: Document): boolean {
  return (document.body?.children.length ?? 0) === 0;
}
