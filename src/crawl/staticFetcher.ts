import { NetworkError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { redactUrl, sleep as timerSleep, type SleepFn } from '../shared/utils.js';
import type { HttpClient } from './http.js';
import type { RetryPolicy } from './retry.js';
import type { FetchTask, PageSource } from './types.js';
import { parseDocument } from './document.js';

export interface StaticFetcherOptions {
  client: HttpClient;
  retry: RetryPolicy;
  sleep?: SleepFn;
}

interface Body {
  text: string;
  status: number;
  attempts: number;
}

/**
 * Plain HTTP fetch + HTML parse. Connection errors, timeouts and 5xx responses
 * are retried under the RetryPolicy; any other non-2xx fails immediately.
 */
export class StaticFetcher implements PageSource {
  readonly kind = 'static';
  private readonly client: HttpClient;
  private readonly retry: RetryPolicy;
  private readonly sleepFn: SleepFn;

  constructor(options: StaticFetcherOptions) {
    this.client = options.client;
    this.retry = options.retry;
    this.sleepFn = options.sleep ?? timerSleep;
  }

  async fetch(url: string, signal?: AbortSignal): Promise<Document> {
    const body = await this.request(url, 'text/html,application/xhtml+xml,*/*;q=0.8', signal);
    return parseDocument(body.text, url);
  }

  async fetchJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const body = await this.request(url, 'application/json', signal);
    try {
      return JSON.parse(body.text) as unknown;
    } catch (err) {
      throw new NetworkError(`Invalid JSON from ${redactUrl(url)}`, false, {
        url: redactUrl(url),
        status: body.status,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async load(task: FetchTask, signal?: AbortSignal): Promise<Document> {
    const body = await this.request(task.url, 'text/html,application/xhtml+xml,*/*;q=0.8', signal, task);
    return parseDocument(body.text, task.url);
  }

  private async request(
    url: string,
    accept: string,
    signal?: AbortSignal,
    task?: FetchTask,
  ): Promise<Body> {
    const safeUrl = redactUrl(url);
    for (let attempt = 1; ; attempt++) {
      if (task) task.attempts = attempt;
      try {
        const response = await this.client.getText(url, { accept, signal });
        if (response.ok) {
          return { text: response.text, status: response.status, attempts: attempt };
        }
        throw new NetworkError(`HTTP ${response.status} from ${safeUrl}`, response.status >= 500, {
          url: safeUrl,
          status: response.status,
          attempts: attempt,
        });
      } catch (err) {
        if (!this.retry.shouldRetry(err, attempt)) {
          if (err instanceof NetworkError && err.retryable) {
            throw new NetworkError(`Giving up on ${safeUrl} after ${attempt} attempts: ${err.message}`, true, {
              ...err.details,
              url: safeUrl,
              attempts: attempt,
            });
          }
          throw err;
        }
        const waitMs = this.retry.nextDelay(attempt);
        logger.debug({ url: safeUrl, attempt, waitMs, error: err instanceof Error ? err.message : String(err) }, 'Retrying request');
        await this.sleepFn(waitMs, signal);
      }
    }
  }
}
