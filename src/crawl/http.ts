import { CancelledError, NetworkError } from '../shared/errors.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
  userAgents?: string[];
  headers?: Record<string, string>;
}

export interface HttpTextResponse {
  status: number;
  ok: boolean;
  text: string;
}

export interface HttpRequestOptions {
  accept?: string;
  signal?: AbortSignal;
}

/**
 * Thin HTTP client shared by the fetchers. Holds no global state: each crawl
 * builds its own, and tests hand in a fake `fetchFn`.
 */
export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly userAgents: string[];
  private readonly headers: Record<string, string>;
  private requestCount = 0;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.userAgents = options.userAgents ?? [];
    this.headers = options.headers ?? {};
  }

  /** User agent for the next request, rotating through the configured list. */
  nextUserAgent(): string | undefined {
    if (this.userAgents.length === 0) return undefined;
    const ua = this.userAgents[this.requestCount % this.userAgents.length];
    this.requestCount++;
    return ua;
  }

  /**
   * Single GET, body included. Resolves whatever the status; rejects with a
   * retryable NetworkError on connection failure, a body that breaks off
   * mid-read, or a timeout. The timeout covers reading the body.
   */
  async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpTextResponse> {
    if (options.signal?.aborted) throw new CancelledError('Request cancelled', { url });

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const headers: Record<string, string> = { ...this.headers };
    const ua = this.nextUserAgent();
    if (ua) headers['User-Agent'] = ua;
    if (options.accept) headers['Accept'] = options.accept;

    const aborted = rejectOnAbort(controller.signal);
    try {
      const response = await Promise.race([
        this.fetchFn(url, { method: 'GET', headers, signal: controller.signal, redirect: 'follow' }),
        aborted,
      ]);
      const text = await Promise.race([response.text(), aborted]);
      return { status: response.status, ok: response.ok, text };
    } catch (err) {
      if (timedOut) {
        throw new NetworkError(`Request timed out after ${this.timeoutMs}ms`, true, {
          url,
          timeout: this.timeoutMs,
        });
      }
      if (options.signal?.aborted) {
        throw new CancelledError('Request cancelled', { url });
      }
      throw new NetworkError(
        `Request failed: ${err instanceof Error ? err.message : String(err)}`,
        true,
        { url },
      );
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}

// Settles only by rejecting, once the signal aborts. Raced against fetch and
// body reads so a stream that ignores the signal cannot stall a request.
function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}
