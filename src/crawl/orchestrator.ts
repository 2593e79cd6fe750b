import { CancelledError, DriverError, NetworkError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { throwIfAborted } from '../shared/utils.js';
import type { DelayPolicy } from './delay.js';
import type { FetchTask, PageSource, RecordExtractor } from './types.js';

export type CrawlState =
  | { phase: 'idle' }
  | { phase: 'paginating'; category: string; page: number }
  | { phase: 'fetching'; task: FetchTask }
  | { phase: 'extracting'; task: FetchTask }
  | { phase: 'accumulating'; task: FetchTask; count: number }
  | { phase: 'done' };

export interface PageFailure {
  category: string;
  page: number;
  url: string;
  attempts: number;
  error: string;
}

export interface CrawlResult<T> {
  records: T[];
  startedAt: Date;
  finishedAt: Date;
  pagesFetched: number;
  pagesFailed: number;
  failures: PageFailure[];
}

export interface CrawlOrchestratorOptions<T> {
  source: PageSource;
  extract: RecordExtractor<T>;
  delay: DelayPolicy;
  clock?: () => Date;
  onTransition?: (state: CrawlState) => void;
}

/**
 * Sequential crawl driver. Tasks run one at a time, in order, with a pacing
 * delay between requests. Page-level failures are logged and skipped; driver
 * failures and cancellation end the crawl. The page source is opened before
 * the first task and closed on every exit path.
 */
export class CrawlOrchestrator<T> {
  private readonly source: PageSource;
  private readonly extract: RecordExtractor<T>;
  private readonly delay: DelayPolicy;
  private readonly clock: () => Date;
  private readonly onTransition?: (state: CrawlState) => void;
  private currentState: CrawlState = { phase: 'idle' };

  constructor(options: CrawlOrchestratorOptions<T>) {
    this.source = options.source;
    this.extract = options.extract;
    this.delay = options.delay;
    this.clock = options.clock ?? (() => new Date());
    this.onTransition = options.onTransition;
  }

  get state(): CrawlState {
    return this.currentState;
  }

  async run(tasks: Iterable<FetchTask>, signal?: AbortSignal): Promise<CrawlResult<T>> {
    const startedAt = this.clock();
    const records: T[] = [];
    const failures: PageFailure[] = [];
    let pagesFetched = 0;
    let first = true;

    throwIfAborted(signal);
    await this.source.open?.(signal);

    try {
      for (const task of tasks) {
        throwIfAborted(signal, { category: task.category, page: task.page, url: task.url });
        this.transition({ phase: 'paginating', category: task.category, page: task.page });

        if (!first) {
          await this.delay.wait(signal);
        }
        first = false;

        this.transition({ phase: 'fetching', task });
        let document: Document;
        try {
          document = await this.source.load(task, signal);
        } catch (err) {
          if (err instanceof DriverError || err instanceof CancelledError) throw err;
          const failure = {
            category: task.category,
            page: task.page,
            url: task.url,
            attempts: task.attempts,
            error: err instanceof Error ? err.message : String(err),
          };
          failures.push(failure);
          logger.warn(
            { ...failure, kind: err instanceof NetworkError ? 'network' : 'unexpected' },
            'Page fetch failed, skipping',
          );
          continue;
        }
        pagesFetched++;

        this.transition({ phase: 'extracting', task });
        const extracted = this.extract(document, { task, capturedAt: this.clock().toISOString() });

        this.transition({ phase: 'accumulating', task, count: extracted.length });
        records.push(...extracted);
        logger.info(
          { category: task.category, page: task.page, records: extracted.length },
          'Page extracted',
        );
      }
    } finally {
      await this.closeSource();
    }

    this.transition({ phase: 'done' });
    const finishedAt = this.clock();
    logger.info(
      { source: this.source.kind, records: records.length, pagesFetched, pagesFailed: failures.length },
      'Crawl complete',
    );

    return { records, startedAt, finishedAt, pagesFetched, pagesFailed: failures.length, failures };
  }

  // A close failure is logged; the crawl's own result or error stands.
  private async closeSource(): Promise<void> {
    try {
      await this.source.close?.();
    } catch (err) {
      logger.warn(
        { source: this.source.kind, error: err instanceof Error ? err.message : String(err) },
        'Page source close failed',
      );
    }
  }

  private transition(state: CrawlState): void {
    this.currentState = state;
    this.onTransition?.(state);
  }
}
