import winston from 'winston';
import { assertSpreadsheetPayload } from './blob-fetcher';
import { AppError, UpstreamFetchError, describeError } from './errors';
import { toDirectDownloadUrl, withCacheBuster } from './link-normalizer';
import { BlobFetcher, CacheEntry, Workbook } from './types';
import { parseWorkbook } from './workbook-parser';

export interface DocumentCacheOptions {
  sourceUrl: string;
  ttlMs: number;
  fetcher: BlobFetcher;
  logger: winston.Logger;
  /** Keep answering from the previous download when a refresh fails */
  serveStaleOnError?: boolean;
  /** After a failed refresh, how long the stale copy is served before trying again */
  staleRetryMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  now?: () => number;
}

type CacheState = { kind: 'empty' } | { kind: 'loaded'; entry: CacheEntry };

export interface CacheSnapshot {
  state: CacheState['kind'];
  fetchedAt?: number;
  ageSeconds?: number;
}

/**
 * Holds the last downloaded workbook. At most one download runs at a time:
 * callers arriving during a refresh wait on the same promise, and the
 * download completes even if the request that started it goes away.
 */
export class DocumentCache {
  private state: CacheState = { kind: 'empty' };
  private inflight: Promise<CacheEntry> | null = null;
  private nextAttemptAt = 0;
  private readonly sourceUrl: string;
  private readonly ttlMs: number;
  private readonly fetcher: BlobFetcher;
  private readonly logger: winston.Logger;
  private readonly serveStaleOnError: boolean;
  private readonly staleRetryMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly now: () => number;

  constructor(options: DocumentCacheOptions) {
    this.sourceUrl = options.sourceUrl;
    this.ttlMs = options.ttlMs;
    this.fetcher = options.fetcher;
    this.logger = options.logger;
    this.serveStaleOnError = options.serveStaleOnError ?? true;
    this.staleRetryMs = options.staleRetryMs ?? 30_000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.now = options.now ?? Date.now;
  }

  getEntry(forceRefresh: boolean = false): Promise<CacheEntry> {
    const current = this.state;
    if (!forceRefresh && current.kind === 'loaded' && this.isUsable(current.entry)) {
      return Promise.resolve(current.entry);
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  async getWorkbook(forceRefresh: boolean = false): Promise<Workbook> {
    const entry = await this.getEntry(forceRefresh);
    return entry.workbook;
  }

  invalidate(): void {
    this.state = { kind: 'empty' };
    this.nextAttemptAt = 0;
  }

  snapshot(): CacheSnapshot {
    if (this.state.kind === 'empty') {
      return { state: 'empty' };
    }
    const { fetchedAt } = this.state.entry;
    return {
      state: 'loaded',
      fetchedAt,
      ageSeconds: Math.floor((this.now() - fetchedAt) / 1000),
    };
  }

  private isUsable(entry: CacheEntry): boolean {
    const now = this.now();
    return now - entry.fetchedAt < this.ttlMs || now < this.nextAttemptAt;
  }

  private async refresh(): Promise<CacheEntry> {
    const previous = this.state;

    try {
      const workbook = await this.retryOperation(() => this.download(), 'Spreadsheet download');
      const entry: CacheEntry = { workbook, fetchedAt: this.now() };
      this.state = { kind: 'loaded', entry };
      this.nextAttemptAt = 0;
      this.logger.info('Spreadsheet refreshed', { sheets: workbook.sheetNames });
      return entry;
    } catch (error) {
      if (previous.kind === 'loaded' && this.serveStaleOnError) {
        this.nextAttemptAt = this.now() + this.staleRetryMs;
        this.logger.warn('Spreadsheet refresh failed, serving cached copy', {
          error: describeError(error),
          ageSeconds: Math.floor((this.now() - previous.entry.fetchedAt) / 1000),
          retryInSeconds: Math.floor(this.staleRetryMs / 1000),
        });
        return previous.entry;
      }
      throw error;
    }
  }

  private async download(): Promise<Workbook> {
    const url = withCacheBuster(toDirectDownloadUrl(this.sourceUrl), this.now());
    this.logger.debug('Downloading spreadsheet', { url });

    const blob = await this.fetcher.fetch(url);
    assertSpreadsheetPayload(blob);
    return parseWorkbook(blob.body);
  }

  private async retryOperation<T>(
    operation: () => Promise<T>,
    operationName: string
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;
        this.logger.warn(`${operationName} attempt ${attempt} failed`, {
          error: describeError(error),
        });
        if (attempt < this.maxRetries) {
          const delay = this.retryBaseDelayMs * Math.pow(2, attempt - 1);
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    if (lastError instanceof AppError) {
      throw lastError;
    }
    throw new UpstreamFetchError(
      `${operationName} failed after ${this.maxRetries} attempts: ${describeError(lastError)}`
    );
  }
}
