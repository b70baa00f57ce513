import express, { Express, NextFunction, Request, Response } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import { Server } from 'http';
import { AddressInfo } from 'net';
import winston from 'winston';
import { AxiosBlobFetcher } from './blob-fetcher';
import { DocumentCache } from './document-cache';
import { DriverDirectory } from './driver-directory';
import { AppError, BadRequestError, describeError } from './errors';
import { createLogger } from './logger';
import { BlobFetcher, LookupRequest, ServerConfig } from './types';

export interface ServerDependencies {
  fetcher?: BlobFetcher;
  logger?: winston.Logger;
  now?: () => number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
}

function queryValue(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return queryValue(value[0]);
  }
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function parseHeaderRow(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new BadRequestError('Query parameter "header_row" must be a positive integer', {
      header_row: raw,
    });
  }
  return parsed;
}

function parseFlag(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes'].includes(raw.toLowerCase());
}

export function parseLookupRequest(query: Request['query']): LookupRequest {
  return {
    doc: queryValue(query.doc),
    token: queryValue(query.t),
    sheetName: queryValue(query.sheet_name),
    headerRow: parseHeaderRow(queryValue(query.header_row)),
    forceRefresh: parseFlag(queryValue(query.refresh)),
  };
}

function corsOptions(allowedOrigin: string | undefined): CorsOptions {
  const origins = allowedOrigin
    ?.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    origin: origins && origins.length > 0 ? origins : '*',
    methods: ['GET'],
  };
}

export class DriverLookupServer {
  readonly app: Express;
  readonly cache: DocumentCache;
  private readonly directory: DriverDirectory;
  private readonly logger: winston.Logger;
  private httpServer: Server | null = null;
  private isShuttingDown: boolean = false;

  constructor(
    private readonly config: ServerConfig,
    dependencies: ServerDependencies = {}
  ) {
    this.logger =
      dependencies.logger ??
      createLogger({ logFilePath: config.logFilePath, level: config.logLevel });

    this.cache = new DocumentCache({
      sourceUrl: config.sourceUrl,
      ttlMs: config.cacheTtlSeconds * 1000,
      fetcher: dependencies.fetcher ?? new AxiosBlobFetcher(config.fetchTimeoutMs),
      logger: this.logger,
      serveStaleOnError: config.serveStaleOnError,
      staleRetryMs: config.staleRetrySeconds * 1000,
      maxRetries: dependencies.maxRetries,
      retryBaseDelayMs: dependencies.retryBaseDelayMs,
      now: dependencies.now,
    });

    this.directory = new DriverDirectory({
      cache: this.cache,
      secretKey: config.secretKey,
      logger: this.logger,
      defaultSheetName: config.sheetName,
      defaultHeaderRow: config.headerRow,
    });

    this.app = this.createApp();
  }

  private createApp(): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(helmet());
    app.use(cors(corsOptions(this.config.allowedOrigin)));

    app.get('/health', (_req: Request, res: Response) => {
      res.json({
        ok: true,
        ts: Math.floor(Date.now() / 1000),
        cache: this.cache.snapshot(),
      });
    });
    app.get('/', (_req: Request, res: Response) => res.redirect('/health'));

    app.get('/driver', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const driver = await this.directory.lookup(parseLookupRequest(req.query));
        res.set('Cache-Control', 'no-store').json({ ok: true, driver });
      } catch (error) {
        next(error);
      }
    });

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
      this.sendError(res, error);
    });

    return app;
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof AppError) {
      if (error.statusCode >= 500 || error.code === 'SCHEMA' || error.code === 'UPSTREAM_FETCH') {
        this.logger.warn(error.message, { code: error.code, ...error.details });
      }
      res.status(error.statusCode).json({
        ok: false,
        error: { code: error.code, message: error.message, ...error.details },
      });
      return;
    }

    this.logger.error('Unhandled error', { error: describeError(error) });
    res.status(500).json({
      ok: false,
      error: { code: 'INTERNAL', message: 'Internal server error' },
    });
  }

  start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port);
      server.once('error', reject);
      server.once('listening', () => {
        this.httpServer = server;
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }
        this.logger.info('Server started', {
          port: address.port,
          sheetName: this.config.sheetName ?? '(first sheet)',
          headerRow: this.config.headerRow,
          cacheTtlSeconds: this.config.cacheTtlSeconds,
        });
        resolve(address);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.httpServer;
    this.httpServer = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  installShutdownHandlers(): void {
    const shutdown = async (signal: string) => {
      if (this.isShuttingDown) return;

      this.isShuttingDown = true;
      this.logger.info('Server shutting down', { signal });

      try {
        await this.stop();
      } catch (error) {
        this.logger.error('Failed to close HTTP server', { error: describeError(error) });
      }

      this.logger.info('Server stopped', {
        reason: signal,
        uptime_seconds: process.uptime(),
      });

      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  }
}
