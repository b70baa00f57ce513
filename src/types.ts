export interface ServerConfig {
  secretKey: string;
  sourceUrl: string;
  sheetName?: string;
  headerRow: number;
  cacheTtlSeconds: number;
  fetchTimeoutMs: number;
  serveStaleOnError: boolean;
  staleRetrySeconds: number;
  allowedOrigin?: string;
  port: number;
  logFilePath?: string;
  logLevel: string;
}

export type LogicalField = 'name' | 'identifier' | 'expiryDate' | 'status';

export type ColumnSource = 'header' | 'fallback';

export interface ColumnMap {
  indices: Record<LogicalField, number>;
  sources: Record<LogicalField, ColumnSource>;
}

export type SheetRows = string[][];

export interface Workbook {
  sheetNames: string[];
  sheets: Map<string, SheetRows>;
}

export interface TabularDocument {
  sheetName: string;
  /** 1-based, as shown in the spreadsheet */
  headerRow: number;
  rows: SheetRows;
  columnCount: number;
}

export interface DriverRecord {
  readonly name: string;
  readonly identifier: string;
  readonly expiry_date: string;
  readonly status: string;
}

export interface CacheEntry {
  workbook: Workbook;
  fetchedAt: number;
}

export interface FetchedBlob {
  status: number;
  contentType: string;
  body: Buffer;
}

export interface BlobFetcher {
  fetch(url: string): Promise<FetchedBlob>;
}

export interface LookupRequest {
  doc?: string;
  token?: string;
  sheetName?: string;
  headerRow?: number;
  forceRefresh?: boolean;
}
