import winston from 'winston';
import { DocumentCache } from './document-cache';
import { AuthError, BadRequestError, NotFoundError } from './errors';
import { resolveColumns } from './header-resolver';
import { normalizeIdentifier } from './normalize';
import { findRecord } from './record-lookup';
import { verifyToken } from './token';
import { CacheEntry, ColumnMap, DriverRecord, LookupRequest } from './types';
import { selectSheet } from './workbook-parser';

export interface DriverDirectoryOptions {
  cache: DocumentCache;
  secretKey: string;
  logger: winston.Logger;
  defaultSheetName?: string;
  defaultHeaderRow: number;
}

export class DriverDirectory {
  private readonly columnMaps = new WeakMap<CacheEntry, Map<string, ColumnMap>>();

  constructor(private readonly options: DriverDirectoryOptions) {}

  async lookup(request: LookupRequest): Promise<DriverRecord> {
    const identifier = normalizeIdentifier(request.doc);
    if (!identifier) {
      throw new BadRequestError('Query parameter "doc" is required');
    }

    if (!verifyToken(identifier, request.token, this.options.secretKey)) {
      this.options.logger.debug('Rejected token', { identifier });
      throw new AuthError();
    }

    const entry = await this.options.cache.getEntry(request.forceRefresh ?? false);
    const document = selectSheet(
      entry.workbook,
      request.sheetName ?? this.options.defaultSheetName,
      request.headerRow ?? this.options.defaultHeaderRow
    );

    const columns = this.columnsFor(entry, document.sheetName, document.headerRow, () =>
      resolveColumns(document.rows[document.headerRow - 1] ?? [], document.columnCount)
    );

    const record = findRecord(document, columns, identifier);
    if (!record) {
      this.options.logger.debug('Driver not found', { identifier, sheet: document.sheetName });
      throw new NotFoundError(identifier);
    }
    return record;
  }

  /** Column positions only change when a new download replaces the entry. */
  private columnsFor(
    entry: CacheEntry,
    sheetName: string,
    headerRow: number,
    resolve: () => ColumnMap
  ): ColumnMap {
    let perEntry = this.columnMaps.get(entry);
    if (!perEntry) {
      perEntry = new Map();
      this.columnMaps.set(entry, perEntry);
    }

    const key = `${sheetName}\u0000${headerRow}`;
    const cached = perEntry.get(key);
    if (cached) return cached;

    const columns = resolve();
    perEntry.set(key, columns);

    const fallbacks = Object.entries(columns.sources)
      .filter(([, source]) => source === 'fallback')
      .map(([field]) => field);
    if (fallbacks.length > 0) {
      this.options.logger.warn('Header names not found, using fixed column positions', {
        sheet: sheetName,
        headerRow,
        fields: fallbacks,
      });
    }
    return columns;
  }
}
