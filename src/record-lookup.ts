import { normalizeIdentifier } from './normalize';
import { ColumnMap, DriverRecord, TabularDocument } from './types';

function cellAt(row: readonly string[], index: number): string {
  return (row[index] ?? '').trim();
}

/**
 * Returns the first data row whose identifier cell matches. Later rows with
 * the same identifier are ignored.
 */
export function findRecord(
  document: TabularDocument,
  columns: ColumnMap,
  identifier: string
): DriverRecord | null {
  const wanted = normalizeIdentifier(identifier);
  if (!wanted) return null;

  const { indices } = columns;
  // headerRow is 1-based, so this is the first row below it
  for (let r = document.headerRow; r < document.rows.length; r++) {
    const row = document.rows[r];
    if (!row || normalizeIdentifier(row[indices.identifier]) !== wanted) {
      continue;
    }

    return Object.freeze({
      name: cellAt(row, indices.name),
      identifier: cellAt(row, indices.identifier),
      expiry_date: cellAt(row, indices.expiryDate),
      status: cellAt(row, indices.status),
    });
  }

  return null;
}
