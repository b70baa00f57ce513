import { SchemaError } from './errors';
import { normalizeHeader } from './normalize';
import { ColumnMap, ColumnSource, LogicalField } from './types';

export interface FieldDefinition {
  field: LogicalField;
  header: string;
  /** Excel column letter used when no header matches */
  fallbackColumn: string;
}

export const DRIVER_FIELDS: readonly FieldDefinition[] = [
  { field: 'name', header: 'NOMBRES Y APELLIDOS', fallbackColumn: 'D' },
  { field: 'identifier', header: 'DNI / CE', fallbackColumn: 'E' },
  {
    field: 'expiryDate',
    header: 'FECHA DE VIGENCIA DE HABILITACIÓN DE LICENCIA INTERNA',
    fallbackColumn: 'AF',
  },
  { field: 'status', header: 'ESTATUS DE PROCESO DE HABILITACION', fallbackColumn: 'AG' },
];

/** Converts an Excel column letter (A, B, ..., AA) to a 0-based index. */
export function columnLetterToIndex(letter: string): number {
  const upperLetter = letter.toUpperCase();
  if (!/^[A-Z]+$/.test(upperLetter)) {
    throw new RangeError(`Invalid column letter: ${letter}`);
  }
  let index = 0;
  for (let i = 0; i < upperLetter.length; i++) {
    index = index * 26 + (upperLetter.charCodeAt(i) - 'A'.charCodeAt(0) + 1);
  }
  return index - 1;
}

export function columnIndexToLetter(index: number): string {
  let letter = '';
  let num = index + 1;

  while (num > 0) {
    num--;
    letter = String.fromCharCode((num % 26) + 65) + letter;
    num = Math.floor(num / 26);
  }

  return letter;
}

/**
 * Maps each logical field to a column of the header row.
 *
 * 1. Exact match of the normalized header text (first column wins)
 * 2. The field's fixed fallback column, if the document is that wide and no
 *    other field claimed that column by header
 * 3. Otherwise SchemaError naming the unresolved fields and every header seen
 */
export function resolveColumns(
  headerRow: readonly unknown[],
  columnCount: number,
  fields: readonly FieldDefinition[] = DRIVER_FIELDS
): ColumnMap {
  const normalizedHeaders = headerRow.map((cell) => normalizeHeader(cell));
  const indices: Partial<Record<LogicalField, number>> = {};
  const sources: Partial<Record<LogicalField, ColumnSource>> = {};
  const claimed = new Set<number>();

  for (const definition of fields) {
    const matched = normalizedHeaders.indexOf(normalizeHeader(definition.header));
    if (matched !== -1) {
      indices[definition.field] = matched;
      sources[definition.field] = 'header';
      claimed.add(matched);
    }
  }

  const missing: string[] = [];
  for (const definition of fields) {
    if (sources[definition.field] !== undefined) continue;

    const fallback = columnLetterToIndex(definition.fallbackColumn);
    if (fallback < columnCount && !claimed.has(fallback)) {
      indices[definition.field] = fallback;
      sources[definition.field] = 'fallback';
      continue;
    }

    missing.push(definition.header);
  }

  if (missing.length > 0) {
    throw new SchemaError('Required columns not found by header or fallback position', {
      missing,
      headers: headerRow.map((cell) => (cell === null || cell === undefined ? '' : String(cell))),
    });
  }

  return {
    indices: completeRecord(indices),
    sources: completeRecord(sources),
  };
}

function completeRecord<T>(partial: Partial<Record<LogicalField, T>>): Record<LogicalField, T> {
  const { name, identifier, expiryDate, status } = partial;
  if (name === undefined || identifier === undefined || expiryDate === undefined || status === undefined) {
    throw new SchemaError('Field definitions do not cover every driver field');
  }
  return { name, identifier, expiryDate, status };
}
