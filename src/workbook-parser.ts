import * as XLSX from 'xlsx';
import { SchemaError, UpstreamFetchError, describeError } from './errors';
import { SheetRows, TabularDocument, Workbook } from './types';

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE2_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

/** xlsx files are ZIP archives; legacy .xls files are OLE2 compound documents. */
export function hasSpreadsheetSignature(body: Buffer): boolean {
  return [ZIP_SIGNATURE, OLE2_SIGNATURE].some(
    (signature) =>
      body.length >= signature.length && body.subarray(0, signature.length).equals(signature)
  );
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatDate(date: Date): string {
  // serial → Date conversion can drift a few seconds off midnight
  const rounded = new Date(Math.round(date.getTime() / 60000) * 60000);
  const day = `${rounded.getFullYear()}-${pad(rounded.getMonth() + 1)}-${pad(rounded.getDate())}`;
  if (rounded.getHours() === 0 && rounded.getMinutes() === 0) {
    return day;
  }
  return `${day} ${pad(rounded.getHours())}:${pad(rounded.getMinutes())}`;
}

// Days between the 1900 and 1904 date systems
const DATE1904_OFFSET_DAYS = 1462;

/**
 * Renders an Excel date serial from its calendar parts, so the host time
 * zone never takes part. Seconds are dropped.
 */
export function formatSerialDate(serial: number, date1904: boolean = false): string {
  const parsed = XLSX.SSF.parse_date_code(date1904 ? serial + DATE1904_OFFSET_DAYS : serial);
  const { y, m, d, H, M }: { y: number; m: number; d: number; H: number; M: number } = parsed;
  const day = `${y}-${pad(m)}-${pad(d)}`;
  return H === 0 && M === 0 ? day : `${day} ${pad(H)}:${pad(M)}`;
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : formatDate(value);
  }
  return String(value);
}

interface RawCell {
  value: unknown;
  /** Number format code, e.g. "yyyy-mm-dd" */
  format?: string;
}

function readCell(sheet: XLSX.WorkSheet, r: number, c: number): RawCell | undefined {
  const cell: unknown = sheet[XLSX.utils.encode_cell({ r, c })];
  if (typeof cell !== 'object' || cell === null || !('v' in cell)) {
    return undefined;
  }
  const format = 'z' in cell && typeof cell.z === 'string' ? cell.z : undefined;
  return { value: cell.v, format };
}

function rawCellText(cell: RawCell | undefined, date1904: boolean): string {
  if (!cell) return '';
  if (typeof cell.value === 'number' && cell.format !== undefined && XLSX.SSF.is_date(cell.format)) {
    return formatSerialDate(cell.value, date1904);
  }
  return cellText(cell.value);
}

/**
 * Rows always start at A1, whatever the sheet's used range is, so indices
 * line up with spreadsheet row numbers and column letters.
 */
function sheetToRows(sheet: XLSX.WorkSheet, date1904: boolean): SheetRows {
  const ref = sheet['!ref'];
  if (!ref) return [];

  const range = XLSX.utils.decode_range(ref);
  const rows: SheetRows = [];
  for (let r = 0; r <= range.e.r; r++) {
    const row: string[] = [];
    for (let c = 0; c <= range.e.c; c++) {
      row.push(rawCellText(readCell(sheet, r, c), date1904));
    }
    rows.push(row);
  }
  return rows;
}

export function parseWorkbook(body: Buffer): Workbook {
  let book: XLSX.WorkBook;
  try {
    book = XLSX.read(body, { type: 'buffer', cellNF: true });
  } catch (error) {
    throw new UpstreamFetchError(`Spreadsheet could not be parsed: ${describeError(error)}`);
  }

  const date1904 = book.Workbook?.WBProps?.date1904 ?? false;
  const sheets = new Map<string, SheetRows>();
  for (const name of book.SheetNames) {
    const sheet = Object.hasOwn(book.Sheets, name) ? book.Sheets[name] : undefined;
    sheets.set(name, sheet ? sheetToRows(sheet, date1904) : []);
  }

  return { sheetNames: [...book.SheetNames], sheets };
}

export function selectSheet(
  workbook: Workbook,
  sheetName: string | undefined,
  headerRow: number
): TabularDocument {
  const chosen = sheetName ?? workbook.sheetNames[0];
  const rows = chosen === undefined ? undefined : workbook.sheets.get(chosen);

  if (chosen === undefined || rows === undefined) {
    throw new SchemaError(`Sheet "${sheetName ?? ''}" not found in workbook`, {
      sheets: workbook.sheetNames,
    });
  }

  if (!Number.isInteger(headerRow) || headerRow < 1 || headerRow > rows.length) {
    throw new SchemaError(`Header row ${headerRow} is outside sheet "${chosen}"`, {
      rowCount: rows.length,
    });
  }

  return {
    sheetName: chosen,
    headerRow,
    rows,
    columnCount: rows.reduce((max, row) => Math.max(max, row.length), 0),
  };
}
