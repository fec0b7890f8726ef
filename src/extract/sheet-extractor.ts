/**
 * Spreadsheet text extraction (XLSX, XLS and exported Google Sheets)
 */

import * as XLSX from 'xlsx';
import { ExtractionError, toError } from '../errors/index.js';

type Row = string[];

function escapeCell(value: unknown): string {
  return String(value).replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

function toRows(sheet: XLSX.WorkSheet): Row[] {
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: false,
    defval: '',
    blankrows: false,
  });
  return rows.map(row => row.map(escapeCell));
}

/**
 * Render one sheet: a heading, its shape, then the header and every data row
 */
export function renderSheet(name: string, rows: readonly Row[]): string {
  const [header = [], ...data] = rows;
  const lines = [
    `## SHEET: ${name} ##`,
    `Rows: ${data.length}`,
    `Columns: ${header.length} (${header.join(', ')})`,
  ];
  for (const row of rows) {
    lines.push(row.join(' | '));
  }
  return lines.join('\n');
}

/**
 * Extract every sheet of a workbook, in tab order
 */
export async function extractTextFromSpreadsheet(data: Buffer): Promise<string> {
  if (!isSpreadsheetBuffer(data)) {
    throw new ExtractionError('Not a spreadsheet workbook');
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer', cellFormula: false, cellHTML: false });
  } catch (error) {
    throw new ExtractionError(`Spreadsheet text extraction failed: ${toError(error).message}`);
  }

  const sheets: string[] = [];
  for (const name of workbook.SheetNames) {
    const sheet = workbook.Sheets[name];
    if (sheet) {
      sheets.push(renderSheet(name, toRows(sheet)));
    }
  }

  if (sheets.length === 0) {
    throw new ExtractionError('Spreadsheet has no sheets');
  }
  return sheets.join('\n\n');
}

/**
 * XLSX is a ZIP archive and XLS an OLE2 compound file
 */
export function isSpreadsheetBuffer(buffer: Uint8Array): boolean {
  if (buffer.length < 4) return false;
  const isZip = buffer[0] === 0x50 && buffer[1] === 0x4b && buffer[2] === 0x03 && buffer[3] === 0x04;
  const isOle = buffer[0] === 0xd0 && buffer[1] === 0xcf && buffer[2] === 0x11 && buffer[3] === 0xe0;
  return isZip || isOle;
}
