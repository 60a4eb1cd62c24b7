import * as XLSX from 'xlsx';
import { z } from 'zod';
import type { RawRow } from '@rollcall/types';
import type { ExcelReaderOptions, RawRowReader } from '../types';
import { createError } from '../utils/errorUtils';

const ExcelReaderOptionsSchema = z.object({
  sheetName: z.string().min(1).optional()
});

function cellText(cell: unknown): string {
  return cell === undefined || cell === null ? '' : String(cell);
}

/**
 * Reads the first (or a named) worksheet of a workbook. Cells come back as
 * their formatted text, blank cells as empty strings.
 */
export class ExcelRowReader implements RawRowReader {
  private readonly loadWorkbook: () => XLSX.WorkBook;
  private readonly options: ExcelReaderOptions;
  private table: string[][] | undefined;

  constructor(loadWorkbook: () => XLSX.WorkBook, options: ExcelReaderOptions = {}) {
    this.loadWorkbook = loadWorkbook;
    this.options = ExcelReaderOptionsSchema.parse(options);
  }

  static fromFile(filePath: string, options: ExcelReaderOptions = {}): ExcelRowReader {
    return new ExcelRowReader(() => XLSX.readFile(filePath, { cellDates: false }), options);
  }

  static fromBuffer(buffer: Buffer, options: ExcelReaderOptions = {}): ExcelRowReader {
    return new ExcelRowReader(() => XLSX.read(buffer, { type: 'buffer', cellDates: false }), options);
  }

  async readHeaders(): Promise<string[]> {
    const [headerRow] = this.readTable();
    return headerRow ? headerRow.map(header => header.trim()) : [];
  }

  async *rows(): AsyncGenerator<RawRow> {
    const [headerRow, ...dataRows] = this.readTable();
    if (!headerRow) return;

    const headers = headerRow.map(header => header.trim());
    for (const cells of dataRows) {
      const row: RawRow = {};
      headers.forEach((header, index) => {
        row[header] = cells[index] ?? '';
      });
      yield row;
    }
  }

  private readTable(): string[][] {
    if (!this.table) {
      const workbook = this.loadWorkbook();
      const sheetName = this.options.sheetName ?? workbook.SheetNames[0];
      const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
      if (!sheet) {
        throw createError(`Worksheet not found: ${sheetName ?? '(workbook has no sheets)'}`);
      }

      const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: false,
        defval: '',
        blankrows: false
      });
      this.table = rows.map(row => row.map(cellText));
    }
    return this.table;
  }
}

export default ExcelRowReader;
