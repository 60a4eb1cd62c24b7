import type { RawRow } from '@rollcall/types';
import { FileFormat } from '../types';
import type { CsvReaderOptions, ExcelReaderOptions, RawRowReader, RowSample } from '../types';
import { FileDetectionService } from '../utils/fileDetection';
import type { Logger } from '../utils/logger';
import { CsvRowReader } from './CsvRowReader';
import { ExcelRowReader } from './ExcelRowReader';

export type RowReaderOptions = CsvReaderOptions & ExcelReaderOptions & { logger?: Logger };

/**
 * Choose a reader for a voter extract by its file type
 */
export function createRowReader(filePath: string, options: RowReaderOptions = {}): RawRowReader {
  const format = FileDetectionService.requireSupportedFormat(filePath);

  switch (format) {
    case FileFormat.CSV:
      return CsvRowReader.fromFile(
        filePath,
        { encoding: options.encoding, delimiter: options.delimiter },
        options.logger
      );
    case FileFormat.XLS:
    case FileFormat.XLSX:
      return ExcelRowReader.fromFile(filePath, { sheetName: options.sheetName });
  }
}

/**
 * Headers plus the first `size` data rows, for schema detection
 */
export async function sampleRows(reader: RawRowReader, size: number): Promise<RowSample> {
  const headers = await reader.readHeaders();
  const rows: RawRow[] = [];

  if (size > 0) {
    for await (const row of reader.rows()) {
      rows.push(row);
      if (rows.length >= size) break;
    }
  }

  return { headers, rows };
}

/**
 * Stop after the first `limit` rows
 */
export async function* limitRows(rows: AsyncIterable<RawRow>, limit: number): AsyncGenerator<RawRow> {
  if (limit <= 0) return;

  let count = 0;
  for await (const row of rows) {
    yield row;
    count++;
    if (count >= limit) return;
  }
}
