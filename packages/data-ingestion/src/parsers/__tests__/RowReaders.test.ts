/**
 * Row Reader Tests
 * Delimited text and workbook extracts read into raw rows
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import * as XLSX from 'xlsx';
import type { RawRow } from '@rollcall/types';
import { CsvRowReader, detectDelimiter } from '../CsvRowReader';
import { ExcelRowReader } from '../ExcelRowReader';
import { createRowReader, limitRows, sampleRows } from '../RowReader';
import { FileDetectionService } from '../../utils/fileDetection';
import { FileFormat } from '../../types';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ level: 'silent' });

async function collect(rows: AsyncIterable<RawRow>): Promise<RawRow[]> {
  const result: RawRow[] = [];
  for await (const row of rows) {
    result.push(row);
  }
  return result;
}

describe('detectDelimiter', () => {
  it('picks the most frequent delimiter in the header line', () => {
    expect(detectDelimiter('VID;First;Last\n1;Ana;Diaz')).toBe(';');
    expect(detectDelimiter('VID\tFirst\tLast\n1\tAna, Jr\tDiaz')).toBe('\t');
    expect(detectDelimiter('VID|First|Last\n1,2,3,4,5')).toBe('|');
  });

  it('falls back to a comma', () => {
    expect(detectDelimiter('VID\n1')).toBe(',');
  });
});

describe('CsvRowReader', () => {
  it('reads semicolon-separated rows and fills short rows', async () => {
    const reader = CsvRowReader.fromContent('VID;First;Addr1\n1;Ana;12 Main St\n2;Bo\n', {}, logger);

    expect(await reader.readHeaders()).toEqual(['VID', 'First', 'Addr1']);
    expect(await collect(reader.rows())).toEqual([
      { VID: '1', First: 'Ana', Addr1: '12 Main St' },
      { VID: '2', First: 'Bo', Addr1: '' }
    ]);
  });

  it('strips a byte order mark and trims headers', async () => {
    const reader = CsvRowReader.fromContent('\uFEFF VID , First \r\n1,Ana\r\n', {}, logger);

    expect(await reader.readHeaders()).toEqual(['VID', 'First']);
    expect(await collect(reader.rows())).toEqual([{ VID: '1', First: 'Ana' }]);
  });

  it('decodes single-byte encodings', async () => {
    const content = Buffer.from('VID,City\n1,Montréal\n', 'latin1');
    const reader = CsvRowReader.fromContent(content, { encoding: 'latin1' }, logger);

    expect(await collect(reader.rows())).toEqual([{ VID: '1', City: 'Montréal' }]);
  });

  it('uses an explicit delimiter', async () => {
    const reader = CsvRowReader.fromContent('VID|Name\n1|Diaz, Ana\n', { delimiter: '|' }, logger);
    expect(await collect(reader.rows())).toEqual([{ VID: '1', Name: 'Diaz, Ana' }]);
  });

  it('returns no headers and no rows for an empty file', async () => {
    const reader = CsvRowReader.fromContent('', {}, logger);

    expect(await reader.readHeaders()).toEqual([]);
    expect(await collect(reader.rows())).toEqual([]);
  });

  it('returns headers and no rows for a header-only file', async () => {
    const reader = CsvRowReader.fromContent('VID,First,Addr1\n', {}, logger);

    expect(await reader.readHeaders()).toEqual(['VID', 'First', 'Addr1']);
    expect(await collect(reader.rows())).toEqual([]);
  });
});

describe('ExcelRowReader', () => {
  function workbook(): Buffer {
    const book = XLSX.utils.book_new();
    const sheet = XLSX.utils.aoa_to_sheet([
      [' VID ', 'First', 'Zip'],
      ['1', 'Ana', 98501],
      ['2', '', '']
    ]);
    XLSX.utils.book_append_sheet(book, sheet, 'Voters');
    return XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
  }

  it('reads cells as text with blanks as empty strings', async () => {
    const reader = ExcelRowReader.fromBuffer(workbook());

    expect(await reader.readHeaders()).toEqual(['VID', 'First', 'Zip']);
    expect(await collect(reader.rows())).toEqual([
      { VID: '1', First: 'Ana', Zip: '98501' },
      { VID: '2', First: '', Zip: '' }
    ]);
  });

  it('rejects a missing worksheet', async () => {
    const reader = ExcelRowReader.fromBuffer(workbook(), { sheetName: 'Other' });
    await expect(reader.readHeaders()).rejects.toThrow('Worksheet not found: Other');
  });
});

describe('sampling helpers', () => {
  const content = 'VID,First\n1,Ana\n2,Bo\n3,Cy\n';

  it('samples headers and the first rows', async () => {
    const sample = await sampleRows(CsvRowReader.fromContent(content, {}, logger), 2);

    expect(sample).toEqual({
      headers: ['VID', 'First'],
      rows: [
        { VID: '1', First: 'Ana' },
        { VID: '2', First: 'Bo' }
      ]
    });
  });

  it('limits a row stream', async () => {
    const rows = await collect(limitRows(CsvRowReader.fromContent(content, {}, logger).rows(), 2));
    expect(rows.map(row => row.VID)).toEqual(['1', '2']);
  });
});

describe('file type detection', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'voter-readers-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it.each([
    ['wa_voters.csv', FileFormat.CSV],
    ['WA_VOTERS.TXT', FileFormat.CSV],
    ['or_voters.tsv', FileFormat.CSV],
    ['voters.xlsx', FileFormat.XLSX],
    ['voters.xls', FileFormat.XLS],
    ['voters.pdf', FileFormat.UNKNOWN]
  ])('detects %s as %s', (filename, format) => {
    expect(FileDetectionService.detectFileFormat(filename)).toBe(format);
  });

  it('rejects unsupported files', () => {
    expect(() => createRowReader(path.join(dir, 'voters.pdf'))).toThrow('Unsupported file format: .pdf');
  });

  it('reads a delimited file from disk', async () => {
    const filePath = path.join(dir, 'wa.txt');
    fs.writeFileSync(filePath, 'VID\tFirst\n1\tAna\n');

    const reader = createRowReader(filePath, { logger });

    expect(reader).toBeInstanceOf(CsvRowReader);
    expect(await collect(reader.rows())).toEqual([{ VID: '1', First: 'Ana' }]);
  });
});
