import fs from 'fs';
import { Readable, Transform, pipeline } from 'stream';
import csv from 'csv-parser';
import type { RawRow } from '@rollcall/types';
import type { CsvReaderOptions, RawRowReader } from '../types';
import defaultLogger, { Logger } from '../utils/logger';
import { getErrorMessage } from '../utils/errorUtils';

const DELIMITERS = [',', ';', '\t', '|'];
const SNIFF_BYTES = 4096;

/**
 * Pick the delimiter that occurs most often in the header line
 */
export function detectDelimiter(sample: string): string {
  const headerLine = sample.replace(/^\uFEFF/, '').split(/\r?\n/)[0] ?? '';
  const counts = DELIMITERS.map(delimiter => ({
    delimiter,
    count: headerLine.split(delimiter).length - 1
  }));

  const best = counts.reduce((max, current) => (current.count > max.count ? current : max));
  return best.count > 0 ? best.delimiter : ',';
}

export function cleanHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim();
}

function toBuffer(chunk: unknown): Buffer {
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
}

async function readPrefix(stream: Readable, limit: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let size = 0;
  try {
    for await (const chunk of stream) {
      const buffer = toBuffer(chunk);
      chunks.push(buffer);
      size += buffer.length;
      if (size >= limit) break;
    }
  } finally {
    stream.destroy();
  }
  return Buffer.concat(chunks).subarray(0, limit);
}

// Re-encode single-byte input (Windows-1252 exports) as UTF-8 for the parser
function transcoder(encoding: BufferEncoding): Transform {
  return new Transform({
    transform(chunk: unknown, _encoding, callback) {
      callback(null, Buffer.from(toBuffer(chunk).toString(encoding), 'utf8'));
    }
  });
}

/**
 * Streams rows of a delimited text file as header -> value records
 */
export class CsvRowReader implements RawRowReader {
  private readonly openSource: () => Readable;
  private readonly encoding: BufferEncoding;
  private readonly logger: Logger;
  private delimiter: string | undefined;

  constructor(openSource: () => Readable, options: CsvReaderOptions = {}, logger?: Logger) {
    this.openSource = openSource;
    this.encoding = options.encoding ?? 'utf8';
    this.delimiter = options.delimiter;
    this.logger = logger ?? defaultLogger.child('csv-reader');
  }

  static fromFile(filePath: string, options: CsvReaderOptions = {}, logger?: Logger): CsvRowReader {
    return new CsvRowReader(() => fs.createReadStream(filePath), options, logger);
  }

  static fromContent(content: string | Buffer, options: CsvReaderOptions = {}, logger?: Logger): CsvRowReader {
    const buffer = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
    return new CsvRowReader(() => Readable.from([buffer]), options, logger);
  }

  async readHeaders(): Promise<string[]> {
    let parser: Readable | undefined;

    const headers = await new Promise<string[]>((resolve, reject) => {
      this.openParser(resolve)
        .then(opened => {
          parser = opened;
          opened
            .on('end', () => resolve([]))
            .on('error', reject)
            .resume();
        })
        .catch(reject);
    });

    parser?.destroy();
    return headers;
  }

  async *rows(): AsyncGenerator<RawRow> {
    let headers: string[] = [];
    const parser = await this.openParser(parsed => {
      headers = parsed;
    });

    try {
      for await (const chunk of parser) {
        yield this.toRawRow(chunk, headers);
      }
    } finally {
      parser.destroy();
    }
  }

  private async openParser(onHeaders: (headers: string[]) => void): Promise<Readable> {
    const delimiter = await this.resolveDelimiter();
    const parser = csv({
      separator: delimiter,
      strict: false,
      mapHeaders: ({ header }) => cleanHeader(header)
    });
    parser.on('headers', onHeaders);

    const onError = (error: NodeJS.ErrnoException | null): void => {
      if (error && error.code !== 'ERR_STREAM_PREMATURE_CLOSE') {
        this.logger.error('CSV stream failed', { error: getErrorMessage(error) });
      }
    };

    if (this.encoding === 'utf8') {
      return pipeline(this.openSource(), parser, onError);
    }
    return pipeline(this.openSource(), transcoder(this.encoding), parser, onError);
  }

  private async resolveDelimiter(): Promise<string> {
    if (!this.delimiter) {
      const prefix = await readPrefix(this.openSource(), SNIFF_BYTES);
      this.delimiter = detectDelimiter(prefix.toString(this.encoding));
      this.logger.debug('Detected delimiter', { delimiter: this.delimiter });
    }
    return this.delimiter;
  }

  private toRawRow(chunk: unknown, headers: string[]): RawRow {
    const row: RawRow = {};
    if (typeof chunk !== 'object' || chunk === null) {
      return row;
    }

    const values = new Map(Object.entries(chunk));
    for (const header of headers) {
      const value = values.get(header);
      row[header] = value === undefined || value === null ? '' : String(value);
    }
    return row;
  }
}

export default CsvRowReader;
