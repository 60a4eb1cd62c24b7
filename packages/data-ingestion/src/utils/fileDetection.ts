import path from 'path';
import mimeTypes from 'mime-types';
import { FileFormat } from '../types';
import { createError } from './errorUtils';

// File type detection for voter extracts
export class FileDetectionService {
  /**
   * Detect file format from MIME type, falling back to the extension
   */
  static detectFileFormat(filename: string, mimetype?: string): FileFormat {
    const type = mimetype ?? this.getExpectedMimeType(filename);

    switch (type) {
      case 'text/csv':
      case 'application/csv':
      case 'text/tab-separated-values':
        return FileFormat.CSV;
      case 'application/vnd.ms-excel':
        return FileFormat.XLS;
      case 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet':
        return FileFormat.XLSX;
    }

    // State exports often ship delimited text as .txt
    switch (path.extname(filename).toLowerCase()) {
      case '.csv':
      case '.tsv':
      case '.txt':
      case '.psv':
        return FileFormat.CSV;
      case '.xls':
        return FileFormat.XLS;
      case '.xlsx':
        return FileFormat.XLSX;
      default:
        return FileFormat.UNKNOWN;
    }
  }

  static requireSupportedFormat(filename: string): Exclude<FileFormat, 'unknown'> {
    const format = this.detectFileFormat(filename);
    if (format === FileFormat.UNKNOWN) {
      throw createError(`Unsupported file format: ${path.extname(filename) || path.basename(filename)}`);
    }
    return format;
  }

  static getExpectedMimeType(filename: string): string | null {
    return mimeTypes.lookup(filename) || null;
  }
}
