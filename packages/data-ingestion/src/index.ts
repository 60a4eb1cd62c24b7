// Main exports for the data-ingestion package

// Types
export * from './types';

// Alias catalog
export {
  AliasCatalog,
  aliasCatalog,
  normalizeHeader,
  STATE_ABBREVIATIONS,
  STATE_NAMES
} from './catalog/AliasCatalog';
export type { CatalogEntry, RequiredFieldGroup, AliasMatch, ValueSignature } from './catalog/AliasCatalog';

// Schema detection and onboarding
export {
  SchemaDetector,
  DEFAULT_SAMPLE_SIZE,
  MIN_CONFIDENCE,
  CONFIDENCE,
  SPLIT_ADDRESS_FIELDS
} from './mapping/SchemaDetector';
export { ConfigBuilder } from './mapping/ConfigBuilder';
export type { ConfigBuilderOptions, BuildResult } from './mapping/ConfigBuilder';

// Normalization, deduplication and import
export * from './validation';

// Config persistence
export { FileConfigStore } from './config/FileConfigStore';
export { StateConfigSchema, FieldMappingSchema, parseStateConfig } from './config/stateConfigSchema';

// Row readers
export { CsvRowReader, detectDelimiter } from './parsers/CsvRowReader';
export { ExcelRowReader } from './parsers/ExcelRowReader';
export { createRowReader, sampleRows, limitRows } from './parsers/RowReader';
export type { RowReaderOptions } from './parsers/RowReader';
export { FileDetectionService } from './utils/fileDetection';

// Errors and logging
export * from './errors';
export { isError, getErrorMessage, createError, toError } from './utils/errorUtils';
export { Logger, createLogger, parseLogLevel } from './utils/logger';
export { default as logger } from './utils/logger';
export type { LogLevel, LogMetadata, LoggerConfig } from './utils/logger';
