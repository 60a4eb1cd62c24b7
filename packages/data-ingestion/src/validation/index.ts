// Normalization, deduplication and the import run

export { FieldNormalizer, fieldNormalizer, EMPTY_VALUE, collapseWhitespace } from './FieldNormalizer';
export { Deduplicator } from './Deduplicator';
export { RecordBuilder } from './RecordBuilder';
export {
  ImportPipeline,
  DEFAULT_MAX_SINK_RETRIES,
  DEFAULT_MAX_ERROR_DETAILS,
  DEFAULT_PROGRESS_INTERVAL
} from './ImportPipeline';

export type { NormalizeResult, AddressLineParts } from './FieldNormalizer';
export type { DedupOutcome } from './Deduplicator';
export type { RecordBuilderOptions } from './RecordBuilder';
export type { ImportPipelineDependencies, RowSource } from './ImportPipeline';
