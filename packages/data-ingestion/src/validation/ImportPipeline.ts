/**
 * Import Pipeline
 * Streams raw rows through mapping, validation, normalization and
 * deduplication into a storage sink, one committed record at a time.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  CanonicalRecord,
  ImportScope,
  ImportSummary,
  RawRow,
  RowError,
  SinkInsertResult,
  StateConfig,
  StorageSink
} from '@rollcall/types';
import { AliasCatalog, aliasCatalog } from '../catalog/AliasCatalog';
import {
  ConfigIncompleteError,
  ConfigMissingError,
  DuplicateVoterIdError,
  RowLevelError,
  SinkError
} from '../errors';
import type { ImportProgress, PipelineOptions } from '../types';
import { getErrorMessage, toError } from '../utils/errorUtils';
import defaultLogger, { Logger } from '../utils/logger';
import { Deduplicator } from './Deduplicator';
import { FieldNormalizer } from './FieldNormalizer';
import { RecordBuilder } from './RecordBuilder';

export const DEFAULT_MAX_SINK_RETRIES = 2;
export const DEFAULT_MAX_ERROR_DETAILS = 100;
export const DEFAULT_PROGRESS_INTERVAL = 1000;

export interface ImportPipelineDependencies {
  catalog?: AliasCatalog;
  normalizer?: FieldNormalizer;
  deduplicator?: Deduplicator;
  clock?: () => Date;
  logger?: Logger;
}

export type RowSource = Iterable<RawRow> | AsyncIterable<RawRow>;

export class ImportPipeline {
  private readonly catalog: AliasCatalog;
  private readonly normalizer: FieldNormalizer;
  private readonly deduplicator: Deduplicator;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(dependencies: ImportPipelineDependencies = {}) {
    this.catalog = dependencies.catalog ?? aliasCatalog;
    this.normalizer = dependencies.normalizer ?? new FieldNormalizer(this.catalog);
    this.deduplicator = dependencies.deduplicator ?? new Deduplicator();
    this.clock = dependencies.clock ?? (() => new Date());
    this.logger = dependencies.logger ?? defaultLogger.child('import-pipeline');
  }

  /**
   * Run one import. Row-level problems are counted in the summary; only
   * configuration and sink failures are thrown.
   */
  async run(
    stateCode: string,
    rows: RowSource,
    config: StateConfig | null | undefined,
    sink: StorageSink,
    scope: ImportScope,
    options: PipelineOptions = {}
  ): Promise<ImportSummary> {
    const state = stateCode.toUpperCase();
    this.assertUsableConfig(state, config);

    const logger = options.logger ?? this.logger;
    const maxSinkRetries = options.maxSinkRetries ?? DEFAULT_MAX_SINK_RETRIES;
    const maxErrorDetails = options.maxErrorDetails ?? DEFAULT_MAX_ERROR_DETAILS;
    const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    const builder = new RecordBuilder(config, {
      catalog: this.catalog,
      normalizer: this.normalizer,
      sourceRef: options.sourceRef
    });

    const summary: ImportSummary = {
      run_id: options.runId ?? uuidv4(),
      state_code: state,
      scope,
      rows_seen: 0,
      inserted: 0,
      duplicates: 0,
      validation_errors: 0,
      normalization_errors: 0,
      errors: [],
      cancelled: false,
      started_at: this.clock().toISOString()
    };

    logger.info('Starting import', {
      runId: summary.run_id,
      state,
      table: scope.table,
      configVersion: config.version
    });

    try {
      await this.seedIndex(scope, sink, summary);

      let rowNumber = 0;
      for await (const row of rows) {
        if (options.signal?.aborted) {
          summary.cancelled = true;
          logger.warn('Import cancelled', { runId: summary.run_id, rowsSeen: summary.rows_seen });
          break;
        }

        rowNumber++;
        summary.rows_seen++;
        await this.processRow(row, rowNumber, builder, sink, scope, summary, {
          maxSinkRetries,
          maxErrorDetails,
          logger
        });

        if (options.onProgress && summary.rows_seen % progressInterval === 0) {
          options.onProgress(this.progressOf(summary));
        }
      }
    } catch (error) {
      summary.finished_at = this.clock().toISOString();
      if (error instanceof SinkError) {
        error.summary = summary;
        logger.error('Import aborted by sink failure', {
          runId: summary.run_id,
          error: error.message,
          inserted: summary.inserted
        });
      }
      throw error;
    } finally {
      this.deduplicator.release(scope);
    }

    summary.finished_at = this.clock().toISOString();
    options.onProgress?.(this.progressOf(summary));

    logger.info('Import finished', {
      runId: summary.run_id,
      ...this.progressOf(summary),
      cancelled: summary.cancelled
    });

    return summary;
  }

  private assertUsableConfig(
    state: string,
    config: StateConfig | null | undefined
  ): asserts config is StateConfig {
    if (!config) {
      throw new ConfigMissingError(state);
    }
    if (config.state_code.toUpperCase() !== state) {
      throw new ConfigMissingError(
        state,
        `Configuration for state ${config.state_code} cannot be used to import state ${state}`
      );
    }

    const mapped = new Set(config.field_mappings.map(mapping => mapping.canonical_field));
    const missing = this.catalog.missingRequired(mapped);
    if (missing.length > 0) {
      throw new ConfigIncompleteError(state, missing);
    }
  }

  private async seedIndex(scope: ImportScope, sink: StorageSink, summary: ImportSummary): Promise<void> {
    try {
      if (await sink.exists(scope)) {
        this.deduplicator.seed(scope, await sink.existingVoterIds(scope));
      }
    } catch (error) {
      throw new SinkError(`Failed to read existing voter ids: ${getErrorMessage(error)}`, false, { cause: error });
    }

    this.logger.debug('Seeded voter id index', {
      runId: summary.run_id,
      table: scope.table,
      existing: this.deduplicator.size(scope)
    });
  }

  private async processRow(
    row: RawRow,
    rowNumber: number,
    builder: RecordBuilder,
    sink: StorageSink,
    scope: ImportScope,
    summary: ImportSummary,
    settings: { maxSinkRetries: number; maxErrorDetails: number; logger: Logger }
  ): Promise<void> {
    let record: CanonicalRecord;
    try {
      record = builder.build(row, rowNumber);
    } catch (error) {
      if (error instanceof RowLevelError) {
        this.recordError(summary, error.toRowError(), settings.maxErrorDetails);
        settings.logger.debug('Row rejected', { rowNumber, reason: error.message });
        return;
      }
      throw error;
    }

    if (this.deduplicator.checkAndRecord(scope, record.voter_id) === 'duplicate') {
      this.recordError(summary, new DuplicateVoterIdError(rowNumber, record.voter_id).toRowError(), settings.maxErrorDetails);
      return;
    }

    const result = await this.insertWithRetry(sink, scope, record, settings.maxSinkRetries, settings.logger);
    switch (result.status) {
      case 'inserted':
        summary.inserted++;
        return;
      case 'duplicate':
        // Another writer committed this id after the index was seeded
        this.recordError(summary, new DuplicateVoterIdError(rowNumber, record.voter_id).toRowError(), settings.maxErrorDetails);
        return;
      case 'error':
        throw new SinkError(
          `Failed to insert row ${rowNumber}: ${result.error.message}`,
          result.transient,
          { cause: result.error }
        );
    }
  }

  private async insertWithRetry(
    sink: StorageSink,
    scope: ImportScope,
    record: CanonicalRecord,
    maxRetries: number,
    logger: Logger
  ): Promise<SinkInsertResult> {
    let attempt = 0;
    for (;;) {
      let result: SinkInsertResult;
      try {
        result = await sink.insert(scope, record);
      } catch (error) {
        result = { status: 'error', error: toError(error), transient: false };
      }

      if (result.status !== 'error' || !result.transient || attempt >= maxRetries) {
        return result;
      }

      attempt++;
      logger.warn('Retrying transient sink failure', {
        voterId: record.voter_id,
        attempt,
        error: result.error.message
      });
    }
  }

  private recordError(summary: ImportSummary, rowError: RowError, maxErrorDetails: number): void {
    switch (rowError.error_type) {
      case 'validation_error':
        summary.validation_errors++;
        break;
      case 'normalization_error':
        summary.normalization_errors++;
        break;
      case 'duplicate_voter_id':
        summary.duplicates++;
        break;
    }

    if (summary.errors.length < maxErrorDetails) {
      summary.errors.push(rowError);
    }
  }

  private progressOf(summary: ImportSummary): ImportProgress {
    return {
      rows_seen: summary.rows_seen,
      inserted: summary.inserted,
      duplicates: summary.duplicates,
      validation_errors: summary.validation_errors,
      normalization_errors: summary.normalization_errors
    };
  }
}

export default ImportPipeline;
