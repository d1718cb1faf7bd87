/**
 * BatchProcessor
 *
 * Runs a batch of raw records through the record pipeline with bounded
 * concurrency and assembles the batch report in input order.
 */

import { randomUUID } from 'node:crypto';
import type { Logger, RawRecord, ReferenceLoadError } from '@relecov-mapper/core';
import { isTargetSchema, silentLogger } from '@relecov-mapper/core';
import type { BatchReport, BatchSummary, RecordOutcome } from '../types/index.js';
import type { ProcessRecordOptions, RecordPipeline } from './record-pipeline.js';
import { Semaphore } from './semaphore.js';

export const DEFAULT_CONCURRENCY = 4;

export interface BatchOptions extends ProcessRecordOptions {
  /** Records processed at once (default 4) */
  concurrency?: number;
  /** Reference datasets that failed to load, carried into the report */
  referenceErrors?: readonly ReferenceLoadError[];
  onProgress?: (completed: number, total: number) => void;
}

export function summarizeOutcomes(outcomes: readonly RecordOutcome[], processingTimeMs: number): BatchSummary {
  const summary: BatchSummary = {
    total: outcomes.length,
    succeeded: 0,
    failed: 0,
    issuesByKind: {},
    emittedByTarget: {},
    processingTimeMs,
  };

  for (const outcome of outcomes) {
    if (outcome.status === 'ok') summary.succeeded++;
    else summary.failed++;

    for (const issue of outcome.issues) {
      summary.issuesByKind[issue.kind] = (summary.issuesByKind[issue.kind] ?? 0) + 1;
    }
    for (const target of Object.keys(outcome.emitted)) {
      if (isTargetSchema(target)) {
        summary.emittedByTarget[target] = (summary.emittedByTarget[target] ?? 0) + 1;
      }
    }
  }

  return summary;
}

export class BatchProcessor {
  private readonly logger: Logger;

  constructor(
    private readonly pipeline: RecordPipeline,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  async processBatch(raws: readonly RawRecord[], options: BatchOptions): Promise<BatchReport> {
    const startTime = Date.now();
    const semaphore = new Semaphore(options.concurrency ?? DEFAULT_CONCURRENCY);
    const outcomes = new Array<RecordOutcome>(raws.length);
    let completed = 0;

    this.logger.info('Processing batch', {
      records: raws.length,
      targets: options.targets,
      concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    });

    await Promise.all(
      raws.map((raw, index) =>
        semaphore.run(async () => {
          // Yield so queued records interleave with the rest of the event loop
          await Promise.resolve();
          outcomes[index] = this.pipeline.process(raw, index, options);
          completed++;
          options.onProgress?.(completed, raws.length);
        })
      )
    );

    const summary = summarizeOutcomes(outcomes, Date.now() - startTime);
    this.logger.info('Batch processed', {
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
    });

    return {
      id: randomUUID(),
      timestamp: new Date(),
      targets: [...options.targets],
      summary,
      outcomes,
      referenceErrors: (options.referenceErrors ?? []).map((error) => ({
        dataset: error.dataset,
        code: error.code,
        message: error.message,
      })),
    };
  }
}
