/**
 * Record Pipeline
 *
 * Runs one raw lab record through every stage: field mapping, fixed fields,
 * derivation rules, enrichment joins, bioinformatics results, then
 * per-target validation. A failure affects only this record.
 */

import type {
  FieldRenameTable,
  Logger,
  MappingConfiguration,
  PipelineOutputs,
  RawRecord,
  ReferenceTable,
  SampleRecord,
  TargetSchema,
} from '@relecov-mapper/core';
import {
  MissingRequiredFileError,
  fieldValueToString,
  getField,
  pickFields,
  silentLogger,
  wrapError,
} from '@relecov-mapper/core';
import { FieldMapper, resolveRenameTable } from '../mapping/field-mapper.js';
import { RuleEngine } from '../rules/rule-engine.js';
import { EnrichmentJoiner } from '../enrichment/enrichment-joiner.js';
import { BioinfoResultMapper } from '../bioinfo/bioinfo-mapper.js';
import { SchemaEmitter } from '../emit/schema-emitter.js';
import type { SchemaValidator } from '../validation/schema-validator.js';
import type { ProcessingIssue, RecordOutcome } from '../types/index.js';

export interface RecordPipelineOptions {
  configuration: MappingConfiguration;
  validator: SchemaValidator;
  /** Loaded reference tables by dataset id */
  referenceTables: ReadonlyMap<string, ReferenceTable>;
  /** Submitting institution, selects extra header variants */
  institution?: string;
  logger?: Logger;
}

export interface ProcessRecordOptions {
  targets: readonly TargetSchema[];
  /** Parsed pipeline outputs; omit for lab metadata only */
  pipelineOutputs?: PipelineOutputs;
}

export class RecordPipeline {
  private readonly configuration: MappingConfiguration;
  private readonly referenceTables: ReadonlyMap<string, ReferenceTable>;
  private readonly renameTable: FieldRenameTable;
  private readonly fieldUnion: ReadonlySet<string>;
  private readonly logger: Logger;

  private readonly fieldMapper = new FieldMapper();
  private readonly ruleEngine = new RuleEngine();
  private readonly joiner = new EnrichmentJoiner();
  private readonly bioinfoMapper: BioinfoResultMapper;
  private readonly emitter: SchemaEmitter;

  constructor(options: RecordPipelineOptions) {
    this.configuration = options.configuration;
    this.referenceTables = options.referenceTables;
    this.renameTable = resolveRenameTable(options.configuration, options.institution);
    // GISAID columns are named after the upload sheet; the canonical fields they read count too
    this.fieldUnion = new Set([
      ...options.validator.fieldUnion(),
      ...Object.values(options.configuration.gisaid.fieldMap),
    ]);
    this.logger = options.logger ?? silentLogger;
    this.bioinfoMapper = new BioinfoResultMapper(options.configuration.bioinfo, this.logger);
    this.emitter = new SchemaEmitter(options.configuration, options.validator);
  }

  /**
   * Map, enrich and validate one record. Never throws: errors become
   * issues on the outcome.
   */
  process(raw: Readonly<RawRecord>, index: number, options: ProcessRecordOptions): RecordOutcome {
    const issues: ProcessingIssue[] = [];
    let record: SampleRecord = {};
    let sampleId: string | undefined;
    let log = this.logger.child({ record: index });

    try {
      const mapped = this.fieldMapper.mapFields(raw, this.renameTable);
      issues.push(...mapped.misses, ...mapped.unrecognized);

      sampleId = this.sampleIdOf(mapped.record);
      if (sampleId !== undefined) log = log.child({ sampleId });

      const lab = this.configuration.labMetadata;
      record = this.fieldMapper.applyFixedFields(mapped.record, lab.fixedFields);

      const traced = this.ruleEngine.trace(record, lab.rules);
      record = traced.record;
      if (traced.fired.length > 0) {
        log.debug('Derivation rules applied', { fired: traced.fired.length });
      }

      const enriched = this.joiner.enrichAll(record, lab.enrichments, this.referenceTables);
      record = enriched.record;
      issues.push(...enriched.misses, ...enriched.unavailable);
      for (const miss of enriched.misses) {
        log.warn('Enrichment join missed', { spec: miss.spec, reason: miss.reason, key: miss.key });
      }

      if (options.pipelineOutputs) {
        const merged = this.bioinfoMapper.map(record, options.pipelineOutputs);
        record = merged.record;
        issues.push(...merged.issues);
      }

      record = this.restrictToTargets(record, log);
    } catch (error) {
      const wrapped = wrapError(error);
      log.error('Record processing failed', { error: wrapped });
      issues.push(
        wrapped instanceof MissingRequiredFileError
          ? {
              kind: 'missing-required-file',
              severity: 'error',
              file: wrapped.file,
              message: wrapped.message,
            }
          : {
              kind: 'processing-error',
              severity: 'error',
              code: wrapped.code,
              message: wrapped.message,
            }
      );
      return this.outcome(index, sampleId, record, issues, {});
    }

    const emitted: RecordOutcome['emitted'] = {};
    for (const target of options.targets) {
      const result = this.emitter.validateAndEmit(record, target);
      if (result.ok) {
        emitted[target] = result.value;
        continue;
      }
      log.warn('Record rejected by target schema', {
        target,
        fields: result.error.violations.map((v) => v.field),
      });
      issues.push({
        kind: 'schema-validation',
        severity: 'error',
        target,
        violations: result.error.violations,
      });
    }

    return this.outcome(index, sampleId, record, issues, emitted);
  }

  private sampleIdOf(record: Readonly<SampleRecord>): string | undefined {
    const value = getField(record, this.configuration.bioinfo.sampleIdField);
    return value === undefined || value === '' ? undefined : fieldValueToString(value);
  }

  /** Drop fields no target schema knows */
  private restrictToTargets(record: Readonly<SampleRecord>, log: Logger): SampleRecord {
    const dropped = Object.keys(record).filter((field) => !this.fieldUnion.has(field));
    if (dropped.length > 0) {
      log.debug('Dropping fields outside every target schema', { fields: dropped });
    }
    return pickFields(record, Object.keys(record).filter((field) => this.fieldUnion.has(field)));
  }

  private outcome(
    index: number,
    sampleId: string | undefined,
    record: SampleRecord,
    issues: ProcessingIssue[],
    emitted: RecordOutcome['emitted']
  ): RecordOutcome {
    return {
      index,
      ...(sampleId !== undefined ? { sampleId } : {}),
      status: issues.some((issue) => issue.severity === 'error') ? 'failed' : 'ok',
      record,
      issues,
      emitted,
    };
  }
}
