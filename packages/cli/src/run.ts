/**
 * Command implementations: map a lab batch to submission files, and check
 * the mapping configuration.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type {
  Logger,
  MappingConfiguration,
  PipelineOutputs,
  RawRecord,
  ReferenceLoadError,
  ReferenceTable,
  TargetSchema,
} from '@relecov-mapper/core';
import { MappingError, TARGET_SCHEMAS, silentLogger } from '@relecov-mapper/core';
import {
  ReferenceTableLoader,
  collectPipelineOutputs,
  createJsonRecordsReader,
  createLabWorkbookReader,
  loadMappingConfiguration,
  loadTargetSchemas,
} from '@relecov-mapper/connector-file';
import {
  BatchProcessor,
  RecordPipeline,
  SchemaValidator,
  buildEnaSubmissionTables,
  buildRelecovDocument,
  formatBatchReport,
  serializeGisaidCsv,
  type BatchReport,
  type ValidatedRecord,
} from '@relecov-mapper/mapping-core';
import type { ResolvedPaths } from './config.js';

export interface MappingContext {
  configuration: MappingConfiguration;
  validator: SchemaValidator;
  referenceTables: Map<string, ReferenceTable>;
  referenceErrors: ReferenceLoadError[];
}

/**
 * Load configuration, schemas and reference datasets. Configuration and
 * schema problems throw; reference problems are returned.
 */
export async function loadMappingContext(
  paths: ResolvedPaths,
  logger: Logger = silentLogger
): Promise<MappingContext> {
  const configuration = await loadMappingConfiguration(paths.configurationPath, {
    institutionDir: paths.institutionDir,
  });
  const schemas = await loadTargetSchemas(paths.schemaDir, configuration.jsonSchemas);
  const validator = new SchemaValidator(schemas);

  const loader = new ReferenceTableLoader({ baseDir: paths.referenceDir, logger });
  const { tables, errors } = await loader.loadAll(configuration.labMetadata.enrichments);

  return { configuration, validator, referenceTables: tables, referenceErrors: errors };
}

/**
 * Read lab records from an .xlsx workbook or a JSON array
 */
export async function readLabRecords(
  labPath: string,
  configuration: MappingConfiguration
): Promise<RawRecord[]> {
  const ext = extname(labPath).toLowerCase();
  if (ext === '.xlsx') {
    return createLabWorkbookReader({
      id: 'lab-metadata',
      filePath: labPath,
      sheet: configuration.labMetadata.workbook.sheet,
      headerRow: configuration.labMetadata.workbook.headerRow,
    }).read();
  }
  if (ext === '.json') {
    return createJsonRecordsReader({ id: 'lab-metadata', filePath: labPath }).read();
  }
  throw new MappingError({
    code: 'READ_FAILED',
    message: `Unsupported lab metadata file: ${labPath}`,
    suggestion: 'Provide the lab metadata as an .xlsx workbook or a .json array.',
  });
}

export interface MapCommandOptions {
  labPath: string;
  outDir: string;
  paths: ResolvedPaths;
  bioinfoDir?: string;
  targets?: readonly TargetSchema[];
  institution?: string;
  concurrency?: number;
  /** Suffix of the output file names (default: the lab file name) */
  name?: string;
  logger?: Logger;
}

export interface MapCommandResult {
  report: BatchReport;
  /** Paths of the files written */
  files: string[];
  exitCode: 0 | 1;
}

async function writeOutput(filePath: string, content: string): Promise<void> {
  try {
    await writeFile(filePath, content, 'utf-8');
  } catch (error) {
    throw new MappingError({
      code: 'WRITE_FAILED',
      message: `Cannot write ${filePath}`,
      suggestion: 'Check that the output folder is writable.',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export async function runMapCommand(options: MapCommandOptions): Promise<MapCommandResult> {
  const logger = options.logger ?? silentLogger;
  const targets = options.targets ?? TARGET_SCHEMAS;
  const context = await loadMappingContext(options.paths, logger);
  const { configuration } = context;

  const raws = await readLabRecords(options.labPath, configuration);
  logger.info('Read lab metadata', { file: options.labPath, records: raws.length });

  let pipelineOutputs: PipelineOutputs | undefined;
  if (options.bioinfoDir) {
    pipelineOutputs = await collectPipelineOutputs({
      folder: options.bioinfoDir,
      bioinfo: configuration.bioinfo,
      logger,
    });
  }

  const pipeline = new RecordPipeline({
    configuration,
    validator: context.validator,
    referenceTables: context.referenceTables,
    institution: options.institution,
    logger,
  });
  const report = await new BatchProcessor(pipeline, logger).processBatch(raws, {
    targets,
    pipelineOutputs,
    concurrency: options.concurrency,
    referenceErrors: context.referenceErrors,
  });

  const name = options.name ?? basename(options.labPath, extname(options.labPath));
  const validated = (target: TargetSchema): ValidatedRecord[] =>
    report.outcomes.flatMap((outcome) => {
      const value = outcome.emitted[target];
      return value ? [value] : [];
    });

  await mkdir(options.outDir, { recursive: true });
  const files: string[] = [];
  const write = async (fileName: string, content: string): Promise<void> => {
    const filePath = join(options.outDir, fileName);
    await writeOutput(filePath, content);
    files.push(filePath);
  };

  if (targets.includes('relecov')) {
    await write(`relecov_${name}.json`, `${JSON.stringify(buildRelecovDocument(validated('relecov')), null, 2)}\n`);
  }
  if (targets.includes('ena')) {
    const tables = buildEnaSubmissionTables(validated('ena'), configuration.ena);
    await write(`ena_${name}.json`, `${JSON.stringify(tables, null, 2)}\n`);
  }
  if (targets.includes('gisaid')) {
    await write(`gisaid_${name}.csv`, serializeGisaidCsv(validated('gisaid'), configuration.gisaid.headers));
  }
  await write(`report_${name}.txt`, formatBatchReport(report));

  logger.info('Wrote submission files', { files });
  const exitCode = report.summary.failed > 0 || report.referenceErrors.length > 0 ? 1 : 0;
  return { report, files, exitCode };
}

export interface CheckConfigResult {
  ok: boolean;
  /** Findings, one line each; errors are prefixed with "error:" */
  messages: string[];
}

/**
 * Load everything a run needs and cross-check the configuration against
 * the target schemas.
 */
export async function runCheckConfig(
  paths: ResolvedPaths,
  logger: Logger = silentLogger
): Promise<CheckConfigResult> {
  const messages: string[] = [];
  let context: MappingContext;
  try {
    context = await loadMappingContext(paths, logger);
  } catch (error) {
    if (error instanceof MappingError) {
      return { ok: false, messages: [`error: ${error.toActionableMessage()}`] };
    }
    throw error;
  }

  const { configuration, validator } = context;
  for (const error of context.referenceErrors) {
    messages.push(`error: reference dataset ${error.dataset} [${error.code}]: ${error.message}`);
  }

  const known = new Set([...validator.fieldUnion(), ...Object.values(configuration.gisaid.fieldMap)]);
  for (const entry of configuration.labMetadata.renameTable) {
    if (!known.has(entry.canonical)) {
      messages.push(`warning: ${entry.canonical} is mapped but no target schema has it`);
    }
  }
  const relecovFields = new Set(validator.fieldSet('relecov').fields);
  for (const [header, canonical] of Object.entries(configuration.gisaid.fieldMap)) {
    if (!relecovFields.has(canonical)) {
      messages.push(`warning: GISAID ${header} reads ${canonical}, which the relecov schema does not define`);
    }
  }

  const ok = context.referenceErrors.length === 0;
  messages.push(
    ok
      ? `configuration OK: ${configuration.labMetadata.renameTable.length} fields, ${configuration.labMetadata.rules.length} rules, ${configuration.labMetadata.enrichments.length} enrichments`
      : 'configuration has errors'
  );
  return { ok, messages };
}
