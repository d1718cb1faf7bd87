/**
 * Pipeline Output Collector
 *
 * Reads the files a bioinformatics run leaves in its output folder and hands
 * them to the result mapper as parsed, keyed values. Missing required files
 * are recorded, not thrown: they only fail the samples that need them.
 */

import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';
import type {
  BioinfoConfig,
  ConsensusSummary,
  KeyedRows,
  Logger,
  PipelineOutputs,
  RawRecord,
  VersionManifest,
} from '@relecov-mapper/core';
import { BIOINFO_FILE_KEYS, MappingError, silentLogger, toSampleFileName } from '@relecov-mapper/core';
import { CsvReader, readKeyedTable } from './csv-reader.js';
import { VersionManifestReader } from './version-manifest-reader.js';
import { ConsensusFastaReader } from './consensus-fasta-reader.js';

const PANGOLIN_FILE = /^(.+)\.pangolin\.(.+)\.csv$/;
const CONSENSUS_FILE = /^(.+)\.consensus\.fa(?:sta)?$/;
const LONG_TABLE_SUFFIX = 'long_table.csv';
const TABULAR_EXTENSIONS = new Set(['.csv', '.tab', '.tsv', '.txt']);
const YAML_EXTENSIONS = new Set(['.yml', '.yaml']);

export interface CollectPipelineOutputsOptions {
  /** Pipeline output folder */
  folder: string;
  bioinfo: BioinfoConfig;
  /** Restrict per-sample files to these samples (default: every file found) */
  sampleIds?: readonly string[];
  logger?: Logger;
}

async function listFolder(folder: string): Promise<string[]> {
  try {
    const entries = await readdir(folder);
    return entries.sort();
  } catch (error) {
    throw new MappingError({
      code: 'READ_FAILED',
      message: `Cannot list pipeline output folder ${folder}`,
      suggestion: 'Check the --bioinfo folder path.',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export async function collectPipelineOutputs(
  options: CollectPipelineOutputsOptions
): Promise<PipelineOutputs> {
  const { folder, bioinfo } = options;
  const logger = options.logger ?? silentLogger;
  const entries = await listFolder(folder);
  const present = new Set(entries);
  const wanted = options.sampleIds ? new Set(options.sampleIds.map(toSampleFileName)) : null;

  const presentFiles = new Set<string>();
  const tables: { [fileKey: string]: KeyedRows } = {};
  let versions: VersionManifest | undefined;

  for (const [fileKey, fileName] of Object.entries(bioinfo.requiredFiles)) {
    if (!present.has(fileName)) {
      logger.warn('Required pipeline file not found', { fileKey, fileName, folder });
      continue;
    }
    presentFiles.add(fileKey);

    const filePath = join(folder, fileName);
    const ext = extname(fileName).toLowerCase();
    if (fileKey === BIOINFO_FILE_KEYS.versions || YAML_EXTENSIONS.has(ext)) {
      versions = await new VersionManifestReader({ id: fileKey, filePath }).read();
    } else if (TABULAR_EXTENSIONS.has(ext)) {
      tables[fileKey] = await readKeyedTable(
        { id: fileKey, filePath },
        bioinfo.sampleColumns[fileKey] ?? 0
      );
      logger.debug('Loaded pipeline table', { fileKey, samples: tables[fileKey]?.size ?? 0 });
    }
  }

  const pangolin = new Map<string, Map<string, Readonly<RawRecord>>>();
  const consensus = new Map<string, ConsensusSummary>();

  for (const entry of entries) {
    const pangolinMatch = PANGOLIN_FILE.exec(entry);
    if (pangolinMatch?.[1] && pangolinMatch[2]) {
      const [, sample, analysisDate] = pangolinMatch;
      if (wanted && !wanted.has(sample)) continue;
      const table = await new CsvReader({ id: entry, filePath: join(folder, entry) }).read();
      const firstRow = table.rows[0];
      if (!firstRow) {
        logger.warn('Empty pangolin report', { file: entry });
        continue;
      }
      const byDate = pangolin.get(sample) ?? new Map<string, Readonly<RawRecord>>();
      byDate.set(analysisDate, firstRow);
      pangolin.set(sample, byDate);
      continue;
    }

    const consensusMatch = CONSENSUS_FILE.exec(entry);
    if (consensusMatch?.[1]) {
      const sample = consensusMatch[1];
      if (wanted && !wanted.has(sample)) continue;
      consensus.set(
        sample,
        await new ConsensusFastaReader({ id: entry, filePath: join(folder, entry) }).read()
      );
    }
  }

  const longTable = entries.find((entry) => entry.endsWith(LONG_TABLE_SUFFIX));

  return {
    folder,
    presentFiles,
    tables,
    versions,
    pangolin,
    consensus,
    longTablePath: longTable ? join(folder, longTable) : undefined,
  };
}
