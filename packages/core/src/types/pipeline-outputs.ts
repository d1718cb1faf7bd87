/**
 * Parsed bioinformatics pipeline outputs, as handed to the result mapper.
 * Reading the files is the connector's job; the mapper only sees these values.
 */

import type { RawRecord } from './record.js';

/** Table rows keyed by sample identifier */
export type KeyedRows = ReadonlyMap<string, Readonly<RawRecord>>;

/** software_versions.yml: PROCESS -> software -> version */
export type VersionManifest = Readonly<{
  [process: string]: Readonly<{ [software: string]: string }>;
}>;

export interface ConsensusSummary {
  /** FASTA header line without the leading '>' */
  sequenceName: string;
  genomeLength: number;
  fileName: string;
  /** Folder holding the file */
  filePath: string;
  md5: string;
}

export interface PipelineOutputs {
  folder: string;
  /** required_file keys whose file exists in the folder */
  presentFiles: ReadonlySet<string>;
  /** Tabular required files, by required_file key */
  tables: Readonly<{ [fileKey: string]: KeyedRows }>;
  versions?: VersionManifest;
  /** Sample file name -> analysis date -> first pangolin row */
  pangolin: ReadonlyMap<string, ReadonlyMap<string, Readonly<RawRecord>>>;
  /** Sample file name -> consensus summary */
  consensus: ReadonlyMap<string, ConsensusSummary>;
  longTablePath?: string;
}
