import { afterEach, describe, expect, it } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type { BioinfoConfig } from '@relecov-mapper/core';
import { ConsensusFastaReader, VersionManifestReader, castCell, collectPipelineOutputs } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

const bioinfo: BioinfoConfig = {
  sampleIdField: 'sequencing_sample_id',
  fixedValues: {},
  requiredFiles: {
    mapping_stats: 'mapping_illumina_stats.tab',
    variants_metrics: 'summary_variants_metrics_mqc.csv',
    versions: 'software_versions.yml',
  },
  sampleColumns: { mapping_stats: 4, variants_metrics: 0 },
  mappingStats: {},
  mappingVariantMetrics: {},
  mappingPangolin: {},
  mappingConsensus: [],
  mappingVersion: {},
};

const FASTA = '>SAMPLE_01\nACGTACGTAC\nGTACG\n';

function writePipelineFolder(options: { withVersions: boolean }): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'pipeline-outputs-'));
  writeFileSync(
    join(tmpDir, 'mapping_illumina_stats.tab'),
    'run\tuser\thost\tVirussequence\tsample\ttotalreads\tDate\n' +
      'RUN1\tlab\thuman\tMN908947.3\tSAMPLE-01\t1000\t20240120\n'
  );
  writeFileSync(
    join(tmpDir, 'summary_variants_metrics_mqc.csv'),
    'Sample,# Missense variants,# Ns per 100kb consensus\nSAMPLE-01,12,35.5\n'
  );
  if (options.withVersions) {
    writeFileSync(
      join(tmpDir, 'software_versions.yml'),
      'BOWTIE2_ALIGN:\n  bowtie2: 2.4.4\n  samtools: 1.15.1\nIVAR_VARIANTS:\n  ivar: 1.3\n'
    );
  }
  writeFileSync(
    join(tmpDir, 'SAMPLE_01.pangolin.20240120.csv'),
    'taxon,lineage,version,pangolin_version\nSAMPLE_01,BA.2,PLEARN-v1.12,4.1.2\n'
  );
  writeFileSync(join(tmpDir, 'SAMPLE_01.consensus.fa'), FASTA);
  writeFileSync(join(tmpDir, 'RUN1_variants_long_table.csv'), 'SAMPLE,CHROM,POS\n');
  return tmpDir;
}

describe('collectPipelineOutputs', () => {
  it('reads every pipeline file the mapper needs', async () => {
    const folder = writePipelineFolder({ withVersions: true });

    const outputs = await collectPipelineOutputs({ folder, bioinfo });

    expect([...outputs.presentFiles].sort()).toEqual(['mapping_stats', 'variants_metrics', 'versions']);
    expect(outputs.tables.mapping_stats?.get('SAMPLE-01')?.totalreads).toBe(1000);
    expect(outputs.tables.variants_metrics?.get('SAMPLE-01')?.['# Missense variants']).toBe(12);
    expect(outputs.versions).toEqual({
      BOWTIE2_ALIGN: { bowtie2: '2.4.4', samtools: '1.15.1' },
      IVAR_VARIANTS: { ivar: '1.3' },
    });
    expect(outputs.pangolin.get('SAMPLE_01')?.get('20240120')?.lineage).toBe('BA.2');
    expect(outputs.consensus.get('SAMPLE_01')?.genomeLength).toBe(15);
    expect(outputs.longTablePath).toBe(join(folder, 'RUN1_variants_long_table.csv'));
  });

  it('records missing required files instead of failing', async () => {
    const folder = writePipelineFolder({ withVersions: false });

    const outputs = await collectPipelineOutputs({ folder, bioinfo });

    expect(outputs.presentFiles.has('versions')).toBe(false);
    expect(outputs.versions).toBeUndefined();
  });

  it('keeps sample ids and version strings exactly as written', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'pipeline-outputs-'));
    writeFileSync(
      join(tmpDir, 'mapping_illumina_stats.tab'),
      'run\tuser\thost\tVirussequence\tsample\ttotalreads\t%Ns10x\n' +
        'RUN1\tlab\thuman\tMN908947.3\t0123\t1000\t0.10\n' +
        'RUN1\tlab\thuman\tMN908947.3\t1E5\t2000\t2.5\n'
    );
    writeFileSync(join(tmpDir, 'summary_variants_metrics_mqc.csv'), 'Sample,# Missense variants\n0123,7\n');
    writeFileSync(
      join(tmpDir, 'software_versions.yml'),
      'BCFTOOLS_CONSENSUS:\n  bcftools: 1.10\nIVAR_VARIANTS:\n  ivar: 1.3\n'
    );

    const outputs = await collectPipelineOutputs({ folder: tmpDir, bioinfo });

    expect([...(outputs.tables.mapping_stats?.keys() ?? [])]).toEqual(['0123', '1E5']);
    expect(outputs.tables.mapping_stats?.get('0123')).toMatchObject({ totalreads: 1000, '%Ns10x': '0.10' });
    expect(outputs.tables.mapping_stats?.get('1E5')?.['%Ns10x']).toBe(2.5);
    expect(outputs.tables.variants_metrics?.get('0123')?.['# Missense variants']).toBe(7);
    expect(outputs.versions).toEqual({
      BCFTOOLS_CONSENSUS: { bcftools: '1.10' },
      IVAR_VARIANTS: { ivar: '1.3' },
    });
  });

  it('limits per-sample files to the requested samples', async () => {
    const folder = writePipelineFolder({ withVersions: true });

    const outputs = await collectPipelineOutputs({ folder, bioinfo, sampleIds: ['SAMPLE-02'] });

    expect(outputs.pangolin.size).toBe(0);
    expect(outputs.consensus.size).toBe(0);
  });
});

describe('ConsensusFastaReader', () => {
  it('summarizes the first record', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'consensus-'));
    const filePath = join(tmpDir, 'SAMPLE_01.consensus.fa');
    writeFileSync(filePath, `${FASTA}>second\nAAAA\n`);

    const summary = await new ConsensusFastaReader({ id: 'consensus', filePath }).read();

    expect(summary).toEqual({
      sequenceName: 'SAMPLE_01',
      genomeLength: 15,
      fileName: 'SAMPLE_01.consensus.fa',
      filePath: tmpDir,
      md5: createHash('md5').update(`${FASTA}>second\nAAAA\n`).digest('hex'),
    });
  });

  it('hashes the file bytes, including a byte order mark', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'consensus-'));
    const filePath = join(tmpDir, 'SAMPLE_01.consensus.fa');
    writeFileSync(filePath, `\uFEFF${FASTA}`);

    const summary = await new ConsensusFastaReader({ id: 'consensus', filePath }).read();

    expect(summary.sequenceName).toBe('SAMPLE_01');
    expect(summary.genomeLength).toBe(15);
    expect(summary.md5).toBe(createHash('md5').update(readFileSync(filePath)).digest('hex'));
    expect(summary.md5).not.toBe(createHash('md5').update(FASTA).digest('hex'));
  });
});

describe('castCell', () => {
  it('casts only cells that print back unchanged as numbers', () => {
    expect(castCell('1000')).toBe(1000);
    expect(castCell('-3.7038')).toBe(-3.7038);
    expect(castCell('0123')).toBe('0123');
    expect(castCell('1E5')).toBe('1E5');
    expect(castCell('0.10')).toBe('0.10');
    expect(castCell('')).toBe('');
    expect(castCell('BA.2')).toBe('BA.2');
  });
});

describe('VersionManifestReader', () => {
  it('rejects a manifest that is not PROCESS: { software: version }', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'versions-'));
    const filePath = join(tmpDir, 'software_versions.yml');
    writeFileSync(filePath, 'BOWTIE2_ALIGN: 2.4.4\n');

    await expect(new VersionManifestReader({ id: 'versions', filePath }).read()).rejects.toThrow(
      /Invalid .*software_versions\.yml/
    );
  });
});
