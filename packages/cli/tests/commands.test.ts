import { afterEach, describe, expect, it } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadMappingContext, resolvePaths, runCheckConfig, runMapCommand } from '../src/index.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

const shippedPaths = resolvePaths({});

const LAB_ROW = {
  'Sample ID': 'SAMPLE-01',
  'Lab sample ID': 'LAB-1',
  'Originating Laboratory': 'Hospital Universitario Ejemplo',
  'Submitting Institution': 'Centro de Referencia Norte',
  'Collection date': '2024-01-15',
  Host: 'Human',
  'Host Age': 54,
  'Host Gender': 'Female',
  'Specimen source': 'Nasopharynx Swab',
  'Purpose of sampling': 'Surveillance',
  Sequencer: 'Illumina NextSeq 500',
  'Library layout': 'PAIRED',
  'Read length': 150,
  'R1 fastq': 'SAMPLE-01_R1.fastq.gz',
  'R2 fastq': 'SAMPLE-01_R2.fastq.gz',
};

const FASTA = '>SAMPLE_01\nACGTACGTAC\nGTACG\n';

function writeLabFile(rows: unknown[]): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'relecov-cli-'));
  const labPath = join(tmpDir, 'lab_batch.json');
  writeFileSync(labPath, JSON.stringify(rows));
  return labPath;
}

function writeBioinfoFolder(): string {
  const folder = join(tmpDir, 'viralrecon');
  mkdirSync(folder);
  writeFileSync(
    join(folder, 'mapping_illumina_stats.tab'),
    [
      'run\tuser\thost\tVirussequence\tsample\ttotalreads\t%reads_host\t%reads_virus\t%unmapedreads\t' +
        'medianDPcoveragevirus\tCoverage>10x(%)\t%Ns10x\tVariantsinconsensusx10\tDate',
      'RUN1\tlab\thuman\tMN908947.3\tSAMPLE-01\t1000\t2.5\t95.1\t2.4\t2500\t99.2\t0.5\t40\t20240120',
      '',
    ].join('\n')
  );
  writeFileSync(
    join(folder, 'summary_variants_metrics_mqc.csv'),
    'Sample,# Missense variants,# Ns per 100kb consensus\nSAMPLE-01,12,35.5\n'
  );
  writeFileSync(
    join(folder, 'software_versions.yml'),
    [
      'KRAKEN2_KRAKEN2:',
      '  kraken2: 2.1.2',
      'BOWTIE2_ALIGN:',
      '  bowtie2: 2.4.4',
      'IVAR_VARIANTS:',
      '  ivar: 1.3.1',
      'BCFTOOLS_CONSENSUS:',
      '  bcftools: 1.14',
      '',
    ].join('\n')
  );
  writeFileSync(
    join(folder, 'SAMPLE_01.pangolin.20240120.csv'),
    'taxon,lineage,version,pangolin_version\nSAMPLE_01,BA.2,PLEARN-v1.12,4.1.2\n'
  );
  writeFileSync(join(folder, 'SAMPLE_01.consensus.fa'), FASTA);
  return folder;
}

describe('runCheckConfig', () => {
  it('accepts the shipped configuration', async () => {
    const result = await runCheckConfig(shippedPaths);

    expect(result).toEqual({
      ok: true,
      messages: ['configuration OK: 17 fields, 8 rules, 3 enrichments'],
    });
  });

  it('reports every reference dataset that cannot be loaded', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'relecov-cli-'));

    const result = await runCheckConfig({ ...shippedPaths, referenceDir: tmpDir });

    expect(result.ok).toBe(false);
    expect(result.messages).toEqual([
      `error: reference dataset laboratory_address.json [REFERENCE_NOT_FOUND]: File not found: ${join(tmpDir, 'laboratory_address.json')}`,
      `error: reference dataset geo_loc_cities.json [REFERENCE_NOT_FOUND]: File not found: ${join(tmpDir, 'geo_loc_cities.json')}`,
      `error: reference dataset anatomical_material_collection_method.json [REFERENCE_NOT_FOUND]: File not found: ${join(tmpDir, 'anatomical_material_collection_method.json')}`,
      'configuration has errors',
    ]);
  });

  it('reports a configuration it cannot load', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'relecov-cli-'));

    const result = await runCheckConfig({ ...shippedPaths, configurationPath: join(tmpDir, 'missing.json') });

    expect(result.ok).toBe(false);
    expect(result.messages).toHaveLength(1);
    expect(result.messages[0]).toMatch(/^error: Error \[CONFIGURATION_ERROR\]/);
  });
});

describe('shipped RELECOV schema', () => {
  it('names exactly the required field that is missing', async () => {
    const { validator } = await loadMappingContext(shippedPaths);
    const record = {
      sequencing_sample_id: 'SAMPLE-01',
      collecting_institution: 'Hospital Universitario Ejemplo',
      sample_collection_date: '2024-01-15',
      organism: 'Severe acute respiratory syndrome coronavirus 2',
      host_scientific_name: 'Homo sapiens',
      sequencing_instrument_platform: 'Illumina',
    };
    expect(validator.validate('relecov', record)).toEqual([]);

    for (const field of validator.fieldSet('relecov').required) {
      const incomplete: Record<string, string> = { ...record };
      delete incomplete[field];

      expect(validator.validate('relecov', incomplete).map((v) => v.field)).toEqual([field]);
    }
  });
});

describe('runMapCommand', () => {
  it('writes submission files and fails the run when a record is rejected', async () => {
    const labPath = writeLabFile([
      LAB_ROW,
      { 'Sample ID': 'SAMPLE-02', 'Originating Laboratory': 'Hospital Universitario Ejemplo', Host: 'Human' },
    ]);
    const outDir = join(tmpDir, 'out');

    const result = await runMapCommand({ labPath, outDir, paths: shippedPaths, targets: ['relecov', 'ena'] });

    expect(result.exitCode).toBe(1);
    expect(result.files).toEqual([
      join(outDir, 'relecov_lab_batch.json'),
      join(outDir, 'ena_lab_batch.json'),
      join(outDir, 'report_lab_batch.txt'),
    ]);
    expect(result.report.summary).toMatchObject({ total: 2, succeeded: 1, failed: 1 });

    const relecov: unknown = JSON.parse(readFileSync(join(outDir, 'relecov_lab_batch.json'), 'utf-8'));
    expect(relecov).toEqual([
      expect.objectContaining({
        sequencing_sample_id: 'SAMPLE-01',
        isolate_sample_id: 'SAMPLE-01',
        host_scientific_name: 'Homo sapiens',
        sequencing_instrument_platform: 'Illumina',
        geo_loc_state: 'Madrid',
        geo_loc_latitude: 40.4168,
        collection_method: 'Swab',
        tax_id: '2697049',
      }),
    ]);

    const ena: unknown = JSON.parse(readFileSync(join(outDir, 'ena_lab_batch.json'), 'utf-8'));
    expect(ena).toMatchObject({
      study: [
        {
          study_alias: 'RELECOV',
          study_title: 'Spanish Network for genomic surveillance of SARS-CoV-2',
          study_type: 'Whole Genome Sequencing',
        },
      ],
      run: [
        {
          sequencing_sample_id: 'SAMPLE-01',
          sequence_file_R1_fastq: 'SAMPLE-01_R1.fastq.gz',
          sequence_file_R2_fastq: 'SAMPLE-01_R2.fastq.gz',
          file_format: 'FASTQ',
        },
      ],
    });

    const report = readFileSync(join(outDir, 'report_lab_batch.txt'), 'utf-8').split('\n');
    expect(report).toContain('- Failed: 1');
    expect(report).toContain('#### Record 2 (SAMPLE-02)');
    expect(report).toContain("- [relecov] sample_collection_date: must have required property 'sample_collection_date'");
  });

  it('merges pipeline outputs and writes the GISAID upload sheet', async () => {
    const labPath = writeLabFile([LAB_ROW]);
    const bioinfoDir = writeBioinfoFolder();
    const outDir = join(tmpDir, 'out');

    const result = await runMapCommand({ labPath, outDir, bioinfoDir, paths: shippedPaths, name: 'run1' });

    expect(result.exitCode).toBe(0);
    expect(result.report.summary.emittedByTarget).toEqual({ relecov: 1, ena: 1, gisaid: 1 });

    const relecov: unknown = JSON.parse(readFileSync(join(outDir, 'relecov_run1.json'), 'utf-8'));
    expect(relecov).toEqual([
      expect.objectContaining({
        analysis_date: 20240120,
        depth_of_coverage_value: 2500,
        mapping_software_version: '2.4.4',
        consensus_sequence_software_version: '1.14',
        lineage_name: 'BA.2',
        consensus_genome_length: 15,
        consensus_sequence_md5: createHash('md5').update(FASTA).digest('hex'),
        number_of_base_pairs_sequenced: 4500,
        long_table_path: '',
      }),
    ]);

    const [header, row, trailing] = readFileSync(join(outDir, 'gisaid_run1.csv'), 'utf-8').split('\n');
    expect(header?.split(',')).toHaveLength(30);
    expect(row).toBe(
      [
        'relecov_submitter',
        'SAMPLE_01.consensus.fa',
        'SAMPLE-01',
        'betacoronavirus',
        'Original',
        '2024-01-15',
        'Madrid',
        '',
        'Homo sapiens',
        '',
        'Surveillance',
        'Female',
        '54',
        'unknown',
        'Nasopharynx Swab',
        '',
        '',
        '',
        'Illumina NextSeq 500',
        'BCFtools',
        '2500',
        'Hospital Universitario Ejemplo',
        '"Calle Ejemplo 1, 28001 Madrid"',
        'LAB-1',
        'Centro de Referencia Norte',
        '',
        'SAMPLE-01',
        'RELECOV network',
        '',
        '',
      ].join(',')
    );
    expect(trailing).toBe('');
  });

  it('rejects lab files it cannot read', async () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'relecov-cli-'));
    const labPath = join(tmpDir, 'lab.csv');
    writeFileSync(labPath, 'Sample ID\nSAMPLE-01\n');

    await expect(runMapCommand({ labPath, outDir: join(tmpDir, 'out'), paths: shippedPaths })).rejects.toThrow(
      `Unsupported lab metadata file: ${labPath}`
    );
  });
});
