import type {
  JsonSchemaDocument,
  MappingConfiguration,
  PipelineOutputs,
  RawRecord,
  ReferenceTable,
  TargetSchemaDocuments,
} from '@relecov-mapper/core';
import { createReferenceTable, parseMappingConfiguration } from '@relecov-mapper/core';

export function mappingDocument(): Record<string, unknown> {
  return {
    lab_metadata: {
      fixed_fields: {
        organism: 'Severe acute respiratory syndrome coronavirus 2',
        geo_loc_country: 'Spain',
        study_alias: 'RELECOV',
      },
      metadata_lab_heading: {
        sequencing_sample_id: ['Sample ID', 'sample_id'],
        collecting_institution: ['Originating Laboratory'],
        sample_collection_date: ['Collection date'],
        host_common_name: ['Host'],
        sequencing_instrument_model: ['Sequencer'],
        specimen_source: ['Specimen source'],
        library_layout: ['Library layout'],
        read_length: ['Read length'],
      },
      lab_metadata_req_json: {
        laboratory_data: {
          file: 'labs.json',
          map_field: 'collecting_institution',
          adding_fields: ['geo_loc_city', 'collecting_institution_email'],
        },
        geo_location: {
          file: 'cities.json',
          map_field: 'geo_loc_city',
          adding_fields: ['latitude', 'longitude'],
        },
        specimen: {
          file: 'specimens.json',
          map_field: 'specimen_source',
          adding_fields: '__all__',
          defaults: { anatomical_material: 'Not Provided' },
        },
      },
      required_post_processing: {
        host_common_name: {
          match: 'exact',
          values: { Human: 'host_scientific_name::Homo sapiens' },
        },
        sequencing_instrument_model: {
          match: 'substring',
          values: {
            Illumina: 'sequencing_instrument_platform::Illumina',
            Nanopore: 'sequencing_instrument_platform::Oxford Nanopore',
          },
        },
      },
      required_copy_from_other_field: { isolate_sample_id: 'sequencing_sample_id' },
    },
    bioinfo_analysis: {
      fixed_values: { bioinformatics_protocol_software_name: 'nf-core/viralrecon' },
      required_file: {
        mapping_stats: 'mapping_illumina_stats.tab',
        variants_metrics: 'summary_variants_metrics_mqc.csv',
        versions: 'software_versions.yml',
      },
      sample_column: { mapping_stats: 4, variants_metrics: 0 },
      mapping_stats: {
        analysis_date: 'Date',
        number_of_reads_sequenced: 'totalreads',
        per_Ns: '%Ns10x',
      },
      mapping_variant_metrics: { number_of_variants_with_effect: '# Missense variants' },
      mapping_pangolin: {
        lineage_name: 'lineage',
        lineage_assignment_software_version: 'pangolin_version',
      },
      mapping_consensus: [
        'consensus_genome_length',
        'consensus_sequence_md5',
        'number_of_base_pairs_sequenced',
      ],
      mapping_version: {
        dehosting_method_software_version: { KRAKEN2_KRAKEN2: 'kraken2' },
        variant_calling_software_version: { IVAR_VARIANTS: 'ivar' },
      },
    },
    ENA_fields: {
      fixed_fields: { study_type: 'Whole Genome Sequencing', file_format: 'FASTQ' },
      study_fields: ['study_alias', 'study_type'],
      sample_fields: ['sequencing_sample_id', 'collecting_institution'],
      experiment_fields: ['sequencing_sample_id', 'library_layout'],
      run_fields: ['sequencing_sample_id', 'file_format'],
    },
    GISAID_fields: {
      gisaid_csv_headers: [
        'submitter',
        'covv_virus_name',
        'covv_collection_date',
        'covv_location',
        'covv_host',
        'covv_coverage',
      ],
      field_map: {
        covv_virus_name: 'isolate_sample_id',
        covv_collection_date: 'sample_collection_date',
        covv_location: 'geo_loc_city',
        covv_host: 'host_scientific_name',
        covv_coverage: 'depth_of_coverage_value',
      },
      fixed_fields: { submitter: 'test_submitter' },
    },
    json_schemas: {
      relecov_schema: 'relecov_schema.json',
      ena_schema: 'ena_schema.json',
      gisaid_schema: 'gisaid_schema.json',
    },
  };
}

export function testConfiguration(): MappingConfiguration {
  return parseMappingConfiguration(mappingDocument(), {
    hospital_test: {
      sequencing_sample_id: ['Codigo de muestra'],
      host_age: ['Edad'],
    },
  });
}

const text = { type: 'string' };
const scalar = { type: ['string', 'number'] };

export const relecovSchema: JsonSchemaDocument = {
  type: 'object',
  required: [
    'sequencing_sample_id',
    'collecting_institution',
    'sample_collection_date',
    'organism',
    'host_scientific_name',
  ],
  properties: {
    sequencing_sample_id: { type: 'string', minLength: 1 },
    isolate_sample_id: text,
    collecting_institution: { type: 'string', minLength: 1 },
    collecting_institution_email: text,
    sample_collection_date: { type: 'string', format: 'date' },
    organism: { type: 'string', minLength: 1 },
    study_alias: text,
    geo_loc_country: text,
    geo_loc_city: text,
    latitude: { type: 'number' },
    longitude: { type: 'number' },
    host_common_name: text,
    host_scientific_name: { type: 'string', minLength: 1 },
    sequencing_instrument_model: text,
    sequencing_instrument_platform: {
      type: 'string',
      enum: ['Illumina', 'Oxford Nanopore', 'Ion Torrent'],
    },
    specimen_source: text,
    anatomical_material: text,
    anatomical_part: text,
    collection_method: text,
    library_layout: { enum: ['SINGLE', 'PAIRED'] },
    read_length: scalar,
    bioinformatics_protocol_software_name: text,
    analysis_date: scalar,
    number_of_reads_sequenced: scalar,
    per_Ns: scalar,
    number_of_variants_with_effect: scalar,
    dehosting_method_software_version: text,
    variant_calling_software_version: text,
    lineage_name: text,
    lineage_assignment_software_version: text,
    consensus_genome_length: scalar,
    consensus_sequence_md5: text,
    number_of_base_pairs_sequenced: scalar,
    long_table_path: text,
  },
  additionalProperties: false,
};

export const enaSchema: JsonSchemaDocument = {
  type: 'object',
  required: ['study_alias', 'sequencing_sample_id', 'library_layout'],
  properties: {
    sequencing_sample_id: text,
    study_alias: text,
    study_type: text,
    collecting_institution: text,
    library_layout: text,
    sample_collection_date: text,
  },
};

export const gisaidSchema: JsonSchemaDocument = {
  type: 'object',
  required: ['submitter', 'covv_virus_name', 'covv_collection_date', 'covv_host'],
  properties: {
    submitter: text,
    covv_virus_name: { type: 'string', minLength: 1 },
    covv_collection_date: { type: 'string', format: 'date' },
    covv_location: text,
    covv_host: text,
    covv_coverage: text,
  },
  additionalProperties: false,
};

export const targetSchemas: TargetSchemaDocuments = {
  relecov: relecovSchema,
  ena: enaSchema,
  gisaid: gisaidSchema,
};

export function referenceTables(): Map<string, ReferenceTable> {
  return new Map([
    [
      'labs.json',
      createReferenceTable('labs.json', [
        [
          'Hospital Uno',
          {
            geo_loc_city: 'Madrid',
            geo_loc_state: 'Madrid',
            collecting_institution_email: 'lab@hospital-uno.example',
          },
        ],
      ]),
    ],
    ['cities.json', createReferenceTable('cities.json', [['Madrid', { latitude: 40.4168, longitude: -3.7038 }]])],
    [
      'specimens.json',
      createReferenceTable('specimens.json', [
        [
          'Nasopharynx Swab',
          { anatomical_material: 'Nasopharynx', anatomical_part: 'Nasopharynx', collection_method: 'Swab' },
        ],
      ]),
    ],
  ]);
}

/** A lab row every target accepts */
export function completeLabRow(sampleId = 'SAMPLE-01'): RawRecord {
  return {
    'Sample ID': sampleId,
    'Originating Laboratory': 'Hospital Uno',
    'Collection date': '2024-01-15',
    Host: 'Human',
    Sequencer: 'Illumina NextSeq 500',
    'Specimen source': 'Nasopharynx Swab',
    'Library layout': 'PAIRED',
    'Read length': 150,
  };
}

/** A lab row missing its collection date, with an unknown lab and host */
export function incompleteLabRow(): RawRecord {
  return {
    'Sample ID': 'SAMPLE-02',
    'Originating Laboratory': 'Unknown Lab',
    'Colection date': '2024-01-16',
    Host: 'Dog',
    Sequencer: 'MinION Nanopore',
    'Specimen source': 'Saliva',
    'Library layout': 'SINGLE',
    'Read length': 'n/a',
  };
}

export function pipelineOutputs(overrides: Partial<PipelineOutputs> = {}): PipelineOutputs {
  return {
    folder: '/runs/run1',
    presentFiles: new Set(['mapping_stats', 'variants_metrics', 'versions']),
    tables: {
      mapping_stats: new Map([
        ['SAMPLE-01', { sample: 'SAMPLE-01', totalreads: 1000, Date: 20240120, '%Ns10x': 0.5 }],
      ]),
      variants_metrics: new Map([['SAMPLE-01', { Sample: 'SAMPLE-01', '# Missense variants': 12 }]]),
    },
    versions: {
      KRAKEN2_KRAKEN2: { kraken2: '2.1.2' },
      IVAR_VARIANTS: { ivar: '1.3.1' },
    },
    pangolin: new Map([
      ['SAMPLE_01', new Map([['20240120', { taxon: 'SAMPLE_01', lineage: 'BA.2', pangolin_version: '4.1.2' }]])],
    ]),
    consensus: new Map([
      [
        'SAMPLE_01',
        {
          sequenceName: 'SAMPLE_01',
          genomeLength: 29903,
          fileName: 'SAMPLE_01.consensus.fa',
          filePath: '/runs/run1',
          md5: 'd41d8cd98f00b204e9800998ecf8427e',
        },
      ],
    ]),
    longTablePath: '/runs/run1/RUN1_variants_long_table.csv',
    ...overrides,
  };
}
