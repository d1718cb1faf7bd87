/**
 * Turns a validated configuration document into the typed, frozen
 * MappingConfiguration used by the engine.
 */

import type {
  DerivationRule,
  EnrichmentSpec,
  FieldRenameTable,
  MappingConfiguration,
  SoftwareVersionMapping,
} from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { deepFreeze } from '../utils/freeze.js';
import {
  ALL_FIELDS_SENTINEL,
  formatZodError,
  mappingConfigurationDocumentSchema,
  parseRuleOutput,
  resolveRuleValue,
  type FieldVariantsDocument,
  type MappingConfigurationDocument,
} from './configuration-schema.js';

export function toRenameTable(variants: FieldVariantsDocument): FieldRenameTable {
  return Object.entries(variants).map(([canonical, list]) => ({
    canonical,
    variants: [...list],
  }));
}

function compileRules(lab: MappingConfigurationDocument['lab_metadata']): DerivationRule[] {
  const rules: DerivationRule[] = [];

  for (const [triggerField, rule] of Object.entries(lab.required_post_processing)) {
    for (const [triggerValue, entry] of Object.entries(rule.values)) {
      const { output, match } = resolveRuleValue(entry, rule.match);
      const parsed = parseRuleOutput(output);
      if (!parsed) {
        throw new ConfigurationError({
          message: `Invalid post-processing output "${output}" for ${triggerField}`,
          suggestion: 'Use the form "output_field::value".',
        });
      }
      rules.push({
        kind: match,
        triggerField,
        triggerValue,
        outputField: parsed.field,
        outputValue: parsed.value,
      });
    }
  }

  for (const [outputField, sourceField] of Object.entries(lab.required_copy_from_other_field)) {
    rules.push({ kind: 'copy', sourceField, outputField });
  }

  return rules;
}

function compileEnrichments(lab: MappingConfigurationDocument['lab_metadata']): EnrichmentSpec[] {
  return Object.entries(lab.lab_metadata_req_json).map(([name, spec]) => ({
    name,
    dataset: spec.file,
    joinField: spec.map_field,
    fieldImport:
      spec.adding_fields === ALL_FIELDS_SENTINEL
        ? { kind: 'all' }
        : { kind: 'subset', fields: [...spec.adding_fields] },
    ...(spec.defaults ? { defaults: { ...spec.defaults } } : {}),
  }));
}

export function compileMappingConfiguration(
  doc: MappingConfigurationDocument,
  institutionVariants: Readonly<Record<string, FieldVariantsDocument>> = {}
): MappingConfiguration {
  const lab = doc.lab_metadata;
  const bio = doc.bioinfo_analysis;

  const mappingVersion: Record<string, SoftwareVersionMapping> = {};
  for (const [field, entry] of Object.entries(bio.mapping_version)) {
    const [process, software] = Object.entries(entry)[0] ?? [];
    if (process && software) {
      mappingVersion[field] = { process, software };
    }
  }

  const institutionRenameOverrides: Record<string, FieldRenameTable> = {};
  for (const [institution, variants] of Object.entries(institutionVariants)) {
    institutionRenameOverrides[institution] = toRenameTable(variants);
  }

  return deepFreeze<MappingConfiguration>({
    labMetadata: {
      fixedFields: { ...lab.fixed_fields },
      renameTable: toRenameTable(lab.metadata_lab_heading),
      enrichments: compileEnrichments(lab),
      rules: compileRules(lab),
      workbook: {
        sheet: lab.workbook.sheet,
        headerRow: lab.workbook.header_row,
      },
    },
    bioinfo: {
      sampleIdField: bio.sample_id_field,
      fixedValues: { ...bio.fixed_values },
      requiredFiles: { ...bio.required_file },
      sampleColumns: { ...bio.sample_column },
      mappingStats: { ...bio.mapping_stats },
      mappingVariantMetrics: { ...bio.mapping_variant_metrics },
      mappingPangolin: { ...bio.mapping_pangolin },
      mappingConsensus: [...bio.mapping_consensus],
      mappingVersion,
    },
    ena: {
      fixedFields: { ...doc.ENA_fields.fixed_fields },
      studyFields: [...doc.ENA_fields.study_fields],
      sampleFields: [...doc.ENA_fields.sample_fields],
      experimentFields: [...doc.ENA_fields.experiment_fields],
      runFields: [...doc.ENA_fields.run_fields],
    },
    gisaid: {
      headers: [...doc.GISAID_fields.gisaid_csv_headers],
      fieldMap: { ...doc.GISAID_fields.field_map },
      fixedFields: { ...doc.GISAID_fields.fixed_fields },
    },
    jsonSchemas: {
      relecov: doc.json_schemas.relecov_schema,
      ena: doc.json_schemas.ena_schema,
      gisaid: doc.json_schemas.gisaid_schema,
    },
    institutionMappingFiles: { ...doc.institution_mapping_file },
    institutionRenameOverrides,
  });
}

/**
 * Validate a parsed configuration document and compile it.
 * Throws ConfigurationError listing every invalid path.
 */
export function parseMappingConfiguration(
  raw: unknown,
  institutionVariants?: Readonly<Record<string, FieldVariantsDocument>>
): MappingConfiguration {
  const result = mappingConfigurationDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError({
      message: formatZodError(result.error),
      suggestion: 'Fix the listed entries of the mapping configuration and run again.',
    });
  }
  return compileMappingConfiguration(result.data, institutionVariants);
}
