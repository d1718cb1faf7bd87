/**
 * Zod schemas for the mapping configuration document (configuration.json)
 */

import { z } from 'zod';
import { CONSENSUS_FIELDS } from '../types/mapping-config.js';

const fieldName = z.string().min(1);

export const fieldValueSchema = z.union([z.string(), z.number()]);

const fixedValuesSchema = z.record(fieldName, fieldValueSchema);

const columnMapSchema = z.record(fieldName, z.string().min(1));

/** canonical field -> accepted header variants (priority order) */
export const fieldVariantsSchema = z.record(fieldName, z.array(z.string().min(1)).min(1));

/** `output_field::value` */
const RULE_OUTPUT_PATTERN = /^([^:]+)::(.*)$/;

export function parseRuleOutput(value: string): { field: string; value: string } | null {
  const match = RULE_OUTPUT_PATTERN.exec(value);
  if (!match?.[1] || match[2] === undefined) return null;
  return { field: match[1].trim(), value: match[2] };
}

export const ALL_FIELDS_SENTINEL = '__all__';

const enrichmentSpecSchema = z
  .object({
    file: z.string().min(1),
    map_field: fieldName,
    adding_fields: z.union([z.literal(ALL_FIELDS_SENTINEL), z.array(fieldName).min(1)]),
    defaults: fixedValuesSchema.optional(),
  })
  .strict();

const ruleMatchSchema = z.enum(['exact', 'substring']);

const ruleOutputSchema = z.string().refine((v) => parseRuleOutput(v) !== null, {
  message: 'Expected "output_field::value"',
});

/**
 * Trigger value entry: `"output_field::value"`, or `{ output, match }` to
 * override the match mode of its trigger field for this value only.
 */
const ruleValueSchema = z.union([
  ruleOutputSchema,
  z.object({ output: ruleOutputSchema, match: ruleMatchSchema }).strict(),
]);

const postProcessingSchema = z
  .object({
    match: ruleMatchSchema,
    values: z
      .record(z.string().min(1), ruleValueSchema)
      .refine((v) => Object.keys(v).length > 0, { message: 'At least one trigger value is required' }),
  })
  .strict();

export type RuleValueEntry = z.infer<typeof ruleValueSchema>;

export function resolveRuleValue(
  entry: RuleValueEntry,
  fieldMatch: z.infer<typeof ruleMatchSchema>
): { output: string; match: z.infer<typeof ruleMatchSchema> } {
  return typeof entry === 'string' ? { output: entry, match: fieldMatch } : entry;
}

const labMetadataSchema = z
  .object({
    fixed_fields: fixedValuesSchema.default({}),
    metadata_lab_heading: fieldVariantsSchema,
    lab_metadata_req_json: z.record(z.string().min(1), enrichmentSpecSchema).default({}),
    required_post_processing: z.record(fieldName, postProcessingSchema).default({}),
    required_copy_from_other_field: z.record(fieldName, fieldName).default({}),
    workbook: z
      .object({
        sheet: z.string().min(1).optional(),
        header_row: z.number().int().min(1).default(1),
      })
      .strict()
      .default({}),
  })
  .strict();

const versionEntrySchema = z
  .record(z.string().min(1), z.string().min(1))
  .refine((v) => Object.keys(v).length === 1, {
    message: 'Expected exactly one { PROCESS: software } pair',
  });

const bioinfoSchema = z
  .object({
    sample_id_field: fieldName.default('sequencing_sample_id'),
    fixed_values: fixedValuesSchema.default({}),
    required_file: z.record(z.string().min(1), z.string().min(1)).default({}),
    sample_column: z.record(z.string().min(1), z.number().int().min(0)).default({}),
    mapping_stats: columnMapSchema.default({}),
    mapping_variant_metrics: columnMapSchema.default({}),
    mapping_pangolin: columnMapSchema.default({}),
    mapping_consensus: z.array(z.enum(CONSENSUS_FIELDS)).default([]),
    mapping_version: z.record(fieldName, versionEntrySchema).default({}),
  })
  .strict();

const enaSchema = z
  .object({
    fixed_fields: fixedValuesSchema.default({}),
    study_fields: z.array(fieldName).default([]),
    sample_fields: z.array(fieldName).default([]),
    experiment_fields: z.array(fieldName).default([]),
    run_fields: z.array(fieldName).default([]),
  })
  .strict();

const gisaidSchema = z
  .object({
    gisaid_csv_headers: z.array(z.string().min(1)).min(1),
    field_map: z.record(z.string().min(1), fieldName).default({}),
    fixed_fields: z.record(z.string().min(1), z.string()).default({}),
  })
  .strict();

/** required_file keys of the tables the bioinformatics mapper reads */
export const BIOINFO_FILE_KEYS = {
  mappingStats: 'mapping_stats',
  variantMetrics: 'variants_metrics',
  versions: 'versions',
} as const;

export const mappingConfigurationDocumentSchema = z
  .object({
    $schema: z.string().optional(),
    lab_metadata: labMetadataSchema,
    bioinfo_analysis: bioinfoSchema.default({}),
    ENA_fields: enaSchema.default({}),
    GISAID_fields: gisaidSchema,
    json_schemas: z
      .object({
        relecov_schema: z.string().min(1),
        ena_schema: z.string().min(1),
        gisaid_schema: z.string().min(1),
      })
      .strict(),
    institution_mapping_file: z.record(z.string().min(1), z.string().min(1)).default({}),
  })
  .strict()
  .superRefine((doc, ctx) => {
    const lab = doc.lab_metadata;

    // Header variants must not shadow another canonical field
    const canonicalNames = new Set(Object.keys(lab.metadata_lab_heading));
    for (const [canonical, variants] of Object.entries(lab.metadata_lab_heading)) {
      variants.forEach((variant, i) => {
        if (variant !== canonical && canonicalNames.has(variant)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Header variant "${variant}" collides with canonical field "${variant}"`,
            path: ['lab_metadata', 'metadata_lab_heading', canonical, i],
          });
        }
      });
    }

    // A rule output feeding another rule would make rule application order-dependent
    const ruleInputs = new Set<string>([
      ...Object.keys(lab.required_post_processing),
      ...Object.values(lab.required_copy_from_other_field),
    ]);
    for (const [trigger, rule] of Object.entries(lab.required_post_processing)) {
      for (const [triggerValue, entry] of Object.entries(rule.values)) {
        const parsed = parseRuleOutput(resolveRuleValue(entry, rule.match).output);
        if (parsed && ruleInputs.has(parsed.field)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Rule output "${parsed.field}" is also a rule trigger or copy source`,
            path: ['lab_metadata', 'required_post_processing', trigger, 'values', triggerValue],
          });
        }
      }
    }
    for (const output of Object.keys(lab.required_copy_from_other_field)) {
      if (ruleInputs.has(output)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Copy output "${output}" is also a rule trigger or copy source`,
          path: ['lab_metadata', 'required_copy_from_other_field', output],
        });
      }
    }

    const bio = doc.bioinfo_analysis;
    const sections: Array<[string, Record<string, unknown>, string]> = [
      ['mapping_stats', bio.mapping_stats, BIOINFO_FILE_KEYS.mappingStats],
      ['mapping_variant_metrics', bio.mapping_variant_metrics, BIOINFO_FILE_KEYS.variantMetrics],
      ['mapping_version', bio.mapping_version, BIOINFO_FILE_KEYS.versions],
    ];
    for (const [section, mapping, fileKey] of sections) {
      if (Object.keys(mapping).length > 0 && !(fileKey in bio.required_file)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${section} is configured but required_file has no "${fileKey}" entry`,
          path: ['bioinfo_analysis', 'required_file'],
        });
      }
    }
    for (const key of Object.keys(bio.sample_column)) {
      if (!(key in bio.required_file)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `sample_column refers to unknown required_file "${key}"`,
          path: ['bioinfo_analysis', 'sample_column', key],
        });
      }
    }

    const gisaid = doc.GISAID_fields;
    const headers = new Set<string>();
    gisaid.gisaid_csv_headers.forEach((header, i) => {
      if (headers.has(header)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate GISAID header: ${header}`,
          path: ['GISAID_fields', 'gisaid_csv_headers', i],
        });
      }
      headers.add(header);
    });
    for (const section of ['field_map', 'fixed_fields'] as const) {
      for (const header of Object.keys(gisaid[section])) {
        if (!headers.has(header)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown GISAID header: ${header}`,
            path: ['GISAID_fields', section, header],
          });
        }
      }
    }
  });

export type MappingConfigurationDocument = z.infer<typeof mappingConfigurationDocumentSchema>;
export type FieldVariantsDocument = z.infer<typeof fieldVariantsSchema>;

export function formatZodError(err: z.ZodError, label = 'configuration.json'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid ${label}:\n${issues}`;
}
