/**
 * FieldMapper
 *
 * Maps a raw lab record (spreadsheet or JSON row keyed by whatever header
 * the lab used) onto canonical field names.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type {
  FieldRenameEntry,
  FieldRenameTable,
  FieldValue,
  MappingConfiguration,
  RawRecord,
  SampleRecord,
} from '@relecov-mapper/core';
import { toFieldValue } from '@relecov-mapper/core';
import type { FieldMappingMiss, UnrecognizedHeader } from '../types/index.js';

/** Minimum normalized similarity for a header suggestion */
const SUGGESTION_THRESHOLD = 0.7;

export interface FieldMappingResult {
  record: SampleRecord;
  misses: FieldMappingMiss[];
  unrecognized: UnrecognizedHeader[];
}

function similarity(a: string, b: string): number {
  if (a === b) return 1;
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 0;
  return 1 - levenshteinDistance(a, b) / maxLen;
}

/**
 * Every header an entry accepts: its variants in priority order, then the
 * canonical name itself, so mapping an already-canonical record is a no-op.
 */
export function acceptedHeaders(entry: FieldRenameEntry): readonly string[] {
  return entry.variants.includes(entry.canonical)
    ? entry.variants
    : [...entry.variants, entry.canonical];
}

/**
 * Rename table for a submitting institution. Its variants take priority over
 * the shared ones; canonical fields only it knows are appended.
 */
export function resolveRenameTable(
  config: MappingConfiguration,
  institution?: string
): FieldRenameTable {
  const base = config.labMetadata.renameTable;
  const override = institution ? config.institutionRenameOverrides[institution] : undefined;
  if (!override) return base;

  const extra = new Map(override.map((entry) => [entry.canonical, entry.variants]));
  const merged: FieldRenameEntry[] = base.map((entry) => {
    const variants = extra.get(entry.canonical);
    if (!variants) return entry;
    extra.delete(entry.canonical);
    return {
      canonical: entry.canonical,
      variants: [...new Set([...variants, ...entry.variants])],
    };
  });
  for (const [canonical, variants] of extra) {
    merged.push({ canonical, variants });
  }
  return merged;
}

export class FieldMapper {
  /**
   * Produce a record keyed by canonical names. For each canonical field the
   * first accepted header present in the raw record wins; a field with no
   * matching header is reported as a miss and left absent.
   */
  mapFields(raw: Readonly<RawRecord>, renameTable: FieldRenameTable): FieldMappingResult {
    const record: SampleRecord = {};
    const misses: FieldMappingMiss[] = [];
    const known = new Set<string>();

    for (const entry of renameTable) {
      const headers = acceptedHeaders(entry);
      headers.forEach((header) => known.add(header));

      const header = headers.find((h) => Object.prototype.hasOwnProperty.call(raw, h));
      if (header === undefined) {
        misses.push({
          kind: 'field-mapping-miss',
          severity: 'info',
          field: entry.canonical,
          reason: 'no-header',
        });
        continue;
      }

      const value = toFieldValue(raw[header]);
      if (value === undefined) {
        misses.push({
          kind: 'field-mapping-miss',
          severity: 'info',
          field: entry.canonical,
          reason: 'unusable-value',
          header,
        });
        continue;
      }
      record[entry.canonical] = value;
    }

    const unrecognized = Object.keys(raw)
      .filter((header) => !known.has(header))
      .map((header) => this.describeUnrecognized(header, known));

    return { record, misses, unrecognized };
  }

  /**
   * Overlay fixed values. Fixed fields always win over lab-supplied values.
   */
  applyFixedFields(
    record: Readonly<SampleRecord>,
    fixedFields: Readonly<{ [field: string]: FieldValue }>
  ): SampleRecord {
    return { ...record, ...fixedFields };
  }

  /**
   * Closest accepted header, compared case-insensitively
   */
  suggestHeader(header: string, candidates: Iterable<string>): string | undefined {
    const needle = header.trim().toLowerCase();
    let best: string | undefined;
    let bestScore = SUGGESTION_THRESHOLD;

    for (const candidate of candidates) {
      const score = similarity(needle, candidate.toLowerCase());
      if (score >= bestScore && (best === undefined || score > bestScore)) {
        best = candidate;
        bestScore = score;
      }
    }
    return best;
  }

  private describeUnrecognized(header: string, known: ReadonlySet<string>): UnrecognizedHeader {
    const suggestion = this.suggestHeader(header, known);
    return {
      kind: 'unrecognized-header',
      severity: 'warning',
      header,
      ...(suggestion !== undefined ? { suggestion } : {}),
    };
  }
}
