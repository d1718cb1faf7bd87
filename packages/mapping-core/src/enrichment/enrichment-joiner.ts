/**
 * Enrichment Joiner
 *
 * Joins a record against read-only reference tables (laboratory address,
 * city coordinates, specimen source breakdown) on one of its fields.
 */

import type {
  EnrichmentSpec,
  ReferenceTable,
  SampleRecord,
} from '@relecov-mapper/core';
import { fieldValueToString, getField, hasField } from '@relecov-mapper/core';
import type { EnrichmentMiss, ReferenceUnavailable } from '../types/index.js';

export interface EnrichmentResult {
  record: SampleRecord;
  miss?: EnrichmentMiss;
}

export interface EnrichAllResult {
  record: SampleRecord;
  misses: EnrichmentMiss[];
  unavailable: ReferenceUnavailable[];
}

export class EnrichmentJoiner {
  /**
   * Import the reference row matching the record's join value. On a miss the
   * enrichment defaults fill only fields the record does not already hold.
   */
  enrich(
    record: Readonly<SampleRecord>,
    spec: EnrichmentSpec,
    table: ReferenceTable
  ): EnrichmentResult {
    const joinValue = getField(record, spec.joinField);
    const key =
      joinValue === undefined || joinValue === '' ? undefined : fieldValueToString(joinValue);
    const row = key === undefined ? undefined : table.get(key);

    if (!row) {
      const next: SampleRecord = { ...record };
      let defaultsApplied = false;
      for (const [field, value] of Object.entries(spec.defaults ?? {})) {
        if (hasField(next, field)) continue;
        next[field] = value;
        defaultsApplied = true;
      }
      return {
        record: next,
        miss: {
          kind: 'enrichment-miss',
          severity: 'warning',
          spec: spec.name,
          dataset: spec.dataset,
          joinField: spec.joinField,
          reason: key === undefined ? 'join-field-absent' : 'key-not-found',
          ...(key !== undefined ? { key } : {}),
          defaultsApplied,
        },
      };
    }

    const next: SampleRecord = { ...record };
    if (spec.fieldImport.kind === 'all') {
      Object.assign(next, row);
    } else {
      for (const field of spec.fieldImport.fields) {
        if (hasField(row, field)) {
          next[field] = row[field];
        }
      }
    }
    return { record: next };
  }

  /**
   * Apply every spec in declaration order; later joins see fields imported
   * by earlier ones. Specs whose dataset is not in `tables` are skipped and
   * reported as unavailable.
   */
  enrichAll(
    record: Readonly<SampleRecord>,
    specs: readonly EnrichmentSpec[],
    tables: ReadonlyMap<string, ReferenceTable>
  ): EnrichAllResult {
    let current: SampleRecord = { ...record };
    const misses: EnrichmentMiss[] = [];
    const unavailable: ReferenceUnavailable[] = [];

    for (const spec of specs) {
      const table = tables.get(spec.dataset);
      if (!table) {
        unavailable.push({
          kind: 'reference-unavailable',
          severity: 'warning',
          spec: spec.name,
          dataset: spec.dataset,
        });
        continue;
      }

      const result = this.enrich(current, spec, table);
      current = result.record;
      if (result.miss) misses.push(result.miss);
    }

    return { record: current, misses, unavailable };
  }
}
