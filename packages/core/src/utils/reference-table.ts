/**
 * In-memory ReferenceTable implementation
 */

import type { FieldValue, ReferenceTable, SampleRecord } from '../types/index.js';
import { deepFreeze } from './freeze.js';

class FrozenReferenceTable implements ReferenceTable {
  private readonly rows: ReadonlyMap<string, Readonly<SampleRecord>>;

  constructor(
    readonly id: string,
    rows: Map<string, SampleRecord>
  ) {
    for (const row of rows.values()) deepFreeze(row);
    this.rows = rows;
  }

  get size(): number {
    return this.rows.size;
  }

  get(key: string): Readonly<SampleRecord> | undefined {
    return this.rows.get(key);
  }

  has(key: string): boolean {
    return this.rows.has(key);
  }

  keys(): Iterable<string> {
    return this.rows.keys();
  }
}

/**
 * Build a read-only table. Callers are responsible for rejecting duplicate
 * keys before this point; later entries replace earlier ones here.
 */
export function createReferenceTable(
  id: string,
  entries: Iterable<[string, { readonly [field: string]: FieldValue }]>
): ReferenceTable {
  const rows = new Map<string, SampleRecord>();
  for (const [key, row] of entries) {
    rows.set(key, { ...row });
  }
  return new FrozenReferenceTable(id, rows);
}
