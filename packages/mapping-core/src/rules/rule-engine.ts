/**
 * Post-Processing Rule Engine
 *
 * Derives fields from other fields: exact and substring lookups on a
 * trigger field, and plain copies. Rules run in declaration order and each
 * one sees the fields set by the rules before it.
 */

import type { DerivationRule, FieldValue, SampleRecord } from '@relecov-mapper/core';
import { fieldValueToString, getField } from '@relecov-mapper/core';

/** A field assignment produced by one rule */
export interface FieldUpdate {
  field: string;
  value: FieldValue;
}

export interface RuleTrace {
  record: SampleRecord;
  /** Rules that wrote a field, in application order */
  fired: DerivationRule[];
}

export class RuleEngine {
  /**
   * Evaluate a single rule. Returns null when it does not fire: trigger or
   * source absent, or trigger value not matching.
   */
  evaluate(rule: DerivationRule, record: Readonly<SampleRecord>): FieldUpdate | null {
    switch (rule.kind) {
      case 'exact': {
        const trigger = getField(record, rule.triggerField);
        if (trigger === undefined || fieldValueToString(trigger) !== rule.triggerValue) {
          return null;
        }
        return { field: rule.outputField, value: rule.outputValue };
      }

      case 'substring': {
        const trigger = getField(record, rule.triggerField);
        if (trigger === undefined || !fieldValueToString(trigger).includes(rule.triggerValue)) {
          return null;
        }
        return { field: rule.outputField, value: rule.outputValue };
      }

      case 'copy': {
        const source = getField(record, rule.sourceField);
        return source === undefined ? null : { field: rule.outputField, value: source };
      }
    }
  }

  /**
   * Apply rules in order and report which ones fired
   */
  trace(record: Readonly<SampleRecord>, rules: readonly DerivationRule[]): RuleTrace {
    const next: SampleRecord = { ...record };
    const fired: DerivationRule[] = [];

    for (const rule of rules) {
      const update = this.evaluate(rule, next);
      if (update) {
        next[update.field] = update.value;
        fired.push(rule);
      }
    }

    return { record: next, fired };
  }

  applyRules(record: Readonly<SampleRecord>, rules: readonly DerivationRule[]): SampleRecord {
    return this.trace(record, rules).record;
  }
}
