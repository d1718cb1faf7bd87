/**
 * Command-line argument helpers
 */

import { MappingError, isTargetSchema, type TargetSchema } from '@relecov-mapper/core';

/** Value following `name`, unless it is missing or another flag */
export function option(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  return value !== undefined && !value.startsWith('--') ? value : undefined;
}

export function parseTargets(value: string | undefined): TargetSchema[] | undefined {
  if (value === undefined) return undefined;
  const targets: TargetSchema[] = [];
  for (const part of value.split(',')) {
    const target = part.trim().toLowerCase();
    if (!isTargetSchema(target)) {
      throw new MappingError({
        code: 'CONFIGURATION_ERROR',
        message: `Unknown target "${part}"`,
        suggestion: 'Use a comma-separated list of relecov, ena and gisaid.',
      });
    }
    if (!targets.includes(target)) targets.push(target);
  }
  return targets;
}
