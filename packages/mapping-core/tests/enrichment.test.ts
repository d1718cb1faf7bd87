import { describe, expect, it } from 'vitest';
import type { EnrichmentSpec, ReferenceTable } from '@relecov-mapper/core';
import { EnrichmentJoiner } from '../src/index.js';
import { referenceTables, testConfiguration } from './fixtures.js';

const specs = testConfiguration().labMetadata.enrichments;

describe('EnrichmentJoiner', () => {
  const joiner = new EnrichmentJoiner();

  it('chains joins in declaration order', () => {
    const result = joiner.enrichAll(
      { collecting_institution: 'Hospital Uno', specimen_source: 'Nasopharynx Swab' },
      specs,
      referenceTables()
    );

    expect(result.record).toEqual({
      collecting_institution: 'Hospital Uno',
      specimen_source: 'Nasopharynx Swab',
      geo_loc_city: 'Madrid',
      collecting_institution_email: 'lab@hospital-uno.example',
      latitude: 40.4168,
      longitude: -3.7038,
      anatomical_material: 'Nasopharynx',
      anatomical_part: 'Nasopharynx',
      collection_method: 'Swab',
    });
    expect(result.misses).toEqual([]);
    expect(result.unavailable).toEqual([]);
  });

  it('reports misses without failing and applies defaults where configured', () => {
    const input = { collecting_institution: 'Unknown Lab', specimen_source: 'Saliva' };
    const result = joiner.enrichAll(input, specs, referenceTables());

    expect(result.record).toEqual({
      collecting_institution: 'Unknown Lab',
      specimen_source: 'Saliva',
      anatomical_material: 'Not Provided',
    });
    expect(result.misses).toEqual([
      {
        kind: 'enrichment-miss',
        severity: 'warning',
        spec: 'laboratory_data',
        dataset: 'labs.json',
        joinField: 'collecting_institution',
        reason: 'key-not-found',
        key: 'Unknown Lab',
        defaultsApplied: false,
      },
      {
        kind: 'enrichment-miss',
        severity: 'warning',
        spec: 'geo_location',
        dataset: 'cities.json',
        joinField: 'geo_loc_city',
        reason: 'join-field-absent',
        defaultsApplied: false,
      },
      {
        kind: 'enrichment-miss',
        severity: 'warning',
        spec: 'specimen',
        dataset: 'specimens.json',
        joinField: 'specimen_source',
        reason: 'key-not-found',
        key: 'Saliva',
        defaultsApplied: true,
      },
    ]);
    expect(input).toEqual({ collecting_institution: 'Unknown Lab', specimen_source: 'Saliva' });
  });

  it('fills defaults only where the record has no value yet', () => {
    const specimen = specs.find((spec) => spec.name === 'specimen');
    if (!specimen) throw new Error('fixture has no specimen enrichment');

    const result = joiner.enrich(
      { specimen_source: 'Saliva', anatomical_material: 'Oral cavity' },
      specimen,
      tableFor('specimens.json')
    );

    expect(result.record).toEqual({ specimen_source: 'Saliva', anatomical_material: 'Oral cavity' });
    expect(result.miss).toMatchObject({ reason: 'key-not-found', key: 'Saliva', defaultsApplied: false });
  });

  it('treats an empty join value as absent', () => {
    const [laboratory] = specs;
    if (!laboratory) throw new Error('fixture has no enrichment specs');

    const result = joiner.enrich({ collecting_institution: '' }, laboratory, tableFor('labs.json'));

    expect(result.record).toEqual({ collecting_institution: '' });
    expect(result.miss?.reason).toBe('join-field-absent');
  });

  it('imports only subset fields the row has', () => {
    const spec: EnrichmentSpec = {
      name: 'laboratory_city',
      dataset: 'labs.json',
      joinField: 'collecting_institution',
      fieldImport: { kind: 'subset', fields: ['geo_loc_state', 'postal_code'] },
    };

    const result = joiner.enrich(
      { collecting_institution: 'Hospital Uno' },
      spec,
      tableFor('labs.json')
    );

    expect(result.record).toEqual({ collecting_institution: 'Hospital Uno', geo_loc_state: 'Madrid' });
    expect(result.miss).toBeUndefined();
  });

  it('skips specs whose dataset did not load', () => {
    const tables = referenceTables();
    tables.delete('cities.json');

    const result = joiner.enrichAll({ collecting_institution: 'Hospital Uno' }, specs, tables);

    expect(result.record.geo_loc_city).toBe('Madrid');
    expect(result.record).not.toHaveProperty('latitude');
    expect(result.unavailable).toEqual([
      { kind: 'reference-unavailable', severity: 'warning', spec: 'geo_location', dataset: 'cities.json' },
    ]);
  });
});

function tableFor(dataset: string): ReferenceTable {
  const table = referenceTables().get(dataset);
  if (!table) throw new Error(`fixture has no ${dataset} table`);
  return table;
}
