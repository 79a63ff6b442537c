import { describe, it, expect } from 'vitest';
import { deriveEndpointName, normalizeProperty } from '../../../../src/services/endpoint/naming.js';

describe('deriveEndpointName', () => {
  it('joins the slugged property and unit', () => {
    expect(deriveEndpointName('350 S Harper', '1')).toBe('350-s-harper-1');
  });

  it('trims and collapses whitespace', () => {
    expect(deriveEndpointName('  350  S Harper ', ' 12B ')).toBe('350-s-harper-12b');
  });

  it('is stable for the same inputs', () => {
    expect(deriveEndpointName('Elm Court', '4')).toBe(deriveEndpointName('elm court', '4'));
  });
});

describe('normalizeProperty', () => {
  it('matches the slug used in endpoint names', () => {
    expect(normalizeProperty('350 S Harper')).toBe('350-s-harper');
  });
});
