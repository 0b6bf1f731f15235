import { describe, it, expect } from 'vitest';
import { detectChange } from './change-detector.js';
import { decodeStoredValue, normalizeAttributes } from './attribute-normalizer.js';
import { collateralDefinition, customerDefinition, customerVersion } from '../testing/fixtures.js';

describe('ChangeDetector', () => {
  const current = customerVersion();

  it('should report NEW_ENTITY when there is no current version', () => {
    const detection = detectChange(customerDefinition, null, current.attributes);

    expect(detection.verdict).toBe('NEW_ENTITY');
    expect(detection.changed).toEqual({ type1: [], type2: [] });
  });

  it('should report NO_CHANGE for identical attributes', () => {
    const detection = detectChange(customerDefinition, current, { ...current.attributes });

    expect(detection.verdict).toBe('NO_CHANGE');
  });

  it('should report TYPE1_UPDATE when only TYPE1 attributes differ', () => {
    const detection = detectChange(customerDefinition, current, {
      ...current.attributes,
      full_name: 'Ana M. Silva',
      kyc_expiry_date: '2027-01-31',
    });

    expect(detection.verdict).toBe('TYPE1_UPDATE');
    expect(detection.changed).toEqual({ type1: ['full_name', 'kyc_expiry_date'], type2: [] });
  });

  it('should let a TYPE2 difference win over TYPE1 differences', () => {
    const detection = detectChange(customerDefinition, current, {
      ...current.attributes,
      full_name: 'Ana M. Silva',
      risk_rating: 'HIGH',
    });

    expect(detection.verdict).toBe('TYPE2_VERSION');
    expect(detection.changed).toEqual({ type1: ['full_name'], type2: ['risk_rating'] });
  });

  it('should treat null versus populated as a difference', () => {
    const detection = detectChange(customerDefinition, current, {
      ...current.attributes,
      branch_sk: null,
    });

    expect(detection.verdict).toBe('TYPE2_VERSION');
    expect(detection.changed.type2).toEqual(['branch_sk']);
  });

  it('should report NO_CHANGE when an over-scale decimal is loaded again', () => {
    const incoming = { market_value: '1000.005', status: 'active' };
    const first = normalizeAttributes(collateralDefinition, incoming);
    const stored = {
      ...first,
      // as NUMERIC(20,2) returns it
      market_value: decodeStoredValue(collateralDefinition.attributes[2], '1000.01'),
    };
    const loaded = {
      surrogate_key: 1,
      natural_key: 'COL-1',
      attributes: stored,
      effective_from: '2024-01-01',
      effective_to: null,
      is_current: true,
    };

    const again = detectChange(collateralDefinition, loaded, normalizeAttributes(collateralDefinition, incoming));

    expect(first.market_value).toBe('1000.01');
    expect(again.verdict).toBe('NO_CHANGE');
  });
});
