import type { DimensionDefinition, DimensionVersion } from '../dimensions/types.js';

/** A trimmed customer dimension covering every attribute type. */
export const customerDefinition: DimensionDefinition = {
  dimension_id: 'customer',
  schema: 'banking_dw',
  table: 'dim_customer',
  surrogate_key_column: 'customer_sk',
  natural_key_column: 'customer_nk',
  attributes: [
    { name: 'full_name', type: 'string', tracked_as: 'TYPE1' },
    { name: 'risk_rating', type: 'code', tracked_as: 'TYPE2' },
    { name: 'branch_sk', type: 'integer', tracked_as: 'TYPE2' },
    { name: 'relationship_tenure_yrs', type: 'decimal', tracked_as: 'TYPE1' },
    { name: 'pep_flag', type: 'boolean', tracked_as: 'TYPE2' },
    { name: 'kyc_expiry_date', type: 'date', tracked_as: 'TYPE1' },
  ],
};

export const geographyDefinition: DimensionDefinition = {
  dimension_id: 'geography',
  schema: 'banking_dw',
  table: 'dim_geography',
  surrogate_key_column: 'geography_sk',
  natural_key_column: 'country_code',
  attributes: [
    { name: 'country_name', type: 'string', tracked_as: 'TYPE1' },
    { name: 'aml_risk_rating', type: 'code', tracked_as: 'TYPE2' },
    { name: 'fatf_grey_list', column: 'fatf_grey_list_flag', type: 'boolean', tracked_as: 'TYPE2' },
  ],
};

/** Collateral slice with column facets declared, as in config/dimensions.yaml. */
export const collateralDefinition: DimensionDefinition = {
  dimension_id: 'collateral',
  schema: 'banking_dw',
  table: 'dim_collateral',
  surrogate_key_column: 'collateral_sk',
  natural_key_column: 'collateral_nk',
  natural_key_max_length: 12,
  attributes: [
    { name: 'collateral_description', type: 'string', tracked_as: 'TYPE1', max_length: 20 },
    { name: 'location_country_sk', type: 'integer', tracked_as: 'TYPE2', bits: 32 },
    { name: 'market_value', type: 'decimal', tracked_as: 'TYPE2', precision: 20, scale: 2 },
    {
      name: 'status',
      type: 'code',
      tracked_as: 'TYPE2',
      max_length: 20,
      values: ['ACTIVE', 'RELEASED', 'IMPAIRED', 'DISPOSED'],
    },
  ],
};

export function customerVersion(overrides: Partial<DimensionVersion> = {}): DimensionVersion {
  return {
    surrogate_key: 1,
    natural_key: 'C001',
    attributes: {
      full_name: 'Ana Silva',
      risk_rating: 'LOW',
      branch_sk: 10,
      relationship_tenure_yrs: '3.5',
      pep_flag: false,
      kyc_expiry_date: '2026-01-31',
    },
    effective_from: '2024-01-01',
    effective_to: null,
    is_current: true,
    ...overrides,
  };
}
