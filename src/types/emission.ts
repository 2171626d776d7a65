export type EmissionCategory = 'transportation' | 'energy' | 'food' | 'consumption' | 'waste';

export type FlightClass = 'domestic_short' | 'domestic_long' | 'international';

/**
 * Nested factor document: category → subcategory → key → factor,
 * except waste which is category → method → factor.
 * Only the top level is checked on load; lookups narrow the rest.
 */
export type EmissionFactorTable = Readonly<Record<string, unknown>>;

export type DetailValue = string | number | boolean | null;

export interface EmissionResult {
  readonly co2_kg: number; // kg CO2e, rounded to 3 decimals
  readonly category: EmissionCategory;
  readonly subcategory: string;
  readonly activity: string;
  readonly details: Readonly<Record<string, DetailValue>>;
}

/**
 * Row shape of the emission_results table
 */
export interface EmissionRecord {
  id: string;
  category: string;
  subcategory: string;
  activity: string;
  co2_kg: number;
  details: Record<string, DetailValue>;
  created_at: string;
}
