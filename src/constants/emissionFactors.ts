import { FlightClass } from '../types/emission';

// Approximate portion sizes in kg
export const SERVING_WEIGHTS_KG: Readonly<Record<string, number>> = {
  beef: 0.15,
  chicken: 0.12,
  milk: 0.25,
};

export const DEFAULT_SERVING_WEIGHT_KG = 0.1;

// Locally produced food: 15% lower factor
export const LOCAL_FOOD_FACTOR_MULTIPLIER = 0.85;

export const KWH_PER_MWH = 1000;

export const GRAMS_PER_KG = 1000;

/**
 * Upper bounds (exclusive, km) for each flight class, checked in order.
 * Anything past the last bound is international.
 */
export const FLIGHT_CLASS_BREAKPOINTS_KM: ReadonlyArray<{ maxKm: number; flightClass: FlightClass }> = [
  { maxKm: 1000, flightClass: 'domestic_short' },
  { maxKm: 3000, flightClass: 'domestic_long' },
];

export const RESULT_DECIMALS = 3;
