import {
  DEFAULT_SERVING_WEIGHT_KG,
  GRAMS_PER_KG,
  KWH_PER_MWH,
  RESULT_DECIMALS,
  SERVING_WEIGHTS_KG,
} from '../constants/emissionFactors';
import { InvalidArgumentError } from '../lib/errors';

/**
 * Rounds the exact binary value half-to-even. Scaling first (`value * 1000`)
 * would push values just below a tie onto it.
 */
export function roundTo(value: number, decimals: number = RESULT_DECIMALS): number {
  const rounded = Number(value.toFixed(decimals));
  // Exact ties are the values where value * 2^(decimals + 1) is an odd integer;
  // toFixed sends those away from zero
  const halfSteps = value * 2 ** (decimals + 1);
  if (!Number.isInteger(halfSteps) || Math.abs(halfSteps % 2) !== 1) return rounded;

  const scale = 10 ** decimals;
  const units = Math.round(rounded * scale);
  return units % 2 === 0 ? rounded : (units - Math.sign(units)) / scale;
}

/**
 * Converts an energy amount to kWh. Only kWh (or "kw") and MWh are accepted.
 */
export function toKwh(amount: number, unit: string): number {
  const normalized = unit.toLowerCase();
  if (normalized === 'mwh') return amount * KWH_PER_MWH;
  if (normalized === 'kwh' || normalized === 'kw') return amount;
  throw new InvalidArgumentError(`Unsupported energy unit: ${unit}`);
}

export function servingWeightKg(foodItem: string): number {
  return Object.hasOwn(SERVING_WEIGHTS_KG, foodItem) ? SERVING_WEIGHTS_KG[foodItem] : DEFAULT_SERVING_WEIGHT_KG;
}

/**
 * Converts a food amount to kg.
 * Unrecognized units are taken as kg, unlike energy units which are rejected.
 */
export function toFoodKg(amount: number, unit: string, foodItem: string): number {
  const normalized = unit.toLowerCase();
  if (normalized === 'g') return amount / GRAMS_PER_KG;
  if (normalized === 'servings') return amount * servingWeightKg(foodItem);
  return amount;
}

export function assertNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`${field} must be a non-negative number, got ${value}`);
  }
}
