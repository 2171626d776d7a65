/**
 * Carbon Calculator
 *
 * Converts activities into kg CO2e by looking up a factor in the loaded
 * table, normalizing the quantity to the factor's unit, applying the
 * category's adjustment and rounding to 3 decimals.
 *
 * All calculate* methods are synchronous and side-effect free; only the
 * flight distance lookup goes through the (async) distance provider.
 */

import { LOCAL_FOOD_FACTOR_MULTIPLIER } from '../constants/emissionFactors';
import { DistanceLookupError, InvalidArgumentError } from '../lib/errors';
import { DetailValue, EmissionCategory, EmissionFactorTable, EmissionResult } from '../types/emission';
import { classifyFlightDistance } from '../utils/flight';
import { assertNonNegative, roundTo, toFoodKg, toKwh } from '../utils/units';
import { DistanceProvider } from './distanceProvider';
import { getCategoryFactors, lookupFactor } from './factorLoader';

export interface CarbonCalculatorOptions {
  factors: EmissionFactorTable;
  distanceProvider?: DistanceProvider;
}

function buildResult(
  co2Kg: number,
  category: EmissionCategory,
  subcategory: string,
  activity: string,
  details: Record<string, DetailValue>
): EmissionResult {
  return Object.freeze({
    co2_kg: roundTo(co2Kg),
    category,
    subcategory,
    activity,
    details: Object.freeze(details),
  });
}

export class CarbonCalculator {
  private readonly factors: EmissionFactorTable;
  private readonly distanceProvider?: DistanceProvider;

  constructor(options: CarbonCalculatorOptions) {
    this.factors = options.factors;
    this.distanceProvider = options.distanceProvider;
  }

  calculateTransportation(
    transportType: string,
    fuelType: string,
    distanceKm: number,
    passengers: number = 1
  ): EmissionResult {
    const factor = lookupFactor(this.factors, ['transportation', transportType, fuelType]);
    assertNonNegative(distanceKm, 'distance_km');
    if (!Number.isFinite(passengers) || passengers < 1) {
      throw new InvalidArgumentError(`passengers must be at least 1, got ${passengers}`);
    }

    return buildResult(factor * distanceKm / passengers, 'transportation', transportType, `${transportType}_${fuelType}`, {
      distance_km: distanceKm,
      fuel_type: fuelType,
      passengers,
      emission_factor: factor,
    });
  }

  calculateEnergy(energyType: string, source: string, amount: number, unit: string = 'kwh'): EmissionResult {
    const factor = lookupFactor(this.factors, ['energy', energyType, source]);
    assertNonNegative(amount, 'amount');
    const amountKwh = toKwh(amount, unit);

    return buildResult(factor * amountKwh, 'energy', energyType, `${energyType}_${source}`, {
      amount: amountKwh,
      unit,
      source,
      emission_factor: factor,
    });
  }

  calculateFood(
    foodType: string,
    foodItem: string,
    amount: number,
    unit: string = 'kg',
    local: boolean = false
  ): EmissionResult {
    const baseFactor = lookupFactor(this.factors, ['food', foodType, foodItem]);
    assertNonNegative(amount, 'amount');
    const amountKg = toFoodKg(amount, unit, foodItem);
    const factor = local ? baseFactor * LOCAL_FOOD_FACTOR_MULTIPLIER : baseFactor;

    return buildResult(factor * amountKg, 'food', foodType, foodItem, {
      amount: amountKg,
      unit,
      local,
      emission_factor: factor,
    });
  }

  /**
   * Embodied emissions of purchased goods. With `lifetimeYears` the
   * per-item factor is spread over the years of use (kg CO2e per year).
   */
  calculateConsumption(
    itemType: string,
    item: string,
    quantity: number = 1,
    lifetimeYears: number | null = null
  ): EmissionResult {
    const baseFactor = lookupFactor(this.factors, ['consumption', itemType, item]);
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new InvalidArgumentError(`quantity must be a non-negative integer, got ${quantity}`);
    }
    if (lifetimeYears !== null && (!Number.isFinite(lifetimeYears) || lifetimeYears <= 0)) {
      throw new InvalidArgumentError(`lifetime_years must be positive, got ${lifetimeYears}`);
    }
    const factor = lifetimeYears === null ? baseFactor : baseFactor / lifetimeYears;

    return buildResult(factor * quantity, 'consumption', itemType, item, {
      quantity,
      lifetime_years: lifetimeYears,
      emission_factor: factor,
    });
  }

  calculateWaste(disposalMethod: string, amountKg: number): EmissionResult {
    const factor = lookupFactor(this.factors, ['waste', disposalMethod]);
    assertNonNegative(amountKg, 'amount_kg');

    return buildResult(factor * amountKg, 'waste', disposalMethod, disposalMethod, {
      amount_kg: amountKg,
      disposal_method: disposalMethod,
      emission_factor: factor,
    });
  }

  /**
   * Flight emissions for a known distance. Passengers stay at 1: flight
   * factors are already per-passenger averages.
   */
  calculateFlight(distanceKm: number): EmissionResult {
    return this.calculateTransportation('flight', classifyFlightDistance(distanceKm), distanceKm, 1);
  }

  async estimateFlightDistance(origin: string, destination: string): Promise<number> {
    if (!this.distanceProvider) {
      throw new DistanceLookupError('No distance provider configured');
    }
    return this.distanceProvider.resolveDistance(origin, destination);
  }

  async calculateFlightBetween(origin: string, destination: string): Promise<EmissionResult> {
    const distanceKm = await this.estimateFlightDistance(origin, destination);
    return this.calculateFlight(distanceKm);
  }

  getCategoryFactors(category: string): Readonly<Record<string, unknown>> {
    return getCategoryFactors(this.factors, category);
  }

  listCategories(): string[] {
    return Object.keys(this.factors);
  }
}
