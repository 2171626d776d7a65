/**
 * Tests for the Carbon Calculator
 *
 * Tests cover:
 * - One operation per activity category
 * - Unit normalization and adjustments (local food, amortization)
 * - Error taxonomy (unknown factors, invalid arguments)
 * - Flight classification and the distance provider seam
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { CarbonCalculator } from '../src/services/carbonCalculator';
import { DistanceProvider } from '../src/services/distanceProvider';
import { createDefaultEmissionFactors, getCategoryFactors } from '../src/services/factorLoader';
import { DistanceLookupError, InvalidArgumentError, UnknownFactorError } from '../src/lib/errors';
import { roundTo } from '../src/utils/units';

describe('CarbonCalculator', () => {
  let calculator: CarbonCalculator;

  beforeEach(() => {
    calculator = new CarbonCalculator({ factors: createDefaultEmissionFactors() });
  });

  describe('calculateTransportation', () => {
    it('should split car emissions across passengers', () => {
      const result = calculator.calculateTransportation('car', 'petrol', 100, 2);

      expect(result.co2_kg).toBeCloseTo(20.2, 3);
      expect(result.category).toBe('transportation');
      expect(result.subcategory).toBe('car');
      expect(result.activity).toBe('car_petrol');
      expect(result.details).toEqual({
        distance_km: 100,
        fuel_type: 'petrol',
        passengers: 2,
        emission_factor: 0.404,
      });
    });

    it('should default to a single passenger', () => {
      const result = calculator.calculateTransportation('public_transport', 'train', 250);

      expect(result.details.passengers).toBe(1);
      expect(result.co2_kg).toBeCloseTo(10.25, 3);
    });

    it('should return zero for zero-emission modes', () => {
      const result = calculator.calculateTransportation('other', 'walking', 12);
      expect(result.co2_kg).toBe(0);
    });

    it('should reject zero passengers instead of dividing by zero', () => {
      expect(() => calculator.calculateTransportation('car', 'diesel', 50, 0)).toThrow(InvalidArgumentError);
      expect(() => calculator.calculateTransportation('car', 'diesel', 50, -1)).toThrow(InvalidArgumentError);
    });

    it('should reject a negative distance', () => {
      expect(() => calculator.calculateTransportation('car', 'diesel', -5)).toThrow(InvalidArgumentError);
    });

    it('should report the full key path of an unknown factor', () => {
      expect.assertions(2);
      try {
        calculator.calculateTransportation('hoverboard', 'plasma', 50);
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownFactorError);
        if (error instanceof UnknownFactorError) {
          expect(error.keyPath).toEqual(['transportation', 'hoverboard', 'plasma']);
        }
      }
    });
  });

  describe('calculateEnergy', () => {
    it('should multiply kWh by the source factor', () => {
      const result = calculator.calculateEnergy('electricity', 'grid_average', 250);

      expect(result.co2_kg).toBeCloseTo(114.25, 3);
      expect(result.subcategory).toBe('electricity');
      expect(result.activity).toBe('electricity_grid_average');
      expect(result.details).toEqual({
        amount: 250,
        unit: 'kwh',
        source: 'grid_average',
        emission_factor: 0.457,
      });
    });

    it('should convert MWh to kWh and keep the original unit string', () => {
      const result = calculator.calculateEnergy('electricity', 'grid_average', 0.5, 'MWh');

      expect(result.details.amount).toBe(500);
      expect(result.details.unit).toBe('MWh');
      expect(result.co2_kg).toBeCloseTo(228.5, 3);
    });

    it('should accept "kW" as kWh', () => {
      const result = calculator.calculateEnergy('heating', 'natural_gas', 100, 'kW');
      expect(result.co2_kg).toBeCloseTo(18.5, 3);
    });

    it('should reject unsupported units', () => {
      expect(() => calculator.calculateEnergy('electricity', 'grid_average', 100, 'joules')).toThrow(
        'Unsupported energy unit: joules'
      );
      expect(() => calculator.calculateEnergy('electricity', 'grid_average', 100, 'joules')).toThrow(
        InvalidArgumentError
      );
    });

    it('should fail on an unknown source before checking the unit', () => {
      expect(() => calculator.calculateEnergy('electricity', 'fusion', 100, 'joules')).toThrow(UnknownFactorError);
    });
  });

  describe('calculateFood', () => {
    it('should multiply kilograms by the item factor', () => {
      const result = calculator.calculateFood('meat', 'beef', 0.5, 'kg');

      expect(result.co2_kg).toBeCloseTo(13.5, 3);
      expect(result.activity).toBe('beef');
      expect(result.details.unit).toBe('kg');
      expect(result.details.local).toBe(false);
    });

    it('should apply serving weights and the local discount to the recorded factor', () => {
      const result = calculator.calculateFood('meat', 'beef', 2, 'servings', true);

      expect(result.co2_kg).toBeCloseTo(0.3 * 27.0 * 0.85, 2);
      expect(result.details.local).toBe(true);
      expect(result.details.amount).toBeCloseTo(0.3, 10);
      expect(result.details.emission_factor).toBeCloseTo(22.95, 10);
    });

    it('should convert grams case-insensitively', () => {
      const result = calculator.calculateFood('meat', 'chicken', 250, 'G');

      expect(result.details.amount).toBe(0.25);
      expect(result.details.unit).toBe('G');
      expect(result.co2_kg).toBeCloseTo(2.475, 2);
    });

    it('should use the default serving weight for unlisted items', () => {
      const result = calculator.calculateFood('processed', 'rice', 3, 'servings');

      expect(result.details.amount).toBeCloseTo(0.3, 10);
      expect(result.co2_kg).toBeCloseTo(0.81, 3);
    });

    it('should use the milk serving weight', () => {
      const result = calculator.calculateFood('dairy', 'milk', 2, 'servings');
      expect(result.co2_kg).toBeCloseTo(1.6, 3);
    });

    it('should treat unrecognized units as kilograms', () => {
      const result = calculator.calculateFood('processed', 'rice', 2, 'cups');

      expect(result.details.amount).toBe(2);
      expect(result.co2_kg).toBeCloseTo(5.4, 3);
    });

    it('should reject unknown items', () => {
      expect(() => calculator.calculateFood('meat', 'unicorn', 1)).toThrow(UnknownFactorError);
    });
  });

  describe('calculateConsumption', () => {
    it('should amortise embodied emissions over the lifetime', () => {
      const result = calculator.calculateConsumption('electronics', 'smartphone', 1, 5);

      expect(result.co2_kg).toBeCloseTo(14.0, 3);
      expect(result.activity).toBe('smartphone');
      expect(result.details).toEqual({ quantity: 1, lifetime_years: 5, emission_factor: 14 });
    });

    it('should use the full factor without a lifetime', () => {
      const result = calculator.calculateConsumption('clothing', 'jeans', 2);

      expect(result.co2_kg).toBeCloseTo(66.8, 3);
      expect(result.details.lifetime_years).toBeNull();
    });

    it('should reject a zero or negative lifetime', () => {
      expect(() => calculator.calculateConsumption('electronics', 'laptop', 1, 0)).toThrow(InvalidArgumentError);
      expect(() => calculator.calculateConsumption('electronics', 'laptop', 1, -2)).toThrow(InvalidArgumentError);
    });

    it('should reject fractional or negative quantities', () => {
      expect(() => calculator.calculateConsumption('electronics', 'laptop', 1.5)).toThrow(InvalidArgumentError);
      expect(() => calculator.calculateConsumption('electronics', 'laptop', -1)).toThrow(InvalidArgumentError);
    });

    it('should reject unknown items', () => {
      expect(() => calculator.calculateConsumption('electronics', 'telepathy_chip', 1)).toThrow(UnknownFactorError);
    });
  });

  describe('calculateWaste', () => {
    it('should use the flat waste namespace', () => {
      const result = calculator.calculateWaste('landfill', 10);

      expect(result.co2_kg).toBeCloseTo(5.7, 3);
      expect(result.subcategory).toBe('landfill');
      expect(result.activity).toBe('landfill');
      expect(result.details).toEqual({ amount_kg: 10, disposal_method: 'landfill', emission_factor: 0.57 });
    });

    it('should never fall back to zero for unknown methods', () => {
      expect(() => calculator.calculateWaste('catapult', 3)).toThrow(UnknownFactorError);
      expect(() => calculator.calculateWaste('catapult', 3)).toThrow('Unknown emission factor: waste.catapult');
    });
  });

  describe('Result invariants', () => {
    const factors = createDefaultEmissionFactors();

    function entriesOf(category: string): Array<[string, string]> {
      return Object.entries(getCategoryFactors(factors, category)).flatMap(([subcategory, entries]) =>
        typeof entries === 'object' && entries !== null
          ? Object.keys(entries).map((key): [string, string] => [subcategory, key])
          : []
      );
    }

    it('should match round(factor * distance / passengers, 3) for every transportation factor', () => {
      for (const [transportType, fuelType] of entriesOf('transportation')) {
        for (const passengers of [1, 3]) {
          const result = calculator.calculateTransportation(transportType, fuelType, 37.5, passengers);
          const factor = Number(result.details.emission_factor);

          expect(result.co2_kg).toBe(roundTo((factor * 37.5) / passengers));
          expect(result.co2_kg).toBeGreaterThanOrEqual(0);
        }
      }
    });

    it('should match round(factor * kWh, 3) for every energy factor in kWh and MWh', () => {
      for (const [energyType, source] of entriesOf('energy')) {
        for (const [amount, unit] of [[37, 'kwh'], [2.5, 'MWh']] as const) {
          const result = calculator.calculateEnergy(energyType, source, amount, unit);
          const factor = Number(result.details.emission_factor);

          expect(result.details.amount).toBe(unit === 'kwh' ? amount : amount * 1000);
          expect(result.co2_kg).toBe(roundTo(factor * Number(result.details.amount)));
        }
      }
    });

    it('should match round(adjusted factor * kg, 3) for every food factor', () => {
      for (const [foodType, foodItem] of entriesOf('food')) {
        for (const [amount, unit, local] of [[0.7, 'kg', false], [3, 'servings', true], [250, 'g', true]] as const) {
          const result = calculator.calculateFood(foodType, foodItem, amount, unit, local);
          const factor = Number(result.details.emission_factor);

          expect(result.co2_kg).toBe(roundTo(factor * Number(result.details.amount)));
          expect(result.co2_kg).toBeGreaterThanOrEqual(0);
        }
      }
    });

    it('should match round(factor * quantity, 3) for every consumption factor, amortized or not', () => {
      for (const [itemType, item] of entriesOf('consumption')) {
        for (const lifetimeYears of [null, 3]) {
          const result = calculator.calculateConsumption(itemType, item, 2, lifetimeYears);
          const factor = Number(result.details.emission_factor);

          expect(result.co2_kg).toBe(roundTo(factor * 2));
        }
      }
    });

    it('should match round(factor * kg, 3) for every waste factor', () => {
      for (const disposalMethod of Object.keys(getCategoryFactors(factors, 'waste'))) {
        const result = calculator.calculateWaste(disposalMethod, 12.5);

        expect(result.co2_kg).toBe(roundTo(Number(result.details.emission_factor) * 12.5));
      }
    });

    it('should not round values stored just below a tie upwards', () => {
      expect(calculator.calculateTransportation('car', 'electric', 0.5).co2_kg).toBe(0.044);
      expect(calculator.calculateTransportation('car', 'petrol', 1.375).co2_kg).toBe(0.555);
    });

    it('should round exact ties to the even neighbour', () => {
      const halves = new CarbonCalculator({ factors: { waste: { landfill: 0.125 } } });

      expect(halves.calculateWaste('landfill', 0.5).co2_kg).toBe(0.062);
    });

    it('should return identical, frozen results for identical inputs', () => {
      const first = calculator.calculateFood('dairy', 'cheese', 0.2);
      const second = calculator.calculateFood('dairy', 'cheese', 0.2);

      expect(second).toEqual(first);
      expect(Object.is(first.co2_kg, second.co2_kg)).toBe(true);
      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.details)).toBe(true);
    });
  });

  describe('Flights', () => {
    it('should pick the flight class from the distance', () => {
      expect(calculator.calculateFlight(800).activity).toBe('flight_domestic_short');
      expect(calculator.calculateFlight(800).co2_kg).toBeCloseTo(204, 3);
      expect(calculator.calculateFlight(1000).activity).toBe('flight_domestic_long');
      expect(calculator.calculateFlight(2000).co2_kg).toBeCloseTo(390, 3);
      expect(calculator.calculateFlight(3000).activity).toBe('flight_international');
      expect(calculator.calculateFlight(5000).co2_kg).toBeCloseTo(750, 3);
    });

    it('should not divide flight emissions by passengers', () => {
      expect(calculator.calculateFlight(2000).details.passengers).toBe(1);
    });

    it('should delegate distance estimation to the provider unchanged', async () => {
      const resolveDistance = jest.fn((_origin: string, _destination: string) => Promise.resolve(1200));
      const provider: DistanceProvider = { resolveDistance };
      const withProvider = new CarbonCalculator({ factors: createDefaultEmissionFactors(), distanceProvider: provider });

      const distance = await withProvider.estimateFlightDistance('Berlin', 'Madrid');

      expect(distance).toBe(1200);
      expect(resolveDistance).toHaveBeenCalledTimes(1);
      expect(resolveDistance).toHaveBeenCalledWith('Berlin', 'Madrid');
    });

    it('should classify and calculate a flight between two places', async () => {
      const provider: DistanceProvider = { resolveDistance: jest.fn(() => Promise.resolve(1200)) };
      const withProvider = new CarbonCalculator({ factors: createDefaultEmissionFactors(), distanceProvider: provider });

      const result = await withProvider.calculateFlightBetween('Berlin', 'Madrid');

      expect(result.activity).toBe('flight_domestic_long');
      expect(result.co2_kg).toBeCloseTo(234, 3);
    });

    it('should propagate provider failures', async () => {
      const provider: DistanceProvider = {
        resolveDistance: jest.fn(() => Promise.reject(new DistanceLookupError('Could not geocode location: Atlantis'))),
      };
      const withProvider = new CarbonCalculator({ factors: createDefaultEmissionFactors(), distanceProvider: provider });

      await expect(withProvider.calculateFlightBetween('Atlantis', 'Madrid')).rejects.toThrow(
        'Could not geocode location: Atlantis'
      );
    });

    it('should fail without a configured provider', async () => {
      await expect(calculator.estimateFlightDistance('Berlin', 'Madrid')).rejects.toThrow(DistanceLookupError);
    });
  });

  describe('Category listing', () => {
    it('should expose the loaded categories and their factors', () => {
      expect(calculator.listCategories()).toEqual(['transportation', 'energy', 'food', 'consumption', 'waste']);
      expect(calculator.getCategoryFactors('waste')).toEqual({
        landfill: 0.57,
        recycling: 0.21,
        composting: 0.05,
        incineration: 0.35,
      });
      expect(calculator.getCategoryFactors('space_travel')).toEqual({});
    });
  });
});
