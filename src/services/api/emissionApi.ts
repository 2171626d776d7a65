/**
 * Emission Calculation API Contract
 *
 * POST /api/emissions/calculate
 *
 * Request (one shape per category):
 * { "category": "transportation", "transport_type": "car", "fuel_type": "petrol", "distance_km": 100, "passengers": 2 }
 * { "category": "energy", "energy_type": "electricity", "source": "grid_average", "amount": 250, "unit": "kWh" }
 * { "category": "food", "food_type": "meat", "food_item": "beef", "amount": 2, "unit": "servings", "local": true }
 * { "category": "consumption", "item_type": "electronics", "item": "smartphone", "quantity": 1, "lifetime_years": 5 }
 * { "category": "waste", "disposal_method": "landfill", "amount_kg": 10 }
 * { "category": "flight", "origin": "Berlin", "destination": "Madrid" }   (or "distance_km")
 *
 * Response:
 * {
 *   "co2_kg": 20.2,
 *   "category": "transportation",
 *   "subcategory": "car",
 *   "activity": "car_petrol",
 *   "details": { "distance_km": 100, "fuel_type": "petrol", "passengers": 2, "emission_factor": 0.404 }
 * }
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../../lib/errors';
import { EmissionResult } from '../../types/emission';
import { CarbonCalculator } from '../carbonCalculator';
import { EmissionResultStore } from '../emissionResultStore';

const transportationRequest = z.object({
  category: z.literal('transportation'),
  transport_type: z.string().min(1),
  fuel_type: z.string().min(1),
  distance_km: z.number(),
  passengers: z.number().optional(),
});

const energyRequest = z.object({
  category: z.literal('energy'),
  energy_type: z.string().min(1),
  source: z.string().min(1),
  amount: z.number(),
  unit: z.string().optional(),
});

const foodRequest = z.object({
  category: z.literal('food'),
  food_type: z.string().min(1),
  food_item: z.string().min(1),
  amount: z.number(),
  unit: z.string().optional(),
  local: z.boolean().optional(),
});

const consumptionRequest = z.object({
  category: z.literal('consumption'),
  item_type: z.string().min(1),
  item: z.string().min(1),
  quantity: z.number().optional(),
  lifetime_years: z.number().nullable().optional(),
});

const wasteRequest = z.object({
  category: z.literal('waste'),
  disposal_method: z.string().min(1),
  amount_kg: z.number(),
});

// Either distance_km, or origin and destination
const flightRequest = z.object({
  category: z.literal('flight'),
  distance_km: z.number().optional(),
  origin: z.string().min(1).optional(),
  destination: z.string().min(1).optional(),
});

export const emissionRequestSchema = z.discriminatedUnion('category', [
  transportationRequest,
  energyRequest,
  foodRequest,
  consumptionRequest,
  wasteRequest,
  flightRequest,
]);

export type EmissionRequest = z.infer<typeof emissionRequestSchema>;

export function parseEmissionRequest(input: unknown): EmissionRequest {
  const parsed = emissionRequestSchema.safeParse(input);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new InvalidArgumentError(`Invalid emission request: ${[...new Set(fields)].join(', ')}`);
  }
  return parsed.data;
}

/**
 * POST /api/emissions/calculate
 * Validates the request body and dispatches to the matching calculator operation
 */
export async function calculateEmissionApi(calculator: CarbonCalculator, input: unknown): Promise<EmissionResult> {
  const request = parseEmissionRequest(input);

  switch (request.category) {
    case 'transportation':
      return calculator.calculateTransportation(
        request.transport_type,
        request.fuel_type,
        request.distance_km,
        request.passengers
      );
    case 'energy':
      return calculator.calculateEnergy(request.energy_type, request.source, request.amount, request.unit);
    case 'food':
      return calculator.calculateFood(request.food_type, request.food_item, request.amount, request.unit, request.local);
    case 'consumption':
      return calculator.calculateConsumption(request.item_type, request.item, request.quantity, request.lifetime_years);
    case 'waste':
      return calculator.calculateWaste(request.disposal_method, request.amount_kg);
    case 'flight':
      if (request.distance_km !== undefined) {
        return calculator.calculateFlight(request.distance_km);
      }
      if (request.origin && request.destination) {
        return calculator.calculateFlightBetween(request.origin, request.destination);
      }
      throw new InvalidArgumentError('Flight requests need distance_km or both origin and destination');
  }
}

/**
 * POST /api/emissions
 * Persist a computed result; storage errors propagate unchanged
 */
export async function saveEmissionApi(
  store: EmissionResultStore,
  result: EmissionResult
): Promise<{ id: string; result: EmissionResult }> {
  const id = await store.save(result);
  return { id, result };
}
