import { FLIGHT_CLASS_BREAKPOINTS_KM } from '../constants/emissionFactors';
import { FlightClass } from '../types/emission';
import { assertNonNegative } from './units';

export function classifyFlightDistance(distanceKm: number): FlightClass {
  assertNonNegative(distanceKm, 'distance_km');
  const bracket = FLIGHT_CLASS_BREAKPOINTS_KM.find(({ maxKm }) => distanceKm < maxKm);
  return bracket ? bracket.flightClass : 'international';
}
