import { CarbonTrackerConfig, loadConfig } from './lib/config';
import { createSupabaseClient } from './lib/supabase';
import { CarbonCalculator } from './services/carbonCalculator';
import { DistanceProvider, OpenRouteServiceDistanceProvider } from './services/distanceProvider';
import { EmissionResultStore, SupabaseEmissionResultStore } from './services/emissionResultStore';
import { loadEmissionFactors } from './services/factorLoader';

export * from './lib/errors';
export * from './types/emission';
export { loadConfig } from './lib/config';
export type { CarbonTrackerConfig } from './lib/config';
export { createSupabaseClient } from './lib/supabase';
export { CarbonCalculator } from './services/carbonCalculator';
export type { CarbonCalculatorOptions } from './services/carbonCalculator';
export { OpenRouteServiceDistanceProvider } from './services/distanceProvider';
export type { DistanceProvider, OpenRouteServiceOptions } from './services/distanceProvider';
export { SupabaseEmissionResultStore } from './services/emissionResultStore';
export type { EmissionResultStore } from './services/emissionResultStore';
export {
  createDefaultEmissionFactors,
  getCategoryFactors,
  loadEmissionFactors,
  lookupFactor,
  parseEmissionFactors,
} from './services/factorLoader';
export { calculateEmissionApi, parseEmissionRequest, saveEmissionApi } from './services/api/emissionApi';
export type { EmissionRequest } from './services/api/emissionApi';
export { classifyFlightDistance } from './utils/flight';
export { roundTo, servingWeightKg, toFoodKg, toKwh } from './utils/units';

export interface CarbonTracker {
  config: CarbonTrackerConfig;
  calculator: CarbonCalculator;
  distanceProvider?: DistanceProvider;
  store?: EmissionResultStore;
}

/**
 * Wire the calculator and its optional collaborators from configuration.
 * The distance provider needs ORS_API_KEY; the store needs Supabase.
 */
export function createCarbonTracker(config: CarbonTrackerConfig = loadConfig()): CarbonTracker {
  const distanceProvider = config.orsApiKey
    ? new OpenRouteServiceDistanceProvider({
        apiKey: config.orsApiKey,
        orsUrl: config.orsUrl,
        nominatimUrl: config.nominatimUrl,
        userAgent: config.geocoderUserAgent,
        timeoutMs: config.distanceTimeoutMs,
      })
    : undefined;

  const calculator = new CarbonCalculator({
    factors: loadEmissionFactors(config.emissionFactorsPath),
    distanceProvider,
  });

  const store = config.isSupabaseConfigured
    ? new SupabaseEmissionResultStore(createSupabaseClient(config))
    : undefined;

  return { config, calculator, distanceProvider, store };
}
