import { z } from 'zod';
import { ConfigurationError } from './errors';

const envSchema = z.object({
  EMISSION_FACTORS_PATH: z.string().min(1).default('data/emission_factors.json'),
  SUPABASE_URL: z.url().optional(),
  SUPABASE_ANON_KEY: z.string().min(1).optional(),
  ORS_API_KEY: z.string().min(1).optional(),
  ORS_URL: z.url().default('https://api.openrouteservice.org'),
  NOMINATIM_URL: z.url().default('https://nominatim.openstreetmap.org'),
  GEOCODER_USER_AGENT: z.string().min(1).default('carbon-tracker'),
  DISTANCE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

export interface CarbonTrackerConfig {
  emissionFactorsPath: string;
  supabaseUrl?: string;
  supabaseAnonKey?: string;
  orsApiKey?: string;
  orsUrl: string;
  nominatimUrl: string;
  geocoderUserAgent: string;
  distanceTimeoutMs: number;
  isSupabaseConfigured: boolean;
}

function normalize(value: string | undefined) {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function stripTrailingSlash(url: string) {
  return url.replace(/\/+$/, '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CarbonTrackerConfig {
  const parsed = envSchema.safeParse({
    EMISSION_FACTORS_PATH: normalize(env.EMISSION_FACTORS_PATH),
    SUPABASE_URL: normalize(env.SUPABASE_URL),
    SUPABASE_ANON_KEY: normalize(env.SUPABASE_ANON_KEY),
    ORS_API_KEY: normalize(env.ORS_API_KEY),
    ORS_URL: normalize(env.ORS_URL),
    NOMINATIM_URL: normalize(env.NOMINATIM_URL),
    GEOCODER_USER_AGENT: normalize(env.GEOCODER_USER_AGENT),
    DISTANCE_TIMEOUT_MS: normalize(env.DISTANCE_TIMEOUT_MS),
  });

  if (!parsed.success) {
    const fields = Object.keys(z.flattenError(parsed.error).fieldErrors);
    throw new ConfigurationError(`Invalid environment variables: ${fields.join(', ')}`);
  }

  const data = parsed.data;
  return {
    emissionFactorsPath: data.EMISSION_FACTORS_PATH,
    supabaseUrl: data.SUPABASE_URL,
    supabaseAnonKey: data.SUPABASE_ANON_KEY,
    orsApiKey: data.ORS_API_KEY,
    orsUrl: stripTrailingSlash(data.ORS_URL),
    nominatimUrl: stripTrailingSlash(data.NOMINATIM_URL),
    geocoderUserAgent: data.GEOCODER_USER_AGENT,
    distanceTimeoutMs: data.DISTANCE_TIMEOUT_MS,
    isSupabaseConfigured: Boolean(data.SUPABASE_URL && data.SUPABASE_ANON_KEY),
  };
}
