/**
 * Distance Provider
 *
 * Resolves two place names to a route distance in kilometers.
 * Default implementation geocodes through Nominatim and routes through
 * OpenRouteService (driving-car profile).
 */

import { z } from 'zod';
import { DistanceLookupError } from '../lib/errors';

export interface DistanceProvider {
  resolveDistance(origin: string, destination: string): Promise<number>;
}

export interface OpenRouteServiceOptions {
  apiKey: string;
  orsUrl: string;
  nominatimUrl: string;
  userAgent: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

type LonLat = [number, number];

const geocodeResponseSchema = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
  })
);

const directionsResponseSchema = z.object({
  features: z
    .array(
      z.object({
        properties: z.object({
          segments: z.array(z.object({ distance: z.number().nonnegative() })).min(1),
        }),
      })
    )
    .min(1),
});

export class OpenRouteServiceDistanceProvider implements DistanceProvider {
  private readonly options: OpenRouteServiceOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenRouteServiceOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async resolveDistance(origin: string, destination: string): Promise<number> {
    // Nominatim allows one request at a time
    const originCoordinates = await this.geocode(origin);
    const destinationCoordinates = await this.geocode(destination);
    const coordinates = [originCoordinates, destinationCoordinates];
    const payload = await this.request(`${this.options.orsUrl}/v2/directions/driving-car/geojson`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: this.options.apiKey,
      },
      body: JSON.stringify({ coordinates }),
    });

    const parsed = directionsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DistanceLookupError(`Unexpected routing response for ${origin} → ${destination}`);
    }
    return parsed.data.features[0].properties.segments[0].distance / 1000;
  }

  async geocode(place: string): Promise<LonLat> {
    const query = new URLSearchParams({ format: 'json', limit: '1', q: place });
    const payload = await this.request(`${this.options.nominatimUrl}/search?${query.toString()}`, {
      headers: { 'User-Agent': this.options.userAgent },
    });

    const parsed = geocodeResponseSchema.safeParse(payload);
    if (!parsed.success || parsed.data.length === 0) {
      throw new DistanceLookupError(`Could not geocode location: ${place}`);
    }
    const { lon, lat } = parsed.data[0];
    return [lon, lat];
  }

  private async request(url: string, init: RequestInit): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      console.error('Distance lookup request failed:', error);
      throw new DistanceLookupError(`Distance lookup request failed: ${url}`, { cause: error });
    }

    if (!response.ok) {
      throw new DistanceLookupError(`Distance lookup failed with HTTP ${response.status}: ${url}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new DistanceLookupError(`Distance lookup returned invalid JSON: ${url}`, { cause: error });
    }
  }
}
