/**
 * Emission result persistence
 *
 * The calculator never depends on this module; callers hand a computed
 * EmissionResult to whichever store they configured.
 *
 * Database schema:
 * - emission_results: id (PK), category, subcategory, activity, co2_kg, details (jsonb), created_at
 */

import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { EmissionRecord, EmissionResult } from '../types/emission';

export interface EmissionResultStore {
  save(result: EmissionResult): Promise<string>;
  list(limit?: number): Promise<EmissionRecord[]>;
}

const TABLE = 'emission_results';

const idSchema = z.union([z.string(), z.number()]).transform(String);

const recordSchema = z.object({
  id: idSchema,
  category: z.string(),
  subcategory: z.string(),
  activity: z.string(),
  co2_kg: z.coerce.number(),
  details: z
    .record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]))
    .nullable()
    .transform((details) => details ?? {}),
  created_at: z.string(),
});

export class SupabaseEmissionResultStore implements EmissionResultStore {
  constructor(private readonly client: SupabaseClient) {}

  async save(result: EmissionResult): Promise<string> {
    const { data, error } = await this.client
      .from(TABLE)
      .insert({
        category: result.category,
        subcategory: result.subcategory,
        activity: result.activity,
        co2_kg: result.co2_kg,
        details: result.details,
      })
      .select('id')
      .single();

    if (error) {
      console.error('Error saving emission result:', error);
      throw error;
    }
    const id = idSchema.safeParse(data?.id);
    if (!id.success) {
      throw new Error('Failed to save emission result');
    }
    return id.data;
  }

  /**
   * Most recent results first
   */
  async list(limit: number = 50): Promise<EmissionRecord[]> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('id, category, subcategory, activity, co2_kg, details, created_at')
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) {
      console.error('Error fetching emission results:', error);
      throw error;
    }

    return z.array(recordSchema).parse(data || []);
  }
}
