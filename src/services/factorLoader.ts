/**
 * Emission Factor Table Loader
 *
 * Reads the nested factor document from disk. When the file is missing the
 * built-in defaults are written there (best-effort) so later loads are stable.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import defaultEmissionFactors from '../constants/defaultEmissionFactors.json';
import { InvalidFactorTableError, UnknownFactorError } from '../lib/errors';
import { EmissionFactorTable } from '../types/emission';

const factorTableSchema = z.record(z.string(), z.unknown());

export function createDefaultEmissionFactors(): Record<string, unknown> {
  return structuredClone(defaultEmissionFactors);
}

function isMissingFile(error: unknown): boolean {
  // fs errors may come from another realm, so no instanceof Error here
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

function saveEmissionFactors(filePath: string, factors: Record<string, unknown>): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(factors, null, 2)}\n`, 'utf8');
  } catch (error) {
    console.warn(`Could not persist default emission factors to ${filePath}:`, error);
  }
}

function isMapping(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function parseEmissionFactors(raw: string, source: string): EmissionFactorTable {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new InvalidFactorTableError(`Emission factor file ${source} is not valid JSON`, { cause: error });
  }

  const parsed = factorTableSchema.safeParse(document);
  if (!parsed.success) {
    throw new InvalidFactorTableError(`Emission factor file ${source} must contain a mapping`);
  }
  return deepFreeze(parsed.data);
}

/**
 * Load the factor table from `filePath`, falling back to (and persisting) the defaults
 */
export function loadEmissionFactors(filePath: string): EmissionFactorTable {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    const defaults = createDefaultEmissionFactors();
    saveEmissionFactors(filePath, defaults);
    return deepFreeze(defaults);
  }
  return parseEmissionFactors(raw, filePath);
}

/**
 * Walk `keyPath` through the table and return the numeric factor at its end
 */
export function lookupFactor(table: EmissionFactorTable, keyPath: readonly string[]): number {
  let node: unknown = table;
  for (const key of keyPath) {
    if (!isMapping(node) || !Object.hasOwn(node, key)) {
      throw new UnknownFactorError(keyPath);
    }
    node = node[key];
  }
  if (typeof node !== 'number' || !Number.isFinite(node)) {
    throw new UnknownFactorError(keyPath);
  }
  return node;
}

export function getCategoryFactors(table: EmissionFactorTable, category: string): Readonly<Record<string, unknown>> {
  const node = Object.hasOwn(table, category) ? table[category] : undefined;
  return isMapping(node) ? node : {};
}
