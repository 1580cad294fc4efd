/**
 * Catalog lookups with fallback
 *
 * An unknown key resolves to the catalog's fallback entry instead of failing,
 * and the result says so.
 */

import type { CatalogLookup, EquipmentCatalog, SeparatorProfile, VesselType } from '../types/expansion';
import { ConfigurationError } from '../engine/errors';

export function resolveVessel(catalog: EquipmentCatalog, vesselId: string): CatalogLookup<VesselType> {
  return lookupWithFallback(catalog.vessels, vesselId, catalog.fallbackVesselId, 'vessel');
}

export function resolveSeparator(catalog: EquipmentCatalog, separatorId: string): CatalogLookup<SeparatorProfile> {
  return lookupWithFallback(catalog.separators, separatorId, catalog.fallbackSeparatorId, 'separator');
}

/**
 * Own entries only; inherited object keys such as "toString" are not ids
 */
export function catalogEntry<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/* ---------------- helpers ---------------- */

function lookupWithFallback<T>(
  table: Readonly<Record<string, T>>,
  key: string,
  fallbackKey: string,
  kind: string
): CatalogLookup<T> {
  const entry = catalogEntry(table, key);
  if (entry !== undefined) {
    return { entry, usedFallback: false };
  }

  const fallback = catalogEntry(table, fallbackKey);
  if (fallback === undefined) {
    throw new ConfigurationError(`Unknown ${kind} "${key}" and fallback "${fallbackKey}" is missing.`);
  }

  console.warn(`Unknown ${kind} "${key}", using fallback "${fallbackKey}"`);
  return { entry: fallback, usedFallback: true };
}
