/**
 * Protocol configuration - single source of truth for expansion constants
 *
 * Each value can be overridden at build time through a VITE_* variable.
 * The engine never reads this module directly; callers pass a settings object,
 * so several protocols can be planned side by side.
 */

import { parseIntOr, parseNumberOr } from '../utils/inputParsing';
import type { ProtocolSettings } from '../pages/ExpansionPlanner/types/expansion';

const env = import.meta.env;

export const DEFAULT_PROTOCOL_SETTINGS: ProtocolSettings = {
  maxPassages: 3,
  safetyFactor: 1.2,
  maxInitialVessels: 200,
  strategy: 'fewest-vessels',
  schedule: {
    firstPassageDays: 7,
    subsequentPassageDays: 5,
    mediumChanges: { kind: 'fixed', firstPassage: 3, subsequentPassage: 2 },
  },
  primingFraction: 0.25,
  collectionFloorMl: 50,
  weightRangesKg: {
    adult: [30, 120],
    pediatric: [8, 120],
  },
  doseRangePerKg: [0.5, 2.0],
};

export const PROTOCOL_SETTINGS: ProtocolSettings = Object.freeze({
  ...DEFAULT_PROTOCOL_SETTINGS,
  maxPassages: parseIntOr(env.VITE_MAX_PASSAGES, DEFAULT_PROTOCOL_SETTINGS.maxPassages),
  safetyFactor: parseNumberOr(env.VITE_SAFETY_FACTOR, DEFAULT_PROTOCOL_SETTINGS.safetyFactor),
  maxInitialVessels: parseIntOr(env.VITE_MAX_INITIAL_VESSELS, DEFAULT_PROTOCOL_SETTINGS.maxInitialVessels),
  schedule: {
    ...DEFAULT_PROTOCOL_SETTINGS.schedule,
    firstPassageDays: parseNumberOr(env.VITE_FIRST_PASSAGE_DAYS, DEFAULT_PROTOCOL_SETTINGS.schedule.firstPassageDays),
    subsequentPassageDays: parseNumberOr(
      env.VITE_SUBSEQUENT_PASSAGE_DAYS,
      DEFAULT_PROTOCOL_SETTINGS.schedule.subsequentPassageDays
    ),
  },
  primingFraction: parseNumberOr(env.VITE_PRIMING_FRACTION, DEFAULT_PROTOCOL_SETTINGS.primingFraction),
  collectionFloorMl: parseNumberOr(env.VITE_COLLECTION_FLOOR_ML, DEFAULT_PROTOCOL_SETTINGS.collectionFloorMl),
});

/**
 * Copy of the active settings with selected fields replaced
 */
export function withProtocolOverrides(
  overrides: Partial<ProtocolSettings>,
  base: ProtocolSettings = PROTOCOL_SETTINGS
): ProtocolSettings {
  return { ...base, ...overrides };
}
