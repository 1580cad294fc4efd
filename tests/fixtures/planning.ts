/**
 * Shared fixtures for engine tests
 */

import { DEFAULT_EQUIPMENT_CATALOG, SEPARATOR_IDS, VESSEL_IDS } from '../../src/pages/ExpansionPlanner/catalog/equipmentCatalog';
import { DEFAULT_PROTOCOL_SETTINGS, withProtocolOverrides } from '../../src/config/protocol';
import type { PassageRecord, ProtocolSettings } from '../../src/pages/ExpansionPlanner/types/expansion';

// seeding 2.1e6, confluent 8.4e6, 15 mL per change
export const STANDARD_MEDIUM = DEFAULT_EQUIPMENT_CATALOG.vessels[VESSEL_IDS.STANDARD_MEDIUM];
export const REFERENCE_SEPARATOR = DEFAULT_EQUIPMENT_CATALOG.separators[SEPARATOR_IDS.REFERENCE];

export const FEWEST_VESSELS: ProtocolSettings = withProtocolOverrides({ strategy: 'fewest-vessels' }, DEFAULT_PROTOCOL_SETTINGS);
export const FEWEST_PASSAGES: ProtocolSettings = withProtocolOverrides({ strategy: 'fewest-passages' }, DEFAULT_PROTOCOL_SETTINGS);

export const makePassage = (overrides: Partial<PassageRecord>): PassageRecord => ({
  index: 0,
  vesselCount: 1,
  inputCells: 2.1e6,
  outputCells: 8.4e6,
  durationDays: 7,
  mediumChanges: 3,
  startDay: 0,
  endDay: 7,
  ...overrides,
});
