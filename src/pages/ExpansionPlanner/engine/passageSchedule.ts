/**
 * Passage schedule
 *
 * The first passage runs longer than the rest (adherence of the primary
 * isolate plus the first trypsinization), and gets more medium changes.
 */

import type { MediumChangePolicy, PassageSchedule } from '../types/expansion';
import { ConfigurationError, isPositiveFinite } from './errors';

export function passageDurationDays(index: number, schedule: PassageSchedule): number {
  return index === 0 ? schedule.firstPassageDays : schedule.subsequentPassageDays;
}

export function mediumChangesForPassage(index: number, durationDays: number, policy: MediumChangePolicy): number {
  switch (policy.kind) {
    case 'fixed':
      return index === 0 ? policy.firstPassage : policy.subsequentPassage;
    case 'interval':
      return Math.floor(durationDays / policy.everyDays);
  }
}

export function validateSchedule(schedule: PassageSchedule): void {
  if (!isPositiveFinite(schedule.firstPassageDays) || !isPositiveFinite(schedule.subsequentPassageDays)) {
    throw new ConfigurationError(
      `Passage durations must be positive (first ${schedule.firstPassageDays}, subsequent ${schedule.subsequentPassageDays}).`
    );
  }
  if (schedule.firstPassageDays <= schedule.subsequentPassageDays) {
    throw new ConfigurationError(
      `First passage (${schedule.firstPassageDays} days) must run longer than later passages (${schedule.subsequentPassageDays} days).`
    );
  }

  const policy = schedule.mediumChanges;
  if (policy.kind === 'interval' && !isPositiveFinite(policy.everyDays)) {
    throw new ConfigurationError(`Medium change interval must be positive (got ${policy.everyDays} days).`);
  }
  if (
    policy.kind === 'fixed' &&
    !(Number.isInteger(policy.firstPassage) && policy.firstPassage >= 0 &&
      Number.isInteger(policy.subsequentPassage) && policy.subsequentPassage >= 0)
  ) {
    throw new ConfigurationError('Medium change counts must be non-negative integers.');
  }
}
