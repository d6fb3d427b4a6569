/**
 * Matrix declaration schema constants.
 */

import { TriggerEvent } from '../domain/pipeline';

/** Required fields for a target row. */
export const REQUIRED_TARGET_FIELDS = ['operatingSystem', 'cpuArchitecture'] as const;

/** Trigger events accepted by the orchestrator. */
export const VALID_TRIGGER_EVENTS: readonly TriggerEvent[] = Object.values(TriggerEvent);

/** Narrow a raw value (CLI flag, request body) to a trigger event. */
export function parseTriggerEvent(value: unknown): TriggerEvent | undefined {
  return VALID_TRIGGER_EVENTS.find((event) => event === value);
}

export const SCHEMA_CONSTRAINTS = {
  maxTargets: 64,
  maxFeatureFlags: 32,
  /** Characters allowed in feature flags. */
  identifierPattern: /^[A-Za-z0-9_.-]+$/,
  /** Operating systems and architectures. No "-": it separates them in target and cache keys. */
  platformPattern: /^[A-Za-z0-9_.]+$/,
} as const;
