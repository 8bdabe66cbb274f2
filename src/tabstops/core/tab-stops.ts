/**
 * Tab stop policy: turns a raw cell size into a column width.
 */

import type {
  TabStops,
  TabStopsConfig,
  TabStopsValidationResult,
  FixtureTabStops,
} from '../../types/tab-stops.ts';
import { ConfigurationError } from '../../types/errors.ts';

/**
 * Defaults suit a fixed-width terminal measured in characters.
 */
export const DEFAULT_TAB_STOPS: TabStopsConfig = Object.freeze({
  margin: 1,
  minSize: 1,
  stepSize: 1,
});

/**
 * Validate an untrusted tab stop configuration.
 * Missing fields are allowed (defaults apply); present fields must be
 * finite numbers within range.
 *
 * @example
 * ```typescript
 * const result = validateTabStopsConfig({ stepSize: 0 });
 * if (!result.valid) {
 *   console.error('Invalid tab stops:', result.errors);
 * }
 * ```
 */
export function validateTabStopsConfig(value: unknown): TabStopsValidationResult {
  const errors: string[] = [];

  if (typeof value !== 'object' || value === null) {
    errors.push('Tab stop configuration must be a non-null object');
    return { valid: false, errors };
  }

  const checks: ReadonlyArray<[keyof TabStopsConfig, (n: number) => boolean, string]> = [
    ['margin', n => n >= 0, 'cannot be negative'],
    ['minSize', n => n >= 0, 'cannot be negative'],
    ['stepSize', n => n > 0, 'must be greater than 0'],
  ];

  for (const [key, inRange, rule] of checks) {
    if (!(key in value)) continue;
    const field: unknown = Reflect.get(value, key);
    if (field === undefined) continue;
    if (typeof field !== 'number' || !Number.isFinite(field)) {
      errors.push(`"${key}" must be a finite number`);
    } else if (!inRange(field)) {
      errors.push(`"${key}" ${rule}: ${field}`);
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Create a tab stop policy.
 *
 * Width is `margin + max(ceil(size / stepSize) * stepSize, minSize)`.
 *
 * @throws ConfigurationError if the merged configuration is invalid
 */
export function createTabStops(config: Partial<TabStopsConfig> = {}): TabStops {
  const validation = validateTabStopsConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError(validation.errors);
  }

  const margin = config.margin ?? DEFAULT_TAB_STOPS.margin;
  const minSize = config.minSize ?? DEFAULT_TAB_STOPS.minSize;
  const stepSize = config.stepSize ?? DEFAULT_TAB_STOPS.stepSize;

  return Object.freeze({
    margin,
    minSize,
    stepSize,
    getTabSize(size: number): number {
      return margin + Math.max(Math.ceil(size / stepSize) * stepSize, minSize);
    },
  });
}

/**
 * Create a policy from fixture spelling, where `minLength` may stand in
 * for `minSize`.
 */
export function tabStopsFromFixture(tabStops: FixtureTabStops = {}): TabStops {
  return createTabStops({
    margin: tabStops.margin,
    minSize: tabStops.minSize ?? tabStops.minLength,
    stepSize: tabStops.stepSize,
  });
}
