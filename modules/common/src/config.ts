/**
 * modules/common/src/config.ts
 *
 * @file Placement configuration with defaults and override validation.
 */
import type {Point} from '@common/core/geometry.js';
import {InvalidConfigError} from '@common/errors.js';

/**
 * Tunables for the placement search.
 */
export interface PlacementConfig {
  /** Preferred top-left corner. New dialogs are placed as close to it as possible. */
  anchor: Point;
  /** Spacing kept between adjacent dialogs. */
  gap: number;
}

/**
 * Partial overrides accepted by {@link resolvePlacementConfig}.
 */
export interface PlacementConfigOverrides {
  anchor?: Point;
  gap?: number;
}

export const DEFAULT_PLACEMENT_CONFIG: Readonly<PlacementConfig> = Object.freeze({
  anchor: Object.freeze({x: 10, y: 10}),
  gap: 5,
});

/**
 * Merge overrides into the defaults.
 *
 * @param overrides - Optional values replacing the defaults.
 * @returns A complete config; the defaults object is never returned or mutated.
 * @throws InvalidConfigError if the anchor has a negative or non-integer coordinate, or the gap is negative or
 * not an integer.
 */
export function resolvePlacementConfig(overrides: PlacementConfigOverrides = {}): PlacementConfig {
  const anchor = overrides.anchor ?? DEFAULT_PLACEMENT_CONFIG.anchor;
  const gap = overrides.gap ?? DEFAULT_PLACEMENT_CONFIG.gap;

  if (!isNonNegativeInteger(anchor.x) || !isNonNegativeInteger(anchor.y)) {
    throw new InvalidConfigError('anchor', `expected non-negative integer coordinates, got (${anchor.x}, ${anchor.y})`);
  }
  if (!isNonNegativeInteger(gap)) {
    throw new InvalidConfigError('gap', `expected a non-negative integer, got ${gap}`);
  }

  return {anchor: {x: anchor.x, y: anchor.y}, gap};
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}
