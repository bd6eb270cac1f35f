/**
 * modules/dialogs/src/placement.ts
 *
 * @file Placement search for newly opened dialogs. Given the rectangles of all open dialogs, finds a top-left corner
 * for a new dialog that overlaps none of them and lies as close to the anchor as possible.
 *
 * The search is greedy: every open dialog contributes up to seven positions touching it on one side or corner (with
 * the configured gap), the anchor is always added, and the candidates are tried in order of distance from the
 * anchor. Only when every candidate overlaps something is the display scanned cell by cell. If that fails too, the
 * anchor is returned even though it overlaps.
 *
 * All functions here are pure.
 */
import type {PlacementConfig} from '@common/config.js';
import type {Point, Rect, Size} from '@common/core/geometry.js';
import type {PlacementResult} from '@common/dialog/types.js';
import {DEFAULT_PLACEMENT_CONFIG} from '@common/config.js';
import {overlapsAny, squaredDistance} from '@common/core/geometry.js';

/**
 * Inputs besides the occupied rectangles and the new size.
 */
export interface PlacementOptions extends Partial<PlacementConfig> {
  /** Bounds for the grid scan. Without it, the scan is skipped. */
  displaySize?: Size;
}

/**
 * Collect candidate positions for a new dialog of the given size: the anchor first, then for every rectangle its
 * right, left, below, above, bottom-right, bottom-left and top-right neighbour positions. Positions to the left or
 * above are clamped to the anchor on that axis. Duplicates are dropped (first occurrence keeps its place), as are
 * positions with a negative coordinate.
 *
 * @param existing - Rectangles of the open dialogs.
 * @param size - Size of the dialog to place.
 * @param options - Anchor and gap overrides.
 * @returns Candidates in insertion order, unsorted.
 */
export function generateCandidates(
  existing: readonly Rect[],
  size: Size,
  options: PlacementOptions = {},
): Point[] {
  const {anchor, gap} = withDefaults(options);
  const candidates = new Map<string, Point>();
  const add = (x: number, y: number) => {
    const key = `${x},${y}`;
    if (!candidates.has(key)) {
      candidates.set(key, {x, y});
    }
  };

  add(anchor.x, anchor.y);

  for (const rect of existing) {
    const right = rect.x + rect.width + gap;
    const left = Math.max(anchor.x, rect.x - size.width - gap);
    const below = rect.y + rect.height + gap;
    const above = Math.max(anchor.y, rect.y - size.height - gap);

    add(right, rect.y);
    add(left, rect.y);
    add(rect.x, below);
    add(rect.x, above);
    add(right, below);
    add(left, below);
    add(right, above);
  }

  return [...candidates.values()].filter(point => point.x >= 0 && point.y >= 0);
}

/**
 * Sort candidates by squared distance from the anchor, closest first. Equal distances keep their input order.
 *
 * @returns A new array; the input is left untouched.
 */
export function rankCandidates(candidates: readonly Point[], anchor: Point): Point[] {
  return candidates
    .map((point, index) => ({point, index, distance: squaredDistance(point, anchor)}))
    .sort((a, b) => a.distance - b.distance || a.index - b.index)
    .map(entry => entry.point);
}

/**
 * Scan the display row by row, left to right, for a free cell. Cells start at the anchor and step by the new size
 * plus the gap on each axis; a cell is visited while its top-left corner lies inside the display.
 *
 * @param existing - Rectangles of the open dialogs.
 * @param size - Size of the dialog to place.
 * @param options - Anchor, gap and display size. Without a display size nothing is scanned.
 * @returns The first free cell, or undefined if every cell overlaps an open dialog.
 */
export function scanGrid(existing: readonly Rect[], size: Size, options: PlacementOptions = {}): Point | undefined {
  const {anchor, gap, displaySize} = withDefaults(options);
  if (!displaySize) {
    return undefined;
  }
  const stepX = size.width + gap;
  const stepY = size.height + gap;
  if (stepX <= 0 || stepY <= 0) {
    return undefined;
  }

  for (let y = anchor.y; y < displaySize.height; y += stepY) {
    for (let x = anchor.x; x < displaySize.width; x += stepX) {
      if (!overlapsAny(existing, {x, y, width: size.width, height: size.height})) {
        return {x, y};
      }
    }
  }
  return undefined;
}

/**
 * Find a position for a new dialog and report how it was found.
 *
 * @param existing - Rectangles of the open dialogs.
 * @param size - Size of the dialog to place.
 * @param options - Anchor, gap and display size.
 * @returns The chosen top-left corner and the strategy that produced it.
 */
export function placeDialog(
  existing: readonly Rect[],
  size: Size,
  options: PlacementOptions = {},
): PlacementResult {
  const {anchor} = withDefaults(options);

  if (existing.length === 0) {
    return {x: anchor.x, y: anchor.y, strategy: 'anchor'};
  }

  const ranked = rankCandidates(generateCandidates(existing, size, options), anchor);
  const free = ranked.find(point => !overlapsAny(existing, {...point, width: size.width, height: size.height}));
  if (free) {
    return {...free, strategy: 'candidate'};
  }

  const cell = scanGrid(existing, size, options);
  if (cell) {
    return {...cell, strategy: 'grid'};
  }

  return {x: anchor.x, y: anchor.y, strategy: 'fallback'};
}

/**
 * Find a position for a new dialog. Same search as {@link placeDialog}, without the strategy.
 */
export function findPosition(existing: readonly Rect[], size: Size, options: PlacementOptions = {}): Point {
  const {x, y} = placeDialog(existing, size, options);
  return {x, y};
}

function withDefaults(options: PlacementOptions): PlacementConfig & {displaySize?: Size} {
  return {
    anchor: options.anchor ?? DEFAULT_PLACEMENT_CONFIG.anchor,
    gap: options.gap ?? DEFAULT_PLACEMENT_CONFIG.gap,
    displaySize: options.displaySize,
  };
}
