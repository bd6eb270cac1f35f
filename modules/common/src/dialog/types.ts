/**
 * modules/common/src/dialog/types.ts
 *
 * @file Contracts between the dialog registry and the host UI. The registry only ever talks to these interfaces,
 * never to concrete widget types.
 */
import type {Point, Size} from '@common/core/geometry.js';

/**
 * An on-screen dialog panel owned by the host. The registry writes `x`/`y` once when the dialog is opened and calls
 * the lifecycle methods; it never resizes or destroys the dialog itself.
 */
export interface DialogHandle extends Point {
  /** Width declared by the dialog's own content layout. Positive integer, fixed at creation. */
  readonly width: number;
  /** Height declared by the dialog's own content layout. Positive integer, fixed at creation. */
  readonly height: number;

  /**
   * Tear down the host resources behind this dialog.
   */
  close: () => void;

  /**
   * Recompute the dialog's internal layout without moving it.
   */
  refresh: () => void;
}

/**
 * The host container that makes dialogs visible.
 */
export interface DialogHost {
  /**
   * Add the dialog to the visible UI tree. Called once per successful open.
   */
  add: (dialog: DialogHandle) => void;
}

/**
 * Synchronous access to the size of the display dialogs are placed on, in the same units as dialog positions.
 */
export interface DisplayMetrics {
  getDisplaySize: () => Size;
}

/**
 * Which step of the placement search produced a position.
 *
 * - `'anchor'` - Nothing was open; the anchor was used directly.
 * - `'candidate'` - A position adjacent to an open dialog.
 * - `'grid'` - The bounded grid scan found a free cell.
 * - `'fallback'` - Nothing was free; the anchor was used even though it overlaps.
 */
export type PlacementStrategy = 'anchor' | 'candidate' | 'grid' | 'fallback';

/**
 * A computed position together with the strategy that produced it.
 */
export interface PlacementResult extends Point {
  strategy: PlacementStrategy;
}
