/**
 * modules/dialogs/src/DialogRegistry.ts
 *
 * @file Registry of open dialogs keyed by a unique string. Places every newly opened dialog next to the ones already
 * on screen, hands it to the host container, and forwards close/refresh requests to the dialog itself.
 *
 * Usage:
 *
 *   const registry = new DialogRegistry({
 *     host: {add: dialog => container.append(dialog)},
 *     display: new DisplaySizeTracker({width: 1920, height: 1080}),
 *   });
 *   registry.open('inventory', inventoryDialog);   // positions and shows the dialog
 *   registry.refreshDialog('inventory');           // relayout in place
 *   registry.close('inventory');                   // closes and forgets it
 *
 * All operations run synchronously on the UI thread. Unknown or duplicate keys are no-ops, never errors.
 */
import type {PlacementConfig, PlacementConfigOverrides} from '@common/config.js';
import type {Point} from '@common/core/geometry.js';
import type {DialogHandle, DialogHost, DisplayMetrics} from '@common/dialog/types.js';
import {resolvePlacementConfig} from '@common/config.js';
import {isValidSize, rectOf} from '@common/core/geometry.js';
import {InvalidDimensionsError} from '@common/errors.js';
import {getLogger} from '@common/logging.js';
import {placeDialog} from './placement.js';

const log = getLogger('dialogs.registry');

/**
 * Collaborators and settings for a {@link DialogRegistry}.
 */
export interface DialogRegistryOptions {
  /** Container that makes opened dialogs visible. */
  host: DialogHost;
  /** Current display size, read when the placement search falls back to scanning the display. */
  display: DisplayMetrics;
  /** Optional anchor and gap overrides. Defaults to anchor (10, 10) and gap 5. */
  placement?: PlacementConfigOverrides;
}

export class DialogRegistry {
  private readonly dialogs = new Map<string, DialogHandle>();
  private readonly closing = new Set<string>();
  private readonly host: DialogHost;
  private readonly display: DisplayMetrics;
  private readonly config: PlacementConfig;

  constructor(options: DialogRegistryOptions) {
    this.host = options.host;
    this.display = options.display;
    this.config = resolvePlacementConfig(options.placement);
  }

  /**
   * Number of open dialogs.
   */
  public get size(): number {
    return this.dialogs.size;
  }

  /**
   * Open a dialog under the given key. If the key is already open nothing happens: the existing dialog keeps its
   * position and is neither replaced nor refreshed.
   *
   * @param key - Unique, case-sensitive dialog key.
   * @param dialog - The dialog to place and show.
   * @returns `true` if the dialog was opened, `false` if the key was already open.
   * @throws InvalidDimensionsError if the dialog's width or height is not a positive integer.
   */
  public open(key: string, dialog: DialogHandle): boolean {
    if (this.dialogs.has(key)) {
      log.debug(`Dialog '${key}' is already open, ignoring`);
      return false;
    }
    if (!isValidSize(dialog)) {
      throw new InvalidDimensionsError(dialog.width, dialog.height);
    }

    const placement = this.place(dialog.width, dialog.height);
    if (placement.strategy === 'grid') {
      log.info(`No free spot next to open dialogs for '${key}', placed by display scan at`, placement);
    } else if (placement.strategy === 'fallback') {
      log.warn(`No free spot for dialog '${key}' (${dialog.width}x${dialog.height}), it will overlap`);
    }

    dialog.x = placement.x;
    dialog.y = placement.y;
    this.host.add(dialog);
    this.dialogs.set(key, dialog);
    log.debug(`Opened dialog '${key}' at (${dialog.x}, ${dialog.y})`);
    return true;
  }

  /**
   * Look up an open dialog.
   */
  public get(key: string): DialogHandle | undefined {
    return this.dialogs.get(key);
  }

  public has(key: string): boolean {
    return this.dialogs.has(key);
  }

  /**
   * Keys of all open dialogs, as a snapshot.
   */
  public keys(): string[] {
    return [...this.dialogs.keys()];
  }

  /**
   * Forget a dialog without closing it. Used when the host has already torn the dialog down, e.g. after the user
   * clicked its own close control.
   */
  public remove(key: string): void {
    if (this.dialogs.delete(key)) {
      log.debug(`Removed dialog '${key}'`);
    }
  }

  /**
   * Close an open dialog and forget it. The dialog's close callback runs exactly once, even if it calls back into
   * the registry for the same key. A failing callback is logged and the dialog is forgotten anyway.
   */
  public close(key: string): void {
    const dialog = this.dialogs.get(key);
    if (!dialog || this.closing.has(key)) {
      return;
    }

    this.closing.add(key);
    try {
      dialog.close();
    } catch (e) {
      log.error(`Error closing dialog '${key}'`, e);
    } finally {
      this.closing.delete(key);
      if (this.dialogs.get(key) === dialog) {
        this.dialogs.delete(key);
      }
    }
    log.debug(`Closed dialog '${key}'`);
  }

  /**
   * Ask an open dialog to recompute its layout. Its position is left alone.
   */
  public refreshDialog(key: string): void {
    const dialog = this.dialogs.get(key);
    if (!dialog) {
      return;
    }
    try {
      dialog.refresh();
    } catch (e) {
      log.error(`Error refreshing dialog '${key}'`, e);
    }
  }

  /**
   * Close every open dialog, each exactly once. Dialogs opened by a close callback while clearing are closed as
   * well, so the registry is empty afterwards.
   */
  public clear(): void {
    const closed = new Set<DialogHandle>();
    let next = this.firstOpenExcept(closed);
    while (next) {
      const [key, dialog] = next;
      closed.add(dialog);
      this.close(key);
      next = this.firstOpenExcept(closed);
    }
    log.debug(`Cleared ${closed.size} dialog(s)`);
  }

  /**
   * Compute where a dialog of the given size would be placed right now, without opening anything.
   *
   * @throws InvalidDimensionsError if width or height is not a positive integer.
   */
  public findPositionFor(width: number, height: number): Point {
    if (!isValidSize({width, height})) {
      throw new InvalidDimensionsError(width, height);
    }
    const {x, y} = this.place(width, height);
    return {x, y};
  }

  private firstOpenExcept(skip: ReadonlySet<DialogHandle>): [string, DialogHandle] | undefined {
    for (const entry of this.dialogs) {
      if (!skip.has(entry[1])) {
        return entry;
      }
    }
    return undefined;
  }

  private place(width: number, height: number) {
    const existing = [...this.dialogs.values()].map(rectOf);
    return placeDialog(existing, {width, height}, {
      anchor: this.config.anchor,
      gap: this.config.gap,
      displaySize: this.display.getDisplaySize(),
    });
  }
}
