/**
 * modules/dialogs/src/DisplaySizeTracker.ts
 *
 * @file Holds the current display size for the placement grid scan. The host pushes new sizes whenever its display
 * changes; listeners are notified through an `update` event.
 */
import type {Size} from '@common/core/geometry.js';
import type {DisplayMetrics} from '@common/dialog/types.js';
import {EventEmitter} from 'node:events';
import {isValidSize} from '@common/core/geometry.js';
import {InvalidDimensionsError} from '@common/errors.js';
import {getLogger} from '@common/logging.js';

const log = getLogger('dialogs.display');

export class DisplaySizeTracker extends EventEmitter implements DisplayMetrics {
  private current: Size;

  constructor(initial: Size) {
    super();
    this.current = validated(initial);
  }

  public getDisplaySize(): Size {
    return {...this.current};
  }

  /**
   * Replace the current display size and notify listeners. Passing the current size again is a no-op.
   *
   * @param size - New display size.
   * @throws InvalidDimensionsError if either dimension is not a positive integer.
   */
  public update(size: Size): void {
    const next = validated(size);
    if (next.width === this.current.width && next.height === this.current.height) {
      return;
    }
    this.current = next;
    log.debug('Updated display size:', next);
    this.emit('update', {...next});
  }

  public on(event: 'update', listener: (size: Size) => void): this {
    return super.on(event, listener);
  }

  public off(event: 'update', listener: (size: Size) => void): this {
    return super.off(event, listener);
  }
}

/**
 * A display accessor that always reports the same size.
 */
export function staticDisplay(size: Size): DisplayMetrics {
  const fixed = validated(size);
  return {
    getDisplaySize: () => ({...fixed}),
  };
}

function validated(size: Size): Size {
  if (!isValidSize(size)) {
    throw new InvalidDimensionsError(size.width, size.height, 'display');
  }
  return {width: size.width, height: size.height};
}
