/**
 * modules/dialogs/src/__tests__/DisplaySizeTracker.spec.ts
 *
 * @file Tests for the display size tracker and the static display accessor.
 */
import {InvalidDimensionsError} from '@common/errors.js';
import {describe, expect, it, vi} from 'vitest';
import {DisplaySizeTracker, staticDisplay} from '../DisplaySizeTracker.js';

describe('displaySizeTracker', () => {
  it('should report the initial size', () => {
    const tracker = new DisplaySizeTracker({width: 1920, height: 1080});

    expect(tracker.getDisplaySize()).toEqual({width: 1920, height: 1080});
  });

  it('should hand out copies that cannot change the tracked size', () => {
    const tracker = new DisplaySizeTracker({width: 1920, height: 1080});

    tracker.getDisplaySize().width = 1;

    expect(tracker.getDisplaySize()).toEqual({width: 1920, height: 1080});
  });

  it('should notify listeners on update', () => {
    const tracker = new DisplaySizeTracker({width: 1920, height: 1080});
    const listener = vi.fn();
    tracker.on('update', listener);

    tracker.update({width: 1280, height: 720});

    expect(listener).toHaveBeenCalledOnce();
    expect(listener).toHaveBeenCalledWith({width: 1280, height: 720});
    expect(tracker.getDisplaySize()).toEqual({width: 1280, height: 720});
  });

  it('should not notify when the size is unchanged', () => {
    const tracker = new DisplaySizeTracker({width: 1920, height: 1080});
    const listener = vi.fn();
    tracker.on('update', listener);

    tracker.update({width: 1920, height: 1080});

    expect(listener).not.toHaveBeenCalled();
  });

  it('should stop notifying removed listeners', () => {
    const tracker = new DisplaySizeTracker({width: 1920, height: 1080});
    const listener = vi.fn();
    tracker.on('update', listener);
    tracker.off('update', listener);

    tracker.update({width: 800, height: 600});

    expect(listener).not.toHaveBeenCalled();
  });

  it('should reject invalid sizes and keep the previous one', () => {
    const tracker = new DisplaySizeTracker({width: 1920, height: 1080});

    expect(() => tracker.update({width: 0, height: 600})).toThrow(
      'Invalid display dimensions 0x600, expected positive integers',
    );
    expect(tracker.getDisplaySize()).toEqual({width: 1920, height: 1080});
  });

  it('should reject an invalid initial size', () => {
    expect(() => new DisplaySizeTracker({width: -1, height: 1080})).toThrow(InvalidDimensionsError);
  });
});

describe('staticDisplay', () => {
  it('should always report the same size', () => {
    const display = staticDisplay({width: 640, height: 480});

    expect(display.getDisplaySize()).toEqual({width: 640, height: 480});
    expect(display.getDisplaySize()).not.toBe(display.getDisplaySize());
  });

  it('should reject an invalid size', () => {
    expect(() => staticDisplay({width: 640, height: 0})).toThrow(InvalidDimensionsError);
  });
});
