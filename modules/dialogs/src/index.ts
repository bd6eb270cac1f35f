/**
 * modules/dialogs/src/index.ts
 *
 * @file Public entry point for dialog placement and lifecycle APIs.
 */

export {DialogRegistry} from './DialogRegistry.js';
export type {DialogRegistryOptions} from './DialogRegistry.js';
export {DisplaySizeTracker, staticDisplay} from './DisplaySizeTracker.js';
export {findPosition, generateCandidates, placeDialog, rankCandidates, scanGrid} from './placement.js';
export type {PlacementOptions} from './placement.js';
export {DEFAULT_PLACEMENT_CONFIG, resolvePlacementConfig} from '@common/config.js';
export type {PlacementConfig, PlacementConfigOverrides} from '@common/config.js';
export {overlapsAny, rectanglesOverlap, squaredDistance} from '@common/core/geometry.js';
export type {Point, Rect, Size} from '@common/core/geometry.js';
export type {DialogHandle, DialogHost, DisplayMetrics, PlacementResult, PlacementStrategy} from '@common/dialog/types.js';
export {InvalidConfigError, InvalidDimensionsError} from '@common/errors.js';
