/**
 * Frame selector: decides which frames to extract for a strategy request.
 *
 * Pure: no I/O and no logging. Output is always strictly ascending in both
 * index and time, with no duplicates, because extraction writes files in
 * selection order.
 */
import { STRATEGY_NAMES, type StrategyName } from '../config.js';
import { InvalidParameterError } from '../utils/errors.js';
import { seededRandom, type RandomSource } from '../utils/random.js';
import { selectAllFrames } from './all.js';
import { selectFixedRandomFrames } from './fixed-random.js';
import { selectUniformFrames } from './uniform.js';
import { isEmptyWindow, resolveWindow, type VideoTiming } from './window.js';
import type { FrameTimestamp, StrategyRequest } from './types.js';

export { selectAllFrames, selectUniformFrames, selectFixedRandomFrames };
export { frameAtTime } from './uniform.js';
export { sampleWithoutReplacement } from './fixed-random.js';
export { resolveWindow, frameRangeFor, isEmptyWindow } from './window.js';
export type { ExtractionWindow, ResolvedWindow, VideoTiming, FrameRange } from './window.js';
export type { FrameTimestamp, StrategyRequest } from './types.js';

export interface SelectOptions {
  /** Overrides both the seed and Math.random. */
  random?: RandomSource;
}

/** Resolve a strategy name case-insensitively. */
export function resolveStrategy(name: string): StrategyName {
  const normalized = name.trim().toLowerCase();
  const match = STRATEGY_NAMES.find((s) => s === normalized);
  if (!match) {
    throw new InvalidParameterError(
      `No strategy found for name: ${name} (expected one of ${STRATEGY_NAMES.join(', ')})`,
    );
  }
  return match;
}

function requirePositiveFps(strategy: StrategyName, fps: number | undefined): number {
  if (fps === undefined) {
    throw new InvalidParameterError(`The '${strategy}' strategy requires --fps to be specified.`);
  }
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new InvalidParameterError(`Invalid 'fps' value: ${fps}. Must be positive.`);
  }
  return fps;
}

/**
 * Check the parts of a request that do not depend on the video, so a bad
 * parameter fails before any external tool runs.
 */
export function validateRequest(request: StrategyRequest): void {
  if (request.strategy === 'all') return;
  const fps = requirePositiveFps(request.strategy, request.fps);
  if (request.strategy === 'fixed_random' && !Number.isInteger(fps)) {
    throw new InvalidParameterError(`The 'fixed_random' strategy needs a whole frame count; received: ${fps}`);
  }
}

function validateTiming(video: VideoTiming): void {
  if (!(video.duration > 0)) {
    throw new InvalidParameterError(`Invalid video duration: ${video.duration}s.`);
  }
  if (!(video.frameRate > 0)) {
    throw new InvalidParameterError(`Invalid video frame rate: ${video.frameRate}.`);
  }
}

export function selectFrames(
  video: VideoTiming,
  request: StrategyRequest,
  options: SelectOptions = {},
): FrameTimestamp[] {
  validateTiming(video);

  const { strategy } = request;

  switch (strategy) {
    case 'all': {
      const window = resolveWindow(video.duration, request.window);
      return isEmptyWindow(window) ? [] : selectAllFrames(video, window);
    }

    case 'uniform': {
      const fps = requirePositiveFps(strategy, request.fps);
      const window = resolveWindow(video.duration, request.window);
      return isEmptyWindow(window) ? [] : selectUniformFrames(video, window, fps);
    }

    case 'fixed_random': {
      const count = requirePositiveFps(strategy, request.fps);
      const window = resolveWindow(video.duration, request.window);
      if (isEmptyWindow(window)) return [];
      const random = options.random
        ?? (request.seed !== undefined ? seededRandom(request.seed) : Math.random);
      return selectFixedRandomFrames(video, window, count, random);
    }
  }
}
