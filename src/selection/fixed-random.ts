/**
 * Strategy "fixed_random": exactly `count` distinct frames drawn without
 * replacement from the window, returned in ascending order.
 */
import { InvalidParameterError } from '../utils/errors.js';
import { randomInt, type RandomSource } from '../utils/random.js';
import { frameRangeFor, frameTime, rangeSize, type ResolvedWindow, type VideoTiming } from './window.js';
import type { FrameTimestamp } from './types.js';

/**
 * Partial Fisher–Yates over the virtual array `[0, size)`. Only swapped slots
 * are stored, so memory stays proportional to `count`.
 */
export function sampleWithoutReplacement(size: number, count: number, random: RandomSource): number[] {
  const swapped = new Map<number, number>();
  const picked: number[] = [];
  for (let i = 0; i < count; i++) {
    const j = Math.min(randomInt(random, i, size), size - 1);
    const valueAtJ = swapped.get(j) ?? j;
    swapped.set(j, swapped.get(i) ?? i);
    picked.push(valueAtJ);
  }
  return picked;
}

export function selectFixedRandomFrames(
  video: VideoTiming,
  window: ResolvedWindow,
  count: number,
  random: RandomSource,
): FrameTimestamp[] {
  if (!Number.isInteger(count)) {
    throw new InvalidParameterError(`The 'fixed_random' strategy needs a whole frame count; received: ${count}`);
  }

  const range = frameRangeFor(video, window);
  const available = rangeSize(range);
  if (count > available) {
    throw new InvalidParameterError(
      `Requested ${count} frames, but only ${available} are available between ` +
      `${window.start}s and ${window.end}s.`,
    );
  }

  return sampleWithoutReplacement(available, count, random)
    .map((offset) => range.first + offset)
    .sort((a, b) => a - b)
    .map((index) => ({ index, time: frameTime(index, video.frameRate) }));
}
