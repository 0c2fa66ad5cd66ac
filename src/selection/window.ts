/**
 * Window resolution and frame-range arithmetic shared by all strategies.
 * Frame `i` sits at time `i / frameRate`.
 */
import { InvalidParameterError } from '../utils/errors.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ExtractionWindow {
  startTime?: number;
  endTime?: number;
}

export interface ResolvedWindow {
  start: number;
  end: number;
}

export interface VideoTiming {
  duration: number;
  frameRate: number;
  frameCount: number;
}

/** Inclusive index range; empty when `last < first`. */
export interface FrameRange {
  first: number;
  last: number;
}

// Absorbs float error when converting seconds to frame positions
export const FRAME_EPSILON = 1e-6;

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

// ── Public API ────────────────────────────────────────────────────────────────

export function resolveWindow(duration: number, window: ExtractionWindow = {}): ResolvedWindow {
  const { startTime, endTime } = window;
  if (startTime !== undefined && !Number.isFinite(startTime)) {
    throw new InvalidParameterError(`Start time must be a finite number; received: ${startTime}`);
  }
  if (endTime !== undefined && !Number.isFinite(endTime)) {
    throw new InvalidParameterError(`End time must be a finite number; received: ${endTime}`);
  }
  return {
    start: clamp(startTime ?? 0, 0, duration),
    end:   clamp(endTime ?? duration, 0, duration),
  };
}

export function isEmptyWindow(window: ResolvedWindow): boolean {
  return window.start >= window.end;
}

export function frameRangeFor(video: VideoTiming, window: ResolvedWindow): FrameRange {
  const { frameRate, frameCount } = video;
  if (isEmptyWindow(window) || frameCount <= 0) return { first: 0, last: -1 };

  const first = Math.max(0, Math.ceil(window.start * frameRate - FRAME_EPSILON));
  // Last frame starting before the window end, even when the reported count runs past it
  const last = Math.min(Math.ceil(window.end * frameRate - FRAME_EPSILON) - 1, frameCount - 1);
  return { first, last };
}

export function rangeSize(range: FrameRange): number {
  return Math.max(0, range.last - range.first + 1);
}

export function frameTime(index: number, frameRate: number): number {
  return index / frameRate;
}
