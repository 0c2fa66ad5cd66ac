import type { StrategyName } from '../config.js';
import type { ExtractionWindow } from './window.js';

/** A selected point in time and the source frame it maps to. */
export interface FrameTimestamp {
  index: number;
  time: number;
}

export interface StrategyRequest {
  strategy: StrategyName;
  /** Sampling rate for `uniform`, frame count for `fixed_random`; unused by `all`. */
  fps?: number;
  window?: ExtractionWindow;
  seed?: number;
}
