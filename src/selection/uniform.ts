/**
 * Strategy "uniform": samples at `start + k / fps` while inside the window,
 * each mapped to the frame on screen at the sample time.
 */
import { InvalidParameterError } from '../utils/errors.js';
import { FRAME_EPSILON, type ResolvedWindow, type VideoTiming } from './window.js';
import type { FrameTimestamp } from './types.js';

const TIME_EPSILON = 1e-9;

/** Index of the frame displayed at `time`, clamped to the frames the video has. */
export function frameAtTime(video: VideoTiming, time: number): number {
  const index = Math.floor(time * video.frameRate + FRAME_EPSILON);
  return Math.min(Math.max(index, 0), video.frameCount - 1);
}

export function selectUniformFrames(
  video: VideoTiming,
  window: ResolvedWindow,
  fps: number,
): FrameTimestamp[] {
  if (fps > video.frameRate + TIME_EPSILON) {
    throw new InvalidParameterError(
      `Requested FPS (${fps}) exceeds source video FPS (${video.frameRate.toFixed(2)}).`,
    );
  }

  const frames: FrameTimestamp[] = [];
  if (video.frameCount <= 0) return frames;

  // The window start is always sampled, however short the window is
  for (let k = 0; ; k++) {
    const time = window.start + k / fps;
    if (k > 0 && time >= window.end - TIME_EPSILON) break;

    const index = frameAtTime(video, time);
    const previous = frames[frames.length - 1];
    if (previous && index <= previous.index) {
      if (index >= video.frameCount - 1) break;
      continue;
    }
    frames.push({ index, time });
  }

  return frames;
}
