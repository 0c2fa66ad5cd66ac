/**
 * Strategy "all": every frame that starts inside the window.
 */
import { frameRangeFor, frameTime, type ResolvedWindow, type VideoTiming } from './window.js';
import type { FrameTimestamp } from './types.js';

export function selectAllFrames(video: VideoTiming, window: ResolvedWindow): FrameTimestamp[] {
  const { first, last } = frameRangeFor(video, window);
  const frames: FrameTimestamp[] = [];
  for (let index = first; index <= last; index++) {
    frames.push({ index, time: frameTime(index, video.frameRate) });
  }
  return frames;
}
