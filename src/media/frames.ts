/**
 * Frame extraction: writes one image per selected frame by running ffmpeg
 * once per frame, in selection order.
 *
 * Throws ExternalToolError on non-zero ffmpeg exit or when an expected output
 * file was not produced. Partially written output is left in place.
 */
import * as fs from 'fs';
import * as path from 'path';
import { FRAME_FILENAME_PAD, FRAME_IMAGE_EXTENSION } from '../config.js';
import { ExternalToolError, InvalidParameterError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { FrameTimestamp } from '../selection/index.js';
import type { VideoHandle } from './probe.js';
import { runTool, type ToolRunner } from './process.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ExtractedFrame {
  /** Number used in the output filename. */
  frameNumber: number;
  sourceIndex: number;
  time: number;
  path: string;
}

export interface ExtractionResult {
  videoPath: string;
  outputDir: string;
  frames: ExtractedFrame[];
}

export interface ExtractOptions {
  resetIndices: boolean;
  runner: ToolRunner;
  logger: Logger;
  ffmpegPath?: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function frameFileName(frameNumber: number): string {
  return `frame_${String(frameNumber).padStart(FRAME_FILENAME_PAD, '0')}${FRAME_IMAGE_EXTENSION}`;
}

/**
 * Seek half a frame early: ffmpeg drops decoded frames that start before the
 * seek point, so the first frame kept is exactly `index`.
 */
export function seekPosition(index: number, frameRate: number): string {
  return Math.max(0, (index - 0.5) / frameRate).toFixed(6);
}

export function ensureOutputDir(outputDir: string, logger: Logger): void {
  if (fs.existsSync(outputDir)) {
    if (!fs.statSync(outputDir).isDirectory()) {
      throw new InvalidParameterError(`Output path exists but is not a directory: ${outputDir}`);
    }
    return;
  }
  fs.mkdirSync(outputDir, { recursive: true });
  logger.info('Frames: created output directory', { outputDir });
}

// ── Public API ────────────────────────────────────────────────────────────────

export async function extractFrames(
  video: VideoHandle,
  timestamps: FrameTimestamp[],
  outputDir: string,
  options: ExtractOptions,
): Promise<ExtractionResult> {
  const { resetIndices, runner, logger, ffmpegPath = 'ffmpeg' } = options;
  logger.info('Frames: extracting', {
    videoPath: video.path,
    count: timestamps.length,
    outputDir,
    resetIndices,
  });

  ensureOutputDir(outputDir, logger);

  const frames: ExtractedFrame[] = [];
  for (const [position, timestamp] of timestamps.entries()) {
    const frameNumber = resetIndices ? position : timestamp.index;
    const outPath = path.join(outputDir, frameFileName(frameNumber));

    await runTool(
      runner,
      ffmpegPath,
      [
        '-hide_banner', '-loglevel', 'error', '-y',
        '-ss', seekPosition(timestamp.index, video.frameRate),
        '-i', video.path,
        '-frames:v', '1',
        outPath,
      ],
      `extractFrames:frame${timestamp.index}`,
      logger,
    );

    if (!fs.existsSync(outPath)) {
      throw new ExternalToolError(
        `${ffmpegPath} produced no output for frame ${timestamp.index} of ${video.path}`,
        ffmpegPath,
        0,
      );
    }

    frames.push({ frameNumber, sourceIndex: timestamp.index, time: timestamp.time, path: outPath });
  }

  logger.info('Frames: extraction complete', { videoPath: video.path, frameCount: frames.length });
  return { videoPath: video.path, outputDir, frames };
}
