/**
 * Pipeline orchestrator: probe → select → extract for each walked video.
 *
 * A single-file run lets errors propagate. A directory run logs each failing
 * file and carries on with the rest; failures are collected in the report.
 */
import * as path from 'path';
import type { AppConfig } from '../config.js';
import { extractFrames, type ExtractionResult } from '../media/frames.js';
import { formatMetadata, probeVideo, type VideoHandle } from '../media/probe.js';
import type { ToolRunner } from '../media/process.js';
import { selectFrames, validateRequest, type StrategyRequest } from '../selection/index.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { RandomSource } from '../utils/random.js';
import { isDirectory, walkVideos } from './walker.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PipelineDeps {
  runner: ToolRunner;
  logger: Logger;
  config: Pick<AppConfig, 'FFMPEG_PATH' | 'FFPROBE_PATH'>;
  /** Receives command output (metadata listings), one chunk per call. */
  write: (text: string) => void;
  random?: RandomSource;
}

export interface ExtractRunOptions {
  videoPath: string;
  outputDir: string;
  request: StrategyRequest;
  allowAnyExtension: boolean;
  resetIndices: boolean;
}

export interface MetadataRunOptions {
  videoPath: string;
  allowAnyExtension: boolean;
  format: 'text' | 'json';
}

export interface FailedVideo {
  path: string;
  error: Error;
}

export interface BatchReport<T> {
  succeeded: T[];
  failed: FailedVideo[];
}

// ── Helpers ───────────────────────────────────────────────────────────────────

async function processEach<T>(
  videos: string[],
  isolateFailures: boolean,
  logger: Logger,
  fn: (videoPath: string) => Promise<T>,
): Promise<BatchReport<T>> {
  const report: BatchReport<T> = { succeeded: [], failed: [] };

  for (const videoPath of videos) {
    try {
      report.succeeded.push(await fn(videoPath));
    } catch (err) {
      if (!isolateFailures) throw err;
      const error = err instanceof Error ? err : new Error(errorMessage(err));
      logger.error(`Pipeline: ${error.message}`, { path: videoPath, error: error.name });
      report.failed.push({ path: videoPath, error });
    }
  }

  if (report.failed.length > 0) {
    logger.warn('Pipeline: finished with failures', {
      succeeded: report.succeeded.length,
      failed: report.failed.length,
    });
  }
  return report;
}

/**
 * Output subdirectory for each video of a directory run. Videos sharing a stem
 * (`clip.mp4`, `clip.mov`) get the extension appended so neither overwrites
 * the other.
 */
export function batchOutputDirs(videos: string[], outputDir: string, logger: Logger): Map<string, string> {
  const stemCounts = new Map<string, number>();
  for (const file of videos) {
    const stem = path.parse(file).name.toLowerCase();
    stemCounts.set(stem, (stemCounts.get(stem) ?? 0) + 1);
  }

  const dirs = new Map<string, string>();
  for (const file of videos) {
    const { name, ext } = path.parse(file);
    if ((stemCounts.get(name.toLowerCase()) ?? 0) > 1) {
      const dirName = ext ? `${name}_${ext.slice(1)}` : name;
      logger.warn('Pipeline: videos share a name, writing to an extension-qualified directory', {
        path: file,
        dirName,
      });
      dirs.set(file, path.join(outputDir, dirName));
    } else {
      dirs.set(file, path.join(outputDir, name));
    }
  }
  return dirs;
}

// ── Public API ────────────────────────────────────────────────────────────────

/** Probe, select and extract frames for one video. */
export async function extractVideo(
  videoPath: string,
  outputDir: string,
  request: StrategyRequest,
  resetIndices: boolean,
  deps: PipelineDeps,
): Promise<ExtractionResult> {
  const { runner, logger, config, random } = deps;

  const video = await probeVideo(videoPath, { runner, logger, ffprobePath: config.FFPROBE_PATH });
  const timestamps = selectFrames(video, request, { random });
  logger.info('Pipeline: frames selected', {
    videoPath,
    strategy: request.strategy,
    count: timestamps.length,
  });

  return extractFrames(video, timestamps, outputDir, {
    resetIndices,
    runner,
    logger,
    ffmpegPath: config.FFMPEG_PATH,
  });
}

export async function runExtraction(
  options: ExtractRunOptions,
  deps: PipelineDeps,
): Promise<BatchReport<ExtractionResult>> {
  const { videoPath, outputDir, request, allowAnyExtension, resetIndices } = options;
  validateRequest(request);
  const batch = isDirectory(videoPath);
  const videos = walkVideos(videoPath, { allowAnyExtension, logger: deps.logger });

  const targets = batch ? batchOutputDirs(videos, outputDir, deps.logger) : new Map<string, string>();

  return processEach(videos, batch, deps.logger, (file) =>
    extractVideo(file, targets.get(file) ?? outputDir, request, resetIndices, deps));
}

export async function runMetadata(
  options: MetadataRunOptions,
  deps: PipelineDeps,
): Promise<BatchReport<VideoHandle>> {
  const { videoPath, allowAnyExtension, format } = options;
  const { runner, logger, config, write } = deps;
  const batch = isDirectory(videoPath);
  const videos = walkVideos(videoPath, { allowAnyExtension, logger });

  const report = await processEach(videos, batch, logger, async (file) => {
    const handle = await probeVideo(file, { runner, logger, ffprobePath: config.FFPROBE_PATH });
    if (format === 'text') {
      write([`Video Metadata for ${path.basename(file)}:`, ...formatMetadata(handle)].join('\n') + '\n');
    }
    return handle;
  });

  if (format === 'json') {
    write(JSON.stringify(report.succeeded, null, 2) + '\n');
  }
  return report;
}
