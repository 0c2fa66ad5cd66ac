/**
 * Metadata probing: runs ffprobe against a file and maps its JSON output onto
 * a VideoHandle. Only the first video stream is considered.
 */
import { z } from 'zod';
import { UnsupportedFormatError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { runTool, type ToolRunner } from './process.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type VideoHandle = Readonly<{
  path: string;
  duration: number;
  frameRate: number;
  frameCount: number;
  width: number;
  height: number;
  codec: string;
  bitrateKbps: number;
}>;

export interface ProbeOptions {
  runner: ToolRunner;
  logger: Logger;
  ffprobePath?: string;
}

// ── ffprobe output schema ─────────────────────────────────────────────────────

// ffprobe prints most numeric fields as strings ("10.000000", "300")
const NumericField = z.union([z.string(), z.number()]).optional();

const StreamSchema = z.object({
  codec_name:     z.string().optional(),
  width:          z.number().optional(),
  height:         z.number().optional(),
  r_frame_rate:   z.string().optional(),
  avg_frame_rate: z.string().optional(),
  duration:       NumericField,
  nb_frames:      NumericField,
  bit_rate:       NumericField,
});

const ProbeOutputSchema = z.object({
  streams: z.array(StreamSchema).default([]),
  format:  z.object({
    duration: NumericField,
    bit_rate: NumericField,
  }).optional(),
});

const SHOW_ENTRIES =
  'stream=width,height,codec_name,r_frame_rate,avg_frame_rate,duration,nb_frames,bit_rate' +
  ':format=duration,bit_rate';

// ── Helpers ───────────────────────────────────────────────────────────────────

function toNumber(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const n = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(n) ? n : 0;
}

/** Parse an ffprobe rational such as "30000/1001"; "0/0" and garbage give 0. */
export function parseFrameRate(rate: string | undefined): number {
  if (!rate) return 0;
  const [num, den] = rate.split('/');
  const n = parseFloat(num ?? '');
  const d = den === undefined ? 1 : parseFloat(den);
  if (!Number.isFinite(n) || !Number.isFinite(d) || d === 0) return 0;
  return n / d;
}

/**
 * Map raw ffprobe JSON onto a VideoHandle.
 * Throws UnsupportedFormatError when the output does not describe a video.
 */
export function parseProbeOutput(videoPath: string, raw: string): VideoHandle {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new UnsupportedFormatError(`Could not parse probe output for ${videoPath}`, err);
  }

  const parsed = ProbeOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new UnsupportedFormatError(`Unexpected probe output for ${videoPath}`, parsed.error);
  }

  const stream = parsed.data.streams[0];
  if (!stream) {
    throw new UnsupportedFormatError(`No video stream found in ${videoPath}`);
  }
  const format = parsed.data.format;

  const avgRate = parseFrameRate(stream.avg_frame_rate);
  const frameRate = avgRate > 0 ? avgRate : parseFrameRate(stream.r_frame_rate);
  if (frameRate <= 0) {
    throw new UnsupportedFormatError(`Could not determine frame rate of ${videoPath}`);
  }

  // Matroska / WebM only report duration at container level
  const streamDuration = toNumber(stream.duration);
  const duration = streamDuration > 0 ? streamDuration : toNumber(format?.duration);
  if (duration <= 0) {
    throw new UnsupportedFormatError(`Could not determine duration of ${videoPath}`);
  }

  const reportedFrames = Math.trunc(toNumber(stream.nb_frames));
  const frameCount = reportedFrames > 0 ? reportedFrames : Math.round(duration * frameRate);

  const streamBitrate = toNumber(stream.bit_rate);
  const bitrate = streamBitrate > 0 ? streamBitrate : toNumber(format?.bit_rate);

  return {
    path:        videoPath,
    duration,
    frameRate,
    frameCount,
    width:       stream.width ?? 0,
    height:      stream.height ?? 0,
    codec:       stream.codec_name ?? 'unknown',
    bitrateKbps: Math.floor(bitrate / 1000),
  };
}

// ── Public API ────────────────────────────────────────────────────────────────

export async function probeVideo(videoPath: string, options: ProbeOptions): Promise<VideoHandle> {
  const { runner, logger, ffprobePath = 'ffprobe' } = options;
  logger.info('Probe: reading metadata', { videoPath });

  const { stdout } = await runTool(
    runner,
    ffprobePath,
    ['-v', 'error', '-select_streams', 'v:0', '-show_entries', SHOW_ENTRIES, '-of', 'json', videoPath],
    'probeVideo',
    logger,
  );

  const handle = parseProbeOutput(videoPath, stdout);
  logger.debug('Probe: metadata parsed', { ...handle });
  return handle;
}

/** Human-readable listing, one `Key: value` line per field. */
export function formatMetadata(handle: VideoHandle): string[] {
  return [
    `Codec: ${handle.codec}`,
    `Resolution: ${handle.width}x${handle.height}`,
    `Avg Fps: ${Number(handle.frameRate.toFixed(3))}`,
    `Duration: ${handle.duration}`,
    `Total Frames: ${handle.frameCount}`,
    `Bitrate: ${handle.bitrateKbps} kbps`,
  ];
}
