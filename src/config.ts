import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // External binaries (resolved on PATH unless overridden)
  FFMPEG_PATH:   z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:  z.string().min(1).default('ffprobe'),

  // Logging
  LOG_LEVEL:     z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  LOG_FORMAT:    z.enum(['text', 'json']).default('text'),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

// ── Domain Constants ──────────────────────────────────────────────────────────

export const VIDEO_EXTENSIONS = ['.mp4', '.avi', '.mov', '.mkv', '.webm'] as const;

export const STRATEGY_NAMES = ['all', 'uniform', 'fixed_random'] as const;

export type StrategyName = typeof STRATEGY_NAMES[number];

// ── Output Naming ─────────────────────────────────────────────────────────────

export const FRAME_FILENAME_PAD = 6;
export const FRAME_IMAGE_EXTENSION = '.png';
