/**
 * Command-line front-end: `extract` and `metadata`.
 *
 * Everything the commands touch (tool runner, environment, output sinks) comes
 * in through CliDeps, so the whole CLI can be driven from tests.
 */
import { Command, CommanderError, Option } from 'commander';
import { z } from 'zod';
import { loadConfig, STRATEGY_NAMES, type AppConfig } from './config.js';
import type { ToolRunner } from './media/process.js';
import { runExtraction, runMetadata, type PipelineDeps } from './pipeline/index.js';
import { resolveStrategy } from './selection/index.js';
import { InvalidParameterError, errorMessage } from './utils/errors.js';
import { createLogger, type Logger } from './utils/logger.js';
import type { RandomSource } from './utils/random.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface CliDeps {
  runner: ToolRunner;
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  random?: RandomSource;
}

interface CommandContext {
  config: AppConfig;
  logger: Logger;
  pipeline: PipelineDeps;
}

// ── Option schemas ────────────────────────────────────────────────────────────

const NumberOption = z.coerce.number().finite();

const ExtractOptionsSchema = z.object({
  video_path:          z.string().min(1),
  output_dir:          z.string().min(1),
  strategy:            z.string().default('all'),
  fps:                 NumberOption.optional(),
  start_time:          NumberOption.optional(),
  end_time:            NumberOption.optional(),
  seed:                z.coerce.number().int().optional(),
  allow_any_extension: z.boolean().default(false),
  reset_indices:       z.boolean().default(false),
  verbose:             z.boolean().default(false),
});

const MetadataOptionsSchema = z.object({
  video_path:          z.string().min(1),
  allow_any_extension: z.boolean().default(false),
  reset_indices:       z.boolean().default(false),
  format:              z.enum(['text', 'json']).default('text'),
  verbose:             z.boolean().default(false),
});

function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `--${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new InvalidParameterError(`Invalid options: ${details}`);
  }
  return parsed.data;
}

// ── Command handlers ──────────────────────────────────────────────────────────

async function extractCommand(raw: unknown, ctx: CommandContext): Promise<number> {
  const opts = parseOptions(ExtractOptionsSchema, raw);
  const strategy = resolveStrategy(opts.strategy);

  const report = await runExtraction(
    {
      videoPath:         opts.video_path,
      outputDir:         opts.output_dir,
      allowAnyExtension: opts.allow_any_extension,
      resetIndices:      opts.reset_indices,
      request: {
        strategy,
        fps:    opts.fps,
        window: { startTime: opts.start_time, endTime: opts.end_time },
        seed:   opts.seed,
      },
    },
    ctx.pipeline,
  );

  const frameCount = report.succeeded.reduce((sum, r) => sum + r.frames.length, 0);
  ctx.logger.info('Extract: done', {
    videos: report.succeeded.length,
    failed: report.failed.length,
    frames: frameCount,
  });
  return report.failed.length > 0 ? 1 : 0;
}

async function metadataCommand(raw: unknown, ctx: CommandContext): Promise<number> {
  const opts = parseOptions(MetadataOptionsSchema, raw);
  if (opts.reset_indices) {
    ctx.logger.debug('Metadata: --reset_indices has no effect on metadata');
  }

  const report = await runMetadata(
    { videoPath: opts.video_path, allowAnyExtension: opts.allow_any_extension, format: opts.format },
    ctx.pipeline,
  );
  return report.failed.length > 0 ? 1 : 0;
}

// ── Program ───────────────────────────────────────────────────────────────────

function videoPathOf(raw: Record<string, unknown>): string | undefined {
  const value = raw['video_path'];
  return typeof value === 'string' ? value : undefined;
}

async function execute(
  deps: CliDeps,
  raw: Record<string, unknown>,
  handler: (raw: unknown, ctx: CommandContext) => Promise<number>,
): Promise<number> {
  const write = (line: string) => deps.stderr(line + '\n');
  // Replaced once configuration has loaded; until then only errors are shown
  let logger = createLogger({ level: 'error', format: 'text', write });

  try {
    const config = loadConfig(deps.env);
    logger = createLogger({
      level:  raw['verbose'] === true ? 'debug' : config.LOG_LEVEL,
      format: config.LOG_FORMAT,
      write,
    });
    const pipeline: PipelineDeps = {
      runner: deps.runner,
      logger,
      config,
      write: deps.stdout,
      random: deps.random,
    };
    return await handler(raw, { config, logger, pipeline });
  } catch (err) {
    logger.error(errorMessage(err), {
      path:  videoPathOf(raw),
      error: err instanceof Error ? err.name : 'Error',
    });
    return 1;
  }
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command()
    .name('frame-extractor')
    .description('CLI for extracting frames and retrieving metadata from videos.')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout(text),
      writeErr: (text) => deps.stderr(text),
    });

  program
    .command('extract')
    .description('Extract frames from a video file or every video in a directory')
    .requiredOption('--video_path <path>', 'input video file, or a directory of videos (.mp4, .avi, .mov, .mkv, .webm)')
    .requiredOption('--output_dir <dir>', 'directory to save extracted frames; one subdirectory per video in directory mode')
    .option('--strategy <name>', `frame selection strategy (${STRATEGY_NAMES.join(', ')})`, 'all')
    .option('--fps <number>', 'frames per second (uniform) or number of frames (fixed_random)')
    .option('--start_time <seconds>', 'start of the extraction window')
    .option('--end_time <seconds>', 'end of the extraction window')
    .option('--seed <number>', 'seed for fixed_random, for reproducible selections')
    .option('--allow_any_extension', 'pass every file to ffmpeg regardless of extension')
    .option('--reset_indices', 'number output frames from 0 instead of using source frame numbers')
    .option('--verbose', 'enable verbose logging')
    .action(async (raw: Record<string, unknown>) => {
      setExitCode(await execute(deps, raw, extractCommand));
    });

  program
    .command('metadata')
    .description('Display video metadata')
    .requiredOption('--video_path <path>', 'input video file, or a directory of videos')
    .option('--allow_any_extension', 'pass every file to ffprobe regardless of extension')
    .addOption(new Option('--format <format>', 'output format').choices(['text', 'json']).default('text'))
    .addOption(new Option('--reset_indices').hideHelp())
    .option('--verbose', 'enable verbose logging')
    .action(async (raw: Record<string, unknown>) => {
      setExitCode(await execute(deps, raw, metadataCommand));
    });

  return program;
}

/** Parse `argv` (without the node/script prefix), run the command, return the exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(deps, (code) => { exitCode = code; });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
