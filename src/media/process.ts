/**
 * Process boundary for the external binaries (ffmpeg / ffprobe).
 *
 * Everything that shells out goes through a ToolRunner so the rest of the code
 * can be exercised with an in-process fake. Arguments are passed as an array,
 * never through a shell.
 */
import { execFile } from 'child_process';
import { ExternalToolError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface ToolOutput {
  stdout: string;
  stderr: string;
}

export type ToolRunner = (binary: string, args: string[]) => Promise<ToolOutput>;

const MAX_BUFFER = 16 * 1024 * 1024;

function describeFailure(code: unknown): { exitCode: number | null; notFound: boolean } {
  if (code === 'ENOENT') return { exitCode: null, notFound: true };
  return { exitCode: typeof code === 'number' ? code : null, notFound: false };
}

export const execTool: ToolRunner = (binary, args) =>
  new Promise((resolve, reject) => {
    execFile(binary, args, { encoding: 'utf-8', maxBuffer: MAX_BUFFER }, (err, stdout, stderr) => {
      if (!err) {
        resolve({ stdout, stderr });
        return;
      }
      const { exitCode, notFound } = describeFailure(err.code);
      const message = notFound
        ? `${binary} not found on PATH`
        : `${binary} exited with code ${exitCode ?? 'unknown'}: ${stderr.trim() || err.message}`;
      reject(new ExternalToolError(message, binary, exitCode, stderr.trim(), err));
    });
  });

/**
 * Run a binary through the given runner, logging the invocation at debug level.
 * Any non-ExternalToolError thrown by a runner is wrapped so callers only ever
 * see the one failure type.
 */
export async function runTool(
  runner: ToolRunner,
  binary: string,
  args: string[],
  label: string,
  logger: Logger,
): Promise<ToolOutput> {
  logger.debug(`Tool [${label}]`, { binary, args });
  try {
    return await runner(binary, args);
  } catch (err) {
    if (err instanceof ExternalToolError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new ExternalToolError(`${binary} ${label} failed: ${message}`, binary, null, '', err);
  }
}
