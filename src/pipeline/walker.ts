/**
 * Batch walker: resolves an input path to the list of video files to process.
 * Directories are listed flat; subdirectories are ignored.
 */
import * as fs from 'fs';
import * as path from 'path';
import { VIDEO_EXTENSIONS } from '../config.js';
import { InvalidParameterError, UnsupportedFormatError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface WalkOptions {
  allowAnyExtension: boolean;
  logger: Logger;
}

export function hasVideoExtension(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return VIDEO_EXTENSIONS.some((allowed) => allowed === ext);
}

export function isDirectory(inputPath: string): boolean {
  return fs.existsSync(inputPath) && fs.statSync(inputPath).isDirectory();
}

export function walkVideos(inputPath: string, options: WalkOptions): string[] {
  const { allowAnyExtension, logger } = options;

  if (!fs.existsSync(inputPath)) {
    throw new InvalidParameterError(`Invalid path: ${inputPath}`);
  }

  const stat = fs.statSync(inputPath);
  if (stat.isFile()) {
    if (!allowAnyExtension && !hasVideoExtension(inputPath)) {
      throw new UnsupportedFormatError(`Unsupported video format: ${path.extname(inputPath) || '(none)'}`);
    }
    return [inputPath];
  }

  if (!stat.isDirectory()) {
    throw new InvalidParameterError(`Not a file or directory: ${inputPath}`);
  }

  const videos: string[] = [];
  const entries = fs.readdirSync(inputPath, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  for (const name of entries) {
    if (allowAnyExtension || hasVideoExtension(name)) {
      videos.push(path.join(inputPath, name));
    } else {
      logger.warn('Walker: skipping unsupported file', { file: name });
    }
  }

  logger.info('Walker: found videos', { inputPath, count: videos.length });
  return videos;
}
