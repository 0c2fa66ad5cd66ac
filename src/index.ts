#!/usr/bin/env node
/**
 * frame-extractor: entry point.
 *
 *   frame-extractor extract --video_path clip.mp4 --output_dir frames --strategy uniform --fps 1
 *   frame-extractor metadata --video_path videos/
 */
import { runCli } from './cli.js';
import { execTool } from './media/process.js';

runCli(process.argv.slice(2), {
  runner: execTool,
  env:    process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal error: ${String(err)}\n`);
    process.exitCode = 1;
  });
