import { Command, CommanderError } from 'commander';
import { TextOutput } from '../types/app';
import { EXIT_FAILURE } from '../utils/errors';

export const PROGRAM_NAME = 'yt-quality-dl';
export const VERSION = '1.0.0';

export interface CliOptions {
  url?: string;
  quality?: string;
  envFile?: string;
}

export type ParseResult =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'exit'; exitCode: number };

function buildProgram(stdout: TextOutput, stderr: TextOutput): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description('YouTube Video Downloader - download a video with quality selection')
    .version(VERSION)
    .option('--url <url>', 'YouTube video URL (prompted for when omitted)')
    .option('--quality <selection>', "quality label (e.g. '720p') or menu number")
    .option('--env-file <path>', 'env file to read DOWNLOAD_DIR from', '.env')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text),
    });
}

/**
 * Parse user arguments (argv without the node binary and script path).
 * Help and version are an exit with code 0; bad usage an exit with code 1.
 */
export function parseArguments(
  args: string[],
  stdout: TextOutput,
  stderr: TextOutput,
): ParseResult {
  const program = buildProgram(stdout, stderr);

  try {
    program.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return { kind: 'exit', exitCode: error.exitCode === 0 ? 0 : EXIT_FAILURE };
    }
    throw error;
  }

  const opts = program.opts<CliOptions>();
  return {
    kind: 'run',
    options: {
      url: opts.url,
      quality: opts.quality,
      envFile: opts.envFile,
    },
  };
}
