#!/usr/bin/env node
import { runCli } from './cli/run';
import { ReadlinePrompter } from './cli/prompt';
import { YtDlpProvider } from './download/providers/YtDlpProvider';
import { EXIT_FAILURE, EXIT_INTERRUPTED, UserInterruptError } from './utils/errors';
import { logError } from './utils/logger';

// Ctrl-C outside the menu (while listing or downloading) lands here
process.on('SIGINT', () => {
  process.stderr.write(`\n\n${new UserInterruptError().message}\n`);
  process.exit(EXIT_INTERRUPTED);
});

runCli(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  cwd: process.cwd(),
  createPrompter: () => new ReadlinePrompter(process.stdin, process.stdout),
  createExtractor: (config) => new YtDlpProvider({ binaryPath: config.ytDlpPath }),
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logError(error instanceof Error ? error : new Error(String(error)));
    process.exitCode = EXIT_FAILURE;
  });
