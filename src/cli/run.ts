import { AppContext } from '../types/app';
import { AppConfig } from '../types/config';
import { loadConfig } from '../utils/config';
import { validateVideoUrl } from '../utils/UrlValidator';
import {
  AppError,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  errorMessage,
} from '../utils/errors';
import { logError, logger, setLogLevel } from '../utils/logger';
import { listFormats } from '../download/FormatLister';
import { downloadFormat } from '../download/DownloadExecutor';
import { QualitySelector } from '../download/quality/QualitySelector';
import { LinePrompter } from './prompt';
import { CliOptions, parseArguments } from './args';

export const URL_PROMPT = 'Enter YouTube video URL: ';

/**
 * Opens the terminal prompter only when something actually needs to ask
 */
class LazyPrompter implements LinePrompter {
  private inner: LinePrompter | null = null;

  constructor(private readonly factory: () => LinePrompter) {}

  question(query: string): Promise<string> {
    if (!this.inner) {
      this.inner = this.factory();
    }
    return this.inner.question(query);
  }

  close(): void {
    this.inner?.close();
    this.inner = null;
  }
}

async function resolveUrl(options: CliOptions, prompter: LinePrompter): Promise<string> {
  const raw = options.url ?? (await prompter.question(URL_PROMPT));
  return validateVideoUrl(raw);
}

/**
 * Config -> args -> list formats -> select -> download
 */
async function pipeline(
  options: CliOptions,
  config: AppConfig,
  context: AppContext,
  prompter: LinePrompter,
): Promise<string> {
  const { stdout } = context;
  const url = await resolveUrl(options, prompter);
  const extractor = context.createExtractor(config);

  stdout.write('\nFetching video information...\n');
  const listing = await listFormats(extractor, url);
  stdout.write(`\nVideo: ${listing.title}\n`);

  const selector = new QualitySelector();
  const format = await selector.select(listing.formats, options.quality, {
    prompter,
    output: stdout,
  });
  // the terminal is not needed past this point
  prompter.close();

  return downloadFormat(
    extractor,
    {
      url,
      title: listing.title,
      format,
      downloadDir: config.downloadDir,
    },
    stdout,
  );
}

/**
 * Run the downloader for one argv and return the process exit code
 */
export async function runCli(args: string[], context: AppContext): Promise<number> {
  const parsed = parseArguments(args, context.stdout, context.stderr);
  if (parsed.kind === 'exit') {
    return parsed.exitCode;
  }

  const config = loadConfig({
    envFile: parsed.options.envFile,
    env: context.env,
    cwd: context.cwd,
  });
  setLogLevel(config.logLevel);
  logger.debug('Configuration loaded', { ...config });

  const prompter = new LazyPrompter(context.createPrompter);

  try {
    await pipeline(parsed.options, config, context, prompter);
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof AppError) {
      logger.debug('Run failed', { error: error.name, exitCode: error.exitCode });
      context.stderr.write(`\n${error.exitCode === EXIT_FAILURE ? 'Error: ' : ''}${error.message}\n`);
      return error.exitCode;
    }

    logError(error instanceof Error ? error : new Error(String(error)));
    context.stderr.write(`\nError: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  } finally {
    prompter.close();
  }
}
