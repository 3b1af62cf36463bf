import { VideoExtractor } from '../download/core/types';
import { LinePrompter } from '../cli/prompt';
import { AppConfig } from './config';

/**
 * Anything text can be written to; process.stdout in production
 */
export interface TextOutput {
  write(text: string): unknown;
}

/**
 * Everything a run needs from the outside world
 */
export interface AppContext {
  stdout: TextOutput;
  stderr: TextOutput;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Opened lazily: only interactive runs read from the terminal */
  createPrompter: () => LinePrompter;
  createExtractor: (config: AppConfig) => VideoExtractor;
}
