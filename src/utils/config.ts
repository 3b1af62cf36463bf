import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { AppConfig } from '../types/config';
import { logger } from './logger';

export const DEFAULT_DOWNLOAD_DIR = './downloads';
export const DEFAULT_ENV_FILE = '.env';
export const DEFAULT_YTDLP_PATH = 'yt-dlp';
export const DEFAULT_LOG_LEVEL = 'warn';

export interface LoadConfigOptions {
  envFile?: string;
  /** Process environment; its values take precedence over the file */
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Parse the env file. A missing or unreadable file yields no values.
 */
function readEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    logger.debug('No env file found, using defaults', { path: filePath });
    return {};
  }

  try {
    return dotenv.parse(fs.readFileSync(filePath));
  } catch (error) {
    logger.warn('Failed to read env file, using defaults', {
      path: filePath,
      error: (error as Error).message,
    });
    return {};
  }
}

/**
 * Load configuration from the env file and process environment.
 * Never throws: every key has a fallback.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const envFile = path.resolve(cwd, options.envFile ?? DEFAULT_ENV_FILE);
  const fileValues = readEnvFile(envFile);

  const pick = (key: string, fallback: string): string => {
    const value = env[key]?.trim() || fileValues[key]?.trim();
    return value || fallback;
  };

  return {
    downloadDir: path.resolve(cwd, pick('DOWNLOAD_DIR', DEFAULT_DOWNLOAD_DIR)),
    envFile,
    ytDlpPath: pick('YTDLP_PATH', DEFAULT_YTDLP_PATH),
    logLevel: pick('LOG_LEVEL', DEFAULT_LOG_LEVEL),
  };
}
