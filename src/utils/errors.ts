/**
 * Application Errors
 * Each error carries the process exit code it terminates the run with.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

/**
 * Base application error class.
 * Messages are shown to the user as-is, so keep them free of stack noise.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_FAILURE,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidUrlError extends AppError {
  constructor(message: string) {
    super(message);
  }
}

/**
 * Listing failed: malformed URL, private/removed video, or provider unreachable.
 */
export class ExtractionError extends AppError {
  constructor(reason: string) {
    super(`Failed to fetch video info: ${reason}`);
  }
}

export class NoFormatsAvailableError extends AppError {
  constructor() {
    super('No suitable formats found (need an mp4 with both video and audio)');
  }
}

export class DownloadError extends AppError {
  constructor(reason: string) {
    super(`Download failed: ${reason}`);
  }
}

export class UserInterruptError extends AppError {
  constructor() {
    super('Download cancelled by user', EXIT_INTERRUPTED);
  }
}

/**
 * Best-effort human message for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
