export interface AppConfig {
  /** Directory the video file is written to; created on demand */
  downloadDir: string;
  /** Env file the values were read from, whether or not it existed */
  envFile: string;
  ytDlpPath: string;
  logLevel: string;
}
