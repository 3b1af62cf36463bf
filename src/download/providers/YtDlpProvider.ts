/**
 * YtDlpProvider - extraction and download through the yt-dlp executable
 */

import { spawn } from 'child_process';
import path from 'path';
import { StringDecoder } from 'string_decoder';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import {
    VideoExtractor,
    VideoInfo,
    RawFormat,
    DownloadProgress,
    ProgressCallback,
} from '../core/types';

const PROGRESS_PREFIX = '[progress]';

// Fields are joined with '|' because titles never reach this template
const PROGRESS_TEMPLATE =
    `download:${PROGRESS_PREFIX} ` +
    [
        '%(progress.downloaded_bytes)s',
        '%(progress.total_bytes)s',
        '%(progress.total_bytes_estimate)s',
        '%(progress.speed)s',
        '%(progress.eta)s',
    ].join('|');

// yt-dlp emits null for most fields it could not determine
const YtDlpFormatSchema = z.object({
    format_id: z.string(),
    ext: z.string(),
    height: z.number().nullish(),
    vcodec: z.string().nullish(),
    acodec: z.string().nullish(),
    filesize: z.number().nullish(),
    filesize_approx: z.number().nullish(),
    tbr: z.number().nullish(),
    fps: z.number().nullish(),
});

const YtDlpVideoInfoSchema = z.object({
    id: z.string(),
    title: z.string().nullish(),
    formats: z.array(YtDlpFormatSchema).nullish(),
});

type YtDlpFormat = z.infer<typeof YtDlpFormatSchema>;

export interface YtDlpProviderOptions {
    binaryPath?: string;
    /** Upper bound for metadata extraction, in ms */
    infoTimeout?: number;
}

export class YtDlpProvider implements VideoExtractor {
    readonly name = 'yt-dlp';

    private readonly binaryPath: string;
    private readonly infoTimeout: number;

    constructor(options: YtDlpProviderOptions = {}) {
        this.binaryPath = options.binaryPath || 'yt-dlp';
        this.infoTimeout = options.infoTimeout || 60000;
    }

    /**
     * Get video information
     */
    async getVideoInfo(url: string): Promise<VideoInfo> {
        const args = [
            '--dump-single-json',
            '--no-playlist',
            '--no-warnings',
            '--skip-download',
            url,
        ];

        const startTime = Date.now();
        const output = await this.executeYtDlp(args, { timeout: this.infoTimeout });
        logger.debug(`[${this.name}] getVideoInfo succeeded`, {
            responseTime: Date.now() - startTime,
        });

        let json: unknown;
        try {
            json = JSON.parse(output);
        } catch {
            throw new Error('yt-dlp returned malformed metadata');
        }

        const parsed = YtDlpVideoInfoSchema.safeParse(json);
        if (!parsed.success) {
            logger.debug(`[${this.name}] Unexpected metadata shape`, {
                issues: parsed.error.issues.slice(0, 3),
            });
            throw new Error('yt-dlp returned metadata in an unexpected shape');
        }

        const data = parsed.data;
        return {
            id: data.id,
            title: data.title || 'video',
            formats: (data.formats ?? []).map(toRawFormat),
        };
    }

    /**
     * Download one format into outputDir
     */
    async download(
        url: string,
        formatId: string,
        outputDir: string,
        onProgress?: ProgressCallback,
    ): Promise<string> {
        const args = [
            '-f', formatId,
            '-o', path.join(outputDir, '%(title)s.%(ext)s'),
            '--no-playlist',
            '--no-warnings',
            '--newline',
            '--progress',
            '--progress-template', PROGRESS_TEMPLATE,
            '--print', 'after_move:filepath',
            '--no-simulate',
            url,
        ];

        let filePath: string | undefined;

        await this.executeYtDlp(args, {
            onLine: (line) => {
                const progress = parseProgressLine(line);
                if (progress) {
                    onProgress?.(progress);
                } else if (line.trim()) {
                    filePath = line.trim();
                }
            },
        });

        if (!filePath) {
            throw new Error('yt-dlp finished without reporting the output file');
        }
        return filePath;
    }

    /**
     * Execute yt-dlp, resolving with its stdout.
     * stdout is split into lines for `onLine`; partial lines are buffered.
     * Both pipes are decoded as UTF-8 across chunk boundaries.
     */
    private executeYtDlp(
        args: string[],
        options: { timeout?: number; onLine?: (line: string) => void } = {},
    ): Promise<string> {
        logger.debug(`[${this.name}] spawn`, { binary: this.binaryPath, args });

        return new Promise((resolve, reject) => {
            let output = '';
            let errorOutput = '';
            let pending = '';
            let settled = false;
            let timer: NodeJS.Timeout | undefined;
            const stdoutDecoder = new StringDecoder('utf8');
            const stderrDecoder = new StringDecoder('utf8');

            const finish = (error: Error | null): void => {
                if (settled) return;
                settled = true;
                if (timer) clearTimeout(timer);
                if (error) reject(error);
                else resolve(output);
            };

            const proc = spawn(this.binaryPath, args, {
                stdio: ['ignore', 'pipe', 'pipe'],
            });

            const consume = (text: string): void => {
                output += text;

                if (options.onLine) {
                    pending += text;
                    const lines = pending.split(/\r?\n/);
                    pending = lines.pop() ?? '';
                    lines.forEach(options.onLine);
                }
            };

            proc.stdout.on('data', (data: Buffer) => {
                consume(stdoutDecoder.write(data));
            });

            proc.stderr.on('data', (data: Buffer) => {
                errorOutput += stderrDecoder.write(data);
            });

            proc.on('error', (error: NodeJS.ErrnoException) => {
                if (error.code === 'ENOENT') {
                    finish(new Error(`yt-dlp not found (looked for "${this.binaryPath}")`));
                } else {
                    finish(error);
                }
            });

            proc.on('close', (code: number | null) => {
                consume(stdoutDecoder.end());
                errorOutput += stderrDecoder.end();
                if (options.onLine && pending) {
                    options.onLine(pending);
                    pending = '';
                }

                logger.debug(`[${this.name}] exited`, { code });
                if (code === 0) {
                    finish(null);
                } else {
                    finish(new Error(extractYtDlpError(errorOutput, code)));
                }
            });

            if (options.timeout) {
                timer = setTimeout(() => {
                    proc.kill('SIGKILL');
                    finish(new Error(`yt-dlp timed out after ${options.timeout}ms`));
                }, options.timeout);
            }
        });
    }
}

function toRawFormat(f: YtDlpFormat): RawFormat {
    return {
        formatId: f.format_id,
        extension: f.ext,
        height: f.height ?? undefined,
        vcodec: f.vcodec ?? undefined,
        acodec: f.acodec ?? undefined,
        filesize: f.filesize ?? f.filesize_approx ?? undefined,
        bitrate: f.tbr ?? undefined,
        fps: f.fps ?? undefined,
    };
}

function toNumber(field: string | undefined): number | undefined {
    if (field === undefined || field === 'NA' || field === 'None') return undefined;
    const value = Number(field);
    return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse a line written by PROGRESS_TEMPLATE. Returns null for any other line.
 */
export function parseProgressLine(line: string): DownloadProgress | null {
    const trimmed = line.trim();
    if (!trimmed.startsWith(PROGRESS_PREFIX)) return null;

    const fields = trimmed.slice(PROGRESS_PREFIX.length).trim().split('|');
    const [downloaded, total, estimate, speed, eta] = fields.map(toNumber);

    return {
        downloadedBytes: downloaded ?? 0,
        totalBytes: total ?? estimate,
        speed,
        eta,
    };
}

/**
 * Pick a user-readable reason out of yt-dlp's stderr.
 * "ERROR: [youtube] abc123: Video unavailable" becomes "Video unavailable".
 */
export function extractYtDlpError(stderr: string, code: number | null): string {
    const lines = stderr
        .split(/\r?\n/)
        .map((l) => l.trim())
        .filter(Boolean);

    const errorLine = lines.find((l) => l.startsWith('ERROR:'));
    if (errorLine) {
        const reason = errorLine
            .replace(/^ERROR:\s*/, '')
            .replace(/^\[[^\]]+\]\s*[\w-]+:\s*/, '');
        return reason || errorLine;
    }

    return lines[lines.length - 1] || `yt-dlp exited with code ${code}`;
}
