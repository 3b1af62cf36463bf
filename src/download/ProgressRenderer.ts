import { DownloadProgress } from './core/types';
import { formatFileSize } from './quality/QualitySelector';
import { TextOutput } from '../types/app';

const NOT_AVAILABLE = 'N/A';

function formatPercent(progress: DownloadProgress): string {
    if (!progress.totalBytes) return NOT_AVAILABLE;
    const percent = Math.min(100, (progress.downloadedBytes / progress.totalBytes) * 100);
    return `${percent.toFixed(1).padStart(5)}%`;
}

function formatSpeed(speed?: number): string {
    return speed && speed > 0 ? `${formatFileSize(speed)}/s` : NOT_AVAILABLE;
}

/**
 * Seconds as MM:SS, or H:MM:SS from one hour up
 */
export function formatEta(seconds?: number): string {
    if (seconds === undefined || seconds < 0) return NOT_AVAILABLE;

    const total = Math.round(seconds);
    const h = Math.floor(total / 3600);
    const m = Math.floor((total % 3600) / 60);
    const s = total % 60;
    const mmss = `${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`;

    return h > 0 ? `${h}:${mmss}` : mmss;
}

/**
 * One status line: "[download]  42.0% of 10.0 MiB at 1.5 MiB/s ETA 00:07"
 */
export function formatProgressLine(progress: DownloadProgress): string {
    const size = progress.totalBytes ? ` of ${formatFileSize(progress.totalBytes)}` : '';
    return (
        `[download] ${formatPercent(progress)}${size}` +
        ` at ${formatSpeed(progress.speed)} ETA ${formatEta(progress.eta)}`
    );
}

/**
 * Redraws the status line in place. Writes only, so it never holds up the transfer.
 */
export class ProgressRenderer {
    private lastLength = 0;
    private active = false;

    constructor(private readonly output: TextOutput) {}

    readonly update = (progress: DownloadProgress): void => {
        const line = formatProgressLine(progress);
        const padding = ' '.repeat(Math.max(0, this.lastLength - line.length));
        this.output.write(`\r${line}${padding}`);
        this.lastLength = line.length;
        this.active = true;
    };

    complete(filePath: string): void {
        if (this.active) {
            this.output.write('\n');
        }
        this.output.write(`[download] Download completed: ${filePath}\n`);
        this.active = false;
        this.lastLength = 0;
    }

    /**
     * Terminate a half-drawn line before an error message is printed
     */
    abort(): void {
        if (this.active) {
            this.output.write('\n');
        }
        this.active = false;
        this.lastLength = 0;
    }
}
