/**
 * QualitySelector - resolves a --quality argument or asks the user to pick a format
 */

import { VideoFormat } from '../core/types';
import { LinePrompter, Validation, promptUntilValid } from '../../cli/prompt';
import { NoFormatsAvailableError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { TextOutput } from '../../types/app';

export const SELECT_PROMPT = 'Select quality (enter number): ';

export interface SelectionOptions {
    prompter: LinePrompter;
    output: TextOutput;
    /** Bound on interactive attempts; unbounded by default */
    maxAttempts?: number;
}

export class QualitySelector {
    /**
     * Match a --quality value against the list.
     * A resolution label ("720p", case-insensitive) wins over a bare height ("720"),
     * which wins over a 1-based index.
     */
    matchQuality(formats: VideoFormat[], qualityArg: string): VideoFormat | null {
        const wanted = qualityArg.trim().toLowerCase();
        if (!wanted) return null;

        const byLabel = formats.find((f) => f.resolution.toLowerCase() === wanted);
        if (byLabel) return byLabel;

        const byHeight = formats.find((f) => String(f.height) === wanted);
        if (byHeight) return byHeight;

        const index = this.parseIndex(wanted, formats.length);
        return index === null ? null : formats[index];
    }

    /**
     * Resolve the format to download. An unmatched --quality degrades to the menu.
     */
    async select(
        formats: VideoFormat[],
        qualityArg: string | undefined,
        options: SelectionOptions,
    ): Promise<VideoFormat> {
        if (formats.length === 0) {
            throw new NoFormatsAvailableError();
        }

        if (qualityArg !== undefined) {
            const match = this.matchQuality(formats, qualityArg);
            if (match) {
                logger.info('Quality resolved from argument', {
                    quality: qualityArg,
                    formatId: match.formatId,
                });
                return match;
            }
            logger.warn('Requested quality not available', { quality: qualityArg });
            options.output.write(`Quality '${qualityArg}' not found. Available options:\n`);
        }

        return this.promptForFormat(formats, options);
    }

    /**
     * Render the 1-based menu and read a number until it is in range
     */
    async promptForFormat(
        formats: VideoFormat[],
        options: SelectionOptions,
    ): Promise<VideoFormat> {
        options.output.write(this.renderMenu(formats));

        return promptUntilValid(
            options.prompter,
            SELECT_PROMPT,
            (answer): Validation<VideoFormat> => {
                const index = this.parseIndex(answer, formats.length);
                return index === null
                    ? { ok: false, message: `Please enter a number between 1 and ${formats.length}` }
                    : { ok: true, value: formats[index] };
            },
            { output: options.output, maxAttempts: options.maxAttempts },
        );
    }

    renderMenu(formats: VideoFormat[]): string {
        const lines = formats.map((f, i) => `  ${i + 1}. ${this.formatLabel(f)}`);
        return `\nAvailable video qualities:\n${lines.join('\n')}\n`;
    }

    /**
     * Format human-readable label
     */
    formatLabel(format: VideoFormat): string {
        let label = format.resolution;

        if (format.fps && format.fps > 30) {
            label += ` ${format.fps}fps`;
        }
        if (format.filesize) {
            label += ` (${formatFileSize(format.filesize)})`;
        }

        return label;
    }

    /**
     * "2" -> 1 when there are at least two entries; anything else -> null
     */
    private parseIndex(value: string, count: number): number | null {
        if (!/^\d+$/.test(value)) return null;
        const index = parseInt(value, 10) - 1;
        return index >= 0 && index < count ? index : null;
    }
}

/**
 * Format file size
 */
export function formatFileSize(bytes: number): string {
    if (bytes <= 0) return 'Unknown';

    const units = ['B', 'KiB', 'MiB', 'GiB'];
    let size = bytes;
    let unitIndex = 0;

    while (size >= 1024 && unitIndex < units.length - 1) {
        size /= 1024;
        unitIndex++;
    }

    return `${size.toFixed(1)} ${units[unitIndex]}`;
}
