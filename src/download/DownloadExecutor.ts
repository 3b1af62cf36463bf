import fs from 'fs/promises';
import { DownloadError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { TextOutput } from '../types/app';
import { DownloadRequest, VideoExtractor } from './core/types';
import { ProgressRenderer } from './ProgressRenderer';

/**
 * Create the download directory if it doesn't exist
 */
export async function ensureDownloadDir(dir: string): Promise<void> {
    try {
        await fs.mkdir(dir, { recursive: true });
        logger.debug('Download directory ready', { path: dir });
    } catch (error) {
        logger.error('Failed to create download directory', { path: dir, error: errorMessage(error) });
        throw new DownloadError(`cannot create directory ${dir}: ${errorMessage(error)}`);
    }
}

/**
 * Fetch the selected format into the configured directory.
 * @returns path of the written file
 * @throws DownloadError on any I/O or extractor failure; nothing is retried
 */
export async function downloadFormat(
    extractor: VideoExtractor,
    request: DownloadRequest,
    output: TextOutput,
): Promise<string> {
    await ensureDownloadDir(request.downloadDir);

    output.write(`\nDownloading: ${request.title} [${request.format.resolution}]\n`);
    output.write(`Saving to: ${request.downloadDir}\n\n`);

    const renderer = new ProgressRenderer(output);
    const startTime = Date.now();

    try {
        const filePath = await extractor.download(
            request.url,
            request.format.formatId,
            request.downloadDir,
            renderer.update,
        );
        renderer.complete(filePath);
        logger.info('Download finished', {
            formatId: request.format.formatId,
            filePath,
            elapsedMs: Date.now() - startTime,
        });
        return filePath;
    } catch (error) {
        renderer.abort();
        throw new DownloadError(errorMessage(error));
    }
}
