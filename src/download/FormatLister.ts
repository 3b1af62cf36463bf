import { ExtractionError, NoFormatsAvailableError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import {
    FormatListing,
    RawFormat,
    VideoExtractor,
    VideoFormat,
    VideoInfo,
} from './core/types';

const TARGET_CONTAINER = 'mp4';

function hasStream(codec?: string): boolean {
    return codec !== undefined && codec !== 'none';
}

/**
 * True for an mp4 carrying both streams with a known height
 */
export function isCombinedMp4(format: RawFormat): boolean {
    return (
        format.extension === TARGET_CONTAINER &&
        hasStream(format.vcodec) &&
        hasStream(format.acodec) &&
        typeof format.height === 'number' &&
        format.height > 0
    );
}

/**
 * Ranks two encodings of the same resolution; the better one wins the dedupe
 */
function isBetter(candidate: RawFormat, current: RawFormat): boolean {
    const sizeDiff = (candidate.filesize ?? 0) - (current.filesize ?? 0);
    if (sizeDiff !== 0) return sizeDiff > 0;
    return (candidate.bitrate ?? 0) > (current.bitrate ?? 0);
}

/**
 * Keep combined mp4 formats, one per resolution, highest resolution first
 */
export function filterFormats(formats: RawFormat[]): VideoFormat[] {
    const byHeight = new Map<number, RawFormat>();

    for (const format of formats) {
        if (!isCombinedMp4(format) || format.height === undefined) continue;

        const existing = byHeight.get(format.height);
        if (!existing || isBetter(format, existing)) {
            byHeight.set(format.height, format);
        }
    }

    return Array.from(byHeight.entries())
        .sort(([a], [b]) => b - a)
        .map(([height, f]) => ({
            formatId: f.formatId,
            resolution: `${height}p`,
            height,
            container: TARGET_CONTAINER,
            hasVideo: true,
            hasAudio: true,
            filesize: f.filesize,
            fps: f.fps,
        }));
}

/**
 * Fetch metadata for `url` and return the downloadable formats.
 * @throws ExtractionError when the extractor fails
 * @throws NoFormatsAvailableError when nothing survives the filter
 */
export async function listFormats(
    extractor: VideoExtractor,
    url: string,
): Promise<FormatListing> {
    let info: VideoInfo;
    try {
        info = await extractor.getVideoInfo(url);
    } catch (error) {
        logger.debug('Extraction failed', { url, error: errorMessage(error) });
        throw new ExtractionError(errorMessage(error));
    }

    const formats = filterFormats(info.formats);
    logger.info('Formats listed', {
        videoId: info.id,
        total: info.formats.length,
        usable: formats.length,
    });

    if (formats.length === 0) {
        throw new NoFormatsAvailableError();
    }

    return { title: info.title, formats };
}
