/**
 * Core Types for the download pipeline
 */

// ============================================================================
// Video & Format Types
// ============================================================================

/**
 * One encoding as reported by the extractor, before any filtering
 */
export interface RawFormat {
    formatId: string;
    extension: string;
    height?: number;
    /** Codec names; undefined or 'none' when the stream is absent */
    vcodec?: string;
    acodec?: string;
    filesize?: number;
    bitrate?: number;
    fps?: number;
}

export interface VideoInfo {
    id: string;
    title: string;
    formats: RawFormat[];
}

/**
 * A downloadable mp4 carrying both video and audio
 */
export interface VideoFormat {
    readonly formatId: string;
    /** e.g. "720p" */
    readonly resolution: string;
    readonly height: number;
    readonly container: 'mp4';
    readonly hasVideo: boolean;
    readonly hasAudio: boolean;
    readonly filesize?: number;
    readonly fps?: number;
}

export interface FormatListing {
    title: string;
    formats: VideoFormat[];
}

// ============================================================================
// Download Types
// ============================================================================

export interface DownloadProgress {
    downloadedBytes: number;
    totalBytes?: number;
    speed?: number; // bytes per second
    eta?: number;   // estimated time remaining in seconds
}

export type ProgressCallback = (progress: DownloadProgress) => void;

export interface DownloadRequest {
    url: string;
    title: string;
    format: VideoFormat;
    downloadDir: string;
}

// ============================================================================
// Extractor contract
// ============================================================================

/**
 * The extraction/download collaborator. yt-dlp is the production implementation.
 */
export interface VideoExtractor {
    readonly name: string;

    getVideoInfo(url: string): Promise<VideoInfo>;

    /**
     * Fetch one format into `outputDir`, named after the video title.
     * `onProgress` is called synchronously from the output handler.
     * @returns path of the written file
     */
    download(
        url: string,
        formatId: string,
        outputDir: string,
        onProgress?: ProgressCallback,
    ): Promise<string>;
}
