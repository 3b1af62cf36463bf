import { z } from 'zod';
import { InvalidUrlError } from './errors';
import { logger } from './logger';

const YOUTUBE_HOSTS = [/(^|\.)youtube\.com$/, /^youtu\.be$/];

function tryParseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

// refinements still run after a failed string check, so they parse defensively
const UrlSchema = z
  .string()
  .trim()
  .min(1, { message: 'URL is required' })
  .url({ message: 'Not a valid URL' })
  .refine(
    (url) => !url.includes(';') && !url.includes('|') && !url.includes('&&'),
    { message: 'URL contains forbidden characters' },
  )
  .refine(
    (url) => {
      const parsed = tryParseUrl(url);
      return parsed === null || ['http:', 'https:'].includes(parsed.protocol);
    },
    { message: 'Only http(s) URLs are supported' },
  )
  .refine(
    (url) => {
      const parsed = tryParseUrl(url);
      if (parsed === null) return true;
      const hostname = parsed.hostname.toLowerCase();
      return YOUTUBE_HOSTS.some((pattern) => pattern.test(hostname));
    },
    { message: 'Not a YouTube URL (expected youtube.com or youtu.be)' },
  );

/**
 * Validate a video URL before anything touches the network.
 * @returns the trimmed URL
 * @throws InvalidUrlError with the first failing rule's message
 */
export function validateVideoUrl(input: string): string {
  const result = UrlSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const message = result.error.issues[0]?.message ?? 'Invalid URL';
  logger.debug('Rejected URL', { url: input, reason: message });

  const trimmed = input.trim();
  throw new InvalidUrlError(trimmed ? `${message}: ${trimmed}` : message);
}
