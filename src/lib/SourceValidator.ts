import * as path from 'path';

/**
 * Image extensions accepted as input, lower-case with the leading dot.
 */
export const VALID_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.bmp',
  '.tiff',
  '.webp',
]);

const REMOTE_PREFIX_REGEX = /^https?:\/\//;

/**
 * Returns the lower-cased extension of the file a source names.
 *
 * Anything `URL` can parse has a scheme, so only its path component is
 * inspected and the query string or fragment cannot leak into the result.
 * Everything else is treated as a filesystem path.
 *
 * @example
 * sourceExtension('http://x/y/z.JPG?a=1'); // '.jpg'
 * sourceExtension('scans/photo.png');      // '.png'
 */
export function sourceExtension(source: string): string {
  const url = parseUrl(source);
  const target = url ? url.pathname : source;
  return path.posix.extname(target).toLowerCase();
}

function parseUrl(source: string): URL | null {
  try {
    return new URL(source);
  } catch {
    return null;
  }
}

/**
 * Checks whether a path or URL names a file with a supported image extension.
 */
export function isValidImage(source: string): boolean {
  return VALID_IMAGE_EXTENSIONS.has(sourceExtension(source));
}

/**
 * True for sources that must be downloaded rather than read from disk.
 */
export function isRemoteSource(source: string): boolean {
  return REMOTE_PREFIX_REGEX.test(source);
}
