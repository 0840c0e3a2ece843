import { logger } from '../../logger';

export type ImageDownloader = (url: string) => Promise<Buffer | undefined>;

interface ImageDownloaderOptions {
  timeoutMs: number;
  maxBytes: number;
  fetchImpl?: typeof fetch;
}

/**
 * Fetches an image over HTTP. Resolves `undefined` on any failure: timeouts,
 * non-2xx responses, non-image content and bodies over `maxBytes`.
 */
export const createImageDownloader = (options: ImageDownloaderOptions): ImageDownloader => {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (url) => {
    try {
      const response = await fetchImpl(url, {
        signal: AbortSignal.timeout(options.timeoutMs),
        redirect: 'follow',
      });
      if (!response.ok) {
        logger.warn(`[Download] ${url} responded ${response.status}`);
        return undefined;
      }
      const contentType = response.headers.get('content-type') ?? '';
      if (contentType && !contentType.startsWith('image/')) {
        logger.warn(`[Download] ${url} is not an image (${contentType})`);
        return undefined;
      }
      const declared = Number(response.headers.get('content-length') ?? 0);
      if (declared > options.maxBytes) {
        logger.warn(`[Download] ${url} is too large (${declared} bytes)`);
        return undefined;
      }
      const buffer = Buffer.from(await response.arrayBuffer());
      if (buffer.byteLength > options.maxBytes) {
        logger.warn(`[Download] ${url} is too large (${buffer.byteLength} bytes)`);
        return undefined;
      }
      return buffer;
    } catch (error) {
      logger.warn(`[Download] Unable to fetch ${url}: ${(error as Error).message}`);
      return undefined;
    }
  };
};
