/**
 * HTTP Downloads
 *
 * Fetches release artifacts and install scripts into memory.
 */

import { InstallError, errorMessage } from '../provision/errors.js';

export interface Downloader {
  /**
   * Download a URL
   *
   * @throws InstallError with kind 'network' on connection failure or a non-2xx status
   */
  download(url: string, signal?: AbortSignal): Promise<Buffer>;
}

export function createDownloader(): Downloader {
  return {
    async download(url: string, signal?: AbortSignal): Promise<Buffer> {
      let response: Response;
      try {
        response = await fetch(url, { redirect: 'follow', signal });
      } catch (e) {
        throw new InstallError('network', 'Network error downloading ' + url + ': ' + errorMessage(e));
      }

      if (!response.ok) {
        throw new InstallError('network', 'HTTP ' + response.status + ' downloading ' + url);
      }

      try {
        return Buffer.from(await response.arrayBuffer());
      } catch (e) {
        throw new InstallError('network', 'Failed to read download from ' + url + ': ' + errorMessage(e));
      }
    },
  };
}
