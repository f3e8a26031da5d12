/**
 * Tests for the HTTP downloader
 *
 * fetch is replaced in process; nothing leaves the machine.
 */
import { createDownloader } from '../src/utils/download';
import { InstallError } from '../src/provision/errors';

const DOWNLOAD_URL = 'https://example.test/tool.tar.gz';

afterEach(() => {
  jest.restoreAllMocks();
});

describe('createDownloader', () => {
  test('returns the response body', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(new Response('payload'));

    const data = await createDownloader().download(DOWNLOAD_URL);

    expect(data.toString()).toBe('payload');
    expect(fetchSpy).toHaveBeenCalledWith(DOWNLOAD_URL, expect.objectContaining({ redirect: 'follow' }));
  });

  test('a non-2xx status is a network error', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('missing', { status: 404 }));

    const attempt = createDownloader().download(DOWNLOAD_URL);

    await expect(attempt).rejects.toBeInstanceOf(InstallError);
    await expect(attempt).rejects.toMatchObject({
      kind: 'network',
      message: 'HTTP 404 downloading ' + DOWNLOAD_URL,
    });
  });

  test('a connection failure is a network error', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    await expect(createDownloader().download(DOWNLOAD_URL)).rejects.toMatchObject({
      kind: 'network',
      message: 'Network error downloading ' + DOWNLOAD_URL + ': fetch failed',
    });
  });
});
