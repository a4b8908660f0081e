/**
 * HTTP archive fetcher tests with a mocked axios client
 */

import { FetchError } from '../errors';
import { HttpArchiveFetcher } from './http-fetcher';

describe('HttpArchiveFetcher', () => {
  const URL = 'https://archive.test/synop/2019/2019_353140200_s.zip';

  it('should return body bytes and ok for a 2xx response', async () => {
    const get = jest.fn().mockResolvedValue({ status: 200, data: new Uint8Array([1, 2, 3]).buffer });
    const fetcher = new HttpArchiveFetcher(1500, { get });

    const result = await fetcher.fetch(URL);

    expect(result.status).toBe(200);
    expect(result.ok).toBe(true);
    expect([...result.data]).toEqual([1, 2, 3]);
  });

  it('should request binary content with the configured timeout', async () => {
    const get = jest.fn().mockResolvedValue({ status: 200, data: new ArrayBuffer(0) });
    await new HttpArchiveFetcher(1500, { get }).fetch(URL);

    expect(get).toHaveBeenCalledWith(
      URL,
      expect.objectContaining({ responseType: 'arraybuffer', timeout: 1500 })
    );
  });

  it('should report a non-success status without throwing', async () => {
    const get = jest.fn().mockResolvedValue({ status: 404, data: new ArrayBuffer(0) });

    const result = await new HttpArchiveFetcher(1500, { get }).fetch(URL);

    expect(result).toMatchObject({ status: 404, ok: false });
  });

  it('should throw FetchError with status 0 when no response arrives', async () => {
    const get = jest.fn().mockRejectedValue(new Error('socket hang up'));
    const fetch = new HttpArchiveFetcher(1500, { get }).fetch(URL);

    await expect(fetch).rejects.toBeInstanceOf(FetchError);
    await expect(fetch).rejects.toMatchObject({
      status: 0,
      message: 'Archive request failed: socket hang up',
      context: { url: URL, status: 0 },
    });
  });
});
