import { beforeEach, describe, expect, it, vi } from 'vitest';

const { get } = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock('axios', () => ({ default: { get } }));

import { fetchPage } from '../fetcher.js';
import { FetchError } from '../../utils/errors.js';

describe('fetchPage', () => {
  beforeEach(() => {
    get.mockReset();
  });

  it('returns the body of a 200 response', async () => {
    get.mockResolvedValue({ status: 200, data: '<html>front page</html>' });

    await expect(fetchPage('https://news.test/', { timeoutMs: 5000, userAgent: 'test-agent' })).resolves.toBe(
      '<html>front page</html>'
    );
    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith(
      'https://news.test/',
      expect.objectContaining({
        timeout: 5000,
        headers: expect.objectContaining({ 'User-Agent': 'test-agent' }),
      })
    );
  });

  it('rejects non-success statuses with the status attached', async () => {
    get.mockResolvedValue({ status: 503, data: 'unavailable' });

    const error = await fetchPage('https://news.test/').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && error.status).toBe(503);
    expect(error instanceof FetchError && error.url).toBe('https://news.test/');
  });

  it('wraps transport failures without retrying', async () => {
    get.mockRejectedValue(new Error('socket hang up'));

    await expect(fetchPage('https://news.test/')).rejects.toThrow('Request error: socket hang up');
    expect(get).toHaveBeenCalledTimes(1);
  });
});
