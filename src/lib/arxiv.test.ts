import { afterEach, describe, expect, it, vi } from 'vitest';
import { USER_AGENT, absUrl, fetchListingPage, isValidCategory, listingUrl, paperFromPdfHref } from './arxiv.js';

describe('paperFromPdfHref', () => {
  it('derives id and absolute url from a relative link', () => {
    expect(paperFromPdfHref('/pdf/2401.12345')).toEqual({
      arxivId: '2401.12345',
      pdfUrl: 'https://arxiv.org/pdf/2401.12345',
    });
  });

  it('keeps version suffixes and absolute links', () => {
    expect(paperFromPdfHref('https://arxiv.org/pdf/2401.12345v2')).toEqual({
      arxivId: '2401.12345v2',
      pdfUrl: 'https://arxiv.org/pdf/2401.12345v2',
    });
  });

  it('takes the final segment of old-style ids', () => {
    expect(paperFromPdfHref('/pdf/hep-th/9901001')?.arxivId).toBe('9901001');
  });

  it('returns null when the link has no path', () => {
    expect(paperFromPdfHref('/')).toBeNull();
  });
});

describe('urls', () => {
  it('builds the paginated recent listing url', () => {
    expect(listingUrl('cs.AI', 50, 25)).toBe('https://arxiv.org/list/cs.AI/recent?skip=50&show=25');
  });

  it('builds the abstract url', () => {
    expect(absUrl('2401.12345')).toBe('https://arxiv.org/abs/2401.12345');
  });
});

describe('isValidCategory', () => {
  it('accepts archive and archive.subject codes', () => {
    expect(isValidCategory('cs.AI')).toBe(true);
    expect(isValidCategory('hep-th')).toBe(true);
    expect(isValidCategory('astro-ph.CO')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isValidCategory('')).toBe(false);
    expect(isValidCategory('../etc')).toBe(false);
    expect(isValidCategory('cs AI')).toBe(false);
  });
});

describe('fetchListingPage', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the page html', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, text: async () => '<html></html>' });
    vi.stubGlobal('fetch', mockFetch);

    const html = await fetchListingPage('cs.AI', 25, 25);

    expect(html).toBe('<html></html>');
    expect(mockFetch).toHaveBeenCalledWith(
      'https://arxiv.org/list/cs.AI/recent?skip=25&show=25',
      expect.objectContaining({ headers: { 'User-Agent': USER_AGENT } })
    );
  });

  it('throws on HTTP errors without retrying', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: false, status: 503, statusText: 'Service Unavailable' });
    vi.stubGlobal('fetch', mockFetch);

    await expect(fetchListingPage('cs.AI', 0, 25)).rejects.toThrow(
      'arXiv listing fetch failed for cs.AI (skip=0): 503 Service Unavailable'
    );
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('wraps network failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNRESET')));
    await expect(fetchListingPage('cs.AI', 0, 25)).rejects.toThrow(
      'arXiv listing fetch failed for cs.AI (skip=0): ECONNRESET'
    );
  });
});
