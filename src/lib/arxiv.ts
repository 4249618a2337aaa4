export const ARXIV_ORIGIN = 'https://arxiv.org';

export const USER_AGENT = 'arxiv-digest/0.1 (daily category summaries)';

const FETCH_TIMEOUT_MS = 30_000;

// Archive with optional subject class: cs.AI, hep-th, astro-ph.CO, q-bio.NC, ...
const CATEGORY_RE = /^[a-z][a-z-]*(\.[A-Za-z][A-Za-z-]*)?$/;

export function isValidCategory(category: string): boolean {
  return CATEGORY_RE.test(category);
}

export function listingUrl(category: string, skip: number, pageSize: number): string {
  return `${ARXIV_ORIGIN}/list/${encodeURIComponent(category)}/recent?skip=${skip}&show=${pageSize}`;
}

export function absUrl(arxivId: string): string {
  return `${ARXIV_ORIGIN}/abs/${arxivId}`;
}

/**
 * Resolve a listing page's "Download PDF" href against arxiv.org and take the
 * identifier from the last path segment.
 *
 * `/pdf/2401.12345` → `{ arxivId: '2401.12345', pdfUrl: 'https://arxiv.org/pdf/2401.12345' }`
 */
export function paperFromPdfHref(href: string): { arxivId: string; pdfUrl: string } | null {
  let url: URL;
  try {
    url = new URL(href.trim(), ARXIV_ORIGIN);
  } catch {
    return null;
  }
  const segments = url.pathname.split('/').filter(Boolean);
  const arxivId = segments[segments.length - 1];
  if (!arxivId) return null;
  return { arxivId, pdfUrl: url.toString() };
}

export type ListingFetcher = (category: string, skip: number, pageSize: number) => Promise<string>;

// No retry here: a failed listing page ends the run.
export const fetchListingPage: ListingFetcher = async (category, skip, pageSize) => {
  const url = listingUrl(category, skip, pageSize);
  let res: Response;
  try {
    res = await fetch(url, {
      signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
      headers: { 'User-Agent': USER_AGENT },
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`arXiv listing fetch failed for ${category} (skip=${skip}): ${msg}`, { cause: err });
  }

  if (!res.ok) {
    throw new Error(`arXiv listing fetch failed for ${category} (skip=${skip}): ${res.status} ${res.statusText}`);
  }
  return await res.text();
};
