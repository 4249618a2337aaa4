import { fetchListingPage, type ListingFetcher } from './arxiv.js';
import { parseListingPage } from './listing.js';
import type { IsoDate, Paper } from './types.js';

export interface WalkOptions {
  pageSize?: number; // default 25
  maxPages?: number; // default 200
  fetchPage?: ListingFetcher;
}

export interface WalkResult {
  /** The first page's day heading; null when the category has no recent listing. */
  date: IsoDate | null;
  papers: Paper[];
}

/**
 * Collect every paper listed under the most recent day of a category.
 *
 * arXiv has no "today only" query, so this walks `/list/<cat>/recent` in
 * `pageSize` steps. The target date is taken once from the first page. The
 * walk stops when a page's heading names another day, when a page has no
 * entries, or when entries under a different heading show up mid-page. A page
 * without any heading is assumed to continue the current day.
 */
export async function collectTodaysPapers(category: string, opts: WalkOptions = {}): Promise<WalkResult> {
  const { pageSize = 25, maxPages = 200, fetchPage = fetchListingPage } = opts;

  const first = parseListingPage(await fetchPage(category, 0, pageSize));
  if (first.date === null) {
    console.warn(`No date heading on the first ${category} listing page; nothing to collect.`);
    return { date: null, papers: [] };
  }

  const targetDate = first.date;
  const papers: Paper[] = [];

  for (let pageIndex = 0; ; pageIndex += 1) {
    if (pageIndex >= maxPages) {
      console.warn(`Stopped ${category} listing walk after ${maxPages} pages without reaching the date boundary.`);
      break;
    }

    const skip = pageIndex * pageSize;
    const page = pageIndex === 0 ? first : parseListingPage(await fetchPage(category, skip, pageSize));

    if (page.date === null) {
      console.warn(`No date heading on ${category} listing page skip=${skip}; assuming ${targetDate} continues.`);
    } else if (page.date !== targetDate) {
      break;
    }

    if (page.entries.length === 0) break;

    const sameDay = page.entries.filter((e) => e.listedOn === null || e.listedOn === targetDate);
    for (const e of sameDay) papers.push({ arxivId: e.arxivId, pdfUrl: e.pdfUrl });

    // The page straddles two days; anything further down is older.
    if (sameDay.length < page.entries.length) break;
  }

  return { date: targetDate, papers };
}
