import { load } from 'cheerio';

import { paperFromPdfHref } from './arxiv.js';
import type { IsoDate, ListingEntry } from './types.js';

export interface ListingPage {
  /** First well-formed day heading on the page, or null when there is none. */
  date: IsoDate | null;
  entries: ListingEntry[];
}

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// "Thu, 18 Jan 2024 (showing 25 of 104 entries)"
const HEADING_DATE_RE = /\b[A-Za-z]{3,},\s+(\d{1,2})\s+([A-Za-z]{3,})\s+(\d{4})\b/;

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

/** Parse a listing day heading into an ISO date. Anything malformed or impossible gives null. */
export function parseListingDate(text: string): IsoDate | null {
  const m = text.match(HEADING_DATE_RE);
  if (!m) return null;

  const day = Number(m[1]);
  const month = MONTHS.indexOf((m[2] ?? '').slice(0, 3).toLowerCase());
  const year = Number(m[3]);
  if (month < 0) return null;

  const d = new Date(Date.UTC(year, month, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month || d.getUTCDate() !== day) return null;
  return `${year}-${pad2(month + 1)}-${pad2(day)}`;
}

function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function parseListingPage(html: string): ListingPage {
  const $ = load(html);

  let date: IsoDate | null = null;
  for (const h3 of $('h3').toArray()) {
    date = parseListingDate(squash($(h3).text()));
    if (date) break;
  }

  const entries: ListingEntry[] = [];
  $('dl#articles > dt').each((_, dt) => {
    const link = $(dt).find('a[title="Download PDF"]').first();
    const href = link.attr('href');
    const paper = href ? paperFromPdfHref(href) : null;
    if (!paper) {
      const label = squash($(dt).text()).slice(0, 80);
      console.warn(`Skipping listing entry without a PDF link: ${label || '(empty)'}`);
      return;
    }

    // Newer listings put the day heading inside the <dl>; older ones put it just before.
    let heading = $(dt).prevAll('h3').first();
    if (heading.length === 0) heading = $(dt).closest('dl').prevAll('h3').first();
    const listedOn = heading.length > 0 ? parseListingDate(squash(heading.text())) : null;

    entries.push({ ...paper, listedOn });
  });

  return { date, entries };
}
