import { absUrl } from '../arxiv.js';
import type { IsoDate, Summary } from '../types.js';

export const DEFAULT_WRAP_WIDTH = 150;

export const RULE = '-'.repeat(80);

export interface ReportHeader {
  category: string;
  date: IsoDate;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Hard-wrap `text` so no line is longer than `width`. Lines break at the last
 * space at or before column `width`; a stretch without one is cut at `width`,
 * one code unit earlier when that would split a surrogate pair.
 * Existing line breaks are kept.
 */
export function wrapText(text: string, width = DEFAULT_WRAP_WIDTH): string {
  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`wrap width must be a positive integer, got ${width}`);
  }

  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    let rest = paragraph;
    while (rest.length > width) {
      const cut = rest.lastIndexOf(' ', width);
      if (cut <= 0) {
        // Keep surrogate pairs on one line.
        let end = width;
        if (isHighSurrogate(rest.charCodeAt(end - 1))) end = end > 1 ? end - 1 : end + 1;
        lines.push(rest.slice(0, end));
        rest = rest.slice(end);
      } else {
        lines.push(rest.slice(0, cut));
        rest = rest.slice(cut + 1);
      }
    }
    lines.push(rest);
  }
  return lines.join('\n');
}

export function renderReportHeader(header: ReportHeader): string {
  return `arXiv ${header.category} summaries for ${header.date}`;
}

export function renderPaperBlock(summary: Summary, width = DEFAULT_WRAP_WIDTH): string {
  const { paper } = summary;
  const lines: string[] = [];
  lines.push('');
  lines.push(`Paper ID: ${paper.arxivId}`);
  lines.push(`Abstract: ${absUrl(paper.arxivId)}`);
  lines.push(`PDF: ${paper.pdfUrl}`);
  lines.push('');
  lines.push(wrapText(summary.text.trim(), width));
  lines.push(RULE);
  return lines.join('\n');
}
