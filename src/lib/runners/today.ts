import path from 'node:path';

import type { ListingFetcher } from '../arxiv.js';
import { PdfDownloadError } from '../errors.js';
import { withReportWriter } from '../report/writer.js';
import { ensureDir, localIsoDate, reportPath as buildReportPath } from '../storage.js';
import type { PdfSummarizer } from '../summarize.js';
import type { IsoDate } from '../types.js';
import { collectTodaysPapers } from '../walker.js';

export interface TodayRunOptions {
  category: string;
  summarizer: PdfSummarizer;
  outputDir?: string; // default: cwd
  now?: Date;
  pageSize?: number;
  maxListingPages?: number;
  wrapWidth?: number;
  fetchPage?: ListingFetcher;
  print?: (text: string) => void;
}

export interface TodayRunResult {
  category: string;
  date: IsoDate;
  reportPath: string;
  papers: number;
  summarized: number;
  failed: Array<{ arxivId: string; error: string }>;
}

export async function runToday(opts: TodayRunOptions): Promise<TodayRunResult> {
  const {
    category,
    summarizer,
    outputDir = process.cwd(),
    now = new Date(),
    pageSize,
    maxListingPages,
    wrapWidth,
    fetchPage,
    print,
  } = opts;

  console.log(`Collecting today's ${category} listing...`);
  const walk = await collectTodaysPapers(category, { pageSize, maxPages: maxListingPages, fetchPage });
  const date = walk.date ?? localIsoDate(now);
  console.log(`Found ${walk.papers.length} paper(s) for ${category} on ${date}.`);

  ensureDir(outputDir);
  const reportPath = buildReportPath(outputDir, category, date);

  const failed: TodayRunResult['failed'] = [];
  let summarized = 0;

  await withReportWriter(
    reportPath,
    { category, date },
    async (writer) => {
      for (const [i, paper] of walk.papers.entries()) {
        console.log(`[${i + 1}/${walk.papers.length}] ${paper.arxivId}`);
        let text: string;
        try {
          text = await summarizer.summarizePdf(paper.pdfUrl);
          summarized += 1;
        } catch (e) {
          // Only a missing PDF is survivable; provider and other errors end the run.
          if (!(e instanceof PdfDownloadError)) throw e;
          console.warn(`Skipping summary for ${paper.arxivId}: ${e.message}`);
          failed.push({ arxivId: paper.arxivId, error: e.message });
          text = `[summary unavailable: ${e.message}]`;
        }
        writer.append({ paper, text });
      }
    },
    { wrapWidth, print }
  );

  return {
    category,
    date,
    reportPath: path.resolve(reportPath),
    papers: walk.papers.length,
    summarized,
    failed,
  };
}
