import fs from 'node:fs';
import path from 'node:path';

import type { IsoDate } from './types.js';

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

/** Calendar date in the local timezone, used when a listing carries no date of its own. */
export function localIsoDate(now = new Date()): IsoDate {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

export function reportFileName(category: string, date: IsoDate): string {
  return `arxiv_summaries_${category}_${date}.txt`;
}

export function reportPath(outputDir: string, category: string, date: IsoDate): string {
  return path.join(outputDir, reportFileName(category, date));
}
