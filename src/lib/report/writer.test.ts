import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Summary } from '../types.js';
import { renderPaperBlock } from './render.js';
import { ReportWriter, withReportWriter } from './writer.js';

const HEADER = { category: 'cs.AI', date: '2024-01-18' };

const SUMMARY: Summary = {
  paper: { arxivId: '2401.12345', pdfUrl: 'https://arxiv.org/pdf/2401.12345' },
  text: 'We propose X.',
};

describe('ReportWriter', () => {
  let tmpDir: string;
  let filePath: string;
  let printed: string[];

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'arxiv-digest-report-'));
    filePath = path.join(tmpDir, 'report.txt');
    printed = [];
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const print = (text: string) => {
    printed.push(text);
  };

  it('writes only the header line when nothing is appended', () => {
    const writer = ReportWriter.open(filePath, HEADER, { print });
    writer.close();

    expect(fs.readFileSync(filePath, 'utf8')).toBe('arXiv cs.AI summaries for 2024-01-18\n');
    expect(printed).toEqual(['arXiv cs.AI summaries for 2024-01-18']);
  });

  it('writes each block to disk and the console as soon as it is appended', () => {
    const writer = ReportWriter.open(filePath, HEADER, { print });
    writer.append(SUMMARY);

    const block = renderPaperBlock(SUMMARY);
    expect(fs.readFileSync(filePath, 'utf8')).toBe(`arXiv cs.AI summaries for 2024-01-18\n${block}\n`);
    expect(printed).toEqual(['arXiv cs.AI summaries for 2024-01-18', block]);

    writer.close();
  });

  it('uses the configured wrap width', () => {
    const writer = ReportWriter.open(filePath, HEADER, { print, wrapWidth: 9 });
    writer.append({ ...SUMMARY, text: 'aaaa bbbb cccc' });
    writer.close();

    expect(fs.readFileSync(filePath, 'utf8')).toContain('\n\naaaa bbbb\ncccc\n');
  });

  it('refuses to write after close', () => {
    const writer = ReportWriter.open(filePath, HEADER, { print });
    writer.close();
    writer.close();

    expect(() => writer.append(SUMMARY)).toThrow(`Report ${filePath} is already closed`);
  });

  it('closes the file when the scoped callback throws', async () => {
    const captured: ReportWriter[] = [];

    await expect(
      withReportWriter(
        filePath,
        HEADER,
        async (writer) => {
          captured.push(writer);
          writer.append(SUMMARY);
          throw new Error('provider down');
        },
        { print }
      )
    ).rejects.toThrow('provider down');

    expect(captured).toHaveLength(1);
    expect(() => captured[0]?.append(SUMMARY)).toThrow('already closed');
    expect(fs.readFileSync(filePath, 'utf8')).toBe(`arXiv cs.AI summaries for 2024-01-18\n${renderPaperBlock(SUMMARY)}\n`);
  });
});
