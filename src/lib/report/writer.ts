import fs from 'node:fs';

import type { Summary } from '../types.js';
import { DEFAULT_WRAP_WIDTH, renderPaperBlock, renderReportHeader, type ReportHeader } from './render.js';

export interface ReportWriterOptions {
  wrapWidth?: number;
  /** Receives every block as it is written. Defaults to console.log. */
  print?: (text: string) => void;
}

/**
 * Owns the report file for one run. Each block goes to disk as soon as it is
 * appended, so a run that dies half-way still leaves the finished papers.
 */
export class ReportWriter {
  private fd: number | null;

  private constructor(
    readonly filePath: string,
    fd: number,
    private readonly wrapWidth: number,
    private readonly print: (text: string) => void
  ) {
    this.fd = fd;
  }

  static open(filePath: string, header: ReportHeader, opts: ReportWriterOptions = {}): ReportWriter {
    const { wrapWidth = DEFAULT_WRAP_WIDTH, print = (text: string) => console.log(text) } = opts;
    const fd = fs.openSync(filePath, 'w');
    const writer = new ReportWriter(filePath, fd, wrapWidth, print);
    const line = renderReportHeader(header);
    writer.write(`${line}\n`);
    print(line);
    return writer;
  }

  append(summary: Summary): void {
    const block = renderPaperBlock(summary, this.wrapWidth);
    this.write(`${block}\n`);
    this.print(block);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }

  private write(text: string): void {
    if (this.fd === null) throw new Error(`Report ${this.filePath} is already closed`);
    fs.writeSync(this.fd, text, null, 'utf8');
  }
}

/** Open a report, hand it to `fn`, and close it afterwards even if `fn` throws. */
export async function withReportWriter<T>(
  filePath: string,
  header: ReportHeader,
  fn: (writer: ReportWriter) => Promise<T>,
  opts: ReportWriterOptions = {}
): Promise<T> {
  const writer = ReportWriter.open(filePath, header, opts);
  try {
    return await fn(writer);
  } finally {
    writer.close();
  }
}
