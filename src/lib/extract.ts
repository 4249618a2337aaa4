import { execFileSync } from 'node:child_process';
import fs from 'node:fs';

export function hasPdfToText(): boolean {
  try {
    execFileSync('pdftotext', ['-v'], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

export function isPdfFile(pdfPath: string): boolean {
  try {
    const fd = fs.openSync(pdfPath, 'r');
    const buf = Buffer.alloc(5);
    try {
      fs.readSync(fd, buf, 0, 5, 0);
    } finally {
      fs.closeSync(fd);
    }
    return buf.toString('utf8') === '%PDF-';
  } catch {
    return false;
  }
}

/**
 * Text of pages 1..maxPages. A file that is not a PDF, or one pdftotext cannot
 * read (encrypted, damaged), gives '' so the caller still has something to send.
 * Image-only scans come back as '' from pdftotext itself.
 */
export function extractLeadingText(pdfPath: string, maxPages: number): string {
  if (!isPdfFile(pdfPath)) {
    console.warn(`Not a PDF (missing %PDF- header), no text extracted: ${pdfPath}`);
    return '';
  }

  try {
    return execFileSync('pdftotext', ['-f', '1', '-l', String(maxPages), '-enc', 'UTF-8', pdfPath, '-'], {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
      maxBuffer: 64 * 1024 * 1024,
    });
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.warn(`pdftotext failed for ${pdfPath}, continuing with empty text: ${msg}`);
    return '';
  }
}
