import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { request, type Dispatcher } from 'undici';

import { USER_AGENT } from './arxiv.js';
import { PdfDownloadError } from './errors.js';
import { ensureDir } from './storage.js';

export interface DownloadResult {
  bytes: number;
}

export async function downloadToFile(url: string, outPath: string, timeoutMs = 60_000): Promise<DownloadResult> {
  ensureDir(path.dirname(outPath));

  let res: Dispatcher.ResponseData;
  try {
    res = await request(url, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
      bodyTimeout: timeoutMs,
      headersTimeout: timeoutMs,
      // /pdf/<id> redirects to the latest version
      maxRedirections: 5,
    });
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new PdfDownloadError(`Download failed for ${url}: ${msg}`, url, { cause: e });
  }

  const { body, statusCode } = res;
  if (statusCode < 200 || statusCode >= 300) {
    await body.dump();
    throw new PdfDownloadError(`Download failed: ${statusCode} for ${url}`, url);
  }

  try {
    await pipeline(body, fs.createWriteStream(outPath));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new PdfDownloadError(`Download interrupted for ${url}: ${msg}`, url, { cause: e });
  }

  return { bytes: fs.statSync(outPath).size };
}
