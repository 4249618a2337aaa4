import path from 'node:path';

import { downloadToFile } from './download.js';
import { extractLeadingText } from './extract.js';
import type { ChatClient, ProviderName } from './llm/types.js';
import { withTempDir } from './tmp.js';

export const SYSTEM_PROMPT =
  'You are a scientific paper summarizer. Create a very concise summary (5 sentences or less) of the paper text provided. Focus on the main accomplishments and findings.';

export interface SummarizerOptions {
  client: ChatClient;
  provider: ProviderName;
  model: string;
  maxPages?: number; // default 10
  maxChars?: number; // default 1024
  temperature?: number; // default 0.3
  maxTokens?: number; // default 200
}

export interface PdfSummarizer {
  summarizePdf(pdfUrl: string): Promise<string>;
}

export class Summarizer implements PdfSummarizer {
  readonly maxPages: number;
  readonly maxChars: number;
  readonly temperature: number;
  readonly maxTokens: number;

  constructor(private readonly opts: SummarizerOptions) {
    this.maxPages = opts.maxPages ?? 10;
    this.maxChars = opts.maxChars ?? 1024;
    this.temperature = opts.temperature ?? 0.3;
    this.maxTokens = opts.maxTokens ?? 200;
  }

  /**
   * Download the PDF into a scratch directory, read its leading pages and
   * summarize them. Download errors (`PdfDownloadError`) and provider errors
   * propagate; the scratch directory is removed either way.
   */
  async summarizePdf(pdfUrl: string): Promise<string> {
    const text = await withTempDir('arxiv-digest-', async (dir) => {
      const pdfPath = path.join(dir, 'paper.pdf');
      await downloadToFile(pdfUrl, pdfPath);
      return extractLeadingText(pdfPath, this.maxPages);
    });
    return this.summarizeText(text);
  }

  /** Send the first `maxChars` characters, empty or not, and return the reply as given. */
  async summarizeText(text: string): Promise<string> {
    return this.opts.client.complete({
      provider: this.opts.provider,
      model: this.opts.model,
      system: SYSTEM_PROMPT,
      user: text.slice(0, this.maxChars),
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });
  }
}
