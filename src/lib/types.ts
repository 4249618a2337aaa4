export type IsoDate = string; // YYYY-MM-DD

export interface Paper {
  arxivId: string;
  pdfUrl: string;
}

/** A paper as it appears on a listing page, tagged with the day heading it sits under. */
export interface ListingEntry extends Paper {
  listedOn: IsoDate | null;
}

export interface Summary {
  paper: Paper;
  text: string;
}

export interface AppConfig {
  llm: {
    provider: string;
    model?: string | undefined;
    baseUrl?: string | undefined; // OpenAI-compatible providers only (e.g. a remote ollama)
    temperature: number;
    maxTokens: number;
  };
  listing: {
    pageSize: number;
    maxPages: number;
  };
  pdf: {
    maxPages: number;
    maxChars: number;
  };
  report: {
    outputDir: string;
    wrapWidth: number;
  };
}
