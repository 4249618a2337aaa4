/** Bad flags, config.yml or environment. Raised before any network activity. */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** A single paper's PDF could not be fetched. The run carries on without it. */
export class PdfDownloadError extends Error {
  constructor(
    message: string,
    readonly url: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'PdfDownloadError';
  }
}

export class ProviderError extends Error {
  constructor(
    message: string,
    readonly provider: string,
    readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}
