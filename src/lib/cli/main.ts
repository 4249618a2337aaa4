import { isValidCategory } from '../arxiv.js';
import { loadConfig, resolveRunSettings } from '../config.js';
import { ConfigError } from '../errors.js';
import { hasPdfToText } from '../extract.js';
import { createChatClient } from '../llm/client.js';
import { isSupportedProvider, SUPPORTED_PROVIDERS, type ChatClient, type ProviderName } from '../llm/types.js';
import { runToday, type TodayRunOptions } from '../runners/today.js';
import { Summarizer } from '../summarize.js';
import { parseArgs, USAGE } from './args.js';

export interface CliEnv {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Test seams; the real ones are used when absent. */
  chatClient?: ChatClient;
  fetchPage?: TodayRunOptions['fetchPage'];
  pdfToTextAvailable?: () => boolean;
}

/**
 * Entry point behind `npm run summarize`. Returns the process exit code.
 * An unsupported provider is reported with the supported list and exits 0,
 * before anything touches the network.
 */
export async function runCli(argv: string[], cliEnv: CliEnv): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.errors.length > 0 || !args.category) {
    for (const err of args.errors) console.error(`Error: ${err}`);
    if (!args.category) console.error('Error: missing <category> argument');
    console.error('');
    console.error(USAGE);
    return 1;
  }

  try {
    const config = loadConfig(cliEnv.cwd);

    const provider = args.provider ?? config.llm.provider;
    if (!isSupportedProvider(provider)) {
      console.log(`Error: Provider '${provider}' is not supported.`);
      console.log('');
      console.log('Supported providers:');
      for (const p of SUPPORTED_PROVIDERS) console.log(`  - ${p}`);
      return 0;
    }

    if (!isValidCategory(args.category)) {
      throw new ConfigError(`Invalid arXiv category: '${args.category}' (expected something like cs.AI or hep-th)`);
    }

    const settings = resolveRunSettings(
      config,
      provider,
      {
        model: args.model,
        apiKey: args.apiKey,
        outputDir: args.outputDir,
        maxPages: args.maxPages,
        maxChars: args.maxChars,
      },
      cliEnv.env
    );

    const pdfToTextAvailable = cliEnv.pdfToTextAvailable ?? hasPdfToText;
    if (!pdfToTextAvailable()) {
      throw new ConfigError('pdftotext is not installed (install poppler-utils); it is needed to read the PDFs.');
    }

    const apiKeys: Partial<Record<ProviderName, string>> = {};
    if (settings.apiKey) apiKeys[provider] = settings.apiKey;
    const client = cliEnv.chatClient ?? createChatClient({ apiKeys, baseUrl: settings.baseUrl });

    const summarizer = new Summarizer({
      client,
      provider,
      model: settings.model,
      maxPages: settings.pdfMaxPages,
      maxChars: settings.maxChars,
      temperature: settings.temperature,
      maxTokens: settings.maxTokens,
    });

    console.log(`Using ${provider}:${settings.model}`);
    const result = await runToday({
      category: args.category,
      summarizer,
      outputDir: settings.outputDir,
      pageSize: settings.pageSize,
      maxListingPages: settings.maxListingPages,
      wrapWidth: settings.wrapWidth,
      fetchPage: cliEnv.fetchPage,
    });

    console.log(
      `Done. ${result.summarized}/${result.papers} paper(s) summarized for ${result.category} on ${result.date}: ${result.reportPath}`
    );
    if (result.failed.length > 0) {
      console.warn(`${result.failed.length} paper(s) had no PDF: ${result.failed.map((f) => f.arxivId).join(', ')}`);
    }
    return 0;
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error: ${msg}`);
    return 1;
  }
}
