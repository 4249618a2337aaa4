export interface CliArgs {
  category: string | undefined;
  provider: string | undefined;
  model: string | undefined;
  apiKey: string | undefined;
  outputDir: string | undefined;
  maxPages: number | undefined;
  maxChars: number | undefined;
  help: boolean;
  /** Flags that were not understood or lacked a valid value. */
  errors: string[];
}

export const USAGE = `Usage: npm run summarize -- <category> [options]

Summarize the papers listed today in an arXiv category (e.g. cs.AI).

Options:
  --provider <name>    LLM provider (anthropic, openai, google, groq, mistral, ollama)
  --model <name>       Model name (defaults per provider)
  --api-key <key>      API key (otherwise read from the provider's *_API_KEY variable)
  --out <dir>          Directory for the report file (default: config.yml or cwd)
  --max-pages <n>      PDF pages to read per paper (default 10)
  --max-chars <n>      Characters of extracted text sent to the model (default 1024)
  -h, --help           Show this help`;

function positiveInt(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const n = parseInt(raw, 10);
  return n >= 1 ? n : undefined;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    category: undefined,
    provider: undefined,
    model: undefined,
    apiKey: undefined,
    outputDir: undefined,
    maxPages: undefined,
    maxChars: undefined,
    help: false,
    errors: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;

    // --flag=value and --flag value are both accepted
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;
    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      // A following flag is not this flag's value.
      if (next === undefined || next.startsWith('--')) return undefined;
      i += 1;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '--provider': {
        const v = takeValue();
        if (v) args.provider = v.trim().toLowerCase();
        else args.errors.push('--provider needs a value');
        break;
      }
      case '--model': {
        const v = takeValue();
        if (v) args.model = v.trim();
        else args.errors.push('--model needs a value');
        break;
      }
      case '--api-key': {
        const v = takeValue();
        if (v) args.apiKey = v.trim();
        else args.errors.push('--api-key needs a value');
        break;
      }
      case '--out': {
        const v = takeValue();
        if (v) args.outputDir = v;
        else args.errors.push('--out needs a value');
        break;
      }
      case '--max-pages': {
        const n = positiveInt(takeValue() ?? '');
        if (n !== undefined) args.maxPages = n;
        else args.errors.push('--max-pages needs a positive integer');
        break;
      }
      case '--max-chars': {
        const n = positiveInt(takeValue() ?? '');
        if (n !== undefined) args.maxChars = n;
        else args.errors.push('--max-chars needs a positive integer');
        break;
      }
      default:
        if (arg.startsWith('-')) {
          args.errors.push(`Unknown option: ${arg}`);
        } else if (args.category === undefined) {
          args.category = arg;
        } else {
          args.errors.push(`Unexpected argument: ${arg}`);
        }
    }
  }

  return args;
}
