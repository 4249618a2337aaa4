/**
 * summarize-today: summarize every paper listed today in one arXiv category.
 *
 * Usage:
 *   npm run summarize -- cs.AI
 *   npm run summarize -- cs.CL --provider openai --model gpt-4o-mini
 *   npm run summarize -- hep-th --provider google --api-key <key> --out reports
 *
 * Writes arxiv_summaries_<category>_<YYYY-MM-DD>.txt and echoes each summary
 * as it completes.
 *
 * Exit codes:
 *   0  Success (also: unsupported provider, after listing the supported ones)
 *   1  Bad arguments, configuration error, or a fatal network/provider error
 */

import path from 'node:path';

import { runCli } from '../lib/cli/main.js';

const code = await runCli(process.argv.slice(2), {
  cwd: path.resolve(process.cwd()),
  env: process.env,
});
process.exitCode = code;
