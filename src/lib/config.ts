import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { ConfigError } from './errors.js';
import { DEFAULT_MODELS, type ProviderName } from './llm/types.js';
import type { AppConfig } from './types.js';

const positiveInt = z.number().int().min(1);

const AppConfigSchema = z.object({
  llm: z
    .object({
      provider: z.string().min(1).default('anthropic'),
      model: z.string().min(1).optional(),
      baseUrl: z.string().url().optional(),
      temperature: z.number().min(0).max(2).default(0.3),
      maxTokens: positiveInt.default(200),
    })
    .default({}),
  listing: z
    .object({
      pageSize: positiveInt.max(2000).default(25),
      maxPages: positiveInt.default(200),
    })
    .default({}),
  pdf: z
    .object({
      maxPages: positiveInt.default(10),
      maxChars: positiveInt.default(1024),
    })
    .default({}),
  report: z
    .object({
      outputDir: z.string().min(1).default('.'),
      wrapWidth: positiveInt.default(150),
    })
    .default({}),
});

export const CONFIG_FILE = 'config.yml';

export function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return YAML.parse(raw);
}

export function parseConfig(raw: unknown, source = CONFIG_FILE): AppConfig {
  const result = AppConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/** config.yml in `repoRoot` is optional; without it every setting takes its default. */
export function loadConfig(repoRoot: string): AppConfig {
  const configPath = path.join(repoRoot, CONFIG_FILE);
  if (!fs.existsSync(configPath)) return parseConfig({});
  return parseConfig(loadYamlFile(configPath), configPath);
}

const API_KEY_ENV: Record<ProviderName, string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
  groq: ['GROQ_API_KEY'],
  mistral: ['MISTRAL_API_KEY'],
  ollama: [],
};

export function apiKeyFromEnv(provider: ProviderName, env: NodeJS.ProcessEnv): string | undefined {
  for (const name of API_KEY_ENV[provider]) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

export interface RunOverrides {
  model?: string | undefined;
  apiKey?: string | undefined;
  outputDir?: string | undefined;
  maxPages?: number | undefined;
  maxChars?: number | undefined;
}

export interface RunSettings {
  provider: ProviderName;
  model: string;
  apiKey: string | undefined;
  baseUrl: string | undefined;
  temperature: number;
  maxTokens: number;
  pageSize: number;
  maxListingPages: number;
  pdfMaxPages: number;
  maxChars: number;
  outputDir: string;
  wrapWidth: number;
}

/**
 * Merge CLI overrides, environment and config.yml for an already validated
 * provider. A model configured for a different provider is not carried over.
 */
export function resolveRunSettings(
  config: AppConfig,
  provider: ProviderName,
  overrides: RunOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): RunSettings {
  const configuredModel = config.llm.provider === provider ? config.llm.model : undefined;
  const apiKey = overrides.apiKey?.trim() || apiKeyFromEnv(provider, env);
  const envNames = API_KEY_ENV[provider];
  if (!apiKey && envNames.length > 0) {
    throw new ConfigError(`Missing API key for ${provider}: pass --api-key or set ${envNames.join(' or ')}`);
  }

  return {
    provider,
    model: overrides.model ?? configuredModel ?? DEFAULT_MODELS[provider],
    apiKey,
    baseUrl: config.llm.provider === provider ? config.llm.baseUrl : undefined,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    pageSize: config.listing.pageSize,
    maxListingPages: config.listing.maxPages,
    pdfMaxPages: overrides.maxPages ?? config.pdf.maxPages,
    maxChars: overrides.maxChars ?? config.pdf.maxChars,
    outputDir: overrides.outputDir ?? config.report.outputDir,
    wrapWidth: config.report.wrapWidth,
  };
}
