import { createGenerationConfig, createScrapingConfig } from "../config.js";
import { API_KEY_VARIABLE, envCredentials } from "../llm/credentials.js";
import { OpenAIChatClient } from "../llm/openai.js";
import { runPipeline } from "../pipeline.js";
import { buildConsoleSummary, writeSummaryFile } from "../report/summary.js";
import { parseDuration } from "../utils/duration.js";
import { logger, setLogLevel } from "../utils/log.js";

export interface SummarizeOptions {
  url: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: string;
  retries?: number;
  retryDelay?: string;
  remove?: string;
  systemPrompt?: string;
  output?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export interface CommandDeps {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  print?: (text: string) => void;
}

export async function runSummarize(options: SummarizeOptions, deps: CommandDeps = {}) {
  applyVerbosity(options);
  const env = deps.env ?? process.env;
  const print = deps.print ?? console.log;

  const credentials = envCredentials(env);
  if (!credentials.getApiKey()) {
    throw new Error(`${API_KEY_VARIABLE} environment variable not found; set it in .env or the environment.`);
  }

  const scrapingConfig = createScrapingConfig({
    timeoutMs: options.timeout ? parseDuration(options.timeout, "--timeout") : undefined,
    maxRetries: options.retries,
    retryDelayMs: options.retryDelay ? parseDuration(options.retryDelay, "--retry-delay") : undefined,
    elementsToRemove: options.remove ? parseTagList(options.remove) : undefined,
  });
  const generationConfig = createGenerationConfig({
    model: options.model,
    maxOutputTokens: options.maxTokens,
    temperature: options.temperature,
    maxRetries: options.retries,
    retryDelayMs: scrapingConfig.retryDelayMs,
    systemPrompt: options.systemPrompt,
  });

  const generator = new OpenAIChatClient({
    credentials,
    baseUrl: env.OPENAI_BASE_URL,
    timeoutMs: scrapingConfig.timeoutMs,
    fetchImpl: deps.fetchImpl,
  });

  logger.info(`Starting to scrape and summarize: ${options.url}`);
  const result = await runPipeline(options.url, scrapingConfig, generationConfig, {
    generator,
    fetchImpl: deps.fetchImpl,
  });

  print(buildConsoleSummary(result));

  if (options.output) {
    const savedTo = await writeSummaryFile(result, options.output);
    logger.info(`Summary saved to ${savedTo}`);
  }

  return result;
}

export function parseTagList(input: string): string[] {
  const tags = input
    .split(",")
    .map((tag) => tag.trim())
    .filter(Boolean);
  if (tags.length === 0) {
    throw new Error("--remove must list at least one tag name");
  }
  return tags;
}

function applyVerbosity(options: { quiet?: boolean; verbose?: boolean }) {
  if (options.quiet && options.verbose) {
    throw new Error("--quiet and --verbose cannot be combined");
  }
  if (options.quiet) {
    setLogLevel("error");
  } else if (options.verbose) {
    setLogLevel("debug");
  }
}
