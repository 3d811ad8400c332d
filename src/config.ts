import { ConfigError } from "./errors.js";
import { MAX_TIMER_MS } from "./utils/retry.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

export const DEFAULT_ELEMENTS_TO_REMOVE = ["script", "style", "nav", "footer", "header", "aside", "form"] as const;

export const DEFAULT_MODEL = "gpt-4o-mini";

export interface ScrapingConfig {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly userAgent: string;
  readonly elementsToRemove: readonly string[];
}

export interface ScrapeRequest extends ScrapingConfig {
  readonly url: string;
}

export interface GenerationConfig {
  readonly model: string;
  readonly maxOutputTokens: number;
  readonly temperature: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly systemPrompt?: string;
}

export type ScrapingOverrides = Partial<{ -readonly [K in keyof ScrapingConfig]: ScrapingConfig[K] }>;
export type GenerationOverrides = Partial<{ -readonly [K in keyof GenerationConfig]: GenerationConfig[K] }>;

const TAG_NAME = /^[a-z][a-z0-9-]*$/;

export function createScrapingConfig(overrides: ScrapingOverrides = {}): ScrapingConfig {
  const userAgent = (overrides.userAgent ?? DEFAULT_USER_AGENT).trim();
  if (!userAgent) {
    throw new ConfigError("userAgent", "userAgent must be a non-empty string");
  }

  return Object.freeze({
    timeoutMs: requirePositive("timeoutMs", overrides.timeoutMs ?? 30_000),
    maxRetries: requireCount("maxRetries", overrides.maxRetries ?? 3),
    retryDelayMs: requireNonNegative("retryDelayMs", overrides.retryDelayMs ?? 1_000),
    userAgent,
    elementsToRemove: Object.freeze(normalizeTagNames(overrides.elementsToRemove ?? DEFAULT_ELEMENTS_TO_REMOVE)),
  });
}

export function toScrapeRequest(url: string, config: ScrapingConfig): ScrapeRequest {
  return Object.freeze({ ...config, url: url.trim() });
}

export function createGenerationConfig(overrides: GenerationOverrides = {}): GenerationConfig {
  const model = (overrides.model ?? DEFAULT_MODEL).trim();
  if (!model) {
    throw new ConfigError("model", "model must be a non-empty string");
  }

  const maxOutputTokens = overrides.maxOutputTokens ?? 1000;
  if (!Number.isInteger(maxOutputTokens) || maxOutputTokens <= 0) {
    throw new ConfigError("maxOutputTokens", "maxOutputTokens must be a positive integer");
  }

  const temperature = overrides.temperature ?? 0.7;
  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
    throw new ConfigError("temperature", "temperature must be between 0 and 1");
  }

  const systemPrompt = overrides.systemPrompt?.trim();

  return Object.freeze({
    model,
    maxOutputTokens,
    temperature,
    maxRetries: requireCount("maxRetries", overrides.maxRetries ?? 3),
    retryDelayMs: requireNonNegative("retryDelayMs", overrides.retryDelayMs ?? 1_000),
    ...(systemPrompt ? { systemPrompt } : {}),
  });
}

export function normalizeTagNames(input: Iterable<string>): string[] {
  const tags = new Set<string>();
  for (const raw of input) {
    const tag = raw.trim().toLowerCase();
    if (!tag) {
      continue;
    }
    if (!TAG_NAME.test(tag)) {
      throw new ConfigError("elementsToRemove", `Invalid tag name: "${raw}"`);
    }
    tags.add(tag);
  }
  return Array.from(tags);
}

function requirePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `${field} must be a positive number`);
  }
  return requireTimerRange(field, value);
}

function requireNonNegative(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(field, `${field} must be zero or a positive number`);
  }
  return requireTimerRange(field, value);
}

function requireCount(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(field, `${field} must be a non-negative integer`);
  }
  return value;
}

function requireTimerRange(field: string, value: number): number {
  if (value > MAX_TIMER_MS) {
    throw new ConfigError(field, `${field} must be at most ${MAX_TIMER_MS}ms`);
  }
  return value;
}
