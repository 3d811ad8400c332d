import type { GenerationConfig } from "../config.js";
import { GenerationApiError, SummarizationError, describeCause } from "../errors.js";
import { formatDuration } from "../utils/duration.js";
import { logger } from "../utils/log.js";
import { backoffDelay, sleep as defaultSleep, type Sleep } from "../utils/retry.js";
import type { TextGenerator } from "./types.js";

export const NO_CONTENT_SUMMARY = "No content to summarize.";

export const DEFAULT_SYSTEM_PROMPT = [
  "You are an assistant that analyzes the contents of a website",
  "and provides a short summary, ignoring text that might be navigation related.",
  "Respond in markdown.",
].join(" ");

export function buildSummaryPrompt(title: string, cleanedText: string): string {
  return [
    `You are looking at a website titled "${title}".`,
    "The contents of this website is as follows; please provide a short summary of this website in markdown.",
    "If it includes news or announcements, then summarize these too.",
    "",
    cleanedText,
  ].join("\n");
}

export async function summarize(
  title: string,
  cleanedText: string,
  config: GenerationConfig,
  generator: TextGenerator,
  deps: { sleep?: Sleep } = {},
): Promise<string> {
  if (!cleanedText.trim()) {
    logger.info("Page has no visible text; skipping generation");
    return NO_CONTENT_SUMMARY;
  }

  const sleep = deps.sleep ?? defaultSleep;
  const totalAttempts = config.maxRetries + 1;
  const request = {
    model: config.model,
    systemPrompt: config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
    prompt: buildSummaryPrompt(title, cleanedText),
    maxOutputTokens: config.maxOutputTokens,
    temperature: config.temperature,
  };

  for (let attempt = 1; ; attempt += 1) {
    logger.debug(`Requesting summary from ${config.model} (attempt ${attempt}/${totalAttempts})`);
    try {
      return await generator.generate(request);
    } catch (error) {
      const retryable = error instanceof GenerationApiError && error.retryable;
      if (!retryable) {
        logger.error(`Summarization failed: ${describeCause(error)}`);
        throw new SummarizationError({ attempts: attempt, retryable: false, cause: error });
      }
      if (attempt >= totalAttempts) {
        logger.error(`Summarization failed after ${attempt} attempts: ${describeCause(error)}`);
        throw new SummarizationError({ attempts: attempt, retryable: true, cause: error });
      }
      const delay = backoffDelay(config.retryDelayMs, attempt);
      logger.warn(`Generation failed on attempt ${attempt}: ${describeCause(error)}; retrying in ${formatDuration(delay)}`);
      await sleep(delay);
    }
  }
}
