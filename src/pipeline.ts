import { toScrapeRequest, type GenerationConfig, type ScrapingConfig } from "./config.js";
import { OrchestrationError } from "./errors.js";
import type { TextGenerator } from "./llm/types.js";
import { summarize } from "./llm/summarizer.js";
import { cleanHtml } from "./scraper/cleaner.js";
import { fetchRawHtml, type FetcherDeps, type RawPage } from "./scraper/fetcher.js";
import { logger } from "./utils/log.js";

export interface FetchedPage {
  url: string;
  rawHtml: string;
  title: string;
  cleanedText: string;
  metadata: Omit<RawPage, "html">;
}

export interface SummaryResult {
  sourceUrl: string;
  title: string;
  summaryText: string;
}

export interface PipelineDeps extends FetcherDeps {
  generator: TextGenerator;
}

export type SummarizeUrl = (url: string) => Promise<SummaryResult>;

export async function runPipeline(
  url: string,
  scrapingConfig: ScrapingConfig,
  generationConfig: GenerationConfig,
  deps: PipelineDeps,
): Promise<SummaryResult> {
  const request = toScrapeRequest(url, scrapingConfig);

  let page: FetchedPage;
  try {
    const { html, ...metadata } = await fetchRawHtml(request, deps);
    const { title, cleanedText } = cleanHtml(html, request.elementsToRemove, request.url);
    page = { url: request.url, rawHtml: html, title, cleanedText, metadata };
  } catch (error) {
    throw new OrchestrationError({ stage: "fetch", url: request.url, cause: error });
  }
  logger.info(describeScrape(page));

  let summaryText: string;
  try {
    summaryText = await summarize(page.title, page.cleanedText, generationConfig, deps.generator, deps);
  } catch (error) {
    throw new OrchestrationError({ stage: "summarize", url: request.url, cause: error });
  }
  logger.info(`Generated summary for ${page.url}`);

  return { sourceUrl: page.url, title: page.title, summaryText };
}

/** Binds the configs and collaborators so front ends only pass a URL. */
export function createSummarizeUrl(
  scrapingConfig: ScrapingConfig,
  generationConfig: GenerationConfig,
  deps: PipelineDeps,
): SummarizeUrl {
  return (url) => runPipeline(url, scrapingConfig, generationConfig, deps);
}

export function describeScrape(page: FetchedPage): string {
  const { status, contentType, contentLength, attempts } = page.metadata;
  const attemptLabel = attempts === 1 ? "attempt" : "attempts";
  return [
    `Scraped ${page.url} (HTTP ${status}, ${contentType || "no content type"}, ${attempts} ${attemptLabel};`,
    `title: ${page.title}; ${page.cleanedText.length} characters of text from ${contentLength} bytes of HTML)`,
  ].join(" ");
}
