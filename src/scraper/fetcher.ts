import type { ScrapeRequest } from "../config.js";
import { FetchError, InvalidURLError, describeCause } from "../errors.js";
import { formatDuration } from "../utils/duration.js";
import { logger } from "../utils/log.js";
import { backoffDelay, sleep as defaultSleep, withAbort, type Sleep } from "../utils/retry.js";

export interface RawPage {
  url: string;
  finalUrl: string;
  html: string;
  status: number;
  contentType: string;
  contentLength: number;
  fetchedAt: string;
  attempts: number;
}

export interface FetcherDeps {
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
}

class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export function assertHttpUrl(input: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch {
    throw new InvalidURLError(input, "not an absolute URL");
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidURLError(input, `unsupported scheme "${parsed.protocol.replace(/:$/, "")}"`);
  }
  if (!parsed.hostname) {
    throw new InvalidURLError(input, "missing host");
  }
  return parsed;
}

export async function fetchRawHtml(request: ScrapeRequest, deps: FetcherDeps = {}): Promise<RawPage> {
  const target = assertHttpUrl(request.url);
  const fetchImpl = deps.fetchImpl ?? fetch;
  const sleep = deps.sleep ?? defaultSleep;
  const totalAttempts = request.maxRetries + 1;

  let lastError: unknown;
  for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
    logger.info(`Fetching ${request.url} (attempt ${attempt}/${totalAttempts})`);
    try {
      const page = await fetchOnce(target, request, fetchImpl);
      logger.debug(`Fetched ${page.contentLength} bytes from ${page.finalUrl} (HTTP ${page.status})`);
      return { ...page, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (attempt < totalAttempts) {
        const delay = backoffDelay(request.retryDelayMs, attempt);
        logger.warn(`Request failed on attempt ${attempt}: ${describeCause(error)}; retrying in ${formatDuration(delay)}`);
        await sleep(delay);
      }
    }
  }

  logger.error(`Failed to fetch ${request.url} after ${totalAttempts} attempts`);
  throw new FetchError({
    url: request.url,
    attempts: totalAttempts,
    status: lastError instanceof HttpStatusError ? lastError.status : undefined,
    cause: lastError,
  });
}

async function fetchOnce(
  target: URL,
  request: ScrapeRequest,
  fetchImpl: typeof fetch,
): Promise<Omit<RawPage, "attempts">> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

  try {
    const response = await withAbort(
      fetchImpl(target, {
        headers: {
          "user-agent": request.userAgent,
          accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
        },
        redirect: "follow",
        signal: controller.signal,
      }),
      controller.signal,
    );

    if (!response.ok) {
      await response.body?.cancel();
      throw new HttpStatusError(response.status, response.statusText);
    }

    const html = await withAbort(response.text(), controller.signal);
    return {
      url: request.url,
      finalUrl: response.url || target.toString(),
      html,
      status: response.status,
      contentType: response.headers.get("content-type") ?? "",
      contentLength: Buffer.byteLength(html),
      fetchedAt: new Date().toISOString(),
    };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Timed out after ${formatDuration(request.timeoutMs)}`, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
