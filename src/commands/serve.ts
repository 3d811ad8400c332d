import { node } from "@elysiajs/node";
import { createGenerationConfig, createScrapingConfig } from "../config.js";
import { API_KEY_VARIABLE, envCredentials } from "../llm/credentials.js";
import { OpenAIChatClient } from "../llm/openai.js";
import { createSummarizeUrl } from "../pipeline.js";
import { logger } from "../utils/log.js";
import { createFormApp } from "../web/app.js";

export interface ServeOptions {
  port: number;
}

export function runServe(options: ServeOptions) {
  const port = normalizePort(options.port);
  const credentials = envCredentials();
  if (!credentials.getApiKey()) {
    logger.warn(`${API_KEY_VARIABLE} is not set; form submissions will fail until it is.`);
  }

  const scrapingConfig = createScrapingConfig();
  const summarizeUrl = createSummarizeUrl(scrapingConfig, createGenerationConfig(), {
    generator: new OpenAIChatClient({
      credentials,
      baseUrl: process.env.OPENAI_BASE_URL,
      timeoutMs: scrapingConfig.timeoutMs,
    }),
  });

  const app = createFormApp(summarizeUrl, { adapter: node() });
  app.listen(port, () => {
    logger.info(`Form available at http://localhost:${port}`);
  });
  return app;
}

function normalizePort(port: number): number {
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error("--port must be an integer between 1 and 65535");
  }
  return port;
}
