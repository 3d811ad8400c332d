import { Elysia, t } from "elysia";
import type { node } from "@elysiajs/node";
import { InvalidURLError, OrchestrationError, describeCause } from "../errors.js";
import type { SummarizeUrl } from "../pipeline.js";
import { logger } from "../utils/log.js";
import { renderFormPage } from "./page.js";

export interface FormAppOptions {
  adapter?: ReturnType<typeof node>;
}

function html(markup: string, status = 200): Response {
  return new Response(markup, {
    status,
    headers: { "content-type": "text/html; charset=utf-8" },
  });
}

export function statusForError(error: unknown): number {
  const cause = error instanceof OrchestrationError ? error.cause : error;
  return cause instanceof InvalidURLError ? 400 : 502;
}

export function createFormApp(summarizeUrl: SummarizeUrl, options: FormAppOptions = {}) {
  return new Elysia(options.adapter ? { adapter: options.adapter } : {})
    .get("/", () => html(renderFormPage()))
    .get("/health", () => ({ status: "ok" }))
    .post(
      "/",
      async ({ body }) => {
        const url = body.url?.trim() ?? "";
        if (!url) {
          return html(renderFormPage({ error: "Please enter a URL." }), 400);
        }

        try {
          const result = await summarizeUrl(url);
          return html(renderFormPage({ url, result }));
        } catch (error) {
          logger.warn(`Form request for ${url} failed: ${describeCause(error)}`);
          return html(renderFormPage({ url, error: describeCause(error) }), statusForError(error));
        }
      },
      {
        body: t.Object({
          url: t.Optional(t.String()),
        }),
      },
    );
}
