import type { SummaryResult } from "../pipeline.js";
import { escapeHtml, formatMultiline } from "../utils/text.js";

export interface FormPageState {
  url?: string;
  result?: SummaryResult;
  error?: string;
}

export function renderFormPage(state: FormPageState = {}): string {
  const error = state.error ? `<div class="error" role="alert">${escapeHtml(state.error)}</div>` : "";
  const summary = state.result
    ? `
      <section class="summary">
        <h2>${escapeHtml(state.result.title)}</h2>
        <a class="source" href="${escapeHtml(state.result.sourceUrl)}" target="_blank" rel="noreferrer">${escapeHtml(state.result.sourceUrl)}</a>
        <p>${formatMultiline(state.result.summaryText)}</p>
      </section>`
    : "";

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Webpage Summarizer</title>
  <style>
    body { font-family: "SF Pro Text", "Segoe UI", system-ui, -apple-system, sans-serif; margin: 0; background: #f6f6f8; color: #1b1b1f; }
    header { padding: 32px 24px; background: #111827; color: #f9fafb; }
    header h1 { margin: 0; font-size: 26px; }
    main { max-width: 680px; margin: -24px auto 40px; padding: 0 20px; }
    .card { background: #fff; border-radius: 16px; padding: 24px; box-shadow: 0 12px 24px rgba(15, 23, 42, 0.08); }
    input[type=url] { width: 100%; box-sizing: border-box; padding: 10px; font-size: 15px; border: 1px solid #d1d5db; border-radius: 8px; }
    button { margin-top: 12px; padding: 10px 20px; font-size: 15px; border: none; border-radius: 8px; background: #2563eb; color: #fff; cursor: pointer; }
    .error { margin-top: 16px; color: #b91c1c; }
    .summary { margin-top: 24px; padding: 16px; border-radius: 12px; background: #eef2ff; }
    .summary h2 { margin: 0 0 4px; font-size: 18px; }
    .source { font-size: 13px; color: #2563eb; text-decoration: none; }
  </style>
</head>
<body>
  <header>
    <h1>Webpage Summarizer</h1>
  </header>
  <main>
    <section class="card">
      <form method="post" action="/">
        <label for="url">Enter a URL to summarize:</label>
        <input type="url" id="url" name="url" required placeholder="https://example.com" value="${escapeHtml(state.url ?? "")}" />
        <button type="submit">Summarize</button>
      </form>
      ${error}
      ${summary}
    </section>
  </main>
</body>
</html>`;
}
