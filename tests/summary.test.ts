import { describe, expect, it } from "vitest";
import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import type { SummaryResult } from "../src/pipeline.js";
import { buildConsoleSummary, buildSummaryMarkdown, writeSummaryFile } from "../src/report/summary.js";

const ROOT = join(process.cwd(), ".tmp-tests");

const RESULT: SummaryResult = {
  sourceUrl: "https://example.com",
  title: "Example",
  summaryText: "A brief greeting.\n",
};

describe("summary output", () => {
  it("builds markdown with a heading for the source", () => {
    expect(buildSummaryMarkdown(RESULT)).toBe("# Summary of https://example.com\n\n**Example**\n\nA brief greeting.\n");
  });

  it("frames the console output", () => {
    const rule = "-".repeat(40);
    expect(buildConsoleSummary(RESULT)).toBe(
      ["Title: Example", "Source: https://example.com", rule, "A brief greeting.", rule].join("\n"),
    );
  });

  it("writes the summary file, creating parent folders", async () => {
    await mkdir(ROOT, { recursive: true });

    const target = await writeSummaryFile(RESULT, join(ROOT, "nested", "summary.md"));

    expect(target).toBe(join(ROOT, "nested", "summary.md"));
    expect(await readFile(target, "utf8")).toBe(buildSummaryMarkdown(RESULT));
  });
});
