import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { SummaryResult } from "../pipeline.js";

export function buildSummaryMarkdown(result: SummaryResult): string {
  const lines: string[] = [];
  lines.push(`# Summary of ${result.sourceUrl}`);
  lines.push("");
  lines.push(`**${result.title}**`);
  lines.push("");
  lines.push(result.summaryText.trim());
  return lines.join("\n") + "\n";
}

export function buildConsoleSummary(result: SummaryResult): string {
  const rule = "-".repeat(40);
  return [`Title: ${result.title}`, `Source: ${result.sourceUrl}`, rule, result.summaryText.trim(), rule].join("\n");
}

export async function writeSummaryFile(result: SummaryResult, outputPath: string): Promise<string> {
  const target = resolve(outputPath);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, buildSummaryMarkdown(result), "utf8");
  return target;
}
