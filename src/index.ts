#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { runServe } from "./commands/serve.js";
import { runSummarize } from "./commands/summarize.js";
import { describeCause } from "./errors.js";

const program = new Command();

program
  .name("web-summarize")
  .description("Scrape a web page and generate an AI-powered summary.")
  .version("0.1.0");

program
  .command("summarize")
  .description("Fetch a URL, strip non-content markup and summarize it")
  .requiredOption("-u, --url <url>", "URL to scrape and summarize")
  .option("--model <model>", "Chat model to use", "gpt-4o-mini")
  .option("--max-tokens <number>", "Maximum tokens for the summary", "1000")
  .option("--temperature <number>", "Sampling temperature (0.0-1.0)", "0.7")
  .option("--timeout <duration>", "Request timeout (e.g. 30s, 500ms; bare numbers are seconds)", "30s")
  .option("--retries <number>", "Maximum retry attempts", "3")
  .option("--retry-delay <duration>", "Base delay between retries, doubled after each failure", "1s")
  .option("--remove <tags>", "Comma-separated tags to strip before extracting text")
  .option("--system-prompt <text>", "Custom system prompt for summarization")
  .option("-o, --output <file>", "Save the summary as markdown to this file")
  .option("-q, --quiet", "Only log errors")
  .option("-v, --verbose", "Enable debug logging")
  .addHelpText(
    "after",
    `
Examples:
  web-summarize summarize -u https://example.com
  web-summarize summarize --url https://news.ycombinator.com --model gpt-4o-mini
  web-summarize summarize -u https://blog.example.com --max-tokens 1500 --temperature 0.3
  web-summarize summarize -u https://docs.example.com --timeout 60s --retries 5`,
  )
  .action(async (opts) => {
    try {
      await runSummarize({
        url: opts.url,
        model: opts.model,
        maxTokens: Number(opts.maxTokens),
        temperature: Number(opts.temperature),
        timeout: opts.timeout,
        retries: Number(opts.retries),
        retryDelay: opts.retryDelay,
        remove: opts.remove,
        systemPrompt: opts.systemPrompt,
        output: opts.output,
        quiet: opts.quiet === true,
        verbose: opts.verbose === true,
      });
    } catch (error) {
      console.error(`[error] ${describeCause(error)}`);
      process.exitCode = 1;
    }
  });

program
  .command("serve")
  .description("Start the web form")
  .option("--port <number>", "Port to listen on", process.env.PORT ?? "3000")
  .action((opts) => {
    try {
      runServe({ port: Number(opts.port) });
    } catch (error) {
      console.error(`[error] ${describeCause(error)}`);
      process.exitCode = 1;
    }
  });

const argv = process.argv.slice();
const delimiterIndex = argv.indexOf("--");
if (delimiterIndex !== -1) {
  argv.splice(delimiterIndex, 1);
}

program.parseAsync(argv).catch((error: unknown) => {
  console.error(`[error] ${describeCause(error)}`);
  process.exitCode = 1;
});
