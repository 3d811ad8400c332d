import { describe, expect, it } from "vitest";
import {
  DEFAULT_ELEMENTS_TO_REMOVE,
  DEFAULT_MODEL,
  createGenerationConfig,
  createScrapingConfig,
  toScrapeRequest,
  type GenerationOverrides,
  type ScrapingOverrides,
} from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { parseDuration } from "../src/utils/duration.js";
import { MAX_TIMER_MS } from "../src/utils/retry.js";

describe("createScrapingConfig", () => {
  it("fills defaults", () => {
    const config = createScrapingConfig();
    expect(config.timeoutMs).toBe(30_000);
    expect(config.maxRetries).toBe(3);
    expect(config.retryDelayMs).toBe(1_000);
    expect(config.userAgent).toMatch(/^Mozilla\/5\.0/);
    expect(config.elementsToRemove).toEqual([...DEFAULT_ELEMENTS_TO_REMOVE]);
  });

  it("normalizes tag names", () => {
    const config = createScrapingConfig({ elementsToRemove: [" SCRIPT", "script", "", "svg"] });
    expect(config.elementsToRemove).toEqual(["script", "svg"]);
  });

  it("accepts the largest timer delay", () => {
    expect(createScrapingConfig({ timeoutMs: MAX_TIMER_MS }).timeoutMs).toBe(MAX_TIMER_MS);
  });

  it("is frozen", () => {
    const config = createScrapingConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.elementsToRemove)).toBe(true);
  });

  const invalid: Array<[ScrapingOverrides, string]> = [
    [{ timeoutMs: 0 }, "timeoutMs"],
    [{ maxRetries: -1 }, "maxRetries"],
    [{ maxRetries: 1.5 }, "maxRetries"],
    [{ retryDelayMs: Number.NaN }, "retryDelayMs"],
    [{ userAgent: "  " }, "userAgent"],
    [{ elementsToRemove: ["div > p"] }, "elementsToRemove"],
    [{ timeoutMs: parseDuration("600h") }, "timeoutMs"],
    [{ retryDelayMs: MAX_TIMER_MS + 1 }, "retryDelayMs"],
  ];

  it.each(invalid)("rejects %o", (overrides, field) => {
    expect(() => createScrapingConfig(overrides)).toThrow(ConfigError);
    try {
      createScrapingConfig(overrides);
    } catch (error) {
      expect(error instanceof ConfigError ? error.field : undefined).toBe(field);
    }
  });
});

describe("toScrapeRequest", () => {
  it("attaches the trimmed URL to the config", () => {
    const request = toScrapeRequest("  https://example.com  ", createScrapingConfig({ maxRetries: 1 }));
    expect(request.url).toBe("https://example.com");
    expect(request.maxRetries).toBe(1);
    expect(Object.isFrozen(request)).toBe(true);
  });
});

describe("createGenerationConfig", () => {
  it("fills defaults", () => {
    expect(createGenerationConfig()).toEqual({
      model: DEFAULT_MODEL,
      maxOutputTokens: 1000,
      temperature: 0.7,
      maxRetries: 3,
      retryDelayMs: 1000,
    });
  });

  it("keeps a non-empty system prompt", () => {
    expect(createGenerationConfig({ systemPrompt: " Be brief. " }).systemPrompt).toBe("Be brief.");
    expect(createGenerationConfig({ systemPrompt: "   " }).systemPrompt).toBeUndefined();
  });

  it("accepts the temperature bounds", () => {
    expect(createGenerationConfig({ temperature: 0 }).temperature).toBe(0);
    expect(createGenerationConfig({ temperature: 1 }).temperature).toBe(1);
  });

  const invalid: Array<[GenerationOverrides, string]> = [
    [{ model: "" }, "model"],
    [{ maxOutputTokens: 0 }, "maxOutputTokens"],
    [{ maxOutputTokens: 10.5 }, "maxOutputTokens"],
    [{ temperature: 1.2 }, "temperature"],
    [{ temperature: -0.1 }, "temperature"],
    [{ maxRetries: -2 }, "maxRetries"],
    [{ retryDelayMs: MAX_TIMER_MS + 1 }, "retryDelayMs"],
  ];

  it.each(invalid)("rejects %o", (overrides, field) => {
    expect(() => createGenerationConfig(overrides)).toThrow(new RegExp(`^${field} `));
  });
});
