import { GenerationApiError, describeCause, type GenerationErrorKind } from "../errors.js";
import { withAbort } from "../utils/retry.js";
import type { CompletionRequest, CredentialSource, TextGenerator } from "./types.js";

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

export interface OpenAIChatClientOptions {
  credentials: CredentialSource;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  error?: {
    message?: string;
  };
}

export class OpenAIChatClient implements TextGenerator {
  private readonly credentials: CredentialSource;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAIChatClientOptions) {
    this.credentials = options.credentials;
    this.baseUrl = (options.baseUrl?.trim() || DEFAULT_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generate(request: CompletionRequest): Promise<string> {
    const apiKey = this.credentials.getApiKey();
    if (!apiKey) {
      throw new GenerationApiError("auth", "OpenAI API key is missing; set OPENAI_API_KEY in .env");
    }

    const payload = {
      model: request.model,
      messages: [
        { role: "system", content: request.systemPrompt },
        { role: "user", content: request.prompt },
      ],
      max_tokens: request.maxOutputTokens,
      temperature: request.temperature,
      stream: false,
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await withAbort(
        this.fetchImpl(`${this.baseUrl}/chat/completions`, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json",
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify(payload),
          signal: controller.signal,
        }),
        controller.signal,
      );
      const body = await withAbort(response.text(), controller.signal);

      if (!response.ok) {
        throw new GenerationApiError(kindForStatus(response.status), `OpenAI error ${response.status}: ${extractErrorMessage(body)}`, {
          status: response.status,
        });
      }
      return parseCompletion(body);
    } catch (error) {
      if (error instanceof GenerationApiError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new GenerationApiError("timeout", `OpenAI request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new GenerationApiError("network", `OpenAI request failed: ${describeCause(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function parseCompletion(body: string): string {
  let data: ChatCompletionResponse;
  try {
    data = JSON.parse(body) as ChatCompletionResponse;
  } catch (error) {
    throw new GenerationApiError("server", "OpenAI returned a malformed response", { cause: error });
  }
  if (data.error?.message) {
    throw new GenerationApiError("invalid_request", `OpenAI error: ${data.error.message}`);
  }
  const content = data.choices?.[0]?.message?.content?.trim() ?? "";
  if (!content) {
    throw new GenerationApiError("empty_response", "OpenAI returned an empty completion");
  }
  return content;
}

export function kindForStatus(status: number): GenerationErrorKind {
  if (status === 401 || status === 403) {
    return "auth";
  }
  if (status === 408) {
    return "timeout";
  }
  if (status === 429) {
    return "rate_limit";
  }
  if (status >= 500) {
    return "server";
  }
  return "invalid_request";
}

function extractErrorMessage(detail: string): string {
  try {
    const parsed = JSON.parse(detail) as ChatCompletionResponse;
    return parsed.error?.message?.trim() || detail;
  } catch {
    return detail;
  }
}
