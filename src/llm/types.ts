export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  prompt: string;
  maxOutputTokens: number;
  temperature: number;
}

/** Remote text-generation API. Failures are thrown as `GenerationApiError`. */
export interface TextGenerator {
  generate(request: CompletionRequest): Promise<string>;
}

export interface CredentialSource {
  getApiKey(): string | undefined;
}
