import type { CredentialSource } from "./types.js";

export const API_KEY_VARIABLE = "OPENAI_API_KEY";

export function envCredentials(env: NodeJS.ProcessEnv = process.env, variable = API_KEY_VARIABLE): CredentialSource {
  return {
    getApiKey: () => env[variable]?.trim() || undefined,
  };
}

export function staticCredentials(apiKey: string): CredentialSource {
  return {
    getApiKey: () => apiKey.trim() || undefined,
  };
}
