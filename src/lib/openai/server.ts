import OpenAI from "openai";
import { ConfigurationError } from "~/lib/errors";
import { Providers } from "~/lib/openai_provider";

let cachedClient: OpenAI | undefined;
let cachedKey: string | undefined;

export function getOpenAIApiKey(): string {
  const { apiKeyEnvVar } = Providers.get("openai");
  const apiKey = process.env[apiKeyEnvVar]?.trim();
  if (!apiKey) {
    throw new ConfigurationError(`Missing ${apiKeyEnvVar}.`);
  }
  return apiKey;
}

/** SDK client for the `openai` provider entry, rebuilt when the key changes. */
export function getOpenAIClient(): OpenAI {
  const apiKey = getOpenAIApiKey();
  if (!cachedClient || cachedKey !== apiKey) {
    const provider = Providers.get("openai");
    cachedClient = new OpenAI({
      apiKey,
      baseURL: provider.baseUrl,
      timeout: provider.timeoutMs,
    });
    cachedKey = apiKey;
  }
  return cachedClient;
}
