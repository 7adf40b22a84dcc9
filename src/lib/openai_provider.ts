export interface OpenAIProviderConfig {
  id: string;
  baseUrl: string;
  apiKeyEnvVar: string;
  /** Request timeout for one chat completion. */
  timeoutMs: number;
}

const DEFAULT_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_TIMEOUT_MS = 120_000;
const hasOwnProperty = Object.prototype.hasOwnProperty;

function normalizeBaseUrl(value: string | undefined, fallback = DEFAULT_BASE_URL): string {
  const raw = (value ?? fallback).trim();
  const withoutTrailingSlash = raw.replace(/\/+$/, "");
  return withoutTrailingSlash.length > 0 ? withoutTrailingSlash : fallback;
}

function timeoutFromEnv(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}

// OpenAI-compatible chat-completions endpoints.
const PROVIDERS = {
  openai: {
    id: "openai",
    baseUrl: normalizeBaseUrl(process.env.OPENAI_BASE_URL),
    apiKeyEnvVar: "OPENAI_API_KEY",
    timeoutMs: timeoutFromEnv(process.env.OPENAI_TIMEOUT_MS),
  },
  openrouter: {
    id: "openrouter",
    baseUrl: normalizeBaseUrl(process.env.OPENROUTER_BASE_URL, "https://openrouter.ai/api/v1"),
    apiKeyEnvVar: "OPENROUTER_API_KEY",
    timeoutMs: timeoutFromEnv(process.env.OPENROUTER_TIMEOUT_MS),
  },
} as const satisfies Record<string, OpenAIProviderConfig>;

export type ProviderName = keyof typeof PROVIDERS;

function isProviderName(name: string): name is ProviderName {
  return hasOwnProperty.call(PROVIDERS, name);
}

function get(name: string): OpenAIProviderConfig {
  if (!isProviderName(name)) {
    throw new Error(`Unknown provider: ${name}`);
  }
  return PROVIDERS[name];
}

function authHeaders(name: string): Record<string, string> {
  const provider = get(name);
  const apiKey = process.env[provider.apiKeyEnvVar]?.trim();
  if (!apiKey) {
    throw new Error(
      `Missing API key for provider "${name}". Set ${provider.apiKeyEnvVar}.`,
    );
  }
  return { Authorization: `Bearer ${apiKey}` };
}

export const Providers = {
  get,
  authHeaders,
} as const;
