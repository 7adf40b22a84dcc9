import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { SamplingParams } from "./types";

export const DEFAULT_MODEL_ID = "gpt-4o";
/** High-capacity model used when the primary model rejects a request for size. */
export const DEFAULT_FALLBACK_MODEL_ID = "gpt-5";
/** The one model class that rejects temperature, top-p, penalties and max-tokens. */
export const PARAMETERLESS_MODEL_ID = "gpt-5";
export const DEFAULT_TOKEN_LIMIT = 120_000;
export const DEFAULT_MAX_CONCURRENCY = 4;
export const DEFAULT_SAFETY_MARGIN_TOKENS = 500;

export const SamplingParamsSchema = z
  .object({
    temperature: z
      .number()
      .min(0, "temperature must be between 0 and 2")
      .max(2, "temperature must be between 0 and 2")
      .optional(),
    topP: z
      .number()
      .min(0, "topP must be between 0 and 1")
      .max(1, "topP must be between 0 and 1")
      .optional(),
    frequencyPenalty: z
      .number()
      .min(-2, "frequencyPenalty must be between -2 and 2")
      .max(2, "frequencyPenalty must be between -2 and 2")
      .optional(),
    presencePenalty: z
      .number()
      .min(-2, "presencePenalty must be between -2 and 2")
      .max(2, "presencePenalty must be between -2 and 2")
      .optional(),
    maxTokens: z
      .number()
      .int("maxTokens must be an integer")
      .positive("maxTokens must be greater than 0")
      .optional(),
  })
  .strict();

const ExecutorConfigSchema = z.object({
  primaryModel: z.string().trim().min(1).default(DEFAULT_MODEL_ID),
  fallbackModel: z.string().trim().min(1).default(DEFAULT_FALLBACK_MODEL_ID),
  chunkingEnabled: z.boolean().default(true),
  tokenLimits: z
    .record(z.string(), z.number().int().positive())
    .default({}),
  maxConcurrency: z.number().int().min(1).default(DEFAULT_MAX_CONCURRENCY),
  safetyMarginTokens: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_SAFETY_MARGIN_TOKENS),
  sampling: z.unknown().optional(),
});

export type ExecutorConfig = {
  primaryModel: string;
  fallbackModel: string;
  chunkingEnabled: boolean;
  tokenLimits: Record<string, number>;
  maxConcurrency: number;
  safetyMarginTokens: number;
  sampling?: SamplingParams;
};

export type ExecutorConfigInput = {
  primaryModel?: string;
  fallbackModel?: string;
  chunkingEnabled?: boolean;
  tokenLimits?: Record<string, number>;
  maxConcurrency?: number;
  safetyMarginTokens?: number;
  sampling?: SamplingParams;
};

function formatIssues(prefix: string, error: z.ZodError): string {
  const lines = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `  - ${path}: ${issue.message}`;
  });
  return [prefix, ...lines].join("\n");
}

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${raw}"`);
}

function parseInteger(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/** Environment values; explicit overrides win over them. */
function fromEnv(env: NodeJS.ProcessEnv): ExecutorConfigInput {
  const input: ExecutorConfigInput = {};
  const primary = env.PRIMARY_MODEL?.trim();
  if (primary) input.primaryModel = primary;
  const fallback = env.FALLBACK_MODEL?.trim();
  if (fallback) input.fallbackModel = fallback;
  if (env.CHUNKING_ENABLED) {
    input.chunkingEnabled = parseBoolean("CHUNKING_ENABLED", env.CHUNKING_ENABLED);
  }
  if (env.MAX_WORKERS) {
    input.maxConcurrency = parseInteger("MAX_WORKERS", env.MAX_WORKERS);
  }
  return input;
}

/**
 * Builds the executor configuration from explicit overrides and the
 * environment, rejecting out-of-range values with every offending field listed.
 */
export function loadExecutorConfig(
  overrides: ExecutorConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ExecutorConfig {
  const parsed = ExecutorConfigSchema.safeParse({ ...fromEnv(env), ...overrides });
  if (!parsed.success) {
    throw new ConfigurationError(
      formatIssues("Invalid executor configuration:", parsed.error),
    );
  }
  const { sampling: rawSampling, ...rest } = parsed.data;
  const config: ExecutorConfig = rest;
  if (rawSampling === undefined) return config;

  if (config.primaryModel === PARAMETERLESS_MODEL_ID) {
    console.info(
      `[config] Model ${config.primaryModel} does not support sampling parameters; ignoring them.`,
    );
    return config;
  }

  const sampling = SamplingParamsSchema.safeParse(rawSampling);
  if (!sampling.success) {
    throw new ConfigurationError(
      formatIssues("Invalid sampling parameters:", sampling.error),
    );
  }
  config.sampling = sampling.data;
  return config;
}
