import { DEFAULT_TOKEN_LIMIT, PARAMETERLESS_MODEL_ID } from "./config";
import type { ModelProfile } from "./types";

export interface Model {
  id: string;
  name: string;
  provider: string;
  /** Input tokens we allow ourselves to send, kept under the advertised window. */
  inputTokenLimit: number;
  /** USD per million prompt tokens. */
  inputPrice: number;
  /** USD per million completion tokens. */
  outputPrice: number;
}

export const MODELS: readonly Model[] = [
  { id: "gpt-4o", name: "GPT-4o", provider: "OpenAI", inputTokenLimit: 120_000, inputPrice: 2.50, outputPrice: 10.00 },
  { id: "gpt-4o-mini", name: "GPT-4o Mini", provider: "OpenAI", inputTokenLimit: 120_000, inputPrice: 0.15, outputPrice: 0.60 },
  { id: "gpt-4.1", name: "GPT-4.1", provider: "OpenAI", inputTokenLimit: 1_000_000, inputPrice: 2.00, outputPrice: 8.00 },
  { id: "gpt-4.1-mini", name: "GPT-4.1 Mini", provider: "OpenAI", inputTokenLimit: 1_000_000, inputPrice: 0.40, outputPrice: 1.60 },
  { id: "gpt-5", name: "GPT-5", provider: "OpenAI", inputTokenLimit: 250_000, inputPrice: 1.25, outputPrice: 10.00 },
];

export type PriceTable = Readonly<Record<string, Readonly<{ input: number; output: number }>>>;

export interface ModelRegistry {
  limitFor(modelId: string): number;
  supportsParams(modelId: string): boolean;
  profile(modelId: string): ModelProfile;
}

const hasOwnProperty = Object.prototype.hasOwnProperty;

export const DEFAULT_TOKEN_LIMITS: Readonly<Record<string, number>> = Object.freeze(
  Object.fromEntries(MODELS.map((m) => [m.id, m.inputTokenLimit])),
);

export const DEFAULT_PRICES: PriceTable = Object.freeze(
  Object.fromEntries(
    MODELS.map((m) => [m.id, Object.freeze({ input: m.inputPrice, output: m.outputPrice })]),
  ),
);

/**
 * Static model table. Overrides are layered over the defaults once, at
 * creation; the registry never changes afterwards.
 */
export function createModelRegistry(
  options: {
    limits?: Record<string, number>;
    overrides?: Record<string, number>;
    defaultLimit?: number;
    parameterless?: string;
  } = {},
): ModelRegistry {
  const limits: Readonly<Record<string, number>> = Object.freeze({
    ...(options.limits ?? DEFAULT_TOKEN_LIMITS),
    ...options.overrides,
  });
  const defaultLimit = options.defaultLimit ?? DEFAULT_TOKEN_LIMIT;
  const parameterless = options.parameterless ?? PARAMETERLESS_MODEL_ID;
  const profiles = new Map<string, ModelProfile>();

  function limitFor(modelId: string): number {
    if (hasOwnProperty.call(limits, modelId)) {
      const limit = limits[modelId];
      if (limit !== undefined) return limit;
    }
    return defaultLimit;
  }

  function supportsParams(modelId: string): boolean {
    return modelId !== parameterless;
  }

  function profile(modelId: string): ModelProfile {
    let existing = profiles.get(modelId);
    if (!existing) {
      existing = Object.freeze({
        id: modelId,
        inputTokenLimit: limitFor(modelId),
        supportsSamplingParams: supportsParams(modelId),
      });
      profiles.set(modelId, existing);
    }
    return existing;
  }

  return { limitFor, supportsParams, profile };
}

const _unpricedWarned = new Set<string>();

/** Cost in USD of one call. Models missing from the table cost nothing. */
export function calculateCost(
  modelId: string,
  promptTokens: number,
  completionTokens: number,
  prices: PriceTable = DEFAULT_PRICES,
): number {
  const price = hasOwnProperty.call(prices, modelId) ? prices[modelId] : undefined;
  if (!price) {
    if (!_unpricedWarned.has(modelId)) {
      _unpricedWarned.add(modelId);
      console.warn(`[models] No pricing for model ${modelId}; cost is reported as 0.`);
    }
    return 0;
  }
  return (promptTokens / 1_000_000) * price.input +
    (completionTokens / 1_000_000) * price.output;
}
