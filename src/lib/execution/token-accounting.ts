import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import type { Message } from "~/lib/types";

/** Framing tokens the chat format adds around every message. */
export const TOKENS_PER_MESSAGE = 3;
/** Tokens that prime the assistant's reply. */
export const REPLY_PRIMING_TOKENS = 3;
const CHARS_PER_TOKEN = 4;

export interface TokenEncoder {
  encode(text: string): ArrayLike<number>;
}

export interface TokenAccountant {
  countTokens(text: string, modelId: string): number;
  countConversationTokens(messages: readonly Message[], modelId: string): number;
}

// Longest prefix first: "gpt-4o" must win over "gpt-4".
const FAMILY_ENCODINGS: ReadonlyArray<readonly [string, TiktokenEncoding]> = [
  ["gpt-4o", "o200k_base"],
  ["gpt-4.1", "o200k_base"],
  ["gpt-4.5", "o200k_base"],
  ["gpt-5", "o200k_base"],
  ["o1", "o200k_base"],
  ["o3", "o200k_base"],
  ["o4", "o200k_base"],
  ["gpt-4", "cl100k_base"],
  ["gpt-3.5", "cl100k_base"],
];

const _encoders = new Map<TiktokenEncoding, Tiktoken>();

/** Lazily builds the tiktoken encoder for a model family, or null if unknown. */
export function tiktokenEncoderFor(modelId: string): TokenEncoder | null {
  const family = FAMILY_ENCODINGS.find(([prefix]) => modelId.startsWith(prefix));
  if (!family) return null;
  const name = family[1];
  let encoder = _encoders.get(name);
  if (!encoder) {
    encoder = getEncoding(name);
    _encoders.set(name, encoder);
  }
  return encoder;
}

export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

export function createTokenAccountant(
  options: { encoderFor?: (modelId: string) => TokenEncoder | null } = {},
): TokenAccountant {
  const encoderFor = options.encoderFor ?? tiktokenEncoderFor;
  const degradedWarned = new Set<string>();

  function warnDegraded(modelId: string, reason: string): void {
    if (degradedWarned.has(modelId)) return;
    degradedWarned.add(modelId);
    console.warn(
      `[tokens] ${reason} for model ${modelId}; estimating ${CHARS_PER_TOKEN} characters per token.`,
    );
  }

  function countTokens(text: string, modelId: string): number {
    if (typeof text !== "string" || text.length === 0) return 0;
    let encoder: TokenEncoder | null;
    try {
      encoder = encoderFor(modelId);
    } catch (e) {
      warnDegraded(modelId, `Tokenizer failed to load (${e instanceof Error ? e.message : String(e)})`);
      return estimateTokens(text);
    }
    if (!encoder) {
      warnDegraded(modelId, "No tokenizer available");
      return estimateTokens(text);
    }
    try {
      return encoder.encode(text).length;
    } catch (e) {
      warnDegraded(modelId, `Tokenizer failed (${e instanceof Error ? e.message : String(e)})`);
      return estimateTokens(text);
    }
  }

  function countConversationTokens(messages: readonly Message[], modelId: string): number {
    if (!Array.isArray(messages)) return 0;
    let total = 0;
    for (const message of messages) {
      if (message === null || typeof message !== "object") continue;
      total += TOKENS_PER_MESSAGE;
      total += countTokens(message.role, modelId);
      total += countTokens(message.content, modelId);
    }
    return total + REPLY_PRIMING_TOKENS;
  }

  return { countTokens, countConversationTokens };
}
