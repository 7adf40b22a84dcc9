import type { z } from "zod";
import type { AssignedFilesList } from "./extraction/assigned-files-schema";

export type Message = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type Conversation = Message[];

// ── Model profiles ──────────────────────────────────────────────

export type ModelProfile = Readonly<{
  id: string;
  inputTokenLimit: number;
  supportsSamplingParams: boolean;
}>;

export type SamplingParams = {
  temperature?: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  maxTokens?: number;
};

// ── Response shapes ─────────────────────────────────────────────

/**
 * How the model's answer is requested and, when a request was split into
 * chunks, how the partial answers are put back together.
 */
export type ResponseShape =
  | { kind: "raw" }
  | { kind: "list"; name: string; item: z.ZodTypeAny }
  | { kind: "map"; name: string; schema: z.AnyZodObject }
  | { kind: "assigned_files"; name: string };

export type ResponseContent =
  | { kind: "raw"; text: string }
  | { kind: "list"; items: unknown[] }
  | { kind: "map"; entries: Record<string, unknown> }
  | { kind: "assigned_files"; value: AssignedFilesList };

// ── Usage ───────────────────────────────────────────────────────

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type Usage = TokenUsage & {
  /** USD, from the per-million-token price table. */
  cost: number;
};

// ── Execution ───────────────────────────────────────────────────

export type ExecutionRequest = {
  model: ModelProfile;
  conversation: Conversation;
  shape: ResponseShape;
  sampling?: SamplingParams;
  fallbackModel: ModelProfile;
};

export type ExecutionResult = {
  content: ResponseContent;
  usage: Usage;
  model: string;
};

export type ExecutorState =
  | "direct"
  | "fallback"
  | "chunked_primary"
  | "chunked_fallback"
  | "failed"
  | "succeeded";

export type ExecutionTrace = {
  states: ExecutorState[];
  calls: number;
  chunkCount: number;
  /** Model that produced the final content. */
  model: string;
  durationMs: number;
};

export type ExecutedResult = ExecutionResult & { trace: ExecutionTrace };

export type Chunk = {
  /** 1-based. */
  index: number;
  total: number;
  lines: string[];
  tokens: number;
};

// ── Verification ────────────────────────────────────────────────

export type VerificationResult = {
  isVerbatim: boolean;
  detail: string;
};

export type SequenceResult = {
  isValid: boolean;
  fixedSequence: string[];
  detail: string;
};
