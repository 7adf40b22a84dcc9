import pLimit from "p-limit";
import { DEFAULT_MAX_CONCURRENCY, DEFAULT_SAFETY_MARGIN_TOKENS, type ExecutorConfig } from "~/lib/config";
import { isContextLengthError, PartitionInfeasibleError } from "~/lib/errors";
import {
  calculateCost,
  createModelRegistry,
  DEFAULT_PRICES,
  type ModelRegistry,
  type PriceTable,
} from "~/lib/models";
import type {
  Conversation,
  ExecutedResult,
  ExecutionRequest,
  ExecutionResult,
  ExecutionTrace,
  ExecutorState,
  ModelProfile,
  ResponseShape,
} from "~/lib/types";
import { mergeResults } from "./merge";
import type { ModelCaller } from "./model-caller";
import { planPartition, type PartitionPlan } from "./partition";
import { createTokenAccountant, type TokenAccountant } from "./token-accounting";

export type ChunkExecutorOptions = {
  caller: ModelCaller;
  accountant?: TokenAccountant;
  prices?: PriceTable;
  chunkingEnabled?: boolean;
  maxConcurrency?: number;
  safetyMarginTokens?: number;
};

export type ExecuteOptions = {
  /** Cancels the whole request, including chunk calls already in flight. */
  signal?: AbortSignal;
};

export interface ChunkExecutor {
  execute(request: ExecutionRequest, options?: ExecuteOptions): Promise<ExecutedResult>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a request within the model's context window.
 *
 * Escalation ladder, each rung used at most once:
 *  1. Direct call with the primary model (pre-emptively chunked when the
 *     conversation is already over the primary limit).
 *  2. On a context-length error, the same request against the fallback model.
 *  3. If that overflows too, the list in the last user message is split into
 *     chunks sized for the fallback model and the answers are merged.
 *
 * Any other error propagates unchanged.
 */
export function createChunkExecutor(options: ChunkExecutorOptions): ChunkExecutor {
  const { caller } = options;
  const accountant = options.accountant ?? createTokenAccountant();
  const prices = options.prices ?? DEFAULT_PRICES;
  const chunkingEnabled = options.chunkingEnabled ?? true;
  const maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
  const safetyMargin = options.safetyMarginTokens ?? DEFAULT_SAFETY_MARGIN_TOKENS;

  async function execute(
    request: ExecutionRequest,
    { signal }: ExecuteOptions = {},
  ): Promise<ExecutedResult> {
    const started = performance.now();
    const trace: ExecutionTrace = {
      states: [],
      calls: 0,
      chunkCount: 0,
      model: request.model.id,
      durationMs: 0,
    };
    const enter = (state: ExecutorState) => {
      trace.states.push(state);
    };

    let samplingNoticeLogged = false;

    async function callOnce(
      model: ModelProfile,
      conversation: Conversation,
      callSignal: AbortSignal | undefined,
    ): Promise<ExecutionResult> {
      callSignal?.throwIfAborted();
      let sampling = request.sampling;
      if (sampling && !model.supportsSamplingParams) {
        if (!samplingNoticeLogged) {
          console.info(
            `[executor] Model ${model.id} does not support sampling parameters; sending the request without them.`,
          );
          samplingNoticeLogged = true;
        }
        sampling = undefined;
      }
      trace.calls += 1;
      const result = await caller.call({
        model,
        conversation,
        shape: request.shape,
        sampling,
        signal: callSignal,
      });
      const usage = result.usage ?? { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
      return {
        content: result.content,
        usage: {
          ...usage,
          cost: calculateCost(model.id, usage.promptTokens, usage.completionTokens, prices),
        },
        model: result.model || model.id,
      };
    }

    function plan(conversation: Conversation, model: ModelProfile): PartitionPlan {
      return planPartition(conversation, model.id, model.inputTokenLimit, accountant, {
        safetyMargin,
      });
    }

    async function runChunks(model: ModelProfile, chunked: PartitionPlan): Promise<ExecutionResult> {
      const total = chunked.conversations.length;
      trace.chunkCount = total;
      console.info(`[executor] Sending ${total} chunks to ${model.id}.`);

      signal?.throwIfAborted();
      const controller = new AbortController();
      const onAbort = () => controller.abort(signal?.reason);
      signal?.addEventListener("abort", onAbort, { once: true });
      const limit = pLimit(maxConcurrency);

      try {
        // Promise.all keeps chunk order regardless of completion order.
        const results = await Promise.all(
          chunked.conversations.map((conversation, i) =>
            limit(async () => {
              try {
                return await callOnce(model, conversation, controller.signal);
              } catch (e) {
                if (!controller.signal.aborted) {
                  console.error(
                    `[executor] Chunk ${i + 1} of ${total} failed on ${model.id}: ${errorMessage(e)}`,
                  );
                  controller.abort(e);
                }
                throw e;
              }
            }),
          ),
        );
        return mergeResults(results, request.shape);
      } finally {
        limit.clearQueue();
        signal?.removeEventListener("abort", onAbort);
      }
    }

    async function chunkAfterOverflow(
      model: ModelProfile,
      conversation: Conversation,
      cause: unknown,
    ): Promise<ExecutionResult> {
      const chunked = plan(conversation, model);
      if (chunked.infeasible) {
        throw new PartitionInfeasibleError(
          `The fixed part of the request does not fit the ${model.inputTokenLimit}-token limit of ${model.id}, so it cannot be split: ${errorMessage(cause)}`,
          { cause },
        );
      }
      const only = chunked.conversations.length === 1 ? chunked.conversations[0] : undefined;
      if (!only) return runChunks(model, chunked);

      try {
        return await callOnce(model, only, signal);
      } catch (e) {
        if (!isContextLengthError(e)) throw e;
        throw new PartitionInfeasibleError(
          `The request for ${model.id} could not be split into smaller chunks: ${errorMessage(e)}`,
          { cause: e },
        );
      }
    }

    async function run(): Promise<ExecutionResult> {
      const primary = request.model;
      const fallback = request.fallbackModel;
      const conversation = request.conversation;

      // Only the primary limit is consulted up front.
      if (chunkingEnabled) {
        const tokens = accountant.countConversationTokens(conversation, primary.id);
        if (tokens > primary.inputTokenLimit) {
          const chunked = plan(conversation, primary);
          if (!chunked.infeasible && chunked.conversations.length > 1) {
            enter("chunked_primary");
            console.info(
              `[executor] Request needs ${tokens} tokens, over the ${primary.inputTokenLimit}-token limit of ${primary.id}; chunking.`,
            );
            return runChunks(primary, chunked);
          }
          console.info(
            `[executor] Request needs ${tokens} tokens, over the ${primary.inputTokenLimit}-token limit of ${primary.id}, and cannot be chunked; trying it whole.`,
          );
        }
      }

      enter("direct");
      try {
        return await callOnce(primary, conversation, signal);
      } catch (e) {
        if (!isContextLengthError(e)) throw e;
        console.warn(`[executor] Context length exceeded on ${primary.id}: ${errorMessage(e)}`);

        if (primary.id === fallback.id) {
          if (!chunkingEnabled) throw e;
          enter("chunked_fallback");
          return chunkAfterOverflow(primary, conversation, e);
        }

        enter("fallback");
        console.info(`[executor] Retrying with fallback model ${fallback.id}.`);
        try {
          return await callOnce(fallback, conversation, signal);
        } catch (fallbackError) {
          if (!isContextLengthError(fallbackError)) throw fallbackError;
          console.warn(
            `[executor] Context length exceeded on fallback ${fallback.id}: ${errorMessage(fallbackError)}`,
          );
          if (!chunkingEnabled) throw fallbackError;
          const tokens = accountant.countConversationTokens(conversation, fallback.id);
          if (tokens <= fallback.inputTokenLimit) throw fallbackError;
          enter("chunked_fallback");
          return chunkAfterOverflow(fallback, conversation, fallbackError);
        }
      }
    }

    try {
      const result = await run();
      enter("succeeded");
      trace.model = result.model;
      trace.durationMs = performance.now() - started;
      return { ...result, trace };
    } catch (e) {
      enter("failed");
      console.error(`[executor] Request failed after ${trace.calls} call(s): ${errorMessage(e)}`);
      throw e;
    }
  }

  return { execute };
}

/** Resolves configured model ids into immutable profiles for one request. */
export function createExecutionRequest(
  config: Pick<ExecutorConfig, "primaryModel" | "fallbackModel" | "sampling">,
  registry: ModelRegistry,
  conversation: Conversation,
  shape: ResponseShape,
): ExecutionRequest {
  return {
    model: registry.profile(config.primaryModel),
    fallbackModel: registry.profile(config.fallbackModel),
    conversation,
    shape,
    sampling: config.sampling,
  };
}

/** Executor and registry wired from a loaded configuration. */
export function createExecutorFromConfig(
  config: ExecutorConfig,
  caller: ModelCaller,
): { executor: ChunkExecutor; registry: ModelRegistry } {
  const registry = createModelRegistry({ overrides: config.tokenLimits });
  const executor = createChunkExecutor({
    caller,
    chunkingEnabled: config.chunkingEnabled,
    maxConcurrency: config.maxConcurrency,
    safetyMarginTokens: config.safetyMarginTokens,
  });
  return { executor, registry };
}
