import OpenAI from "openai";
import { ContextLengthError, isContextLengthError, ProviderError } from "~/lib/errors";
import type { ModelCaller, ModelCallResult } from "~/lib/execution/model-caller";
import type { Conversation, SamplingParams, TokenUsage } from "~/lib/types";
import { responseFormatFor, toResponseContent } from "./response-format";
import { getOpenAIClient } from "./server";

type SamplingFields = Pick<
  OpenAI.ChatCompletionCreateParamsNonStreaming,
  "temperature" | "top_p" | "frequency_penalty" | "presence_penalty" | "max_tokens"
>;

function toMessages(conversation: Conversation): OpenAI.ChatCompletionMessageParam[] {
  return conversation.map((m): OpenAI.ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content };
      case "user":
        return { role: "user", content: m.content };
      case "assistant":
        return { role: "assistant", content: m.content };
    }
  });
}

function toSamplingFields(sampling: SamplingParams | undefined): SamplingFields {
  if (!sampling) return {};
  return {
    temperature: sampling.temperature,
    top_p: sampling.topP,
    frequency_penalty: sampling.frequencyPenalty,
    presence_penalty: sampling.presencePenalty,
    max_tokens: sampling.maxTokens,
  };
}

export function toTokenUsage(
  usage: OpenAI.Completions.CompletionUsage | undefined,
): TokenUsage | null {
  if (!usage) return null;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

/** Maps SDK errors that mean "request too large" onto `ContextLengthError`. */
export function classifyOpenAIError(error: unknown): unknown {
  if (error instanceof ContextLengthError) return error;
  if (error instanceof OpenAI.APIError && error.code === "context_length_exceeded") {
    return new ContextLengthError(error.message, { cause: error });
  }
  if (isContextLengthError(error) && error instanceof Error) {
    return new ContextLengthError(error.message, { cause: error });
  }
  return error;
}

/** Caller backed by the official SDK, using structured outputs for non-raw shapes. */
export function createOpenAIModelCaller(client: OpenAI = getOpenAIClient()): ModelCaller {
  return {
    vendor: "openai",
    async call({ model, conversation, shape, sampling, signal }): Promise<ModelCallResult> {
      const base = {
        model: model.id,
        messages: toMessages(conversation),
        ...toSamplingFields(sampling),
      };
      try {
        const responseFormat = responseFormatFor(shape);
        if (!responseFormat) {
          const completion = await client.chat.completions.create(
            { ...base, stream: false },
            { signal },
          );
          const message = completion.choices[0]?.message;
          if (message?.refusal) {
            throw new ProviderError("openai", `Model refused the request: ${message.refusal}`);
          }
          return {
            content: toResponseContent(shape, message?.content ?? ""),
            usage: toTokenUsage(completion.usage),
            model: completion.model,
          };
        }

        const completion = await client.chat.completions.parse(
          { ...base, response_format: responseFormat },
          { signal },
        );
        const message = completion.choices[0]?.message;
        const parsed: unknown = message?.parsed;
        if (parsed === null || parsed === undefined) {
          throw new ProviderError(
            "openai",
            message?.refusal
              ? `Model refused the request: ${message.refusal}`
              : "Structured call failed: no parsed response returned",
          );
        }
        return {
          content: toResponseContent(shape, parsed),
          usage: toTokenUsage(completion.usage),
          model: completion.model,
        };
      } catch (e) {
        throw classifyOpenAIError(e);
      }
    },
  };
}
