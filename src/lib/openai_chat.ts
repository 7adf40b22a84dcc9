import { z } from "zod";
import { Providers } from "./openai_provider";
import { ContextLengthError, isContextLengthError, ProviderError } from "./errors";
import type { ModelCaller, ModelCallRequest, ModelCallResult } from "./execution/model-caller";
import { responseFormatFor, samplingBody, toResponseContent } from "./openai/response-format";

// --- Response types ---

const ChatResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
          refusal: z.string().nullable().optional(),
        }),
        finish_reason: z.string().nullable(),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

function classify(providerName: string, message: string, status?: number): Error {
  if (isContextLengthError(message)) return new ContextLengthError(message);
  return new ProviderError(providerName, message, { status });
}

// --- Chat function ---

export async function chat(
  providerName: string,
  request: ModelCallRequest,
): Promise<ModelCallResult> {
  const provider = Providers.get(providerName);

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    ...Providers.authHeaders(providerName),
  };

  const url = `${provider.baseUrl}/chat/completions`;
  const timeout = AbortSignal.timeout(provider.timeoutMs);
  const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: request.model.id,
        messages: request.conversation,
        ...samplingBody(request.sampling),
        response_format: responseFormatFor(request.shape),
      }),
      signal,
    });
  } catch (err) {
    if (request.signal?.aborted) throw err;
    if (err instanceof TypeError) {
      throw new ProviderError(
        providerName,
        `Cannot connect to ${providerName} at ${provider.baseUrl}`,
        { cause: err },
      );
    }
    if (err instanceof Error && err.name === "TimeoutError") {
      throw new ProviderError(providerName, `Request to ${providerName} timed out`, { cause: err });
    }
    throw err;
  }

  if (!response.ok) {
    const body = await response.text();
    throw classify(providerName, `${providerName} returned HTTP ${response.status}: ${body}`, response.status);
  }

  const parsed = ChatResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new ProviderError(providerName, `${providerName} returned an unexpected response body`, {
      cause: parsed.error,
    });
  }
  const data = parsed.data;
  const choice = data.choices[0];
  if (!choice) throw new ProviderError(providerName, `${providerName} returned no choices`);
  if (choice.finish_reason === "length") {
    throw new ContextLengthError(
      `${providerName} response was truncated because the length limit was reached (finish_reason=length)`,
    );
  }
  if (choice.finish_reason === "content_filter") {
    throw new ProviderError(
      providerName,
      `${providerName} response halted by content filter (finish_reason=content_filter)`,
    );
  }
  if (choice.message.refusal) {
    throw new ProviderError(providerName, `Model refused the request: ${choice.message.refusal}`);
  }
  const content = choice.message.content;
  if (!content) {
    throw new ProviderError(providerName, `${providerName} returned no content`);
  }

  let value: unknown = content;
  if (request.shape.kind !== "raw") {
    try {
      value = JSON.parse(content);
    } catch (e) {
      throw new ProviderError(providerName, `${providerName} returned content that is not valid JSON`, {
        cause: e,
      });
    }
  }

  return {
    content: toResponseContent(request.shape, value),
    usage: data.usage
      ? {
          promptTokens: data.usage.prompt_tokens,
          completionTokens: data.usage.completion_tokens,
          totalTokens: data.usage.total_tokens,
        }
      : null,
    model: data.model ?? request.model.id,
  };
}

/** Caller for any OpenAI-compatible endpoint in the provider table. */
export function createHttpModelCaller(providerName: string): ModelCaller {
  const provider = Providers.get(providerName);
  return {
    vendor: provider.id,
    call: (request) => chat(providerName, request),
  };
}
