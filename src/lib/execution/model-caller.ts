import type {
  Conversation,
  ModelProfile,
  ResponseContent,
  ResponseShape,
  SamplingParams,
  TokenUsage,
} from "~/lib/types";

export type ModelCallRequest = {
  model: ModelProfile;
  conversation: Conversation;
  shape: ResponseShape;
  /** Already filtered: absent for models that reject sampling parameters. */
  sampling?: SamplingParams;
  signal?: AbortSignal;
};

export type ModelCallResult = {
  content: ResponseContent;
  usage: TokenUsage | null;
  model: string;
};

/**
 * The one capability the executor needs from a vendor: send a conversation,
 * get back content of the requested shape. Implementations throw
 * `ContextLengthError` when the provider rejects the request for its size
 * and let every other error through with its message intact.
 */
export interface ModelCaller {
  readonly vendor: string;
  call(request: ModelCallRequest): Promise<ModelCallResult>;
}
