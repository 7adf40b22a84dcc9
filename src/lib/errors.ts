/** Substrings that mark a provider rejection as a context-length overflow. */
export const CONTEXT_LENGTH_INDICATORS = [
  "context length",
  "maximum context length",
  "token limit",
  "too long",
  "context window",
  "maximum tokens",
  "input too long",
  "length limit",
  "length was reached",
  "context_length_exceeded",
] as const;

/** The request did not fit the model's context window. Handled by the executor. */
export class ContextLengthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ContextLengthError";
  }
}

/** Any other provider rejection. The message is the provider's own text. */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status: number | null;

  constructor(
    provider: string,
    message: string,
    options?: { status?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.status = options?.status ?? null;
  }
}

/** The fixed part of a conversation leaves no room for any list line. */
export class PartitionInfeasibleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PartitionInfeasibleError";
  }
}

export class MergeShapeMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MergeShapeMismatchError";
  }
}

export class InvalidSequenceInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSequenceInputError";
  }
}

export class VerificationInputEmptyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VerificationInputEmptyError";
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "";
}

export function isContextLengthError(error: unknown): boolean {
  if (error instanceof ContextLengthError) return true;
  const message = messageOf(error).toLowerCase();
  return CONTEXT_LENGTH_INDICATORS.some((indicator) => message.includes(indicator));
}
