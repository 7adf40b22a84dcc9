import { describe, expect, it } from "vitest";
import {
  CONTEXT_LENGTH_INDICATORS,
  ContextLengthError,
  isContextLengthError,
  ProviderError,
} from "../src/lib/errors";

describe("isContextLengthError", () => {
  it.each(CONTEXT_LENGTH_INDICATORS)("recognises %s in an error message", (indicator) => {
    expect(isContextLengthError(new Error(`Request rejected: ${indicator.toUpperCase()}.`))).toBe(true);
  });

  it.each(CONTEXT_LENGTH_INDICATORS)("recognises %s in a plain string", (indicator) => {
    expect(isContextLengthError(`provider said: ${indicator}`)).toBe(true);
  });

  it("recognises the error class whatever its message", () => {
    expect(isContextLengthError(new ContextLengthError("request refused"))).toBe(true);
  });

  it("ignores unrelated failures", () => {
    expect(isContextLengthError(new Error("rate limited"))).toBe(false);
    expect(isContextLengthError(new ProviderError("openai", "upstream exploded", { status: 500 }))).toBe(false);
    expect(isContextLengthError({ message: "too long" })).toBe(false);
    expect(isContextLengthError(undefined)).toBe(false);
  });
});
