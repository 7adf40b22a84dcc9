import { beforeEach, describe, expect, it, vi } from "vitest";
import { loadExecutorConfig } from "../src/lib/config";
import { ConfigurationError } from "../src/lib/errors";

describe("loadExecutorConfig", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  it("fills in defaults", () => {
    expect(loadExecutorConfig({}, {})).toEqual({
      primaryModel: "gpt-4o",
      fallbackModel: "gpt-5",
      chunkingEnabled: true,
      tokenLimits: {},
      maxConcurrency: 4,
      safetyMarginTokens: 500,
    });
  });

  it("reads the environment", () => {
    const config = loadExecutorConfig(
      {},
      { PRIMARY_MODEL: "gpt-4o-mini", FALLBACK_MODEL: "gpt-4.1", CHUNKING_ENABLED: "off", MAX_WORKERS: "2" },
    );
    expect(config.primaryModel).toBe("gpt-4o-mini");
    expect(config.fallbackModel).toBe("gpt-4.1");
    expect(config.chunkingEnabled).toBe(false);
    expect(config.maxConcurrency).toBe(2);
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadExecutorConfig({ primaryModel: "gpt-4.1-mini" }, { PRIMARY_MODEL: "gpt-4o-mini" });
    expect(config.primaryModel).toBe("gpt-4.1-mini");
  });

  it("rejects malformed environment values", () => {
    expect(() => loadExecutorConfig({}, { CHUNKING_ENABLED: "maybe" })).toThrow(
      'CHUNKING_ENABLED must be a boolean, got "maybe"',
    );
    expect(() => loadExecutorConfig({}, { MAX_WORKERS: "two" })).toThrow(ConfigurationError);
  });

  it("lists every out-of-range sampling field", () => {
    expect(() => loadExecutorConfig({ sampling: { temperature: 3, topP: 2 } }, {})).toThrow(
      "Invalid sampling parameters:\n" +
        "  - temperature: temperature must be between 0 and 2\n" +
        "  - topP: topP must be between 0 and 1",
    );
  });

  it("keeps valid sampling parameters", () => {
    const config = loadExecutorConfig({ sampling: { temperature: 0.2, maxTokens: 512 } }, {});
    expect(config.sampling).toEqual({ temperature: 0.2, maxTokens: 512 });
  });

  it("ignores sampling parameters for the parameterless model", () => {
    const config = loadExecutorConfig({ primaryModel: "gpt-5", sampling: { temperature: 5 } }, {});
    expect(config.sampling).toBeUndefined();
    expect(console.info).toHaveBeenCalledWith(
      "[config] Model gpt-5 does not support sampling parameters; ignoring them.",
    );
  });

  it("rejects invalid structural settings", () => {
    expect(() => loadExecutorConfig({ maxConcurrency: 0 }, {})).toThrow(
      /^Invalid executor configuration:\n {2}- maxConcurrency: /,
    );
  });
});
