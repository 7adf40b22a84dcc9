import { beforeEach, describe, expect, it, vi } from "vitest";
import { calculateCost, createModelRegistry } from "../src/lib/models";

describe("model registry", () => {
  it("knows the default limits", () => {
    const registry = createModelRegistry();
    expect(registry.limitFor("gpt-4o")).toBe(120_000);
    expect(registry.limitFor("gpt-5")).toBe(250_000);
  });

  it("uses the default limit for unknown and inherited names", () => {
    const registry = createModelRegistry();
    expect(registry.limitFor("unknown-model")).toBe(120_000);
    expect(registry.limitFor("toString")).toBe(120_000);
  });

  it("layers overrides over the defaults", () => {
    const registry = createModelRegistry({ overrides: { "gpt-4o": 64_000, "local-model": 8_000 } });
    expect(registry.limitFor("gpt-4o")).toBe(64_000);
    expect(registry.limitFor("local-model")).toBe(8_000);
    expect(registry.limitFor("gpt-5")).toBe(250_000);
  });

  it("marks only the parameterless model as rejecting sampling parameters", () => {
    const registry = createModelRegistry();
    expect(registry.supportsParams("gpt-5")).toBe(false);
    expect(registry.supportsParams("gpt-4o")).toBe(true);
  });

  it("hands out frozen, cached profiles", () => {
    const registry = createModelRegistry({ defaultLimit: 5_000 });
    const profile = registry.profile("local-model");
    expect(profile).toEqual({ id: "local-model", inputTokenLimit: 5_000, supportsSamplingParams: true });
    expect(Object.isFrozen(profile)).toBe(true);
    expect(registry.profile("local-model")).toBe(profile);
  });
});

describe("calculateCost", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("prices prompt and completion tokens per million", () => {
    expect(calculateCost("gpt-4o", 1_000_000, 1_000_000)).toBeCloseTo(12.5);
    expect(calculateCost("gpt-5", 200_000, 10_000)).toBeCloseTo(0.35);
  });

  it("accepts a custom price table", () => {
    expect(calculateCost("local-model", 500_000, 0, { "local-model": { input: 2, output: 4 } })).toBe(1);
  });

  it("reports unknown models as free and warns once", () => {
    expect(calculateCost("unpriced-model", 1000, 1000)).toBe(0);
    expect(calculateCost("unpriced-model", 1000, 1000)).toBe(0);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(
      "[models] No pricing for model unpriced-model; cost is reported as 0.",
    );
  });
});
