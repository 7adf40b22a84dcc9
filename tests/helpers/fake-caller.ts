import { vi } from "vitest";
import type { ModelCaller, ModelCallRequest, ModelCallResult } from "../../src/lib/execution/model-caller";
import { createTokenAccountant } from "../../src/lib/execution/token-accounting";
import type { ModelProfile } from "../../src/lib/types";

export type FakeCaller = ModelCaller & { calls: ModelCallRequest[] };

/** In-process model service: records every request and answers with `handler`. */
export function fakeCaller(
  handler: (request: ModelCallRequest, index: number) => ModelCallResult | Promise<ModelCallResult>,
): FakeCaller {
  const calls: ModelCallRequest[] = [];
  return {
    vendor: "fake",
    calls,
    async call(request) {
      calls.push(request);
      return handler(request, calls.length - 1);
    },
  };
}

/** One token per character, so budgets in tests can be worked out by hand. */
export const charAccountant = createTokenAccountant({
  encoderFor: () => ({ encode: (text: string) => ({ length: text.length }) }),
});

export function profile(id: string, inputTokenLimit: number, supportsSamplingParams = true): ModelProfile {
  return Object.freeze({ id, inputTokenLimit, supportsSamplingParams });
}

export function rawResult(text: string, model = "fake-model"): ModelCallResult {
  return {
    content: { kind: "raw", text },
    usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 },
    model,
  };
}

export function lastUserContent(request: ModelCallRequest): string {
  const user = [...request.conversation].reverse().find((m) => m.role === "user");
  return user?.content ?? "";
}

/** The file-list lines a chunked request carries. */
export function listedFiles(request: ModelCallRequest): string[] {
  const afterMarker = lastUserContent(request).split("File list:\n")[1] ?? "";
  const list = afterMarker.split("\n\n[This is chunk")[0] ?? "";
  return list.split("\n").filter((line) => line.length > 0);
}

export function silenceConsole() {
  return {
    info: vi.spyOn(console, "info").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}
