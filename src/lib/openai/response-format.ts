import { z } from "zod";
import { zodResponseFormat } from "openai/helpers/zod";
import { AssignedFilesSchema } from "~/lib/extraction/assigned-files-schema";
import type { ResponseContent, ResponseShape, SamplingParams } from "~/lib/types";

/**
 * The root schema sent to the provider. Structured outputs need an object at
 * the root, so list shapes are wrapped in `{ items: [...] }`.
 */
export function schemaForShape(shape: ResponseShape): z.AnyZodObject | null {
  switch (shape.kind) {
    case "raw":
      return null;
    case "list":
      return z.object({ items: z.array(shape.item) });
    case "map":
      return shape.schema;
    case "assigned_files":
      return AssignedFilesSchema;
  }
}

export function responseFormatFor(shape: ResponseShape) {
  if (shape.kind === "raw") return undefined;
  const schema = schemaForShape(shape);
  return schema ? zodResponseFormat(schema, shape.name) : undefined;
}

/** Validates a parsed model answer against the shape it was requested in. */
export function toResponseContent(shape: ResponseShape, value: unknown): ResponseContent {
  switch (shape.kind) {
    case "raw":
      return { kind: "raw", text: typeof value === "string" ? value : JSON.stringify(value) };
    case "list": {
      const parsed = z.object({ items: z.array(shape.item) }).parse(value);
      const items: unknown[] = parsed.items;
      return { kind: "list", items };
    }
    case "map": {
      const entries: Record<string, unknown> = shape.schema.parse(value);
      return { kind: "map", entries };
    }
    case "assigned_files":
      return { kind: "assigned_files", value: AssignedFilesSchema.parse(value) };
  }
}

/** Chat-completions body fields for the sampling parameters that are set. */
export function samplingBody(sampling: SamplingParams | undefined): Record<string, number> {
  if (!sampling) return {};
  const body: Record<string, number> = {};
  if (sampling.temperature !== undefined) body.temperature = sampling.temperature;
  if (sampling.topP !== undefined) body.top_p = sampling.topP;
  if (sampling.frequencyPenalty !== undefined) body.frequency_penalty = sampling.frequencyPenalty;
  if (sampling.presencePenalty !== undefined) body.presence_penalty = sampling.presencePenalty;
  if (sampling.maxTokens !== undefined) body.max_tokens = sampling.maxTokens;
  return body;
}
