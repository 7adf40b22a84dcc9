import { MergeShapeMismatchError } from "~/lib/errors";
import type { AssignedPanelFiles } from "~/lib/extraction/assigned-files-schema";
import type {
  ExecutionResult,
  ResponseContent,
  ResponseShape,
  Usage,
} from "~/lib/types";

export function emptyUsage(): Usage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0, cost: 0 };
}

export function addUsage(a: Usage, b: Usage): Usage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    cost: a.cost + b.cost,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Key union of two mappings. On a collision arrays concatenate and objects
 * merge recursively; anything else keeps the earlier value.
 */
export function mergeMappings(
  first: Record<string, unknown>,
  second: Record<string, unknown>,
  path = "",
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...first };
  for (const [key, value] of Object.entries(second)) {
    if (!Object.prototype.hasOwnProperty.call(merged, key)) {
      merged[key] = value;
      continue;
    }
    const existing = merged[key];
    const keyPath = path ? `${path}.${key}` : key;
    if (Array.isArray(existing) && Array.isArray(value)) {
      merged[key] = [...existing, ...value];
    } else if (isPlainObject(existing) && isPlainObject(value)) {
      merged[key] = mergeMappings(existing, value, keyPath);
    } else {
      console.warn(
        `[merge] Lossy merge: key "${keyPath}" collides across chunks; keeping the first value.`,
      );
    }
  }
  return merged;
}

function mergeContents(contents: ResponseContent[], shape: ResponseShape): ResponseContent {
  const first = contents[0];
  if (!first) throw new RangeError("Cannot merge an empty content list.");

  switch (shape.kind) {
    case "assigned_files": {
      const assignedFiles: AssignedPanelFiles[] = [];
      const notAssignedFiles: string[] = [];
      for (const c of contents) {
        if (c.kind !== "assigned_files") throw mismatch(shape, c);
        assignedFiles.push(...c.value.assignedFiles);
        notAssignedFiles.push(...c.value.notAssignedFiles);
      }
      return { kind: "assigned_files", value: { assignedFiles, notAssignedFiles } };
    }
    case "list": {
      const items: unknown[] = [];
      for (const c of contents) {
        if (c.kind !== "list") throw mismatch(shape, c);
        items.push(...c.items);
      }
      return { kind: "list", items };
    }
    case "map": {
      let entries: Record<string, unknown> = {};
      for (const c of contents) {
        if (c.kind !== "map") throw mismatch(shape, c);
        entries = mergeMappings(entries, c.entries);
      }
      return { kind: "map", entries };
    }
    case "raw":
      console.warn(
        `[merge] No merge rule for raw responses; keeping the first of ${contents.length} chunk responses.`,
      );
      return first;
  }
}

function mismatch(shape: ResponseShape, content: ResponseContent): MergeShapeMismatchError {
  return new MergeShapeMismatchError(
    `Expected ${shape.kind} content but a chunk returned ${content.kind} content.`,
  );
}

/**
 * Combines the partial results of a chunked request, in chunk order, into one
 * result. Usage is always the sum over every chunk, even when the content
 * could only be merged best-effort.
 */
export function mergeResults(
  results: readonly ExecutionResult[],
  shape: ResponseShape,
): ExecutionResult {
  const first = results[0];
  if (!first) throw new RangeError("Cannot merge an empty result list.");
  if (results.length === 1) return first;

  const usage = results.reduce((acc, r) => addUsage(acc, r.usage), emptyUsage());
  let content: ResponseContent;
  try {
    content = mergeContents(results.map((r) => r.content), shape);
  } catch (e) {
    if (!(e instanceof MergeShapeMismatchError)) throw e;
    console.warn(`[merge] ${e.name}: ${e.message} Keeping the first chunk's content.`);
    content = first.content;
  }
  return { content, usage, model: first.model };
}
