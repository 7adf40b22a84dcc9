import type { Chunk, Conversation, Message } from "~/lib/types";
import type { TokenAccountant } from "./token-accounting";
import { DEFAULT_SAFETY_MARGIN_TOKENS } from "~/lib/config";

const FILE_LIST_MARKER = /file list:[^\S\n]*\n?/gi;

export interface PartitionPlan {
  conversations: Conversation[];
  /** Empty when nothing was split. */
  chunks: Chunk[];
  /** True when the fixed content alone leaves no room for the list. */
  infeasible: boolean;
}

interface SplitPoint {
  prefix: string;
  lines: string[];
}

export function chunkSuffix(index: number, total: number): string {
  return `\n\n[This is chunk ${index} of ${total} of the file list. Only the files listed above are part of this request; answer for them alone.]`;
}

function lastUserIndex(conversation: Conversation): number {
  for (let i = conversation.length - 1; i >= 0; i--) {
    if (conversation[i]?.role === "user") return i;
  }
  return -1;
}

function toLines(text: string): string[] {
  return text.split("\n").filter((line) => line.trim().length > 0);
}

/**
 * Finds where the variable-length list starts inside a user message.
 *
 * Strategy:
 *  1. The last "File list:" marker; everything after it is the list.
 *  2. Otherwise the last blank-line-separated block.
 *  3. Otherwise every line after the first.
 */
export function findSplitPoint(content: string): SplitPoint {
  let markerEnd = -1;
  for (const match of content.matchAll(FILE_LIST_MARKER)) {
    markerEnd = (match.index ?? 0) + match[0].length;
  }
  if (markerEnd >= 0) {
    const prefix = content.slice(0, markerEnd);
    return {
      prefix: prefix.endsWith("\n") ? prefix : `${prefix}\n`,
      lines: toLines(content.slice(markerEnd)),
    };
  }

  const trimmed = content.replace(/\n+$/, "");
  const blank = trimmed.lastIndexOf("\n\n");
  if (blank >= 0) {
    return {
      prefix: trimmed.slice(0, blank + 2),
      lines: toLines(trimmed.slice(blank + 2)),
    };
  }

  const firstBreak = trimmed.indexOf("\n");
  if (firstBreak < 0) return { prefix: content, lines: [] };
  return {
    prefix: trimmed.slice(0, firstBreak + 1),
    lines: toLines(trimmed.slice(firstBreak + 1)),
  };
}

function withUserContent(
  conversation: Conversation,
  index: number,
  content: string,
): Conversation {
  return conversation.map((m, i): Message => (i === index ? { role: m.role, content } : { ...m }));
}

/**
 * Splits the list in the last user message into chunks whose conversations
 * each fit `budget` tokens. The prefix and every other message are copied
 * into each chunk unchanged.
 */
export function planPartition(
  conversation: Conversation,
  modelId: string,
  budget: number,
  accountant: TokenAccountant,
  options: { safetyMargin?: number } = {},
): PartitionPlan {
  const unchanged: PartitionPlan = { conversations: [conversation], chunks: [], infeasible: false };
  const userIndex = lastUserIndex(conversation);
  const userMessage = conversation[userIndex];
  if (!userMessage) return unchanged;

  const { prefix, lines } = findSplitPoint(userMessage.content);
  if (lines.length === 0) return unchanged;

  // Worst-case annotation width, so the real suffix never pushes a chunk over.
  const fixedTokens = accountant.countConversationTokens(
    withUserContent(conversation, userIndex, prefix + chunkSuffix(lines.length, lines.length)),
    modelId,
  );
  const available = budget - fixedTokens - (options.safetyMargin ?? DEFAULT_SAFETY_MARGIN_TOKENS);
  if (available <= 0) {
    console.warn(
      `[partition] Fixed content needs ${fixedTokens} tokens of a ${budget}-token budget; cannot split the list.`,
    );
    return { ...unchanged, infeasible: true };
  }

  const groups: Array<{ lines: string[]; tokens: number }> = [];
  let current: string[] = [];
  let used = 0;
  const flush = () => {
    if (current.length === 0) return;
    groups.push({ lines: current, tokens: used });
    current = [];
    used = 0;
  };

  for (const line of lines) {
    // +1 for the newline joining it to its neighbour
    const cost = accountant.countTokens(line, modelId) + 1;
    if (current.length > 0 && used + cost > available) flush();
    current.push(line);
    used += cost;
    if (cost > available) {
      console.warn(
        `[partition] A single list line needs ${cost} tokens, more than the ${available}-token chunk budget; sending it on its own.`,
      );
      flush();
    }
  }
  flush();

  if (groups.length <= 1) return unchanged;

  const total = groups.length;
  const chunks: Chunk[] = groups.map((g, i) => ({
    index: i + 1,
    total,
    lines: g.lines,
    tokens: g.tokens,
  }));
  const conversations = chunks.map((chunk) =>
    withUserContent(
      conversation,
      userIndex,
      prefix + chunk.lines.join("\n") + chunkSuffix(chunk.index, chunk.total),
    ),
  );
  return { conversations, chunks, infeasible: false };
}

export function partition(
  conversation: Conversation,
  modelId: string,
  budget: number,
  accountant: TokenAccountant,
  options: { safetyMargin?: number } = {},
): Conversation[] {
  return planPartition(conversation, modelId, budget, accountant, options).conversations;
}
