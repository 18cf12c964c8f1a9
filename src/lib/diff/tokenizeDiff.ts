import { diffWordsWithSpace, type Change } from "diff";
import type { DiffToken } from "@/types/reconciliation";

const toToken = (change: Change): DiffToken => ({
  value: change.value,
  kind: change.added ? "added" : change.removed ? "removed" : "equal",
});

const isBlank = (value: string): boolean => /^\s+$/.test(value);

// A change that only touches spacing renders as unchanged text.
const neutralizeWhitespaceChanges = (tokens: DiffToken[]): DiffToken[] =>
  tokens
    .filter((token) => !(token.kind === "removed" && isBlank(token.value)))
    .map((token) =>
      token.kind === "added" && isBlank(token.value)
        ? { ...token, kind: "equal" as const }
        : token,
    );

const mergeAdjacent = (tokens: DiffToken[]): DiffToken[] => {
  const merged: DiffToken[] = [];

  for (const token of tokens) {
    const previous = merged[merged.length - 1];
    if (previous && previous.kind === token.kind) {
      previous.value += token.value;
      continue;
    }
    merged.push({ ...token });
  }

  return merged;
};

export const buildDraftRedline = (original: string, revised: string): DiffToken[] => {
  if (original === revised) {
    return revised ? [{ value: revised, kind: "equal" }] : [];
  }

  if (!original) {
    return [{ value: revised, kind: "added" }];
  }

  if (!revised) {
    return [{ value: original, kind: "removed" }];
  }

  return mergeAdjacent(
    neutralizeWhitespaceChanges(diffWordsWithSpace(original, revised).map(toToken)),
  );
};

export const countChangedWords = (tokens: DiffToken[]): { added: number; removed: number } => {
  let added = 0;
  let removed = 0;

  for (const token of tokens) {
    const words = token.value.trim().split(/\s+/).filter(Boolean).length;
    if (token.kind === "added") {
      added += words;
    } else if (token.kind === "removed") {
      removed += words;
    }
  }

  return { added, removed };
};
