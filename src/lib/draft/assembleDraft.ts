import { buildDraftRedline } from "@/lib/diff/tokenizeDiff";
import { attemptSubstitution } from "@/lib/match/textMatcher";
import { itemLabel } from "@/lib/review/classifyFindings";
import type { ReviewStateStore } from "@/lib/review/reviewStateStore";
import {
  SECTION_HEADERS,
  SECTION_ORDER,
  type AssembledDraft,
  type DraftSentence,
  type Finding,
  type OrganizedSections,
  type ReviewItem,
  type SectionName,
} from "@/types/reconciliation";

export const originalText = (finding: Finding): string =>
  finding.kind === "correction" ? finding.contextText : finding.sentence;

/** Text the model proposes for the item, before any reviewer edit. */
export const recommendedText = (finding: Finding): string => {
  switch (finding.kind) {
    case "correction":
      return attemptSubstitution(
        finding.contextText,
        finding.originalValue,
        finding.correctedValue,
      ).result;
    case "issue":
      return finding.recommendation;
  }
};

type EmittedStatus = DraftSentence["status"];

const resolveText = (
  finding: Finding,
  status: EmittedStatus,
  editedText: string | undefined,
): string | null => {
  switch (status) {
    case "accepted":
      return recommendedText(finding);
    case "manual":
      return editedText ?? recommendedText(finding);
    case "rejected":
      return originalText(finding) || null;
  }
};

const emitSentence = (item: ReviewItem, store: ReviewStateStore): DraftSentence | null => {
  const decision = store.getDecision(item.id);
  if (decision.status === "pending") {
    return null;
  }

  const text = resolveText(item.finding, decision.status, decision.editedText);
  if (text === null) {
    return null;
  }

  const original = originalText(item.finding);
  return {
    itemId: item.id,
    kind: item.kind,
    status: decision.status,
    label: itemLabel(item),
    text,
    original,
    redline: buildDraftRedline(original, text),
  };
};

export const renderDraftDocument = (
  sections: Record<SectionName, DraftSentence[]>,
): string => {
  let output = "";

  for (const section of SECTION_ORDER) {
    const sentences = sections[section];
    if (sentences.length === 0) {
      continue;
    }

    output += `### ${SECTION_HEADERS[section]}\n`;
    for (const sentence of sentences) {
      output += `## ${sentence.text}\n\n`;
    }
  }

  return output;
};

/**
 * Builds the final draft from the current decisions. Nothing is cached between
 * calls: every sentence is derived again from the findings and the store.
 */
export const assemble = (
  organized: OrganizedSections,
  store: ReviewStateStore,
): AssembledDraft => {
  const sections: Record<SectionName, DraftSentence[]> = {
    results: [],
    guidance: [],
    qa: [],
  };

  for (const section of SECTION_ORDER) {
    for (const item of organized[section].allItems) {
      const sentence = emitSentence(item, store);
      if (sentence) {
        sections[section].push(sentence);
      }
    }
  }

  return {
    sections,
    renderedDocument: renderDraftDocument(sections),
    changedCount: SECTION_ORDER.reduce((sum, section) => sum + sections[section].length, 0),
  };
};
