import { assemble } from "@/lib/draft/assembleDraft";
import {
  assessFaithfulness,
  classify,
  deriveReportHeader,
} from "@/lib/review/classifyFindings";
import { organize, summarizeProgress } from "@/lib/review/organizeSections";
import {
  InvalidDecisionError,
  ReviewStateStore,
} from "@/lib/review/reviewStateStore";
import type {
  AssembledDraft,
  DecisionStatus,
  FindingsPayload,
  OrganizedSections,
  ProgressSummary,
  ReviewDecision,
  ReviewItem,
  ReviewSnapshot,
} from "@/types/reconciliation";

const EMPTY_PAYLOAD: FindingsPayload = { corrections: [], issues: [] };

/**
 * One reviewer's reconciliation session: the findings of the current
 * validation run plus the decisions taken on them.
 */
export class ReviewSession {
  private readonly store = new ReviewStateStore();
  private payload: FindingsPayload = EMPTY_PAYLOAD;
  private items: ReviewItem[] = [];
  private currentRunId = 0;

  constructor(payload?: FindingsPayload) {
    if (payload) {
      this.startRun(payload);
    }
  }

  get runId(): number {
    return this.currentRunId;
  }

  get decisions(): ReviewStateStore {
    return this.store;
  }

  /** Discards every prior decision, then classifies the new findings. */
  startRun(payload: FindingsPayload): ReviewItem[] {
    this.store.resetAll();
    this.payload = payload;
    this.currentRunId += 1;
    this.items = classify(payload, this.store);
    return this.items;
  }

  classify(): ReviewItem[] {
    this.items = classify(this.payload, this.store);
    return this.items;
  }

  hasItem(id: string): boolean {
    return this.items.some((item) => item.id === id);
  }

  recordDecision(id: string, status: DecisionStatus, editedText?: string): ReviewDecision {
    if (!this.hasItem(id)) {
      throw new InvalidDecisionError(`No review item with id "${id}".`, "unknown_item", id);
    }

    return this.store.setDecision(id, status, editedText);
  }

  organize(): OrganizedSections {
    return organize(this.classify(), this.store);
  }

  progress(): ProgressSummary {
    return summarizeProgress(this.organize());
  }

  assembleFinalDraft(): AssembledDraft {
    return assemble(this.organize(), this.store);
  }

  snapshot(): ReviewSnapshot {
    const sections = this.organize();

    return {
      runId: this.currentRunId,
      header: deriveReportHeader(this.payload),
      sections,
      progress: summarizeProgress(sections),
      assessment: assessFaithfulness(this.items),
      decisions: this.store.snapshot(),
    };
  }
}

export type ReviewCommand =
  | { type: "startRun"; payload: FindingsPayload }
  | {
      type: "decide";
      itemId: string;
      status: DecisionStatus;
      editedText?: string;
    };

export const applyReviewCommand = (
  session: ReviewSession,
  command: ReviewCommand,
): ReviewSnapshot => {
  switch (command.type) {
    case "startRun":
      session.startRun(command.payload);
      break;
    case "decide":
      session.recordDecision(command.itemId, command.status, command.editedText);
      break;
  }

  return session.snapshot();
};
