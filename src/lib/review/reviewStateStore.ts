import {
  DECISION_STATUSES,
  type DecisionStatus,
  type ReviewDecision,
} from "@/types/reconciliation";

export type InvalidDecisionReason =
  | "empty_manual_text"
  | "unknown_item"
  | "invalid_status";

export class InvalidDecisionError extends Error {
  constructor(
    message: string,
    public readonly reason: InvalidDecisionReason,
    public readonly itemId: string,
  ) {
    super(message);
    this.name = "InvalidDecisionError";
  }
}

export const isDecisionStatus = (value: unknown): value is DecisionStatus =>
  typeof value === "string" &&
  DECISION_STATUSES.some((status) => status === value);

type StoredDecision = {
  status: DecisionStatus;
  editedText?: string;
};

/**
 * Reviewer decisions for one reconciliation session.
 *
 * Each session owns its own instance; nothing here is process-wide. Edited
 * text outlives a move away from `manual` so returning to `manual` restores it.
 */
export class ReviewStateStore {
  private readonly decisions = new Map<string, StoredDecision>();

  setDecision(id: string, status: DecisionStatus, editedText?: string): ReviewDecision {
    if (!isDecisionStatus(status)) {
      throw new InvalidDecisionError(`Unknown decision status "${String(status)}".`, "invalid_status", id);
    }

    const existing = this.decisions.get(id);
    let nextEditedText = existing?.editedText;

    if (status === "manual") {
      const candidate = editedText === undefined ? existing?.editedText : editedText.trim();
      if (!candidate) {
        throw new InvalidDecisionError(
          "Manual edits need non-empty replacement text.",
          "empty_manual_text",
          id,
        );
      }
      nextEditedText = candidate;
    }

    const next: StoredDecision =
      nextEditedText === undefined ? { status } : { status, editedText: nextEditedText };
    this.decisions.set(id, next);
    return { ...next };
  }

  getDecision(id: string): ReviewDecision {
    const stored = this.decisions.get(id);
    return stored ? { ...stored } : { status: "pending" };
  }

  resetAll(): void {
    this.decisions.clear();
  }

  get size(): number {
    return this.decisions.size;
  }

  snapshot(): Record<string, ReviewDecision> {
    const entries: Record<string, ReviewDecision> = {};
    for (const [id, decision] of this.decisions.entries()) {
      entries[id] = { ...decision };
    }
    return entries;
  }
}
