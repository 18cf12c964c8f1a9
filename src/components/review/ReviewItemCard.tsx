"use client";

import clsx from "clsx";
import { useState } from "react";
import { RedlineText } from "@/components/review/RedlineText";
import { recommendedText } from "@/lib/draft/assembleDraft";
import { buildCorrectionPreview } from "@/lib/match/textMatcher";
import {
  assessRecommendation,
  itemLabel,
  summarizeItem,
} from "@/lib/review/classifyFindings";
import type {
  DecisionStatus,
  DiffToken,
  ItemTag,
  ReviewItem,
} from "@/types/reconciliation";

const TAG_BADGES: Record<ItemTag, { text: string; background: string; color: string }> = {
  mismatch: { text: "불일치", background: "var(--color-removed-bg)", color: "var(--color-removed-text)" },
  numeric: { text: "수치 이슈", background: "var(--color-removed-bg)", color: "var(--color-removed-text)" },
  contextual: { text: "문맥 이슈", background: "var(--color-changed-subtle)", color: "var(--color-changed-text)" },
  match: { text: "일치함", background: "var(--color-added-bg)", color: "var(--color-added-text)" },
  error: { text: "검수 오류", background: "var(--color-bg-tertiary)", color: "var(--color-text-secondary)" },
};

const STATUS_LABELS: Record<Exclude<DecisionStatus, "pending">, string> = {
  accepted: "승인됨",
  rejected: "거부됨",
  manual: "수동 편집",
};

const issueTokens = (item: ReviewItem): { before: DiffToken[]; after: DiffToken[] } => {
  const { finding } = item;
  if (finding.kind === "correction") {
    const preview = buildCorrectionPreview(finding);
    return { before: preview.before.tokens, after: preview.after.tokens };
  }

  // Without a DSS sentence the card shows the problem description instead.
  const shown = finding.sentence || finding.description;
  const sentence = shown ? [shown] : [];
  if (item.tag === "match") {
    return {
      before: sentence.map((value) => ({ value, kind: "equal" as const })),
      after: [{ value: "문제 없음", kind: "equal" }],
    };
  }

  const recommendation = assessRecommendation(finding);
  return {
    before: sentence.map((value) => ({ value, kind: "removed" as const })),
    after:
      recommendation === "uncertain"
        ? [{ value: "판단 어려움 - 수동 검토 필요", kind: "equal" }]
        : [{ value: finding.recommendation, kind: "added" }],
  };
};

export const ReviewItemCard = ({
  item,
  busy,
  onDecide,
}: {
  item: ReviewItem;
  busy: boolean;
  onDecide: (itemId: string, status: DecisionStatus, editedText?: string) => Promise<boolean>;
}) => {
  const [editing, setEditing] = useState(false);
  const [draftText, setDraftText] = useState(
    () => item.editedText ?? recommendedText(item.finding),
  );
  const { finding } = item;
  const badge = TAG_BADGES[item.tag];
  const tokens = issueTokens(item);

  const saveManualEdit = async () => {
    const saved = await onDecide(item.id, "manual", draftText);
    if (saved) {
      setEditing(false);
    }
  };

  return (
    <article
      id={`card-${item.id}`}
      className="rounded-lg border border-[var(--color-border)] bg-white p-5"
    >
      <header className="mb-4 flex items-center justify-between gap-3">
        <div className="flex items-baseline gap-2">
          <strong className="text-sm text-[var(--color-text-primary)]">{itemLabel(item)}</strong>
          <small className="text-xs text-[var(--color-text-muted)]">{finding.period ?? ""}</small>
          <span className="truncate text-xs text-[var(--color-text-tertiary)]">{summarizeItem(item)}</span>
        </div>
        <div className="flex items-center gap-2">
          <span
            className="rounded px-2 py-0.5 text-xs font-semibold"
            style={{ background: badge.background, color: badge.color }}
          >
            {badge.text}
          </span>
          {item.status !== "pending" ? (
            <span
              className="rounded px-2 py-0.5 text-xs font-semibold text-white"
              style={{ background: "var(--color-charcoal)" }}
            >
              {STATUS_LABELS[item.status]}
            </span>
          ) : null}
        </div>
      </header>

      <div className="grid grid-cols-2 gap-4">
        <div>
          <p className="mb-1 text-xs font-semibold text-[var(--color-text-tertiary)]">변경 전 (DSS 원본)</p>
          <RedlineText tokens={tokens.before} mode="original" />
        </div>
        <div>
          <p className="mb-1 text-xs font-semibold text-[var(--color-text-tertiary)]">
            {item.tag === "match" ? "검증 결과" : "변경 후 (수정)"}
          </p>
          <RedlineText tokens={tokens.after} mode="revised" />
        </div>
      </div>

      <dl className="mt-4 flex flex-col gap-2 text-sm">
        {finding.kind === "correction" ? (
          <>
            <dt className="text-xs text-[var(--color-text-muted)]">수정 이유</dt>
            <dd>{finding.rationale || "N/A"}</dd>
          </>
        ) : finding.description ? (
          <>
            <dt className="text-xs text-[var(--color-text-muted)]">발견된 문제</dt>
            <dd>{finding.description}</dd>
          </>
        ) : null}
        <dt className="text-xs text-[var(--color-text-muted)]">어닝콜 원문 근거</dt>
        <dd className="text-[var(--color-text-secondary)]">
          {finding.sourceContext || "원문에서 근거를 찾지 못했습니다"}
        </dd>
      </dl>

      {editing ? (
        <div className="mt-4 flex flex-col gap-2">
          <textarea
            value={draftText}
            onChange={(event) => setDraftText(event.target.value)}
            rows={4}
            className="w-full rounded-md border border-[var(--color-border)] p-2 text-sm"
          />
          <div className="flex gap-2">
            <button
              type="button"
              disabled={busy || !draftText.trim()}
              onClick={() => void saveManualEdit()}
              className="rounded-md px-3 py-1.5 text-sm font-medium text-white disabled:opacity-50"
              style={{ background: "var(--color-accent)" }}
            >
              저장
            </button>
            <button
              type="button"
              onClick={() => setEditing(false)}
              className="rounded-md border border-[var(--color-border)] px-3 py-1.5 text-sm"
            >
              취소
            </button>
          </div>
        </div>
      ) : (
        <div className="mt-4 flex gap-2">
          {(["accepted", "rejected"] as const).map((status) => (
            <button
              key={status}
              type="button"
              disabled={busy}
              onClick={() => void onDecide(item.id, status)}
              className={clsx(
                "flex-1 rounded-md border px-3 py-1.5 text-sm font-medium transition disabled:opacity-50",
                item.status === status
                  ? "border-transparent text-white"
                  : "border-[var(--color-border)] text-[var(--color-text-secondary)]",
              )}
              style={{
                background:
                  item.status === status
                    ? status === "accepted"
                      ? "var(--color-added)"
                      : "var(--color-removed)"
                    : "white",
              }}
            >
              {status === "accepted" ? "승인" : "거부"}
            </button>
          ))}
          <button
            type="button"
            disabled={busy}
            onClick={() => setEditing(true)}
            className="flex-1 rounded-md border border-[var(--color-border)] px-3 py-1.5 text-sm font-medium text-[var(--color-text-secondary)] disabled:opacity-50"
          >
            수동
          </button>
        </div>
      )}
    </article>
  );
};
