"use client";

import { useCallback, useEffect, useMemo, useState } from "react";
import { FinalDraftPanel } from "@/components/review/FinalDraftPanel";
import { ReviewItemCard } from "@/components/review/ReviewItemCard";
import { ReviewProgress } from "@/components/review/ReviewProgress";
import { SectionSelector, type WorkspaceTab } from "@/components/review/SectionSelector";
import {
  SECTION_HEADERS,
  type AssembledDraft,
  type DecisionStatus,
  type ReviewSnapshot,
} from "@/types/reconciliation";

const parseApiPayload = async (
  response: Response,
): Promise<{ payload: Record<string, unknown> | null; text: string | null }> => {
  const contentType = response.headers.get("content-type") ?? "";
  if (contentType.includes("application/json")) {
    const payload = (await response.json()) as Record<string, unknown>;
    return { payload, text: null };
  }

  const text = await response.text();
  return { payload: null, text };
};

const toApiError = (
  response: Response,
  payload: Record<string, unknown> | null,
  text: string | null,
): Error => {
  if (payload && typeof payload.error === "string" && payload.error.trim()) {
    return new Error(payload.error);
  }

  if (text && /^<!doctype html/i.test(text.trim())) {
    return new Error(
      `Request failed (${response.status}). API returned HTML instead of JSON.`,
    );
  }

  if (text && text.trim()) {
    return new Error(`Request failed (${response.status}): ${text.slice(0, 220)}`);
  }

  return new Error(`Request failed (${response.status}).`);
};

const requestJson = async (
  url: string,
  init?: { method: "GET" | "POST"; body?: string },
): Promise<Record<string, unknown>> => {
  const response = await fetch(url, {
    method: init?.method ?? "GET",
    body: init?.body,
    headers: { "Content-Type": "application/json" },
  });
  const { payload, text } = await parseApiPayload(response);
  if (!response.ok || !payload) {
    throw toApiError(response, payload, text);
  }
  return payload;
};

const readSnapshot = (payload: Record<string, unknown>): ReviewSnapshot => {
  if (!payload.snapshot) {
    throw new Error("Review response is missing the snapshot payload.");
  }
  return payload.snapshot as ReviewSnapshot;
};

const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error ? error.message : fallback;

export const ReviewWorkspace = () => {
  const [findingsInput, setFindingsInput] = useState("");
  const [sessionId, setSessionId] = useState<string | null>(null);
  const [snapshot, setSnapshot] = useState<ReviewSnapshot | null>(null);
  const [draft, setDraft] = useState<AssembledDraft | null>(null);
  const [selectedTab, setSelectedTab] = useState<WorkspaceTab>("results");
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const selectedItems = useMemo(
    () => (snapshot && selectedTab !== "draft" ? snapshot.sections[selectedTab].allItems : []),
    [snapshot, selectedTab],
  );

  const startValidation = useCallback(async () => {
    let body: string;
    try {
      body = JSON.stringify(JSON.parse(findingsInput));
    } catch {
      setError("Findings must be valid JSON.");
      return;
    }

    if (
      sessionId &&
      !window.confirm("새로운 검증을 시작하시겠습니까? 현재 결과는 사라집니다.")
    ) {
      return;
    }

    setBusy(true);
    setError(null);
    try {
      const payload = await requestJson(
        sessionId ? `/api/reviews/${sessionId}/runs` : "/api/reviews",
        { method: "POST", body },
      );
      if (typeof payload.sessionId === "string") {
        setSessionId(payload.sessionId);
      }
      setSnapshot(readSnapshot(payload));
      setDraft(null);
      setSelectedTab("results");
    } catch (requestError) {
      setError(errorMessage(requestError, "Unable to start the validation run."));
    } finally {
      setBusy(false);
    }
  }, [findingsInput, sessionId]);

  const loadDraft = useCallback(async () => {
    if (!sessionId) {
      return;
    }

    try {
      const payload = await requestJson(`/api/reviews/${sessionId}/draft`);
      setDraft((payload.draft as AssembledDraft | undefined) ?? null);
    } catch (requestError) {
      setError(errorMessage(requestError, "Unable to assemble the final draft."));
    }
  }, [sessionId]);

  const decide = useCallback(
    async (itemId: string, status: DecisionStatus, editedText?: string): Promise<boolean> => {
      if (!sessionId) {
        return false;
      }

      setBusy(true);
      setError(null);
      try {
        const payload = await requestJson(`/api/reviews/${sessionId}/decisions`, {
          method: "POST",
          body: JSON.stringify({ itemId, status, editedText }),
        });
        setSnapshot(readSnapshot(payload));
        return true;
      } catch (requestError) {
        setError(errorMessage(requestError, "Unable to record the decision."));
        return false;
      } finally {
        setBusy(false);
      }
    },
    [sessionId],
  );

  useEffect(() => {
    if (selectedTab === "draft") {
      void loadDraft();
    }
  }, [loadDraft, selectedTab, snapshot]);

  const exportDraft = useCallback(() => {
    if (!sessionId) {
      return;
    }

    window.open(`/api/reviews/${sessionId}/draft/export`, "_blank", "noopener,noreferrer");
  }, [sessionId]);

  return (
    <div className="flex h-screen w-full flex-col overflow-hidden bg-[var(--color-bg-secondary)]">
      <header
        className="flex shrink-0 items-center gap-4 border-b border-[var(--color-border)] bg-white px-5"
        style={{ height: 56 }}
      >
        <span className="text-lg font-bold text-[var(--color-text-primary)]">DSS 검수</span>
        <div className="h-6 w-px bg-[var(--color-border)]" />
        <span className="text-sm text-[var(--color-text-secondary)]">
          {snapshot?.header.company ?? "회사명"} · {snapshot?.header.period ?? "기간 미상"}
        </span>
        {snapshot ? (
          <span className="ml-auto text-xs text-[var(--color-text-muted)]">
            정확도 {snapshot.assessment.accuracyScore}점 · 주요 문제 {snapshot.assessment.majorIssuesCount}건
          </span>
        ) : null}
      </header>

      <div className="flex flex-1 overflow-hidden">
        <aside className="flex w-[300px] shrink-0 flex-col gap-3 border-r border-[var(--color-border)] bg-white p-3">
          <textarea
            value={findingsInput}
            onChange={(event) => setFindingsInput(event.target.value)}
            placeholder='{"corrections": [], "issues": []}'
            rows={8}
            className="w-full rounded-md border border-[var(--color-border)] p-2 font-mono text-xs"
          />
          <button
            type="button"
            disabled={busy || !findingsInput.trim()}
            onClick={() => void startValidation()}
            className="rounded-md px-4 py-1.5 text-sm font-medium text-white disabled:cursor-not-allowed disabled:opacity-50"
            style={{ background: "var(--color-accent)" }}
          >
            {sessionId ? "새로 검증하기" : "검증 시작"}
          </button>
          {snapshot ? <ReviewProgress progress={snapshot.progress} /> : null}
          <SectionSelector
            sections={snapshot?.sections ?? null}
            selected={selectedTab}
            onSelect={setSelectedTab}
          />
        </aside>

        <main className="flex-1 overflow-y-auto p-6">
          {!snapshot ? (
            <p className="text-sm text-[var(--color-text-muted)]">
              Paste a findings payload and start the validation run.
            </p>
          ) : selectedTab === "draft" ? (
            <FinalDraftPanel draft={draft} onExport={exportDraft} />
          ) : selectedItems.length === 0 ? (
            <div
              className="rounded-lg border border-dashed p-6 text-center text-sm"
              style={{
                borderColor: "var(--color-border)",
                color: "var(--color-text-tertiary)",
              }}
            >
              {SECTION_HEADERS[selectedTab]} 섹션에는 문제가 없습니다
            </div>
          ) : (
            <div className="flex flex-col gap-4">
              {selectedItems.map((item) => (
                <ReviewItemCard
                  key={`${snapshot.runId}-${item.id}`}
                  item={item}
                  busy={busy}
                  onDecide={decide}
                />
              ))}
            </div>
          )}
        </main>
      </div>

      {error ? (
        <div
          className="fixed bottom-5 right-5 max-w-md rounded-lg border px-4 py-3 text-sm shadow-lg"
          style={{
            background: "var(--color-removed-bg)",
            borderColor: "var(--color-removed)",
            color: "var(--color-removed-text)",
          }}
        >
          {error}
        </div>
      ) : null}
    </div>
  );
};
