import { RedlineText } from "@/components/review/RedlineText";
import { countChangedWords } from "@/lib/diff/tokenizeDiff";
import {
  SECTION_HEADERS,
  SECTION_ORDER,
  type AssembledDraft,
} from "@/types/reconciliation";

export const FinalDraftPanel = ({
  draft,
  onExport,
}: {
  draft: AssembledDraft | null;
  onExport: () => void;
}) => {
  if (!draft || draft.changedCount === 0) {
    return (
      <div
        className="rounded-lg border border-dashed p-6 text-sm"
        style={{
          borderColor: "var(--color-border)",
          background: "var(--color-bg-secondary)",
          color: "var(--color-text-tertiary)",
        }}
      >
        승인된 항목이 없습니다. 검증 결과에서 항목을 승인하거나 수동 편집하세요.
      </div>
    );
  }

  return (
    <div className="flex flex-col gap-6">
      <div className="flex items-center justify-between">
        <p className="text-sm font-semibold text-[var(--color-text-primary)]">
          총 {draft.changedCount}개 항목이 최종안에 반영되었습니다.
        </p>
        <button
          type="button"
          onClick={onExport}
          className="rounded-md border border-[var(--color-border)] bg-white px-3 py-1.5 text-sm text-[var(--color-text-secondary)] transition hover:bg-[var(--color-bg-secondary)]"
        >
          DSS 파일 다운로드
        </button>
      </div>

      {SECTION_ORDER.filter((section) => draft.sections[section].length > 0).map((section) => (
        <section key={`draft-${section}`} className="rounded-lg border border-[var(--color-border)] bg-white p-5">
          <h3 className="mb-3 text-sm font-bold text-[var(--color-text-primary)]">
            ### {SECTION_HEADERS[section]}
          </h3>
          <ol className="flex flex-col gap-3">
            {draft.sections[section].map((sentence) => {
              const changed = countChangedWords(sentence.redline);
              return (
                <li key={`draft-${sentence.itemId}`}>
                  <span className="text-xs text-[var(--color-text-muted)]">
                    {sentence.label} · +{changed.added} / -{changed.removed}
                  </span>
                  <RedlineText tokens={sentence.redline} mode="draft" />
                </li>
              );
            })}
          </ol>
        </section>
      ))}

      <pre
        className="whitespace-pre-wrap break-words rounded-lg border border-[var(--color-border)] bg-[var(--color-bg-secondary)] p-4 font-mono text-xs"
        aria-label="최종 수정안 (DSS 형식)"
      >
        {draft.renderedDocument}
      </pre>
    </div>
  );
};
