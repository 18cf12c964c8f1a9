import type { ProgressSummary } from "@/types/reconciliation";

const clampPercent = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(100, value));
};

const COUNTERS: { key: keyof Omit<ProgressSummary, "total" | "percentComplete">; label: string; color: string }[] = [
  { key: "accepted", label: "승인", color: "var(--color-added)" },
  { key: "rejected", label: "거부", color: "var(--color-removed)" },
  { key: "manual", label: "수동", color: "var(--color-accent)" },
  { key: "pending", label: "대기", color: "var(--color-text-muted)" },
];

export const ReviewProgress = ({ progress }: { progress: ProgressSummary }) => {
  const percent = clampPercent(progress.percentComplete);

  return (
    <div className="w-full">
      <div className="mb-2 flex items-center justify-between gap-2">
        <div className="flex items-center gap-3 text-xs">
          {COUNTERS.map((counter) => (
            <span key={counter.key} className="flex items-center gap-1">
              <span className="h-2 w-2 rounded-full" style={{ background: counter.color }} />
              <span style={{ color: "var(--color-text-secondary)" }}>
                {counter.label} {progress[counter.key]}
              </span>
            </span>
          ))}
        </div>
        <p className="text-sm font-semibold" style={{ color: "var(--color-text-primary)" }}>
          {percent}%
        </p>
      </div>
      <div
        role="progressbar"
        aria-label="검토 진행률"
        aria-valuemin={0}
        aria-valuemax={100}
        aria-valuenow={percent}
        className="h-2 w-full overflow-hidden rounded-full"
        style={{ background: "var(--color-bg-tertiary)" }}
      >
        <div
          className="h-full rounded-full transition-[width] duration-150 ease-out"
          style={{
            width: `${percent}%`,
            background: "var(--color-accent)",
          }}
        />
      </div>
    </div>
  );
};
