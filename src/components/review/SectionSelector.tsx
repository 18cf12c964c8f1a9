import clsx from "clsx";
import {
  SECTION_HEADERS,
  SECTION_ORDER,
  type OrganizedSections,
  type SectionName,
} from "@/types/reconciliation";

export type WorkspaceTab = SectionName | "draft";

const pendingCount = (sections: OrganizedSections, section: SectionName): number =>
  sections[section].allItems.filter((item) => item.status === "pending").length;

export const SectionSelector = ({
  sections,
  selected,
  onSelect,
}: {
  sections: OrganizedSections | null;
  selected: WorkspaceTab;
  onSelect: (tab: WorkspaceTab) => void;
}) => {
  return (
    <div className="flex flex-col gap-1 p-3">
      {SECTION_ORDER.map((section) => {
        const total = sections?.[section].allItems.length ?? 0;
        const waiting = sections ? pendingCount(sections, section) : 0;
        const isSelected = selected === section;

        return (
          <button
            key={`section-${section}`}
            type="button"
            onClick={() => onSelect(section)}
            className={clsx(
              "flex items-center justify-between gap-3 rounded-md border p-3 text-left transition",
              isSelected
                ? "border-[var(--color-accent)]"
                : "border-transparent hover:border-[var(--color-border)] hover:bg-[var(--color-bg-secondary)]",
            )}
            style={{ background: isSelected ? "var(--color-accent-subtle)" : "transparent" }}
          >
            <span
              className="truncate text-sm font-medium"
              style={{ color: isSelected ? "var(--color-accent)" : "var(--color-text-primary)" }}
            >
              {SECTION_HEADERS[section]}
            </span>
            {total > 0 ? (
              <span
                className="rounded px-1.5 py-0.5 text-xs font-semibold"
                style={{
                  background: waiting > 0 ? "var(--color-changed-subtle)" : "var(--color-added-bg)",
                  color: waiting > 0 ? "var(--color-changed-text)" : "var(--color-added)",
                }}
              >
                {waiting > 0 ? `${waiting}/${total}` : total}
              </span>
            ) : (
              <span
                className="text-[10px] uppercase tracking-wide"
                style={{ color: "var(--color-text-muted)" }}
              >
                No issues
              </span>
            )}
          </button>
        );
      })}

      <button
        type="button"
        onClick={() => onSelect("draft")}
        className={clsx(
          "mt-2 rounded-md border p-3 text-left text-sm font-semibold transition",
          selected === "draft"
            ? "border-[var(--color-accent)] text-[var(--color-accent)]"
            : "border-[var(--color-border)] text-[var(--color-text-primary)] hover:bg-[var(--color-bg-secondary)]",
        )}
      >
        최종 수정안
      </button>
    </div>
  );
};
