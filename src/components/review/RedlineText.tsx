import clsx from "clsx";
import type { CSSProperties } from "react";
import type { DiffToken } from "@/types/reconciliation";

// original: the DSS text as written, deletions marked.
// revised: the proposed text, insertions marked.
// draft: a final-draft sentence with both sides inline.
export type RedlineMode = "original" | "revised" | "draft";

const HIDDEN_KIND: Record<RedlineMode, DiffToken["kind"] | null> = {
  original: "added",
  revised: "removed",
  draft: null,
};

const TOKEN_STYLE: Record<DiffToken["kind"], CSSProperties | undefined> = {
  equal: undefined,
  removed: {
    background: "var(--color-removed-bg)",
    color: "var(--color-removed-text)",
    textDecoration: "line-through",
    padding: "1px 2px",
    borderRadius: "2px",
  },
  added: {
    background: "var(--color-added-bg)",
    color: "var(--color-added-text)",
    fontWeight: 500,
    padding: "1px 2px",
    borderRadius: "2px",
  },
};

export const RedlineText = ({ tokens, mode }: { tokens: DiffToken[]; mode: RedlineMode }) => {
  const hidden = HIDDEN_KIND[mode];
  const visible = tokens.filter((token) => token.kind !== hidden);

  if (visible.length === 0) {
    return <p className="text-sm italic text-[var(--color-text-muted)]">(원문 없음)</p>;
  }

  return (
    <p
      className={clsx(
        "whitespace-pre-wrap break-words text-sm",
        mode === "draft"
          ? "leading-6 text-[var(--color-text-primary)]"
          : "leading-7 text-[var(--color-text-secondary)]",
      )}
    >
      {visible.map((token, index) => (
        <span key={`${mode}-${index}`} style={TOKEN_STYLE[token.kind]}>
          {token.value}
        </span>
      ))}
    </p>
  );
};
