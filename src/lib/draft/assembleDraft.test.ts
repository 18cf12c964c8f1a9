import { describe, expect, it } from "vitest";
import { assemble, recommendedText } from "@/lib/draft/assembleDraft";
import { classify } from "@/lib/review/classifyFindings";
import { organize } from "@/lib/review/organizeSections";
import { parseFindingsPayload } from "@/lib/review/parseFindings";
import { ReviewStateStore } from "@/lib/review/reviewStateStore";
import { buildCorrection, buildIssue, buildPayload } from "@/test/findings";
import type { FindingsPayload } from "@/types/reconciliation";

const assembleWith = (
  payload: FindingsPayload,
  decide: (store: ReviewStateStore) => void,
) => {
  const store = new ReviewStateStore();
  const items = classify(payload, store);
  decide(store);
  return assemble(organize(items, store), store);
};

describe("assemble", () => {
  it("applies accepted corrections to their context sentence", () => {
    const draft = assembleWith(buildPayload([buildCorrection()]), (store) => {
      store.setDecision("correction-0", "accepted");
    });

    expect(draft.renderedDocument).toBe("### 실적 발표\n## 매출은 2,345억원을 기록했다\n\n");
    expect(draft.changedCount).toBe(1);
    expect(draft.sections.results[0]).toMatchObject({
      itemId: "correction-0",
      kind: "correction",
      status: "accepted",
      label: "매출액",
      original: "매출은 1,234억원을 기록했다",
    });
  });

  it("substitutes values written with different spacing", () => {
    const draft = assembleWith(
      buildPayload([buildCorrection({ contextText: "매출은 1,234 억원을 기록했다" })]),
      (store) => {
        store.setDecision("correction-0", "accepted");
      },
    );

    expect(draft.sections.results[0]?.text).toBe("매출은 2,345억원을 기록했다");
  });

  it("keeps the original sentence for rejected items", () => {
    const draft = assembleWith(buildPayload([], [buildIssue()]), (store) => {
      store.setDecision("issue-0", "rejected");
    });

    expect(draft.sections.results[0]?.text).toBe("영업이익은 개선되었다");
    expect(draft.sections.results[0]?.redline).toEqual([
      { value: "영업이익은 개선되었다", kind: "equal" },
    ]);
  });

  it("uses the reviewer's text for manual items", () => {
    const draft = assembleWith(buildPayload([], [buildIssue()]), (store) => {
      store.setDecision("issue-0", "manual", "영업이익은 3% 개선되었다");
    });

    expect(draft.renderedDocument).toBe("### 실적 발표\n## 영업이익은 3% 개선되었다\n\n");
  });

  it("emits the recommendation for accepted issues", () => {
    const draft = assembleWith(buildPayload([], [buildIssue()]), (store) => {
      store.setDecision("issue-0", "accepted");
    });

    expect(draft.sections.results[0]?.text).toBe("영업이익은 소폭 개선되었다");
  });

  it("leaves pending items out", () => {
    const draft = assembleWith(
      buildPayload([buildCorrection()], [buildIssue()]),
      (store) => {
        store.setDecision("issue-0", "rejected");
      },
    );

    expect(draft.sections.results.map((sentence) => sentence.itemId)).toEqual(["issue-0"]);
  });

  it("renders an empty document when nothing is decided", () => {
    const draft = assembleWith(buildPayload([buildCorrection()], [buildIssue()]), () => {});

    expect(draft).toEqual({
      sections: { results: [], guidance: [], qa: [] },
      renderedDocument: "",
      changedCount: 0,
    });
  });

  it("skips rejected items whose original sentence is empty", () => {
    const draft = assembleWith(
      buildPayload([buildCorrection({ contextText: "" })]),
      (store) => {
        store.setDecision("correction-0", "rejected");
      },
    );

    expect(draft.changedCount).toBe(0);
  });

  it("skips rejected issues that carry no DSS sentence", () => {
    const draft = assembleWith(
      parseFindingsPayload({
        issues: [
          { metric: "영업이익", issue: "개선 폭이 과장되었습니다", recommendation: "소폭 개선" },
        ],
      }),
      (store) => {
        store.setDecision("issue-0", "rejected");
      },
    );

    expect(draft.renderedDocument).toBe("");
    expect(draft.changedCount).toBe(0);
  });

  it("renders sections in canonical order", () => {
    const draft = assembleWith(
      buildPayload(
        [buildCorrection({ category: "Q&A" })],
        [buildIssue({ category: "가이던스" }), buildIssue()],
      ),
      (store) => {
        store.setDecision("correction-0", "rejected");
        store.setDecision("issue-0", "accepted");
        store.setDecision("issue-1", "rejected");
      },
    );

    expect(draft.renderedDocument).toBe(
      [
        "### 실적 발표",
        "## 영업이익은 개선되었다",
        "",
        "### 가이던스",
        "## 영업이익은 소폭 개선되었다",
        "",
        "### Q&A",
        "## 매출은 1,234억원을 기록했다",
        "",
        "",
      ].join("\n"),
    );
  });

  it("produces the same draft on repeated calls", () => {
    const store = new ReviewStateStore();
    const items = classify(buildPayload([buildCorrection()], [buildIssue()]), store);
    store.setDecision("correction-0", "accepted");
    store.setDecision("issue-0", "manual", "직접 고친 문장");

    const first = assemble(organize(items, store), store);
    const second = assemble(organize(items, store), store);

    expect(second).toEqual(first);
  });

  it("reflects decisions changed after the items were organized", () => {
    const store = new ReviewStateStore();
    const organized = organize(classify(buildPayload([], [buildIssue()]), store), store);
    store.setDecision("issue-0", "accepted");

    expect(assemble(organized, store).changedCount).toBe(1);
  });
});

describe("recommendedText", () => {
  it("falls back to the numeric token when the full value is absent", () => {
    expect(
      recommendedText(
        buildCorrection({
          contextText: "매출 1,234 (억원) 기록",
          originalValue: "1,234억원",
          correctedValue: "2,000억원",
        }),
      ),
    ).toBe("매출 2,000 (억원) 기록");
  });

  it("returns the context unchanged when nothing matches", () => {
    expect(recommendedText(buildCorrection({ contextText: "수치 없음" }))).toBe("수치 없음");
  });
});
