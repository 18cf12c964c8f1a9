import { describe, expect, it } from "vitest";
import {
  assessFaithfulness,
  assessRecommendation,
  classify,
  deriveReportHeader,
  resolveSection,
  summarizeItem,
  tagFinding,
} from "@/lib/review/classifyFindings";
import { ReviewStateStore } from "@/lib/review/reviewStateStore";
import { buildCorrection, buildIssue, buildPayload } from "@/test/findings";

describe("resolveSection", () => {
  it("maps category aliases onto sections", () => {
    expect(resolveSection("실적")).toBe("results");
    expect(resolveSection("가이던스")).toBe("guidance");
    expect(resolveSection("목표")).toBe("guidance");
    expect(resolveSection("Q&A")).toBe("qa");
    expect(resolveSection(" q&a ")).toBe("qa");
  });

  it("falls back to results for absent categories", () => {
    expect(resolveSection(undefined)).toBe("results");
    expect(resolveSection("")).toBe("results");
    expect(resolveSection("   ")).toBe("results");
  });

  it("sends unrecognized categories to Q&A", () => {
    expect(resolveSection("기타")).toBe("qa");
    expect(resolveSection("질문")).toBe("qa");
  });
});

describe("classify", () => {
  const payload = buildPayload(
    [buildCorrection(), buildCorrection({ category: "가이던스" })],
    [buildIssue(), buildIssue({ category: "Q&A" }), buildIssue({ category: undefined })],
  );

  it("produces one item per finding with positional ids", () => {
    const items = classify(payload, new ReviewStateStore());

    expect(items.map((item) => item.id)).toEqual([
      "correction-0",
      "correction-1",
      "issue-0",
      "issue-1",
      "issue-2",
    ]);
    expect(items.map((item) => item.section)).toEqual([
      "results",
      "guidance",
      "results",
      "qa",
      "results",
    ]);
  });

  it("yields the same ids on every pass", () => {
    const store = new ReviewStateStore();

    expect(classify(payload, store).map((item) => item.id)).toEqual(
      classify(payload, store).map((item) => item.id),
    );
  });

  it("reads decisions from the store", () => {
    const store = new ReviewStateStore();
    store.setDecision("issue-1", "manual", "직접 고친 문장");

    const items = classify(payload, store);

    expect(items.find((item) => item.id === "issue-1")).toMatchObject({
      status: "manual",
      editedText: "직접 고친 문장",
    });
    expect(items.filter((item) => item.status === "pending")).toHaveLength(4);
  });

  it("classifies an empty payload to no items", () => {
    expect(classify(buildPayload(), new ReviewStateStore())).toEqual([]);
  });
});

describe("tagFinding", () => {
  it("tags each finding shape", () => {
    expect(tagFinding(buildCorrection())).toBe("mismatch");
    expect(tagFinding(buildIssue({ validationStatus: "passed" }))).toBe("match");
    expect(tagFinding(buildIssue({ label: "일치함" }))).toBe("match");
    expect(tagFinding(buildIssue({ validationStatus: "error" }))).toBe("error");
    expect(tagFinding(buildIssue({ subtype: "수치오류" }))).toBe("numeric");
    expect(tagFinding(buildIssue({ label: "수치 확인" }))).toBe("numeric");
    expect(tagFinding(buildIssue())).toBe("contextual");
  });
});

describe("summarizeItem", () => {
  const store = new ReviewStateStore();

  it("summarizes corrections as a value change", () => {
    const [item] = classify(buildPayload([buildCorrection()]), store);
    expect(item && summarizeItem(item)).toBe("1,234억원 → 2,345억원");
  });

  it("summarizes matches", () => {
    const [item] = classify(buildPayload([], [buildIssue({ validationStatus: "passed" })]), store);
    expect(item && summarizeItem(item)).toBe("문제 없음");
  });

  it("truncates long descriptions", () => {
    const [item] = classify(
      buildPayload([], [buildIssue({ description: "가".repeat(100) })]),
      store,
    );
    expect(item && summarizeItem(item)).toBe(`${"가".repeat(80)}...`);
  });
});

describe("assessRecommendation", () => {
  it("grades recommendation text", () => {
    expect(assessRecommendation(buildIssue({ validationStatus: "passed" }))).toBe("passed");
    expect(assessRecommendation(buildIssue({ recommendation: "  " }))).toBe("uncertain");
    expect(assessRecommendation(buildIssue({ recommendation: "N/A" }))).toBe("uncertain");
    expect(assessRecommendation(buildIssue({ recommendation: "추가 확인 필요" }))).toBe(
      "review_needed",
    );
    expect(assessRecommendation(buildIssue())).toBe("has_recommendation");
  });
});

describe("deriveReportHeader", () => {
  it("skips placeholder company names", () => {
    expect(
      deriveReportHeader(
        buildPayload([buildCorrection({ company: "N/A" })], [buildIssue({ company: "테스트전자" })]),
      ),
    ).toEqual({ company: "테스트전자", period: "2025-Q4" });
  });

  it("returns nulls for an empty payload", () => {
    expect(deriveReportHeader(buildPayload())).toEqual({ company: null, period: null });
  });
});

describe("assessFaithfulness", () => {
  it("scores actionable issues by severity", () => {
    const items = classify(
      buildPayload(
        [buildCorrection()],
        [
          buildIssue({ severity: "Critical" }),
          buildIssue({ severity: "high" }),
          buildIssue({ severity: "Medium" }),
          buildIssue({ validationStatus: "passed", severity: "Critical" }),
        ],
      ),
      new ReviewStateStore(),
    );

    expect(assessFaithfulness(items)).toEqual({
      accuracyScore: 67,
      faithfulness: "poor",
      majorIssuesCount: 2,
      actionableIssues: 3,
    });
  });

  it("rates high-severity issues as fair", () => {
    const items = classify(
      buildPayload([], [buildIssue({ severity: "High" }), buildIssue({ severity: "High" })]),
      new ReviewStateStore(),
    );

    expect(assessFaithfulness(items)).toMatchObject({ accuracyScore: 80, faithfulness: "fair" });
  });

  it("rates a clean run as good", () => {
    expect(assessFaithfulness([])).toEqual({
      accuracyScore: 100,
      faithfulness: "good",
      majorIssuesCount: 0,
      actionableIssues: 0,
    });
  });
});
