import { describe, expect, it } from "vitest";
import { countFindings, parseFindingsPayload } from "@/lib/review/parseFindings";

describe("parseFindingsPayload", () => {
  it("maps wire fields onto findings", () => {
    const payload = parseFindingsPayload({
      corrections: [
        {
          metric: "매출액",
          period: "2025-Q4",
          company: "테스트전자",
          dss_current_value: "1,234억원",
          correct_value: "2,345억원",
          dss_context: "매출은 1,234억원을 기록했다",
          correction: "원문 수치와 다릅니다",
          earning_call_context: "4분기 매출은 2,345억원입니다",
          type: "실적",
        },
      ],
      issues: [
        {
          metric: "영업이익",
          dss_statement: "영업이익은 개선되었다",
          issue: "개선 폭이 과장되었습니다",
          issue_type: "과장",
          severity: "High",
          recommendation: "영업이익은 소폭 개선되었다",
          earning_call_context: "소폭 개선",
          type: "가이던스",
          validation_status: "issue_found",
        },
      ],
    });

    expect(payload.corrections).toEqual([
      {
        kind: "correction",
        metric: "매출액",
        period: "2025-Q4",
        company: "테스트전자",
        originalValue: "1,234억원",
        correctedValue: "2,345억원",
        contextText: "매출은 1,234억원을 기록했다",
        rationale: "원문 수치와 다릅니다",
        sourceContext: "4분기 매출은 2,345억원입니다",
        category: "실적",
      },
    ]);
    expect(payload.issues).toEqual([
      {
        kind: "issue",
        label: "영업이익",
        sentence: "영업이익은 개선되었다",
        description: "개선 폭이 과장되었습니다",
        subtype: "과장",
        severity: "High",
        recommendation: "영업이익은 소폭 개선되었다",
        sourceContext: "소폭 개선",
        category: "가이던스",
        validationStatus: "issue_found",
      },
    ]);
  });

  it("treats missing lists as empty", () => {
    expect(parseFindingsPayload({})).toEqual({ corrections: [], issues: [] });
    expect(parseFindingsPayload(null)).toEqual({ corrections: [], issues: [] });
    expect(parseFindingsPayload("not a payload")).toEqual({ corrections: [], issues: [] });
  });

  it("reads the legacy layout", () => {
    const payload = parseFindingsPayload({
      corrections_needed: [{ metric: "매출액" }],
      interpretation_validation: {
        interpretation_issues: [{ metric: "일치함", validation_status: "passed" }],
      },
    });

    expect(payload.corrections.map((finding) => finding.metric)).toEqual(["매출액"]);
    expect(payload.issues.map((finding) => finding.validationStatus)).toEqual(["passed"]);
  });

  it("degrades malformed entries field by field", () => {
    const payload = parseFindingsPayload({
      corrections: [null, "broken", { metric: 5, dss_current_value: 1234, period: "  " }],
    });

    expect(payload.corrections).toHaveLength(3);
    expect(payload.corrections[0]).toEqual({
      kind: "correction",
      metric: "",
      originalValue: "",
      correctedValue: "",
      contextText: "",
      rationale: "",
      sourceContext: "",
    });
    expect(payload.corrections[2]?.metric).toBe("5");
    expect(payload.corrections[2]?.originalValue).toBe("1234");
    expect(payload.corrections[2]?.period).toBeUndefined();
  });

  it("reads the sentence from the DSS sentence fields only", () => {
    const [first, second, third] = parseFindingsPayload({
      issues: [
        { dss_sentence: "원문 문장", dss_statement: "다른 문장" },
        { dss_statement: "다른 문장" },
        { issue: "문장 없이 설명만 있음" },
      ],
    }).issues;

    expect(first?.sentence).toBe("원문 문장");
    expect(second?.sentence).toBe("다른 문장");
    expect(third?.sentence).toBe("");
    expect(third?.description).toBe("문장 없이 설명만 있음");
  });

  it("defaults unknown validation statuses to issue_found", () => {
    const [issue] = parseFindingsPayload({
      issues: [{ validation_status: "unexpected" }],
    }).issues;

    expect(issue?.validationStatus).toBe("issue_found");
  });

  it("counts every raw entry", () => {
    expect(
      countFindings(
        parseFindingsPayload({ corrections: [{}, {}], issues: [{}, 7, null] }),
      ),
    ).toBe(5);
  });
});
