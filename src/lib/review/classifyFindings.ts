import type { ReviewStateStore } from "@/lib/review/reviewStateStore";
import {
  DEFAULT_SECTION,
  SECTION_ORDER,
  UNRECOGNIZED_SECTION,
  type FaithfulnessAssessment,
  type Finding,
  type FindingsPayload,
  type IssueFinding,
  type ItemTag,
  type ReportHeader,
  type ReviewItem,
  type SectionName,
} from "@/types/reconciliation";

const SECTION_ALIASES: Record<SectionName, readonly string[]> = {
  results: ["실적", "실적발표", "실적 발표", "results", "earnings"],
  guidance: ["가이던스", "목표", "guidance", "outlook"],
  qa: ["q&a", "qa", "질의응답"],
};

const MATCH_LABEL = "일치함";
const NUMERIC_SUBTYPES = new Set(["수치오류", "수치"]);
const SUMMARY_LIMIT = 80;

// Blank categories land in results; any other label outside the aliases is
// treated as a Q&A item.
export const resolveSection = (category: string | undefined): SectionName => {
  const normalized = category?.trim().toLowerCase();
  if (!normalized) {
    return DEFAULT_SECTION;
  }

  return (
    SECTION_ORDER.find((section) => SECTION_ALIASES[section].includes(normalized)) ??
    UNRECOGNIZED_SECTION
  );
};

export const isPassedIssue = (finding: IssueFinding): boolean =>
  finding.validationStatus === "passed" || finding.label === MATCH_LABEL;

export const tagFinding = (finding: Finding): ItemTag => {
  switch (finding.kind) {
    case "correction":
      return "mismatch";
    case "issue":
      if (isPassedIssue(finding)) {
        return "match";
      }
      if (finding.validationStatus === "error") {
        return "error";
      }
      if (
        (finding.subtype && NUMERIC_SUBTYPES.has(finding.subtype)) ||
        finding.label.includes("수치")
      ) {
        return "numeric";
      }
      return "contextual";
  }
};

export const itemId = (kind: Finding["kind"], ordinal: number): string => `${kind}-${ordinal}`;

const toReviewItem = (
  finding: Finding,
  ordinal: number,
  store: ReviewStateStore,
): ReviewItem => {
  const id = itemId(finding.kind, ordinal);
  const decision = store.getDecision(id);

  return {
    id,
    kind: finding.kind,
    finding,
    section: resolveSection(finding.category),
    tag: tagFinding(finding),
    status: decision.status,
    editedText: decision.editedText,
  };
};

export const classify = (payload: FindingsPayload, store: ReviewStateStore): ReviewItem[] => [
  ...payload.corrections.map((finding, ordinal) => toReviewItem(finding, ordinal, store)),
  ...payload.issues.map((finding, ordinal) => toReviewItem(finding, ordinal, store)),
];

export const itemLabel = (item: ReviewItem): string => {
  const { finding } = item;
  if (finding.kind === "correction") {
    return finding.metric || "N/A";
  }
  return finding.label || "문맥 이슈";
};

export const summarizeItem = (item: ReviewItem): string => {
  const { finding } = item;
  if (finding.kind === "correction") {
    return `${finding.originalValue} → ${finding.correctedValue}`;
  }

  if (item.tag === "match") {
    return "문제 없음";
  }

  return finding.description.length > SUMMARY_LIMIT
    ? `${finding.description.slice(0, SUMMARY_LIMIT)}...`
    : finding.description;
};

export type RecommendationState =
  | "passed"
  | "uncertain"
  | "review_needed"
  | "has_recommendation";

export const assessRecommendation = (finding: IssueFinding): RecommendationState => {
  if (isPassedIssue(finding)) {
    return "passed";
  }

  const recommendation = finding.recommendation.trim().toLowerCase();
  if (!recommendation || recommendation.includes("n/a")) {
    return "uncertain";
  }

  if (recommendation.includes("검토") || recommendation.includes("확인")) {
    return "review_needed";
  }

  return "has_recommendation";
};

const usableCompany = (value: string | undefined): string | null =>
  value && value !== "N/A" ? value : null;

export const deriveReportHeader = (payload: FindingsPayload): ReportHeader => {
  const [firstCorrection] = payload.corrections;
  const [firstIssue] = payload.issues;

  return {
    company:
      usableCompany(firstCorrection?.company) ?? usableCompany(firstIssue?.company) ?? null,
    period: firstCorrection?.period ?? firstIssue?.period ?? null,
  };
};

export const assessFaithfulness = (items: ReviewItem[]): FaithfulnessAssessment => {
  let critical = 0;
  let high = 0;
  let actionable = 0;

  for (const { finding, tag } of items) {
    if (finding.kind !== "issue" || tag === "match" || tag === "error") {
      continue;
    }

    actionable += 1;
    const severity = finding.severity?.toLowerCase();
    if (severity === "critical") {
      critical += 1;
    } else if (severity === "high") {
      high += 1;
    }
  }

  const other = actionable - critical - high;
  const faithfulness =
    critical > 0 || high > 3 ? "poor" : high > 0 ? "fair" : "good";

  return {
    accuracyScore: Math.max(0, 100 - (critical * 20 + high * 10 + other * 3)),
    faithfulness,
    majorIssuesCount: critical + high,
    actionableIssues: actionable,
  };
};
