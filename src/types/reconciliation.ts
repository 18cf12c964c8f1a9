export type SectionName = "results" | "guidance" | "qa";

export const SECTION_ORDER: readonly SectionName[] = ["results", "guidance", "qa"];

export const SECTION_HEADERS: Record<SectionName, string> = {
  results: "실적 발표",
  guidance: "가이던스",
  qa: "Q&A",
};

export const DEFAULT_SECTION: SectionName = "results";

export const UNRECOGNIZED_SECTION: SectionName = "qa";

export type FindingKind = "correction" | "issue";

export type ValidationStatus = "issue_found" | "passed" | "error";

export type CorrectionFinding = {
  kind: "correction";
  metric: string;
  period?: string;
  company?: string;
  originalValue: string;
  correctedValue: string;
  contextText: string;
  rationale: string;
  sourceContext: string;
  category?: string;
};

export type IssueFinding = {
  kind: "issue";
  label: string;
  period?: string;
  company?: string;
  sentence: string;
  description: string;
  subtype?: string;
  severity?: string;
  recommendation: string;
  sourceContext: string;
  category?: string;
  validationStatus: ValidationStatus;
};

export type Finding = CorrectionFinding | IssueFinding;

export type FindingsPayload = {
  corrections: CorrectionFinding[];
  issues: IssueFinding[];
};

export type DecisionStatus = "pending" | "accepted" | "rejected" | "manual";

export const DECISION_STATUSES: readonly DecisionStatus[] = [
  "pending",
  "accepted",
  "rejected",
  "manual",
];

export type ReviewDecision = {
  status: DecisionStatus;
  editedText?: string;
};

export type ItemTag = "mismatch" | "match" | "error" | "numeric" | "contextual";

export type ReviewItem = {
  id: string;
  kind: FindingKind;
  finding: Finding;
  section: SectionName;
  tag: ItemTag;
  status: DecisionStatus;
  editedText?: string;
};

export type SectionItems = {
  correctionItems: ReviewItem[];
  issueItems: ReviewItem[];
  allItems: ReviewItem[];
};

export type OrganizedSections = Record<SectionName, SectionItems>;

export type ProgressSummary = {
  accepted: number;
  rejected: number;
  manual: number;
  pending: number;
  total: number;
  percentComplete: number;
};

export type DiffToken = {
  value: string;
  kind: "equal" | "added" | "removed";
};

export type DraftSentence = {
  itemId: string;
  kind: FindingKind;
  status: Exclude<DecisionStatus, "pending">;
  label: string;
  text: string;
  original: string;
  redline: DiffToken[];
};

export type AssembledDraft = {
  sections: Record<SectionName, DraftSentence[]>;
  renderedDocument: string;
  changedCount: number;
};

export type ReportHeader = {
  company: string | null;
  period: string | null;
};

export type Faithfulness = "good" | "fair" | "poor";

export type FaithfulnessAssessment = {
  accuracyScore: number;
  faithfulness: Faithfulness;
  majorIssuesCount: number;
  actionableIssues: number;
};

export type ReviewSnapshot = {
  runId: number;
  header: ReportHeader;
  sections: OrganizedSections;
  progress: ProgressSummary;
  assessment: FaithfulnessAssessment;
  decisions: Record<string, ReviewDecision>;
};
