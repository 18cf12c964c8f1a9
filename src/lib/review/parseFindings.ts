import { z } from "zod";
import type {
  CorrectionFinding,
  FindingsPayload,
  IssueFinding,
  ValidationStatus,
} from "@/types/reconciliation";

const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .catch("");

const optionalText = z
  .union([z.string(), z.number()])
  .transform((value) => {
    const normalized = String(value).trim();
    return normalized ? normalized : undefined;
  })
  .optional()
  .catch(undefined);

const validationStatus = z
  .enum(["issue_found", "passed", "error"])
  .catch("issue_found");

const record = z.record(z.unknown()).catch({});

const correctionSchema = z.object({
  metric: text,
  period: optionalText,
  company: optionalText,
  dss_current_value: text,
  correct_value: text,
  dss_context: text,
  correction: text,
  earning_call_context: text,
  type: optionalText,
});

const issueSchema = z.object({
  metric: text,
  period: optionalText,
  company: optionalText,
  dss_sentence: text,
  dss_statement: text,
  issue: text,
  issue_type: optionalText,
  severity: optionalText,
  recommendation: text,
  earning_call_context: text,
  type: optionalText,
  validation_status: validationStatus,
});

// Every field has a catch default, so parsing an object never fails.
const parseEntry = <T extends z.ZodTypeAny>(schema: T, entry: unknown): z.output<T> =>
  schema.parse(record.parse(entry));

export const toCorrectionFinding = (entry: unknown): CorrectionFinding => {
  const raw = parseEntry(correctionSchema, entry);

  return {
    kind: "correction",
    metric: raw.metric,
    period: raw.period,
    company: raw.company,
    originalValue: raw.dss_current_value,
    correctedValue: raw.correct_value,
    contextText: raw.dss_context,
    rationale: raw.correction,
    sourceContext: raw.earning_call_context,
    category: raw.type,
  };
};

export const toIssueFinding = (entry: unknown): IssueFinding => {
  const raw = parseEntry(issueSchema, entry);
  const status: ValidationStatus = raw.validation_status;

  return {
    kind: "issue",
    label: raw.metric,
    period: raw.period,
    company: raw.company,
    sentence: raw.dss_sentence || raw.dss_statement,
    description: raw.issue,
    subtype: raw.issue_type,
    severity: raw.severity,
    recommendation: raw.recommendation,
    sourceContext: raw.earning_call_context,
    category: raw.type,
    validationStatus: status,
  };
};

const pickList = (...candidates: unknown[]): unknown[] => {
  for (const candidate of candidates) {
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }

  return [];
};

/**
 * Reads the findings payload handed over by the model collaborator.
 *
 * Accepts `corrections` / `issues` at the top level, falling back to the older
 * `corrections_needed` and `interpretation_validation.interpretation_issues`
 * layout. Missing lists read as empty and malformed entries degrade field by
 * field, so the item count always equals the raw entry count.
 */
export const parseFindingsPayload = (input: unknown): FindingsPayload => {
  const root = record.parse(input);
  const nested = record.parse(root.interpretation_validation);

  const corrections = pickList(root.corrections, root.corrections_needed);
  const issues = pickList(
    root.issues,
    nested.interpretation_issues,
    root.interpretation_issues,
  );

  return {
    corrections: corrections.map(toCorrectionFinding),
    issues: issues.map(toIssueFinding),
  };
};

export const countFindings = (payload: FindingsPayload): number =>
  payload.corrections.length + payload.issues.length;
