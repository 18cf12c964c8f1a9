import type { CorrectionFinding, DiffToken } from "@/types/reconciliation";

export type MatchSpan = {
  start: number;
  end: number;
};

export type MatchStrategyName = "exact" | "tolerant" | "numeric";

export type MatchStrategy = {
  name: MatchStrategyName;
  locate: (text: string, value: string) => MatchSpan | null;
  replacementFor: (newValue: string) => string;
};

export type SubstitutionResult = {
  result: string;
  applied: boolean;
  strategy: MatchStrategyName | null;
};

export type HighlightResult = {
  tokens: DiffToken[];
  highlighted: boolean;
};

export type CorrectionPreview = {
  before: HighlightResult;
  after: HighlightResult;
  substitution: SubstitutionResult;
};

const NUMERIC_TOKEN_REGEX = /\d[\d,]*(?:\.\d+)?/;

export const escapeRegex = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const stripWhitespace = (value: string): string => value.replace(/\s/g, "");

export const extractNumericToken = (value: string): string | null =>
  value.match(NUMERIC_TOKEN_REGEX)?.[0] ?? null;

// Digits stay literal, commas become optional, whitespace in the value matches
// any (or no) whitespace in the text.
export const buildTolerantPattern = (value: string): RegExp => {
  const source = Array.from(value)
    .map((char) => {
      if (/\d/.test(char)) {
        return char;
      }

      if (char === ",") {
        return ",?\\s*";
      }

      if (/\s/.test(char)) {
        return "\\s*";
      }

      return `\\s*${escapeRegex(char)}`;
    })
    .join("");

  return new RegExp(source);
};

const locateExact = (text: string, value: string): MatchSpan | null => {
  if (!value) {
    return null;
  }

  const start = text.indexOf(value);
  return start === -1 ? null : { start, end: start + value.length };
};

const locateTolerant = (text: string, value: string): MatchSpan | null => {
  const normalizedValue = stripWhitespace(value);
  if (!normalizedValue || !stripWhitespace(text).includes(normalizedValue)) {
    return null;
  }

  const match = buildTolerantPattern(value).exec(text);
  if (!match || match[0].length === 0) {
    return null;
  }

  return { start: match.index, end: match.index + match[0].length };
};

const locateNumericToken = (text: string, value: string): MatchSpan | null => {
  const token = extractNumericToken(value);
  return token ? locateExact(text, token) : null;
};

export const MATCH_STRATEGIES: readonly MatchStrategy[] = [
  {
    name: "exact",
    locate: locateExact,
    replacementFor: (newValue) => newValue,
  },
  {
    name: "tolerant",
    locate: locateTolerant,
    replacementFor: (newValue) => newValue,
  },
  {
    name: "numeric",
    locate: locateNumericToken,
    replacementFor: (newValue) => extractNumericToken(newValue) ?? newValue,
  },
];

const spliceSpan = (text: string, span: MatchSpan, replacement: string): string =>
  `${text.slice(0, span.start)}${replacement}${text.slice(span.end)}`;

export const attemptSubstitution = (
  context: string,
  oldValue: string,
  newValue: string,
  strategies: readonly MatchStrategy[] = MATCH_STRATEGIES,
): SubstitutionResult => {
  if (!oldValue) {
    return { result: context, applied: false, strategy: null };
  }

  for (const strategy of strategies) {
    const span = strategy.locate(context, oldValue);
    if (!span) {
      continue;
    }

    return {
      result: spliceSpan(context, span, strategy.replacementFor(newValue)),
      applied: true,
      strategy: strategy.name,
    };
  }

  return { result: context, applied: false, strategy: null };
};

export const highlightValue = (
  text: string,
  value: string,
  kind: "added" | "removed",
): HighlightResult => {
  for (const strategy of MATCH_STRATEGIES) {
    const span = strategy.locate(text, value);
    if (!span) {
      continue;
    }

    const tokens: DiffToken[] = [
      { value: text.slice(0, span.start), kind: "equal" },
      { value: text.slice(span.start, span.end), kind },
      { value: text.slice(span.end), kind: "equal" },
    ];

    return {
      tokens: tokens.filter((token) => token.value.length > 0),
      highlighted: true,
    };
  }

  return {
    tokens: text ? [{ value: text, kind: "equal" }] : [],
    highlighted: false,
  };
};

export const buildCorrectionPreview = (
  finding: CorrectionFinding,
): CorrectionPreview => {
  const substitution = attemptSubstitution(
    finding.contextText,
    finding.originalValue,
    finding.correctedValue,
  );

  return {
    before: highlightValue(finding.contextText, finding.originalValue, "removed"),
    after: substitution.applied
      ? highlightValue(substitution.result, finding.correctedValue, "added")
      : highlightValue(substitution.result, "", "added"),
    substitution,
  };
};
