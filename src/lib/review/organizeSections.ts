import type { ReviewStateStore } from "@/lib/review/reviewStateStore";
import {
  SECTION_ORDER,
  type OrganizedSections,
  type ProgressSummary,
  type ReviewItem,
  type SectionItems,
} from "@/types/reconciliation";

const emptySection = (): SectionItems => ({
  correctionItems: [],
  issueItems: [],
  allItems: [],
});

const withLiveDecision = (item: ReviewItem, store?: ReviewStateStore): ReviewItem => {
  if (!store) {
    return { ...item };
  }

  const { status, editedText } = store.getDecision(item.id);
  return { ...item, status, editedText };
};

export const organize = (
  items: ReviewItem[],
  store?: ReviewStateStore,
): OrganizedSections => {
  const sections: OrganizedSections = {
    results: emptySection(),
    guidance: emptySection(),
    qa: emptySection(),
  };

  for (const item of items) {
    const live = withLiveDecision(item, store);
    const bucket = sections[live.section];
    if (live.kind === "correction") {
      bucket.correctionItems.push(live);
    } else {
      bucket.issueItems.push(live);
    }
  }

  for (const section of SECTION_ORDER) {
    const bucket = sections[section];
    bucket.allItems = [...bucket.correctionItems, ...bucket.issueItems];
  }

  return sections;
};

export const flattenSections = (sections: OrganizedSections): ReviewItem[] =>
  SECTION_ORDER.flatMap((section) => sections[section].allItems);

export const summarizeProgress = (sections: OrganizedSections): ProgressSummary => {
  const summary: ProgressSummary = {
    accepted: 0,
    rejected: 0,
    manual: 0,
    pending: 0,
    total: 0,
    percentComplete: 0,
  };

  for (const item of flattenSections(sections)) {
    summary.total += 1;
    summary[item.status] += 1;
  }

  const decided = summary.accepted + summary.rejected + summary.manual;
  summary.percentComplete =
    summary.total > 0 ? Math.round((decided / summary.total) * 100) : 0;

  return summary;
};
