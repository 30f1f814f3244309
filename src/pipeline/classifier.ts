// pattern: Functional Core

const EDUCATIONAL_PATTERNS: ReadonlyArray<string> = [
  "\\bsurveys?\\b",
  "\\btutorials?\\b",
  "\\breviews?\\b",
  "\\bprimer\\b",
  "\\bintroduction\\b",
  "\\bintroductory\\b",
  "\\blecture\\s*notes?\\b",
  "\\bnotes?\\b",
  "\\bpedagogical\\b",
  "\\boverviews?\\b",
  "\\ba\\s+guide\\b",
  "\\bbeginners?\\b",
  "\\bfor\\s+beginners?\\b",
  "\\bfundamentals?\\b",
  "\\bfoundations?\\b",
  "\\bfrom\\s+scratch\\b",
  "\\bstep\\s*by\\s*step\\b",
  "\\bhow\\s+to\\b",
  "\\bexplainer\\b",
  "\\broadmap\\b",
];

const EDUCATIONAL_REGEX = new RegExp(EDUCATIONAL_PATTERNS.join("|"), "i");

/**
 * Lower-cases, folds `-`, `_` and `/` to spaces and collapses whitespace, so
 * "How-To" and "step_by_step" match the same patterns as their spaced forms.
 */
export function normalizeForClassification(title: string, summary: string): string {
  return `${title}\n${summary}`
    .toLowerCase()
    .replace(/[-_/]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function isEducational(title: string, summary: string): boolean {
  return EDUCATIONAL_REGEX.test(normalizeForClassification(title, summary));
}
