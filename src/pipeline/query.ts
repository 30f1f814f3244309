// pattern: Functional Core
import { ConfigurationError } from "../errors";
import type { TopicConfig } from "../config";

const FIELD_PREFIXES = ["all:", "ti:", "abs:", "cat:", "au:", "jr:", "rn:", "id:"];

/**
 * Wraps a free-text term as an `all:"..."` phrase. Terms already scoped to an
 * arXiv field (`ti:`, `cat:`, ...) pass through untouched.
 */
export function quoteTerm(term: string): string {
  const trimmed = term.trim();
  if (!trimmed) return "";

  const lowered = trimmed.toLowerCase();
  if (FIELD_PREFIXES.some((prefix) => lowered.startsWith(prefix))) {
    return trimmed;
  }

  return `all:"${trimmed.replace(/"/g, '\\"')}"`;
}

/**
 * Builds the arXiv `search_query` for a topic: `(terms OR ...) AND (cat:... OR ...)`.
 *
 * @throws ConfigurationError when the topic has neither terms nor categories
 */
export function buildSearchQuery(topic: TopicConfig): string {
  const termParts = topic.queryTerms
    .map((term) => quoteTerm(term))
    .filter((part) => part.length > 0);
  const categoryParts = topic.categories
    .map((category) => category.trim())
    .filter((category) => category.length > 0)
    .map((category) => `cat:${category}`);

  const groups: Array<string> = [];
  if (termParts.length > 0) groups.push(`(${termParts.join(" OR ")})`);
  if (categoryParts.length > 0) groups.push(`(${categoryParts.join(" OR ")})`);

  if (groups.length === 0) {
    throw new ConfigurationError(
      `topic '${topic.name}' has no queryTerms or categories`,
    );
  }

  return groups.join(" AND ");
}
