import xml2js from "xml2js";
import { z } from "zod";
import type { Logger } from "pino";
import { ItemValidationError } from "../errors";
import type { NormalizedItem } from "./types";

/**
 * Turns an XML document into its xml2js object tree.
 */
export type ArxivParser = {
  readonly parseString: (xml: string) => Promise<unknown>;
};

/** One `<entry>` as xml2js builds it with `explicitArray`: every child is an array. */
export type ArxivEntry = Readonly<Record<string, unknown>>;

// an element with attributes comes back as { _: text, $: attrs }
const textSchema = z.union([z.string(), z.object({ _: z.string() }).passthrough()]);
const textListSchema = z.array(textSchema);
const authorsSchema = z.array(
  z.object({ name: z.array(z.string()).optional() }).passthrough(),
);
const termListSchema = z.array(
  z.object({ $: z.object({ term: z.string() }).passthrough() }).passthrough(),
);
const entrySchema = z.record(z.string(), z.unknown());
const documentSchema = z.object({
  // an empty <feed/> parses to ""
  feed: z.union([
    z.object({ entry: z.array(z.unknown()).optional() }).passthrough(),
    z.string(),
  ]),
});

const ABS_ID_PATTERN = /(?:https?:\/\/)?arxiv\.org\/abs\/(.+)$/i;
const VERSION_PATTERN = /v\d+$/i;

let parserInstance: ArxivParser | null = null;

export function createParser(): ArxivParser {
  const parser = new xml2js.Parser({ explicitArray: true });
  return {
    parseString: (xml) => parser.parseStringPromise(xml),
  };
}

export function getParserInstance(): ArxivParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: ArxivParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

export function compactWhitespace(text: string | undefined): string {
  return (text ?? "").split(/\s+/).filter(Boolean).join(" ");
}

function firstText(value: unknown): string | undefined {
  const parsed = textListSchema.safeParse(value);
  if (!parsed.success) return undefined;
  const first = parsed.data[0];
  if (first === undefined) return undefined;
  return typeof first === "string" ? first : first._;
}

/**
 * Reduces an Atom entry id (`http://arxiv.org/abs/2401.01234v2`) to the bare
 * arXiv id, adding `v1` when the feed left the version out.
 */
export function extractArxivId(rawId: string | undefined): string {
  const trimmed = (rawId ?? "").trim();
  if (!trimmed) return "";

  const match = ABS_ID_PATTERN.exec(trimmed);
  const id = match?.[1]?.replace(/^\/+/, "") ?? trimmed;
  return VERSION_PATTERN.test(id) ? id : `${id}v1`;
}

function extractAuthors(value: unknown): Array<string> {
  const parsed = authorsSchema.safeParse(value);
  if (!parsed.success) return [];
  return parsed.data
    .map((author) => compactWhitespace(author.name?.[0]))
    .filter((name) => name.length > 0);
}

function firstTerm(value: unknown): string | undefined {
  const parsed = termListSchema.safeParse(value);
  return parsed.success ? parsed.data[0]?.$.term : undefined;
}

/**
 * Maps one Atom entry to a NormalizedItem.
 *
 * Only `<published>` counts as the publication time; `<updated>` is ignored.
 * The primary category wins over the first `<category>` tag.
 *
 * @throws ItemValidationError when the entry has no id or no parsable publication time
 */
export function normalizeEntry(entry: ArxivEntry): NormalizedItem {
  const rawId = (firstText(entry["id"]) ?? "").trim();
  const id = extractArxivId(rawId);
  if (!id) {
    throw new ItemValidationError(rawId, "missing id");
  }

  const rawPublished = firstText(entry["published"])?.trim();
  if (!rawPublished) {
    throw new ItemValidationError(rawId, "missing publication time");
  }
  const publishedAt = new Date(rawPublished);
  if (Number.isNaN(publishedAt.getTime())) {
    throw new ItemValidationError(rawId, `invalid publication time '${rawPublished}'`);
  }

  return {
    id,
    title: compactWhitespace(firstText(entry["title"])),
    summary: compactWhitespace(firstText(entry["summary"])),
    authors: extractAuthors(entry["author"]),
    category:
      firstTerm(entry["arxiv:primary_category"]) || firstTerm(entry["category"]) || "unknown",
    publishedAt,
    url: `https://arxiv.org/abs/${id}`,
  };
}

/**
 * Parses an arXiv Atom document. Unusable entries are logged and skipped;
 * a document that cannot be parsed at all rejects.
 */
export async function parseArxivFeed(
  xml: string,
  logger: Logger,
): Promise<Array<NormalizedItem>> {
  const tree = await getParserInstance().parseString(xml);
  const document = documentSchema.safeParse(tree);
  if (!document.success) {
    throw new Error("response is not an Atom feed");
  }

  const feed = document.data.feed;
  const entries = typeof feed === "string" ? [] : (feed.entry ?? []);
  const items: Array<NormalizedItem> = [];

  for (const raw of entries) {
    try {
      const entry = entrySchema.safeParse(raw);
      if (!entry.success) {
        throw new ItemValidationError("", "entry has no child elements");
      }
      items.push(normalizeEntry(entry.data));
    } catch (err) {
      if (!(err instanceof ItemValidationError)) throw err;
      logger.debug({ rawId: err.rawId, error: err.message }, "feed entry dropped");
    }
  }

  return items;
}
