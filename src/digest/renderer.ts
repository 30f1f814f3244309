// pattern: Functional Core
import type { Logger } from "pino";
import type { Candidate, TopicResult } from "../pipeline/types";

export type DigestRenderInput = Readonly<{
  now: Date;
  timeZone: string;
  cutoff: Date;
  recentWindowDays: number;
  headerTemplate: string;
  titleMaxLength: number;
  topicResults: ReadonlyArray<TopicResult>;
}>;

const EDUCATIONAL_MARK = "✔︎";

export function truncateText(text: string, maxLength: number): string {
  if (maxLength <= 3) return text.slice(0, maxLength);
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3).trimEnd()}...`;
}

export function toUtcIso(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function formatAuthor(authors: ReadonlyArray<string>): string {
  const first = authors[0];
  if (first === undefined) return "Unknown";
  return authors.length > 1 ? `${first} et al.` : first;
}

export function formatEntryLine(entry: Candidate, titleMaxLength: number): string {
  const mark = entry.educational ? `${EDUCATIONAL_MARK} ` : "";
  const title = truncateText(entry.title || "(untitled)", titleMaxLength);
  return `- ${mark}${title} - ${formatAuthor(entry.authors)} - ${entry.category} - ${entry.url}`;
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Returns `timeZone` when the runtime knows it, otherwise logs and falls back to UTC.
 */
export function resolveTimeZone(timeZone: string, logger: Logger): string {
  if (isValidTimeZone(timeZone)) return timeZone;
  logger.warn({ timeZone }, "invalid report timezone, falling back to UTC");
  return "UTC";
}

/**
 * Formats `date` in `timeZone` as `YYYY-MM-DD` and `YYYY-MM-DD HH:mm <zone>`.
 */
export function formatInTimeZone(
  date: Date,
  timeZone: string,
): { readonly date: string; readonly datetime: string } {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
    timeZoneName: "short",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  const day = `${part("year")}-${part("month")}-${part("day")}`;
  return {
    date: day,
    datetime: `${day} ${part("hour")}:${part("minute")} ${part("timeZoneName")}`,
  };
}

function renderSection(
  lines: Array<string>,
  heading: string,
  entries: ReadonlyArray<Candidate>,
  emptyLine: string,
  titleMaxLength: number,
): void {
  lines.push(heading);
  if (entries.length === 0) {
    lines.push(emptyLine);
    return;
  }
  for (const entry of entries) {
    lines.push(formatEntryLine(entry, titleMaxLength));
  }
}

/**
 * Renders the digest as ordered text blocks: one header block, then one
 * block per topic. Blocks are later packed into transport-sized messages.
 */
export function renderDigestBlocks(input: DigestRenderInput): Array<string> {
  const local = formatInTimeZone(input.now, input.timeZone);
  const header = input.headerTemplate
    .replaceAll("{datetime}", local.datetime)
    .replaceAll("{date}", local.date);

  const counts = input.topicResults
    .map(
      (result) =>
        `${result.name} (recent ${result.recent.length}, educational ${result.educational.length})`,
    )
    .join(", ");

  const blocks = [
    [
      header,
      `Time: ${local.datetime}`,
      `Cutoff (UTC): ${toUtcIso(input.cutoff)}`,
      `Counts: ${counts}`,
    ].join("\n"),
  ];

  for (const result of input.topicResults) {
    const lines = [
      `[${result.name}] recent ${result.recent.length} / educational${EDUCATIONAL_MARK} ${result.educational.length}`,
    ];
    renderSection(
      lines,
      `Recent (within ${input.recentWindowDays} days, submittedDate desc):`,
      result.recent,
      "- (no recent papers)",
      input.titleMaxLength,
    );
    renderSection(
      lines,
      `Educational / Beginner-friendly ${EDUCATIONAL_MARK}:`,
      result.educational,
      "- (no educational papers)",
      input.titleMaxLength,
    );
    blocks.push(lines.join("\n"));
  }

  return blocks;
}
