// pattern: Functional Core

const SEPARATOR = "\n\n";

function lastWhitespaceAtOrBefore(text: string, position: number): number {
  for (let i = Math.min(position, text.length - 1); i >= 0; i--) {
    if (/\s/.test(text.charAt(i))) return i;
  }
  return -1;
}

/**
 * Splits one line into chunks of at most `maxLength` characters, breaking at
 * the last whitespace that keeps the chunk within bound, or hard-cutting at
 * `maxLength` when a single word is longer than that.
 */
export function splitLongLine(line: string, maxLength: number): Array<string> {
  if (line.length <= maxLength) return [line];

  const chunks: Array<string> = [];
  let remaining = line;

  while (remaining.length > maxLength) {
    let splitAt = lastWhitespaceAtOrBefore(remaining, maxLength);
    if (splitAt <= 0) splitAt = maxLength;

    let chunk = remaining.slice(0, splitAt).trimEnd();
    if (!chunk) {
      chunk = remaining.slice(0, maxLength);
      splitAt = maxLength;
    }

    chunks.push(chunk);
    remaining = remaining.slice(splitAt).trimStart();
  }

  if (remaining) chunks.push(remaining);
  return chunks;
}

function toPieces(block: string, maxLength: number): Array<string> {
  if (block.length <= maxLength) return [block];

  return block
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .flatMap((line) => splitLongLine(line, maxLength));
}

/**
 * Greedily packs text blocks into messages of at most `maxLength` characters.
 *
 * Blocks keep their order and are joined with a blank line while they fit.
 * Only a block longer than `maxLength` is broken up, first by line, then by
 * word, then by raw character count.
 */
export function packMessages(
  blocks: Iterable<string>,
  maxLength: number,
): Array<string> {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }

  const messages: Array<string> = [];
  let current = "";

  for (const block of blocks) {
    const clean = block.trim();
    if (!clean) continue;

    for (const piece of toPieces(clean, maxLength)) {
      if (!current) {
        current = piece;
        continue;
      }

      const joined = `${current}${SEPARATOR}${piece}`;
      if (joined.length <= maxLength) {
        current = joined;
      } else {
        messages.push(current);
        current = piece;
      }
    }
  }

  if (current) messages.push(current);
  return messages;
}
