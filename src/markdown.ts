const TABLE_SEPARATOR = /^\s*\|[\s\-:|]+\|\s*$/;

/** Strips markdown formatting from page text extracted by the neural provider. */
export function cleanMarkdown(text: string | undefined | null): string {
  if (!text) return "";

  let out = text
    .replace(/!\[([^\]]*)\]\([^)]+\)/g, "$1")
    .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1")
    .replace(/^#{1,6}\s*/gm, "")
    .replace(/\*\*([^*]+)\*\*/g, "$1")
    .replace(/__([^_]+)__/g, "$1")
    .replace(/\*([^*]+)\*/g, "$1")
    .replace(/(?<!\w)_([^_]+)_(?!\w)/g, "$1")
    .replace(/`([^`]+)`/g, "$1");

  const lines: string[] = [];
  for (const line of out.split("\n")) {
    if (TABLE_SEPARATOR.test(line)) continue;
    if (line.includes("|") && line.trim().startsWith("|")) {
      const cells = line
        .split("|")
        .map((cell) => cell.trim())
        .filter(Boolean);
      if (cells.length) lines.push(cells.join(" - "));
      continue;
    }
    lines.push(line);
  }

  out = lines
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/[ \t]+/g, " ");

  return out.trim();
}

/**
 * Removes inline citations such as `([Source](https://...))` and markdown
 * formatting from a generated answer. Citation URLs are returned separately
 * by the provider.
 */
export function cleanAnswer(answer: string | undefined | null): string {
  if (!answer) return "";

  return (
    answer
      // grouped citations: ([a](u1), [b](u2))
      .replace(/\s*\([^()]*\[[^\]]*\]\([^)]+\)[^()]*\)/g, "")
      .replace(/\s*\[[^\]]*\]\([^)]+\)/g, "")
      // leftovers
      .replace(/\s*,\s*\)/g, ")")
      .replace(/\(\s*,?\s*\)/g, "")
      .replace(/\s+\)/g, ")")
      .replace(/([.!?])\s*\)/g, "$1")
      .replace(/\)\s*([.!?])/g, "$1")
      .replace(/\*\*([^*]+)\*\*/g, "$1")
      .replace(/\*([^*]+)\*/g, "$1")
      .replace(/^[\s]*\*\s+/gm, "")
      .replace(/#{1,6}\s*/g, "")
      .replace(/`([^`]+)`/g, "$1")
      .replace(/\s+([.,!?])/g, "$1")
      .replace(/\s{2,}/g, " ")
      .replace(/\n{2,}/g, "\n\n")
      .trim()
  );
}
