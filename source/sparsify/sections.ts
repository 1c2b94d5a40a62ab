/**
 * Line-oriented extraction rules used to pull the relevant parts out of a
 * planning document. Every rule degrades to an empty extract when its
 * marker is absent.
 */

export interface HeadingRule {
  kind: "heading";
  /**
   * Heading text the line must start with, e.g. "### Current Position".
   * "## Decisions" matches "## Decisions" and "## Decisions (locked)" but
   * not "### Decisions Made".
   */
  marker: string;
  /** Cap on captured lines, heading line included. */
  maxLines: number;
}

export interface MatchRule {
  kind: "match";
  pattern: string;
  /** Trailing context lines captured after each matching line. */
  after: number;
  maxLines: number;
}

export interface LinesRule {
  kind: "lines";
  patterns: readonly string[];
  /** Only the first `scanLines` lines are searched. */
  scanLines: number;
}

export type SectionRule = HeadingRule | MatchRule | LinesRule;

const HEADING_LINE = /^#{1,6}\s/;

export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split("\n");
  // A trailing newline terminates the last line rather than opening a new one
  if (lines.at(-1) === "") {
    lines.pop();
  }
  return lines;
}

export function headLines(lines: readonly string[], count: number): string[] {
  return lines.slice(0, Math.max(0, count));
}

function isHeading(line: string, marker: string): boolean {
  if (!line.startsWith(marker)) {
    return false;
  }
  const next = line.charAt(marker.length);
  return next === "" || /\s/.test(next);
}

export function extractHeadingSection(
  lines: readonly string[],
  rule: HeadingRule,
): string[] {
  const start = lines.findIndex((line) => isHeading(line, rule.marker));
  if (start === -1) {
    return [];
  }

  const captured = [lines[start] ?? ""];
  for (let i = start + 1; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (HEADING_LINE.test(line)) {
      break;
    }
    captured.push(line);
  }

  return headLines(captured, rule.maxLines);
}

export function extractMatches(
  lines: readonly string[],
  rule: MatchRule,
): string[] {
  const included = new Set<number>();
  lines.forEach((line, index) => {
    if (!line.includes(rule.pattern)) {
      return;
    }
    const end = Math.min(lines.length - 1, index + rule.after);
    for (let i = index; i <= end; i++) {
      included.add(i);
    }
  });

  const ordered = Array.from(included).sort((a, b) => a - b);
  return headLines(
    ordered.map((i) => lines[i] ?? ""),
    rule.maxLines,
  );
}

export function extractLines(
  lines: readonly string[],
  rule: LinesRule,
): string[] {
  return headLines(lines, rule.scanLines).filter((line) =>
    rule.patterns.some((pattern) => line.includes(pattern)),
  );
}

export function extractSection(
  lines: readonly string[],
  rule: SectionRule,
): string[] {
  switch (rule.kind) {
    case "heading":
      return extractHeadingSection(lines, rule);
    case "match":
      return extractMatches(lines, rule);
    case "lines":
      return extractLines(lines, rule);
    default: {
      const unreachable: never = rule;
      throw new Error(`Unhandled section rule: ${JSON.stringify(unreachable)}`);
    }
  }
}
