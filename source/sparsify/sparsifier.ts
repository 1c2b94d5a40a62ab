import type { Strategy } from "../profiles/registry.ts";
import {
  extractSection,
  headLines,
  type SectionRule,
  splitLines,
} from "./sections.ts";

export type ComponentShape = "plan" | "document";

export interface SectionSpec {
  /** Plans keep their title and action lines under the minimal strategy. */
  shape: ComponentShape;
  includeFrontmatter: boolean;
  sections: readonly SectionRule[];
}

export interface SparsifyOptions {
  frontmatterLines: number;
  maxSections: number;
}

export const defaultSparsifyOptions: SparsifyOptions = {
  frontmatterLines: 30,
  maxSections: 3,
};

export interface SparsificationResult {
  extractedText: string;
  charCount: number;
}

const PLAN_SUMMARY_PATTERNS: readonly RegExp[] = [
  /^#\s/,
  /^\s*(title|name):/,
  /<(name|action)>/,
];

function result(extractedText: string): SparsificationResult {
  return { extractedText, charCount: extractedText.length };
}

function joinParts(parts: readonly string[][]): string {
  return parts
    .filter((part) => part.length > 0)
    .map((part) => part.join("\n"))
    .join("\n");
}

function planSummary(lines: readonly string[]): string[] {
  return lines.filter((line) =>
    PLAN_SUMMARY_PATTERNS.some((pattern) => pattern.test(line)),
  );
}

function namedSections(
  lines: readonly string[],
  spec: SectionSpec,
  options: SparsifyOptions,
): string[][] {
  return spec.sections
    .slice(0, options.maxSections)
    .map((rule) => extractSection(lines, rule));
}

/**
 * Strategies only ever shrink a document: for any spec the aggressive
 * extract is no longer than the balanced one.
 */
export function applyStrategy(
  strategy: Strategy,
  rawContent: string,
  spec: SectionSpec,
  options: SparsifyOptions = defaultSparsifyOptions,
): SparsificationResult {
  if (strategy === "full") {
    return result(rawContent);
  }

  const lines = splitLines(rawContent);

  switch (strategy) {
    case "sparse_balanced": {
      const frontmatter = spec.includeFrontmatter
        ? headLines(lines, options.frontmatterLines)
        : [];
      return result(
        joinParts([frontmatter, ...namedSections(lines, spec, options)]),
      );
    }
    case "sparse_aggressive":
      // Components without frontmatter are already reduced to their sections
      return spec.includeFrontmatter
        ? result(joinParts([headLines(lines, options.frontmatterLines)]))
        : result(joinParts(namedSections(lines, spec, options)));
    case "minimal":
      return spec.shape === "plan"
        ? result(joinParts([planSummary(lines)]))
        : result("");
    default: {
      const unreachable: never = strategy;
      throw new Error(`Unhandled strategy: ${String(unreachable)}`);
    }
  }
}
