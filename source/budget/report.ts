import {
  budgetTokens,
  type Profile,
  type Strategy,
} from "../profiles/registry.ts";
import type { Role } from "./components.ts";
import type { ValidatedBudget } from "./validator.ts";

export type LineTone = "plain" | "heading" | "success" | "failure" | "warning";

export interface ReportLine {
  text: string;
  tone: LineTone;
}

const strategyDescriptions: Record<Strategy, string> = {
  full: "full content",
  sparse_balanced: "frontmatter + sections",
  sparse_aggressive: "frontmatter only",
  minimal: "titles only",
};

const roleTitles: Record<Role, string> = {
  executor: "Executor Delegation",
  planner: "Planner Delegation",
};

const line = (text: string, tone: LineTone = "plain"): ReportLine => ({
  text,
  tone,
});

export function formatProfileHeader(profile: Profile): ReportLine[] {
  return [
    line("=== Context Budget Calculator ===", "heading"),
    line(`Model Profile: ${profile.name}`),
    line(`Context Capacity: ${profile.capacityTokens} tokens`),
    line(
      `Target Budget: ${budgetTokens(profile)} tokens (${profile.targetPercent}%)`,
    ),
  ];
}

/**
 * Remediation categories for an over-budget delegation. Nothing here
 * rewrites the plan.
 */
export function remediationHints(result: ValidatedBudget): string[] {
  if (result.withinBudget) {
    return [];
  }
  const hints: string[] = [];
  if (result.profile.strategy !== "minimal") {
    hints.push(
      `Switch to a more aggressive sparsification strategy (current: ${result.profile.strategy})`,
    );
  }
  hints.push("Split the task into smaller plans");
  return hints;
}

export function formatBudgetReport(result: ValidatedBudget): ReportLine[] {
  const lines: ReportLine[] = [
    line(
      `=== ${roleTitles[result.role]} (${strategyDescriptions[result.profile.strategy]}) ===`,
      "heading",
    ),
  ];

  for (const component of result.components) {
    const note = component.found ? "" : " (not found)";
    lines.push(line(`${component.label}${note}: ${component.tokens} tokens`));
  }

  for (const error of result.diagnostics) {
    lines.push(line(`⚠ ${error.message}`, "warning"));
  }

  lines.push(line("---"));
  lines.push(
    line(
      `Total: ${result.totalTokens} tokens (${result.percentOfBudget}% of target)`,
    ),
  );

  if (result.withinBudget) {
    lines.push(
      line(
        `✅ Within budget (~${result.headroomOrOverageTokens} tokens remaining)`,
        "success",
      ),
    );
  } else {
    lines.push(
      line(
        `❌ EXCEEDS BUDGET by ~${-result.headroomOrOverageTokens} tokens`,
        "failure",
      ),
    );
    for (const hint of remediationHints(result)) {
      lines.push(line(`  - ${hint}`, "warning"));
    }
  }

  return lines;
}

export function formatSummary(profile: Profile): ReportLine[] {
  return [
    line("=== Summary ===", "heading"),
    line(
      `Model Profile: ${profile.name} (capacity: ${profile.capacityTokens} tokens)`,
    ),
    line(
      `Budget Target: ${budgetTokens(profile)} tokens (${profile.targetPercent}%)`,
    ),
  ];
}
