import fs from "node:fs/promises";
import { IOReadError } from "../errors.ts";
import { logger } from "../logger.ts";
import { budgetTokens, type Profile } from "../profiles/registry.ts";
import {
  applyStrategy,
  defaultSparsifyOptions,
  type SparsifyOptions,
} from "../sparsify/sparsifier.ts";
import { CHARS_PER_TOKEN, estimateTokens } from "../tokens/estimator.ts";
import {
  type Component,
  type ComponentKey,
  expectedKeys,
  type Role,
} from "./components.ts";

export interface CalculateOptions {
  charsPerToken?: number;
  sparsify?: SparsifyOptions;
}

export interface ComponentEstimate {
  key: ComponentKey;
  label: string;
  sourcePath: string | undefined;
  /** False when the document does not exist or could not be read. */
  found: boolean;
  charCount: number;
  tokens: number;
}

export interface BudgetEstimate {
  role: Role;
  profile: Profile;
  components: ComponentEstimate[];
  perComponentTokens: Partial<Record<ComponentKey, number>>;
  totalTokens: number;
  budgetTokens: number;
  diagnostics: IOReadError[];
}

type ReadOutcome =
  | { status: "found"; content: string }
  | { status: "missing" }
  | { status: "failed"; error: IOReadError };

async function readComponent(
  sourcePath: string | undefined,
): Promise<ReadOutcome> {
  if (!sourcePath) {
    return { status: "missing" };
  }
  try {
    const content = await fs.readFile(sourcePath, "utf8");
    return { status: "found", content };
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return { status: "missing" };
    }
    return { status: "failed", error: new IOReadError(sourcePath, error) };
  }
}

/**
 * Estimates the delegation payload for a role under a profile. Missing
 * documents count as empty; unreadable ones count as empty and are
 * reported in `diagnostics` instead of failing the calculation.
 */
export async function calculateBudget(
  role: Role,
  profile: Profile,
  components: readonly Component[],
  options: CalculateOptions = {},
): Promise<BudgetEstimate> {
  const charsPerToken = options.charsPerToken ?? CHARS_PER_TOKEN;
  const sparsify = options.sparsify ?? defaultSparsifyOptions;

  const outcomes = await Promise.all(
    components
      .filter((component) => component.role === role)
      .map(async (component) => {
        const outcome = await readComponent(component.sourcePath);

        if (outcome.status === "failed") {
          logger.warn(
            { path: outcome.error.path, error: outcome.error.message },
            "Component read failed, counting it as empty",
          );
        }

        const content = outcome.status === "found" ? outcome.content : "";
        const { charCount } = applyStrategy(
          profile.strategy,
          content,
          component.spec,
          sparsify,
        );
        const tokens = estimateTokens(charCount, charsPerToken);

        logger.debug(
          { role, key: component.key, path: component.sourcePath, tokens },
          "Estimated component",
        );

        const estimate: ComponentEstimate = {
          key: component.key,
          label: component.label,
          sourcePath: component.sourcePath,
          found: outcome.status === "found",
          charCount,
          tokens,
        };
        return { estimate, outcome };
      }),
  );

  const estimates = outcomes.map(({ estimate }) => estimate);
  // Component order, whatever order the reads finished in
  const diagnostics = outcomes.flatMap(({ outcome }) =>
    outcome.status === "failed" ? [outcome.error] : [],
  );

  // Every expected key gets an entry, absent documents included.
  const perComponentTokens: Partial<Record<ComponentKey, number>> = {};
  for (const key of expectedKeys(role)) {
    perComponentTokens[key] = 0;
  }
  for (const estimate of estimates) {
    perComponentTokens[estimate.key] =
      (perComponentTokens[estimate.key] ?? 0) + estimate.tokens;
  }

  return {
    role,
    profile,
    components: estimates,
    perComponentTokens,
    totalTokens: estimates.reduce((sum, { tokens }) => sum + tokens, 0),
    budgetTokens: budgetTokens(profile),
    diagnostics,
  };
}
