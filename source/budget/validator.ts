import type { BudgetEstimate } from "./calculator.ts";

export interface ValidatedBudget extends BudgetEstimate {
  /** Inclusive: a total equal to the budget passes. */
  withinBudget: boolean;
  /** `budgetTokens - totalTokens`; negative means overage. */
  headroomOrOverageTokens: number;
  percentOfBudget: number;
}

export function validateBudget(estimate: BudgetEstimate): ValidatedBudget {
  const headroomOrOverageTokens = estimate.budgetTokens - estimate.totalTokens;
  return {
    ...estimate,
    withinBudget: estimate.totalTokens <= estimate.budgetTokens,
    headroomOrOverageTokens,
    percentOfBudget:
      estimate.budgetTokens > 0
        ? Math.floor((100 * estimate.totalTokens) / estimate.budgetTokens)
        : 0,
  };
}
