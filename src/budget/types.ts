import { FixedCategory, FlexibleCategory } from "../categories/taxonomy";

export type FixedNeeds = Record<FixedCategory, number> & { total: number };

export type FlexibleNeeds = Record<FlexibleCategory, number> & { total: number };

// "none": flexible needs fit as projected.
export type ValidationCase = "none" | "A" | "B" | "C";

export interface CategoryBudgetAnalysis {
  netIncome: number;
  fixedNeeds: FixedNeeds;
  flexibleNeeds: FlexibleNeeds;
  unadjustedFlexibleNeeds: FlexibleNeeds;
  projectedBudget: number;
  remainingBudget: number;
  isSustainable: boolean;
  validationCase: ValidationCase;
  scaleFactor: number | null;
  warnings: string[];
  adjustments: string[];
}
