import { ValidationCase } from "./budget/types";
import { BudgetPrescription } from "./prescription/types";
import {
  CivilStatus,
  DebtStatus,
  HouseholdSituation,
  IncomeFrequency,
  Profession,
  SavingsInstrument,
  Transaction,
  UserProfile,
  isTransactionType,
} from "./types";

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function oneOf<T extends string>(values: readonly T[]) {
  return (x: unknown): x is T => typeof x === "string" && values.some((v) => v === x);
}

const isIncomeFrequency = oneOf<IncomeFrequency>(["fixed", "irregular"]);
const isProfession = oneOf<Profession>(["student", "employee", "retired", "unemployed", "other"]);
const isCivilStatus = oneOf<CivilStatus>(["single", "married", "widowed", "living-with-partner", "other"]);
const isHousehold = oneOf<HouseholdSituation>(["renting", "mortgage", "own-house", "lives-with-family", "other"]);
const isDebtStatus = oneOf<DebtStatus>(["none", "credit-card", "loan", "other"]);
const isSavingsInstrument = oneOf<SavingsInstrument>(["none", "small-savings", "emergency-fund", "investments"]);

function optionalNumber(x: unknown): x is number | null | undefined {
  return x == null || (typeof x === "number" && Number.isFinite(x));
}

export function isUserProfile(x: unknown): x is UserProfile {
  return (
    isRecord(x) &&
    typeof x.id === "string" &&
    optionalNumber(x.monthlyNetIncome) &&
    typeof x.monthlyGrossIncome === "number" &&
    isIncomeFrequency(x.incomeFrequency) &&
    isProfession(x.profession) &&
    (x.birthDate == null || typeof x.birthDate === "string") &&
    isCivilStatus(x.civilStatus) &&
    isHousehold(x.householdSituation) &&
    typeof x.hasChildren === "boolean" &&
    optionalNumber(x.childCount) &&
    typeof x.isBusinessOwner === "boolean" &&
    Array.isArray(x.debtStatuses) &&
    x.debtStatuses.every(isDebtStatus) &&
    Array.isArray(x.savingsInstruments) &&
    x.savingsInstruments.every(isSavingsInstrument) &&
    optionalNumber(x.emergencyFundBalance)
  );
}

const isoDay = /^\d{4}-\d{2}-\d{2}/;

export function isTransaction(x: unknown): x is Transaction {
  return (
    isRecord(x) &&
    typeof x.id === "string" &&
    typeof x.amount === "number" &&
    Number.isFinite(x.amount) &&
    x.amount > 0 &&
    isTransactionType(x.type) &&
    typeof x.category === "string" &&
    typeof x.date === "string" &&
    isoDay.test(x.date) &&
    typeof x.description === "string"
  );
}

const isValidationCase = oneOf<ValidationCase>(["none", "A", "B", "C"]);
const splitKeys = ["needs", "wants", "savings"];

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isStringArray(x: unknown): boolean {
  return Array.isArray(x) && x.every((v) => typeof v === "string");
}

function hasNumbers(x: unknown, keys: string[]): boolean {
  return isRecord(x) && keys.every((k) => isNumber(x[k]));
}

function everyRecord(x: unknown, check: (r: Record<string, unknown>) => boolean): boolean {
  return Array.isArray(x) && x.every((r) => isRecord(r) && check(r));
}

function isAnalysis(x: unknown): boolean {
  return (
    isRecord(x) &&
    hasNumbers(x, ["netIncome", "projectedBudget", "remainingBudget"]) &&
    typeof x.isSustainable === "boolean" &&
    isValidationCase(x.validationCase) &&
    hasNumbers(x.fixedNeeds, ["total"]) &&
    hasNumbers(x.flexibleNeeds, ["food", "transport", "total"]) &&
    hasNumbers(x.unadjustedFlexibleNeeds, ["food", "transport", "total"]) &&
    isStringArray(x.warnings) &&
    isStringArray(x.adjustments)
  );
}

function isPrescriptionStrategy(x: unknown): boolean {
  return (
    isRecord(x) &&
    typeof x.strategy === "string" &&
    typeof x.label === "string" &&
    hasNumbers(x.split, splitKeys) &&
    hasNumbers(x.targets, splitKeys)
  );
}

/** Checks a stored prescription payload down to the fields the engine and the summary read. */
export function isBudgetPrescription(x: unknown): x is BudgetPrescription {
  return (
    isRecord(x) &&
    typeof x.id === "string" &&
    typeof x.userId === "string" &&
    typeof x.month === "string" &&
    typeof x.sourceMonth === "string" &&
    typeof x.selectionReason === "string" &&
    isNumber(x.netIncome) &&
    isNumber(x.baseDailyBudget) &&
    isNumber(x.effectiveDailyBudget) &&
    typeof x.lastUpdated === "string" &&
    isAnalysis(x.analysis) &&
    isPrescriptionStrategy(x.strategy) &&
    isRecord(x.sourceMonthSpending) &&
    isRecord(x.currentMonthSpending) &&
    everyRecord(x.dailyAllocations, (d) => typeof d.category === "string" && isNumber(d.dailyAmount)) &&
    everyRecord(x.monthlyAllocations, (m) => typeof m.category === "string" && isNumber(m.monthlyAmount)) &&
    everyRecord(x.behaviorAdjustments, (a) => isNumber(a.amount) && typeof a.reason === "string") &&
    everyRecord(x.tips, (t) => typeof t.title === "string" && typeof t.message === "string")
  );
}
