import { CategorySpending } from "../types";

export type FixedCategory =
  | "housingAndUtilities"
  | "debt"
  | "groceries"
  | "healthAndPersonalCare"
  | "education"
  | "childcare";

export type FlexibleCategory = "food" | "transport";

export type CategoryGroup =
  | { kind: "fixed"; key: FixedCategory }
  | { kind: "flexible"; key: FlexibleCategory }
  | { kind: "excluded" };

export interface TaxonomyEntry {
  name: string; // canonical display name
  aliases: string[];
  group: Exclude<CategoryGroup, { kind: "excluded" }>;
}

// Names are matched exactly; "food" is not "Food".
export const taxonomy: TaxonomyEntry[] = [
  {
    name: "Housing and Utilities",
    aliases: ["Housing & Utilities", "Rent/Mortgage", "Electric Bill", "Water Bill", "Internet/WiFi", "Phone Bill"],
    group: { kind: "fixed", key: "housingAndUtilities" },
  },
  { name: "Debt", aliases: ["Debt/Loans", "Loan Payment"], group: { kind: "fixed", key: "debt" } },
  { name: "Groceries", aliases: [], group: { kind: "fixed", key: "groceries" } },
  { name: "Health and Personal Care", aliases: [], group: { kind: "fixed", key: "healthAndPersonalCare" } },
  { name: "Education", aliases: [], group: { kind: "fixed", key: "education" } },
  { name: "Childcare", aliases: [], group: { kind: "fixed", key: "childcare" } },
  { name: "Food", aliases: [], group: { kind: "flexible", key: "food" } },
  { name: "Transportation", aliases: ["Transport"], group: { kind: "flexible", key: "transport" } },
];

export const fixedCategoryKeys: FixedCategory[] = [
  "housingAndUtilities",
  "debt",
  "groceries",
  "healthAndPersonalCare",
  "education",
  "childcare",
];

const byName = new Map<string, TaxonomyEntry>();
for (const entry of taxonomy) {
  byName.set(entry.name, entry);
  for (const alias of entry.aliases) byName.set(alias, entry);
}

export function resolveCategory(category: string): CategoryGroup {
  return byName.get(category)?.group ?? { kind: "excluded" };
}

export function displayName(key: FixedCategory | FlexibleCategory): string {
  const entry = taxonomy.find((t) => t.group.key === key);
  return entry ? entry.name : key;
}

export interface GroupedSpending {
  fixed: Record<FixedCategory, number>;
  flexible: Record<FlexibleCategory, number>;
  excluded: CategorySpending;
}

/** Sums a spending map into taxonomy buckets; aliases add into their canonical bucket. */
export function groupSpending(spending: CategorySpending): GroupedSpending {
  const fixed: Record<FixedCategory, number> = {
    housingAndUtilities: 0,
    debt: 0,
    groceries: 0,
    healthAndPersonalCare: 0,
    education: 0,
    childcare: 0,
  };
  const flexible: Record<FlexibleCategory, number> = { food: 0, transport: 0 };
  const excluded: CategorySpending = {};

  for (const [category, amount] of Object.entries(spending)) {
    const group = resolveCategory(category);
    if (group.kind === "fixed") fixed[group.key] += amount;
    else if (group.kind === "flexible") flexible[group.key] += amount;
    else excluded[category] = (excluded[category] ?? 0) + amount;
  }

  return { fixed, flexible, excluded };
}
