import fs from "node:fs";
import path from "node:path";
import { isRecord } from "../validation";
import { familyTier } from "./splits";
import { BudgetStrategy, FamilyTier, StrategyTip } from "./types";

type TipTable = Record<Exclude<BudgetStrategy, "family-centric">, StrategyTip[]> & {
  "family-centric": Record<FamilyTier, StrategyTip[]>;
};

function isTip(x: unknown): x is StrategyTip {
  return (
    isRecord(x) &&
    typeof x.category === "string" &&
    typeof x.title === "string" &&
    typeof x.message === "string" &&
    typeof x.action === "string" &&
    typeof x.priority === "number"
  );
}

function tipList(x: unknown, where: string): StrategyTip[] {
  if (!Array.isArray(x) || !x.every(isTip)) throw new Error(`Invalid strategy tips for ${where}`);
  return x;
}

export function parseTipTable(raw: unknown): TipTable {
  if (!isRecord(raw)) throw new Error("Invalid strategy tips file");
  const family = raw["family-centric"];
  if (!isRecord(family)) throw new Error("Invalid strategy tips for family-centric");
  return {
    "debt-heavy-recovery": tipList(raw["debt-heavy-recovery"], "debt-heavy-recovery"),
    "risk-control": tipList(raw["risk-control"], "risk-control"),
    conservative: tipList(raw.conservative, "conservative"),
    builder: tipList(raw.builder, "builder"),
    balanced: tipList(raw.balanced, "balanced"),
    "family-centric": {
      small: tipList(family.small, "family-centric/small"),
      growing: tipList(family.growing, "family-centric/growing"),
      large: tipList(family.large, "family-centric/large"),
      unspecified: tipList(family.unspecified, "family-centric/unspecified"),
    },
  };
}

const tipsPath = path.join(__dirname, "../../data/strategyTips.json");
let table: TipTable | null = null;

function loadTipTable(): TipTable {
  if (!table) table = parseTipTable(JSON.parse(fs.readFileSync(tipsPath, "utf8")));
  return table;
}

/** Highest-priority tips for a strategy, at most `limit`. */
export function strategyTips(strategy: BudgetStrategy, childCount?: number | null, limit = 5): StrategyTip[] {
  const t = loadTipTable();
  const tips = strategy === "family-centric" ? t["family-centric"][familyTier(childCount)] : t[strategy];
  return tips
    .slice()
    .sort((a, b) => a.priority - b.priority)
    .slice(0, limit);
}
