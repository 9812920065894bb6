import { formatMoney } from "./format";
import { BudgetPrescription } from "./prescription/types";

function line(label: string, amount: number): string {
  return `- ${label}: ${formatMoney(amount)}`;
}

export function subjectFor(p: BudgetPrescription): string {
  if (!p.analysis.isSustainable) return `Budget for ${p.month}: expenses exceed income`;
  if (p.analysis.validationCase !== "none") return `Budget for ${p.month}: adjusted to fit your income`;
  return `Budget for ${p.month}: on track`;
}

export function bodyFor(p: BudgetPrescription): string {
  const a = p.analysis;
  const lines: string[] = [];

  lines.push(subjectFor(p));
  lines.push(`Strategy: ${p.strategy.label}`);
  lines.push(`Based on ${p.sourceMonth} (${p.confidence} confidence). ${p.selectionReason}`);
  lines.push("");

  lines.push(`Net income (${p.netIncomeSource}): ${formatMoney(p.netIncome)}`);
  lines.push("Fixed monthly:");
  if (p.monthlyAllocations.length === 0) {
    lines.push("- (none)");
  } else {
    for (const m of p.monthlyAllocations) lines.push(line(m.category, m.monthlyAmount));
  }
  lines.push("Daily limits:");
  for (const d of p.dailyAllocations) lines.push(line(d.category, d.dailyAmount));
  lines.push(`Today's budget: ${formatMoney(p.effectiveDailyBudget)} (base ${formatMoney(p.baseDailyBudget)})`);
  for (const adj of p.behaviorAdjustments) {
    const sign = adj.amount < 0 ? "-" : "+";
    lines.push(`  ${sign}${formatMoney(Math.abs(adj.amount))} ${adj.reason}`);
  }
  lines.push("");

  lines.push(line("Projected spending", a.projectedBudget));
  lines.push(line("Remaining", a.remainingBudget));
  lines.push(
    `Targets: needs ${formatMoney(p.strategy.targets.needs)}, wants ${formatMoney(p.strategy.targets.wants)}, ` +
      `savings ${formatMoney(p.strategy.targets.savings)}`,
  );

  if (p.tips.length > 0) {
    lines.push("");
    lines.push("Tips:");
    for (const t of p.tips) lines.push(`- ${t.title}: ${t.message}${t.action ? ` ${t.action}` : ""}`);
  }

  return lines.join("\n");
}
