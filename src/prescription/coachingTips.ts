import { CategoryBudgetAnalysis } from "../budget/types";
import { formatMoney } from "../format";
import { StrategyTip } from "../strategy/types";
import { CoachingTip } from "./types";

export function analysisTips(analysis: CategoryBudgetAnalysis, limit: number): CoachingTip[] {
  const tips: CoachingTip[] = [];

  for (const w of analysis.warnings) {
    tips.push({ kind: "analysis", category: "Budget Health", title: "Warning", message: w });
  }
  for (const a of analysis.adjustments) {
    tips.push({ kind: "analysis", category: "Budget Health", title: "Adjustment", message: a });
  }

  if (analysis.fixedNeeds.total > 0) {
    tips.push({
      kind: "analysis",
      category: "Fixed Expenses",
      title: "Fixed expenses",
      message: `Your fixed expenses total ${formatMoney(analysis.fixedNeeds.total)} this month.`,
    });
  }

  const flex = analysis.flexibleNeeds;
  tips.push({
    kind: "analysis",
    category: "Flexible Spending",
    title: "Flexible budget",
    message: `Food: ${formatMoney(flex.food)}, Transport: ${formatMoney(flex.transport)}`,
  });

  tips.push({
    kind: "analysis",
    category: "Remaining",
    title: "Remaining budget",
    message: `${formatMoney(analysis.remainingBudget)} remains after fixed and flexible spending.`,
  });

  return tips.slice(0, limit);
}

export function fromStrategyTips(tips: StrategyTip[], limit: number): CoachingTip[] {
  return tips.slice(0, limit).map((t): CoachingTip => ({
    kind: "strategy",
    category: t.category,
    title: t.title,
    message: t.message,
    action: t.action,
  }));
}

export function progressTips(dataCompleteness: number): CoachingTip[] {
  const pct = dataCompleteness.toFixed(1);
  if (dataCompleteness >= 80) {
    return [
      {
        kind: "progress",
        category: "Tracking",
        title: "Excellent Work!",
        message: `You logged spending on ${pct}% of days. This budget is built on solid data.`,
      },
    ];
  }
  if (dataCompleteness >= 70) {
    return [
      {
        kind: "progress",
        category: "Tracking",
        title: "Great Job!",
        message: `You logged spending on ${pct}% of days. Reach 80% for an even sharper budget.`,
      },
    ];
  }
  if (dataCompleteness >= 60) {
    return [
      {
        kind: "progress",
        category: "Tracking",
        title: "Almost There!",
        message: `You logged spending on ${pct}% of days. A few more days of tracking will improve accuracy.`,
      },
    ];
  }
  return [];
}
