import { EngineSettings } from "../config";
import { addMonths } from "../dates";
import { MonthKey } from "../types";
import { DataTier, MonthStats, dataTier } from "./analyzeMonth";

export type SelectionRule =
  | "previous-reliable"
  | "previous-strong"
  | "previous-usable"
  | "carry-forward-reliable"
  | "fallback-previous"
  | "fallback-most-populated";

export type SelectionStep =
  | "check-previous"
  | "search-last-reliable"
  | "fallback-previous"
  | "search-any-data"
  | "selected"
  | "failed";

export interface SelectionTransition {
  from: SelectionStep;
  to: SelectionStep;
  reason: string;
}

export type DataMonthSelection =
  | {
      status: "selected";
      month: MonthKey;
      rule: SelectionRule;
      tier: DataTier;
      stats: MonthStats;
      reason: string;
      trail: SelectionTransition[];
    }
  | {
      status: "insufficient-data";
      reason: "no-usable-month";
      message: string;
      trail: SelectionTransition[];
    };

type State =
  | { step: "check-previous" }
  | { step: "search-last-reliable"; previous: MonthStats }
  | { step: "fallback-previous"; previous: MonthStats }
  | { step: "search-any-data" }
  | { step: "selected"; rule: SelectionRule; stats: MonthStats }
  | { step: "failed" };

function pct(n: number): string {
  return `${n.toFixed(1)}%`;
}

function describe(rule: SelectionRule, stats: MonthStats, lookbackMonths: number): string {
  const filled = `${pct(stats.dataCompleteness)} days filled (${stats.transactionCount} transactions)`;
  switch (rule) {
    case "previous-reliable":
      return `Reliable data available: previous month has ${filled}`;
    case "previous-strong":
      return `Strong data available: previous month has ${filled}`;
    case "previous-usable":
      return `Usable data: previous month has ${filled}`;
    case "carry-forward-reliable":
      return `Previous month has insufficient data; carrying forward last reliable month ${stats.month} with ${filled}`;
    case "fallback-previous":
      return `No reliable month in the last ${lookbackMonths} months; using previous month with limited data: ${filled}`;
    case "fallback-most-populated":
      return `Previous month has no transactions; using ${stats.month}, the busiest month in the last ${lookbackMonths} months (${stats.transactionCount} transactions)`;
  }
}

type Pending = Exclude<State, { step: "selected" } | { step: "failed" }>;

/**
 * Picks the month whose transactions drive a new budget for `targetMonth`.
 * Each month is loaded at most once; a month without transactions is never selected.
 */
export async function selectDataMonth(opts: {
  targetMonth: MonthKey;
  loadMonth: (month: MonthKey) => Promise<MonthStats>;
  settings: EngineSettings;
}): Promise<DataMonthSelection> {
  const { targetMonth, settings } = opts;
  const lookback = settings.selectionLookbackMonths;

  const loaded = new Map<MonthKey, MonthStats>();
  const load = async (month: MonthKey): Promise<MonthStats> => {
    const hit = loaded.get(month);
    if (hit) return hit;
    const stats = await opts.loadMonth(month);
    loaded.set(month, stats);
    return stats;
  };

  const advance = async (state: Pending): Promise<[State, string]> => {
    switch (state.step) {
      case "check-previous": {
        const previous = await load(addMonths(targetMonth, -1));
        const tier = dataTier(previous, settings);
        if (tier === "none") return [{ step: "search-last-reliable", previous }, "previous month below usable threshold"];
        const rule: SelectionRule = `previous-${tier}`;
        return [{ step: "selected", rule, stats: previous }, `previous month is ${tier}`];
      }

      case "search-last-reliable": {
        for (let back = 2; back <= lookback; back++) {
          const stats = await load(addMonths(targetMonth, -back));
          if (dataTier(stats, settings) === "reliable") {
            return [{ step: "selected", rule: "carry-forward-reliable", stats }, `${stats.month} is reliable`];
          }
        }
        return [{ step: "fallback-previous", previous: state.previous }, "no reliable month in lookback window"];
      }

      case "fallback-previous":
        if (state.previous.transactionCount >= 1) {
          return [
            { step: "selected", rule: "fallback-previous", stats: state.previous },
            "previous month has some transactions",
          ];
        }
        return [{ step: "search-any-data" }, "previous month has no transactions"];

      case "search-any-data": {
        let best: MonthStats | null = null;
        // Most recent first, so a tie keeps the later month.
        for (let back = 1; back <= lookback; back++) {
          const stats = await load(addMonths(targetMonth, -back));
          if (stats.transactionCount > 0 && (!best || stats.transactionCount > best.transactionCount)) best = stats;
        }
        if (!best) return [{ step: "failed" }, "no-usable-month"];
        return [{ step: "selected", rule: "fallback-most-populated", stats: best }, `${best.month} has the most transactions`];
      }
    }
  };

  const trail: SelectionTransition[] = [];
  let state: State = { step: "check-previous" };
  while (state.step !== "selected" && state.step !== "failed") {
    const [next, reason] = await advance(state);
    trail.push({ from: state.step, to: next.step, reason });
    state = next;
  }

  if (state.step === "failed") {
    return {
      status: "insufficient-data",
      reason: "no-usable-month",
      message: `No transactions found in the last ${lookback} months`,
      trail,
    };
  }

  return {
    status: "selected",
    month: state.stats.month,
    rule: state.rule,
    tier: dataTier(state.stats, settings),
    stats: state.stats,
    reason: describe(state.rule, state.stats, lookback),
    trail,
  };
}
