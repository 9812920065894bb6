import { baseDailyBudget, computeDailyAllocations, computeMonthlyAllocations } from "../allocation/computeAllocations";
import { computeBehaviorAdjustments, effectiveDailyBudget, flexibleSpendingByDay } from "../allocation/behaviorAdjustments";
import { computeCategoryBudget } from "../budget/computeCategoryBudget";
import { MonthSpending, preservationWindow, preserveCategories } from "../categories/preserveCategories";
import { EngineSettings, resolveEngineSettings } from "../config";
import { addDaysISO, daysInMonth, hoursBetween, isoDate, monthKeyForDate, monthKeyOf, monthRange, parseMonthKey } from "../dates";
import { analyzeMonth, confidenceFor } from "../selection/analyzeMonth";
import { selectDataMonth } from "../selection/selectDataMonth";
import { classifyStrategy, explainStrategy } from "../strategy/classifyStrategy";
import { splitAmounts, strategyLabel, strategySplit } from "../strategy/splits";
import { strategyTips } from "../strategy/tips";
import { BudgetStore } from "../storage/budgetStore";
import { CategorySpending, Logger, MonthKey, Transaction } from "../types";
import { BudgetCache } from "./budgetCache";
import { analysisTips, fromStrategyTips, progressTips } from "./coachingTips";
import { KeyedLock } from "./keyedLock";
import { resolveNetIncome } from "./netIncome";
import { BudgetPrescription } from "./types";

export interface PrescriptionEngineOptions {
  store: BudgetStore;
  settings?: Partial<EngineSettings>;
  cache?: BudgetCache;
  locks?: KeyedLock;
  logger?: Logger;
}

export interface PrescriptionEngine {
  readonly settings: EngineSettings;
  /** Builds and persists this month's prescription, or null when the data cannot support one. */
  generate(userId: string, now: Date): Promise<BudgetPrescription | null>;
  /** Returns a stored prescription younger than the freshness window, else regenerates. */
  getPrescription(userId: string, now: Date): Promise<BudgetPrescription | null>;
  /** Refreshes the stored prescription for `prescription.month`; null once it has been invalidated. */
  refreshDailyState(prescription: BudgetPrescription, now: Date): Promise<BudgetPrescription | null>;
  /** Drops prescriptions built from the month containing `date`; returns how many. */
  onTransactionChanged(userId: string, date: string): Promise<number>;
  recordTransaction(userId: string, tx: Transaction): Promise<void>;
  removeTransaction(userId: string, transactionId: string): Promise<boolean>;
}

// A build whose inputs changed before it could be saved.
const superseded = "superseded";
const maxBuildAttempts = 3;

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

function totalOf(spending: CategorySpending): number {
  return round2(Object.values(spending).reduce((a, b) => a + b, 0));
}

export function prescriptionId(userId: string, month: MonthKey): string {
  const { year, month1to12 } = parseMonthKey(month);
  return `${userId}_${year}_${month1to12}`;
}

export function createPrescriptionEngine(opts: PrescriptionEngineOptions): PrescriptionEngine {
  const { store } = opts;
  const settings = resolveEngineSettings(opts.settings);
  const cache = opts.cache ?? new BudgetCache(settings.transactionCacheTtlMinutes * 60 * 1000);
  const locks = opts.locks ?? new KeyedLock();
  const logger: Logger = opts.logger ?? console;

  async function monthTransactions(userId: string, month: MonthKey): Promise<Transaction[]> {
    const hit = cache.getMonth(userId, month);
    if (hit) return hit;
    const epoch = cache.epoch(userId);
    const txs = await store.fetchTransactions(userId, monthRange(month));
    if (cache.epoch(userId) === epoch) cache.setMonth(userId, month, txs);
    return txs;
  }

  async function dailyState(p: BudgetPrescription, now: Date) {
    const today = isoDate(now);
    const yesterdayMonth = monthKeyOf(addDaysISO(today, -1));
    const todayMonth = monthKeyOf(today);

    const recent = await monthTransactions(p.userId, todayMonth);
    const earlier = yesterdayMonth === todayMonth ? [] : await monthTransactions(p.userId, yesterdayMonth);
    const spendingByDay = flexibleSpendingByDay([...earlier, ...recent]);

    const behaviorAdjustments = computeBehaviorAdjustments({
      baseDailyBudget: p.baseDailyBudget,
      spendingByDay,
      date: today,
      settings,
    });
    const current = p.month === todayMonth ? recent : await monthTransactions(p.userId, p.month);

    return {
      behaviorAdjustments,
      effectiveDailyBudget: effectiveDailyBudget(p.baseDailyBudget, behaviorAdjustments, today),
      currentMonthSpending: analyzeMonth(p.month, current).spending,
    };
  }

  async function build(
    userId: string,
    now: Date,
    epoch: number,
  ): Promise<BudgetPrescription | null | typeof superseded> {
    const targetMonth = monthKeyForDate(now);

    const profile = await store.fetchUserProfile(userId);
    if (!profile) {
      logger.warn(`[prescription] ${userId}: no profile found`);
      return null;
    }

    const selection = await selectDataMonth({
      targetMonth,
      loadMonth: async (month) => analyzeMonth(month, await monthTransactions(userId, month)),
      settings,
    });
    if (selection.status === "insufficient-data") {
      logger.log(`[selection] ${userId}: ${selection.message}`);
      return null;
    }
    const { stats } = selection;
    logger.log(`[selection] ${userId}: ${selection.month} via ${selection.rule}`);

    const firstTime = !(await store.hasAnyPrescription(userId));
    if (
      firstTime &&
      stats.dataCompleteness < settings.firstTimeMinCompletenessPct &&
      stats.transactionCount < settings.firstTimeMinTransactionCount
    ) {
      logger.log(
        `[prescription] ${userId}: first budget needs ${settings.firstTimeMinCompletenessPct}% completeness or ` +
          `${settings.firstTimeMinTransactionCount} transactions (have ${stats.dataCompleteness}%, ${stats.transactionCount})`,
      );
      return null;
    }

    const history: MonthSpending[] = [];
    for (const month of preservationWindow({
      sourceMonth: stats.month,
      targetMonth,
      lookbackMonths: settings.categoryLookbackMonths,
    })) {
      history.push({ month, spending: analyzeMonth(month, await monthTransactions(userId, month)).spending });
    }
    const spending = preserveCategories({
      sourceMonth: stats.month,
      sourceSpending: stats.spending,
      history,
      inactiveMonths: settings.categoryInactiveMonths,
    });
    if (totalOf(spending) <= 0) {
      logger.log(`[prescription] ${userId}: no spending to budget from ${stats.month}`);
      return null;
    }

    const netIncome = resolveNetIncome({
      profile,
      sourceTransactions: await monthTransactions(userId, stats.month),
      sourceExpenses: totalOf(stats.spending),
      estimateMultiplier: settings.incomeEstimateMultiplier,
    });
    if (!netIncome) {
      logger.log(`[prescription] ${userId}: net income could not be determined`);
      return null;
    }

    const daysInTargetMonth = daysInMonth(targetMonth);
    const analysis = computeCategoryBudget({
      netIncome: netIncome.amount,
      spending,
      loggedDays: stats.daysWithData,
      daysInTargetMonth,
      settings,
    });
    const dailyAllocations = computeDailyAllocations({
      analysis,
      sourceSpending: spending,
      loggedDays: stats.daysWithData,
      daysInTargetMonth,
      maxDailyBudget: settings.maxDailyBudget,
    });

    const strategy = classifyStrategy(profile, now);
    const split = strategySplit(strategy, profile.childCount);

    const draft: BudgetPrescription = {
      id: prescriptionId(userId, targetMonth),
      userId,
      month: targetMonth,
      sourceMonth: stats.month,
      selectionRule: selection.rule,
      selectionReason: selection.reason,
      selectionTrail: selection.trail,
      dataCompleteness: stats.dataCompleteness,
      daysWithData: stats.daysWithData,
      daysInSourceMonth: stats.daysInMonth,
      transactionCount: stats.transactionCount,
      confidence: confidenceFor(stats, settings),
      netIncome: analysis.netIncome,
      netIncomeSource: netIncome.source,
      sourceMonthSpending: spending,
      analysis,
      strategy: {
        strategy,
        ruleTag: explainStrategy(profile, now),
        label: strategyLabel(strategy, profile.childCount),
        split,
        targets: splitAmounts(analysis.netIncome, split),
      },
      dailyAllocations,
      monthlyAllocations: computeMonthlyAllocations(analysis),
      baseDailyBudget: baseDailyBudget(dailyAllocations),
      behaviorAdjustments: [],
      effectiveDailyBudget: 0,
      currentMonthSpending: {},
      tips: [
        ...analysisTips(analysis, settings.maxAnalysisTips),
        ...fromStrategyTips(strategyTips(strategy, profile.childCount, settings.maxStrategyTips), settings.maxStrategyTips),
        ...progressTips(stats.dataCompleteness),
      ],
      lastUpdated: now.toISOString(),
    };
    const prescription: BudgetPrescription = { ...draft, ...(await dailyState(draft, now)) };

    if (cache.epoch(userId) !== epoch) return superseded;
    await store.persistPrescription(prescription);
    if (cache.epoch(userId) !== epoch) {
      // An invalidation ran while the write was in flight and may have missed it.
      await store.deletePrescriptionsWhereSourceMonth(userId, prescription.sourceMonth);
      return superseded;
    }
    cache.setPrescription(prescription);
    logger.log(
      `[prescription] ${userId}: saved ${prescription.id} from ${prescription.sourceMonth} ` +
        `(confidence=${prescription.confidence}, sustainable=${analysis.isSustainable})`,
    );
    return prescription;
  }

  function generate(userId: string, now: Date): Promise<BudgetPrescription | null> {
    return locks.run(`${userId}|${monthKeyForDate(now)}`, async () => {
      for (let attempt = 1; attempt <= maxBuildAttempts; attempt++) {
        const epoch = cache.epoch(userId);
        const result = await build(userId, now, epoch);
        if (result !== superseded && (result || cache.epoch(userId) === epoch)) return result;
        logger.log(`[prescription] ${userId}: transactions changed during build, rebuilding`);
      }
      logger.warn(`[prescription] ${userId}: transactions kept changing, gave up after ${maxBuildAttempts} builds`);
      return null;
    });
  }

  async function onTransactionChanged(userId: string, date: string): Promise<number> {
    const month = monthKeyOf(date);
    cache.invalidate(userId, month);
    const removed = await store.deletePrescriptionsWhereSourceMonth(userId, month);
    if (removed > 0) logger.log(`[prescription] ${userId}: invalidated ${removed} prescription(s) built from ${month}`);
    return removed;
  }

  return {
    settings,

    generate,

    async getPrescription(userId, now) {
      const month = monthKeyForDate(now);
      const epoch = cache.epoch(userId);
      const existing = cache.getPrescription(userId, month) ?? (await store.fetchExistingPrescription(userId, month));
      if (
        existing &&
        hoursBetween(existing.lastUpdated, now) < settings.freshnessWindowHours &&
        cache.epoch(userId) === epoch
      ) {
        cache.setPrescription(existing);
        return existing;
      }
      return generate(userId, now);
    },

    refreshDailyState(prescription, now) {
      const { userId, month } = prescription;
      return locks.run(`${userId}|${month}`, async () => {
        const epoch = cache.epoch(userId);
        const current = cache.getPrescription(userId, month) ?? (await store.fetchExistingPrescription(userId, month));
        if (!current) {
          logger.log(`[prescription] ${userId}: ${prescription.id} was invalidated, nothing to refresh`);
          return null;
        }

        const refreshed: BudgetPrescription = { ...current, ...(await dailyState(current, now)) };
        if (cache.epoch(userId) !== epoch) return null;
        await store.persistPrescription(refreshed);
        if (cache.epoch(userId) !== epoch) {
          await store.deletePrescriptionsWhereSourceMonth(userId, refreshed.sourceMonth);
          return null;
        }
        cache.setPrescription(refreshed);
        return refreshed;
      });
    },

    onTransactionChanged,

    async recordTransaction(userId, tx) {
      await store.saveTransaction(userId, tx);
      await onTransactionChanged(userId, tx.date);
    },

    async removeTransaction(userId, transactionId) {
      const removed = await store.deleteTransaction(userId, transactionId);
      if (!removed) return false;
      await onTransactionChanged(userId, removed.date);
      return true;
    },
  };
}
