export interface EngineSettings {
  foodDailyFloor: number;
  transportDailyFloor: number;
  weekendBonusRate: number;
  paydayBonusRate: number;
  paydayDays: number[]; // day-of-month; the last day stands in for any that the month lacks
  weekendDays: number[]; // UTC weekday, Sunday = 0
  freshnessWindowHours: number;

  selectionLookbackMonths: number;
  usableCompletenessPct: number;
  usableTransactionCount: number;
  strongCompletenessPct: number;
  strongTransactionCount: number;
  reliableCompletenessPct: number;
  reliableTransactionCount: number;

  // Applied only to users without any prior prescription.
  firstTimeMinCompletenessPct: number;
  firstTimeMinTransactionCount: number;

  categoryLookbackMonths: number;
  categoryInactiveMonths: number;

  incomeEstimateMultiplier: number;
  maxAnalysisTips: number;
  maxStrategyTips: number;
  transactionCacheTtlMinutes: number;
  maxDailyBudget: number | null;
}

export const defaultEngineSettings: EngineSettings = {
  foodDailyFloor: 100,
  transportDailyFloor: 50,
  weekendBonusRate: 0.2,
  paydayBonusRate: 0.15,
  paydayDays: [15, 30],
  weekendDays: [5, 6],
  freshnessWindowHours: 6,

  selectionLookbackMonths: 12,
  usableCompletenessPct: 50,
  usableTransactionCount: 15,
  strongCompletenessPct: 70,
  strongTransactionCount: 20,
  reliableCompletenessPct: 80,
  reliableTransactionCount: 25,

  firstTimeMinCompletenessPct: 50,
  firstTimeMinTransactionCount: 15,

  categoryLookbackMonths: 12,
  categoryInactiveMonths: 6,

  incomeEstimateMultiplier: 1.2,
  maxAnalysisTips: 5,
  maxStrategyTips: 5,
  transactionCacheTtlMinutes: 5,
  maxDailyBudget: null,
};

export function resolveEngineSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return { ...defaultEngineSettings, ...overrides };
}

type NumericSettingKey = {
  [K in keyof EngineSettings]: EngineSettings[K] extends number ? K : never;
}[keyof EngineSettings];

const envOverrides: [NumericSettingKey, string][] = [
  ["foodDailyFloor", "BUDGET_FOOD_DAILY_FLOOR"],
  ["transportDailyFloor", "BUDGET_TRANSPORT_DAILY_FLOOR"],
  ["weekendBonusRate", "BUDGET_WEEKEND_BONUS_RATE"],
  ["paydayBonusRate", "BUDGET_PAYDAY_BONUS_RATE"],
  ["freshnessWindowHours", "BUDGET_FRESHNESS_WINDOW_HOURS"],
  ["firstTimeMinCompletenessPct", "BUDGET_FIRST_TIME_MIN_COMPLETENESS"],
  ["firstTimeMinTransactionCount", "BUDGET_FIRST_TIME_MIN_TRANSACTIONS"],
];

function getEnvNumber(name: string): number | undefined {
  const v = process.env[name];
  if (!v) return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

// Host scripts only; the engine never reads the environment itself.
export function settingsFromEnv(): Partial<EngineSettings> {
  const out: Partial<EngineSettings> = {};
  for (const [key, envName] of envOverrides) {
    const n = getEnvNumber(envName);
    if (n !== undefined) out[key] = n;
  }
  const maxDaily = getEnvNumber("BUDGET_MAX_DAILY_BUDGET");
  if (maxDaily !== undefined) out.maxDailyBudget = maxDaily;
  return out;
}

export function storageConfigFromEnv(): { url: string; authToken?: string } {
  const url = process.env.TURSO_DATABASE_URL;
  if (!url) throw new Error("Missing TURSO_DATABASE_URL env var");
  const authToken = process.env.TURSO_AUTH_TOKEN;
  // Local file databases need no token.
  if (!authToken && !url.startsWith("file:")) throw new Error("Missing TURSO_AUTH_TOKEN env var");
  return authToken ? { url, authToken } : { url };
}

export const displayConfig = {
  locale: "en-PH",
  currency: "PHP",
};
