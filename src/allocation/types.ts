export interface DailyAllocation {
  category: string;
  dailyAmount: number;
  description: string;
  historicalDailyAverage: number;
}

export interface MonthlyAllocation {
  category: string;
  monthlyAmount: number;
  description: string;
  isFixed: boolean;
}

export type BehaviorAdjustmentType = "rollover" | "overspending" | "weekend" | "payday";

export interface BehaviorAdjustment {
  type: BehaviorAdjustmentType;
  amount: number; // signed
  reason: string;
  effectiveDate: string; // YYYY-MM-DD
}
