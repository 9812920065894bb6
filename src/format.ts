import { displayConfig } from "./config";

const money = new Intl.NumberFormat(displayConfig.locale, {
  style: "currency",
  currency: displayConfig.currency,
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatMoney(amount: number): string {
  return money.format(amount);
}
