import { createHash } from "node:crypto";
import { Transaction, isTransactionType } from "./types";

export interface CsvImportResult {
  transactions: Transaction[];
  skipped: { row: number; reason: string }[];
}

/** Trimmed cells per row. Quoted cells may hold commas, newlines and "" escapes; blank rows are dropped. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let cells: string[] = [];
  let cell = "";
  let quoted = false;

  const endCell = () => {
    cells.push(cell.trim());
    cell = "";
  };
  const endRow = () => {
    endCell();
    if (cells.some((c) => c.length > 0)) rows.push(cells);
    cells = [];
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i++];
    if (quoted) {
      if (ch !== '"') cell += ch;
      else if (text[i] === '"') cell += text[i++];
      else quoted = false;
    } else if (ch === '"') quoted = true;
    else if (ch === ",") endCell();
    else if (ch === "\n") endRow();
    else if (ch !== "\r") cell += ch;
  }
  if (cell.length > 0 || cells.length > 0) endRow();

  return rows;
}

/** "₱1,234.50" → 1234.5; "(200)" → -200. */
export function parseAmount(raw: string): number | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  const isParenNegative = trimmed.startsWith("(") && trimmed.endsWith(")");
  const num = Number(trimmed.replace(/[()₱$,\s]/g, ""));
  if (!Number.isFinite(num)) return null;
  return isParenNegative ? -num : num;
}

function indexFor(headers: string[], name: string): number {
  return headers.findIndex((h) => h.trim().toLowerCase() === name.toLowerCase());
}

/** "Recurring Expense" → "recurring-expense". */
function normalizeType(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

function rowId(parts: string[], occurrence: number): string {
  const digest = createHash("sha1").update(parts.join("|")).update(`#${occurrence}`).digest("hex");
  return `csv-${digest.slice(0, 16)}`;
}

const isoDate = /^\d{4}-\d{2}-\d{2}(T.*)?$/;

/**
 * Reads a transactions export with headers Date, Amount and Category; Type, Description and Id
 * are optional. Rows without an Id get one derived from their content, so re-importing the
 * same file updates rather than duplicates.
 */
export function parseTransactionsCsv(text: string): CsvImportResult {
  const rows = parseCsv(text);
  if (rows.length === 0) throw new Error("CSV appears empty");

  const headers = rows[0];
  const col = {
    date: indexFor(headers, "Date"),
    amount: indexFor(headers, "Amount"),
    category: indexFor(headers, "Category"),
    type: indexFor(headers, "Type"),
    description: indexFor(headers, "Description"),
    id: indexFor(headers, "Id"),
  };
  if (col.date === -1 || col.amount === -1 || col.category === -1) {
    throw new Error("CSV missing Date/Amount/Category headers");
  }

  const cell = (row: string[], idx: number) => (idx === -1 ? "" : (row[idx] ?? "").trim());
  const seen = new Map<string, number>();
  const out: CsvImportResult = { transactions: [], skipped: [] };

  rows.slice(1).forEach((row, i) => {
    const rowNumber = i + 1;
    const date = cell(row, col.date);
    const category = cell(row, col.category);
    const description = cell(row, col.description);
    const type = col.type === -1 ? "expense" : normalizeType(cell(row, col.type));
    const amount = parseAmount(cell(row, col.amount));

    if (!isoDate.test(date)) {
      out.skipped.push({ row: rowNumber, reason: `invalid date "${date}"` });
      return;
    }
    if (amount == null || amount <= 0) {
      out.skipped.push({ row: rowNumber, reason: "amount must be a positive number" });
      return;
    }
    if (!category) {
      out.skipped.push({ row: rowNumber, reason: "missing category" });
      return;
    }
    if (!isTransactionType(type)) {
      out.skipped.push({ row: rowNumber, reason: `unknown type "${type}"` });
      return;
    }

    let id = cell(row, col.id);
    if (!id) {
      const parts = [date, String(amount), type, category, description];
      const key = parts.join("|");
      const occurrence = seen.get(key) ?? 0;
      seen.set(key, occurrence + 1);
      id = rowId(parts, occurrence);
    }

    out.transactions.push({ id, amount, type, category, date, description });
  });

  return out;
}
