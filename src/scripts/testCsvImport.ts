import assert from "node:assert/strict";
import { test } from "node:test";
import { parseAmount, parseCsv, parseTransactionsCsv } from "../csvTransactions";

const csv = [
  "Date,Amount,Type,Category,Description",
  '2024-05-01,"₱25,000.00",Recurring Expense,Rent/Mortgage,May rent',
  '2024-05-02,185.50,expense,Food,"Lunch, with team"',
  '2024-05-02,185.50,expense,Food,"Lunch, with team"',
  "not-a-date,100,expense,Food,",
  "2024-05-03,(50),expense,Food,refund",
  "2024-05-04,300,gift,Food,",
  "2024-05-05,80,expense,,",
  "",
].join("\r\n");

test("splits quoted fields and skips blank lines", () => {
  assert.deepEqual(parseCsv('a,"b, c","say ""hi"""\n\n1,2,3'), [
    ["a", "b, c", 'say "hi"'],
    ["1", "2", "3"],
  ]);
  assert.deepEqual(parseCsv('note,"two\nlines"\r\nx,y'), [
    ["note", "two\nlines"],
    ["x", "y"],
  ]);
});

test("parses peso and parenthesized amounts", () => {
  assert.equal(parseAmount("₱1,234.50"), 1234.5);
  assert.equal(parseAmount("(200)"), -200);
  assert.equal(parseAmount(""), null);
  assert.equal(parseAmount("abc"), null);
});

test("imports valid rows and reports the rest", () => {
  const { transactions, skipped } = parseTransactionsCsv(csv);

  assert.deepEqual(
    transactions.map((t) => [t.date, t.amount, t.type, t.category, t.description]),
    [
      ["2024-05-01", 25000, "recurring-expense", "Rent/Mortgage", "May rent"],
      ["2024-05-02", 185.5, "expense", "Food", "Lunch, with team"],
      ["2024-05-02", 185.5, "expense", "Food", "Lunch, with team"],
    ],
  );
  assert.deepEqual(skipped, [
    { row: 4, reason: 'invalid date "not-a-date"' },
    { row: 5, reason: "amount must be a positive number" },
    { row: 6, reason: 'unknown type "gift"' },
    { row: 7, reason: "missing category" },
  ]);
});

test("derived ids are stable across imports and distinct for repeated rows", () => {
  const first = parseTransactionsCsv(csv).transactions.map((t) => t.id);
  const second = parseTransactionsCsv(csv).transactions.map((t) => t.id);

  assert.deepEqual(second, first);
  assert.equal(new Set(first).size, 3);
  assert.ok(first.every((id) => /^csv-[0-9a-f]{16}$/.test(id)));
});

test("uses the Id column when present and defaults the type to expense", () => {
  const { transactions } = parseTransactionsCsv("Id,Date,Amount,Category\nbank-77,2024-05-09,99.95,Transport\n");
  assert.deepEqual(transactions, [
    { id: "bank-77", amount: 99.95, type: "expense", category: "Transport", date: "2024-05-09", description: "" },
  ]);
});

test("rejects files without the required headers", () => {
  assert.throws(() => parseTransactionsCsv("Date,Total\n2024-05-01,10\n"), /missing Date\/Amount\/Category/);
  assert.throws(() => parseTransactionsCsv(""), /CSV appears empty/);
});
