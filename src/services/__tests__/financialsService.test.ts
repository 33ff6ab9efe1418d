import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { fetchFinancialSnapshot, pickLatest } from "../financialsService";
import { DataUnavailableError } from "../../utils/errors";
import { fakeStatementsSource } from "../../test/fakeSources";

describe("pickLatest", () => {
  const table = {
    dates: ["2024-12-31", "2023-12-31"],
    rows: {
      Revenue: [80, 70],
      "Total Revenue": [null, 60],
      "Net Income": [12, 10],
    },
  };

  it("returns the first alias with a value in the latest period", () => {
    assert.equal(pickLatest(table, ["Total Revenue", "Revenue"]), 80);
    assert.equal(pickLatest(table, ["Net Income"]), 12);
  });

  it("returns null when no alias matches", () => {
    assert.equal(pickLatest(table, ["Gross Profit"]), null);
  });
});

describe("fetchFinancialSnapshot", () => {
  it("maps aliased line items from the three statements", async () => {
    const source = fakeStatementsSource({
      income: { "Total Revenue": [10e9, 9e9], "Net Income": [2e9, 1.8e9] },
      "cash-flow": { "Operating Cash Flow": [3e9], "Capital Expenditure": [-1e9] },
      "balance-sheet": { "Long Term Debt": [5e9], "Cash And Cash Equivalents": [1e9] },
      sharesOutstanding: 1e9,
    });

    const snapshot = await fetchFinancialSnapshot("AAPL", source);

    assert.deepEqual(snapshot, {
      revenue: 10e9,
      netIncome: 2e9,
      operatingCashFlow: 3e9,
      capitalExpenditure: -1e9,
      totalDebt: 5e9,
      cashAndEquivalents: 1e9,
      sharesOutstanding: 1e9,
    });
  });

  it("prefers the earlier alias when both are present", async () => {
    const source = fakeStatementsSource({
      "cash-flow": {
        "Total Cash From Operating Activities": [4e9],
        "Operating Cash Flow": [3e9],
        "Capital Expenditures": [-2e9],
        "Capital Expenditure": [-1e9],
      },
      "balance-sheet": { "Total Debt": [7e9], "Long Term Debt": [5e9], Cash: [3e8] },
      sharesOutstanding: 5e8,
    });

    const snapshot = await fetchFinancialSnapshot("MSFT", source);

    assert.equal(snapshot.operatingCashFlow, 4e9);
    assert.equal(snapshot.capitalExpenditure, -2e9);
    assert.equal(snapshot.totalDebt, 7e9);
    assert.equal(snapshot.cashAndEquivalents, 3e8);
  });

  it("keeps missing figures as null but defaults debt and cash to zero", async () => {
    const source = fakeStatementsSource({ sharesOutstanding: 100 });

    const snapshot = await fetchFinancialSnapshot("NEWCO", source);

    assert.equal(snapshot.revenue, null);
    assert.equal(snapshot.netIncome, null);
    assert.equal(snapshot.operatingCashFlow, null);
    assert.equal(snapshot.capitalExpenditure, null);
    assert.equal(snapshot.totalDebt, 0);
    assert.equal(snapshot.cashAndEquivalents, 0);
  });

  it("fails with DataUnavailableError without shares outstanding", async () => {
    const source = fakeStatementsSource({ income: { "Total Revenue": [1] } });

    await assert.rejects(fetchFinancialSnapshot("XYZ", source), (err: unknown) => {
      assert.ok(err instanceof DataUnavailableError);
      assert.equal(err.message, "Shares outstanding data unavailable for XYZ");
      return true;
    });
  });
});
