import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  computeFcfGrowthRate,
  computeGordonTerminalValue,
  computeWacc,
  estimateCapitalCost,
  FALLBACK_GROWTH_RATE,
} from "../capitalCostService";
import { FinancialsUnavailableError } from "../../utils/errors";
import { fakeCapitalCostSource } from "../../test/fakeSources";

const INCOME = { interestExpense: 50, incomeTaxExpense: 20, incomeBeforeTax: 100 };

describe("computeWacc", () => {
  it("blends CAPM cost of equity with after-tax cost of debt", () => {
    // Ke = 0.04 + 1.5 * (0.08 - 0.04) = 0.10; Kd = 50 / 1000 = 0.05; t = 0.2
    const wacc = computeWacc({
      beta: 1.5,
      riskFreeRate: 0.04,
      marketCap: 3000,
      totalDebt: 1000,
      interestExpense: 50,
      incomeTaxExpense: 20,
      incomeBeforeTax: 100,
    });
    // 0.75 * 0.10 + 0.25 * 0.05 * 0.8
    assert.ok(Math.abs(wacc - 0.085) < 1e-12);
  });

  it("is zero when market cap is zero", () => {
    const wacc = computeWacc({
      beta: 1,
      riskFreeRate: 0.04,
      marketCap: 0,
      totalDebt: 1000,
      interestExpense: 50,
      incomeTaxExpense: 20,
      incomeBeforeTax: 100,
    });
    assert.equal(wacc, 0);
  });

  it("ignores cost of debt and tax when their denominators are zero", () => {
    const wacc = computeWacc({
      beta: 1,
      riskFreeRate: 0.03,
      marketCap: 1000,
      totalDebt: 0,
      interestExpense: 10,
      incomeTaxExpense: 5,
      incomeBeforeTax: 0,
    });
    assert.equal(wacc, 0.08);
  });
});

describe("computeFcfGrowthRate", () => {
  it("falls back to exactly 0.02 with fewer than two points", () => {
    assert.equal(computeFcfGrowthRate([]), FALLBACK_GROWTH_RATE);
    assert.equal(computeFcfGrowthRate([150]), 0.02);
  });

  it("computes CAGR from newest-first values", () => {
    // 121 / 100 over two periods
    const rate = computeFcfGrowthRate([121, 110, 100]);
    assert.ok(Math.abs(rate - 0.1) < 1e-12);
  });

  it("uses at most five periods", () => {
    const rate = computeFcfGrowthRate([16, 8, 4, 2, 1, 1000]);
    assert.ok(Math.abs(rate - 1) < 1e-12);
  });

  it("falls back when no real CAGR exists", () => {
    assert.equal(computeFcfGrowthRate([100, 0]), 0.02);
    assert.equal(computeFcfGrowthRate([-100, 50]), 0.02);
  });
});

describe("computeGordonTerminalValue", () => {
  it("applies the perpetuity formula", () => {
    assert.equal(computeGordonTerminalValue(100, 0.1, 0.0), 1000);
  });

  it("is null when wacc equals growth or there is no cash flow", () => {
    assert.equal(computeGordonTerminalValue(100, 0.05, 0.05), null);
    assert.equal(computeGordonTerminalValue(null, 0.08, 0.02), null);
  });
});

describe("estimateCapitalCost", () => {
  it("derives wacc, growth and terminal value from the provider", async () => {
    const source = fakeCapitalCostSource({
      beta: 1.5,
      tenYearYield: 4,
      marketCap: 3000,
      income: [INCOME],
      totalDebts: [1000],
      freeCashFlows: [121, 110, 100],
    });

    const estimate = await estimateCapitalCost("AAPL", source);

    assert.ok(Math.abs(estimate.wacc - 0.085) < 1e-12);
    assert.ok(Math.abs(estimate.growthRate - 0.1) < 1e-12);
    assert.ok(estimate.terminalValue !== null && estimate.terminalValue < 0);
  });

  it("defaults beta to 1 and the risk-free rate to 0", async () => {
    const source = fakeCapitalCostSource({
      marketCap: 1000,
      income: [{ interestExpense: null, incomeTaxExpense: null, incomeBeforeTax: null }],
      totalDebts: [null],
    });

    const estimate = await estimateCapitalCost("AAPL", source);

    // Ke = 0 + 1 * 0.08, all equity
    assert.equal(estimate.wacc, 0.08);
    assert.equal(estimate.growthRate, 0.02);
    assert.equal(estimate.terminalValue, null);
  });

  it("fails with FinancialsUnavailableError without statements", async () => {
    const source = fakeCapitalCostSource({ beta: 1, marketCap: 1000, totalDebts: [10] });

    await assert.rejects(estimateCapitalCost("NOPE", source), (err: unknown) => {
      assert.ok(err instanceof FinancialsUnavailableError);
      assert.equal(err.message, "Financial statements not available for NOPE");
      return true;
    });
  });
});
