import { FinancialsUnavailableError } from "../utils/errors";
import type { CapitalCostDataSource } from "./dataSources";

export interface CapitalCostEstimate {
  wacc: number;
  growthRate: number;
  /** Informational; the valuation recomputes its own terminal value. */
  terminalValue: number | null;
}

export interface WaccInputs {
  beta: number;
  riskFreeRate: number;
  marketCap: number;
  totalDebt: number;
  interestExpense: number;
  incomeTaxExpense: number | null;
  incomeBeforeTax: number | null;
}

export const ASSUMED_MARKET_RETURN = 0.08;
export const DEFAULT_BETA = 1.0;
export const DEFAULT_RISK_FREE_RATE = 0.0;
export const FALLBACK_GROWTH_RATE = 0.02;
export const GROWTH_LOOKBACK_PERIODS = 5;

export async function estimateCapitalCost(
  ticker: string,
  source: CapitalCostDataSource
): Promise<CapitalCostEstimate> {
  const beta = (await source.fetchBeta(ticker)) ?? DEFAULT_BETA;
  const tenYearYield = await source.fetchTenYearYield();
  const riskFreeRate = tenYearYield === null ? DEFAULT_RISK_FREE_RATE : tenYearYield / 100;
  const marketCap = (await source.fetchMarketCap(ticker)) ?? 0;

  const [income] = await source.fetchIncomeStatements(ticker, 1);
  const debts = await source.fetchTotalDebts(ticker, 1);
  if (!income || !debts.length) {
    throw new FinancialsUnavailableError(`Financial statements not available for ${ticker}`);
  }

  const wacc = computeWacc({
    beta,
    riskFreeRate,
    marketCap,
    totalDebt: debts[0] ?? 0,
    interestExpense: income.interestExpense ?? 0,
    incomeTaxExpense: income.incomeTaxExpense,
    incomeBeforeTax: income.incomeBeforeTax,
  });

  const freeCashFlows = (await source.fetchFreeCashFlows(ticker, GROWTH_LOOKBACK_PERIODS)).filter(
    (v): v is number => v !== null
  );
  const growthRate = computeFcfGrowthRate(freeCashFlows);
  const terminalValue = computeGordonTerminalValue(freeCashFlows[0] ?? null, wacc, growthRate);

  return { wacc, growthRate, terminalValue };
}

export function computeWacc(inputs: WaccInputs): number {
  const { beta, riskFreeRate, marketCap, totalDebt, interestExpense, incomeTaxExpense, incomeBeforeTax } = inputs;

  // CAPM
  const costOfEquity = riskFreeRate + beta * (ASSUMED_MARKET_RETURN - riskFreeRate);
  const costOfDebt = totalDebt ? interestExpense / totalDebt : 0;
  const taxRate = incomeBeforeTax ? (incomeTaxExpense ?? 0) / incomeBeforeTax : 0;

  const equityWeight = marketCap ? marketCap / (marketCap + totalDebt) : 0;
  const debtWeight = marketCap ? totalDebt / (marketCap + totalDebt) : 0;

  return equityWeight * costOfEquity + debtWeight * costOfDebt * (1 - taxRate);
}

/**
 * CAGR between the oldest and the latest free cash flow (input ordered newest
 * first). Falls back when fewer than two points exist or no real rate does.
 */
export function computeFcfGrowthRate(freeCashFlows: readonly number[]): number {
  const points = freeCashFlows.slice(0, GROWTH_LOOKBACK_PERIODS).filter((v) => Number.isFinite(v));
  if (points.length < 2) return FALLBACK_GROWTH_RATE;

  const latest = points[0];
  const oldest = points[points.length - 1];
  if (oldest === 0) return FALLBACK_GROWTH_RATE;

  const ratio = latest / oldest;
  if (ratio <= 0) return FALLBACK_GROWTH_RATE;

  return ratio ** (1 / (points.length - 1)) - 1;
}

export function computeGordonTerminalValue(latestFcf: number | null, wacc: number, growthRate: number): number | null {
  if (latestFcf === null || wacc === growthRate) return null;
  return (latestFcf * (1 + growthRate)) / (wacc - growthRate);
}
