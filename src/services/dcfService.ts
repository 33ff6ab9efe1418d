import { ValuationInputError } from "../utils/errors";
import { estimateCapitalCost } from "./capitalCostService";
import type { CapitalCostDataSource, StatementsDataSource } from "./dataSources";
import { fetchFinancialSnapshot } from "./financialsService";
import { calculateDcf } from "./valuationService";

export interface DcfSuccess {
  intrinsic_value_per_share: number;
  explanation: string;
}

export interface DcfFailure {
  error: string;
}

export type DcfResult = DcfSuccess | DcfFailure;

export interface DcfDataSources {
  statements: StatementsDataSource;
  capitalCost: CapitalCostDataSource;
}

// Fetcher → Estimator → Calculator; every failure becomes { error }
export async function runDcf(ticker: string, sources: DcfDataSources): Promise<DcfResult> {
  try {
    const snapshot = await fetchFinancialSnapshot(ticker, sources.statements);
    const { wacc, growthRate } = await estimateCapitalCost(ticker, sources.capitalCost);
    if (!Number.isFinite(wacc)) {
      throw new ValuationInputError(`Missing WACC for ${ticker}`);
    }

    const { intrinsicValuePerShare, explanation } = calculateDcf({
      debt: snapshot.totalDebt,
      cash: snapshot.cashAndEquivalents,
      sharesOutstanding: snapshot.sharesOutstanding,
      growthRate,
      discountRate: wacc,
      revenue: snapshot.revenue,
      netIncome: snapshot.netIncome,
      operatingCashFlow: snapshot.operatingCashFlow,
      capitalExpenditure: snapshot.capitalExpenditure,
    });

    return { intrinsic_value_per_share: intrinsicValuePerShare, explanation };
  } catch (err) {
    if (err instanceof ValuationInputError) {
      console.warn(`[dcf] ${ticker}: ${err.message}`);
      return { error: err.message };
    }
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[dcf] ${ticker} unexpected failure: ${message}`);
    return { error: `Unexpected error: ${message}` };
  }
}

export function isDcfFailure(result: DcfResult): result is DcfFailure {
  return "error" in result;
}
