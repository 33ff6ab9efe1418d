import type { FmpClient } from "../clients/fmpClient";
import type { StatementTable, YahooClient } from "../clients/yahooClient";
import { pickNumber, readRaw } from "../utils/format";

export type StatementKind = "income" | "cash-flow" | "balance-sheet";

/**
 * Market-data capability the valuation pipeline depends on. Two variants:
 * a primary statements provider and a cost-of-capital provider.
 */
export interface FinancialDataSource {
  readonly kind: "statements" | "capital-cost";
  readonly name: string;
}

export interface StatementsDataSource extends FinancialDataSource {
  readonly kind: "statements";
  /** Most recent statements, restricted to the requested line-item labels. */
  fetchStatement(ticker: string, statement: StatementKind, lineItems: readonly string[]): Promise<StatementTable>;
  fetchSharesOutstanding(ticker: string): Promise<number | null>;
}

export interface IncomeFigures {
  interestExpense: number | null;
  incomeTaxExpense: number | null;
  incomeBeforeTax: number | null;
}

export interface CapitalCostDataSource extends FinancialDataSource {
  readonly kind: "capital-cost";
  fetchBeta(ticker: string): Promise<number | null>;
  /** 10-year benchmark yield in percent (4.25 means 4.25%). */
  fetchTenYearYield(): Promise<number | null>;
  fetchMarketCap(ticker: string): Promise<number | null>;
  /** Newest first; an empty list means the provider has no statement. */
  fetchIncomeStatements(ticker: string, limit: number): Promise<IncomeFigures[]>;
  fetchTotalDebts(ticker: string, limit: number): Promise<Array<number | null>>;
  fetchFreeCashFlows(ticker: string, limit: number): Promise<Array<number | null>>;
}

export function createYahooStatementsSource(yahoo: YahooClient): StatementsDataSource {
  return {
    kind: "statements",
    name: "yahoo",
    fetchStatement: (ticker, _statement, lineItems) => yahoo.fetchStatementSeries(ticker, "annual", lineItems),
    async fetchSharesOutstanding(ticker) {
      const summary = await yahoo.fetchQuoteSummary(ticker, ["defaultKeyStatistics"]);
      const stats = summary?.defaultKeyStatistics;
      if (typeof stats !== "object" || stats === null || !("sharesOutstanding" in stats)) {
        return null;
      }
      return readRaw(stats.sharesOutstanding);
    },
  };
}

export function createFmpCapitalCostSource(fmp: FmpClient): CapitalCostDataSource {
  return {
    kind: "capital-cost",
    name: "fmp",
    async fetchBeta(ticker) {
      const [profile] = await fmp.requestProfile(ticker);
      return pickNumber(profile?.beta);
    },
    async fetchTenYearYield() {
      const [latest] = await fmp.requestTreasuryRates();
      return pickNumber(latest?.year10);
    },
    async fetchMarketCap(ticker) {
      const [quote] = await fmp.requestQuote(ticker);
      return pickNumber(quote?.marketCap);
    },
    async fetchIncomeStatements(ticker, limit) {
      const statements = await fmp.requestIncomeStatements(ticker, limit);
      return statements.map((s) => ({
        interestExpense: pickNumber(s.interestExpense),
        incomeTaxExpense: pickNumber(s.incomeTaxExpense),
        incomeBeforeTax: pickNumber(s.incomeBeforeTax),
      }));
    },
    async fetchTotalDebts(ticker, limit) {
      const sheets = await fmp.requestBalanceSheets(ticker, limit);
      return sheets.map((s) => pickNumber(s.totalDebt));
    },
    async fetchFreeCashFlows(ticker, limit) {
      const statements = await fmp.requestCashFlowStatements(ticker, limit);
      return statements.map((s) => pickNumber(s.freeCashFlow));
    },
  };
}
