import type { StatementTable } from "../clients/yahooClient";
import type { CapitalCostDataSource, IncomeFigures, StatementKind, StatementsDataSource } from "../services/dataSources";

export interface FakeStatements {
  income?: Record<string, Array<number | null>>;
  "cash-flow"?: Record<string, Array<number | null>>;
  "balance-sheet"?: Record<string, Array<number | null>>;
  sharesOutstanding?: number | null;
}

export function fakeStatementsSource(data: FakeStatements): StatementsDataSource {
  return {
    kind: "statements",
    name: "fake-statements",
    async fetchStatement(_ticker: string, statement: StatementKind): Promise<StatementTable> {
      const rows = data[statement] ?? {};
      const width = Math.max(0, ...Object.values(rows).map((r) => r.length));
      const dates = Array.from({ length: width }, (_, i) => `${2024 - i}-12-31`);
      return { dates, rows };
    },
    async fetchSharesOutstanding() {
      return data.sharesOutstanding ?? null;
    },
  };
}

export interface FakeCapitalCost {
  beta?: number | null;
  tenYearYield?: number | null;
  marketCap?: number | null;
  income?: IncomeFigures[];
  totalDebts?: Array<number | null>;
  freeCashFlows?: Array<number | null>;
}

export function fakeCapitalCostSource(data: FakeCapitalCost): CapitalCostDataSource {
  return {
    kind: "capital-cost",
    name: "fake-capital-cost",
    fetchBeta: async () => data.beta ?? null,
    fetchTenYearYield: async () => data.tenYearYield ?? null,
    fetchMarketCap: async () => data.marketCap ?? null,
    fetchIncomeStatements: async (_ticker, limit) => (data.income ?? []).slice(0, limit),
    fetchTotalDebts: async (_ticker, limit) => (data.totalDebts ?? []).slice(0, limit),
    fetchFreeCashFlows: async (_ticker, limit) => (data.freeCashFlows ?? []).slice(0, limit),
  };
}
