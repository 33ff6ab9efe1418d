import type { StatementTable } from "../clients/yahooClient";
import { DataUnavailableError } from "../utils/errors";
import type { StatementKind, StatementsDataSource } from "./dataSources";

export interface FinancialSnapshot {
  readonly revenue: number | null;
  readonly netIncome: number | null;
  readonly operatingCashFlow: number | null;
  readonly capitalExpenditure: number | null;
  readonly totalDebt: number;
  readonly cashAndEquivalents: number;
  readonly sharesOutstanding: number;
}

// Candidate labels per line item, tried in order
export const LINE_ITEM_ALIASES = {
  revenue: ["Total Revenue", "Revenue"],
  netIncome: ["Net Income"],
  operatingCashFlow: ["Total Cash From Operating Activities", "Operating Cash Flow"],
  capitalExpenditure: ["Capital Expenditures", "Capital Expenditure"],
  totalDebt: ["Total Debt", "Long Term Debt"],
  cashAndEquivalents: ["Cash And Cash Equivalents", "Cash"],
} as const satisfies Record<string, readonly string[]>;

const STATEMENT_LINE_ITEMS: Record<StatementKind, readonly string[]> = {
  income: [...LINE_ITEM_ALIASES.revenue, ...LINE_ITEM_ALIASES.netIncome],
  "cash-flow": [...LINE_ITEM_ALIASES.operatingCashFlow, ...LINE_ITEM_ALIASES.capitalExpenditure],
  "balance-sheet": [...LINE_ITEM_ALIASES.totalDebt, ...LINE_ITEM_ALIASES.cashAndEquivalents],
};

export async function fetchFinancialSnapshot(
  ticker: string,
  source: StatementsDataSource
): Promise<FinancialSnapshot> {
  const income = await source.fetchStatement(ticker, "income", STATEMENT_LINE_ITEMS.income);
  const cashFlow = await source.fetchStatement(ticker, "cash-flow", STATEMENT_LINE_ITEMS["cash-flow"]);
  const balanceSheet = await source.fetchStatement(
    ticker,
    "balance-sheet",
    STATEMENT_LINE_ITEMS["balance-sheet"]
  );

  const revenue = pickLatest(income, LINE_ITEM_ALIASES.revenue);
  const netIncome = pickLatest(income, LINE_ITEM_ALIASES.netIncome);
  const operatingCashFlow = pickLatest(cashFlow, LINE_ITEM_ALIASES.operatingCashFlow);
  const capitalExpenditure = pickLatest(cashFlow, LINE_ITEM_ALIASES.capitalExpenditure);
  const totalDebt = pickLatest(balanceSheet, LINE_ITEM_ALIASES.totalDebt) || 0;
  const cashAndEquivalents = pickLatest(balanceSheet, LINE_ITEM_ALIASES.cashAndEquivalents) || 0;

  const sharesOutstanding = await source.fetchSharesOutstanding(ticker);
  if (sharesOutstanding === null) {
    throw new DataUnavailableError(`Shares outstanding data unavailable for ${ticker}`);
  }

  return {
    revenue,
    netIncome,
    operatingCashFlow,
    capitalExpenditure,
    totalDebt,
    cashAndEquivalents,
    sharesOutstanding,
  };
}

/** First alias whose most recent period carries a value. */
export function pickLatest(table: StatementTable, aliases: readonly string[]): number | null {
  for (const label of aliases) {
    const latest = table.rows[label]?.[0];
    if (latest !== undefined && latest !== null) {
      return latest;
    }
  }
  return null;
}
