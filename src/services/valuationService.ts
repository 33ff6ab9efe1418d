import { ComputationError } from "../utils/errors";
import { formatFinancialNumber, formatPercent } from "../utils/format";

export interface DcfInputs {
  debt: number;
  cash: number;
  sharesOutstanding: number;
  growthRate: number;
  discountRate: number;
  revenue: number | null;
  netIncome: number | null;
  operatingCashFlow: number | null;
  capitalExpenditure: number | null;
  years?: number;
}

export interface DcfValuation {
  intrinsicValuePerShare: number;
  explanation: string;
}

export const DEFAULT_PROJECTION_YEARS = 5;
export const TERMINAL_GROWTH_CAP = 0.03;
export const TERMINAL_SPREAD_FLOOR = 0.01;

export function resolveTerminalGrowthRate(growthRate: number, discountRate: number): number {
  const capped = Math.min(growthRate, TERMINAL_GROWTH_CAP);
  // perpetuity formula needs discount rate > terminal growth
  return discountRate <= capped ? discountRate - TERMINAL_SPREAD_FLOOR : capped;
}

export function calculateDcf(inputs: DcfInputs): DcfValuation {
  const {
    debt,
    cash,
    sharesOutstanding,
    growthRate,
    discountRate,
    revenue,
    netIncome,
    operatingCashFlow,
    capitalExpenditure,
    years = DEFAULT_PROJECTION_YEARS,
  } = inputs;

  if (operatingCashFlow === null || capitalExpenditure === null) {
    throw new ComputationError("Operating cash flow and capital expenditure are required to compute free cash flow");
  }
  if (sharesOutstanding === 0) {
    throw new ComputationError("division by zero: shares outstanding is 0");
  }

  // capex is reported as a negative outflow
  const currentFcf = operatingCashFlow + capitalExpenditure;

  const discountedFcfs: number[] = [];
  for (let year = 1; year <= years; year += 1) {
    const projected = currentFcf * (1 + growthRate) ** year;
    discountedFcfs.push(projected / (1 + discountRate) ** year);
  }
  const totalDiscountedFcf = discountedFcfs.reduce((s, v) => s + v, 0);

  const terminalGrowthRate = resolveTerminalGrowthRate(growthRate, discountRate);
  const terminalYearFcf = currentFcf * (1 + growthRate) ** years;
  const terminalValue = (terminalYearFcf * (1 + terminalGrowthRate)) / (discountRate - terminalGrowthRate);
  const terminalValueDiscounted = terminalValue / (1 + discountRate) ** years;

  const enterpriseValue = totalDiscountedFcf + terminalValueDiscounted;
  const equityValue = enterpriseValue - debt + cash;
  const intrinsicValuePerShare = equityValue / sharesOutstanding;

  const lines: string[] = [];
  lines.push("Explanation:");
  lines.push("");
  lines.push("Valuation Breakdown:");
  lines.push(`1. Current FCF: ${formatFinancialNumber(currentFcf)}`);
  lines.push("2. Projected FCFs (Present Value):");
  discountedFcfs.forEach((value, idx) => {
    lines.push(`   Year ${idx + 1}: ${formatFinancialNumber(value)}`);
  });
  lines.push(`   Total PV of FCFs: ${formatFinancialNumber(totalDiscountedFcf)}`);
  lines.push(`3. Terminal Value (PV): ${formatFinancialNumber(terminalValueDiscounted)}`);
  lines.push(`4. Enterprise Value: ${formatFinancialNumber(enterpriseValue)}`);
  lines.push(`5. Equity Value: ${formatFinancialNumber(equityValue)}`);
  lines.push("");
  lines.push("Key Financials:");
  lines.push(`Revenue: ${formatFinancialNumber(revenue)}`);
  lines.push(`Net Income: ${formatFinancialNumber(netIncome)}`);
  lines.push(`Operating Cash Flow: ${formatFinancialNumber(operatingCashFlow)}`);
  lines.push(`CapEx: ${formatFinancialNumber(capitalExpenditure)}`);
  lines.push(`Debt: ${formatFinancialNumber(debt)}`);
  lines.push(`Cash: ${formatFinancialNumber(cash)}`);
  lines.push(`WACC: ${formatPercent(discountRate)}`);
  lines.push(`Growth Rate: ${formatPercent(growthRate)}`);
  lines.push(`Terminal Growth Rate: ${formatPercent(terminalGrowthRate)}`);

  return { intrinsicValuePerShare, explanation: lines.join("\n") };
}
