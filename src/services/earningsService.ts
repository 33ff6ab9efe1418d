import dayjs from "dayjs";
import type { YahooClient } from "../clients/yahooClient";
import { formatEpochDate } from "../utils/dates";
import { formatBillions, readRaw } from "../utils/format";

export interface QuarterlyEarnings {
  date: string;
  revenue: string;
  net_income: string;
  eps: string;
}

export interface EarningsReport {
  earnings_data: QuarterlyEarnings[];
  upcoming_earnings: string;
}

const QUARTERS = 4;
const REVENUE = "Total Revenue";
const NET_INCOME = "Net Income";
const DILUTED_EPS = "Diluted EPS";

export async function getEarnings(ticker: string, yahoo: YahooClient): Promise<EarningsReport> {
  const table = await yahoo.fetchStatementSeries(ticker, "quarterly", [REVENUE, NET_INCOME, DILUTED_EPS]);

  const revenueRow = table.rows[REVENUE] ?? [];
  const reportedQuarters = table.dates
    .map((date, idx) => ({ date, idx }))
    .filter(({ idx }) => revenueRow[idx] !== null && revenueRow[idx] !== undefined)
    .slice(0, QUARTERS);

  const earningsData: QuarterlyEarnings[] = [];
  reportedQuarters.forEach(({ date, idx }) => {
    const revenue = revenueRow[idx] ?? null;
    const netIncome = table.rows[NET_INCOME]?.[idx] ?? null;
    const eps = table.rows[DILUTED_EPS]?.[idx] ?? null;
    // only quarters with all three figures
    if (revenue === null || netIncome === null || eps === null) return;
    earningsData.push({
      date: dayjs(date).format("YYYY-MM-DD"),
      revenue: formatBillions(revenue),
      net_income: formatBillions(netIncome),
      eps: eps.toFixed(2),
    });
  });

  return {
    earnings_data: earningsData,
    upcoming_earnings: await fetchUpcomingEarningsDate(ticker, yahoo),
  };
}

async function fetchUpcomingEarningsDate(ticker: string, yahoo: YahooClient): Promise<string> {
  try {
    const summary = await yahoo.fetchQuoteSummary(ticker, ["calendarEvents"]);
    const calendar = summary?.calendarEvents;
    if (typeof calendar !== "object" || calendar === null || !("earnings" in calendar)) return "N/A";
    const earnings = calendar.earnings;
    if (typeof earnings !== "object" || earnings === null || !("earningsDate" in earnings)) return "N/A";
    const dates = earnings.earningsDate;
    if (!Array.isArray(dates) || !dates.length) return "N/A";

    const first: unknown = dates[0];
    const epochSeconds = readRaw(first);
    if (epochSeconds !== null) return formatEpochDate(epochSeconds);
    // some responses carry ISO strings instead of epoch seconds
    if (typeof first === "string" && dayjs(first).isValid()) return dayjs(first).format("YYYY-MM-DD");
    return "N/A";
  } catch (err) {
    console.warn(`[earnings] ${ticker} calendar unavailable: ${(err as Error).message}`);
    return "N/A";
  }
}
