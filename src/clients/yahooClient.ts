import axios, { AxiosInstance } from 'axios';
import dayjs from 'dayjs';
import { formatEpochDate } from '../utils/dates';
import { ProviderRequestError } from '../utils/errors';
import { pickNumber, readRaw } from '../utils/format';

const COOKIE_URL = 'https://fc.yahoo.com';
const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
// Earliest period the time-series endpoint is asked for (1985-08-23)
const TIMESERIES_PERIOD_START = 493590046;

export type PeriodType = 'annual' | 'quarterly';

/** Line items keyed by display label; columns ordered newest first. */
export interface StatementTable {
  dates: string[];
  rows: Record<string, Array<number | null>>;
}

export interface YahooNewsItem {
  title?: string;
  publisher?: string;
  link?: string;
  providerPublishTime?: number;
  summary?: string;
  thumbnail?: { resolutions?: Array<{ url?: string; tag?: string }> };
}

export interface DailyBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface OptionContract {
  contractSymbol?: string;
  strike?: number;
  currency?: string;
  lastPrice?: number;
  change?: number;
  percentChange?: number;
  volume?: number;
  openInterest?: number;
  bid?: number;
  ask?: number;
  impliedVolatility?: number;
  inTheMoney?: boolean;
  lastTradeDate?: number;
}

export interface OptionChain {
  expirationDates: number[];
  calls: OptionContract[];
  puts: OptionContract[];
}

export interface YahooClient {
  fetchStatementSeries(ticker: string, period: PeriodType, labels: readonly string[]): Promise<StatementTable>;
  fetchQuoteSummary(ticker: string, modules: readonly string[]): Promise<Record<string, unknown> | null>;
  searchNews(ticker: string, count: number): Promise<YahooNewsItem[]>;
  fetchDailyHistory(ticker: string, from: dayjs.Dayjs, to: dayjs.Dayjs): Promise<DailyBar[]>;
  fetchOptionChain(ticker: string): Promise<OptionChain | null>;
}

export interface YahooClientOptions {
  baseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

interface YahooSession {
  cookie: string;
  crumb: string;
}

interface TimeseriesResponse {
  timeseries?: {
    result?: Array<Record<string, unknown>> | null;
  };
}

interface QuoteSummaryResponse {
  quoteSummary?: {
    result?: Array<Record<string, unknown>> | null;
    error?: { description?: string } | null;
  };
}

interface SearchResponse {
  news?: YahooNewsItem[];
}

interface ChartResponse {
  chart?: {
    result?: Array<{
      timestamp?: number[];
      indicators?: {
        quote?: Array<{
          open?: Array<number | null>;
          high?: Array<number | null>;
          low?: Array<number | null>;
          close?: Array<number | null>;
          volume?: Array<number | null>;
        }>;
      };
    }> | null;
    error?: { description?: string } | null;
  };
}

interface OptionsResponse {
  optionChain?: {
    result?: Array<{
      expirationDates?: number[];
      options?: Array<{ calls?: OptionContract[]; puts?: OptionContract[] }>;
    }> | null;
  };
}

export function createYahooClient({ baseUrl, timeoutMs, http }: YahooClientOptions): YahooClient {
  const client = http ?? axios.create({ timeout: timeoutMs });
  let session: YahooSession | null = null;

  async function openSession(): Promise<YahooSession> {
    if (session) return session;

    const cookieRes = await client.get(COOKIE_URL, {
      headers: { 'User-Agent': USER_AGENT },
      maxRedirects: 0,
      validateStatus: () => true
    });
    const rawCookies: unknown = cookieRes.headers['set-cookie'];
    const cookie = (Array.isArray(rawCookies) ? rawCookies : [])
      .filter((c): c is string => typeof c === 'string')
      .map((c) => c.split(';')[0])
      .join('; ');
    if (!cookie) {
      throw new ProviderRequestError('Yahoo', 'Yahoo session cookie unavailable');
    }

    const { data: crumb } = await client.get<string>(`${baseUrl}/v1/test/getcrumb`, {
      headers: { 'User-Agent': USER_AGENT, Cookie: cookie },
      responseType: 'text'
    });
    if (typeof crumb !== 'string' || !crumb.trim() || crumb.includes('<')) {
      throw new ProviderRequestError('Yahoo', 'Yahoo crumb unavailable');
    }

    session = { cookie, crumb: crumb.trim() };
    return session;
  }

  async function getJson<T>(path: string, params: Record<string, string | number | boolean>, ticker: string): Promise<T> {
    try {
      const { cookie, crumb } = await openSession();
      const { data } = await client.get<T>(`${baseUrl}${path}`, {
        params: { ...params, crumb },
        headers: { 'User-Agent': USER_AGENT, Cookie: cookie }
      });
      return data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 401) {
        // crumb expired; the next request opens a fresh session
        session = null;
      }
      throw wrapYahooError(error, path, ticker);
    }
  }

  return {
    async fetchStatementSeries(ticker, period, labels) {
      const typeToLabel = new Map(labels.map((label) => [`${period}${label.replace(/\s+/g, '')}`, label]));
      const data = await getJson<TimeseriesResponse>(
        `/ws/fundamentals-timeseries/v1/finance/timeseries/${encodeURIComponent(ticker)}`,
        {
          symbol: ticker,
          type: [...typeToLabel.keys()].join(','),
          period1: TIMESERIES_PERIOD_START,
          period2: dayjs().unix()
        },
        ticker
      );
      return buildStatementTable(data.timeseries?.result ?? [], typeToLabel);
    },

    async fetchQuoteSummary(ticker, modules) {
      const data = await getJson<QuoteSummaryResponse>(
        `/v10/finance/quoteSummary/${encodeURIComponent(ticker)}`,
        { modules: modules.join(','), formatted: false },
        ticker
      );
      const error = data.quoteSummary?.error;
      if (error) {
        throw new ProviderRequestError('Yahoo', `Yahoo quoteSummary error for ${ticker}: ${error.description ?? 'unknown'}`);
      }
      return data.quoteSummary?.result?.[0] ?? null;
    },

    async searchNews(ticker, count) {
      const data = await getJson<SearchResponse>('/v1/finance/search', { q: ticker, newsCount: count, quotesCount: 0 }, ticker);
      return data.news ?? [];
    },

    async fetchDailyHistory(ticker, from, to) {
      const data = await getJson<ChartResponse>(
        `/v8/finance/chart/${encodeURIComponent(ticker)}`,
        { period1: from.unix(), period2: to.unix(), interval: '1d' },
        ticker
      );
      const result = data.chart?.result?.[0];
      const timestamps = result?.timestamp ?? [];
      const quote = result?.indicators?.quote?.[0];

      const bars: DailyBar[] = [];
      timestamps.forEach((ts, idx) => {
        const open = pickNumber(quote?.open?.[idx]);
        const high = pickNumber(quote?.high?.[idx]);
        const low = pickNumber(quote?.low?.[idx]);
        const close = pickNumber(quote?.close?.[idx]);
        if (open === null || high === null || low === null || close === null) return;
        bars.push({
          date: formatEpochDate(ts),
          open,
          high,
          low,
          close,
          volume: pickNumber(quote?.volume?.[idx]) ?? 0
        });
      });
      return bars;
    },

    async fetchOptionChain(ticker) {
      const data = await getJson<OptionsResponse>(`/v7/finance/options/${encodeURIComponent(ticker)}`, {}, ticker);
      const result = data.optionChain?.result?.[0];
      if (!result) return null;
      const nearest = result.options?.[0];
      return {
        expirationDates: result.expirationDates ?? [],
        calls: nearest?.calls ?? [],
        puts: nearest?.puts ?? []
      };
    }
  };
}

function buildStatementTable(
  results: Array<Record<string, unknown>>,
  typeToLabel: Map<string, string>
): StatementTable {
  const byLabel = new Map<string, Map<string, number | null>>();
  const allDates = new Set<string>();

  for (const result of results) {
    for (const [type, label] of typeToLabel) {
      const series = result[type];
      if (!Array.isArray(series)) continue;
      const points: unknown[] = series;
      const values = byLabel.get(label) ?? new Map<string, number | null>();
      for (const point of points) {
        if (typeof point !== 'object' || point === null) continue;
        if (!('asOfDate' in point) || typeof point.asOfDate !== 'string') continue;
        const value = 'reportedValue' in point ? readRaw(point.reportedValue) : null;
        values.set(point.asOfDate, value);
        allDates.add(point.asOfDate);
      }
      byLabel.set(label, values);
    }
  }

  const dates = [...allDates].sort((a, b) => b.localeCompare(a));
  const rows: Record<string, Array<number | null>> = {};
  for (const [label, values] of byLabel) {
    rows[label] = dates.map((d) => values.get(d) ?? null);
  }
  return { dates, rows };
}

function wrapYahooError(error: unknown, path: string, ticker: string): Error {
  if (error instanceof ProviderRequestError) return error;
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const statusText = error.response?.statusText;
    return new ProviderRequestError(
      'Yahoo',
      `Yahoo request failed path=${path} ticker=${ticker} status=${status} ${statusText ?? ''} ${error.message}`,
      status
    );
  }
  if (error instanceof Error) {
    return new ProviderRequestError('Yahoo', `Yahoo request failed path=${path} ticker=${ticker}: ${error.message}`);
  }
  return new ProviderRequestError('Yahoo', `Yahoo request failed path=${path} ticker=${ticker}`);
}
