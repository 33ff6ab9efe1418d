import axios, { AxiosInstance } from 'axios';
import { MissingApiKeyError, ProviderRequestError } from '../utils/errors';

export interface FmpProfile {
  symbol?: string;
  beta?: number | null;
  marketCap?: number | null;
}

export interface FmpTreasuryRate {
  date?: string;
  year10?: number | null;
}

export interface FmpQuote {
  symbol?: string;
  price?: number | null;
  marketCap?: number | null;
}

export interface FmpIncomeStatement {
  date?: string;
  interestExpense?: number | null;
  incomeTaxExpense?: number | null;
  incomeBeforeTax?: number | null;
}

export interface FmpBalanceSheet {
  date?: string;
  totalDebt?: number | null;
}

export interface FmpCashFlowStatement {
  date?: string;
  freeCashFlow?: number | null;
}

export interface FmpClient {
  requestProfile(ticker: string): Promise<FmpProfile[]>;
  requestTreasuryRates(): Promise<FmpTreasuryRate[]>;
  requestQuote(ticker: string): Promise<FmpQuote[]>;
  requestIncomeStatements(ticker: string, limit: number): Promise<FmpIncomeStatement[]>;
  requestBalanceSheets(ticker: string, limit: number): Promise<FmpBalanceSheet[]>;
  requestCashFlowStatements(ticker: string, limit: number): Promise<FmpCashFlowStatement[]>;
}

export interface FmpClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

export function createFmpClient({ apiKey, baseUrl, timeoutMs, http }: FmpClientOptions): FmpClient {
  const client = http ?? axios.create({ timeout: timeoutMs });

  async function requestList<T>(endpoint: string, params: Record<string, string | number>): Promise<T[]> {
    if (!apiKey) {
      throw new MissingApiKeyError('FMP_API_KEY');
    }
    try {
      const { data } = await client.get<T[] | { 'Error Message'?: string }>(`${baseUrl}/${endpoint}`, {
        params: { ...params, apikey: apiKey }
      });
      if (Array.isArray(data)) return data;
      // FMP reports plan/key problems as a 200 with an error object
      const reason = data?.['Error Message'] ?? 'unexpected payload';
      throw new ProviderRequestError('FMP', `FMP(${endpoint}) returned an error: ${reason}`);
    } catch (error) {
      throw wrapFmpError(error, endpoint, params.symbol);
    }
  }

  return {
    requestProfile: (ticker) => requestList<FmpProfile>('profile', { symbol: ticker }),
    requestTreasuryRates: () => requestList<FmpTreasuryRate>('treasury-rates', {}),
    requestQuote: (ticker) => requestList<FmpQuote>('quote', { symbol: ticker }),
    requestIncomeStatements: (ticker, limit) =>
      requestList<FmpIncomeStatement>('income-statement', { symbol: ticker, limit }),
    requestBalanceSheets: (ticker, limit) =>
      requestList<FmpBalanceSheet>('balance-sheet-statement', { symbol: ticker, limit }),
    requestCashFlowStatements: (ticker, limit) =>
      requestList<FmpCashFlowStatement>('cash-flow-statement', { symbol: ticker, limit })
  };
}

function wrapFmpError(error: unknown, endpoint: string, symbol?: string | number): Error {
  if (error instanceof ProviderRequestError) return error;
  const target = symbol === undefined ? '' : ` symbol=${symbol}`;
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const statusText = error.response?.statusText;
    return new ProviderRequestError(
      'FMP',
      `FMP(${endpoint}) request failed${target} status=${status} ${statusText ?? ''} ${error.message}`,
      status
    );
  }
  if (error instanceof Error) {
    return new ProviderRequestError('FMP', `FMP(${endpoint}) request failed${target}: ${error.message}`);
  }
  return new ProviderRequestError('FMP', `FMP(${endpoint}) request failed${target}`);
}
