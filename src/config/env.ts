import dotenv from 'dotenv';

dotenv.config();

export const PORT = Number(process.env.PORT) || 3000;
export const FMP_API_KEY = process.env.FMP_API_KEY || '';
export const FMP_BASE_URL = process.env.FMP_BASE_URL || 'https://financialmodelingprep.com/stable';
export const YAHOO_BASE_URL = process.env.YAHOO_BASE_URL || 'https://query2.finance.yahoo.com';
export const HTTP_TIMEOUT_MS = Number.isFinite(Number(process.env.HTTP_TIMEOUT_MS)) && Number(process.env.HTTP_TIMEOUT_MS) > 0
  ? Number(process.env.HTTP_TIMEOUT_MS)
  : 8000;
