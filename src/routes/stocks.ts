import { Request, Response, Router } from 'express';
import type { YahooClient } from '../clients/yahooClient';
import { generateStockChart } from '../services/chartService';
import { DcfDataSources, runDcf } from '../services/dcfService';
import { getEarnings } from '../services/earningsService';
import { getStockNews, isNoNewsMessage } from '../services/newsService';
import { getUnusualOptions } from '../services/optionsService';
import { InvalidTimeFrameError, NoOptionsDataError } from '../utils/errors';

export interface StockRouteDependencies {
  yahoo: YahooClient;
  dcfSources: DcfDataSources;
}

interface ErrorBody {
  error: string;
}

function readTicker(req: Request): string {
  const raw = req.query.ticker;
  return typeof raw === 'string' ? raw.trim().toUpperCase() : '';
}

function readString(req: Request, name: string): string {
  const raw = req.query[name];
  return typeof raw === 'string' ? raw.trim() : '';
}

function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}

// Routes validate query parameters and map errors to status codes
export function createStockRouter({ yahoo, dcfSources }: StockRouteDependencies): Router {
  const router = Router();

  router.get('/api/get_stock_news', async (req: Request, res: Response) => {
    const ticker = readTicker(req);
    if (!ticker) {
      return res.status(400).json({ error: 'Ticker is required!' } satisfies ErrorBody);
    }
    try {
      const news = await getStockNews(ticker, yahoo);
      if (isNoNewsMessage(news)) {
        return res.status(404).json(news);
      }
      return res.json(news);
    } catch (error) {
      console.warn(`[news] ${ticker}: ${errorMessage(error, 'unknown error')}`);
      return res.status(500).json({ error: errorMessage(error, 'Service error') } satisfies ErrorBody);
    }
  });

  router.get('/api/get_dcf', async (req: Request, res: Response) => {
    const ticker = readTicker(req);
    if (!ticker) {
      return res.status(400).json({ error: 'Ticker symbol is required' } satisfies ErrorBody);
    }
    // failures are already folded into { error }
    return res.json(await runDcf(ticker, dcfSources));
  });

  router.get('/api/earnings', async (req: Request, res: Response) => {
    const ticker = readTicker(req);
    if (!ticker) {
      return res.status(400).json({ error: 'Ticker symbol is required' } satisfies ErrorBody);
    }
    try {
      return res.json(await getEarnings(ticker, yahoo));
    } catch (error) {
      console.warn(`[earnings] ${ticker}: ${errorMessage(error, 'unknown error')}`);
      return res.status(500).json({ error: errorMessage(error, 'Service error') } satisfies ErrorBody);
    }
  });

  router.get('/generate_stock_chart', async (req: Request, res: Response) => {
    const ticker = readTicker(req);
    const timeFrame = readString(req, 'time_frame');
    if (!ticker || !timeFrame) {
      return res
        .status(400)
        .json({ error: "Missing required parameters: 'ticker' or 'time_frame'" } satisfies ErrorBody);
    }
    try {
      const html = await generateStockChart(ticker, timeFrame, yahoo);
      return res.type('text/html').send(html);
    } catch (error) {
      const status = error instanceof InvalidTimeFrameError ? 400 : 500;
      return res.status(status).json({ error: errorMessage(error, 'Service error') } satisfies ErrorBody);
    }
  });

  router.get('/api/stocks/options', async (req: Request, res: Response) => {
    const ticker = readTicker(req);
    if (!ticker) {
      return res.status(400).json({ error: 'Ticker is required!' } satisfies ErrorBody);
    }
    try {
      return res.json(await getUnusualOptions(ticker, yahoo));
    } catch (error) {
      const status = error instanceof NoOptionsDataError ? 404 : 500;
      return res.status(status).json({ error: errorMessage(error, 'Service error') } satisfies ErrorBody);
    }
  });

  return router;
}
