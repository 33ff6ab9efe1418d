import { FMP_API_KEY, FMP_BASE_URL, HTTP_TIMEOUT_MS, PORT, YAHOO_BASE_URL } from './config/env';
import express, { Express } from 'express';
import { createFmpClient } from './clients/fmpClient';
import { createYahooClient } from './clients/yahooClient';
import { createStockRouter, StockRouteDependencies } from './routes/stocks';
import { createFmpCapitalCostSource, createYahooStatementsSource } from './services/dataSources';

export function createDefaultDependencies(): StockRouteDependencies {
  const yahoo = createYahooClient({ baseUrl: YAHOO_BASE_URL, timeoutMs: HTTP_TIMEOUT_MS });
  const fmp = createFmpClient({ apiKey: FMP_API_KEY, baseUrl: FMP_BASE_URL, timeoutMs: HTTP_TIMEOUT_MS });
  return {
    yahoo,
    dcfSources: {
      statements: createYahooStatementsSource(yahoo),
      capitalCost: createFmpCapitalCostSource(fmp)
    }
  };
}

export function createApp(deps: StockRouteDependencies = createDefaultDependencies()): Express {
  const app = express();
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });
  app.use(createStockRouter(deps));

  return app;
}

if (require.main === module) {
  if (!FMP_API_KEY) {
    console.warn('FMP_API_KEY is not set; /api/get_dcf will report it as missing');
  }
  createApp().listen(PORT, () => {
    console.log(`Stock analysis server listening on ${PORT}`);
  });
}
