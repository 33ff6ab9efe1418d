import dayjs from "dayjs";
import { load } from "cheerio";
import type { DailyBar, YahooClient } from "../clients/yahooClient";
import { InvalidTimeFrameError } from "../utils/errors";

export const TIME_FRAME_DAYS = {
  "3m": 90,
  "6m": 180,
  "1y": 365,
  "5y": 365 * 5,
} as const;

export type TimeFrame = keyof typeof TIME_FRAME_DAYS;

// extra history so the 200-day average is warmed up at the start of the range
const MA_WARMUP_DAYS = 200;
const PLOTLY_CDN = "https://cdn.plot.ly/plotly-2.35.2.min.js";

export interface ChartPoint extends DailyBar {
  ma50: number;
  ma200: number;
}

export function parseTimeFrame(input: string): TimeFrame {
  const normalized = input.trim().toLowerCase();
  if (normalized === "3m" || normalized === "6m" || normalized === "1y" || normalized === "5y") {
    return normalized;
  }
  throw new InvalidTimeFrameError(input);
}

export async function generateStockChart(
  ticker: string,
  timeFrameInput: string,
  yahoo: YahooClient,
  today: dayjs.Dayjs = dayjs()
): Promise<string> {
  const symbol = ticker.trim().toUpperCase();
  const timeFrame = parseTimeFrame(timeFrameInput);
  const startDate = today.subtract(TIME_FRAME_DAYS[timeFrame], "day").format("YYYY-MM-DD");
  const extendedStart = dayjs(startDate).subtract(MA_WARMUP_DAYS, "day");

  const bars = await yahoo.fetchDailyHistory(symbol, extendedStart, today);
  const points = buildChartPoints(bars, startDate);
  if (!points.length) {
    throw new Error(`Could not fetch data for ${symbol}. Please check the stock symbol and dates.`);
  }

  return renderChartHtml(symbol, points);
}

/** Moving averages over the full history, then trimmed to the requested range. */
export function buildChartPoints(bars: DailyBar[], startDate: string): ChartPoint[] {
  const sorted = [...bars].sort((a, b) => a.date.localeCompare(b.date));
  const closes = sorted.map((b) => b.close);
  const ma50 = movingAverage(closes, 50);
  const ma200 = movingAverage(closes, 200);

  return sorted
    .map((bar, idx) => ({ ...bar, ma50: ma50[idx], ma200: ma200[idx] }))
    .filter((point) => point.date >= startDate);
}

export function movingAverage(series: number[], window: number): number[] {
  const result: number[] = [];
  for (let i = 0; i < series.length; i += 1) {
    const start = Math.max(0, i - window + 1);
    const slice = series.slice(start, i + 1);
    const avg = slice.reduce((s, v) => s + v, 0) / slice.length;
    result.push(avg);
  }
  return result;
}

export function renderChartHtml(symbol: string, points: ChartPoint[]): string {
  const dates = points.map((p) => p.date);
  const traces = [
    {
      type: "candlestick",
      x: dates,
      open: points.map((p) => p.open),
      high: points.map((p) => p.high),
      low: points.map((p) => p.low),
      close: points.map((p) => p.close),
      name: "OHLC",
      showlegend: true,
    },
    {
      type: "scatter",
      x: dates,
      y: points.map((p) => p.ma50),
      name: "50-day MA",
      line: { color: "blue", width: 1.5 },
      showlegend: true,
    },
    {
      type: "scatter",
      x: dates,
      y: points.map((p) => p.ma200),
      name: "200-day MA",
      line: { color: "orange", width: 1.5 },
      showlegend: true,
    },
    {
      type: "bar",
      x: dates,
      y: points.map((p) => p.volume),
      name: "Volume",
      marker: { color: points.map((p) => (p.close < p.open ? "red" : "green")) },
      opacity: 0.5,
      yaxis: "y2",
      showlegend: true,
    },
  ];
  const layout = {
    title: { text: `${symbol} Stock Price Chart`, x: 0.5, font: { size: 24 } },
    yaxis: { title: "Price", side: "left", showgrid: true },
    yaxis2: { title: "Volume", side: "right", overlaying: "y", showgrid: false },
    xaxis: { title: "Date", rangeslider: { visible: false } },
    legend: { x: 1.1, y: 0.9 },
    autosize: true,
    height: 1000,
    margin: { l: 50, r: 50, t: 50, b: 50 },
    paper_bgcolor: "white",
    plot_bgcolor: "white",
    showlegend: true,
    hovermode: "x unified",
  };
  const config = { displayModeBar: true, scrollZoom: true, responsive: true };

  const $ = load(
    `<!DOCTYPE html><html><head><meta charset="utf-8"><style>
body { margin: 0; padding: 0; overflow: hidden; }
#chart { width: 100vw; height: 100vh; }
</style></head><body><div id="chart"></div></body></html>`
  );
  $("head").prepend($("<title></title>").text(`${symbol} Stock Price Chart`));
  $("head").append($("<script></script>").attr("src", PLOTLY_CDN));
  $("body").append(
    `<script>Plotly.newPlot("chart", ${toScriptJson(traces)}, ${toScriptJson(layout)}, ${toScriptJson(config)});</script>`
  );
  return $.html();
}

// JSON that is safe inside an inline <script>
function toScriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, "\\u003c");
}
