import { describe, it } from "node:test";
import assert from "node:assert/strict";
import dayjs from "dayjs";
import { load } from "cheerio";

import { buildChartPoints, generateStockChart, movingAverage, parseTimeFrame } from "../chartService";
import { InvalidTimeFrameError } from "../../utils/errors";
import { fakeYahooClient } from "../../test/fakeYahoo";
import type { DailyBar } from "../../clients/yahooClient";

function bar(date: string, close: number, open = close): DailyBar {
  return { date, open, high: Math.max(open, close) + 1, low: Math.min(open, close) - 1, close, volume: 1000 };
}

describe("parseTimeFrame", () => {
  it("accepts the supported frames case-insensitively", () => {
    assert.equal(parseTimeFrame("3m"), "3m");
    assert.equal(parseTimeFrame(" 1Y "), "1y");
  });

  it("rejects anything else", () => {
    assert.throws(() => parseTimeFrame("2w"), InvalidTimeFrameError);
  });
});

describe("movingAverage", () => {
  it("averages over the available window at the start of the series", () => {
    assert.deepEqual(movingAverage([2, 4, 6, 8], 2), [2, 3, 5, 7]);
    assert.deepEqual(movingAverage([3, 6, 9], 5), [3, 4.5, 6]);
  });
});

describe("buildChartPoints", () => {
  it("computes averages on the full history before trimming", () => {
    const bars = [bar("2024-01-03", 30), bar("2024-01-01", 10), bar("2024-01-02", 20)];

    const points = buildChartPoints(bars, "2024-01-02");

    assert.deepEqual(
      points.map((p) => [p.date, p.ma50, p.ma200]),
      [
        ["2024-01-02", 15, 15],
        ["2024-01-03", 20, 20],
      ]
    );
  });
});

describe("generateStockChart", () => {
  it("fetches the warm-up window and renders a Plotly page", async () => {
    let requested: [string, string, string] | null = null;
    const yahoo = fakeYahooClient({
      fetchDailyHistory: async (ticker, from, to) => {
        requested = [ticker, from.format("YYYY-MM-DD"), to.format("YYYY-MM-DD")];
        return [bar("2023-12-01", 90), bar("2024-04-02", 100, 105), bar("2024-04-03", 110, 100)];
      },
    });

    const html = await generateStockChart("aapl", "3m", yahoo, dayjs("2024-06-30"));

    assert.deepEqual(requested, ["AAPL", "2023-09-14", "2024-06-30"]);
    const $ = load(html);
    assert.equal($("title").text(), "AAPL Stock Price Chart");
    assert.equal($("head script").attr("src"), "https://cdn.plot.ly/plotly-2.35.2.min.js");
    const inline = $("body script").text();
    assert.ok(inline.startsWith('Plotly.newPlot("chart", '));
    assert.ok(inline.includes('"x":["2024-04-02","2024-04-03"]'));
    assert.ok(inline.includes('"y":[95,100],"name":"50-day MA"'));
    assert.ok(inline.includes('"marker":{"color":["red","green"]}'));
    assert.ok(inline.includes('"text":"AAPL Stock Price Chart"'));
  });

  it("fails when the provider has no history in range", async () => {
    const yahoo = fakeYahooClient({ fetchDailyHistory: async () => [bar("2020-01-01", 5)] });

    await assert.rejects(generateStockChart("MSFT", "6m", yahoo, dayjs("2024-06-30")), {
      message: "Could not fetch data for MSFT. Please check the stock symbol and dates.",
    });
  });

  it("rejects an unsupported time frame before fetching", async () => {
    const yahoo = fakeYahooClient({});

    await assert.rejects(generateStockChart("MSFT", "10y", yahoo), InvalidTimeFrameError);
  });
});
