import type { YahooClient, YahooNewsItem } from "../clients/yahooClient";
import { formatEpochIso } from "../utils/dates";

export interface NewsArticle {
  title: string;
  summary: string;
  pubDate: string;
  provider: string;
  thumbnailUrl: string;
  url: string;
}

export interface NoNewsMessage {
  message: string;
}

const MAX_NEWS = 10;

export async function getStockNews(
  ticker: string,
  yahoo: YahooClient,
  maxNews = MAX_NEWS
): Promise<NewsArticle[] | NoNewsMessage> {
  const items = await yahoo.searchNews(ticker, maxNews);
  const articles = items.filter((item) => item.title?.trim()).map(normalizeNewsItem);

  if (!articles.length) {
    return { message: `No news found for ${ticker}.` };
  }
  return articles;
}

function normalizeNewsItem(item: YahooNewsItem): NewsArticle {
  return {
    title: item.title?.trim() || "No title available",
    summary: item.summary?.trim() || "No summary available",
    pubDate: formatPublishTime(item.providerPublishTime),
    provider: item.publisher || "No provider available",
    thumbnailUrl: pickThumbnail(item) || "No thumbnail available",
    url: item.link || "No URL available",
  };
}

function formatPublishTime(epochSeconds?: number): string {
  if (typeof epochSeconds !== "number" || !Number.isFinite(epochSeconds)) {
    return "No publish date available";
  }
  return formatEpochIso(epochSeconds);
}

function pickThumbnail(item: YahooNewsItem): string | undefined {
  const resolutions = item.thumbnail?.resolutions ?? [];
  const original = resolutions.find((r) => r.tag === "original") ?? resolutions[0];
  return original?.url;
}

export function isNoNewsMessage(result: NewsArticle[] | NoNewsMessage): result is NoNewsMessage {
  return !Array.isArray(result);
}
