import type { OptionContract, YahooClient } from "../clients/yahooClient";
import { formatEpochDate, formatEpochIso } from "../utils/dates";
import { NoOptionsDataError } from "../utils/errors";
import { pickNumber } from "../utils/format";

export interface UnusualContract {
  contractSymbol: string;
  strike: number | null;
  lastPrice: number | null;
  bid: number | null;
  ask: number | null;
  change: number | null;
  percentChange: number | null;
  volume: number;
  openInterest: number;
  impliedVolatility: number | null;
  inTheMoney: boolean;
  lastTradeDate: string | null;
  volumeOIratio: number;
}

export interface UnusualOptionsActivity {
  symbol: string;
  expiration_date: string;
  unusual_calls: UnusualContract[];
  unusual_puts: UnusualContract[];
}

export const UNUSUAL_VOLUME_OI_RATIO = 2;

export async function getUnusualOptions(ticker: string, yahoo: YahooClient): Promise<UnusualOptionsActivity> {
  const chain = await yahoo.fetchOptionChain(ticker);
  if (!chain || !chain.expirationDates.length) {
    throw new NoOptionsDataError();
  }

  // chain is the nearest expiration
  const nearest = Math.min(...chain.expirationDates);
  return {
    symbol: ticker,
    expiration_date: formatEpochDate(nearest),
    unusual_calls: filterUnusual(chain.calls),
    unusual_puts: filterUnusual(chain.puts),
  };
}

export function filterUnusual(contracts: OptionContract[]): UnusualContract[] {
  const unusual: UnusualContract[] = [];
  for (const contract of contracts) {
    const volume = pickNumber(contract.volume);
    const openInterest = pickNumber(contract.openInterest);
    if (volume === null || openInterest === null) continue;

    // +1 keeps zero open interest from dividing by zero
    const volumeOIratio = volume / (openInterest + 1);
    if (volumeOIratio <= UNUSUAL_VOLUME_OI_RATIO) continue;

    unusual.push({
      contractSymbol: contract.contractSymbol ?? "",
      strike: pickNumber(contract.strike),
      lastPrice: pickNumber(contract.lastPrice),
      bid: pickNumber(contract.bid),
      ask: pickNumber(contract.ask),
      change: pickNumber(contract.change),
      percentChange: pickNumber(contract.percentChange),
      volume,
      openInterest,
      impliedVolatility: pickNumber(contract.impliedVolatility),
      inTheMoney: contract.inTheMoney ?? false,
      lastTradeDate: formatTradeTime(contract.lastTradeDate),
      volumeOIratio,
    });
  }
  return unusual;
}

function formatTradeTime(epochSeconds?: number): string | null {
  const value = pickNumber(epochSeconds);
  return value === null ? null : formatEpochIso(value);
}
