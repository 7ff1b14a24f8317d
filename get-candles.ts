import { ZodError } from "zod";
import { DataUnavailableError } from "./errors";
import { parseCandleSeries } from "./indicators/candles";
import type { CandleSeries } from "./indicators/types";

/** Fonte externa de candles (Binance, arquivo, fake de teste...). */
export interface DataSource {
  fetchCandles(symbol: string, timeframe: string, limit: number): Promise<CandleSeries>;
}

export async function getCandles(
  source: DataSource,
  symbol: string,
  timeframe: string,
  limit: number,
): Promise<CandleSeries> {
  const candles = await source.fetchCandles(symbol, timeframe, limit);
  if (!candles.length) {
    throw new DataUnavailableError(`Nenhum candle retornado para ${symbol} ${timeframe}.`, { symbol, timeframe });
  }
  try {
    return parseCandleSeries(candles);
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    const first = err.issues[0];
    throw new DataUnavailableError(
      `Série inválida para ${symbol} ${timeframe}: ${first.path.join(".")} ${first.message}`,
      { symbol, timeframe },
      { cause: err },
    );
  }
}
