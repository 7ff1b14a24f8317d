import qs from "qs";
import { z } from "zod";
import { DataUnavailableError, errorMessage } from "./errors";
import type { DataSource } from "./get-candles";
import type { Candle } from "./indicators/types";
import { createHttpClient, type HttpClient } from "./utils/http";
import { retryWithBackoff } from "./utils/retry";
import type { SleepFn } from "./utils/sleep";

const BINANCE_SPOT = "https://api.binance.com";
const BINANCE_FUT = "https://fapi.binance.com";

export type Market = "spot" | "futures";

export type BinanceOptions = {
  market?: Market;
  baseUrl?: string; // sobrescreve o host padrão do mercado
  timeoutMs?: number; // default 10s
  retries?: number; // tentativas por fetch (default 3)
  retryDelayMs?: number;
  http?: Pick<HttpClient, "get">;
  sleep?: SleepFn;
};

// [openTime, open, high, low, close, volume, closeTime, ...]
const KlineSchema = z
  .tuple([z.number(), z.string(), z.string(), z.string(), z.string(), z.string(), z.number()])
  .rest(z.unknown());
const KlinesSchema = z.array(KlineSchema);

export function parseKlines(data: unknown): Candle[] {
  return KlinesSchema.parse(data).map((k) => ({
    openTime: k[0],
    open: parseFloat(k[1]),
    high: parseFloat(k[2]),
    low: parseFloat(k[3]),
    close: parseFloat(k[4]),
    volume: parseFloat(k[5]),
  }));
}

export class BinanceDataSource implements DataSource {
  private readonly market: Market;
  private readonly baseUrl: string;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly http: Pick<HttpClient, "get">;
  private readonly sleep?: SleepFn;

  constructor({
    market = "spot",
    baseUrl,
    timeoutMs = 10_000,
    retries = 3,
    retryDelayMs = 500,
    http,
    sleep,
  }: BinanceOptions = {}) {
    this.market = market;
    this.baseUrl = baseUrl ?? (market === "spot" ? BINANCE_SPOT : BINANCE_FUT);
    this.retries = retries;
    this.retryDelayMs = retryDelayMs;
    this.http = http ?? createHttpClient(timeoutMs);
    this.sleep = sleep;
  }

  klinesUrl(symbol: string, interval: string, limit: number): string {
    const path = this.market === "spot" ? "/api/v3/klines" : "/fapi/v1/klines";
    return `${this.baseUrl}${path}?${qs.stringify({ symbol, interval, limit })}`;
  }

  async fetchCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
    const url = this.klinesUrl(symbol, timeframe, limit);
    try {
      const { data } = await retryWithBackoff(() => this.http.get(url), {
        maxAttempts: this.retries,
        initialDelay: this.retryDelayMs,
        sleep: this.sleep,
        onRetry: (attempt, err) =>
          console.warn(`[binance] ${symbol} ${timeframe}: tentativa ${attempt} falhou (${errorMessage(err)})`),
      });
      return parseKlines(data);
    } catch (err) {
      throw new DataUnavailableError(
        `Falha ao buscar candles ${symbol} ${timeframe}: ${errorMessage(err)}`,
        { symbol, timeframe },
        { cause: err },
      );
    }
  }
}
