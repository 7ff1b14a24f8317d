import { z } from "zod";
import type { Candle, Candles, CandleSeries } from "./types";

const finite = z.number().finite();

export const CandleSchema = z.object({
  openTime: z.number().int().nonnegative(),
  open: finite,
  high: finite,
  low: finite,
  close: finite,
  volume: finite.nonnegative(),
});

export const CandleSeriesSchema = z.array(CandleSchema).superRefine((candles, ctx) => {
  for (let i = 1; i < candles.length; i++) {
    if (candles[i].openTime <= candles[i - 1].openTime) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, "openTime"],
        message: `openTime must be strictly ascending (${candles[i - 1].openTime} -> ${candles[i].openTime})`,
      });
    }
  }
});

export function parseCandleSeries(input: unknown): CandleSeries {
  const candles: Candle[] = CandleSeriesSchema.parse(input);
  return candles;
}

export function toColumns(series: CandleSeries): Candles {
  return {
    highs: series.map((c) => c.high),
    lows: series.map((c) => c.low),
    closes: series.map((c) => c.close),
    volumes: series.map((c) => c.volume),
    times: series.map((c) => c.openTime),
  };
}
