import { EMAIndicator } from "./ema";

export type MacdParams = {
  closes: readonly number[];
  fastPeriod: number; // default 12
  slowPeriod: number; // default 26
  signalPeriod: number; // default 9
};

export type MacdSeries = {
  macd: number[];
  signal: number[];
  histogram: number[];
};

export class MACDIndicator {
  static calculate({ closes, fastPeriod, slowPeriod, signalPeriod }: MacdParams): MacdSeries {
    const fast = EMAIndicator.calculate({ values: closes, span: fastPeriod });
    const slow = EMAIndicator.calculate({ values: closes, span: slowPeriod });
    const macd = fast.map((f, i) => f - slow[i]);
    // linha de sinal = EMA do próprio MACD
    const signal = EMAIndicator.calculate({ values: macd, span: signalPeriod });
    const histogram = macd.map((m, i) => m - signal[i]);
    return { macd, signal, histogram };
  }
}
