export type TSignal = "BUY" | "SELL" | "NEUTRAL"; // classificação de um snapshot

export type Candle = {
  readonly openTime: number; // epoch ms
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
};

export type CandleSeries = readonly Candle[];

/** Visão em colunas da série (formato consumido pelos indicadores). */
export type Candles = {
  highs: number[];
  lows: number[];
  closes: number[];
  volumes: number[];
  times: number[];
};

export type IndicatorParams = {
  emaFast: number;
  emaSlow: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  rsiWindow: number;
  adxWindow: number;
  bbWindow: number;
  bbStdDev: number;
  volWindow: number;
};

export type SignalThresholds = {
  adxThreshold: number;
  rsiBuyMin: number; // inclusive
  rsiBuyMax: number; // inclusive
  rsiSellMin: number; // inclusive
  rsiSellMax: number; // inclusive
};

export interface IIndicatorSnapshot {
  openTime: number;
  close: number;
  volume: number;

  emaFast: number;
  emaSlow: number;
  macd: number;
  macdSignal: number;
  macdHistogram: number;
  rsi: number;

  // família ADX; DIs ficam null enquanto as somas móveis aquecem
  adx: number;
  dx: number | null;
  plusDI: number | null;
  minusDI: number | null;

  bbUpper: number | null;
  bbMiddle: number | null;
  bbLower: number | null;

  volMa: number | null;
}
