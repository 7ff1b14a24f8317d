import type { IndicatorParams, SignalThresholds } from "./types";

export const DEFAULT_INDICATOR_PARAMS: Readonly<IndicatorParams> = Object.freeze({
  emaFast: 7,
  emaSlow: 25,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  rsiWindow: 7,
  adxWindow: 14,
  bbWindow: 20,
  bbStdDev: 2,
  volWindow: 20,
});

export const DEFAULT_SIGNAL_THRESHOLDS: Readonly<SignalThresholds> = Object.freeze({
  adxThreshold: 25,
  rsiBuyMin: 50,
  rsiBuyMax: 65,
  rsiSellMin: 35,
  rsiSellMax: 50,
});

/** Maior janela de lookback + 1: mínimo de candles para a última linha sair sem null. */
export function minimumHistory(
  params: Readonly<Pick<IndicatorParams, "adxWindow" | "bbWindow" | "volWindow">>,
): number {
  return Math.max(params.adxWindow, params.bbWindow, params.volWindow) + 1;
}
