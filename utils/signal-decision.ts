import { DEFAULT_SIGNAL_THRESHOLDS } from "../indicators/params";
import type { IIndicatorSnapshot, SignalThresholds, TSignal } from "../indicators/types";

export type TCondition = "emaTrend" | "macdMomentum" | "rsiBand" | "adxStrength" | "volumeConfirm" | "bbBreakout";

export type ConditionSet = Record<TCondition, boolean>;

export const CONDITIONS: readonly TCondition[] = [
  "emaTrend",
  "macdMomentum",
  "rsiBand",
  "adxStrength",
  "volumeConfirm",
  "bbBreakout",
];

export type SignalBreakdown = {
  buy: ConditionSet;
  sell: ConditionSet;
  signal: TSignal;
};

const gt = (a: number | null, b: number | null) => a != null && b != null && a > b;
const lt = (a: number | null, b: number | null) => a != null && b != null && a < b;
const gte = (a: number | null, b: number | null) => a != null && b != null && a >= b;
const within = (v: number, min: number, max: number) => v >= min && v <= max;

export function failedConditions(c: ConditionSet): TCondition[] {
  return CONDITIONS.filter((k) => !c[k]);
}

export function evaluateConditions(
  s: IIndicatorSnapshot,
  t: Readonly<SignalThresholds> = DEFAULT_SIGNAL_THRESHOLDS,
): SignalBreakdown {
  // ADX e volume valem para os dois lados
  const adxStrength = gte(s.adx, t.adxThreshold);
  const volumeConfirm = gte(s.volume, s.volMa);

  const buy: ConditionSet = {
    emaTrend: gt(s.emaFast, s.emaSlow),
    macdMomentum: gt(s.macd, s.macdSignal),
    rsiBand: within(s.rsi, t.rsiBuyMin, t.rsiBuyMax),
    adxStrength,
    volumeConfirm,
    bbBreakout: gt(s.close, s.bbUpper),
  };
  const sell: ConditionSet = {
    emaTrend: lt(s.emaFast, s.emaSlow),
    macdMomentum: lt(s.macd, s.macdSignal),
    rsiBand: within(s.rsi, t.rsiSellMin, t.rsiSellMax),
    adxStrength,
    volumeConfirm,
    bbBreakout: lt(s.close, s.bbLower),
  };

  const all = (c: ConditionSet) => failedConditions(c).length === 0;
  const signal: TSignal = all(buy) ? "BUY" : all(sell) ? "SELL" : "NEUTRAL";
  return { buy, sell, signal };
}

export function decideSignal(
  s: IIndicatorSnapshot,
  t: Readonly<SignalThresholds> = DEFAULT_SIGNAL_THRESHOLDS,
): TSignal {
  return evaluateConditions(s, t).signal;
}
