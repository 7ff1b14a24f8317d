import { last } from "../utils/last";
import { ADXIndicator } from "./adx";
import { BollingerBandsIndicator } from "./bollinger-bands";
import { toColumns } from "./candles";
import { EMAIndicator } from "./ema";
import { MACDIndicator } from "./macd";
import { DEFAULT_INDICATOR_PARAMS } from "./params";
import { RSIIndicator } from "./rsi";
import type { CandleSeries, IIndicatorSnapshot, IndicatorParams } from "./types";
import { VolumeIndicator } from "./volume";

/**
 * Série completa de snapshots, uma linha por candle, sem look-ahead.
 * Nunca lança: série curta só deixa null nas linhas de aquecimento.
 */
export function computeIndicators(
  series: CandleSeries,
  params: Readonly<IndicatorParams> = DEFAULT_INDICATOR_PARAMS,
): IIndicatorSnapshot[] {
  const { highs, lows, closes, volumes, times } = toColumns(series);

  const emaFast = EMAIndicator.calculate({ values: closes, span: params.emaFast });
  const emaSlow = EMAIndicator.calculate({ values: closes, span: params.emaSlow });
  const macd = MACDIndicator.calculate({
    closes,
    fastPeriod: params.macdFast,
    slowPeriod: params.macdSlow,
    signalPeriod: params.macdSignal,
  });
  const rsi = RSIIndicator.calculate({ closes, period: params.rsiWindow });
  const adx = ADXIndicator.calculate({ highs, lows, closes, period: params.adxWindow });
  const bb = BollingerBandsIndicator.calculate({
    closes,
    period: params.bbWindow,
    stdDev: params.bbStdDev,
  });
  const volMa = VolumeIndicator.calculate({ volumes, maPeriod: params.volWindow });

  return series.map((c, i) => ({
    openTime: times[i],
    close: c.close,
    volume: c.volume,
    emaFast: emaFast[i],
    emaSlow: emaSlow[i],
    macd: macd.macd[i],
    macdSignal: macd.signal[i],
    macdHistogram: macd.histogram[i],
    rsi: rsi[i],
    adx: adx.adx[i],
    dx: adx.dx[i],
    plusDI: adx.plusDI[i],
    minusDI: adx.minusDI[i],
    bbUpper: bb.upper[i],
    bbMiddle: bb.middle[i],
    bbLower: bb.lower[i],
    volMa: volMa[i],
  }));
}

/** Só a última linha é consumida pelo avaliador. */
export function latestSnapshot(
  series: CandleSeries,
  params: Readonly<IndicatorParams> = DEFAULT_INDICATOR_PARAMS,
): IIndicatorSnapshot | undefined {
  return last(computeIndicators(series, params));
}

/** true quando nenhum campo consumido pelo avaliador ficou null/NaN. */
export function isFullyDefined(s: IIndicatorSnapshot): boolean {
  const consumed = [
    s.close,
    s.volume,
    s.emaFast,
    s.emaSlow,
    s.macd,
    s.macdSignal,
    s.rsi,
    s.adx,
    s.bbUpper,
    s.bbLower,
    s.volMa,
  ];
  return consumed.every((v) => v != null && Number.isFinite(v));
}
