import { rollingMean, rollingStd } from "../utils/rolling";

export type BollingerParams = {
  closes: readonly number[];
  period: number; // default 20
  stdDev: number; // default 2
};

export type BollingerSeries = {
  upper: Array<number | null>;
  middle: Array<number | null>;
  lower: Array<number | null>;
};

export class BollingerBandsIndicator {
  /**
   * Média e desvio amostral (n − 1) saem da mesma janela, por isso não usamos
   * TI.BollingerBands (desvio populacional e soma corrente).
   */
  static calculate({ closes, period, stdDev }: BollingerParams): BollingerSeries {
    const middle = rollingMean(closes, period);
    const std = rollingStd(closes, period);

    const upper: Array<number | null> = [];
    const lower: Array<number | null> = [];
    for (let i = 0; i < closes.length; i++) {
      const m = middle[i];
      const s = std[i];
      if (m == null || s == null) {
        upper.push(null);
        lower.push(null);
        continue;
      }
      upper.push(m + stdDev * s);
      lower.push(m - stdDev * s);
    }
    return { upper, middle, lower };
  }
}
