import * as TI from "technicalindicators";
import { padLeft } from "../utils/pad-left";
import { rollingSum } from "../utils/rolling";

export type AdxParams = {
  highs: readonly number[];
  lows: readonly number[];
  closes: readonly number[];
  period: number; // default 14
};

export type AdxSeries = {
  tr: number[];
  plusDM: number[];
  minusDM: number[];
  plusDI: Array<number | null>;
  minusDI: Array<number | null>;
  dx: Array<number | null>;
  adx: number[]; // aquecimento preenchido com 0
};

export class ADXIndicator {
  /** TR da linha 0 (sem fechamento anterior) é só a amplitude high − low. */
  static trueRange(highs: readonly number[], lows: readonly number[], closes: readonly number[]) {
    const len = Math.min(highs.length, lows.length, closes.length);
    const raw = TI.TrueRange.calculate({
      high: highs.slice(0, len),
      low: lows.slice(0, len),
      close: closes.slice(0, len),
    });
    return padLeft(len, raw).map((v, i) => v ?? highs[i] - lows[i]);
  }

  static directionalMovement(highs: readonly number[], lows: readonly number[]) {
    const len = Math.min(highs.length, lows.length);
    const plusDM: number[] = [];
    const minusDM: number[] = [];
    for (let i = 0; i < len; i++) {
      if (i === 0) {
        plusDM.push(0);
        minusDM.push(0);
        continue;
      }
      const upMove = highs[i] - highs[i - 1];
      const downMove = lows[i - 1] - lows[i];
      plusDM.push(upMove > downMove ? Math.max(upMove, 0) : 0);
      minusDM.push(downMove > upMove ? Math.max(downMove, 0) : 0);
    }
    return { plusDM, minusDM };
  }

  static calculate({ highs, lows, closes, period }: AdxParams): AdxSeries {
    const len = Math.min(highs.length, lows.length, closes.length);
    const tr = ADXIndicator.trueRange(highs, lows, closes);
    const { plusDM, minusDM } = ADXIndicator.directionalMovement(highs, lows);

    // somas móveis simples (não a suavização de Wilder)
    const trSum = rollingSum(tr, period);
    const plusSum = rollingSum(plusDM, period);
    const minusSum = rollingSum(minusDM, period);

    const plusDI: Array<number | null> = [];
    const minusDI: Array<number | null> = [];
    const dx: Array<number | null> = [];
    for (let i = 0; i < len; i++) {
      const t = trSum[i];
      const p = plusSum[i];
      const m = minusSum[i];
      if (t == null || p == null || m == null) {
        plusDI.push(null);
        minusDI.push(null);
        dx.push(null);
        continue;
      }
      const pdi = t !== 0 ? (100 * p) / t : null;
      const mdi = t !== 0 ? (100 * m) / t : null;
      plusDI.push(pdi);
      minusDI.push(mdi);

      // DI indefinido entra como 0; denominador 0 → DX 0
      const a = pdi ?? 0;
      const b = mdi ?? 0;
      const den = a + b;
      dx.push(den !== 0 ? (100 * Math.abs(a - b)) / den : 0);
    }

    // ADX = SMA do DX; DX só tem null no aquecimento, então a cauda é contínua
    const dxTail = dx.filter((v): v is number => v != null);
    const adxRaw = dxTail.length ? TI.SMA.calculate({ period, values: dxTail }) : [];
    const adx = padLeft(len, adxRaw).map((v) => v ?? 0);

    return { tr, plusDM, minusDM, plusDI, minusDI, dx, adx };
  }
}
