import { EMAIndicator } from "./ema";

export type RsiParams = {
  closes: readonly number[];
  /** Janela de Wilder (α = 1 / period) */
  period: number;
};

/** Valor neutro quando não há movimento algum (ganho e perda médios zerados). */
export const RSI_NEUTRAL = 50;

function rsiFrom(avgUp: number, avgDown: number): number {
  if (avgDown === 0) return avgUp === 0 ? RSI_NEUTRAL : 100;
  const rs = avgUp / avgDown;
  return 100 - 100 / (1 + rs);
}

export class RSIIndicator {
  static calculate({ closes, period }: RsiParams): number[] {
    if (!closes.length) return [];

    const ups: number[] = [];
    const downs: number[] = [];
    for (let i = 1; i < closes.length; i++) {
      const ch = closes[i] - closes[i - 1];
      ups.push(Math.max(ch, 0));
      downs.push(Math.max(-ch, 0));
    }

    // média de Wilder = EMA com α = 1/period, semeada no primeiro delta
    const alpha = 1 / period;
    const avgUp = EMAIndicator.smooth(ups, alpha);
    const avgDown = EMAIndicator.smooth(downs, alpha);

    // linha 0 não tem delta
    return [RSI_NEUTRAL, ...avgUp.map((u, i) => rsiFrom(u, avgDown[i]))];
  }
}
