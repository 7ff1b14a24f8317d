import type { Candle, IIndicatorSnapshot } from "../indicators/types";

const MINUTE = 60_000;

export function candlesFromCloses(
  closes: readonly number[],
  { spread = 1, volume = 10, start = 1_700_000_000_000 }: { spread?: number; volume?: number; start?: number } = {},
): Candle[] {
  return closes.map((close, i) => ({
    openTime: start + i * MINUTE,
    open: close,
    high: close + spread,
    low: close - spread,
    close,
    volume,
  }));
}

/** 100 velas planas: close 100, high 101, low 99, volume 10. */
export function flatCandles(n = 100): Candle[] {
  return candlesFromCloses(Array<number>(n).fill(100));
}

/** Snapshot que satisfaz as seis condições de compra com os limiares padrão. */
export function buySnapshot(overrides: Partial<IIndicatorSnapshot> = {}): IIndicatorSnapshot {
  return {
    openTime: 0,
    close: 110,
    volume: 150,
    emaFast: 105,
    emaSlow: 100,
    macd: 1.5,
    macdSignal: 1,
    macdHistogram: 0.5,
    rsi: 60,
    adx: 30,
    dx: 30,
    plusDI: 35,
    minusDI: 15,
    bbUpper: 108,
    bbMiddle: 100,
    bbLower: 92,
    volMa: 100,
    ...overrides,
  };
}

/** Espelho de `buySnapshot` para o lado vendedor. */
export function sellSnapshot(overrides: Partial<IIndicatorSnapshot> = {}): IIndicatorSnapshot {
  return buySnapshot({
    close: 90,
    emaFast: 95,
    emaSlow: 100,
    macd: -1.5,
    macdSignal: -1,
    macdHistogram: -0.5,
    rsi: 40,
    plusDI: 15,
    minusDI: 35,
    ...overrides,
  });
}

/**
 * Canal subindo 0.05 por candle (máxima/mínima a ±2 da tendência, fechamento alternando ±1)
 * e rompimento no último candle: fecha 3 acima da tendência com volume dobrado.
 * "down" espelha os preços em torno de 100 (p → 200 − p).
 */
export function breakoutCandles(
  direction: "up" | "down",
  { lastVolume = 20, start = 1_700_000_000_000 }: { lastVolume?: number; start?: number } = {},
): Candle[] {
  const candles: Candle[] = [];
  for (let i = 0; i < 100; i++) {
    const trend = 100 + 0.05 * i;
    const isLast = i === 99;
    const close = isLast ? trend + 3 : trend + (i % 2 ? 1 : -1);
    candles.push({
      openTime: start + i * MINUTE,
      open: close,
      high: isLast ? close + 1 : trend + 2,
      low: trend - 2,
      close,
      volume: isLast ? lastVolume : 10,
    });
  }
  if (direction === "up") return candles;
  return candles.map((c) => ({
    ...c,
    open: 200 - c.open,
    high: 200 - c.low,
    low: 200 - c.high,
    close: 200 - c.close,
  }));
}
