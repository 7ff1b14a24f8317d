// Janelas móveis: só definidas com `window` valores, nenhum null.
// Cada janela é somada do zero (sem soma corrente), então não acumula erro entre linhas.

function windowAt(
  values: ReadonlyArray<number | null>,
  window: number,
  endIdx: number,
): number[] | null {
  if (window < 1 || endIdx + 1 < window) return null;
  const out: number[] = [];
  for (let i = endIdx - window + 1; i <= endIdx; i++) {
    const v = values[i];
    if (v == null || !Number.isFinite(v)) return null;
    out.push(v);
  }
  return out;
}

// janela de um valor só: média é o próprio valor, sem arredondamento da soma
const isConstant = (w: readonly number[]) => w.every((v) => v === w[0]);

function meanOf(w: readonly number[]): number {
  return isConstant(w) ? w[0] : w.reduce((a, b) => a + b, 0) / w.length;
}

export function rollingSum(values: ReadonlyArray<number | null>, window: number): Array<number | null> {
  return values.map((_, i) => {
    const w = windowAt(values, window, i);
    return w ? w.reduce((a, b) => a + b, 0) : null;
  });
}

export function rollingMean(values: ReadonlyArray<number | null>, window: number): Array<number | null> {
  return values.map((_, i) => {
    const w = windowAt(values, window, i);
    return w ? meanOf(w) : null;
  });
}

/** Desvio padrão amostral (n - 1) de cada janela; 0 exato quando a janela é constante. */
export function rollingStd(values: ReadonlyArray<number | null>, window: number): Array<number | null> {
  return values.map((_, i) => {
    const w = windowAt(values, window, i);
    if (!w || w.length < 2) return null;
    if (isConstant(w)) return 0;
    const mean = meanOf(w);
    const sq = w.reduce((a, v) => a + (v - mean) * (v - mean), 0);
    return Math.sqrt(sq / (w.length - 1));
  });
}
