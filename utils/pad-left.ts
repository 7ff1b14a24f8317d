/** Alinha à direita a saída (mais curta) de um indicador com a série original; aquecimento vira null. */
export function padLeft<T>(fullLen: number, arr: ReadonlyArray<T | null | undefined>): Array<T | null> {
  const pad: Array<T | null> = Array<T | null>(Math.max(0, fullLen - arr.length)).fill(null);
  return pad.concat(arr.slice(Math.max(0, arr.length - fullLen)).map((v) => v ?? null));
}
