export type EmaParams = {
  /** Série de entrada (closes, ou o próprio MACD para a linha de sinal) */
  values: readonly number[];
  /** Span da média; α = 2 / (span + 1) */
  span: number;
};

export class EMAIndicator {
  static alpha(span: number) {
    return 2 / (span + 1);
  }

  /**
   * Semente = primeiro valor (sem aquecimento por SMA): toda linha fica definida.
   * Forma `prev + α·(v − prev)`: série constante continua exatamente constante.
   */
  static smooth(values: readonly number[], alpha: number): number[] {
    if (!values.length) return [];
    const out: number[] = [values[0]];
    let prev = values[0];
    for (let i = 1; i < values.length; i++) {
      prev = prev + alpha * (values[i] - prev);
      out.push(prev);
    }
    return out;
  }

  static calculate({ values, span }: EmaParams): number[] {
    return EMAIndicator.smooth(values, EMAIndicator.alpha(span));
  }
}
