import { getCandles, type DataSource } from "../get-candles";
import { latestSnapshot } from "../indicators/compute-indicators";
import { minimumHistory } from "../indicators/params";
import type { CandleSeries, IndicatorParams, SignalThresholds, TSignal } from "../indicators/types";
import { sleep as defaultSleep, type SleepFn } from "./sleep";
import { CONDITIONS, evaluateConditions, failedConditions, type SignalBreakdown } from "./signal-decision";

export type StrategyConfig = {
  readonly timeframes: readonly string[]; // "1m", "5m", "15m", "30m", "1h"...
  readonly limit: number;
  readonly indicators: Readonly<IndicatorParams>;
  readonly thresholds: Readonly<SignalThresholds>;
  readonly betweenCallsMs: number; // pausa antes de cada chamada à fonte
};

export type TimeframeSignal = { timeframe: string; signal: TSignal };

export type ConsensusResult = {
  symbol: string;
  overall: TSignal;
  timeframes: TimeframeSignal[]; // mesma ordem da configuração
};

/** Unanimidade: um único TF divergente derruba o consenso para NEUTRAL. */
export function reduceConsensus(signals: readonly TSignal[]): TSignal {
  if (!signals.length) return "NEUTRAL";
  if (signals.every((s) => s === "BUY")) return "BUY";
  if (signals.every((s) => s === "SELL")) return "SELL";
  return "NEUTRAL";
}

/** Condições do candle mais recente de uma série; null para série vazia. */
export function evaluateSeries(
  series: CandleSeries,
  config: Pick<StrategyConfig, "indicators" | "thresholds">,
): SignalBreakdown | null {
  const snapshot = latestSnapshot(series, config.indicators);
  return snapshot ? evaluateConditions(snapshot, config.thresholds) : null;
}

/**
 * Resumo de um TF para o log, p.ex. `BUY (compra 6/6, venda 2/6)`.
 * null quando o TF ficou NEUTRAL e longe dos dois lados (mais de uma condição faltando).
 */
export function describeBreakdown({ buy, sell, signal }: SignalBreakdown): string | null {
  const buyMissing = failedConditions(buy);
  const sellMissing = failedConditions(sell);
  const closest = buyMissing.length <= sellMissing.length ? buyMissing : sellMissing;
  if (signal === "NEUTRAL" && closest.length !== 1) return null;

  const total = CONDITIONS.length;
  const score = `compra ${total - buyMissing.length}/${total}, venda ${total - sellMissing.length}/${total}`;
  return signal === "NEUTRAL" ? `${signal} (${score}; faltou ${closest[0]})` : `${signal} (${score})`;
}

export class ConsensusAggregator {
  private readonly source: DataSource;
  private readonly config: StrategyConfig;
  private readonly sleep: SleepFn;

  constructor({ source, config, sleep = defaultSleep }: { source: DataSource; config: StrategyConfig; sleep?: SleepFn }) {
    this.source = source;
    this.config = config;
    this.sleep = sleep;
  }

  // sequencial por TF; erros da fonte sobem sem retry aqui
  async analyze(symbol: string): Promise<ConsensusResult> {
    const { timeframes, limit, betweenCallsMs } = this.config;
    const required = minimumHistory(this.config.indicators);
    const perTf: TimeframeSignal[] = [];

    for (const timeframe of timeframes) {
      await this.sleep(betweenCallsMs);
      const series = await getCandles(this.source, symbol, timeframe, limit);
      if (series.length < required) {
        console.warn(
          `[consensus] ${symbol} ${timeframe}: ${series.length} candles, mínimo ${required}; indicadores degradados.`,
        );
      }
      const breakdown = evaluateSeries(series, this.config);
      const summary = breakdown && describeBreakdown(breakdown);
      if (summary) console.log(`[consensus] ${symbol} ${timeframe}: ${summary}`);
      perTf.push({ timeframe, signal: breakdown?.signal ?? "NEUTRAL" });
    }

    return {
      symbol,
      overall: reduceConsensus(perTf.map((t) => t.signal)),
      timeframes: perTf,
    };
  }
}
