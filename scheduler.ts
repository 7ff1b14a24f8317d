import { errorMessage } from "./errors";
import { formatConsensusMessage } from "./format";
import type { Notifier } from "./notifiers/types";
import type { ConsensusAggregator, ConsensusResult } from "./utils/consensus-multi-tf";
import { sleep as defaultSleep, type SleepFn } from "./utils/sleep";

export type PollerDeps = {
  aggregator: Pick<ConsensusAggregator, "analyze">;
  notifier: Notifier;
  symbols: readonly string[];
  pollIntervalMs: number;
  sleep?: SleepFn;
};

/**
 * Loop externo: um ciclo percorre os símbolos em sequência e envia uma mensagem por símbolo.
 * Falha de um símbolo (dados ou entrega) é logada e o ciclo segue para o próximo.
 */
export class SignalPoller {
  private readonly deps: PollerDeps;
  private readonly sleep: SleepFn;
  private controller: AbortController | null = null;

  constructor(deps: PollerDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  async runCycle(signal?: AbortSignal): Promise<ConsensusResult[]> {
    const { aggregator, notifier, symbols } = this.deps;
    const results: ConsensusResult[] = [];

    for (const symbol of symbols) {
      if (signal?.aborted) break;
      let result: ConsensusResult;
      try {
        result = await aggregator.analyze(symbol);
      } catch (err) {
        console.error(`[poller] ${symbol}: análise ignorada neste ciclo (${errorMessage(err)})`);
        continue;
      }
      results.push(result);
      try {
        await notifier.send(formatConsensusMessage(result));
      } catch (err) {
        console.error(`[poller] ${symbol}: falha ao notificar via ${notifier.channel} (${errorMessage(err)})`);
      }
    }
    return results;
  }

  /** Roda até `stop()`; a pausa entre ciclos é interrompida pelo abort. */
  async start(): Promise<void> {
    if (this.controller) throw new Error("Poller já está rodando.");
    const controller = new AbortController();
    this.controller = controller;
    try {
      while (!controller.signal.aborted) {
        const results = await this.runCycle(controller.signal);
        console.log(`[poller] ciclo concluído: ${results.length}/${this.deps.symbols.length} símbolos`);
        await this.sleep(this.deps.pollIntervalMs, controller.signal);
      }
    } finally {
      this.controller = null;
    }
  }

  stop(): void {
    this.controller?.abort();
  }
}
