import type { TSignal } from "./indicators/types";
import type { ConsensusResult } from "./utils/consensus-multi-tf";

const ICON: Record<TSignal, string> = {
  BUY: "🟢",
  SELL: "🔴",
  NEUTRAL: "⚪",
};

/**
 * Mensagem entregue ao notificador, p.ex.:
 *
 *   📊 BTCUSDT
 *   Sinal geral: 🟢 BUY
 *   Detalhes: 1m=BUY, 5m=BUY
 */
export function formatConsensusMessage(result: ConsensusResult): string {
  const details = result.timeframes.map((t) => `${t.timeframe}=${t.signal}`).join(", ");
  return [
    `📊 ${result.symbol}`,
    `Sinal geral: ${ICON[result.overall]} ${result.overall}`,
    `Detalhes: ${details || "-"}`,
  ].join("\n");
}
