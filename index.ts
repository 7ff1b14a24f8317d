import "dotenv/config";
import { BinanceDataSource } from "./binance";
import { loadConfig } from "./env";
import { errorMessage } from "./errors";
import { createNotifier } from "./notifiers";
import { SignalPoller } from "./scheduler";
import { ConsensusAggregator } from "./utils/consensus-multi-tf";

const RUN_ONCE = process.argv.includes("--once");

(async () => {
  try {
    const config = loadConfig();
    const source = new BinanceDataSource({
      market: config.exchange.market,
      baseUrl: config.exchange.baseUrl,
      timeoutMs: config.exchange.timeoutMs,
      retries: config.exchange.retries,
    });
    const poller = new SignalPoller({
      aggregator: new ConsensusAggregator({ source, config }),
      notifier: createNotifier(config.notifier),
      symbols: config.symbols,
      pollIntervalMs: config.pollIntervalMs,
    });

    console.log(
      `[main] ${config.symbols.join(", ")} | TFs ${config.timeframes.join(", ")} | notifier=${config.notifier.kind}`,
    );

    if (RUN_ONCE) {
      await poller.runCycle();
      return;
    }

    process.once("SIGINT", () => poller.stop());
    process.once("SIGTERM", () => poller.stop());
    await poller.start();
  } catch (err) {
    console.error("Error:", errorMessage(err));
    process.exit(1);
  }
})();
