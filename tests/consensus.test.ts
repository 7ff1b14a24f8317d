import { afterEach, describe, expect, it, vi } from "vitest";
import { DataUnavailableError } from "../errors";
import { DEFAULT_INDICATOR_PARAMS, DEFAULT_SIGNAL_THRESHOLDS } from "../indicators/params";
import type { CandleSeries } from "../indicators/types";
import {
  ConsensusAggregator,
  describeBreakdown,
  evaluateSeries,
  reduceConsensus,
  type StrategyConfig,
} from "../utils/consensus-multi-tf";
import { evaluateConditions } from "../utils/signal-decision";
import { breakoutCandles, buySnapshot, flatCandles } from "./helpers";

const TIMEFRAMES = ["1m", "5m", "15m", "30m", "1h"];

const config: StrategyConfig = {
  timeframes: TIMEFRAMES,
  limit: 100,
  indicators: DEFAULT_INDICATOR_PARAMS,
  thresholds: DEFAULT_SIGNAL_THRESHOLDS,
  betweenCallsMs: 150,
};

function fakeSource(fetch: (symbol: string, timeframe: string, limit: number) => Promise<CandleSeries>) {
  return { fetchCandles: vi.fn(fetch) };
}

const noSleep = () => vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("reduceConsensus", () => {
  it("requires unanimity", () => {
    expect(reduceConsensus(["BUY", "BUY", "BUY", "SELL", "BUY"])).toBe("NEUTRAL");
    expect(reduceConsensus(["BUY", "BUY", "BUY"])).toBe("BUY");
    expect(reduceConsensus(["SELL", "SELL"])).toBe("SELL");
    expect(reduceConsensus(["NEUTRAL", "NEUTRAL"])).toBe("NEUTRAL");
    expect(reduceConsensus(["BUY", "NEUTRAL"])).toBe("NEUTRAL");
  });

  it("is NEUTRAL without any timeframe", () => {
    expect(reduceConsensus([])).toBe("NEUTRAL");
  });
});

describe("evaluateSeries", () => {
  it("has nothing to evaluate on an empty series", () => {
    expect(evaluateSeries([], config)).toBeNull();
  });

  it("classifies the last candle of the series", () => {
    expect(evaluateSeries(breakoutCandles("up"), config)?.signal).toBe("BUY");
    expect(evaluateSeries(flatCandles(), config)?.signal).toBe("NEUTRAL");
  });
});

describe("describeBreakdown", () => {
  it("summarises a non-neutral timeframe", () => {
    expect(describeBreakdown(evaluateConditions(buySnapshot()))).toBe("BUY (compra 6/6, venda 2/6)");
  });

  it("names the single missing condition of a near miss", () => {
    expect(describeBreakdown(evaluateConditions(buySnapshot({ rsi: 70 })))).toBe(
      "NEUTRAL (compra 5/6, venda 2/6; faltou rsiBand)",
    );
  });

  it("stays quiet when both sides are far off", () => {
    const flat = evaluateSeries(flatCandles(), config);
    expect(flat && describeBreakdown(flat)).toBeNull();
  });
});

describe("ConsensusAggregator", () => {
  it("evaluates every timeframe in the configured order", async () => {
    const source = fakeSource(async () => flatCandles(100));
    const sleep = noSleep();
    const aggregator = new ConsensusAggregator({ source, config, sleep });

    const result = await aggregator.analyze("BTCUSDT");

    expect(result).toEqual({
      symbol: "BTCUSDT",
      overall: "NEUTRAL",
      timeframes: TIMEFRAMES.map((timeframe) => ({ timeframe, signal: "NEUTRAL" })),
    });
    expect(source.fetchCandles.mock.calls).toEqual(TIMEFRAMES.map((tf) => ["BTCUSDT", tf, 100]));
  });

  it("pauses before every call to the data source", async () => {
    const sleep = noSleep();
    const aggregator = new ConsensusAggregator({ source: fakeSource(async () => flatCandles()), config, sleep });

    await aggregator.analyze("ETHUSDT");

    expect(sleep).toHaveBeenCalledTimes(5);
    expect(sleep.mock.calls.every(([ms]) => ms === 150)).toBe(true);
  });

  it("propagates data source failures without retrying", async () => {
    const source = fakeSource(async (symbol, timeframe) => {
      throw new DataUnavailableError("offline", { symbol, timeframe });
    });
    const aggregator = new ConsensusAggregator({ source, config, sleep: noSleep() });

    await expect(aggregator.analyze("SOLUSDT")).rejects.toBeInstanceOf(DataUnavailableError);
    expect(source.fetchCandles).toHaveBeenCalledTimes(1);
  });

  it("rejects an empty series as unavailable data", async () => {
    const aggregator = new ConsensusAggregator({ source: fakeSource(async () => []), config, sleep: noSleep() });

    await expect(aggregator.analyze("XRPUSDT")).rejects.toThrow("Nenhum candle retornado para XRPUSDT 1m.");
  });

  it("warns and still evaluates when history is shorter than the longest window", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const aggregator = new ConsensusAggregator({
      source: fakeSource(async () => flatCandles(10)),
      config: { ...config, timeframes: ["1m"] },
      sleep: noSleep(),
    });

    const result = await aggregator.analyze("BTCUSDT");

    expect(result.overall).toBe("NEUTRAL");
    expect(warn).toHaveBeenCalledWith(
      "[consensus] BTCUSDT 1m: 10 candles, mínimo 21; indicadores degradados.",
    );
  });

  it("turns real breakouts into a unanimous BUY", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const aggregator = new ConsensusAggregator({
      source: fakeSource(async () => breakoutCandles("up")),
      config,
      sleep: noSleep(),
    });

    const result = await aggregator.analyze("BTCUSDT");

    expect(result.overall).toBe("BUY");
    expect(result.timeframes.map((t) => t.signal)).toEqual(["BUY", "BUY", "BUY", "BUY", "BUY"]);
    expect(log).toHaveBeenCalledWith("[consensus] BTCUSDT 1h: BUY (compra 6/6, venda 2/6)");
  });

  it("drops to NEUTRAL when a single timeframe disagrees", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const source = fakeSource(async (_symbol, timeframe) => breakoutCandles(timeframe === "30m" ? "down" : "up"));
    const aggregator = new ConsensusAggregator({ source, config, sleep: noSleep() });

    const result = await aggregator.analyze("BTCUSDT");

    expect(result.timeframes).toEqual([
      { timeframe: "1m", signal: "BUY" },
      { timeframe: "5m", signal: "BUY" },
      { timeframe: "15m", signal: "BUY" },
      { timeframe: "30m", signal: "SELL" },
      { timeframe: "1h", signal: "BUY" },
    ]);
    expect(result.overall).toBe("NEUTRAL");
  });

  it("logs the missing condition of a near miss", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const aggregator = new ConsensusAggregator({
      source: fakeSource(async () => breakoutCandles("up", { lastVolume: 5 })),
      config: { ...config, timeframes: ["15m"] },
      sleep: noSleep(),
    });

    const result = await aggregator.analyze("ETHUSDT");

    expect(result.overall).toBe("NEUTRAL");
    expect(log).toHaveBeenCalledWith("[consensus] ETHUSDT 15m: NEUTRAL (compra 5/6, venda 1/6; faltou volumeConfirm)");
  });
});
