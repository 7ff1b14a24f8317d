import { z } from "zod";
import type { Market } from "./binance";
import { ConfigError } from "./errors";
import { DEFAULT_INDICATOR_PARAMS as P, DEFAULT_SIGNAL_THRESHOLDS as T, minimumHistory } from "./indicators/params";
import type { StrategyConfig } from "./utils/consensus-multi-tf";

export type NotifierConfig =
  | { kind: "console" }
  | { kind: "telegram"; botToken: string; chatId: string };

export type AppConfig = StrategyConfig & {
  readonly symbols: readonly string[];
  readonly pollIntervalMs: number;
  readonly exchange: {
    readonly market: Market;
    readonly baseUrl?: string;
    readonly timeoutMs: number;
    readonly retries: number;
  };
  readonly notifier: Readonly<NotifierConfig>;
};

const list = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((s) =>
      s
        .split(",")
        .map((x) => x.trim())
        .filter(Boolean),
    );
const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const num = (fallback: number) => z.coerce.number().finite().default(fallback);
const optional = z
  .string()
  .optional()
  .transform((s) => (s?.trim() ? s.trim() : undefined));

const EnvSchema = z
  .object({
    SYMBOLS: list("BTCUSDT,ETHUSDT,SOLUSDT,XRPUSDT"),
    TIMEFRAMES: list("1m,5m,15m,30m,1h"),
    LIMIT: int(100),

    EMA_FAST: int(P.emaFast),
    EMA_SLOW: int(P.emaSlow),
    MACD_FAST: int(P.macdFast),
    MACD_SLOW: int(P.macdSlow),
    MACD_SIGNAL: int(P.macdSignal),
    RSI_WINDOW: int(P.rsiWindow),
    ADX_WINDOW: int(P.adxWindow),
    BB_WINDOW: int(P.bbWindow),
    BB_STD_DEV: z.coerce.number().positive().default(P.bbStdDev),
    VOL_WINDOW: int(P.volWindow),

    ADX_THRESHOLD: num(T.adxThreshold),
    RSI_BUY_MIN: num(T.rsiBuyMin),
    RSI_BUY_MAX: num(T.rsiBuyMax),
    RSI_SELL_MIN: num(T.rsiSellMin),
    RSI_SELL_MAX: num(T.rsiSellMax),

    SLEEP_BETWEEN_CALLS_MS: z.coerce.number().int().nonnegative().default(150),
    POLL_INTERVAL_MS: int(60_000),

    MARKET: z.enum(["spot", "futures"]).default("spot"),
    BINANCE_BASE_URL: optional.pipe(z.string().url().optional()),
    REQUEST_TIMEOUT_MS: int(10_000),
    FETCH_RETRIES: int(3),

    NOTIFIER: z.enum(["console", "telegram"]).default("console"),
    TELEGRAM_BOT_TOKEN: optional,
    TELEGRAM_CHAT_ID: optional,
  })
  .superRefine((e, ctx) => {
    const issue = (path: string, message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });

    if (!e.SYMBOLS.length) issue("SYMBOLS", "informe ao menos um símbolo");
    if (!e.TIMEFRAMES.length) issue("TIMEFRAMES", "informe ao menos um timeframe");
    if (new Set(e.TIMEFRAMES).size !== e.TIMEFRAMES.length) issue("TIMEFRAMES", "timeframes repetidos");

    const required = minimumHistory({ adxWindow: e.ADX_WINDOW, bbWindow: e.BB_WINDOW, volWindow: e.VOL_WINDOW });
    if (e.LIMIT < required) issue("LIMIT", `precisa ser >= ${required} (maior janela + 1)`);
    if (e.MACD_FAST >= e.MACD_SLOW) issue("MACD_FAST", "precisa ser menor que MACD_SLOW");

    const bands = [
      ["BUY", e.RSI_BUY_MIN, e.RSI_BUY_MAX],
      ["SELL", e.RSI_SELL_MIN, e.RSI_SELL_MAX],
    ] as const;
    for (const [side, min, max] of bands) {
      if (min > max) issue(`RSI_${side}_MIN`, `precisa ser <= RSI_${side}_MAX`);
      if (min < 0 || max > 100) issue(`RSI_${side}_MIN`, "faixa de RSI fora de [0, 100]");
    }

    if (e.NOTIFIER === "telegram") {
      if (!e.TELEGRAM_BOT_TOKEN) issue("TELEGRAM_BOT_TOKEN", "obrigatório com NOTIFIER=telegram");
      if (!e.TELEGRAM_CHAT_ID) issue("TELEGRAM_CHAT_ID", "obrigatório com NOTIFIER=telegram");
    }
  });

type Env = z.infer<typeof EnvSchema>;

function toNotifierConfig(e: Env): NotifierConfig {
  if (e.NOTIFIER === "telegram" && e.TELEGRAM_BOT_TOKEN && e.TELEGRAM_CHAT_ID) {
    return { kind: "telegram", botToken: e.TELEGRAM_BOT_TOKEN, chatId: e.TELEGRAM_CHAT_ID };
  }
  return { kind: "console" };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`));
  }
  const e = parsed.data;

  return deepFreeze<AppConfig>({
    symbols: e.SYMBOLS,
    timeframes: e.TIMEFRAMES,
    limit: e.LIMIT,
    indicators: {
      emaFast: e.EMA_FAST,
      emaSlow: e.EMA_SLOW,
      macdFast: e.MACD_FAST,
      macdSlow: e.MACD_SLOW,
      macdSignal: e.MACD_SIGNAL,
      rsiWindow: e.RSI_WINDOW,
      adxWindow: e.ADX_WINDOW,
      bbWindow: e.BB_WINDOW,
      bbStdDev: e.BB_STD_DEV,
      volWindow: e.VOL_WINDOW,
    },
    thresholds: {
      adxThreshold: e.ADX_THRESHOLD,
      rsiBuyMin: e.RSI_BUY_MIN,
      rsiBuyMax: e.RSI_BUY_MAX,
      rsiSellMin: e.RSI_SELL_MIN,
      rsiSellMax: e.RSI_SELL_MAX,
    },
    betweenCallsMs: e.SLEEP_BETWEEN_CALLS_MS,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    exchange: {
      market: e.MARKET,
      baseUrl: e.BINANCE_BASE_URL,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
      retries: e.FETCH_RETRIES,
    },
    notifier: toNotifierConfig(e),
  });
}
