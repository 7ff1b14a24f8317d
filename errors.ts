export class DataUnavailableError extends Error {
  readonly symbol: string;
  readonly timeframe: string;

  constructor(message: string, where: { symbol: string; timeframe: string }, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataUnavailableError";
    this.symbol = where.symbol;
    this.timeframe = where.timeframe;
  }
}

export class NotificationError extends Error {
  readonly channel: string;

  constructor(message: string, channel: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NotificationError";
    this.channel = channel;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuração inválida:\n- ${issues.join("\n- ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
