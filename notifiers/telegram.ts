import { NotificationError, errorMessage } from "../errors";
import { createHttpClient, type HttpClient } from "../utils/http";
import type { Notifier } from "./types";

const TELEGRAM_API = "https://api.telegram.org";

export type TelegramOptions = {
  botToken: string;
  chatId: string;
  timeoutMs?: number;
  http?: Pick<HttpClient, "post">;
};

type SendMessageReply = { ok?: boolean; description?: string };

function isReply(data: unknown): data is SendMessageReply {
  return typeof data === "object" && data !== null;
}

export class TelegramNotifier implements Notifier {
  readonly channel = "telegram";
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly http: Pick<HttpClient, "post">;

  constructor({ botToken, chatId, timeoutMs = 10_000, http }: TelegramOptions) {
    this.botToken = botToken;
    this.chatId = chatId;
    this.http = http ?? createHttpClient(timeoutMs);
  }

  buildUrl(): string {
    return `${TELEGRAM_API}/bot${this.botToken}/sendMessage`;
  }

  async send(message: string): Promise<void> {
    let data: unknown;
    try {
      ({ data } = await this.http.post(this.buildUrl(), { chat_id: this.chatId, text: message }));
    } catch (err) {
      throw new NotificationError(`Telegram: falha no envio (${errorMessage(err)})`, this.channel, { cause: err });
    }
    // a API responde 200 com { ok: false } em alguns erros de chat
    if (!isReply(data) || data.ok !== true) {
      const reason = isReply(data) && data.description ? data.description : "resposta inesperada";
      throw new NotificationError(`Telegram: ${reason}`, this.channel);
    }
  }
}
