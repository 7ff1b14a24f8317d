import type { NotifierConfig } from "../env";
import { ConsoleNotifier } from "./console";
import { TelegramNotifier } from "./telegram";
import type { Notifier } from "./types";

export type { Notifier } from "./types";
export { ConsoleNotifier } from "./console";
export { TelegramNotifier } from "./telegram";

export function createNotifier(config: Readonly<NotifierConfig>): Notifier {
  switch (config.kind) {
    case "telegram":
      return new TelegramNotifier({ botToken: config.botToken, chatId: config.chatId });
    case "console":
      return new ConsoleNotifier();
  }
}
