import type { Notifier } from "./types";

export class ConsoleNotifier implements Notifier {
  readonly channel = "console";

  async send(message: string): Promise<void> {
    console.log(message);
  }
}
