/** Canal de entrega da mensagem de consenso. */
export interface Notifier {
  readonly channel: string;
  send(message: string): Promise<void>;
}
