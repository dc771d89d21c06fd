/**
 * Channel sender contract
 */

export interface RenderedMessage {
  subject: string;
  body: string;
  /** Template variables, used by channels that render on the provider side */
  params: Record<string, string>;
}

export interface ChannelSender {
  readonly name: string;
  /**
   * Deliver one message to one recipient; rejects with a NotificationError
   */
  send(recipient: string, message: RenderedMessage): Promise<void>;
}
