/**
 * Outbound messaging contract
 */

export interface MessageSender {
  sendMessage(text: string): Promise<void>;
  sendPhoto(image: Buffer, caption?: string): Promise<void>;
}
