/**
 * Telegram Adapter - delivers reports through the Telegram Bot API
 *
 * Every message goes to the single chat configured at startup.
 */

import { MessageSender } from '../../types/messaging';
import { TelegramResponseOutput, TelegramResponseSchema } from '../../schemas/providers';
import { payloadValidator } from '../../services/schema-validator';
import { RESTClient, RESTClientError } from '../rest-client';

export interface TelegramAdapterConfig {
  apiEndpoint: string;
  token: string;
  chatId: number;
  timeoutMs: number;
}

/**
 * Error thrown when Telegram refuses or cannot take a message
 */
export class MessagingError extends Error {
  constructor(
    message: string,
    public readonly operation: 'sendMessage' | 'sendPhoto',
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'MessagingError';
  }
}

const validateTelegramResponse = payloadValidator.compile<TelegramResponseOutput>(TelegramResponseSchema);

export class TelegramAdapter implements MessageSender {
  private readonly client: RESTClient;
  private readonly config: TelegramAdapterConfig;

  constructor(config: TelegramAdapterConfig) {
    this.config = config;
    this.client = new RESTClient({
      providerName: 'telegram',
      baseUrl: `${config.apiEndpoint.replace(/\/+$/, '')}/bot${config.token}`,
      timeoutMs: config.timeoutMs
    });
  }

  /**
   * Send a Markdown text message
   */
  async sendMessage(text: string): Promise<void> {
    await this.call('sendMessage', {
      json: {
        chat_id: this.config.chatId,
        text,
        parse_mode: 'Markdown',
        disable_web_page_preview: true
      }
    });
  }

  /**
   * Send a PNG image
   */
  async sendPhoto(image: Buffer, caption?: string): Promise<void> {
    const form = new FormData();
    form.append('chat_id', String(this.config.chatId));
    form.append('photo', new Blob([new Uint8Array(image)], { type: 'image/png' }), 'chart.png');
    if (caption) {
      form.append('caption', caption);
    }
    await this.call('sendPhoto', { form });
  }

  private async call(
    operation: 'sendMessage' | 'sendPhoto',
    body: { json?: unknown; form?: FormData }
  ): Promise<void> {
    let response: TelegramResponseOutput;
    try {
      ({ data: response } = await this.client.request({
        method: 'POST',
        path: `/${operation}`,
        ...body,
        validate: validateTelegramResponse
      }));
    } catch (error) {
      const detail = error instanceof RESTClientError ? error.message : String(error);
      throw new MessagingError(`Telegram ${operation} failed: ${detail}`, operation, error);
    }

    if (!response.ok) {
      throw new MessagingError(
        `Telegram ${operation} rejected: ${response.description ?? 'no description'}`,
        operation
      );
    }
  }
}
