import { Inject, Injectable, Logger } from "@nestjs/common";
import { HttpService } from "@nestjs/axios";
import { ConfigType } from "@nestjs/config";
import { AxiosResponse, isAxiosError } from "axios";
import { firstValueFrom, timeout } from "rxjs";
import notifierConfig from "../config/notifier.config";
import { isRecord } from "../common/is-record";
import { NotifyError, describeError } from "../errors";
import { OrderNotification } from "../moysklad/order-notification";
import { renderOrderMessage } from "./message-template";
import {
  NotificationResult,
  SendMessageRequest,
  TelegramApiResponse,
} from "./dto/send-message.dto";

function telegramDescription(data: unknown): string | undefined {
  return isRecord(data) && typeof data.description === "string"
    ? data.description
    : undefined;
}

/**
 * TelegramService - Order Notifier
 *
 * Posts the rendered order summary to the configured chat through the Bot
 * API `sendMessage` method. Each call is an independent send; nothing is
 * retried or deduplicated.
 */
@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(notifierConfig.KEY)
    private readonly config: ConfigType<typeof notifierConfig>,
  ) {}

  /**
   * Render and send an order notification
   *
   * @throws NotifyError on network failure, timeout, non-2xx or `ok: false`
   */
  async notify(order: OrderNotification): Promise<NotificationResult> {
    return this.sendMessage(renderOrderMessage(order));
  }

  private async sendMessage(text: string): Promise<NotificationResult> {
    const { apiUrl, botToken, chatId } = this.config.telegram;
    const payload: SendMessageRequest = { chat_id: chatId, text };

    let response: AxiosResponse<TelegramApiResponse | null>;
    try {
      response = await firstValueFrom(
        this.httpService
          .post<TelegramApiResponse | null>(
            `${apiUrl}/bot${botToken}/sendMessage`,
            payload,
            {
              headers: { "Content-Type": "application/json" },
              timeout: this.config.httpTimeoutMs,
            },
          )
          .pipe(timeout(this.config.httpTimeoutMs)),
      );
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        const description = telegramDescription(error.response.data);
        throw new NotifyError(
          `Telegram API responded with HTTP ${error.response.status}` +
            (description ? `: ${description}` : ""),
          error.response.status,
        );
      }
      // The request URL carries the bot token, keep it out of the message
      throw new NotifyError(
        `Telegram API request failed: ${describeError(error).replaceAll(botToken, "<token>")}`,
      );
    }

    const body = response.data;
    if (response.status < 200 || response.status >= 300 || body?.ok === false) {
      const description = telegramDescription(body);
      throw new NotifyError(
        `Telegram API responded with HTTP ${response.status}` +
          (description ? `: ${description}` : ""),
        response.status,
      );
    }

    this.logger.debug(`Message delivered to chat ${chatId}`);

    return {
      chatId,
      messageId: body?.result?.message_id,
      statusCode: response.status,
    };
  }
}
