/**
 * Telegram Bot API `sendMessage` request body
 */
export interface SendMessageRequest {
  chat_id: string;
  text: string;
}

/**
 * Telegram Bot API response envelope
 *
 * `ok: false` comes with `error_code` and `description`.
 */
export interface TelegramApiResponse {
  ok: boolean;
  result?: { message_id: number };
  error_code?: number;
  description?: string;
}

/**
 * Outcome of a delivered notification
 */
export interface NotificationResult {
  chatId: string;
  messageId?: number;
  statusCode: number;
}
