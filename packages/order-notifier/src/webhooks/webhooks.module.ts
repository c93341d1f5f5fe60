import { Module } from "@nestjs/common";
import { MoyskladModule } from "../moysklad/moysklad.module";
import { TelegramModule } from "../telegram/telegram.module";
import { WebhooksController } from "./webhooks.controller";
import { WebhooksService } from "./webhooks.service";

/**
 * WebhooksModule - MoySklad → Telegram relay
 *
 * Dependencies:
 * - MoyskladModule - order fetcher
 * - TelegramModule - order notifier
 * - ConfigModule (Global) - notifier configuration
 */
@Module({
  imports: [MoyskladModule, TelegramModule],
  controllers: [WebhooksController],
  providers: [WebhooksService],
})
export class WebhooksModule {}
