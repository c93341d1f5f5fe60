import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import notifierConfig from "../config/notifier.config";
import { classifyEntityHref } from "../moysklad/entity-href";
import { MoyskladService } from "../moysklad/moysklad.service";
import { OrderNotification } from "../moysklad/order-notification";
import { TelegramService } from "../telegram/telegram.service";
import { PayloadError, describeError } from "../errors";
import {
  MoyskladWebhookDto,
  MoyskladWebhookEventDto,
  WebhookResponseDto,
} from "./dto/moysklad-webhook.dto";

const CUSTOMER_ORDER_TYPE = "customerorder";
const CREATE_ACTION = "CREATE";

export type EventOutcome = "delivered" | "fetch_failed" | "notify_failed";

/**
 * WebhooksService - Webhook Processing Logic
 *
 * For every customer order creation event in a MoySklad webhook:
 * 1. Fetch the order from the MoySklad API
 * 2. Send the rendered summary to Telegram
 *
 * Events are processed concurrently and in isolation: a failed fetch or
 * send is logged and does not affect sibling events. The request resolves
 * once every event has settled.
 */
@Injectable()
export class WebhooksService {
  private readonly logger = new Logger(WebhooksService.name);

  constructor(
    private readonly moyskladService: MoyskladService,
    private readonly telegramService: TelegramService,
    @Inject(notifierConfig.KEY)
    private readonly config: ConfigType<typeof notifierConfig>,
  ) {}

  /**
   * Process a MoySklad webhook
   *
   * The whole payload is checked before anything is fetched, so a rejected
   * request makes no outbound calls.
   *
   * @throws PayloadError if a selected event points outside the MoySklad API
   * or declares a customer order but references another entity
   */
  async handleWebhook(
    payload: MoyskladWebhookDto,
  ): Promise<WebhookResponseDto> {
    const { selected, skipped } = this.selectEvents(payload.events);

    this.logger.log(
      `Processing webhook: events=${payload.events.length}, accepted=${selected.length}, skipped=${skipped}`,
    );

    const outcomes = await Promise.all(
      selected.map((href) => this.processEvent(href)),
    );
    const delivered = outcomes.filter(
      (outcome) => outcome === "delivered",
    ).length;

    if (delivered < selected.length) {
      this.logger.warn(
        `Webhook processed with failures: delivered=${delivered}/${selected.length}`,
      );
    }

    return {
      status: "ok",
      accepted: selected.length,
      skipped,
      delivered,
    };
  }

  /**
   * Fetch one order and notify about it
   *
   * Never rejects; the outcome is reported for the webhook summary.
   */
  async processEvent(href: string): Promise<EventOutcome> {
    let order: OrderNotification;
    try {
      order = await this.moyskladService.fetchOrder(href);
    } catch (error) {
      this.logger.error(
        `Failed to fetch order details for ${href}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return "fetch_failed";
    }

    let messageId: number | undefined;
    try {
      ({ messageId } = await this.telegramService.notify(order));
    } catch (error) {
      this.logger.error(
        `Failed to send Telegram notification for order ${order.number}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return "notify_failed";
    }

    this.logger.log(
      `Order ${order.number} sent to Telegram, message ${messageId ?? "unknown"} (${href})`,
    );
    return "delivered";
  }

  private selectEvents(events: MoyskladWebhookEventDto[]): {
    selected: string[];
    skipped: number;
  } {
    const selected: string[] = [];
    const invalid: string[] = [];
    let skipped = 0;

    events.forEach((event, index) => {
      const { type, href } = event.meta;

      if (type !== undefined && type !== CUSTOMER_ORDER_TYPE) {
        this.logger.debug(`Skipping event ${index}: entity type ${type}`);
        skipped++;
        return;
      }
      if (
        event.action !== undefined &&
        event.action.toUpperCase() !== CREATE_ACTION
      ) {
        this.logger.debug(`Skipping event ${index}: action ${event.action}`);
        skipped++;
        return;
      }
      switch (classifyEntityHref(href, this.config.moysklad.apiUrl)) {
        case "foreign":
          invalid.push(
            `events.${index}.meta.href: must point at ${this.config.moysklad.apiUrl}`,
          );
          return;
        case "other":
          if (type === undefined) {
            this.logger.debug(`Skipping event ${index}: not a customer order`);
            skipped++;
          } else {
            invalid.push(
              `events.${index}.meta.href: must reference a customerorder entity`,
            );
          }
          return;
        case "customerorder":
          break;
      }

      selected.push(href);
    });

    if (invalid.length > 0) {
      this.logger.warn(`Rejected webhook: ${invalid.join("; ")}`);
      throw new PayloadError(
        "Webhook event does not reference a customer order",
        invalid,
      );
    }

    return { selected, skipped };
  }
}
