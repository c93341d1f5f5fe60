import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from "@nestjs/common";
import {
  ApiBody,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from "@nestjs/swagger";
import { WebhooksService } from "./webhooks.service";
import {
  MoyskladWebhookDto,
  WebhookResponseDto,
} from "./dto/moysklad-webhook.dto";

/**
 * WebhooksController - MoySklad Webhook Endpoint
 *
 * Endpoint: POST /webhook/moysklad
 *
 * Answers 200 once every event has been handled, whether or not the
 * Telegram messages went out. Malformed payloads get 400.
 */
@ApiTags("Webhooks")
@Controller("webhook")
export class WebhooksController {
  private readonly logger = new Logger(WebhooksController.name);

  constructor(private readonly webhooksService: WebhooksService) {}

  @Post("moysklad")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Receive MoySklad webhook",
    description:
      "Fetches each created customer order from MoySklad and posts a summary to Telegram.",
  })
  @ApiBody({
    type: MoyskladWebhookDto,
    description: "MoySklad webhook payload",
  })
  @ApiResponse({
    status: 200,
    description: "Webhook accepted",
    type: WebhookResponseDto,
  })
  @ApiResponse({
    status: 400,
    description: "Invalid webhook payload",
  })
  async handleMoyskladWebhook(
    @Body() payload: MoyskladWebhookDto,
  ): Promise<WebhookResponseDto> {
    this.logger.log(`Received webhook with ${payload.events.length} event(s)`);

    return this.webhooksService.handleWebhook(payload);
  }
}
