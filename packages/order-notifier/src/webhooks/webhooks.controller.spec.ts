import { Test, TestingModule } from "@nestjs/testing";
import { WebhooksController } from "./webhooks.controller";
import { WebhooksService } from "./webhooks.service";
import { MoyskladWebhookDto } from "./dto/moysklad-webhook.dto";

describe("WebhooksController", () => {
  let controller: WebhooksController;
  const handleWebhook = jest.fn();

  beforeEach(async () => {
    handleWebhook.mockReset();
    handleWebhook.mockResolvedValue({
      status: "ok",
      accepted: 1,
      skipped: 0,
      delivered: 1,
    });

    const module: TestingModule = await Test.createTestingModule({
      controllers: [WebhooksController],
      providers: [{ provide: WebhooksService, useValue: { handleWebhook } }],
    }).compile();

    controller = module.get<WebhooksController>(WebhooksController);
  });

  describe("handleMoyskladWebhook", () => {
    const payload: MoyskladWebhookDto = {
      events: [
        {
          meta: {
            type: "customerorder",
            href: "https://api.moysklad.ru/api/remap/1.2/entity/customerorder/abc123",
          },
          action: "CREATE",
        },
      ],
    };

    it("should pass payload to WebhooksService", async () => {
      const result = await controller.handleMoyskladWebhook(payload);

      expect(result).toEqual({
        status: "ok",
        accepted: 1,
        skipped: 0,
        delivered: 1,
      });
      expect(handleWebhook).toHaveBeenCalledWith(payload);
      expect(handleWebhook).toHaveBeenCalledTimes(1);
    });
  });
});
