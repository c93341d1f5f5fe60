import { Module } from "@nestjs/common";
import { AppConfigModule } from "./config/config.module";
import { CommonModule } from "./common/common.module";
import { HealthModule } from "./health/health.module";
import { WebhooksModule } from "./webhooks/webhooks.module";

@Module({
  imports: [AppConfigModule, CommonModule, WebhooksModule, HealthModule],
})
export class AppModule {}
