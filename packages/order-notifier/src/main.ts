import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { Logger } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { loadNotifierConfig } from "./config/notifier.config";
import { ConfigurationError, describeError } from "./errors";

const logger = new Logger("Bootstrap");

async function bootstrap(): Promise<void> {
  // Fail before Nest starts so a bad environment is reported on its own
  const { port } = loadNotifierConfig();

  const app = await NestFactory.create(AppModule, { abortOnError: false });
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle("MoySklad Order Notifier")
    .setDescription("Relays MoySklad customer order webhooks to Telegram")
    .setVersion("1.0.0")
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup("api/docs", app, document);

  await app.listen(port);

  logger.log(`Order notifier is running on port ${port}`);
  logger.log(`Webhook: POST http://localhost:${port}/webhook/moysklad`);
  logger.log(`Swagger UI: http://localhost:${port}/api/docs`);
}

bootstrap().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error(`Invalid configuration: ${error.message}`);
  } else {
    logger.error(
      `Failed to start: ${describeError(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
  }
  process.exit(1);
});
