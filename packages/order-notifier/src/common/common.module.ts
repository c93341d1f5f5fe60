import { Module } from "@nestjs/common";
import { APP_INTERCEPTOR, APP_PIPE } from "@nestjs/core";
import { LoggingInterceptor } from "./interceptors/logging.interceptor";
import { createPayloadValidationPipe } from "./pipes/payload-validation.pipe";

@Module({
  providers: [
    { provide: APP_PIPE, useFactory: createPayloadValidationPipe },
    { provide: APP_INTERCEPTOR, useClass: LoggingInterceptor },
  ],
})
export class CommonModule {}
