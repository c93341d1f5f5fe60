import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import notifierConfig from "./notifier.config";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [notifierConfig],
    }),
  ],
})
export class AppConfigModule {}
