import { Module } from "@nestjs/common";
import { HttpModule } from "@nestjs/axios";
import { MoyskladService } from "./moysklad.service";

@Module({
  imports: [
    HttpModule.register({
      maxRedirects: 3,
    }),
  ],
  providers: [MoyskladService],
  exports: [MoyskladService],
})
export class MoyskladModule {}
