import {
  ArrayNotEmpty,
  IsArray,
  IsDefined,
  IsObject,
  IsOptional,
  IsString,
  IsUrl,
  ValidateNested,
} from "class-validator";
import { Type } from "class-transformer";
import { ApiProperty } from "@nestjs/swagger";

/**
 * Reference to the entity the event is about
 */
export class MoyskladEventMetaDto {
  @IsString()
  @IsOptional()
  type?: string; // Entity type, e.g. "customerorder"

  @IsUrl({
    protocols: ["http", "https"],
    require_protocol: true,
    require_tld: false,
  })
  href!: string;
}

export class MoyskladWebhookEventDto {
  @IsDefined()
  @ValidateNested()
  @Type(() => MoyskladEventMetaDto)
  meta!: MoyskladEventMetaDto;

  @IsString()
  @IsOptional()
  action?: string; // CREATE | UPDATE | DELETE

  @IsString()
  @IsOptional()
  accountId?: string;

  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  updatedFields?: string[];
}

/**
 * MoySklad Webhook DTO
 *
 * MoySklad batches events of one subscription into a single request:
 * {
 *   "auditContext": { "meta": {...}, "uid": "admin@shop", "moment": "..." },
 *   "events": [
 *     {
 *       "meta": { "type": "customerorder", "href": ".../entity/customerorder/<id>" },
 *       "action": "CREATE",
 *       "accountId": "..."
 *     }
 *   ]
 * }
 */
export class MoyskladWebhookDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => MoyskladWebhookEventDto)
  events!: MoyskladWebhookEventDto[];

  @IsObject()
  @IsOptional()
  auditContext?: Record<string, unknown>;
}

/**
 * Webhook Response DTO
 *
 * Acknowledges receipt; per-event delivery failures do not change the status.
 */
export class WebhookResponseDto {
  @ApiProperty({ enum: ["ok"] })
  status!: "ok";

  @ApiProperty({ description: "Events dispatched to the order fetcher" })
  accepted!: number;

  @ApiProperty({ description: "Events of other entity types or actions" })
  skipped!: number;

  @ApiProperty({ description: "Events whose Telegram message was sent" })
  delivered!: number;
}
