import {
  IsArray,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from "class-validator";
import { Type } from "class-transformer";

/**
 * Subset of the MoySklad JSON API entity shapes read by the notifier.
 *
 * Only declared properties are validated; everything else in the response is
 * ignored.
 */
export class EntityMetaDto {
  @IsString()
  href!: string;

  @IsString()
  @IsOptional()
  type?: string;
}

/**
 * Reference to a related entity (`agent`, `state`).
 *
 * Without `expand` MoySklad sends only `meta`; `name` is then resolved with a
 * follow-up request to `meta.href`.
 */
export class EntityReferenceDto {
  @ValidateNested()
  @Type(() => EntityMetaDto)
  @IsOptional()
  meta?: EntityMetaDto;

  @IsString()
  @IsOptional()
  name?: string;
}

/**
 * Delivery address block of an order; only its free-text comment is read.
 */
export class ShipmentAddressDto {
  @IsString()
  @IsOptional()
  comment?: string;
}

/**
 * Custom attribute of an order. `value` depends on the attribute type and is
 * only used when it is a string.
 */
export class OrderAttributeDto {
  @IsString()
  @IsOptional()
  name?: string;

  value?: unknown;
}

/**
 * MoySklad customer order (`entity/customerorder/{id}`)
 */
export class CustomerOrderDto {
  @ValidateNested()
  @Type(() => EntityMetaDto)
  @IsOptional()
  meta?: EntityMetaDto;

  @IsString()
  @IsOptional()
  id?: string;

  @IsString()
  @IsOptional()
  name?: string;

  // Some integrations expose the order number under `number`
  @IsString()
  @IsOptional()
  number?: string;

  @IsString()
  moment!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  sum!: number;

  @IsString()
  @IsOptional()
  description?: string;

  @IsObject()
  @ValidateNested()
  @Type(() => ShipmentAddressDto)
  @IsOptional()
  shipmentAddressFull?: ShipmentAddressDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => OrderAttributeDto)
  @IsOptional()
  attributes?: OrderAttributeDto[];

  @IsObject()
  @ValidateNested()
  @Type(() => EntityReferenceDto)
  @IsOptional()
  agent?: EntityReferenceDto;

  @IsObject()
  @ValidateNested()
  @Type(() => EntityReferenceDto)
  @IsOptional()
  state?: EntityReferenceDto;
}
