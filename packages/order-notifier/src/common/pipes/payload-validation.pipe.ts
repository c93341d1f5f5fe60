import { ValidationPipe } from "@nestjs/common";
import { PayloadError } from "../../errors";
import { formatValidationErrors } from "../validation-errors";

/**
 * Global request validation
 *
 * Unknown properties are stripped rather than rejected: MoySklad may add
 * fields to its webhook payloads at any time.
 */
export function createPayloadValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: false,
    transform: true,
    exceptionFactory: (errors) =>
      new PayloadError("Invalid webhook payload", formatValidationErrors(errors)),
  });
}
