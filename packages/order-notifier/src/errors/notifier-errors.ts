import { BadRequestException } from "@nestjs/common";

/**
 * Error kinds of the order notifier
 *
 * - ConfigurationError: missing or contradictory environment, fatal at boot
 * - PayloadError: malformed webhook body, answered with 400
 * - FetchError: MoySklad API unreachable, non-2xx or unexpected schema
 * - NotifyError: Telegram Bot API unreachable, non-2xx or `ok: false`
 *
 * FetchError and NotifyError are scoped to a single webhook event and are
 * logged by the caller; they never reach the HTTP response.
 */

export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";

  constructor(
    message: string,
    readonly variables: string[] = [],
  ) {
    super(message);
  }
}

/**
 * Rejection of an inbound webhook body.
 *
 * Rendered by Nest as
 * `{ statusCode: 400, message, error: "Bad Request", details }`.
 */
export class PayloadError extends BadRequestException {
  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super({
      statusCode: 400,
      message,
      error: "Bad Request",
      details,
    });
    this.name = "PayloadError";
  }
}

export class FetchError extends Error {
  override readonly name = "FetchError";

  constructor(
    message: string,
    readonly href: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

export class NotifyError extends Error {
  override readonly name = "NotifyError";

  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

/** Message of any thrown value, for log lines. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
