import { Inject, Injectable, Logger } from "@nestjs/common";
import { HttpService } from "@nestjs/axios";
import { ConfigType } from "@nestjs/config";
import { AxiosResponse, isAxiosError } from "axios";
import { plainToInstance } from "class-transformer";
import { validate } from "class-validator";
import { firstValueFrom, timeout } from "rxjs";
import notifierConfig from "../config/notifier.config";
import { isRecord } from "../common/is-record";
import { formatValidationErrors } from "../common/validation-errors";
import { FetchError, describeError } from "../errors";
import { CustomerOrderDto, EntityReferenceDto } from "./dto/customer-order.dto";
import { classifyEntityHref } from "./entity-href";
import { OrderNotification } from "./order-notification";

function presentOrUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

const COMMENT_ATTRIBUTE = "комментарий";

/**
 * Order comment: `description`, then the shipment address comment, then a
 * custom attribute named "Комментарий" (any case) with a string value.
 */
function resolveComment(order: CustomerOrderDto): string | undefined {
  const attribute = order.attributes?.find(
    ({ name }) => name?.trim().toLowerCase() === COMMENT_ATTRIBUTE,
  );
  return (
    presentOrUndefined(order.description) ??
    presentOrUndefined(order.shipmentAddressFull?.comment) ??
    (typeof attribute?.value === "string"
      ? presentOrUndefined(attribute.value)
      : undefined)
  );
}

/**
 * MoyskladService - Order Fetcher
 *
 * Reads customer orders from the MoySklad JSON API (remap 1.2) with the
 * credential chosen at startup and normalizes them into an
 * OrderNotification.
 *
 * Every failure surfaces as a FetchError: network errors, timeouts, non-2xx
 * responses and bodies that do not match the customer order schema.
 */
@Injectable()
export class MoyskladService {
  private readonly logger = new Logger(MoyskladService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(notifierConfig.KEY)
    private readonly config: ConfigType<typeof notifierConfig>,
  ) {}

  /**
   * Fetch a customer order and normalize it
   *
   * `agent` and `state` are followed through their `meta.href` when the order
   * response carries them without a name and the href lies under the
   * configured API base. A failed or refused lookup leaves the field empty
   * instead of failing the order.
   *
   * @param href - `meta.href` of the order from the webhook event
   * @throws FetchError
   */
  async fetchOrder(href: string): Promise<OrderNotification> {
    const body = await this.get(href);
    const order = await this.parseOrder(href, body);

    const number =
      presentOrUndefined(order.name) ?? presentOrUndefined(order.number);
    if (!number) {
      throw new FetchError(
        "MoySklad order has neither name nor number",
        href,
      );
    }

    const [counterpartyName, stateName] = await Promise.all([
      this.resolveName(order.agent, "agent"),
      this.resolveName(order.state, "state"),
    ]);

    this.logger.debug(`Fetched order ${number} from ${href}`);

    return {
      number,
      moment: order.moment,
      counterpartyName,
      sum: order.sum,
      stateName,
      comment: resolveComment(order),
      href: order.meta?.href ?? href,
    };
  }

  /**
   * Authorization header for the configured credential mode
   */
  authorizationHeader(): string {
    const { credential } = this.config.moysklad;
    switch (credential.kind) {
      case "bearer":
        return `Bearer ${credential.token}`;
      case "basic":
        return `Basic ${credential.token}`;
    }
  }

  private async get(href: string): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await firstValueFrom(
        this.httpService
          .get<unknown>(href, {
            headers: {
              Authorization: this.authorizationHeader(),
              Accept: "application/json;charset=utf-8",
              "Accept-Encoding": "gzip",
            },
            timeout: this.config.httpTimeoutMs,
          })
          .pipe(timeout(this.config.httpTimeoutMs)),
      );
    } catch (error) {
      if (isAxiosError(error) && error.response) {
        throw new FetchError(
          `MoySklad API responded with HTTP ${error.response.status}`,
          href,
          error.response.status,
        );
      }
      throw new FetchError(
        `MoySklad API request failed: ${describeError(error)}`,
        href,
      );
    }

    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(
        `MoySklad API responded with HTTP ${response.status}`,
        href,
        response.status,
      );
    }

    return response.data;
  }

  private async parseOrder(
    href: string,
    body: unknown,
  ): Promise<CustomerOrderDto> {
    if (!isRecord(body)) {
      throw new FetchError(
        "MoySklad API returned a non-object order body",
        href,
      );
    }

    const order = plainToInstance(CustomerOrderDto, body);
    const errors = await validate(order);
    if (errors.length > 0) {
      throw new FetchError(
        `MoySklad order does not match the expected schema: ${formatValidationErrors(errors).join("; ")}`,
        href,
      );
    }

    return order;
  }

  private async resolveName(
    reference: EntityReferenceDto | undefined,
    label: string,
  ): Promise<string | undefined> {
    const name = presentOrUndefined(reference?.name);
    const href = reference?.meta?.href;
    if (name || !href) {
      return name;
    }
    if (classifyEntityHref(href, this.config.moysklad.apiUrl) === "foreign") {
      this.logger.warn(
        `Not resolving ${label} name from ${href}: outside ${this.config.moysklad.apiUrl}`,
      );
      return undefined;
    }

    try {
      const entity = await this.get(href);
      if (isRecord(entity) && typeof entity.name === "string") {
        return presentOrUndefined(entity.name);
      }
      this.logger.warn(`MoySklad ${label} at ${href} has no name`);
    } catch (error) {
      this.logger.warn(
        `Failed to resolve ${label} name from ${href}: ${describeError(error)}`,
      );
    }
    return undefined;
  }
}
