import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiTags } from "@nestjs/swagger";
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
} from "@nestjs/terminus";

@Controller()
@ApiTags("Health")
export class HealthController {
  constructor(private readonly health: HealthCheckService) {}

  /**
   * Liveness of the notifier
   *
   * The service keeps no state and owns no connection, so there is nothing to
   * probe beyond the process answering.
   */
  @Get("health")
  @HealthCheck()
  @ApiOperation({ summary: "Get service health status" })
  check(): Promise<HealthCheckResult> {
    return this.health.check([]);
  }
}
