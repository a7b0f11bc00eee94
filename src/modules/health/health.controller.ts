import { Controller, Get, Logger } from '@nestjs/common';
import { HealthCheck, HealthCheckResult, HealthCheckService } from '@nestjs/terminus';
import { SessionStoreHealthIndicator } from './session-store.health';
import { VectorStoreHealthIndicator } from './vector-store.health';

@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly health: HealthCheckService,
    private readonly vectorStoreHealth: VectorStoreHealthIndicator,
    private readonly sessionStoreHealth: SessionStoreHealthIndicator,
  ) { }

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    this.logger.log('Health check endpoint called.');
    return this.health.check([
      () => this.vectorStoreHealth.isHealthy('vectorStore'),
      () => this.sessionStoreHealth.isHealthy('sessionStore'),
    ]);
  }
}
