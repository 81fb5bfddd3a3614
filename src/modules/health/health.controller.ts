import { Controller, Get, Logger } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import { ReadinessService } from '../rag/services/readiness.service';
import { IndexHealthIndicator } from './index.health';

const HEAP_LIMIT_BYTES = 512 * 1024 * 1024;

export interface HealthStatus {
  status: 'ok' | 'degraded';
  ready: boolean;
}

@ApiTags('health')
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly readiness: ReadinessService,
    private readonly health: HealthCheckService,
    private readonly indexHealth: IndexHealthIndicator,
    private readonly memory: MemoryHealthIndicator,
  ) { }

  /**
   * `ready` is true exactly when the index state is READY.
   */
  @Get()
  @ApiOperation({ summary: 'Readiness of the profile index' })
  @ApiOkResponse({ schema: { example: { status: 'ok', ready: true } } })
  check(): HealthStatus {
    const ready = this.readiness.isReady();
    this.logger.debug(`Health check endpoint called (ready=${ready}).`);
    return { status: ready ? 'ok' : 'degraded', ready };
  }

  @Get('details')
  @HealthCheck()
  @ApiOperation({ summary: 'Detailed health report (503 while the index is not ready)' })
  details() {
    return this.health.check([
      () => this.indexHealth.isHealthy('index'),
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
    ]);
  }
}
