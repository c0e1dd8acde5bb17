import { Controller, Get } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator, TypeOrmHealthIndicator } from '@nestjs/terminus';

export const HEAP_LIMIT_BYTES = 512 * 1024 * 1024;

@ApiExcludeController()
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly typeOrm: TypeOrmHealthIndicator
  ) {}

  @Get()
  @HealthCheck()
  async check() {
    return this.health.check([
      () => this.typeOrm.pingCheck('database'),
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)
    ]);
  }
}
