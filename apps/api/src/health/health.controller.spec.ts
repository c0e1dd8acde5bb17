import { HealthCheckService, MemoryHealthIndicator, TypeOrmHealthIndicator } from '@nestjs/terminus';
import { Test, TestingModule } from '@nestjs/testing';

import { HEAP_LIMIT_BYTES, HealthController } from './health.controller';

describe('HealthController', () => {
  let controller: HealthController;
  let health: { check: jest.Mock };
  let memory: { checkHeap: jest.Mock };
  let typeOrm: { pingCheck: jest.Mock };

  beforeEach(async () => {
    health = { check: jest.fn().mockResolvedValue({ status: 'ok' }) };
    memory = { checkHeap: jest.fn().mockResolvedValue({}) };
    typeOrm = { pingCheck: jest.fn().mockResolvedValue({}) };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: HealthCheckService, useValue: health },
        { provide: MemoryHealthIndicator, useValue: memory },
        { provide: TypeOrmHealthIndicator, useValue: typeOrm }
      ]
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  it('should compose the database and heap checks', async () => {
    const result = await controller.check();

    expect(result).toEqual({ status: 'ok' });
    expect(health.check).toHaveBeenCalledTimes(1);

    const checks = health.check.mock.calls[0]?.[0];
    expect(checks).toHaveLength(2);

    await checks[0]();
    expect(typeOrm.pingCheck).toHaveBeenCalledWith('database');

    await checks[1]();
    expect(memory.checkHeap).toHaveBeenCalledWith('memory_heap', HEAP_LIMIT_BYTES);
  });
});
