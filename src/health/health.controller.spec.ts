import { Test, TestingModule } from '@nestjs/testing';
import { HealthCheckService, TypeOrmHealthIndicator } from '@nestjs/terminus';
import { DATABASE_PING_TIMEOUT_MS, HealthController } from './health.controller';

describe('HealthController', () => {
  let controller: HealthController;
  const pingCheck = jest.fn();

  beforeEach(async () => {
    pingCheck.mockReset();
    pingCheck.mockResolvedValue({ database: { status: 'up' } });

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        HealthCheckService,
        { provide: TypeOrmHealthIndicator, useValue: { pingCheck } },
      ],
    })
      .overrideProvider(HealthCheckService)
      .useValue({
        check: jest.fn((checks: (() => Promise<unknown>)[]) =>
          Promise.all(checks.map((c) => c())).then((results) => ({
            status: 'ok',
            info: Object.assign({}, ...results),
            error: {},
            details: Object.assign({}, ...results),
          })),
        ),
      })
      .compile();

    controller = module.get<HealthController>(HealthController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('when healthy returns result with status ok and database up', async () => {
    const result = await controller.check();
    expect(result.status).toBe('ok');
    expect(result.info?.database?.status).toBe('up');
  });

  it('pings the database with a bounded timeout', async () => {
    await controller.check();
    expect(pingCheck).toHaveBeenCalledWith('database', {
      timeout: DATABASE_PING_TIMEOUT_MS,
    });
  });
});
