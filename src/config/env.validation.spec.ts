import { Environment, validateEnvironment } from './env.validation';

const validEnv = {
  NODE_ENV: 'test',
  PORT: '4000',
  DB_HOST: 'localhost',
  DB_PORT: '5432',
  DB_USERNAME: 'postgres',
  DB_PASSWORD: 'postgres',
  DB_NAME: 'campus_test',
  JWT_SECRET: 'test-jwt-secret',
  TICKET_SIGNING_SECRET: 'test-secret-test-secret-test-secret',
};

describe('validateEnvironment', () => {
  it('converts numeric strings and keeps the values', () => {
    const env = validateEnvironment(validEnv);

    expect(env.NODE_ENV).toBe(Environment.Test);
    expect(env.PORT).toBe(4000);
    expect(env.DB_PORT).toBe(5432);
    expect(env.TICKET_SIGNING_SECRET).toBe(validEnv.TICKET_SIGNING_SECRET);
  });

  it('defaults PORT and NODE_ENV when absent', () => {
    const { PORT: _port, NODE_ENV: _env, ...rest } = validEnv;

    const env = validateEnvironment(rest);

    expect(env.PORT).toBe(3000);
    expect(env.NODE_ENV).toBe(Environment.Development);
  });

  it('rejects a ticket signing secret shorter than 32 characters', () => {
    expect(() =>
      validateEnvironment({ ...validEnv, TICKET_SIGNING_SECRET: 'short' }),
    ).toThrow('Config validation error');
  });

  it('rejects a missing database host', () => {
    const { DB_HOST: _host, ...rest } = validEnv;

    expect(() => validateEnvironment(rest)).toThrow('Config validation error');
  });
});
