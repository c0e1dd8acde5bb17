import { validateEnv } from './env.validation';

const validEnv = {
  PGHOST: 'localhost',
  PGDATABASE: 'storefront',
  PGUSER: 'storefront',
  PGPASSWORD: 'test-secret'
};

describe('validateEnv', () => {
  let exitSpy: jest.SpyInstance;
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    consoleSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should apply defaults to a minimal environment', () => {
    expect(validateEnv(validEnv)).toEqual({
      ...validEnv,
      NODE_ENV: 'development',
      PORT: 3000,
      HOST: '0.0.0.0',
      PGPORT: 5432,
      PG_POOL_MAX: 10
    });
  });

  it('should coerce numeric strings', () => {
    const env = validateEnv({ ...validEnv, PORT: '8080', PGPORT: '6543', PG_POOL_MAX: '4' });

    expect(env.PORT).toBe(8080);
    expect(env.PGPORT).toBe(6543);
    expect(env.PG_POOL_MAX).toBe(4);
  });

  it('should exit when a required variable is missing', () => {
    const { PGHOST: _omitted, ...withoutHost } = validEnv;

    expect(() => validateEnv(withoutHost)).toThrow('process.exit(1)');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(consoleSpy).toHaveBeenCalledWith('Missing required environment variables:');
    expect(consoleSpy).toHaveBeenCalledWith('  PGHOST: Required');
  });

  it('should report invalid values separately from missing ones', () => {
    expect(() => validateEnv({ ...validEnv, NODE_ENV: 'staging' })).toThrow('process.exit(1)');
    expect(consoleSpy).toHaveBeenCalledWith('Invalid environment variable values:');
    expect(consoleSpy).not.toHaveBeenCalledWith('Missing required environment variables:');
  });
});
