import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/utils/config';

const base = { JWT_SECRET: 'test-secret', CORS_ORIGIN: 'http://localhost:5173' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(base)).toEqual({
      nodeEnv: 'development',
      port: 3001,
      corsOrigins: ['http://localhost:5173'],
      jwtSecret: 'test-secret',
      store: 'memory',
      databaseUrl: undefined,
      dbPoolMax: 10,
      rolePrivileges: undefined,
      isProduction: false
    });
  });

  it('splits a comma-separated origin list', () => {
    const config = loadConfig({ ...base, CORS_ORIGIN: 'http://a.test, http://b.test' });

    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('reports every missing required variable', () => {
    expect(() => loadConfig({})).toThrow(
      'Invalid configuration: CORS_ORIGIN: Required; JWT_SECRET: Required'
    );
  });

  it('requires a database url for the postgres store', () => {
    expect(() => loadConfig({ ...base, OBS_STORE: 'postgres' })).toThrow(
      'DATABASE_URL: DATABASE_URL is required when OBS_STORE=postgres'
    );

    const config = loadConfig({ ...base, OBS_STORE: 'postgres', DATABASE_URL: 'postgres://localhost:5432/obs', DB_POOL_MAX: '4' });
    expect(config).toMatchObject({ store: 'postgres', databaseUrl: 'postgres://localhost:5432/obs', dbPoolMax: 4 });
  });

  it('parses role privileges from JSON', () => {
    const config = loadConfig({ ...base, ROLE_PRIVILEGES: '{"clerk":["View Observations"]}' });

    expect(config.rolePrivileges).toEqual({ clerk: ['View Observations'] });
    expect(() => loadConfig({ ...base, ROLE_PRIVILEGES: '{not json' })).toThrow('ROLE_PRIVILEGES is not valid JSON');
    expect(() => loadConfig({ ...base, ROLE_PRIVILEGES: '{"clerk":"all"}' })).toThrow(
      'ROLE_PRIVILEGES must map role names to arrays of privilege names'
    );
  });

  it('flags production', () => {
    expect(loadConfig({ ...base, NODE_ENV: 'production' }).isProduction).toBe(true);
  });
});
