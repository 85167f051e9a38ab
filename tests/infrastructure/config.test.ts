import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigError, REQUIRED_ENV } from '../../src/infrastructure/config/env.js';
import { TEST_ENV } from '../helpers.js';

function configError(env: Record<string, string>): ConfigError {
  try {
    loadConfig(env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to throw');
}

function without(...names: string[]): Record<string, string> {
  return Object.fromEntries(Object.entries(TEST_ENV).filter(([key]) => !names.includes(key)));
}

describe('loadConfig', () => {
  it('builds the config from a complete environment', () => {
    const config = loadConfig(TEST_ENV);

    expect(config.tableau).toEqual({
      serverUrl: 'https://tableau.example.com',
      apiVersion: '3.21',
      siteName: 'mysite',
      username: 'analyst@example.com',
      personalAccessToken: { name: 'pat-name', secret: 'test-secret' },
      connectedApp: {
        clientId: 'client-123',
        secretId: 'secret-id-456',
        secretValue: 'test-ca-secret',
      },
    });
    expect(config.twilio).toEqual({
      accountSid: 'AC-test',
      authToken: 'test-token',
      sms: { from: '+15550000001', to: '+15550000002' },
      whatsapp: { from: 'whatsapp:+15550000003', to: 'whatsapp:+15550000004' },
    });
  });

  it('applies defaults for optional variables', () => {
    const config = loadConfig(TEST_ENV);

    expect(config.server).toEqual({ host: '0.0.0.0', port: 5000, logLevel: 'info' });
    expect(config.auditLogPath).toBe('log.txt');
    expect(config.webhookSecret).toBeUndefined();
  });

  it('reads optional overrides', () => {
    const config = loadConfig({
      ...TEST_ENV,
      PORT: '8080',
      LOG_LEVEL: 'debug',
      AUDIT_LOG_PATH: '/var/log/notifier.log',
      TABLEAU_API_VERSION: '3.22',
      WEBHOOK_SECRET: 'test-secret',
    });

    expect(config.server.port).toBe(8080);
    expect(config.server.logLevel).toBe('debug');
    expect(config.auditLogPath).toBe('/var/log/notifier.log');
    expect(config.tableau.apiVersion).toBe('3.22');
    expect(config.webhookSecret).toBe('test-secret');
  });

  it('strips trailing slashes from the server URL', () => {
    const config = loadConfig({ ...TEST_ENV, TABLEAU_SERVER: 'https://tableau.example.com//' });
    expect(config.tableau.serverUrl).toBe('https://tableau.example.com');
  });

  it('returns a frozen config', () => {
    const config = loadConfig(TEST_ENV);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tableau.connectedApp)).toBe(true);
    expect(Object.isFrozen(config.twilio.sms)).toBe(true);
  });

  it.each(REQUIRED_ENV.map((name) => [name]))('fails naming %s when it is missing', (name) => {
    const err = configError(without(name));

    expect(err.variable).toBe(name);
    expect(err.message).toBe(`Environment variable ${name} is not available, server shutting down...`);
  });

  it('treats an empty value as missing', () => {
    const err = configError({ ...TEST_ENV, TWILIO_AUTH_TOKEN: '  ' });
    expect(err.variable).toBe('TWILIO_AUTH_TOKEN');
  });

  it('names the first missing variable in declaration order', () => {
    const err = configError(without('WHATSAPP_TO', 'TABLEAU_PAT_SECRET'));
    expect(err.variable).toBe('TABLEAU_PAT_SECRET');
  });

  it('rejects a server value that is not a URL', () => {
    const err = configError({ ...TEST_ENV, TABLEAU_SERVER: 'not-a-url' });

    expect(err.variable).toBe('TABLEAU_SERVER');
    expect(err.message).toMatch(/^Environment variable TABLEAU_SERVER is invalid: /);
  });

  it('rejects a non-numeric port', () => {
    const err = configError({ ...TEST_ENV, PORT: 'abc' });
    expect(err.variable).toBe('PORT');
  });

  it('falls back to defaults for empty optional values', () => {
    const config = loadConfig({ ...TEST_ENV, PORT: '', WEBHOOK_SECRET: '' });

    expect(config.server.port).toBe(5000);
    expect(config.webhookSecret).toBeUndefined();
  });
});
