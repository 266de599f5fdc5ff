import { describe, it, expect, afterEach } from 'vitest';
import { config } from 'dotenv';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_BASE_URL, loadSettings } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('loadSettings', () => {
  it('should use defaults when nothing is set', () => {
    const settings = loadSettings({});

    expect(settings.host).toBe('127.0.0.1');
    expect(settings.port).toBe(8000);
    expect(settings.transport).toBe('http');
    expect(settings.euvdBaseUrl).toBe(DEFAULT_BASE_URL);
    expect(settings.euvdTimeout).toBe(30);
    expect(settings.euvdMaxRetries).toBe(3);
    expect(settings.userAgent).toContain('Mozilla');
    expect(settings.logLevel).toBe('info');
  });

  it('should read overrides from the environment', () => {
    const settings = loadSettings({
      HOST: '0.0.0.0',
      PORT: '9000',
      EUVD_TIMEOUT: '60',
      EUVD_MAX_RETRIES: '5',
      MCP_TRANSPORT: 'stdio',
      LOG_LEVEL: 'DEBUG',
    });

    expect(settings.host).toBe('0.0.0.0');
    expect(settings.port).toBe(9000);
    expect(settings.euvdTimeout).toBe(60);
    expect(settings.euvdMaxRetries).toBe(5);
    expect(settings.transport).toBe('stdio');
    expect(settings.logLevel).toBe('debug');
  });

  it('should match variable names case-insensitively', () => {
    const settings = loadSettings({ host: 'localhost', port: '8080', euvd_timeout: '45', euvd_max_retries: '2' });

    expect(settings.host).toBe('localhost');
    expect(settings.port).toBe(8080);
    expect(settings.euvdTimeout).toBe(45);
    expect(settings.euvdMaxRetries).toBe(2);
  });

  it('should treat empty values as unset', () => {
    expect(loadSettings({ PORT: '', EUVD_BASE_URL: '  ' }).port).toBe(8000);
  });

  it('should strip a trailing slash from the base URL', () => {
    expect(loadSettings({ EUVD_BASE_URL: 'https://example.com/euvd/' }).euvdBaseUrl).toBe(
      'https://example.com/euvd',
    );
  });

  it('should allow zero retries', () => {
    expect(loadSettings({ EUVD_MAX_RETRIES: '0' }).euvdMaxRetries).toBe(0);
  });

  it('should reject invalid values', () => {
    expect(() => loadSettings({ PORT: 'abc' })).toThrow(ConfigurationError);
    expect(() => loadSettings({ EUVD_BASE_URL: 'not a url' })).toThrow('Invalid configuration: EUVD_BASE_URL: Invalid url');
    expect(() => loadSettings({ MCP_TRANSPORT: 'sse' })).toThrow(ConfigurationError);
    expect(() => loadSettings({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });

  it('should list every invalid variable', () => {
    try {
      loadSettings({ PORT: '-1', EUVD_TIMEOUT: '0' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues.map(issue => issue.path[0])).toEqual(['PORT', 'EUVD_TIMEOUT']);
      }
    }
  });
});

describe('loadSettings with a .env file', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  function writeEnvFile(contents: string): string {
    dir = mkdtempSync(join(tmpdir(), 'euvd-config-'));
    const path = join(dir, '.env');
    writeFileSync(path, contents);
    return path;
  }

  it('should read settings from the file', () => {
    const path = writeEnvFile(
      ['# local overrides', 'port=9100', 'EUVD_BASE_URL="https://example.com/euvd/"', 'LOG_LEVEL=warn'].join('\n'),
    );
    const env: Record<string, string> = {};

    config({ path, processEnv: env });
    const settings = loadSettings(env);

    expect(settings.port).toBe(9100);
    expect(settings.euvdBaseUrl).toBe('https://example.com/euvd');
    expect(settings.logLevel).toBe('warn');
    expect(settings.host).toBe('127.0.0.1');
  });

  it('should let the process environment win over the file', () => {
    const path = writeEnvFile('PORT=9100\nHOST=0.0.0.0\n');
    const env: Record<string, string> = { PORT: '9200' };

    config({ path, processEnv: env });
    const settings = loadSettings(env);

    expect(settings.port).toBe(9200);
    expect(settings.host).toBe('0.0.0.0');
  });
});
