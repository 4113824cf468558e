import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { deepMerge, getEnvOverrides, loadConfig, parseConfig } from '../src/config/config-manager.js';
import { ConfigError } from '../src/core/errors.js';

describe('getEnvOverrides', () => {
  it('maps environment variables onto config sections', () => {
    const overrides = getEnvOverrides({
      PORT: '9000',
      HUDDLE_JWT_SECRET: 'test-secret',
      HUDDLE_TOKEN_TTL: '120',
      HUDDLE_DB_PATH: ':memory:',
      HUDDLE_RESPONDER: 'openai',
      OPENAI_API_KEY: 'test-key',
    });

    expect(overrides).toEqual({
      server: { port: 9000 },
      auth: { jwtSecret: 'test-secret', tokenTtlSeconds: 120 },
      storage: { sqlitePath: ':memory:' },
      responder: { kind: 'openai', apiKey: 'test-key' },
    });
  });

  it('returns nothing for an empty environment', () => {
    expect(getEnvOverrides({})).toEqual({});
  });

  it('leaves a non-numeric port for validation to reject', () => {
    const overrides = getEnvOverrides({ PORT: 'eighty', HUDDLE_JWT_SECRET: 'test-secret' });
    expect(() => parseConfig(overrides)).toThrow(ConfigError);
  });
});

describe('deepMerge', () => {
  it('merges nested sections and lets the source win', () => {
    const merged = deepMerge(
      { server: { host: 'a', port: 1 }, logLevel: 'info' },
      { server: { port: 2 }, logLevel: 'debug' },
    );
    expect(merged).toEqual({ server: { host: 'a', port: 2 }, logLevel: 'debug' });
  });
});

describe('parseConfig', () => {
  it('fills defaults around the required secret', () => {
    const config = parseConfig({ auth: { jwtSecret: 'test-secret' } });

    expect(config.server).toEqual({ host: 'localhost', port: 8000, wsPath: '/ws', maxPayloadBytes: 65536 });
    expect(config.auth).toEqual({ jwtSecret: 'test-secret', algorithms: ['HS256'], tokenTtlSeconds: 1800 });
    expect(config.storage).toEqual({ type: 'sqlite', sqlitePath: 'data/huddle.db' });
    expect(config.responder).toMatchObject({ kind: 'mock', timeoutMs: 15000, historyWindow: 10 });
    expect(config.logLevel).toBe('info');
  });

  it('requires the auth section', () => {
    expect(() => parseConfig({})).toThrow('配置验证失败: auth: Required');
  });

  it('rejects an unknown responder kind', () => {
    expect(() => parseConfig({ auth: { jwtSecret: 'test-secret' }, responder: { kind: 'oracle' } }))
      .toThrow(/^配置验证失败: responder\.kind: /);
  });
});

describe('loadConfig', () => {
  const dirs: string[] = [];

  afterEach(() => {
    vi.unstubAllEnvs();
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  function writeConfig(content: string): string {
    const dir = mkdtempSync(join(tmpdir(), 'huddle-config-'));
    dirs.push(dir);
    const path = join(dir, 'config.json');
    writeFileSync(path, content);
    return path;
  }

  it('reads the file and applies environment overrides on top', async () => {
    vi.stubEnv('PORT', '9100');
    const path = writeConfig(JSON.stringify({ server: { host: '127.0.0.1', port: 8000 }, auth: { jwtSecret: 'test-secret' } }));

    const config = await loadConfig(path);

    expect(config.server.host).toBe('127.0.0.1');
    expect(config.server.port).toBe(9100);
    expect(config.auth.jwtSecret).toBe('test-secret');
  });

  it('fails for a missing or malformed file', async () => {
    await expect(loadConfig(join(tmpdir(), 'huddle-missing', 'config.json'))).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig(writeConfig('{ not json'))).rejects.toThrow('配置文件解析失败');
    await expect(loadConfig(writeConfig('[]'))).rejects.toThrow('配置文件顶层必须是对象');
  });
});
