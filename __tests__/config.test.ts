import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CONFIG,
  getConfigPath,
  loadConfig,
  maskSecret,
  parseConfig,
  writeDefaultConfig,
} from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

function issuesOf(raw: unknown, env: NodeJS.ProcessEnv = {}): string[] {
  try {
    parseConfig(raw, env);
  } catch (err) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  throw new Error('expected the config to be rejected');
}

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig({
      providers: [{ name: 'local', url: 'http://127.0.0.1:11435', api_type: 'Ollama' }],
    });

    expect(config.port).toBe(11434);
    expect(config.host).toBe('127.0.0.1');
    expect(config.unknownModelPolicy).toBe('reject');
    expect(config.ollamaVersion).toBe('0.6.0');
    expect(config.timeouts).toEqual({ connectMs: 10_000, idleMs: 120_000, drainMs: 30_000 });
    expect(config.providers).toEqual([
      { name: 'local', url: 'http://127.0.0.1:11435', secret: null, apiType: 'Ollama', models: null },
    ]);
  });

  it('matches api_type case-insensitively', () => {
    const config = parseConfig({
      providers: [
        { name: 'a', url: 'http://127.0.0.1:1', api_type: 'openai' },
        { name: 'b', url: 'http://127.0.0.1:2', api_type: 'OLLAMA' },
      ],
    });
    expect(config.providers.map((p) => p.apiType)).toEqual(['OpenAI', 'Ollama']);
  });

  it('reads secrets from the environment', () => {
    const config = parseConfig(
      {
        providers: [
          { name: 'cloud', url: 'https://cloud.example.test', secret_env: 'CLOUD_KEY', api_type: 'OpenAI' },
        ],
      },
      { CLOUD_KEY: 'test-secret' }
    );
    expect(config.providers[0]?.secret).toBe('test-secret');
  });

  it('prefers an inline secret over secret_env', () => {
    const config = parseConfig(
      {
        providers: [
          {
            name: 'cloud',
            url: 'https://cloud.example.test',
            secret: 'inline-secret',
            secret_env: 'CLOUD_KEY',
            api_type: 'OpenAI',
          },
        ],
      },
      { CLOUD_KEY: 'test-secret' }
    );
    expect(config.providers[0]?.secret).toBe('inline-secret');
  });

  it('returns a frozen table', () => {
    const config = parseConfig({
      providers: [{ name: 'local', url: 'http://127.0.0.1:1', api_type: 'Ollama', models: ['m'] }],
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.providers)).toBe(true);
    expect(Object.isFrozen(config.providers[0])).toBe(true);
    expect(Object.isFrozen(config.providers[0]?.models)).toBe(true);
  });

  it('rejects an empty provider table', () => {
    expect(issuesOf({ providers: [] })).toEqual(['providers: at least one provider is required']);
  });

  it('reports schema issues with their path', () => {
    expect(issuesOf({ providers: [{ name: 'has space', url: 'http://127.0.0.1:1', api_type: 'Gemini' }] })).toEqual([
      'providers.0.name: must not contain whitespace',
      'providers.0.api_type: must be one of Ollama, OpenAI',
    ]);
  });

  it('collects every cross-field issue', () => {
    const issues = issuesOf({
      providers: [
        { name: 'dup', url: 'http://127.0.0.1:1', api_type: 'Ollama' },
        { name: 'dup', url: 'http://127.0.0.1:2', api_type: 'Ollama' },
        { name: 'missing', url: 'https://cloud.example.test', secret_env: 'NOPE', api_type: 'OpenAI' },
        { name: 'plain', url: 'http://cloud.example.test', secret: 'test-secret', api_type: 'OpenAI' },
        { name: 'ftp', url: 'ftp://cloud.example.test', api_type: 'OpenAI' },
        { name: 'models', url: 'http://127.0.0.1:3', api_type: 'Ollama', models: ['a', 'b', 'a'] },
      ],
    });
    expect(issues).toEqual([
      'providers.1 (dup): duplicate provider name',
      'providers.2 (missing): environment variable NOPE is not set',
      'providers.3 (plain): url must use https when a secret is configured',
      'providers.4 (ftp): url must use http or https',
      'providers.5 (models): duplicate models a',
    ]);
  });

  it('allows plain http with a secret on loopback', () => {
    const config = parseConfig({
      providers: [{ name: 'local', url: 'http://localhost:11435', secret: 'user:test-secret', api_type: 'Ollama' }],
    });
    expect(config.providers[0]?.secret).toBe('user:test-secret');
  });

  it('accepts the shipped example config', () => {
    const example: unknown = JSON.parse(
      fs.readFileSync(new URL('../config.example.json', import.meta.url), 'utf-8')
    );
    const config = parseConfig(example, { ALIYUN_API_KEY: 'test-secret', PARATERA_API_KEY: 'test-secret' });
    expect(config.providers.map((p) => p.name)).toEqual(['ollama', 'aliyun', 'tsinghua']);
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ollama-relay-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('getConfigPath honours OLLAMA_RELAY_CONFIG', () => {
    expect(getConfigPath({ OLLAMA_RELAY_CONFIG: '/tmp/relay.json' })).toBe('/tmp/relay.json');
    expect(getConfigPath({})).toBe(path.join(os.homedir(), '.ollama-relay', 'config.json'));
  });

  it('writeDefaultConfig writes once and never overwrites', () => {
    const file = path.join(dir, 'nested', 'config.json');
    expect(writeDefaultConfig(file)).toBe(true);
    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual(DEFAULT_CONFIG);

    fs.writeFileSync(file, '{}');
    expect(writeDefaultConfig(file)).toBe(false);
    expect(fs.readFileSync(file, 'utf-8')).toBe('{}');
  });

  it('loadConfig reads and validates a file', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(
      file,
      JSON.stringify({ port: 8080, providers: [{ name: 'local', url: 'http://127.0.0.1:1', api_type: 'Ollama' }] })
    );
    expect(loadConfig(file, {}).port).toBe(8080);
  });

  it('loadConfig fails on a missing file', () => {
    const file = path.join(dir, 'absent.json');
    expect(() => loadConfig(file, {})).toThrow(`cannot read ${file}`);
  });

  it('loadConfig fails on invalid JSON', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, '{ not json');
    expect(() => loadConfig(file, {})).toThrow(`${file} is not valid JSON`);
  });
});

describe('maskSecret', () => {
  it('never shows a short secret', () => {
    expect(maskSecret(null)).toBe('(none)');
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('12345678')).toBe('****');
  });

  it('keeps only the ends of a long secret', () => {
    expect(maskSecret('test-secret-value')).toBe('tes****ue');
  });
});
