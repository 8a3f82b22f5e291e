/**
 * Configuration Management
 *
 * Loads and validates the config file into an immutable RelayConfig.
 * An invalid or empty provider table is fatal: there is no fallback config.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import { ApiTypes, UnknownModelPolicies, type ApiType, type Provider, type RelayConfig } from './types.js';

/**
 * api_type, matched case-insensitively ("openai", "Openai" and "OpenAI" are the same)
 */
const ApiTypeSchema = z.string().transform((value, ctx): ApiType => {
  const match = ApiTypes.find((t) => t.toLowerCase() === value.toLowerCase());
  if (!match) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be one of ${ApiTypes.join(', ')}`,
    });
    return z.NEVER;
  }
  return match;
});

/**
 * One provider record
 */
const ProviderSchema = z.object({
  name: z.string().min(1).regex(/^\S+$/, 'must not contain whitespace'),
  url: z.string().url(),
  secret: z.string().min(1).nullish(),
  /** Name of an environment variable holding the secret */
  secret_env: z.string().min(1).optional(),
  api_type: ApiTypeSchema,
  models: z.array(z.string().min(1)).optional(),
});

const TimeoutsSchema = z.object({
  connectMs: z.number().int().positive().default(10_000),
  idleMs: z.number().int().positive().default(120_000),
  drainMs: z.number().int().positive().default(30_000),
});

/**
 * Full config schema
 */
const ConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(11434),
  host: z.string().min(1).default('127.0.0.1'),
  unknownModelPolicy: z.enum(UnknownModelPolicies).default('reject'),
  ollamaVersion: z.string().min(1).default('0.6.0'),
  timeouts: TimeoutsSchema.default({}),
  providers: z.array(ProviderSchema).min(1, 'at least one provider is required'),
});

export type ProviderFileEntry = z.input<typeof ProviderSchema>;
export type ConfigFile = z.input<typeof ConfigSchema>;

/**
 * Demo configuration written by `ollama-relay init`
 */
export const DEFAULT_CONFIG: ConfigFile = {
  port: 11434,
  host: '127.0.0.1',
  unknownModelPolicy: 'reject',
  providers: [
    {
      name: 'ollama',
      url: 'http://127.0.0.1:11435',
      api_type: 'Ollama',
    },
    {
      name: 'aliyun',
      url: 'https://dashscope.aliyuncs.com/compatible-mode',
      secret_env: 'ALIYUN_API_KEY',
      api_type: 'OpenAI',
      models: ['qwen3-coder-plus', 'Moonshot-Kimi-K2-Instruct', 'qwen3-max', 'glm-4.5'],
    },
    {
      name: 'tsinghua',
      url: 'https://llmapi.paratera.com',
      secret_env: 'PARATERA_API_KEY',
      api_type: 'OpenAI',
      models: ['Qwen3-Coder-Plus', 'GLM-4.5'],
    },
  ],
};

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

/**
 * Get config file path
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['OLLAMA_RELAY_CONFIG'];
  if (override) return override;
  return path.join(os.homedir(), '.ollama-relay', 'config.json');
}

/**
 * Write the demo config file if none exists.
 * Returns true when a file was written.
 */
export function writeDefaultConfig(configPath: string = getConfigPath()): boolean {
  if (fs.existsSync(configPath)) return false;

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n', 'utf-8');
  return true;
}

/**
 * Read and validate the config file
 */
export function loadConfig(
  configPath: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env
): RelayConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError([`cannot read ${configPath}: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError([`${configPath} is not valid JSON: ${errorMessage(err)}`]);
  }

  return parseConfig(parsed, env);
}

/**
 * Validate an already-parsed config object.
 * Collects every issue before throwing, so one run shows all of them.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const file = result.data;
  const issues: string[] = [];
  const seen = new Set<string>();
  const providers: Provider[] = [];

  file.providers.forEach((entry, index) => {
    const where = `providers.${index} (${entry.name})`;

    if (seen.has(entry.name)) {
      issues.push(`${where}: duplicate provider name`);
    }
    seen.add(entry.name);

    let secret: string | null = entry.secret ?? null;
    if (secret === null && entry.secret_env) {
      const fromEnv = env[entry.secret_env];
      if (fromEnv) {
        secret = fromEnv;
      } else {
        issues.push(`${where}: environment variable ${entry.secret_env} is not set`);
      }
    }

    const url = new URL(entry.url);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      issues.push(`${where}: url must use http or https`);
    } else if (secret !== null && url.protocol !== 'https:' && !LOOPBACK_HOSTS.has(url.hostname)) {
      issues.push(`${where}: url must use https when a secret is configured`);
    }

    let models: string[] | null = null;
    if (entry.models) {
      const duplicates = entry.models.filter((m, i) => entry.models?.indexOf(m) !== i);
      if (duplicates.length > 0) {
        issues.push(`${where}: duplicate models ${[...new Set(duplicates)].join(', ')}`);
      }
      models = [...entry.models];
    }

    providers.push(
      Object.freeze({
        name: entry.name,
        url: entry.url,
        secret,
        apiType: entry.api_type,
        models: models ? Object.freeze(models) : null,
      })
    );
  });

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return Object.freeze({
    port: file.port,
    host: file.host,
    unknownModelPolicy: file.unknownModelPolicy,
    ollamaVersion: file.ollamaVersion,
    timeouts: Object.freeze({ ...file.timeouts }),
    providers: Object.freeze(providers),
  });
}

/**
 * Display form of a secret, for CLI output
 */
export function maskSecret(secret: string | null): string {
  if (secret === null) return '(none)';
  if (secret.length <= 8) return '****';
  return `${secret.slice(0, 3)}****${secret.slice(-2)}`;
}
