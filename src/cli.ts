#!/usr/bin/env node
/**
 * Ollama Relay CLI
 *
 * Local Ollama-compatible endpoint that routes each request to a configured
 * provider by the prefix of its model name.
 *
 * Usage:
 *   ollama-relay [command] [options]
 *
 * Commands:
 *   serve (default)    Start the relay
 *   init               Write a starter config file
 *   config             Show the resolved provider table
 *   models             List every tagged model name
 *   status             Query a running relay
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { getConfigPath, loadConfig, maskSecret, writeDefaultConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { probeHealth } from './health.js';
import { createLogger } from './logger.js';
import { CliUsageError, parseCliArgs, type CliOptions } from './cli-args.js';
import { ProviderRegistry } from './routing/registry.js';
import { RelayServer } from './server.js';
import { formatStatus } from './status.js';
import type { RelayConfig } from './types.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // running outside the package
  }
  return '0.0.0';
}

const VERSION = readVersion();

function printHelp(): void {
  console.log(`
Ollama Relay - one local Ollama endpoint in front of many model providers

Usage:
  ollama-relay [command] [options]

Commands:
  serve (default)        Start the relay
  init                   Write a starter config file
  config                 Show the resolved provider table
  models                 List every tagged model name
  status                 Query a running relay

Options:
  -c, --config <path>    Config file (default: ~/.ollama-relay/config.json)
  --port <number>        Port to listen on (default: from config, 11434)
  --host <string>        Host to bind to (default: from config, 127.0.0.1)
  -v, --verbose          Enable verbose logging
  -h, --help             Show this help message
  --version              Show version

Environment Variables:
  OLLAMA_RELAY_CONFIG    Config file path, overridden by --config

Models are addressed as <provider>-<model>, e.g. aliyun-qwen3-max.
Point your client at the relay:
  OLLAMA_HOST=http://127.0.0.1:11434 your-client
`);
}

function resolveConfig(options: CliOptions): { config: RelayConfig; path: string } {
  const path = options.configPath ?? getConfigPath();
  const config = loadConfig(path);
  return {
    path,
    config: {
      ...config,
      port: options.port ?? config.port,
      host: options.host ?? config.host,
    },
  };
}

function handleInitCommand(options: CliOptions): void {
  const path = options.configPath ?? getConfigPath();
  const written = writeDefaultConfig(path);
  console.log('');
  if (written) {
    console.log('✅ Ollama Relay initialized');
    console.log(`   Config: ${path}`);
    console.log('');
    console.log('Next steps:');
    console.log('  1. Edit the providers in the config file');
    console.log('  2. Export the secrets named by secret_env');
    console.log('  3. Start the relay: ollama-relay');
  } else {
    console.log(`Config already exists: ${path}`);
  }
  console.log('');
}

function handleConfigCommand(options: CliOptions): void {
  const { config, path } = resolveConfig(options);
  console.log('');
  console.log(`Config:    ${path}`);
  console.log(`Listen:    http://${config.host}:${config.port}`);
  console.log(`Unknown models: ${config.unknownModelPolicy}`);
  console.log('');
  console.log('Providers:');
  for (const provider of config.providers) {
    console.log(`  ${provider.name}`);
    console.log(`    url:      ${provider.url}`);
    console.log(`    api_type: ${provider.apiType}`);
    console.log(`    secret:   ${maskSecret(provider.secret)}`);
    console.log(`    models:   ${provider.models ? provider.models.join(', ') : '(any)'}`);
  }
  console.log('');
}

function handleModelsCommand(options: CliOptions): void {
  const { config } = resolveConfig(options);
  const registry = ProviderRegistry.fromConfig(config);
  for (const model of registry.listTaggedModels()) {
    console.log(model.tagged);
  }
}

async function handleStatusCommand(options: CliOptions): Promise<boolean> {
  let host = options.host ?? '127.0.0.1';
  let port = options.port ?? 11434;
  if (options.port === null || options.host === null) {
    try {
      const { config } = resolveConfig(options);
      host = options.host ?? config.host;
      port = options.port ?? config.port;
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
    }
  }

  const url = `http://${host}:${port}`;
  const payload = await probeHealth(url);
  console.log('');
  if (payload) {
    console.log(formatStatus(payload, url));
    console.log('');
    console.log(`  🟢 Relay is reachable at ${url}`);
  } else {
    console.log(`  🔴 Relay is not reachable at ${url}`);
  }
  console.log('');
  return payload !== null;
}

async function serve(options: CliOptions): Promise<void> {
  const { config, path } = resolveConfig(options);
  const logger = createLogger({ verbose: options.verbose });
  const registry = ProviderRegistry.fromConfig(config);
  const server = RelayServer.fromConfig(config, registry, { logger, version: VERSION });

  console.log('');
  console.log('  ╭─────────────────────────────────────────╮');
  console.log(`  │          Ollama Relay v${VERSION.padEnd(17)}│`);
  console.log('  ╰─────────────────────────────────────────╯');
  console.log('');
  console.log(`  Config: ${path}`);
  console.log('  Providers:');
  for (const provider of registry.list()) {
    const models = provider.models ? `${provider.models.length} model(s)` : 'any model';
    console.log(`    ✓ ${provider.name} (${provider.apiType}, ${models})`);
  }
  console.log('');

  await server.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.error('Run ollama-relay --help for usage.');
      process.exit(2);
    }
    throw err;
  }

  switch (options.command) {
    case 'help':
      printHelp();
      return;
    case 'version':
      console.log(`Ollama Relay v${VERSION}`);
      return;
    case 'init':
      handleInitCommand(options);
      return;
    case 'config':
      handleConfigCommand(options);
      return;
    case 'models':
      handleModelsCommand(options);
      return;
    case 'status':
      if (!(await handleStatusCommand(options))) process.exitCode = 1;
      return;
    case 'serve':
      await serve(options);
      return;
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(err.message);
  } else {
    console.error('Failed to start relay:', errorMessage(err));
  }
  process.exit(1);
});
