import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from '../src/cli-args.js';

describe('parseCliArgs', () => {
  it('defaults to serve', () => {
    expect(parseCliArgs([])).toEqual({
      command: 'serve',
      configPath: null,
      port: null,
      host: null,
      verbose: false,
    });
  });

  it('reads server options around the command', () => {
    expect(parseCliArgs(['--port', '8080', 'serve', '--host', '0.0.0.0', '-v', '--config', '/etc/relay.json'])).toEqual({
      command: 'serve',
      configPath: '/etc/relay.json',
      port: 8080,
      host: '0.0.0.0',
      verbose: true,
    });
  });

  it('recognises every subcommand', () => {
    for (const command of ['init', 'config', 'models', 'status'] as const) {
      expect(parseCliArgs([command]).command).toBe(command);
    }
  });

  it('lets help and version win over anything else', () => {
    expect(parseCliArgs(['models', '--help']).command).toBe('help');
    expect(parseCliArgs(['-h']).command).toBe('help');
    expect(parseCliArgs(['--version', '--port', 'x']).command).toBe('version');
  });

  it('rejects an invalid port', () => {
    expect(() => parseCliArgs(['--port', '70000'])).toThrow('Invalid port number');
    expect(() => parseCliArgs(['--port', 'abc'])).toThrow(CliUsageError);
  });

  it('rejects a flag without its value', () => {
    expect(() => parseCliArgs(['--config'])).toThrow('--config requires a value');
    expect(() => parseCliArgs(['--host', '-v'])).toThrow('--host requires a value');
  });

  it('rejects unknown options and commands', () => {
    expect(() => parseCliArgs(['--offline'])).toThrow('Unknown option: --offline');
    expect(() => parseCliArgs(['start'])).toThrow('Unknown command: start');
    expect(() => parseCliArgs(['init', 'models'])).toThrow('Unknown command: models');
  });
});
