/**
 * Command-line argument parsing for the ollama-relay binary.
 * @packageDocumentation
 */

export const CLI_COMMANDS = ['serve', 'init', 'config', 'models', 'status', 'help', 'version'] as const;

export type CliCommand = (typeof CLI_COMMANDS)[number];

export interface CliOptions {
  command: CliCommand;
  configPath: string | null;
  port: number | null;
  host: string | null;
  verbose: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function isCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((c) => c === value);
}

/**
 * Parse argv (without the node and script entries).
 * Flags may appear before or after the command.
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    command: 'serve',
    configPath: null,
    port: null,
    host: null,
    verbose: false,
  };
  let commandSeen = false;

  const valueOf = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new CliUsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '-h' || arg === '--help') {
      return { ...options, command: 'help' };
    }
    if (arg === '--version') {
      return { ...options, command: 'version' };
    }

    if (arg === '--port') {
      const port = Number(valueOf(arg, i));
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new CliUsageError('Invalid port number');
      }
      options.port = port;
      i++;
    } else if (arg === '--host') {
      options.host = valueOf(arg, i);
      i++;
    } else if (arg === '--config' || arg === '-c') {
      options.configPath = valueOf(arg, i);
      i++;
    } else if (arg === '-v' || arg === '--verbose') {
      options.verbose = true;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else if (!commandSeen && isCommand(arg)) {
      options.command = arg;
      commandSeen = true;
    } else {
      throw new CliUsageError(`Unknown command: ${arg}`);
    }
  }

  return options;
}
