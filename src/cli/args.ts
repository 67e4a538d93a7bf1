/**
 * Command-line parsing for the service entry point
 *
 * Usage:
 *   media-preprocessor [--socket-path <path> | --port <n>] [--accel <list> | --no-accel]
 *                      [--log-level <level>] [--export-card <file>] [--help]
 */

import { acceleratorListSchema, LOG_LEVELS, type LogLevel } from '../config/env.js';
import type { ConfigOverrides } from '../config/index.js';

export interface CliArgs {
  help: boolean;
  /** Write the capability card here and exit */
  exportCard?: string;
  overrides: ConfigOverrides;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `
Media preprocessing service

Usage:
  media-preprocessor [options]

Options:
  --socket-path <path>   Listen on this Unix socket (default: SOCKET_PATH)
  --port <n>             Listen on TCP port <n> instead of a socket
  --accel <list>         Accelerators to probe, comma-separated: cuda, metal, compute, none
  --no-accel             Use the CPU reference backend only (same as --accel none)
  --log-level <level>    ${LOG_LEVELS.join(', ')}
  --export-card <file>   Write the capability card as JSON and exit
  --help                 Show this message

Examples:
  media-preprocessor --socket-path /run/media.sock
  media-preprocessor --port 8090 --accel cuda
  media-preprocessor --export-card capability-card.json
`;

export function printUsage(write: (text: string) => void = (text) => process.stdout.write(text)): void {
  write(USAGE);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse argv (without the node and script entries)
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { help: false, overrides: {} };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new CliUsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;

      case '--socket-path':
        result.overrides.socketPath = valueOf(arg, i++);
        break;

      case '--port': {
        const raw = valueOf(arg, i++);
        const port = Number(raw);
        if (!Number.isInteger(port) || port < 1 || port > 65535) {
          throw new CliUsageError(`--port must be an integer between 1 and 65535 (received: ${raw})`);
        }
        result.overrides.port = port;
        break;
      }

      case '--accel': {
        const parsed = acceleratorListSchema.safeParse(valueOf(arg, i++));
        if (!parsed.success) {
          throw new CliUsageError(`--accel: ${parsed.error.issues[0]?.message ?? 'invalid list'}`);
        }
        result.overrides.accelerators = parsed.data;
        break;
      }

      case '--no-accel':
        result.overrides.accelerators = [];
        break;

      case '--log-level': {
        const level = valueOf(arg, i++);
        if (!isLogLevel(level)) {
          throw new CliUsageError(`--log-level must be one of: ${LOG_LEVELS.join(', ')}`);
        }
        result.overrides.logLevel = level;
        break;
      }

      case '--export-card':
        result.exportCard = valueOf(arg, i++);
        break;

      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return result;
}
