/**
 * Command line interface
 *
 * Sends one message, or reads stdin and sends the lines that pass the stream
 * filter, to every destination in the config file.
 *
 * Usage:
 *   long-task && noti "long-task complete"
 *   long-task 2>&1 | noti          # with stream.enabled: true
 */

import { createInterface } from 'readline';
import { createLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import {
  DESTINATION_TYPES,
  getRuntimeSettings,
  loadConfig,
  resolveConfigPath,
  writeExampleConfig,
  type InitDestination,
} from '../core/config.js';
import { NotiError } from '../core/errors.js';
import { NotificationDispatcher, isTotalFailure, summarizeReport } from '../core/notification/dispatcher.js';
import type { RedirectOutputs } from '../core/stream-filter.js';
import { runStream } from '../core/stream-runner.js';

const logger = createLogger('CLI');
const out = createLogger('CLI', { channel: 'stdout' });

export const HELP_MESSAGE = `
Usage: noti [options] [message]
       noti init <desktop|webhook> [--custom]
       noti destination list

Send a message to every destination in the config file. With
stream.enabled set, read lines from stdin instead and send each one that
matches stream.matching.

Options:
  --config <path>  Config file (default: $NOTI_CONFIG or noti.yaml)
  --custom         With \`init webhook\`, write a custom template example
  -h, --help       Show this help
  -v, --version    Show the version

Examples:
  make build && noti "build finished"
  tail -f app.log | noti --config watch.yaml
`;

export type CliCommand =
  | { kind: 'send'; message?: string; configPath?: string }
  | { kind: 'init'; destination: InitDestination; custom: boolean; configPath?: string }
  | { kind: 'destination-list' }
  | { kind: 'help' }
  | { kind: 'version' };

function isInitDestination(value: string | undefined): value is InitDestination {
  return DESTINATION_TYPES.some(type => type === value);
}

export function parseArgs(args: readonly string[]): CliCommand {
  const positionals: string[] = [];
  let configPath: string | undefined;
  let custom = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }
    if (arg === '-v' || arg === '--version') {
      return { kind: 'version' };
    }
    if (arg === '--custom') {
      custom = true;
      continue;
    }
    if (arg === '--config') {
      configPath = args[i + 1];
      if (configPath === undefined) {
        throw new NotiError('--config needs a path', 'USAGE');
      }
      i++;
      continue;
    }
    if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
      continue;
    }
    if (arg.startsWith('-') && arg !== '-') {
      throw new NotiError(`Unknown option: ${arg}`, 'USAGE');
    }
    positionals.push(arg);
  }

  const [first, second] = positionals;

  if (first === 'init') {
    if (!isInitDestination(second)) {
      throw new NotiError(`init needs a destination: ${DESTINATION_TYPES.join(' | ')}`, 'USAGE');
    }
    return { kind: 'init', destination: second, custom, configPath };
  }

  if (first === 'destination') {
    if (second !== 'list') {
      throw new NotiError('Usage: noti destination list', 'USAGE');
    }
    return { kind: 'destination-list' };
  }

  return {
    kind: 'send',
    message: positionals.length > 0 ? positionals.join(' ') : undefined,
    configPath,
  };
}

export interface ExecuteOptions {
  message?: string;
  configPath: string;
  dispatcher?: NotificationDispatcher;
  /** Stream-mode input; stdin when omitted */
  lines?: AsyncIterable<string>;
  outputs?: RedirectOutputs;
  /** Stop reading input (SIGINT) */
  signal?: AbortSignal;
}

function stdinLines(signal?: AbortSignal): AsyncIterable<string> {
  const rl = createInterface({ input: process.stdin, crlfDelay: Infinity, terminal: false });
  signal?.addEventListener('abort', () => rl.close(), { once: true });
  return rl;
}

/**
 * Load the config, pick single-shot or stream mode and dispatch.
 * Resolves to the process exit code.
 */
export async function execute(options: ExecuteOptions): Promise<number> {
  const config = await loadConfig(options.configPath);
  const dispatcher = options.dispatcher ?? new NotificationDispatcher(getRuntimeSettings());

  if (config.stream.enabled) {
    if (options.message !== undefined) {
      throw new NotiError('A message cannot be provided when using streaming', 'STREAM_AND_MESSAGE');
    }

    logger.debug('Streaming notifications from stdin');
    const summary = await runStream(
      options.lines ?? stdinLines(options.signal),
      config.stream,
      config.destinations,
      dispatcher,
      { signal: options.signal, outputs: options.outputs }
    );
    logger.debug(`Read ${summary.lines} line(s), sent ${summary.messages} message(s), ${summary.failed} undelivered`);
    return summary.failed > 0 ? 1 : 0;
  }

  if (options.message === undefined) {
    throw new NotiError('A message must be provided when not streaming notifications', 'NO_MESSAGE');
  }

  const report = await dispatcher.dispatch(options.message, config.destinations);
  if (isTotalFailure(report)) {
    logger.error(`Notification was not delivered: ${summarizeReport(report)}`);
    return 1;
  }
  return 0;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Run one CLI invocation. User errors are printed and turned into exit code 1;
 * anything else is left to the caller.
 */
export async function runCli(args: readonly string[], options?: RunOptions): Promise<number> {
  try {
    const command = parseArgs(args);

    switch (command.kind) {
      case 'help':
        out.raw(HELP_MESSAGE);
        return 0;

      case 'version':
        out.raw(`noti v${VERSION}`);
        return 0;

      case 'destination-list':
        for (const type of DESTINATION_TYPES) {
          out.raw(type);
        }
        return 0;

      case 'init': {
        const path = resolveConfigPath(command.configPath);
        await writeExampleConfig(path, command.destination, command.custom);
        out.raw(`Created ${path}`);
        return 0;
      }

      case 'send':
        return await execute({
          message: command.message,
          configPath: resolveConfigPath(command.configPath),
          signal: options?.signal,
        });
    }
  } catch (error) {
    if (error instanceof NotiError) {
      logger.raw(`ERROR: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
