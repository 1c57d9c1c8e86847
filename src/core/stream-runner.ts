import { createLogger } from '../utils/logger.js';
import { isTotalFailure, summarizeReport, type NotificationDispatcher } from './notification/dispatcher.js';
import type { Destination } from './notification/types.js';
import { filterLines, type RedirectOutputs, type StreamConfig } from './stream-filter.js';

const logger = createLogger('Stream');

export interface StreamSummary {
  /** Input lines read */
  lines: number;
  /** Lines that became notifications */
  messages: number;
  /** Messages no destination accepted */
  failed: number;
}

export interface StreamRunOptions {
  /** Stop reading input once aborted; sends already started still finish */
  signal?: AbortSignal;
  outputs?: RedirectOutputs;
}

/**
 * Read lines until the input ends (or the signal aborts), dispatching each
 * message as soon as it is produced. Dispatches overlap; the runner waits for
 * all of them before resolving.
 */
export async function runStream(
  lines: AsyncIterable<string>,
  config: StreamConfig,
  destinations: readonly Destination[],
  dispatcher: NotificationDispatcher,
  options?: StreamRunOptions
): Promise<StreamSummary> {
  const summary: StreamSummary = { lines: 0, messages: 0, failed: 0 };
  const inFlight = new Set<Promise<void>>();
  const signal = options?.signal;

  async function* counted(): AsyncGenerator<string, void, undefined> {
    for await (const line of lines) {
      if (signal?.aborted) {
        return;
      }
      summary.lines++;
      yield line;
    }
  }

  for await (const message of filterLines(counted(), config, options?.outputs)) {
    summary.messages++;
    const sequence = summary.messages;
    logger.debug(`Dispatching message #${sequence}`);

    const task: Promise<void> = dispatcher
      .dispatch(message, destinations)
      .then((report) => {
        if (isTotalFailure(report)) {
          summary.failed++;
          logger.error(`Message #${sequence} was not delivered to any destination`);
        } else {
          logger.debug(`Message #${sequence}: ${summarizeReport(report)}`);
        }
      })
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  }

  if (inFlight.size > 0) {
    logger.debug(`Input closed, waiting for ${inFlight.size} in-flight dispatch(es)`);
  }
  await Promise.all(inFlight);

  return summary;
}
