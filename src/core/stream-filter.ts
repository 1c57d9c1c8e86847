export type RedirectTarget = 'stdout' | 'stderr';

export interface StreamConfig {
  enabled: boolean;
  /** Only lines matching this pattern become notifications */
  matching?: RegExp;
  /** Echo every input line to this stream, matched or not */
  redirect?: RedirectTarget;
}

/** Anything with a `write`, e.g. `process.stdout` */
export interface LineWriter {
  write(chunk: string): unknown;
}

export type RedirectOutputs = Record<RedirectTarget, LineWriter>;

export const DEFAULT_STREAM_CONFIG: StreamConfig = {
  enabled: false,
  redirect: 'stdout',
};

function processOutputs(): RedirectOutputs {
  return { stdout: process.stdout, stderr: process.stderr };
}

/**
 * The message for a line, or null when the line does not match.
 *
 * With capture groups, the first group that took part in the match wins, so
 * an alternation such as `^(WARN:.*)|^(ERROR:.*)` yields whichever side hit.
 * Without a participating group the whole match is used.
 */
export function extractMessage(pattern: RegExp, line: string): string | null {
  const match = pattern.exec(line);
  if (!match) {
    return null;
  }
  const group = match.slice(1).find((value): value is string => value !== undefined);
  return group ?? match[0];
}

/**
 * Turn input lines into notification messages.
 *
 * Lazy: a line is only read when the consumer asks for the next message, and
 * the redirect echo is written before the line is matched so it keeps input order.
 */
export async function* filterLines(
  lines: AsyncIterable<string>,
  config: StreamConfig,
  outputs: RedirectOutputs = processOutputs()
): AsyncGenerator<string, void, undefined> {
  for await (const line of lines) {
    if (config.redirect) {
      outputs[config.redirect].write(`${line}\n`);
    }

    if (!config.matching) {
      yield line;
      continue;
    }

    const message = extractMessage(config.matching, line);
    if (message !== null) {
      yield message;
    }
  }
}
