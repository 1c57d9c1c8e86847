import { describe, it, expect, vi } from 'vitest';
import { runStream } from '../src/core/stream-runner.js';
import { NotificationDispatcher } from '../src/core/notification/dispatcher.js';
import type { Destination, SendOutcome } from '../src/core/notification/types.js';
import type { RedirectOutputs } from '../src/core/stream-filter.js';

const destinations: Destination[] = [{ type: 'desktop', summary: 'Noti', persistent: false }];

const silent: RedirectOutputs = {
  stdout: { write: () => true },
  stderr: { write: () => true },
};

async function* fromArray(lines: string[]): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
}

function dispatcherWith(send: (message: string) => Promise<SendOutcome>): NotificationDispatcher {
  return new NotificationDispatcher({
    senderFactory: destination => ({ type: destination.type, send }),
  });
}

describe('runStream', () => {
  it('dispatches each matching line and counts the results', async () => {
    const send = vi.fn((message: string): Promise<SendOutcome> =>
      Promise.resolve(message.startsWith('ERROR')
        ? { ok: false, error: { kind: 'desktop_unavailable', reason: 'no display' } }
        : { ok: true })
    );

    const summary = await runStream(
      fromArray(['WARN: low disk', 'info: ok', 'ERROR: crash']),
      { enabled: true, matching: /^(WARN:.*)|^(ERROR:.*)/ },
      destinations,
      dispatcherWith(send),
      { outputs: silent }
    );

    expect(summary).toEqual({ lines: 3, messages: 2, failed: 1 });
    expect(send.mock.calls).toEqual([['WARN: low disk'], ['ERROR: crash']]);
  });

  it('does not wait for one message to be delivered before sending the next', async () => {
    const resolvers: Array<(outcome: SendOutcome) => void> = [];
    const send = vi.fn(() => new Promise<SendOutcome>(resolve => resolvers.push(resolve)));

    const running = runStream(fromArray(['one', 'two']), { enabled: true }, destinations, dispatcherWith(send), {
      outputs: silent,
    });

    await vi.waitFor(() => expect(send).toHaveBeenCalledTimes(2));
    resolvers.forEach(resolve => resolve({ ok: true }));

    await expect(running).resolves.toEqual({ lines: 2, messages: 2, failed: 0 });
  });

  it('waits for in-flight dispatches before resolving', async () => {
    let delivered = false;
    const send = vi.fn(
      () => new Promise<SendOutcome>(resolve => setTimeout(() => {
        delivered = true;
        resolve({ ok: true });
      }, 20))
    );

    await runStream(fromArray(['only']), { enabled: true }, destinations, dispatcherWith(send), { outputs: silent });

    expect(delivered).toBe(true);
  });

  it('stops reading input once aborted', async () => {
    const controller = new AbortController();
    async function* lines(): AsyncGenerator<string> {
      yield 'one';
      controller.abort();
      yield 'two';
    }
    const send = vi.fn((): Promise<SendOutcome> => Promise.resolve({ ok: true }));

    const summary = await runStream(lines(), { enabled: true }, destinations, dispatcherWith(send), {
      outputs: silent,
      signal: controller.signal,
    });

    expect(summary).toEqual({ lines: 1, messages: 1, failed: 0 });
    expect(send).toHaveBeenCalledWith('one');
  });
});
