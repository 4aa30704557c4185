import { describe, it, expect, vi, afterEach } from 'vitest';
import { InFlightDeliveries } from '../../src/delivery/in-flight.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('InFlightDeliveries', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs tasks without waiting for each other and drains them', async () => {
    const tracker = new InFlightDeliveries();
    const first = deferred();
    const second = deferred();
    const started: string[] = [];

    tracker.run('a', async () => {
      started.push('a');
      await first.promise;
    });
    tracker.run('b', async () => {
      started.push('b');
      await second.promise;
    });

    expect(tracker.size).toBe(2);
    await vi.waitFor(() => expect(started).toEqual(['a', 'b']));

    second.resolve();
    first.resolve();
    await tracker.drain();

    expect(tracker.size).toBe(0);
  });

  it('logs a rejected task instead of letting it escape', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const tracker = new InFlightDeliveries();

    tracker.run('https://example.com/v', async () => {
      throw new Error('boom');
    });
    await tracker.drain();

    expect(tracker.size).toBe(0);
    expect(errorSpy).toHaveBeenCalledWith('[delivery] Unexpected failure for https://example.com/v:', expect.any(Error));
  });
});
