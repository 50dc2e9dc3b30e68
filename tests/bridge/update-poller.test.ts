import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { Update } from 'grammy/types';
import { createCursorFile } from '../../src/bridge/bridge-state';
import { UpdatePoller } from '../../src/bridge/update-poller';
import { FakeTransport, textUpdate } from '../fakes';
import { createSilentLogger, createTempDir, removeDir } from '../helpers';

const logger = createSilentLogger();

describe('UpdatePoller', () => {
  let dir: string;
  let transport: FakeTransport;

  beforeEach(() => {
    dir = createTempDir();
    transport = new FakeTransport();
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('handles each update and persists the next cursor', async () => {
    const handled: number[] = [];
    const first = textUpdate(1, 'one');
    const second = textUpdate(1, 'two');
    transport.batches.push([first, second]);

    const poller = new UpdatePoller(
      transport,
      createCursorFile(dir, logger),
      async (update) => {
        handled.push(update.update_id);
      },
      { retryDelayMs: 10 },
      logger,
    );

    expect(await poller.pollOnce()).toBe(2);
    expect(handled).toEqual([first.update_id, second.update_id]);
    expect(poller.currentOffset).toBe(second.update_id + 1);
    expect(createCursorFile(dir, logger).load()).toBe(second.update_id + 1);
  });

  test('a failing update is skipped and the cursor still advances', async () => {
    const bad = textUpdate(1, 'bad');
    const good = textUpdate(1, 'good');
    transport.batches.push([bad, good]);
    const handler = vi.fn(async (update: Update) => {
      if (update.update_id === bad.update_id) throw new Error('handler bug');
    });

    const poller = new UpdatePoller(transport, createCursorFile(dir, logger), handler, { retryDelayMs: 10 }, logger);
    await poller.pollOnce();

    expect(handler).toHaveBeenCalledTimes(2);
    expect(poller.currentOffset).toBe(good.update_id + 1);
  });

  test('resumes from the saved cursor after a restart', async () => {
    const cursor = createCursorFile(dir, logger);
    cursor.save(500);

    const poller = new UpdatePoller(transport, cursor, async () => {}, { retryDelayMs: 10 }, logger);
    poller.start();
    await vi.waitFor(() => expect(transport.offsets.length).toBeGreaterThan(0));
    await poller.stop();

    expect(transport.offsets[0]).toBe(500);
  });

  test('fetch failures are retried after the delay', async () => {
    let calls = 0;
    transport.getUpdates = async () => {
      calls++;
      if (calls === 1) throw new Error('network down');
      await new Promise((resolve) => setTimeout(resolve, 5));
      return [];
    };

    const poller = new UpdatePoller(transport, createCursorFile(dir, logger), async () => {}, { retryDelayMs: 10 }, logger);
    poller.start();
    await vi.waitFor(() => expect(calls).toBeGreaterThanOrEqual(2));
    await poller.stop();
  });
});
