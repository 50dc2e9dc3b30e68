import { afterEach, beforeEach, describe, expect, test, vi, type Mock } from 'vitest';
import { DispatchQueue, type DispatchItem, type DispatchProcessor } from '../../src/bridge/dispatch-queue';
import { createSilentLogger } from '../helpers';

const COALESCE_MS = 300;

let messageCounter = 0;

function item(text: string, overrides: Partial<DispatchItem> = {}): DispatchItem {
  messageCounter++;
  return { owner: '1', chatId: 1, text, kind: 'plain', messageId: messageCounter, enqueuedAt: 0, ...overrides };
}

describe('DispatchQueue', () => {
  let processor: Mock<DispatchProcessor>;
  let queue: DispatchQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    messageCounter = 0;
    processor = vi.fn<DispatchProcessor>().mockResolvedValue(undefined);
    queue = new DispatchQueue({ coalesceMs: COALESCE_MS }, processor, createSilentLogger());
  });

  afterEach(() => {
    queue.dispose();
    vi.useRealTimers();
  });

  test('waits for the coalesce window before dispatching', async () => {
    queue.enqueue(item('hello'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS - 1);
    expect(processor).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(processor).toHaveBeenCalledTimes(1);
    expect(processor.mock.calls[0][0].text).toBe('hello');
  });

  test('rapid messages collapse to the newest one', async () => {
    queue.enqueue(item('first'));
    queue.enqueue(item('second'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS);

    expect(processor).toHaveBeenCalledTimes(1);
    expect(processor.mock.calls[0][0].text).toBe('second');
    expect(queue.pendingFor('1')).toBeNull();
  });

  test('messages arriving mid-dispatch wait, then only the newest runs', async () => {
    let finish: () => void = () => {};
    processor.mockImplementationOnce(() => new Promise<void>((resolve) => (finish = resolve)));

    queue.enqueue(item('one'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS);
    expect(queue.isBusy('1')).toBe(true);

    queue.enqueue(item('two'));
    queue.enqueue(item('three'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS * 5);
    expect(processor).toHaveBeenCalledTimes(1);
    expect(queue.pendingFor('1')?.text).toBe('three');

    finish();
    await vi.advanceTimersByTimeAsync(COALESCE_MS);
    expect(processor).toHaveBeenCalledTimes(2);
    expect(processor.mock.calls[1][0].text).toBe('three');
    await vi.waitFor(() => expect(queue.isBusy('1')).toBe(false));
  });

  test('owners are independent', async () => {
    queue.enqueue(item('from one', { owner: '1', chatId: 1 }));
    queue.enqueue(item('from two', { owner: '2', chatId: 2 }));
    await vi.advanceTimersByTimeAsync(COALESCE_MS);

    expect(processor.mock.calls.map(([dispatched]) => dispatched.text).sort()).toEqual(['from one', 'from two']);
  });

  test('the same chat message is only queued once', async () => {
    queue.enqueue(item('dup', { messageId: 77 }));
    await vi.advanceTimersByTimeAsync(COALESCE_MS);
    queue.enqueue(item('dup', { messageId: 77 }));
    await vi.advanceTimersByTimeAsync(COALESCE_MS);

    expect(processor).toHaveBeenCalledTimes(1);
  });

  test('a failing dispatch does not stop later ones', async () => {
    processor.mockRejectedValueOnce(new Error('terminal gone'));
    queue.enqueue(item('fails'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS);

    queue.enqueue(item('works'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS);

    expect(processor).toHaveBeenCalledTimes(2);
    expect(processor.mock.calls[1][0].text).toBe('works');
  });

  test('holds messages while a reply is awaited, then sends only the newest', async () => {
    let awaiting = true;
    const gated = new DispatchQueue(
      { coalesceMs: COALESCE_MS, isAwaitingReply: () => awaiting, recheckMs: 1000 },
      processor,
      createSilentLogger(),
    );

    gated.enqueue(item('first'));
    gated.enqueue(item('second'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS + 5000);
    expect(processor).not.toHaveBeenCalled();
    expect(gated.pendingFor('1')?.text).toBe('second');

    awaiting = false;
    gated.wake();
    await vi.advanceTimersByTimeAsync(COALESCE_MS);
    expect(processor).toHaveBeenCalledTimes(1);
    expect(processor.mock.calls[0][0].text).toBe('second');
    gated.dispose();
  });

  test('a held message goes out on the next re-check without a wake', async () => {
    let awaiting = true;
    const gated = new DispatchQueue(
      { coalesceMs: COALESCE_MS, isAwaitingReply: () => awaiting, recheckMs: 1000 },
      processor,
      createSilentLogger(),
    );

    gated.enqueue(item('later'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS);
    awaiting = false;
    await vi.advanceTimersByTimeAsync(999);
    expect(processor).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(processor).toHaveBeenCalledTimes(1);
    gated.dispose();
  });

  test('dispose cancels queued work', async () => {
    queue.enqueue(item('never'));
    queue.dispose();
    await vi.advanceTimersByTimeAsync(COALESCE_MS * 2);

    queue.enqueue(item('ignored'));
    await vi.advanceTimersByTimeAsync(COALESCE_MS * 2);
    expect(processor).not.toHaveBeenCalled();
  });
});
