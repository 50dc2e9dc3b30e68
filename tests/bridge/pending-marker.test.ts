import { describe, expect, test } from 'vitest';
import { PendingMarker } from '../../src/bridge/pending-marker';
import { SessionContexts } from '../../src/bridge/session-context';

describe('PendingMarker', () => {
  test('expires at exactly the timeout', () => {
    let now = 0;
    const marker = new PendingMarker(600_000, () => now);
    marker.set('a');

    now = 599_999;
    expect(marker.isExpired()).toBe(false);
    now = 600_000;
    expect(marker.isExpired()).toBe(true);
    expect(marker.age()).toBe(600_000);
  });

  test('is scoped to its owner and replaced by a newer dispatch', () => {
    let now = 10;
    const marker = new PendingMarker(1000, () => now);
    marker.set('a');
    now = 20;
    marker.set('b');

    expect(marker.isSet()).toBe(true);
    expect(marker.isSet('a')).toBe(false);
    expect(marker.get()).toEqual({ owner: 'b', since: 20 });
  });

  test('cleared marker is neither set nor expired', () => {
    const marker = new PendingMarker(0, () => 0);
    marker.set('a');
    marker.clear();
    expect(marker.isSet()).toBe(false);
    expect(marker.isExpired()).toBe(false);
    expect(marker.age()).toBe(0);
  });
});

describe('SessionContexts', () => {
  test('records a dispatch and forgets it once completed', () => {
    const sessions = new SessionContexts();
    sessions.recordDispatch('a', 1, 'question', 'full prompt', 50);

    expect(sessions.get('a')).toEqual({
      owner: 'a',
      chatId: 1,
      lastUserText: 'question',
      lastPrompt: 'full prompt',
      lastDispatchAt: 50,
    });

    sessions.completeExchange('a');
    expect(sessions.get('a')?.lastUserText).toBeUndefined();
    expect(sessions.get('a')?.lastDispatchAt).toBe(50);
  });

  test('owners do not share context', () => {
    const sessions = new SessionContexts();
    sessions.recordDispatch('a', 1, 'from a', 'p', 1);
    expect(sessions.get('b')).toBeUndefined();
    expect(sessions.getOrCreate('b', 2)).toEqual({ owner: 'b', chatId: 2 });
  });
});
