import type { Logger } from '../logger';
import type { PayloadKind } from './payload-templates';

export interface DispatchItem {
  owner: string;
  chatId: number;
  text: string;
  kind: PayloadKind;
  messageId?: number;
  enqueuedAt: number;
}

export type DispatchProcessor = (item: DispatchItem) => Promise<void>;

export interface DispatchQueueOptions {
  /** How long an owner's newest item may be superseded before it is sent */
  coalesceMs: number;
  /** True while a reply is still awaited; items wait (and coalesce) until it turns false */
  isAwaitingReply?: (owner: string) => boolean;
  /** How often a held item re-checks isAwaitingReply when nobody calls wake() */
  recheckMs?: number;
}

const DEFAULT_RECHECK_MS = 1000;

interface OwnerQueue {
  latest: DispatchItem | null;
  timer: ReturnType<typeof setTimeout> | null;
  active: Promise<void> | null;
  superseded: number;
}

const SEEN_MESSAGES_CAP = 250;

/**
 * One dispatch in flight per owner. An item is held while the previous
 * dispatch is running or its reply is still awaited; items that pile up
 * meanwhile collapse to the newest one and older ones are dropped unsent.
 */
export class DispatchQueue {
  private owners = new Map<string, OwnerQueue>();
  private seenMessages = new Set<string>();
  private disposed = false;

  constructor(
    private options: DispatchQueueOptions,
    private processor: DispatchProcessor,
    private logger: Logger,
  ) {}

  enqueue(item: DispatchItem): void {
    if (this.disposed) return;

    if (item.messageId !== undefined) {
      const messageKey = `${item.chatId}:${item.messageId}`;
      if (this.seenMessages.has(messageKey)) {
        this.logger.debug({ messageId: item.messageId }, 'Duplicate message ignored');
        return;
      }
      this.addSeen(messageKey);
    }

    const queue = this.queueFor(item.owner);
    if (queue.latest) {
      queue.superseded++;
      this.logger.info(
        { owner: item.owner, dropped: queue.latest.text.slice(0, 50) },
        'Newer message supersedes queued one',
      );
    }
    queue.latest = item;

    // While a dispatch is running, the drain after it picks this up
    if (queue.active) return;
    this.scheduleDrain(item.owner, queue);
  }

  /** Items waiting (not yet handed to the processor) for an owner */
  pendingFor(owner: string): DispatchItem | null {
    return this.owners.get(owner)?.latest ?? null;
  }

  isBusy(owner: string): boolean {
    return Boolean(this.owners.get(owner)?.active);
  }

  /** Re-check held items now, e.g. right after a reply was delivered */
  wake(): void {
    if (this.disposed) return;
    for (const [owner, queue] of this.owners) {
      if (queue.latest && !queue.active) this.scheduleDrain(owner, queue);
    }
  }

  /**
   * Clean up all timers. Call on shutdown.
   */
  dispose(): void {
    this.disposed = true;
    for (const queue of this.owners.values()) {
      if (queue.timer) clearTimeout(queue.timer);
    }
    this.owners.clear();
    this.seenMessages.clear();
  }

  private queueFor(owner: string): OwnerQueue {
    let queue = this.owners.get(owner);
    if (!queue) {
      queue = { latest: null, timer: null, active: null, superseded: 0 };
      this.owners.set(owner, queue);
    }
    return queue;
  }

  private scheduleDrain(owner: string, queue: OwnerQueue): void {
    if (queue.timer) clearTimeout(queue.timer);
    queue.timer = setTimeout(() => {
      queue.timer = null;
      this.drain(owner);
    }, this.options.coalesceMs);
  }

  private scheduleRecheck(owner: string, queue: OwnerQueue): void {
    if (queue.timer) clearTimeout(queue.timer);
    queue.timer = setTimeout(() => {
      queue.timer = null;
      this.drain(owner);
    }, this.options.recheckMs ?? DEFAULT_RECHECK_MS);
  }

  private drain(owner: string): void {
    const queue = this.owners.get(owner);
    if (!queue || queue.active) return;

    const item = queue.latest;
    if (!item) {
      this.owners.delete(owner);
      return;
    }

    if (this.options.isAwaitingReply?.(owner)) {
      this.logger.debug({ owner }, 'Reply still awaited, holding queued message');
      this.scheduleRecheck(owner, queue);
      return;
    }
    queue.latest = null;

    if (queue.superseded > 0) {
      this.logger.info({ owner, superseded: queue.superseded }, 'Dispatching newest of several queued messages');
      queue.superseded = 0;
    }

    queue.active = this.processor(item)
      .catch((err) => {
        this.logger.error({ err, owner }, 'Dispatch processor failed');
      })
      .finally(() => {
        queue.active = null;
        if (this.disposed) return;
        if (queue.latest) {
          this.scheduleDrain(owner, queue);
        } else {
          this.owners.delete(owner);
        }
      });
  }

  // ─── Dedup housekeeping ────────────────────────────────────────

  private addSeen(messageKey: string): void {
    this.seenMessages.add(messageKey);
    if (this.seenMessages.size > SEEN_MESSAGES_CAP) {
      // Prune oldest entries (Set preserves insertion order)
      const excess = this.seenMessages.size - SEEN_MESSAGES_CAP;
      let removed = 0;
      for (const id of this.seenMessages) {
        if (removed >= excess) break;
        this.seenMessages.delete(id);
        removed++;
      }
    }
  }
}
